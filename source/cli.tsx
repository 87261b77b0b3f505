#!/usr/bin/env node
import React from 'react';
import {render} from 'ink';
import meow from 'meow';
import chalk from 'chalk';
import App from './app.js';
import {runAnalysis} from './core/analyze.js';
import {loadClassifier} from './core/classifier.js';
import {requireInputs, resolveConfig} from './core/config.js';
import {describeError} from './core/errors.js';
import {createLogger} from './core/logger.js';
import {useStore} from './store/useStore.js';
import {formatConsoleSummary, formatRuleCatalog} from './ui/console.js';

const cli = meow(
	`
	Usage
	  $ vmx-agent analyze --input <file|glob> [--input ...] [--rules <file>] [--out <dir>]
	  $ vmx-agent rules [--rules <file>]

	Commands
	  analyze      Classify and score an inventory, write JSON/CSV/Markdown reports
	  rules        Validate the rule catalog and list its rules

	Options
	  --input, -i  Inventory JSON file or glob (repeatable)
	  --rules, -r  Rule catalog, YAML or JSON (default: bundled rules, env VMX_RULES)
	  --out, -o    Report directory (default: ./vmx-report, env VMX_OUT_DIR)
	  --log-level  fatal|error|warn|info|debug|trace|silent (env VMX_LOG_LEVEL)
	  --log-file   Write logs to a file instead of stderr (env VMX_LOG_FILE)
	  --no-ui      Print a summary instead of opening the interactive browser

	Examples
	  $ vmx-agent analyze -i inventory.json -o out
	  $ vmx-agent analyze -i "exports/*.json" --no-ui
	`,
	{
		importMeta: import.meta,
		booleanDefault: undefined,
		flags: {
			input: {
				type: 'string',
				shortFlag: 'i',
				isMultiple: true,
			},
			rules: {
				type: 'string',
				shortFlag: 'r',
			},
			out: {
				type: 'string',
				shortFlag: 'o',
			},
			logLevel: {
				type: 'string',
			},
			logFile: {
				type: 'string',
			},
			ui: {
				type: 'boolean',
			},
		},
	},
);

const main = async () => {
	const [command] = cli.input;
	if (command !== 'analyze' && command !== 'rules') {
		cli.showHelp(command ? 2 : 0);
		return;
	}

	const config = resolveConfig(cli.flags);
	const logger = createLogger({level: config.logLevel, file: config.logFile});

	try {
		if (command === 'rules') {
			const classifier = await loadClassifier(config.rulesPath);
			process.stdout.write(formatRuleCatalog(classifier.rules));
			return;
		}

		requireInputs(config);

		if (config.ui) {
			const app = render(
				<App
					inputs={config.inputs}
					rulesPath={config.rulesPath}
					outDir={config.outDir}
					logger={logger}
				/>,
			);
			await app.waitUntilExit();
			if (useStore.getState().error) {
				process.exitCode = 1;
			}
			return;
		}

		const outcome = await runAnalysis({
			inputs: config.inputs,
			rulesPath: config.rulesPath,
			outDir: config.outDir,
			logger,
		});
		process.stdout.write(formatConsoleSummary(outcome));
	} catch (error: unknown) {
		logger.error({err: error}, `${command} failed`);
		throw error;
	}
};

main().catch((error: unknown) => {
	process.stderr.write(`${chalk.red(`Error: ${describeError(error)}`)}\n`);
	process.exitCode = 1;
});
