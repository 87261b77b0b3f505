import chalk from 'chalk';
import type {AnalysisOutcome} from '../core/analyze.js';
import type {RuleDescriptor} from '../core/types.js';
import {summarize} from '../report/summary.js';
import {levelColors} from './format.js';

export const formatConsoleSummary = (outcome: AnalysisOutcome) => {
	const summary = summarize(outcome.records);
	const levels = (['High', 'Medium', 'Low'] as const)
		.map(level => chalk.hex(levelColors[level])(`${level} ${summary.levels[level]}`))
		.join(' | ');
	const categories = Object.entries(summary.categories)
		.map(([category, total]) => `${category} ${total}`)
		.join(' | ');

	return [
		chalk.hex('#0047AB')(`Analyzed ${summary.total} VMs from ${outcome.inventoryFiles.length} file(s)`),
		`Risk: ${levels}`,
		`Categories: ${categories}`,
		`JSON: ${outcome.reports.json}`,
		`CSV: ${outcome.reports.csv}`,
		`Markdown: ${outcome.reports.markdown}`,
		'',
	].join('\n');
};

export const formatRuleCatalog = (rules: readonly RuleDescriptor[]) => {
	const lines = rules.map(rule => {
		const description = rule.description ? chalk.hex('#6B7280')(` - ${rule.description}`) : '';
		return `${rule.name.padEnd(24)} ${rule.category.padEnd(18)} ${rule.confidence}${description}`;
	});
	return [chalk.hex('#0047AB')(`${rules.length} rule(s) valid`), ...lines, ''].join('\n');
};
