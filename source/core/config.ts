import {fileURLToPath} from 'node:url';
import {z} from 'zod';
import {ConfigError} from './errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const DEFAULT_RULES_PATH = fileURLToPath(
	new URL('../../rules/classification_rules.yaml', import.meta.url),
);

export const DEFAULT_OUT_DIR = 'vmx-report';

const ConfigSchema = z.object({
	inputs: z.array(z.string().min(1)),
	rulesPath: z.string().min(1),
	outDir: z.string().min(1),
	logLevel: z.enum(LOG_LEVELS),
	logFile: z.string().min(1).optional(),
	ui: z.boolean(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type CliFlags = {
	input?: string[];
	rules?: string;
	out?: string;
	logLevel?: string;
	logFile?: string;
	ui?: boolean;
};

export type ConfigEnv = Record<string, string | undefined>;

const nonEmpty = (value: string | undefined) =>
	value !== undefined && value.trim().length > 0 ? value.trim() : undefined;

/**
 * Flags win over `VMX_*` environment variables. Without an explicit level or
 * log file, the interactive UI runs with logging silenced.
 */
export const resolveConfig = (
	flags: CliFlags,
	env: ConfigEnv = process.env,
	isTty: boolean = Boolean(process.stdout.isTTY),
): AppConfig => {
	const ui = flags.ui ?? isTty;
	const logFile = nonEmpty(flags.logFile) ?? nonEmpty(env['VMX_LOG_FILE']);
	const requestedLevel = nonEmpty(flags.logLevel) ?? nonEmpty(env['VMX_LOG_LEVEL']);

	const parsed = ConfigSchema.safeParse({
		inputs: flags.input ?? [],
		rulesPath: nonEmpty(flags.rules) ?? nonEmpty(env['VMX_RULES']) ?? DEFAULT_RULES_PATH,
		outDir: nonEmpty(flags.out) ?? nonEmpty(env['VMX_OUT_DIR']) ?? DEFAULT_OUT_DIR,
		logLevel: requestedLevel?.toLowerCase() ?? (ui && !logFile ? 'silent' : 'info'),
		logFile,
		ui,
	});

	if (!parsed.success) {
		const details = parsed.error.issues
			.map(issue => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ');
		throw new ConfigError(`Invalid configuration: ${details}`);
	}

	return parsed.data;
};

export const requireInputs = (config: AppConfig) => {
	if (config.inputs.length === 0) {
		throw new ConfigError('Missing --input: pass at least one inventory file or glob');
	}
};
