import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import {z} from 'zod';
import {InventoryError, describeError} from './errors.js';
import type {VmRecord} from './types.js';

// Producers sometimes emit numbers as strings ("42"); accept plain decimals only.
const DECIMAL_PATTERN = /^\s*[+-]?(\d+\.?\d*|\.\d+)\s*$/;

const coerceNumeric = (value: unknown) =>
	typeof value === 'string' && DECIMAL_PATTERN.test(value) ? Number(value) : value;

const numeric = (schema: z.ZodNumber) => z.preprocess(coerceNumeric, schema);

const count = () => numeric(z.number().int().nonnegative());
const amount = () => numeric(z.number().finite().nonnegative());
const percent = () => numeric(z.number().finite());

export const VmSchema = z
	.object({
		schema_version: z.literal(1),
		vm_id: z.string().trim().min(1),
		name: z.string().trim(),
		power_state: z.enum(['poweredOn', 'poweredOff']),
		cpu: amount(),
		memory_mb: amount(),
		disk_gb: amount(),
		guest_os: z.string(),
		tools_status: z.enum(['running', 'notRunning', 'unknown']),
		nics: count(),
		snapshot_count: count(),
		max_snapshot_age_days: amount(),
		avg_cpu_usage_pct: percent(),
		avg_mem_usage_pct: percent(),
		uptime_days: amount(),
		tags: z.array(z.string()).default([]),
	})
	.transform(
		(raw): VmRecord => ({
			vmId: raw.vm_id,
			name: raw.name,
			powerState: raw.power_state,
			cpu: raw.cpu,
			memoryMb: raw.memory_mb,
			diskGb: raw.disk_gb,
			guestOs: raw.guest_os,
			toolsStatus: raw.tools_status,
			nics: raw.nics,
			snapshotCount: raw.snapshot_count,
			maxSnapshotAgeDays: raw.max_snapshot_age_days,
			avgCpuUsagePct: raw.avg_cpu_usage_pct,
			avgMemUsagePct: raw.avg_mem_usage_pct,
			uptimeDays: raw.uptime_days,
			tags: raw.tags,
		}),
	);

export type VmInput = z.input<typeof VmSchema>;

const formatIssues = (error: z.ZodError) =>
	error.issues
		.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
		.join('; ');

export const parseInventory = (data: unknown, source: string): VmRecord[] => {
	if (!Array.isArray(data)) {
		throw new InventoryError(`${source}: input inventory must be a JSON array of VM objects`);
	}

	return data.map((item: unknown, index) => {
		const parsed = VmSchema.safeParse(item);
		if (!parsed.success) {
			throw new InventoryError(`${source}[${index}]: ${formatIssues(parsed.error)}`);
		}
		return parsed.data;
	});
};

/**
 * Expands inputs into absolute file paths. Literal paths are kept as given;
 * glob patterns contribute their matches in sorted order.
 */
export const resolveInventoryFiles = async (
	inputs: readonly string[],
	cwd: string = process.cwd(),
): Promise<string[]> => {
	const files: string[] = [];

	for (const input of inputs) {
		if (!fg.isDynamicPattern(input)) {
			files.push(path.resolve(cwd, input));
			continue;
		}

		const matches = await fg(input, {
			cwd,
			absolute: true,
			onlyFiles: true,
			suppressErrors: true,
		});
		if (matches.length === 0) {
			throw new InventoryError(`No inventory files match ${input}`);
		}
		files.push(...matches.map(match => path.normalize(match)).sort());
	}

	return Array.from(new Set(files));
};

const readInventoryFile = async (filePath: string): Promise<unknown> => {
	let raw: string;
	try {
		raw = await fs.readFile(filePath, 'utf8');
	} catch (error: unknown) {
		throw new InventoryError(`Unable to read inventory file ${filePath}: ${describeError(error)}`, {
			cause: error,
		});
	}

	try {
		return JSON.parse(raw);
	} catch (error: unknown) {
		throw new InventoryError(`${filePath}: not valid JSON: ${describeError(error)}`, {
			cause: error,
		});
	}
};

export type LoadedInventory = {
	files: string[];
	vms: VmRecord[];
};

export const loadInventory = async (
	inputs: readonly string[],
	cwd?: string,
): Promise<LoadedInventory> => {
	const files = await resolveInventoryFiles(inputs, cwd);
	const vms: VmRecord[] = [];
	const seen = new Map<string, string>();

	for (const filePath of files) {
		const records = parseInventory(await readInventoryFile(filePath), filePath);
		records.forEach((vm, index) => {
			const location = `${filePath}[${index}]`;
			const previous = seen.get(vm.vmId);
			if (previous) {
				throw new InventoryError(
					`Duplicate vm_id '${vm.vmId}' at ${location} (first seen at ${previous})`,
				);
			}
			seen.set(vm.vmId, location);
			vms.push(vm);
		});
	}

	return {files, vms};
};
