import {describe, expect, it} from 'vitest';
import {
	CASCADE,
	classifyVm,
	conservativeRefactorTier,
	createClassifier,
	workloadComplexityTier,
	zombieTier,
} from './classifier.js';
import {RuleCatalogError} from './errors.js';
import {CATEGORIES, CONFIDENCES, type VmRecord} from './types.js';

const baseVm: VmRecord = {
	vmId: 'vm-001',
	name: 'app-01',
	powerState: 'poweredOn',
	cpu: 2,
	memoryMb: 4096,
	diskGb: 80,
	guestOs: 'Fedora 34',
	toolsStatus: 'running',
	nics: 1,
	snapshotCount: 0,
	maxSnapshotAgeDays: 0,
	avgCpuUsagePct: 20,
	avgMemUsagePct: 20,
	uptimeDays: 10,
	tags: [],
};

const validCatalog = [
	{name: 'zombie-detection', category: 'retire', confidence: 'high'},
	{name: 'default-conservative', category: 'keep', confidence: 'medium'},
];

describe('classifyVm scenarios', () => {
	it('retires a VM powered off for 120 days', () => {
		const result = classifyVm({
			...baseVm,
			powerState: 'poweredOff',
			guestOs: 'Ubuntu 18.04',
			toolsStatus: 'unknown',
			tags: ['powered_off_days=120'],
		});

		expect(result).toEqual({
			category: 'retire',
			confidence: 'high',
			ruleName: 'zombie-detection',
			reason: 'Powered off for 120 days; requires decommission',
		});
	});

	it('keeps a Windows Server 2008 guest', () => {
		const result = classifyVm({...baseVm, guestOs: 'Windows Server 2008 R2'});

		expect(result).toEqual({
			category: 'keep',
			confidence: 'high',
			ruleName: 'legacy-os-detection',
			reason: 'Windows Server 2008 legacy OS requires on-premises infrastructure',
		});
	});

	it('rehosts with high confidence when snapshots and NICs both fire', () => {
		const result = classifyVm({...baseVm, guestOs: 'RHEL 8', snapshotCount: 8, nics: 4});

		expect(result.category).toBe('rehost');
		expect(result.confidence).toBe('high');
		expect(result.ruleName).toBe('workload-complexity');
		expect(result.reason).toBe(
			'Complex snapshot state (8 snapshots) requires stateful rehost; ' +
				'Multi-NIC configuration (4 NICs) requires careful networking planning',
		);
	});

	it('marks a small quiet Ubuntu guest as a refactor candidate', () => {
		const result = classifyVm({
			...baseVm,
			guestOs: 'Ubuntu 20.04',
			nics: 1,
			diskGb: 50,
			snapshotCount: 0,
			avgCpuUsagePct: 70,
			avgMemUsagePct: 70,
			uptimeDays: 1,
		});

		expect(result.category).toBe('refactor_candidate');
		expect(result.confidence).toBe('medium');
		expect(result.ruleName).toBe('conservative-refactor');
	});

	it('falls through to the conservative default for Fedora with a snapshot', () => {
		const result = classifyVm({...baseVm, guestOs: 'Fedora 34', diskGb: 80, snapshotCount: 1});

		expect(result).toEqual({
			category: 'keep',
			confidence: 'medium',
			ruleName: 'default-conservative',
			reason: 'Conservative default: keep on-premises',
		});
	});
});

describe('zombie tier', () => {
	const zombie: VmRecord = {
		...baseVm,
		powerState: 'poweredOff',
		guestOs: 'Ubuntu 20.04',
		diskGb: 50,
		avgCpuUsagePct: 10,
		avgMemUsagePct: 10,
		uptimeDays: 1,
		tags: ['powered_off_days=90'],
	};

	it('overrides refactor and legacy criteria', () => {
		expect(classifyVm(zombie).ruleName).toBe('zombie-detection');
		expect(classifyVm({...zombie, guestOs: 'CentOS 6.10'}).ruleName).toBe('zombie-detection');
	});

	it('never fires for powered-on VMs', () => {
		const result = classifyVm({...zombie, powerState: 'poweredOn', tags: ['powered_off_days=500']});

		expect(result.category).not.toBe('retire');
		expect(result.ruleName).toBe('conservative-refactor');
	});

	it('requires more than 60 days', () => {
		expect(zombieTier.evaluate({...zombie, tags: ['powered_off_days=60']})).toBeNull();
		expect(zombieTier.evaluate({...zombie, tags: ['powered_off_days=61']})?.category).toBe('retire');
	});

	it('retires VMs whose day count exceeds the safe integer range', () => {
		const tags = ['powered_off_days=99999999999999999999'];

		expect(classifyVm({...zombie, tags})).toEqual({
			category: 'retire',
			confidence: 'high',
			ruleName: 'zombie-detection',
			reason: 'Powered off for 99999999999999999999 days; requires decommission',
		});
	});

	it('ignores missing or malformed tags', () => {
		expect(zombieTier.evaluate({...zombie, tags: []})).toBeNull();
		expect(zombieTier.evaluate({...zombie, tags: ['powered_off_days=lots']})).toBeNull();
		expect(zombieTier.evaluate({...zombie, tags: ['powered_off_days=90.5']})).toBeNull();
	});

	it('only reads the first powered_off_days tag', () => {
		const tags = ['powered_off_days=bad', 'powered_off_days=200'];

		expect(zombieTier.evaluate({...zombie, tags})).toBeNull();
	});
});

describe('legacy OS tier', () => {
	it.each([
		['Windows Server 2003', 'Windows Server 2003 legacy OS requires on-premises infrastructure'],
		['RHEL 6', 'RHEL 6 legacy OS not supported in cloud targets'],
		['CentOS 6.10', 'CentOS 6 legacy OS not supported in cloud targets'],
	])('keeps %s', (guestOs, reason) => {
		const result = classifyVm({...baseVm, guestOs, snapshotCount: 9});

		expect(result.category).toBe('keep');
		expect(result.confidence).toBe('high');
		expect(result.reason).toBe(reason);
	});

	it('checks 2008 before 2003', () => {
		const result = classifyVm({...baseVm, guestOs: 'Server 2003 upgraded to 2008'});

		expect(result.reason).toBe('Windows Server 2008 legacy OS requires on-premises infrastructure');
	});
});

describe('workload complexity tier', () => {
	it('uses medium confidence for a single fragment', () => {
		const result = workloadComplexityTier.evaluate({...baseVm, toolsStatus: 'notRunning'});

		expect(result).toEqual({
			category: 'rehost',
			confidence: 'medium',
			ruleName: 'workload-complexity',
			reason: 'VMware Tools notRunning indicates operational complexity',
		});
	});

	it('joins every fragment in check order', () => {
		const result = workloadComplexityTier.evaluate({
			...baseVm,
			snapshotCount: 6,
			nics: 5,
			toolsStatus: 'unknown',
			diskGb: 500,
		});

		expect(result?.reason.split('; ')).toEqual([
			'Complex snapshot state (6 snapshots) requires stateful rehost',
			'Multi-NIC configuration (5 NICs) requires careful networking planning',
			'VMware Tools unknown indicates operational complexity',
			'Large disk footprint (500 GB) suggests stateful workload',
		]);
		expect(result?.confidence).toBe('high');
	});

	it('does not fire at the thresholds', () => {
		expect(
			workloadComplexityTier.evaluate({...baseVm, snapshotCount: 5, nics: 3, diskGb: 300}),
		).toBeNull();
	});
});

describe('conservative refactor tier', () => {
	const candidate: VmRecord = {...baseVm, guestOs: 'Debian 12', diskGb: 100};

	it('accepts the exact limits', () => {
		expect(conservativeRefactorTier.evaluate(candidate)?.category).toBe('refactor_candidate');
	});

	const disqualifiers: Array<[string, Partial<VmRecord>]> = [
		['a snapshot', {snapshotCount: 1}],
		['busy CPU', {avgCpuUsagePct: 71}],
		['busy memory', {avgMemUsagePct: 71}],
		['long uptime', {uptimeDays: 366}],
		['a second NIC', {nics: 2}],
		['a larger disk', {diskGb: 101}],
		['a non-Linux guest', {guestOs: 'Windows Server 2019'}],
	];

	it.each(disqualifiers)('is disqualified by %s', (_label, overrides) => {
		expect(conservativeRefactorTier.evaluate({...candidate, ...overrides})).toBeNull();
	});

	it('treats non-numeric values as non-matching', () => {
		expect(conservativeRefactorTier.evaluate({...candidate, nics: Number.NaN})).toBeNull();
		expect(classifyVm({...candidate, nics: Number.NaN}).ruleName).toBe('default-conservative');
	});
});

describe('cascade', () => {
	it('evaluates tiers in priority order', () => {
		expect(CASCADE.map(tier => tier.ruleName)).toEqual([
			'zombie-detection',
			'legacy-os-detection',
			'workload-complexity',
			'conservative-refactor',
			'default-conservative',
		]);
	});

	it('is deterministic and stays inside the vocabularies', () => {
		const vms: VmRecord[] = [
			baseVm,
			{...baseVm, guestOs: 'Windows Server 2008'},
			{...baseVm, powerState: 'poweredOff', tags: ['powered_off_days=120']},
			{...baseVm, nics: 4, snapshotCount: 8},
			{...baseVm, guestOs: 'Ubuntu 20.04', diskGb: 50},
		];

		for (const vm of vms) {
			const first = classifyVm(vm);
			expect(classifyVm(vm)).toEqual(first);
			expect(CATEGORIES).toContain(first.category);
			expect(CONFIDENCES).toContain(first.confidence);
		}
	});
});

describe('createClassifier', () => {
	it('normalizes category and confidence case', () => {
		const classifier = createClassifier([
			{name: 'loud', category: 'RETIRE', confidence: 'High', description: 'shouty'},
		]);

		expect(classifier.rules).toEqual([
			{name: 'loud', category: 'retire', confidence: 'high', description: 'shouty'},
		]);
	});

	it('keeps the fixed cascade regardless of catalog content', () => {
		const classifier = createClassifier(validCatalog);

		expect(classifier.classify({...baseVm, guestOs: 'RHEL 6'}).ruleName).toBe('legacy-os-detection');
	});

	it('rejects an unknown category and names the rule', () => {
		expect(() =>
			createClassifier([{name: 'modernize-all', category: 'replatform', confidence: 'high'}]),
		).toThrow(
			"Rule 'modernize-all' has invalid category 'replatform'. Allowed: rehost, refactor_candidate, retire, keep",
		);
	});

	it('rejects numeric confidences after coercing them to text', () => {
		expect(() =>
			createClassifier([{name: 'scored', category: 'keep', confidence: 90}]),
		).toThrow("Rule 'scored' has invalid confidence '90'. Allowed: high, medium, low");
	});

	it('throws RuleCatalogError for entries that are not objects', () => {
		expect(() => createClassifier(['just-a-string'])).toThrow(RuleCatalogError);
	});
});
