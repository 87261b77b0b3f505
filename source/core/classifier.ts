import {RuleCatalogError} from './errors.js';
import {loadRuleCatalog} from './rules.js';
import {
	atMost,
	exceeds,
	findLegacyToken,
	isLinuxGuest,
	LEGACY_OS_TOKENS,
	readPoweredOffDays,
} from './signals.js';
import {
	CATEGORIES,
	CONFIDENCES,
	type ClassificationResult,
	type RuleDescriptor,
	type VmRecord,
} from './types.js';

export type CascadeTier = {
	ruleName: string;
	evaluate: (vm: VmRecord) => ClassificationResult | null;
};

export type Classifier = {
	rules: readonly RuleDescriptor[];
	classify: (vm: VmRecord) => ClassificationResult;
};

export const ZOMBIE_THRESHOLD_DAYS = 60;

const LEGACY_OS_REASONS: Record<(typeof LEGACY_OS_TOKENS)[number], string> = {
	'2008': 'Windows Server 2008 legacy OS requires on-premises infrastructure',
	'2003': 'Windows Server 2003 legacy OS requires on-premises infrastructure',
	'rhel 6': 'RHEL 6 legacy OS not supported in cloud targets',
	'centos 6': 'CentOS 6 legacy OS not supported in cloud targets',
};

export const zombieTier: CascadeTier = {
	ruleName: 'zombie-detection',
	evaluate: vm => {
		if (vm.powerState !== 'poweredOff') return null;
		const days = readPoweredOffDays(vm.tags);
		if (days === null || days <= BigInt(ZOMBIE_THRESHOLD_DAYS)) return null;
		return {
			category: 'retire',
			confidence: 'high',
			ruleName: 'zombie-detection',
			reason: `Powered off for ${days} days; requires decommission`,
		};
	},
};

export const legacyOsTier: CascadeTier = {
	ruleName: 'legacy-os-detection',
	evaluate: vm => {
		const token = findLegacyToken(vm.guestOs);
		if (!token) return null;
		return {
			category: 'keep',
			confidence: 'high',
			ruleName: 'legacy-os-detection',
			reason: LEGACY_OS_REASONS[token],
		};
	},
};

export const workloadComplexityTier: CascadeTier = {
	ruleName: 'workload-complexity',
	evaluate: vm => {
		const fragments: string[] = [];

		if (exceeds(vm.snapshotCount, 5)) {
			fragments.push(
				`Complex snapshot state (${vm.snapshotCount} snapshots) requires stateful rehost`,
			);
		}

		if (exceeds(vm.nics, 3)) {
			fragments.push(
				`Multi-NIC configuration (${vm.nics} NICs) requires careful networking planning`,
			);
		}

		if (vm.toolsStatus !== 'running') {
			fragments.push(`VMware Tools ${vm.toolsStatus} indicates operational complexity`);
		}

		if (exceeds(vm.diskGb, 300)) {
			fragments.push(`Large disk footprint (${vm.diskGb} GB) suggests stateful workload`);
		}

		if (fragments.length === 0) return null;
		return {
			category: 'rehost',
			confidence: fragments.length > 1 ? 'high' : 'medium',
			ruleName: 'workload-complexity',
			reason: fragments.join('; '),
		};
	},
};

const countRefactorRiskSignals = (vm: VmRecord) =>
	[
		exceeds(vm.snapshotCount, 0),
		exceeds(vm.avgCpuUsagePct, 70),
		exceeds(vm.avgMemUsagePct, 70),
		exceeds(vm.uptimeDays, 365),
	].filter(Boolean).length;

export const conservativeRefactorTier: CascadeTier = {
	ruleName: 'conservative-refactor',
	evaluate: vm => {
		if (!isLinuxGuest(vm.guestOs)) return null;
		if (!atMost(vm.nics, 1) || !atMost(vm.diskGb, 100)) return null;
		if (countRefactorRiskSignals(vm) !== 0) return null;
		return {
			category: 'refactor_candidate',
			confidence: 'medium',
			ruleName: 'conservative-refactor',
			reason: 'Linux; low risk profile; single NIC; small disk; eligible for containerization',
		};
	},
};

const DEFAULT_DECISION: ClassificationResult = {
	category: 'keep',
	confidence: 'medium',
	ruleName: 'default-conservative',
	reason: 'Conservative default: keep on-premises',
};

export const defaultTier: CascadeTier = {
	ruleName: 'default-conservative',
	evaluate: () => DEFAULT_DECISION,
};

// Priority order. The first tier returning a decision wins.
export const CASCADE: readonly CascadeTier[] = [
	zombieTier,
	legacyOsTier,
	workloadComplexityTier,
	conservativeRefactorTier,
	defaultTier,
];

export const classifyVm = (vm: VmRecord): ClassificationResult => {
	for (const tier of CASCADE) {
		const decision = tier.evaluate(vm);
		if (decision) return decision;
	}
	return DEFAULT_DECISION;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const scalarText = (value: unknown) =>
	typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
		? String(value)
		: '';

const validateRule = (entry: unknown): RuleDescriptor => {
	const fields = isRecord(entry) ? entry : {};
	const name = scalarText(fields['name']) || '<unnamed>';
	const categoryField = fields['category'];
	const rawCategory = typeof categoryField === 'string' ? categoryField.toLowerCase() : '';
	const rawConfidence = scalarText(fields['confidence']).toLowerCase();
	const descriptionField = fields['description'];

	const category = CATEGORIES.find(value => value === rawCategory);
	if (!category) {
		throw new RuleCatalogError(
			`Rule '${name}' has invalid category '${rawCategory}'. Allowed: ${CATEGORIES.join(', ')}`,
		);
	}

	const confidence = CONFIDENCES.find(value => value === rawConfidence);
	if (!confidence) {
		throw new RuleCatalogError(
			`Rule '${name}' has invalid confidence '${rawConfidence}'. Allowed: ${CONFIDENCES.join(', ')}`,
		);
	}

	return typeof descriptionField === 'string'
		? {name, category, confidence, description: descriptionField}
		: {name, category, confidence};
};

/**
 * Builds a classifier from a parsed rule catalog. The catalog governs the
 * allowed vocabulary only; decisions always come from {@link CASCADE}.
 */
export const createClassifier = (catalog: readonly unknown[]): Classifier => {
	const rules = catalog.map(validateRule);
	return {
		rules,
		classify: classifyVm,
	};
};

export const loadClassifier = async (rulesPath: string) =>
	createClassifier(await loadRuleCatalog(rulesPath));
