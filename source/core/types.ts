export const CATEGORIES = ['rehost', 'refactor_candidate', 'retire', 'keep'] as const;

export const CONFIDENCES = ['high', 'medium', 'low'] as const;

export const RISK_LEVELS = ['Low', 'Medium', 'High'] as const;

export type Category = (typeof CATEGORIES)[number];

export type Confidence = (typeof CONFIDENCES)[number];

export type RiskLevel = (typeof RISK_LEVELS)[number];

export type PowerState = 'poweredOn' | 'poweredOff';

export type ToolsStatus = 'running' | 'notRunning' | 'unknown';

export type VmRecord = Readonly<{
	vmId: string;
	name: string;
	powerState: PowerState;
	cpu: number;
	memoryMb: number;
	diskGb: number;
	guestOs: string;
	toolsStatus: ToolsStatus;
	nics: number;
	snapshotCount: number;
	maxSnapshotAgeDays: number;
	avgCpuUsagePct: number;
	avgMemUsagePct: number;
	uptimeDays: number;
	tags: readonly string[];
}>;

export type RuleDescriptor = Readonly<{
	name: string;
	category: Category;
	confidence: Confidence;
	description?: string;
}>;

export type ClassificationResult = Readonly<{
	category: Category;
	confidence: Confidence;
	ruleName: string;
	reason: string;
}>;

export type ScoreResult = Readonly<{
	score: number;
	trace: readonly string[];
}>;

export type AnalysisRecord = Readonly<{
	vmId: string;
	name: string;
	powerState: PowerState;
	category: Category;
	confidence: Confidence;
	riskScore: number;
	riskLevel: RiskLevel;
	reasons: readonly string[];
	trace: readonly string[];
	tags: readonly string[];
	ruleName: string;
}>;

export type AnalyzedVm = VmRecord & {
	result: AnalysisRecord;
};
