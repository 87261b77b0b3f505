import type {AnalysisRecord} from '../core/types.js';

// Key names are the interchange format shared with the CSV header and downstream consumers.
export type WireRecord = {
	vm_id: string;
	name: string;
	power_state: string;
	category: string;
	confidence: string;
	risk_score: number;
	risk_level: string;
	reasons: string[];
	trace: string[];
	tags: string[];
	rule_name: string;
};

export const toWireRecord = (record: AnalysisRecord): WireRecord => ({
	vm_id: record.vmId,
	name: record.name,
	power_state: record.powerState,
	category: record.category,
	confidence: record.confidence,
	risk_score: record.riskScore,
	risk_level: record.riskLevel,
	reasons: [...record.reasons],
	trace: [...record.trace],
	tags: [...record.tags],
	rule_name: record.ruleName,
});

export const renderJson = (records: readonly AnalysisRecord[]) =>
	JSON.stringify(records.map(toWireRecord), null, 2);
