import type {AnalysisRecord, Category, RiskLevel} from '../core/types.js';

export type InventorySummary = {
	total: number;
	levels: Record<RiskLevel, number>;
	categories: Record<Category, number>;
};

export const summarize = (records: readonly AnalysisRecord[]): InventorySummary => {
	const levels: Record<RiskLevel, number> = {Low: 0, Medium: 0, High: 0};
	const categories: Record<Category, number> = {
		rehost: 0,
		refactor_candidate: 0,
		retire: 0,
		keep: 0,
	};

	for (const record of records) {
		levels[record.riskLevel] += 1;
		categories[record.category] += 1;
	}

	return {total: records.length, levels, categories};
};

/** Highest score first; ties keep input order. */
export const topByScore = (records: readonly AnalysisRecord[], limit: number) =>
	[...records].sort((a, b) => b.riskScore - a.riskScore).slice(0, limit);
