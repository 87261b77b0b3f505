import type {Category, RiskLevel} from '../core/types.js';

export const levelColors: Record<RiskLevel, string> = {
	High: '#FF7A00',
	Medium: '#0047AB',
	Low: '#6B7280',
};

export const categoryLabels: Record<Category, string> = {
	rehost: 'Rehost',
	refactor_candidate: 'Refactor',
	retire: 'Retire',
	keep: 'Keep',
};

export const formatGigabytes = (gb: number) => {
	if (!Number.isFinite(gb) || gb <= 0) return '0 GB';
	if (gb >= 1024) {
		const tb = gb / 1024;
		return `${tb >= 10 ? Math.round(tb) : Math.round(tb * 10) / 10} TB`;
	}
	return `${gb >= 10 ? Math.round(gb) : Math.round(gb * 10) / 10} GB`;
};

export const formatDays = (days: number) =>
	Number.isFinite(days) ? `${Math.round(days)}d` : '--';

export const safeTruncate = (value: string, length: number) => {
	if (value.length <= length) return value.padEnd(length);
	return `${value.slice(0, Math.max(0, length - 3))}...`;
};
