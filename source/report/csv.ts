import type {AnalysisRecord} from '../core/types.js';

export const CSV_HEADERS = [
	'vm_id',
	'name',
	'category',
	'confidence',
	'risk_score',
	'risk_level',
] as const;

const NEEDS_QUOTING = /[",\r\n]/;

export const escapeCsvCell = (value: string) =>
	NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

const toRow = (record: AnalysisRecord) =>
	[
		record.vmId,
		record.name,
		record.category,
		record.confidence,
		String(record.riskScore),
		record.riskLevel,
	]
		.map(escapeCsvCell)
		.join(',');

/** RFC 4180 layout: CRLF after every row, the last one included. */
export const renderCsv = (records: readonly AnalysisRecord[]) =>
	[CSV_HEADERS.join(','), ...records.map(toRow)].map(row => `${row}\r\n`).join('');
