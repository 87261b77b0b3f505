import {readPoweredOffDays} from '../core/signals.js';
import {CATEGORIES, type AnalysisRecord} from '../core/types.js';
import {summarize, topByScore} from './summary.js';

const TOP_LIMIT = 10;
const REASON_MAX = 60;

export const CASCADE_DESCRIPTION = [
	'1. **Zombie Detection**: VM poweredOff > 60 days → Retire',
	'2. **Legacy OS**: Windows 2008/2003, RHEL 6, CentOS 6 → Keep (on-premises)',
	'3. **Complexity**: Too many snapshots, multi-NIC, tools issues, large disk → Rehost',
	'4. **Refactor Candidate**: Linux + low risk + single NIC + small disk (very conservative)',
	'5. **Default**: Keep on-premises (conservative default)',
];

export const escapeCell = (value: string) =>
	value.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');

export const truncateReason = (reason: string) =>
	reason.length > REASON_MAX ? `${reason.slice(0, REASON_MAX - 3)}...` : reason;

const row = (cells: Array<string | number>) =>
	`| ${cells.map(cell => escapeCell(String(cell))).join(' | ')} |`;

export const findZombies = (records: readonly AnalysisRecord[]) =>
	records.flatMap(record => {
		if (record.powerState !== 'poweredOff' || record.category !== 'retire') return [];
		const days = readPoweredOffDays(record.tags);
		return days ? [{record, days}] : [];
	});

export const renderMarkdown = (records: readonly AnalysisRecord[]) => {
	const summary = summarize(records);
	const zombies = findZombies(records);
	const lines: string[] = [];

	lines.push('# VM Exit Intelligence: Migration Analysis', '');
	lines.push(`- Total VMs analyzed: **${summary.total}**`, '');

	lines.push('## Risk Level Breakdown', '');
	for (const level of ['High', 'Medium', 'Low'] as const) {
		lines.push(`- **${level}**: ${summary.levels[level]}`);
	}

	lines.push('', '## Migration Category Breakdown', '');
	const presentCategories = [...CATEGORIES]
		.filter(category => summary.categories[category] > 0)
		.sort();
	for (const category of presentCategories) {
		lines.push(`- **${category}**: ${summary.categories[category]}`);
	}

	lines.push('', '## Top 10 Highest-Risk & Action Items', '');
	lines.push('| vm_id | name | risk | level | category | decision_reason |');
	lines.push('|---|---|---:|---|---|---|');
	for (const record of topByScore(records, TOP_LIMIT)) {
		lines.push(
			row([
				record.vmId,
				record.name,
				record.riskScore,
				record.riskLevel,
				record.category,
				truncateReason(record.reasons[0] ?? 'Unknown'),
			]),
		);
	}

	lines.push('', '## Retire (Zombie/Decommission) VMs', '');
	if (zombies.length > 0) {
		lines.push('| vm_id | name | powered_off_days | category | risk_score | action |');
		lines.push('|---|---|---:|---|---:|---|');
		for (const {record, days} of zombies) {
			lines.push(
				row([record.vmId, record.name, String(days), record.category, record.riskScore, 'Decommission']),
			);
		}
	} else {
		lines.push('No zombie VMs detected (powered_off > 60 days).');
	}

	lines.push('', '## Rules Applied', '');
	lines.push('Classification applies these rules in priority order:', '');
	lines.push(...CASCADE_DESCRIPTION);

	return `${lines.join('\n')}\n`;
};
