import type {RiskLevel, ScoreResult, VmRecord} from './types.js';
import {exceeds, findLegacyToken} from './signals.js';

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export const riskLevel = (score: number): RiskLevel => {
	if (score <= 29) return 'Low';
	if (score <= 69) return 'Medium';
	return 'High';
};

/**
 * Additive triage score. Signals are independent of each other, so their
 * order only shapes the trace.
 */
export const scoreVm = (vm: VmRecord): ScoreResult => {
	let score = 0;
	const trace: string[] = [];

	if (exceeds(vm.snapshotCount, 5)) {
		score += 20;
		trace.push('snapshot_count>5:+20');
	}

	if (exceeds(vm.maxSnapshotAgeDays, 30)) {
		score += 15;
		trace.push('max_snapshot_age_days>30:+15');
	}

	if (findLegacyToken(vm.guestOs)) {
		score += 25;
		trace.push('guest_os_legacy:+25');
	}

	if (vm.toolsStatus !== 'running') {
		score += 10;
		trace.push('tools_status_not_running:+10');
	}

	if (exceeds(vm.nics, 3)) {
		score += 10;
		trace.push('nics>3:+10');
	}

	if (exceeds(vm.avgCpuUsagePct, 80) || exceeds(vm.avgMemUsagePct, 80)) {
		score += 15;
		trace.push('high_avg_usage:+15');
	}

	if (exceeds(vm.uptimeDays, 365)) {
		score += 10;
		trace.push('uptime_days>365:+10');
	}

	return {
		score: Math.trunc(clamp(score, 0, 100)),
		trace,
	};
};
