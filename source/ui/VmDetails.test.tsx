import React from 'react';
import {render} from 'ink-testing-library';
import {describe, expect, it} from 'vitest';
import {frameLines, makeEntry} from '../testing/entries.js';
import {VmDetails} from './VmDetails.js';

describe('VmDetails', () => {
	it('shows inventory facts, the decision and every reason', () => {
		const entry = makeEntry({
			vmId: 'vm-b',
			name: 'alpha',
			category: 'rehost',
			confidence: 'high',
			riskScore: 60,
			riskLevel: 'Medium',
			reasons: ['Multi-NIC configuration', 'nics>3:+10'],
		});
		const {lastFrame} = render(<VmDetails entry={entry} />);

		expect(frameLines(lastFrame())).toEqual([
			'VM details',
			'Id: vm-b',
			'Name: alpha',
			'Power: poweredOn',
			'Guest OS: RHEL 8',
			'Tools: running',
			'Disk: 750 GB',
			'NICs: 4',
			'Snapshots: 7 (oldest 45d)',
			'Uptime: 400d',
			'Tags: tier:db',
			'Decision: rehost (high) via workload-complexity',
			'Risk: Medium (60)',
			'Reasons',
			'- Multi-NIC configuration',
			'- nics>3:+10',
			'Risk levels',
			'High 70-100: legacy, stateful or heavily loaded',
			'Medium 30-69: plan the move carefully',
			'Low 0-29: few risk signals',
		]);
	});

	it('renders a placeholder without a selection', () => {
		const {lastFrame} = render(<VmDetails entry={undefined} />);

		expect(frameLines(lastFrame())).toEqual(['No selection']);
	});
});
