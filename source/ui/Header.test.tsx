import React from 'react';
import {render} from 'ink-testing-library';
import {describe, expect, it} from 'vitest';
import {frameLines} from '../testing/entries.js';
import {Header, headerSubtitle} from './Header.js';

describe('headerSubtitle', () => {
	it('stays generic until the inventory is loaded', () => {
		expect(headerSubtitle()).toBe('Migration Triage - Read-only Analysis');
	});

	it('counts analyzed VMs', () => {
		expect(headerSubtitle(1)).toBe('Migration Triage - 1 VM analyzed (read-only)');
		expect(headerSubtitle(12)).toBe('Migration Triage - 12 VMs analyzed (read-only)');
	});
});

describe('Header', () => {
	it('renders the title and the VM count', () => {
		const {lastFrame} = render(<Header vmCount={3} />);

		expect(frameLines(lastFrame())).toEqual([
			'VMX Agent',
			'Migration Triage - 3 VMs analyzed (read-only)',
		]);
	});
});
