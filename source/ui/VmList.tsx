import React from 'react';
import {Box, Text} from 'ink';
import type {AnalyzedVm} from '../core/types.js';
import {categoryLabels, levelColors, safeTruncate} from './format.js';

const cursorBg = '#0047AB';
const cursorFg = '#FFFFFF';

export type VmListProps = {
	entries: AnalyzedVm[];
	cursorIndex: number;
	maxRows?: number;
};

// Keeps the cursor inside a window of `maxRows` entries.
export const visibleWindow = (length: number, cursorIndex: number, maxRows: number) => {
	if (length <= maxRows) return {start: 0, end: length};
	const start = Math.min(Math.max(0, cursorIndex - Math.floor(maxRows / 2)), length - maxRows);
	return {start, end: start + maxRows};
};

export const VmList = ({entries, cursorIndex, maxRows = 20}: VmListProps) => {
	if (entries.length === 0) {
		return <Text color="#6B7280">No VMs match the current view.</Text>;
	}

	const {start, end} = visibleWindow(entries.length, cursorIndex, maxRows);

	return (
		<Box flexDirection="column">
			<Text color="#6B7280">
				{'  '}
				{'Category'.padEnd(10)}
				{'Conf'.padEnd(7)}
				{'Score'.padEnd(6)}
				{'Level'.padEnd(7)}
				{'VM'.padEnd(16)}Name
			</Text>
			{entries.slice(start, end).map((entry, offset) => {
				const index = start + offset;
				const isCursor = index === cursorIndex;
				const {result} = entry;
				const rowColor = isCursor ? cursorFg : undefined;
				const rowBackground = isCursor ? cursorBg : undefined;

				return (
					<Box key={entry.vmId}>
						<Text color={rowColor} backgroundColor={rowBackground}>
							{isCursor ? '> ' : '  '}
							{categoryLabels[result.category].padEnd(10)}
							{result.confidence.padEnd(7)}
							{String(result.riskScore).padEnd(6)}
						</Text>
						<Text
							color={isCursor ? cursorFg : levelColors[result.riskLevel]}
							backgroundColor={rowBackground}
						>
							{result.riskLevel.padEnd(7)}
						</Text>
						<Text color={rowColor} backgroundColor={rowBackground}>
							{safeTruncate(entry.vmId, 15)} {safeTruncate(entry.name, 28)}
						</Text>
					</Box>
				);
			})}
		</Box>
	);
};
