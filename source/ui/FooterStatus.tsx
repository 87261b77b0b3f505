import React from 'react';
import {Box, Text} from 'ink';
import type {AnalyzedVm, Category} from '../core/types.js';
import type {SortDirection, SortKey} from '../store/useStore.js';
import {summarize} from '../report/summary.js';

export type FooterStatusProps = {
	entries: AnalyzedVm[];
	visibleCount: number;
	statusMessage: string | null;
	reportDir: string | null;
	filterMode: boolean;
	filterText: string;
	categoryFilter: Category | null;
	sortKey: SortKey;
	sortDirection: SortDirection;
};

export const FooterStatus = ({
	entries,
	visibleCount,
	statusMessage,
	reportDir,
	filterMode,
	filterText,
	categoryFilter,
	sortKey,
	sortDirection,
}: FooterStatusProps) => {
	const {levels} = summarize(entries.map(entry => entry.result));

	return (
		<Box flexDirection="column" marginTop={1}>
			<Text color="#6B7280">
				High {levels.High} | Medium {levels.Medium} | Low {levels.Low} | Showing {visibleCount} of{' '}
				{entries.length}
			</Text>
			<Text color="#6B7280">
				Sort {sortKey} {sortDirection} | Category {categoryFilter ?? 'all'} | Filter{' '}
				{filterText || 'none'}
			</Text>
			{reportDir ? <Text color="#6B7280">Reports written to {reportDir}</Text> : null}
			{filterMode ? (
				<Text color="#FF7A00">Filter: {filterText} (Enter to apply, Esc to clear)</Text>
			) : (
				<Text color="#6B7280">
					Arrows move | Tab details | / filter | S sort | R reverse | C category | Q quit
				</Text>
			)}
			{statusMessage ? <Text color="#FF7A00">{statusMessage}</Text> : null}
		</Box>
	);
};
