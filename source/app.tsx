import React, {useEffect} from 'react';
import {Box, Text, useApp, useInput, useStdout} from 'ink';
import {runAnalysis} from './core/analyze.js';
import {describeError} from './core/errors.js';
import type {Logger} from './core/logger.js';
import {useStore} from './store/useStore.js';
import {Header} from './ui/Header.js';
import {VmList} from './ui/VmList.js';
import {VmDetails} from './ui/VmDetails.js';
import {FooterStatus} from './ui/FooterStatus.js';

export type AppProps = {
	inputs: string[];
	rulesPath: string;
	outDir: string;
	logger: Logger;
};

export default function App({inputs, rulesPath, outDir, logger}: AppProps) {
	const {exit} = useApp();
	const {stdout} = useStdout();

	const entries = useStore(state => state.entries);
	const visible = useStore(state => state.visible);
	const cursorIndex = useStore(state => state.cursorIndex);
	const isLoading = useStore(state => state.isLoading);
	const error = useStore(state => state.error);
	const statusMessage = useStore(state => state.statusMessage);
	const reportDir = useStore(state => state.reportDir);
	const showDetails = useStore(state => state.showDetails);
	const filterMode = useStore(state => state.filterMode);
	const filterText = useStore(state => state.filterText);
	const categoryFilter = useStore(state => state.categoryFilter);
	const sortKey = useStore(state => state.sortKey);
	const sortDirection = useStore(state => state.sortDirection);

	const setEntries = useStore(state => state.setEntries);
	const setLoading = useStore(state => state.setLoading);
	const setError = useStore(state => state.setError);
	const setStatus = useStore(state => state.setStatus);
	const setReportDir = useStore(state => state.setReportDir);
	const moveCursor = useStore(state => state.moveCursor);
	const toggleDetails = useStore(state => state.toggleDetails);
	const startFilter = useStore(state => state.startFilter);
	const stopFilter = useStore(state => state.stopFilter);
	const updateFilterText = useStore(state => state.updateFilterText);
	const clearFilter = useStore(state => state.clearFilter);
	const cycleSort = useStore(state => state.cycleSort);
	const toggleSortDirection = useStore(state => state.toggleSortDirection);
	const cycleCategory = useStore(state => state.cycleCategory);

	const selected = visible[cursorIndex];
	const columns = stdout?.columns ?? 120;
	const rows = stdout?.rows ?? 40;
	const listWidth = showDetails
		? Math.min(columns, Math.max(60, Math.floor(columns * 0.55)))
		: columns;

	useEffect(() => {
		let active = true;

		const load = async () => {
			setLoading(true);
			setError(null);
			setStatus(null);

			try {
				const outcome = await runAnalysis({inputs, rulesPath, outDir, logger});
				if (active) {
					setEntries(outcome.vms);
					setReportDir(outcome.reports.directory);
				}
			} catch (error: unknown) {
				logger.error({err: error}, 'Analysis failed');
				if (active) {
					setError(describeError(error));
				}
			} finally {
				if (active) {
					setLoading(false);
				}
			}
		};

		void load();

		return () => {
			active = false;
		};
	}, [inputs, rulesPath, outDir, logger, setEntries, setLoading, setError, setStatus, setReportDir]);

	useInput((input, key) => {
		if (filterMode) {
			if (key.escape) {
				clearFilter();
				setStatus('Filter cleared.');
				return;
			}

			if (key.return) {
				stopFilter();
				return;
			}

			if (key.backspace || key.delete) {
				updateFilterText(filterText.slice(0, -1));
				return;
			}

			if (input && input.length === 1) {
				updateFilterText(`${filterText}${input}`.slice(0, 64));
			}

			return;
		}

		if (key.tab) {
			toggleDetails();
			return;
		}

		if (key.upArrow) {
			moveCursor(-1);
			return;
		}

		if (key.downArrow) {
			moveCursor(1);
			return;
		}

		if (key.pageUp) {
			moveCursor(-10);
			return;
		}

		if (key.pageDown) {
			moveCursor(10);
			return;
		}

		if (input === '/') {
			startFilter();
			return;
		}

		const command = input.toLowerCase();

		if (command === 's') {
			cycleSort();
			setStatus('Sort updated.');
			return;
		}

		if (command === 'r') {
			toggleSortDirection();
			setStatus('Sort order toggled.');
			return;
		}

		if (command === 'c') {
			cycleCategory();
			setStatus('Category filter updated.');
			return;
		}

		if (command === 'q') {
			exit();
		}
	});

	if (isLoading) {
		return (
			<Box flexDirection="column">
				<Header />
				<Text color="#6B7280">Analyzing inventory...</Text>
			</Box>
		);
	}

	if (error) {
		return (
			<Box flexDirection="column">
				<Header />
				<Text color="#FF7A00">{error}</Text>
				<Text color="#6B7280">Press Q to quit.</Text>
			</Box>
		);
	}

	return (
		<Box flexDirection="column">
			<Header vmCount={entries.length} />
			<Box flexDirection="row">
				<Box width={listWidth} flexDirection="column">
					<VmList entries={visible} cursorIndex={cursorIndex} maxRows={Math.max(5, rows - 14)} />
				</Box>
				{showDetails ? (
					<Box flexGrow={1} flexDirection="column">
						<VmDetails entry={selected} />
					</Box>
				) : null}
			</Box>
			<FooterStatus
				entries={entries}
				visibleCount={visible.length}
				statusMessage={statusMessage}
				reportDir={reportDir}
				filterMode={filterMode}
				filterText={filterText}
				categoryFilter={categoryFilter}
				sortKey={sortKey}
				sortDirection={sortDirection}
			/>
		</Box>
	);
}
