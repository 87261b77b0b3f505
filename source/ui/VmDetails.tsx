import React from 'react';
import {Box, Text} from 'ink';
import type {AnalyzedVm} from '../core/types.js';
import {formatDays, formatGigabytes, levelColors} from './format.js';
import {RiskLegend} from './RiskLegend.js';

export type VmDetailsProps = {
	entry: AnalyzedVm | undefined;
};

const line = (label: string, value: string) => (
	<Text>
		<Text color="#6B7280">{label}</Text>
		<Text> {value}</Text>
	</Text>
);

export const VmDetails = ({entry}: VmDetailsProps) => {
	if (!entry) {
		return <Text color="#6B7280">No selection</Text>;
	}

	const {result} = entry;

	return (
		<Box flexDirection="column" paddingLeft={2}>
			<Text color="#0047AB">VM details</Text>
			{line('Id:', entry.vmId)}
			{line('Name:', entry.name)}
			{line('Power:', entry.powerState)}
			{line('Guest OS:', entry.guestOs || 'unknown')}
			{line('Tools:', entry.toolsStatus)}
			{line('Disk:', formatGigabytes(entry.diskGb))}
			{line('NICs:', String(entry.nics))}
			{line('Snapshots:', `${entry.snapshotCount} (oldest ${formatDays(entry.maxSnapshotAgeDays)})`)}
			{line('Uptime:', formatDays(entry.uptimeDays))}
			{line('Tags:', entry.tags.length > 0 ? entry.tags.join(', ') : 'none')}
			{line('Decision:', `${result.category} (${result.confidence}) via ${result.ruleName}`)}
			<Text>
				<Text color="#6B7280">Risk:</Text>{' '}
				<Text color={levelColors[result.riskLevel]}>
					{result.riskLevel} ({result.riskScore})
				</Text>
			</Text>
			<Box flexDirection="column" marginTop={1}>
				<Text color="#6B7280">Reasons</Text>
				{result.reasons.map(reason => (
					<Text key={reason}>- {reason}</Text>
				))}
			</Box>
			<RiskLegend />
		</Box>
	);
};
