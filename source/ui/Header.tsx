import React from 'react';
import {Box, Text} from 'ink';
import chalk from 'chalk';
import gradient from 'gradient-string';

export type HeaderProps = {
	vmCount?: number;
};

export const headerSubtitle = (vmCount?: number) =>
	vmCount === undefined
		? 'Migration Triage - Read-only Analysis'
		: `Migration Triage - ${vmCount} VM${vmCount === 1 ? '' : 's'} analyzed (read-only)`;

export const Header = ({vmCount}: HeaderProps) => {
	const title = gradient('cyan', 'blue')('VMX Agent');
	return (
		<Box flexDirection="column" marginBottom={1}>
			<Text>{title}</Text>
			<Text>{chalk.hex('#0047AB')(headerSubtitle(vmCount))}</Text>
		</Box>
	);
};
