import React from 'react';
import {Box, Text} from 'ink';
import {levelColors} from './format.js';

export const RiskLegend = () => (
	<Box flexDirection="column" marginTop={1}>
		<Text color="#0047AB">Risk levels</Text>
		<Text>
			<Text color={levelColors.High}>High</Text> 70-100: legacy, stateful or heavily loaded
		</Text>
		<Text>
			<Text color={levelColors.Medium}>Medium</Text> 30-69: plan the move carefully
		</Text>
		<Text>
			<Text color={levelColors.Low}>Low</Text> 0-29: few risk signals
		</Text>
	</Box>
);
