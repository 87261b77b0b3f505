import fs from 'node:fs/promises';
import path from 'node:path';
import type {AnalysisRecord} from '../core/types.js';
import {renderCsv} from './csv.js';
import {renderJson} from './json.js';
import {renderMarkdown} from './markdown.js';

export type ReportPaths = {
	directory: string;
	json: string;
	csv: string;
	markdown: string;
};

export const writeReports = async (
	outDir: string,
	records: readonly AnalysisRecord[],
): Promise<ReportPaths> => {
	const directory = path.resolve(outDir);
	await fs.mkdir(directory, {recursive: true});

	const paths: ReportPaths = {
		directory,
		json: path.join(directory, 'classification.json'),
		csv: path.join(directory, 'summary.csv'),
		markdown: path.join(directory, 'report.md'),
	};

	await fs.writeFile(paths.json, renderJson(records), 'utf8');
	await fs.writeFile(paths.csv, renderCsv(records), 'utf8');
	await fs.writeFile(paths.markdown, renderMarkdown(records), 'utf8');

	return paths;
};
