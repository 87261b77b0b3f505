import {loadClassifier, type Classifier} from './classifier.js';
import {loadInventory} from './inventory.js';
import {silentLogger, type Logger} from './logger.js';
import {riskLevel, scoreVm} from './risk.js';
import type {AnalysisRecord, AnalyzedVm, RuleDescriptor, VmRecord} from './types.js';
import {summarize} from '../report/summary.js';
import {writeReports, type ReportPaths} from '../report/index.js';

export const analyzeVm = (vm: VmRecord, classifier: Classifier): AnalysisRecord => {
	const decision = classifier.classify(vm);
	const {score, trace} = scoreVm(vm);

	return {
		vmId: vm.vmId,
		name: vm.name,
		powerState: vm.powerState,
		category: decision.category,
		confidence: decision.confidence,
		riskScore: score,
		riskLevel: riskLevel(score),
		reasons: [decision.reason, ...trace],
		trace,
		tags: [...vm.tags],
		ruleName: decision.ruleName,
	};
};

/** Records are independent; output order always follows input order. */
export const analyzeInventory = (
	vms: readonly VmRecord[],
	classifier: Classifier,
): AnalyzedVm[] => vms.map(vm => ({...vm, result: analyzeVm(vm, classifier)}));

export type AnalysisOptions = {
	inputs: readonly string[];
	rulesPath: string;
	outDir: string;
	cwd?: string;
	logger?: Logger;
};

export type AnalysisOutcome = {
	rules: readonly RuleDescriptor[];
	inventoryFiles: string[];
	vms: AnalyzedVm[];
	records: AnalysisRecord[];
	reports: ReportPaths;
};

export const runAnalysis = async ({
	inputs,
	rulesPath,
	outDir,
	cwd,
	logger = silentLogger,
}: AnalysisOptions): Promise<AnalysisOutcome> => {
	logger.info({rulesPath}, 'Loading rules');
	const classifier = await loadClassifier(rulesPath);
	logger.info({rules: classifier.rules.length}, 'Rule catalog validated');

	logger.info({inputs}, 'Loading inventory');
	const inventory = await loadInventory(inputs, cwd);
	logger.info({files: inventory.files.length, records: inventory.vms.length}, 'Inventory loaded');

	const vms = analyzeInventory(inventory.vms, classifier);
	const records = vms.map(vm => vm.result);
	const summary = summarize(records);
	logger.debug({categories: summary.categories, levels: summary.levels}, 'Classification complete');

	const reports = await writeReports(outDir, records);
	logger.info({outDir: reports.directory}, 'Wrote outputs');

	return {
		rules: classifier.rules,
		inventoryFiles: inventory.files,
		vms,
		records,
		reports,
	};
};
