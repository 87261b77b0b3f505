import fs from 'node:fs/promises';
import {load} from 'js-yaml';
import {RuleCatalogError, describeError} from './errors.js';

/**
 * Parses a YAML (or JSON) rule list. Only the list shape is checked here;
 * descriptor vocabularies are validated when the classifier is built.
 */
export const loadRuleCatalog = async (filePath: string): Promise<unknown[]> => {
	let raw: string;
	try {
		raw = await fs.readFile(filePath, 'utf8');
	} catch (error: unknown) {
		throw new RuleCatalogError(`Unable to read rules file ${filePath}: ${describeError(error)}`, {
			cause: error,
		});
	}

	let data: unknown;
	try {
		data = load(raw, {filename: filePath});
	} catch (error: unknown) {
		throw new RuleCatalogError(`Rules file ${filePath} is not valid YAML/JSON: ${describeError(error)}`, {
			cause: error,
		});
	}

	if (!Array.isArray(data)) {
		throw new RuleCatalogError('Rules file must be a YAML/JSON list of rules');
	}

	return data;
};
