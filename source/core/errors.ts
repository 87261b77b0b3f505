export type VmxErrorCode = 'RULE_CATALOG' | 'INVENTORY' | 'CONFIG';

export class VmxError extends Error {
	readonly code: VmxErrorCode;

	constructor(code: VmxErrorCode, message: string, options?: {cause?: unknown}) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Fatal at engine construction: the catalog is unusable or breaks the vocabularies. */
export class RuleCatalogError extends VmxError {
	constructor(message: string, options?: {cause?: unknown}) {
		super('RULE_CATALOG', message, options);
	}
}

export class InventoryError extends VmxError {
	constructor(message: string, options?: {cause?: unknown}) {
		super('INVENTORY', message, options);
	}
}

export class ConfigError extends VmxError {
	constructor(message: string, options?: {cause?: unknown}) {
		super('CONFIG', message, options);
	}
}

export const describeError = (error: unknown) =>
	error instanceof Error ? error.message : 'Unknown error';
