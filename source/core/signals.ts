// Shared by the classification cascade, the risk scorer and the report renderers.

export const POWERED_OFF_DAYS_TAG = 'powered_off_days=';

export const LEGACY_OS_TOKENS = ['2008', '2003', 'rhel 6', 'centos 6'] as const;

export const LINUX_OS_TOKENS = ['linux', 'rhel', 'centos', 'ubuntu', 'debian'] as const;

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

const isComparable = (value: unknown): value is number =>
	typeof value === 'number' && !Number.isNaN(value);

/** `value > limit`, false for anything that is not a number. */
export const exceeds = (value: unknown, limit: number) =>
	isComparable(value) && value > limit;

/** `value <= limit`, false for anything that is not a number. */
export const atMost = (value: unknown, limit: number) =>
	isComparable(value) && value <= limit;

export const normalizeOs = (guestOs: unknown) =>
	typeof guestOs === 'string' ? guestOs.toLowerCase() : '';

export const findLegacyToken = (guestOs: unknown) => {
	const os = normalizeOs(guestOs);
	return LEGACY_OS_TOKENS.find(token => os.includes(token)) ?? null;
};

export const isLinuxGuest = (guestOs: unknown) => {
	const os = normalizeOs(guestOs);
	return LINUX_OS_TOKENS.some(token => os.includes(token));
};

/**
 * Reads the day count from the first `powered_off_days=` tag. Only that first
 * tag is considered; a malformed value yields null rather than falling through
 * to a later tag. Counts are bigints so no well-formed value loses precision.
 */
export const readPoweredOffDays = (tags: readonly string[]): bigint | null => {
	const tag = tags.find(entry => entry.startsWith(POWERED_OFF_DAYS_TAG));
	if (tag === undefined) return null;
	const raw = tag.slice(POWERED_OFF_DAYS_TAG.length);
	if (!INTEGER_PATTERN.test(raw)) return null;
	return BigInt(raw.trim());
};
