const DAY_MS = 86_400_000;

const SIZE_MULTIPLIERS: Record<string, number> = {
	'': 1,
	B: 1,
	K: 1024,
	M: 1024 ** 2,
	G: 1024 ** 3,
};

const SIZE_PATTERN = /^(\d+)([BKMG]?)$/;

/** Parses `500`, `10K`, `100M`, `1G` (case-insensitive) into bytes. */
export const parseSize = (value: string): number => {
	const normalized = value.trim().toUpperCase();
	const match = SIZE_PATTERN.exec(normalized);
	if (!match?.[1]) {
		throw new Error(
			`Invalid size: "${value}". Expected a whole number with an optional K, M or G suffix (e.g. 500K, 10M, 1G)`,
		);
	}

	const multiplier = SIZE_MULTIPLIERS[match[2] ?? ''] ?? 1;
	const bytes = Number.parseInt(match[1], 10) * multiplier;
	if (!Number.isSafeInteger(bytes)) {
		throw new Error(`Invalid size: "${value}" is too large`);
	}

	return bytes;
};

/** `--older-than 0` disables the age filter in both search strategies. */
export const isAgeFilterActive = (days: number | undefined): days is number =>
	days !== undefined && days > 0;

export const createAgeCutoff = (days: number, now = Date.now()): Date =>
	new Date(now - days * DAY_MS);

export const passesAgeFilter = (
	mtime: Date,
	cutoff: Date | undefined,
): boolean => !cutoff || mtime.getTime() <= cutoff.getTime();

export const passesSizeFilter = (
	entry: {isDirectory: boolean; size: number},
	threshold: number | undefined,
): boolean =>
	threshold === undefined || entry.isDirectory || entry.size > threshold;
