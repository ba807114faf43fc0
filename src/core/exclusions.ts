import path from 'node:path';
import {hasWildcard, matchGlob, spanSeparators, toPosixPath} from './patterns.js';
import type {SearchResult} from './types.js';

export interface ExclusionPartition<T> {
	kept: T[];
	excluded: T[];
}

export const parseExclusionInput = (input: string): string[] =>
	input
		.split(',')
		.map(pattern => pattern.trim())
		.filter(pattern => pattern.length > 0);

const withoutLeadingSlash = (value: string): string =>
	toPosixPath(value).replace(/^\/+/, '');

const matchesFullPath = (filePath: string, pattern: string): boolean =>
	matchGlob(
		withoutLeadingSlash(filePath),
		spanSeparators(withoutLeadingSlash(pattern)),
	);

/**
 * Wildcard patterns are globbed against the base name first, then the full
 * path, where a lone `*` also crosses directory separators. Plain patterns
 * match as a case-insensitive substring of the full path.
 */
export const matchesExclusionPattern = (
	filePath: string,
	patterns: readonly string[],
): boolean => {
	for (const rawPattern of patterns) {
		const pattern = rawPattern.trim();
		if (!pattern) continue;

		if (hasWildcard(pattern)) {
			if (matchGlob(path.basename(filePath), pattern)) return true;
			if (matchesFullPath(filePath, pattern)) return true;
			continue;
		}

		if (filePath.toLowerCase().includes(pattern.toLowerCase())) return true;
	}

	return false;
};

export const partitionByExclusions = <T extends Pick<SearchResult, 'path'>>(
	results: readonly T[],
	patterns: readonly string[],
): ExclusionPartition<T> => {
	const kept: T[] = [];
	const excluded: T[] = [];
	for (const result of results) {
		if (matchesExclusionPattern(result.path, patterns)) {
			excluded.push(result);
		} else {
			kept.push(result);
		}
	}

	return {kept, excluded};
};
