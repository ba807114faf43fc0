import path from 'node:path';
import {hasWildcard, matchGlob, toPosixPath} from './patterns.js';
import type {
	CategoryCounts,
	SafetyCategory,
	SafetyPathList,
	SearchResult,
} from './types.js';

export const POSIX_CRITICAL_PATHS: readonly string[] = [
	'/bin',
	'/sbin',
	'/usr/bin',
	'/usr/sbin',
	'/usr/lib',
	'/usr/lib64',
	'/lib',
	'/lib64',
	'/etc',
	'/boot',
	'/sys',
	'/proc',
	'/dev',
	'/root',
	'/var/lib/dpkg',
	'/var/lib/apt',
	'/usr/share',
];

export const DARWIN_CRITICAL_PATHS: readonly string[] = [
	'/System',
	'/Library',
	'/private/etc',
];

export const POSIX_WARNING_PATHS: readonly string[] = [
	'/opt',
	'/srv',
	'/var/log',
	'/var/www',
	'/var/cache',
];

export const WINDOWS_CRITICAL_PATHS: readonly string[] = [
	String.raw`C:\Windows`,
	String.raw`C:\Windows\System32`,
	String.raw`C:\Windows\SysWOW64`,
	String.raw`C:\Program Files`,
	String.raw`C:\Program Files (x86)`,
	String.raw`C:\ProgramData`,
	String.raw`C:\Users\Default`,
	String.raw`C:\Users\Public`,
	String.raw`C:\Recovery`,
	String.raw`C:\Boot`,
];

export const WINDOWS_WARNING_PATHS: readonly string[] = [
	String.raw`C:\Users`,
	String.raw`C:\Temp`,
];

export const DEFAULT_AUTO_EXCLUDE_PATTERNS: readonly string[] = [
	'node_modules',
	'.git',
	'.npm',
	'.cache',
	'.vscode',
	'.idea',
];

export interface SafetyPathSources {
	platform?: NodeJS.Platform;
	env?: NodeJS.ProcessEnv;
	extraCritical?: readonly string[];
	extraWarning?: readonly string[];
}

const nonEmpty = (values: ReadonlyArray<string | undefined>): string[] =>
	values.filter(
		(value): value is string =>
			typeof value === 'string' && value.trim().length > 0,
	);

export const createSafetyPathList = ({
	platform = process.platform,
	env = process.env,
	extraCritical = [],
	extraWarning = [],
}: SafetyPathSources = {}): SafetyPathList => {
	if (platform === 'win32') {
		return Object.freeze({
			critical: Object.freeze([
				...WINDOWS_CRITICAL_PATHS,
				...nonEmpty([env.SystemRoot, env.windir]),
				...nonEmpty(extraCritical),
			]),
			warning: Object.freeze([
				...WINDOWS_WARNING_PATHS,
				...nonEmpty([env.TEMP, env.TMP]),
				...nonEmpty(extraWarning),
			]),
		});
	}

	return Object.freeze({
		critical: Object.freeze([
			...POSIX_CRITICAL_PATHS,
			...(platform === 'darwin' ? DARWIN_CRITICAL_PATHS : []),
			...nonEmpty(extraCritical),
		]),
		warning: Object.freeze([...POSIX_WARNING_PATHS, ...nonEmpty(extraWarning)]),
	});
};

const isCaseInsensitivePlatform = (platform: NodeJS.Platform): boolean =>
	platform === 'win32' || platform === 'darwin';

export interface PathClassifierOptions {
	paths: SafetyPathList;
	platform?: NodeJS.Platform;
}

export interface PathClassifier {
	normalize(filePath: string): string;
	classify(filePath: string): SafetyCategory;
	/** The configured critical entry that flags `filePath`, if any. */
	matchCriticalPrefix(filePath: string): string | undefined;
}

/**
 * Tags paths with a safety tier by plain string-prefix matching on normalized
 * paths. Matching is not segment aware: a critical `/etc` also covers
 * `/etcetera`.
 */
export const createPathClassifier = ({
	paths,
	platform = process.platform,
}: PathClassifierOptions): PathClassifier => {
	const flavour = platform === 'win32' ? path.win32 : path.posix;
	const normalize = (filePath: string): string => {
		const resolved = flavour.resolve(filePath);
		return isCaseInsensitivePlatform(platform) ? resolved.toLowerCase() : resolved;
	};

	const critical = paths.critical.map(entry => normalize(entry));
	const warning = paths.warning.map(entry => normalize(entry));

	return {
		normalize,
		classify(filePath) {
			const normalized = normalize(filePath);
			if (critical.some(prefix => normalized.startsWith(prefix))) {
				return 'critical';
			}
			if (warning.some(prefix => normalized.startsWith(prefix))) {
				return 'warning';
			}
			return 'safe';
		},
		matchCriticalPrefix(filePath) {
			const normalized = normalize(filePath);
			return critical.find(prefix => normalized.startsWith(prefix));
		},
	};
};

export const isAutoExcluded = (
	relativePath: string,
	patterns: readonly string[],
): boolean => {
	const normalizedPath = toPosixPath(relativePath).toLowerCase();
	return patterns.some(pattern => {
		const normalizedPattern = pattern.trim().toLowerCase();
		if (!normalizedPattern) return false;
		if (hasWildcard(normalizedPattern)) {
			return matchGlob(normalizedPath, normalizedPattern, {
				matchBase: !normalizedPattern.includes('/'),
			});
		}
		return normalizedPath.includes(toPosixPath(normalizedPattern));
	});
};

export const countByCategory = (
	results: Iterable<Pick<SearchResult, 'category'>>,
): CategoryCounts => {
	const counts: CategoryCounts = {critical: 0, warning: 0, safe: 0};
	for (const result of results) {
		counts[result.category]++;
	}
	return counts;
};

export const filterOutCritical = <T extends Pick<SearchResult, 'category'>>(
	results: readonly T[],
): T[] => results.filter(result => result.category !== 'critical');

export const criticalBreakdown = (
	results: readonly SearchResult[],
	classifier: PathClassifier,
): Map<string, number> => {
	const counts = new Map<string, number>();
	for (const result of results) {
		if (result.category !== 'critical') continue;
		const prefix = classifier.matchCriticalPrefix(result.path);
		if (!prefix) continue;
		counts.set(prefix, (counts.get(prefix) ?? 0) + 1);
	}
	return counts;
};
