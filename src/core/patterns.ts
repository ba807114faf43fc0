import {minimatch} from 'minimatch';

const WILDCARD_PATTERN = /[*?[]/;

export const hasWildcard = (pattern: string): boolean =>
	WILDCARD_PATTERN.test(pattern);

export const toPosixPath = (value: string): string =>
	value.replaceAll('\\', '/');

const LONE_STAR = /(?<!\*)\*(?!\*)/g;

/**
 * Rewrites every lone `*` so it may also cross directory separators, the way
 * shell `[[ == ]]` patterns behave on whole paths. `**` is left as is.
 */
export const spanSeparators = (pattern: string): string =>
	pattern.replace(LONE_STAR, '{*,*/**/*}');

export interface GlobMatchOptions {
	ignoreCase?: boolean;
	matchBase?: boolean;
}

/**
 * Glob match with leading dots treated like any other character, so `*.log`
 * also matches `.hidden.log`. Windows separators in either side are compared
 * as forward slashes.
 */
export const matchGlob = (
	value: string,
	pattern: string,
	{ignoreCase = false, matchBase = false}: GlobMatchOptions = {},
): boolean =>
	minimatch(toPosixPath(value), toPosixPath(pattern), {
		dot: true,
		nocase: ignoreCase,
		matchBase,
		nocomment: true,
		nonegate: true,
	});
