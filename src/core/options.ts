import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {DEFAULT_MAX_DISPLAY, DEFAULT_PREVIEW_LIMIT} from './config.js';
import {parseSize} from './filters.js';
import type {RunOptions, SweepConfig, TypeFilter} from './types.js';

export interface RunFlags {
	dryRun?: boolean;
	force?: boolean;
	ignoreCase?: boolean;
	type?: string;
	all?: boolean;
	showSize?: boolean;
	olderThan?: number;
	largerThan?: string;
	emptyDirs?: boolean;
	maxDisplay?: number;
}

export interface RunTarget {
	pattern: string;
	root: string;
}

export const parseTypeFilter = (
	value: string | undefined,
): TypeFilter | undefined => {
	if (value === undefined || value === '') return undefined;
	if (value === 'f') return 'file';
	if (value === 'd') return 'directory';
	throw new Error(
		`Invalid type '${value}'. Use 'f' for files or 'd' for directories`,
	);
};

const parseNonNegativeInteger = (
	flag: string,
	value: number | undefined,
): number | undefined => {
	if (value === undefined) return undefined;
	if (!Number.isInteger(value) || value < 0) {
		throw new Error(`${flag} must be a non-negative integer.`);
	}
	return value;
};

/** Builds the frozen options value every pipeline stage receives. */
export const resolveRunOptions = (
	target: RunTarget,
	flags: RunFlags,
	config: Pick<SweepConfig, 'maxDisplay'> = {},
): RunOptions => {
	const largerThan = flags.largerThan?.trim() ? flags.largerThan.trim() : undefined;
	const options: RunOptions = {
		pattern: target.pattern,
		root: path.resolve(target.root),
		dryRun: Boolean(flags.dryRun),
		force: Boolean(flags.force),
		ignoreCase: Boolean(flags.ignoreCase),
		typeFilter: parseTypeFilter(flags.type),
		autoExclude: !flags.all,
		showSize: Boolean(flags.showSize),
		olderThanDays: parseNonNegativeInteger('--older-than', flags.olderThan),
		largerThan,
		largerThanBytes: largerThan === undefined ? undefined : parseSize(largerThan),
		emptyDirs: Boolean(flags.emptyDirs),
		maxDisplay:
			parseNonNegativeInteger('--max-display', flags.maxDisplay) ??
			config.maxDisplay ??
			DEFAULT_MAX_DISPLAY,
		previewLimit: DEFAULT_PREVIEW_LIMIT,
	};

	return Object.freeze(options);
};

const ENV_REFERENCE = /\$\{([A-Za-z_]\w*)\}|\$([A-Za-z_]\w*)|%([A-Za-z_]\w*)%/g;

export interface PathExpansionContext {
	home?: string;
	env?: NodeJS.ProcessEnv;
}

/** Expands a leading `~` and `$VAR`, `${VAR}` or `%VAR%` references. */
export const expandUserPath = (
	input: string,
	{home = os.homedir(), env = process.env}: PathExpansionContext = {},
): string => {
	let expanded = input.trim();
	if (expanded === '~' || expanded.startsWith('~/') || expanded.startsWith('~\\')) {
		expanded = `${home}${expanded.slice(1)}`;
	}

	return expanded.replaceAll(
		ENV_REFERENCE,
		(_match, braced?: string, bare?: string, percent?: string) =>
			env[braced ?? bare ?? percent ?? ''] ?? '',
	);
};

export const assertDirectory = async (
	directory: string,
	label = directory,
): Promise<string> => {
	const resolved = path.resolve(directory);
	const stat = await fs.stat(resolved).catch(() => null);
	if (stat?.isDirectory()) return resolved;

	throw new Error(`Directory '${label}' does not exist`);
};

export const resolveSearchRoot = async (
	input: string,
	cwd: string,
	context: PathExpansionContext = {},
): Promise<string> => {
	const trimmed = input.trim();
	if (!trimmed) return assertDirectory(cwd);

	const expanded = expandUserPath(trimmed, context);
	return assertDirectory(path.resolve(cwd, expanded), expanded);
};

export const assertPattern = (pattern: string): string => {
	const trimmed = pattern.trim();
	if (!trimmed) throw new Error('Pattern cannot be empty');
	return trimmed;
};
