import {
	execFile,
	spawn,
	type ChildProcessByStdio,
} from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import {createInterface} from 'node:readline';
import type {Readable} from 'node:stream';
import {promisify} from 'node:util';
import {isAgeFilterActive} from '../filters.js';
import type {Logger} from '../logger.js';
import type {PathClassifier} from '../safety.js';
import type {SearchOptions, SearchResult} from '../types.js';
import {SearchToolError, type Searcher} from './searcher.js';

const execFileAsync = promisify(execFile);

/** `fdfind` is the executable name Debian and Ubuntu ship. */
export const FD_COMMANDS = ['fd', 'fdfind'] as const;

export type CommandProbe = (command: string) => Promise<boolean>;

const probeVersion: CommandProbe = async command => {
	try {
		await execFileAsync(command, ['--version'], {windowsHide: true});
		return true;
	} catch {
		return false;
	}
};

export const findFdCommand = async (
	probe: CommandProbe = probeVersion,
	candidates: readonly string[] = FD_COMMANDS,
): Promise<string | null> => {
	for (const command of candidates) {
		if (await probe(command)) return command;
	}
	return null;
};

/**
 * fd matches exclude globs case-sensitively; the walk compares lower-cased
 * paths. Letters outside bracket expressions become `[xX]` classes so both
 * strategies prune the same directories.
 */
export const anyCaseGlob = (pattern: string): string => {
	let result = '';
	let inBrackets = false;
	for (const character of pattern) {
		if (inBrackets) {
			if (character === ']') inBrackets = false;
			result += character;
			continue;
		}
		if (character === '[') {
			inBrackets = true;
			result += character;
			continue;
		}
		const lower = character.toLowerCase();
		const upper = character.toUpperCase();
		result += lower === upper ? character : `[${lower}${upper}]`;
	}
	return result;
};

export const buildFdArgs = (
	options: SearchOptions,
	autoExcludePatterns: readonly string[],
): string[] => {
	const args = ['--color', 'never', '--hidden', '--no-ignore'];

	if (options.typeFilter === 'file') args.push('-t', 'f');
	if (options.typeFilter === 'directory') args.push('-t', 'd');

	args.push(options.ignoreCase ? '-i' : '-s');

	if (isAgeFilterActive(options.olderThanDays)) {
		args.push('--changed-before', `${options.olderThanDays}d`);
	}

	// fd's "+" bound is inclusive; the search contract is strictly larger.
	if (options.largerThanBytes !== undefined) {
		args.push('-S', `+${options.largerThanBytes + 1}b`);
	}

	if (options.autoExclude) {
		for (const pattern of autoExcludePatterns) {
			args.push('-E', `*${anyCaseGlob(pattern.trim())}*`);
		}
	}

	args.push('--glob', '--', options.pattern || '*', path.resolve(options.root));

	return args;
};

export async function* readPathLines(stream: Readable): AsyncGenerator<string> {
	const lines = createInterface({input: stream, crlfDelay: Number.POSITIVE_INFINITY});
	for await (const line of lines) {
		const trimmed = line.trim();
		if (trimmed) yield trimmed;
	}
}

export type SpawnSearchProcess = (
	command: string,
	args: readonly string[],
) => ChildProcessByStdio<null, Readable, Readable>;

const spawnSearchProcess: SpawnSearchProcess = (command, args) =>
	spawn(command, args, {
		stdio: ['ignore', 'pipe', 'pipe'],
		windowsHide: true,
	});

export interface FdSearcherOptions {
	command: string;
	classifier: PathClassifier;
	autoExcludePatterns: readonly string[];
	logger?: Logger;
	spawnProcess?: SpawnSearchProcess;
}

/** Delegates the search to `fd` and classifies each path it prints. */
export const createFdSearcher = ({
	command,
	classifier,
	autoExcludePatterns,
	logger,
	spawnProcess = spawnSearchProcess,
}: FdSearcherOptions): Searcher => {
	const toResult = async (line: string): Promise<SearchResult> => {
		const resultPath = path.resolve(line);
		let isDirectory = false;
		let size: number | undefined;
		try {
			const stat = await fs.stat(resultPath);
			isDirectory = stat.isDirectory();
			if (!isDirectory) size = stat.size;
		} catch (error) {
			logger?.debug('could not stat search result', {
				path: resultPath,
				reason: error instanceof Error ? error.message : String(error),
			});
		}

		return {
			path: resultPath,
			category: classifier.classify(resultPath),
			isDirectory,
			...(size === undefined ? {} : {size}),
		};
	};

	const search = async function* (
		options: SearchOptions,
	): AsyncGenerator<SearchResult> {
		const args = buildFdArgs(options, autoExcludePatterns);
		logger?.debug('spawning search tool', {command, args});

		const child = spawnProcess(command, args);

		let spawnError: Error | undefined;
		let stderr = '';
		child.stderr.setEncoding('utf8');
		child.stderr.on('data', (chunk: string) => {
			stderr += chunk;
		});
		const exited = new Promise<number | null>(resolve => {
			child.once('error', error => {
				spawnError = error;
				resolve(null);
			});
			child.once('close', code => {
				resolve(code);
			});
		});

		let count = 0;
		try {
			for await (const line of readPathLines(child.stdout)) {
				count++;
				yield await toResult(line);
			}
		} finally {
			if (child.exitCode === null && !child.killed) child.kill();
		}

		const exitCode = await exited;
		if (spawnError) {
			throw new SearchToolError(
				`${command} could not be started: ${spawnError.message}`,
				{cause: spawnError},
			);
		}

		if (exitCode !== 0) {
			const message = `${command} exited with code ${String(exitCode)}${stderr ? `: ${stderr.trim()}` : ''}`;
			if (count === 0) throw new SearchToolError(message);
			logger?.warn('search tool exited with an error after output', {
				command,
				exitCode,
				results: count,
			});
		}
	};

	return {method: 'fd', search};
};
