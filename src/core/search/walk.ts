import fs from 'node:fs/promises';
import type {Dirent, Stats} from 'node:fs';
import path from 'node:path';
import {
	createAgeCutoff,
	isAgeFilterActive,
	passesAgeFilter,
	passesSizeFilter,
} from '../filters.js';
import {matchGlob} from '../patterns.js';
import {isAutoExcluded, type PathClassifier} from '../safety.js';
import type {SearchOptions, SearchResult} from '../types.js';
import type {Searcher} from './searcher.js';

export interface WalkSearcherOptions {
	classifier: PathClassifier;
	autoExcludePatterns: readonly string[];
	now?: () => number;
}

const readSortedEntries = async (directory: string): Promise<Dirent[] | null> => {
	try {
		const entries = await fs.readdir(directory, {withFileTypes: true});
		return entries.sort((left, right) =>
			left.name < right.name ? -1 : left.name > right.name ? 1 : 0,
		);
	} catch {
		return null;
	}
};

/**
 * In-process search: a pre-order walk in lexical order that never follows
 * symbolic links and skips directories it cannot read.
 */
export const createWalkSearcher = ({
	classifier,
	autoExcludePatterns,
	now = Date.now,
}: WalkSearcherOptions): Searcher => {
	const isExcluded = (
		root: string,
		entryPath: string,
		options: SearchOptions,
	): boolean =>
		options.autoExclude &&
		isAutoExcluded(path.relative(root, entryPath), autoExcludePatterns);

	const toResult = async (
		entryPath: string,
		isDirectory: boolean,
		filters: {cutoff: Date | undefined; threshold: number | undefined},
	): Promise<SearchResult | null> => {
		let stat: Stats;
		try {
			stat = await fs.lstat(entryPath);
		} catch {
			return null;
		}

		if (!passesAgeFilter(stat.mtime, filters.cutoff)) return null;
		if (!passesSizeFilter({isDirectory, size: stat.size}, filters.threshold)) {
			return null;
		}

		return {
			path: entryPath,
			category: classifier.classify(entryPath),
			isDirectory,
			...(isDirectory ? {} : {size: stat.size}),
		};
	};

	const walkMatches = async function* (
		root: string,
		directory: string,
		options: SearchOptions,
		cutoff: Date | undefined,
	): AsyncGenerator<SearchResult> {
		const entries = await readSortedEntries(directory);
		if (!entries) return;

		for (const entry of entries) {
			const entryPath = path.join(directory, entry.name);
			const isDirectory = entry.isDirectory();

			if (options.typeFilter === 'directory' && !isDirectory) continue;

			if (isExcluded(root, entryPath, options)) continue;

			const typeMatches = options.typeFilter !== 'file' || !isDirectory;
			const nameMatches =
				!options.pattern ||
				matchGlob(entry.name, options.pattern, {
					ignoreCase: options.ignoreCase,
				});

			if (typeMatches && nameMatches) {
				const result = await toResult(entryPath, isDirectory, {
					cutoff,
					threshold: options.largerThanBytes,
				});
				if (result) yield result;
			}

			if (isDirectory) {
				yield* walkMatches(root, entryPath, options, cutoff);
			}
		}
	};

	const walkEmptyDirectories = async function* (
		root: string,
		directory: string,
		options: SearchOptions,
		knownEntries?: Dirent[],
	): AsyncGenerator<SearchResult> {
		const entries = knownEntries ?? (await readSortedEntries(directory));
		if (!entries) return;

		for (const entry of entries) {
			if (!entry.isDirectory()) continue;

			const entryPath = path.join(directory, entry.name);
			if (isExcluded(root, entryPath, options)) continue;

			const children = await readSortedEntries(entryPath);
			if (!children) continue;

			if (children.length === 0) {
				yield {
					path: entryPath,
					category: classifier.classify(entryPath),
					isDirectory: true,
				};
				continue;
			}

			yield* walkEmptyDirectories(root, entryPath, options, children);
		}
	};

	return {
		method: 'walk',
		search(options) {
			const root = path.resolve(options.root);
			if (options.emptyDirs) return walkEmptyDirectories(root, root, options);

			const cutoff = isAgeFilterActive(options.olderThanDays)
				? createAgeCutoff(options.olderThanDays, now())
				: undefined;
			return walkMatches(root, root, options, cutoff);
		},
	};
};
