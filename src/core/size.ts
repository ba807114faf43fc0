import fs from 'node:fs/promises';
import type {Dirent, Stats} from 'node:fs';
import path from 'node:path';
import type {PathStats} from './types.js';

const EMPTY_STATS: PathStats = {
	size: 0,
	fileCount: 0,
	isDirectory: false,
};

const toErrorMessage = (error: unknown): string =>
	String(error instanceof Error ? error.message : error);

export const getPathStats = async (targetPath: string): Promise<PathStats> => {
	let stat: Stats;
	try {
		stat = await fs.lstat(targetPath);
	} catch (error) {
		return {...EMPTY_STATS, error: toErrorMessage(error)};
	}

	if (!stat.isDirectory()) {
		return {size: stat.size, fileCount: 1, isDirectory: false};
	}

	let entries: Dirent[];
	try {
		entries = await fs.readdir(targetPath, {withFileTypes: true});
	} catch (error) {
		return {
			size: 0,
			fileCount: 0,
			isDirectory: true,
			error: toErrorMessage(error),
		};
	}

	const nestedStats = await Promise.all(
		entries.map(async entry => getPathStats(path.join(targetPath, entry.name))),
	);

	let size = 0;
	let fileCount = 0;
	for (const nested of nestedStats) {
		size += nested.size;
		fileCount += nested.fileCount;
	}

	return {size, fileCount, isDirectory: true};
};

/**
 * Sums the size below every path. A path that sits inside another listed
 * directory is measured again on its own, so its bytes count twice.
 */
export const measureTotalSize = async (
	paths: Iterable<string>,
): Promise<number> => {
	let total = 0;
	for (const targetPath of paths) {
		const stats = await getPathStats(targetPath);
		total += stats.size;
	}
	return total;
};
