import fs from 'node:fs/promises';
import type {DeleteResult, DeleteSummary, SearchResult} from './types.js';

export const pathExists = async (targetPath: string): Promise<boolean> => {
	try {
		await fs.lstat(targetPath);
		return true;
	} catch {
		return false;
	}
};

export const deletePath = async (targetPath: string): Promise<DeleteResult> => {
	try {
		await fs.rm(targetPath, {recursive: true, force: true});
		return {path: targetPath, ok: true};
	} catch (error) {
		return {path: targetPath, ok: false, error};
	}
};

export const summarizeDeletionResults = (
	results: readonly DeleteResult[],
	skippedCount = 0,
): DeleteSummary => {
	let deletedCount = 0;
	for (const result of results) {
		if (result.ok) deletedCount++;
	}

	return {
		results: [...results],
		deletedCount,
		failureCount: results.length - deletedCount,
		skippedCount,
	};
};

export interface DeleteResultsOptions {
	remove?: (targetPath: string) => Promise<DeleteResult>;
	exists?: (targetPath: string) => Promise<boolean>;
	onResult?: (result: DeleteResult) => void;
}

/**
 * Deletes one path after another. Paths that vanished since the search (for
 * example children of an already deleted directory) are skipped, not failed.
 */
export const deleteResults = async (
	items: readonly Pick<SearchResult, 'path'>[],
	{
		remove = deletePath,
		exists = pathExists,
		onResult,
	}: DeleteResultsOptions = {},
): Promise<DeleteSummary> => {
	const results: DeleteResult[] = [];
	let skippedCount = 0;
	for (const item of items) {
		if (!(await exists(item.path))) {
			skippedCount++;
			continue;
		}

		const result = await remove(item.path);
		results.push(result);
		onResult?.(result);
	}

	return summarizeDeletionResults(results, skippedCount);
};
