import type {Logger} from '../logger.js';
import type {PathClassifier} from '../safety.js';
import type {SearchOptions, SearchStrategy} from '../types.js';
import {createFdSearcher, findFdCommand, type CommandProbe} from './fd.js';
import {withFallback, type Searcher} from './searcher.js';
import {createWalkSearcher} from './walk.js';

export interface SelectSearcherOptions {
	classifier: PathClassifier;
	autoExcludePatterns: readonly string[];
	strategy?: SearchStrategy;
	logger?: Logger;
	probe?: CommandProbe;
}

/**
 * Picks the search implementation once per run. The delegated search is used
 * when `fd` answers a version probe; empty-directory searches always walk.
 */
export const selectSearcher = async (
	options: Pick<SearchOptions, 'emptyDirs'>,
	{
		classifier,
		autoExcludePatterns,
		strategy = 'auto',
		logger,
		probe,
	}: SelectSearcherOptions,
): Promise<Searcher> => {
	const walk = createWalkSearcher({classifier, autoExcludePatterns});
	if (options.emptyDirs || strategy === 'walk') return walk;

	const command = await findFdCommand(probe);
	if (!command) {
		logger?.info('search tool not found, using directory walk');
		return walk;
	}

	logger?.info('using delegated search', {command});
	const delegated = createFdSearcher({
		command,
		classifier,
		autoExcludePatterns,
		logger,
	});
	return withFallback(delegated, walk, logger);
};
