import type {Logger} from '../logger.js';
import type {SearchMethod, SearchOptions, SearchResult} from '../types.js';

export interface Searcher {
	readonly method: SearchMethod;
	search(options: SearchOptions): AsyncIterable<SearchResult>;
}

/** The delegated search tool is missing or failed before producing output. */
export class SearchToolError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'SearchToolError';
	}
}

/**
 * Runs `primary`, switching to `fallback` when it raises a SearchToolError
 * before yielding anything. Errors after the first result propagate.
 */
export const withFallback = (
	primary: Searcher,
	fallback: Searcher,
	logger?: Logger,
): Searcher => ({
	method: primary.method,
	async *search(options) {
		let yielded = false;
		try {
			for await (const result of primary.search(options)) {
				yielded = true;
				yield result;
			}
			return;
		} catch (error) {
			if (yielded || !(error instanceof SearchToolError)) throw error;
			logger?.warn('delegated search failed, using directory walk', {
				method: primary.method,
				reason: error.message,
			});
		}

		yield* fallback.search(options);
	},
});
