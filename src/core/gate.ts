import {deleteResults, type DeleteResultsOptions} from './delete.js';
import {parseExclusionInput, partitionByExclusions} from './exclusions.js';
import type {Logger} from './logger.js';
import {
	countByCategory,
	criticalBreakdown,
	filterOutCritical,
	type PathClassifier,
} from './safety.js';
import {measureTotalSize} from './size.js';
import type {
	CategoryCounts,
	DeleteResult,
	DeleteSummary,
	RunOptions,
	SearchResult,
} from './types.js';

export const CRITICAL_CONFIRMATION_PHRASE = 'YES DELETE SYSTEM FILES';

export const EXIT_CODES = {
	success: 0,
	failure: 1,
	cancelled: 2,
	elevationRequired: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type GatePhase =
	| 'searching'
	| 'summarizing'
	| 'privilege-check'
	| 'size-report'
	| 'excluding'
	| 'previewing'
	| 'dry-run'
	| 'confirm-critical'
	| 'confirm-final'
	| 'deleting'
	| 'done';

export type CancelStage = 'excluding' | 'confirm-critical' | 'confirm-final';

export type GateOutcome =
	| {kind: 'no-matches'}
	| {kind: 'blocked'; criticalCount: number}
	| {kind: 'all-excluded'; excludedCount: number}
	| {kind: 'dry-run'; candidates: SearchResult[]}
	| {kind: 'cancelled'; stage: CancelStage}
	| {kind: 'completed'; summary: DeleteSummary};

export type GateResult = GateOutcome & {
	exitCode: ExitCode;
	phases: GatePhase[];
};

const EXIT_CODE_BY_OUTCOME: Record<GateOutcome['kind'], ExitCode> = {
	'no-matches': EXIT_CODES.failure,
	blocked: EXIT_CODES.failure,
	'all-excluded': EXIT_CODES.success,
	'dry-run': EXIT_CODES.success,
	cancelled: EXIT_CODES.cancelled,
	completed: EXIT_CODES.success,
};

/** Answers are raw text; `null` means the operator aborted the prompt. */
export interface GatePrompter {
	exclusions(): Promise<string | null>;
	criticalPhrase(phrase: string, criticalCount: number): Promise<string | null>;
	confirmDeletion(): Promise<string | null>;
}

export interface GateReporter {
	result(result: SearchResult): void;
	displayLimitReached(): void;
	noMatches(pattern: string, autoExclude: boolean): void;
	matchSummary(total: number, counts: CategoryCounts): void;
	criticalBlocked(criticalCount: number): void;
	nothingDeletable(): void;
	proceedingWithoutCritical(remaining: number): void;
	sizeCalculating(): void;
	totalSize(bytes: number): void;
	excluded(results: readonly SearchResult[]): void;
	allExcluded(): void;
	preview(results: readonly SearchResult[], limit: number): void;
	dryRun(): void;
	criticalWarning(criticalCount: number, breakdown: Map<string, number>): void;
	cancelled(stage: CancelStage): void;
	deletionStarted(count: number): void;
	deleteResult(result: DeleteResult): void;
	deletionSummary(summary: DeleteSummary): void;
}

export interface DeletionGateContext {
	options: RunOptions;
	classifier: PathClassifier;
	elevated: boolean;
	prompter: GatePrompter;
	reporter: GateReporter;
	logger?: Logger;
	measureSize?: (paths: string[]) => Promise<number>;
	deletion?: Pick<DeleteResultsOptions, 'remove' | 'exists'>;
}

/**
 * Streams search results into the reporter, showing at most `maxDisplay`
 * entries while still counting everything.
 */
export const collectCandidates = async (
	source: AsyncIterable<SearchResult>,
	maxDisplay: number,
	reporter: Pick<GateReporter, 'result' | 'displayLimitReached'>,
): Promise<SearchResult[]> => {
	const results: SearchResult[] = [];
	for await (const result of source) {
		results.push(result);
		if (results.length <= maxDisplay) {
			reporter.result(result);
		} else if (results.length === maxDisplay + 1) {
			reporter.displayLimitReached();
		}
	}
	return results;
};

const isAffirmative = (answer: string | null): boolean =>
	answer !== null && answer.trim().toLowerCase() === 'y';

/**
 * The confirmation and permission state machine between search and deletion.
 * Critical results never reach deletion without elevated privileges, and
 * dry-run stops before any filesystem mutation.
 */
export const runDeletionGate = async (
	source: AsyncIterable<SearchResult>,
	context: DeletionGateContext,
): Promise<GateResult> => {
	const {options, classifier, elevated, prompter, reporter, logger} = context;
	const measureSize =
		context.measureSize ?? (async (paths: string[]) => measureTotalSize(paths));
	const phases: GatePhase[] = [];
	const enter = (phase: GatePhase): void => {
		phases.push(phase);
		logger?.debug('gate phase', {phase});
	};

	const finish = (outcome: GateOutcome): GateResult => {
		const result: GateResult = {
			...outcome,
			exitCode: EXIT_CODE_BY_OUTCOME[outcome.kind],
			phases,
		};
		logger?.info('run finished', {
			outcome: outcome.kind,
			exitCode: result.exitCode,
		});
		return result;
	};

	const cancel = (stage: CancelStage): GateResult => {
		reporter.cancelled(stage);
		return finish({kind: 'cancelled', stage});
	};

	enter('searching');
	let candidates = await collectCandidates(
		source,
		options.maxDisplay,
		reporter,
	);
	if (candidates.length === 0) {
		reporter.noMatches(options.pattern, options.autoExclude);
		return finish({kind: 'no-matches'});
	}

	enter('summarizing');
	const counts = countByCategory(candidates);
	reporter.matchSummary(candidates.length, counts);
	logger?.info('search finished', {total: candidates.length, ...counts});

	enter('privilege-check');
	if (counts.critical > 0 && !elevated) {
		reporter.criticalBlocked(counts.critical);
		candidates = filterOutCritical(candidates);
		if (candidates.length === 0) {
			reporter.nothingDeletable();
			return finish({kind: 'blocked', criticalCount: counts.critical});
		}
		reporter.proceedingWithoutCritical(candidates.length);
	}

	if (options.showSize) {
		enter('size-report');
		reporter.sizeCalculating();
		reporter.totalSize(await measureSize(candidates.map(item => item.path)));
	}

	if (!options.force) {
		enter('excluding');
		const answer = await prompter.exclusions();
		if (answer === null) return cancel('excluding');

		const patterns = parseExclusionInput(answer);
		if (patterns.length > 0) {
			const {kept, excluded} = partitionByExclusions(candidates, patterns);
			reporter.excluded(excluded);
			logger?.info('exclusions applied', {
				patterns,
				excluded: excluded.length,
				kept: kept.length,
			});
			if (kept.length === 0) {
				reporter.allExcluded();
				return finish({kind: 'all-excluded', excludedCount: excluded.length});
			}
			candidates = kept;
		}
	}

	enter('previewing');
	reporter.preview(candidates, options.previewLimit);
	if (options.showSize) {
		reporter.totalSize(await measureSize(candidates.map(item => item.path)));
	}

	if (options.dryRun) {
		enter('dry-run');
		reporter.dryRun();
		return finish({kind: 'dry-run', candidates});
	}

	if (!options.force) {
		const remainingCritical = countByCategory(candidates).critical;
		if (elevated && remainingCritical > 0) {
			enter('confirm-critical');
			reporter.criticalWarning(
				remainingCritical,
				criticalBreakdown(candidates, classifier),
			);
			const phrase = await prompter.criticalPhrase(
				CRITICAL_CONFIRMATION_PHRASE,
				remainingCritical,
			);
			if (phrase !== CRITICAL_CONFIRMATION_PHRASE) {
				return cancel('confirm-critical');
			}
		}

		enter('confirm-final');
		if (!isAffirmative(await prompter.confirmDeletion())) {
			return cancel('confirm-final');
		}
	}

	enter('deleting');
	reporter.deletionStarted(candidates.length);
	const summary = await deleteResults(candidates, {
		...context.deletion,
		onResult(result) {
			reporter.deleteResult(result);
			if (!result.ok) {
				logger?.error('delete failed', {
					path: result.path,
					reason:
						result.error instanceof Error
							? result.error.message
							: String(result.error),
				});
			}
		},
	});
	reporter.deletionSummary(summary);

	enter('done');
	return finish({kind: 'completed', summary});
};
