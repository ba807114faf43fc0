import process from 'node:process';
import {DEFAULT_CONFIG} from './core/config.js';
import {
	runDeletionGate,
	type DeletionGateContext,
	type GatePrompter,
	type GateResult,
} from './core/gate.js';
import {Logger} from './core/logger.js';
import {
	assertPattern,
	resolveSearchRoot,
	type PathExpansionContext,
	type RunTarget,
} from './core/options.js';
import {isElevated} from './core/privileges.js';
import {
	createPathClassifier,
	createSafetyPathList,
	DEFAULT_AUTO_EXCLUDE_PATTERNS,
} from './core/safety.js';
import type {CommandProbe} from './core/search/fd.js';
import type {Searcher} from './core/search/searcher.js';
import {selectSearcher} from './core/search/select.js';
import type {RunOptions, SafetyPathList, SweepConfig} from './core/types.js';
import type {TargetPrompter} from './ui/prompter.js';
import type {SweepReporter} from './ui/reporter.js';

export interface SweepRuntime {
	prompter: GatePrompter;
	reporter: SweepReporter;
	config?: SweepConfig;
	logger?: Logger;
	platform?: NodeJS.Platform;
	env?: NodeJS.ProcessEnv;
	/** Replaces the platform lists (configured extra paths still apply). */
	safetyPaths?: SafetyPathList;
	elevated?: boolean;
	searcher?: Searcher;
	probe?: CommandProbe;
	measureSize?: DeletionGateContext['measureSize'];
	deletion?: DeletionGateContext['deletion'];
}

const withConfiguredPaths = (
	paths: SafetyPathList,
	config: SweepConfig,
): SafetyPathList => ({
	critical: [...paths.critical, ...config.criticalPaths],
	warning: [...paths.warning, ...config.warningPaths],
});

/** Runs one search-and-delete session for already validated options. */
export const runSweep = async (
	options: RunOptions,
	runtime: SweepRuntime,
): Promise<GateResult> => {
	const config = runtime.config ?? DEFAULT_CONFIG;
	const logger = runtime.logger ?? new Logger({level: 'silent'});
	const platform = runtime.platform ?? process.platform;

	const paths = runtime.safetyPaths
		? withConfiguredPaths(runtime.safetyPaths, config)
		: createSafetyPathList({
				platform,
				env: runtime.env,
				extraCritical: config.criticalPaths,
				extraWarning: config.warningPaths,
			});
	const classifier = createPathClassifier({paths, platform});
	const autoExcludePatterns = [
		...DEFAULT_AUTO_EXCLUDE_PATTERNS,
		...config.autoExclude,
	];

	const searcher =
		runtime.searcher ??
		(await selectSearcher(options, {
			classifier,
			autoExcludePatterns,
			strategy: config.searchStrategy,
			logger: logger.child('search'),
			probe: runtime.probe,
		}));
	const elevated = runtime.elevated ?? (await isElevated({platform}));

	logger.info('run started', {
		pattern: options.pattern,
		root: options.root,
		method: searcher.method,
		elevated,
		dryRun: options.dryRun,
		force: options.force,
	});
	runtime.reporter.searchStarted(options, searcher.method);

	return runDeletionGate(searcher.search(options), {
		options,
		classifier,
		elevated,
		prompter: runtime.prompter,
		reporter: runtime.reporter,
		logger: logger.child('gate'),
		measureSize: runtime.measureSize,
		deletion: runtime.deletion,
	});
};

/**
 * Asks for the search root, then the pattern. Resolves to `null` when either
 * prompt is aborted; invalid answers throw.
 */
export const promptSearchTarget = async (
	prompter: TargetPrompter,
	cwd: string,
	context: PathExpansionContext = {},
): Promise<RunTarget | null> => {
	const rootAnswer = await prompter.searchRoot();
	if (rootAnswer === null) return null;
	const root = await resolveSearchRoot(rootAnswer, cwd, context);

	const patternAnswer = await prompter.pattern();
	if (patternAnswer === null) return null;

	return {root, pattern: assertPattern(patternAnswer)};
};

export {loadConfig, normalizeConfig} from './core/config.js';
export {
	CRITICAL_CONFIRMATION_PHRASE,
	EXIT_CODES,
	runDeletionGate,
} from './core/gate.js';
export type {
	ExitCode,
	GateOutcome,
	GatePhase,
	GatePrompter,
	GateReporter,
	GateResult,
} from './core/gate.js';
export {parseExclusionInput, partitionByExclusions} from './core/exclusions.js';
export {parseSize} from './core/filters.js';
export {resolveRunOptions} from './core/options.js';
export {createPathClassifier, createSafetyPathList} from './core/safety.js';
export type {PathClassifier} from './core/safety.js';
export {createWalkSearcher} from './core/search/walk.js';
export {createFdSearcher} from './core/search/fd.js';
export {deleteResults} from './core/delete.js';
export {createTextReporter} from './ui/reporter.js';
export type * from './core/types.js';
