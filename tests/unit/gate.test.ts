import {expect, test, vi} from 'vitest';
import {
	collectCandidates,
	CRITICAL_CONFIRMATION_PHRASE,
	runDeletionGate,
	type DeletionGateContext,
} from '../../src/core/gate.js';
import {createPathClassifier} from '../../src/core/safety.js';
import type {DeleteResult, SearchResult} from '../../src/core/types.js';
import {
	createRunOptions,
	createScriptedPrompter,
	fromResults,
	RecordingReporter,
} from '../helpers/fakes.js';

const classifier = createPathClassifier({
	paths: {critical: ['/etc'], warning: ['/opt']},
	platform: 'linux',
});

const entry = (filePath: string, isDirectory = false): SearchResult => ({
	path: filePath,
	category: classifier.classify(filePath),
	isDirectory,
});

const createDeletion = (failing: readonly string[] = []) => {
	const removed: string[] = [];
	const remove = vi.fn(async (targetPath: string): Promise<DeleteResult> => {
		if (failing.includes(targetPath)) {
			return {path: targetPath, ok: false, error: new Error('EACCES')};
		}
		removed.push(targetPath);
		return {path: targetPath, ok: true};
	});
	return {removed, remove, exists: async () => true};
};

const createContext = (
	overrides: Partial<DeletionGateContext> = {},
): DeletionGateContext & {reporter: RecordingReporter} => ({
	options: createRunOptions(),
	classifier,
	elevated: false,
	prompter: createScriptedPrompter().prompter,
	deletion: createDeletion(),
	...overrides,
	reporter: new RecordingReporter(),
});

test('collectCandidates caps the display but keeps every result', async () => {
	const reporter = new RecordingReporter();
	const results = ['/work/1.log', '/work/2.log', '/work/3.log', '/work/4.log'].map(
		filePath => entry(filePath),
	);

	const collected = await collectCandidates(fromResults(results), 2, reporter);

	expect(collected).toHaveLength(4);
	expect(reporter.names()).toEqual(['result', 'result', 'displayLimitReached']);
});

test('no matches ends with exit code 1 and the auto-exclusion hint', async () => {
	const context = createContext();
	const outcome = await runDeletionGate(fromResults([]), context);

	expect(outcome.kind).toBe('no-matches');
	expect(outcome.exitCode).toBe(1);
	expect(outcome.phases).toEqual(['searching']);
	expect(context.reporter.events).toEqual([
		{name: 'noMatches', pattern: '*.log', autoExclude: true},
	]);
});

test('only critical matches without elevation are blocked before any prompt', async () => {
	const {prompter, asked} = createScriptedPrompter();
	const context = createContext({
		options: createRunOptions({pattern: '*.conf', root: '/etc/myapp'}),
		prompter,
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/etc/myapp/a.conf'), entry('/etc/myapp/b.conf')]),
		context,
	);

	expect(outcome).toMatchObject({kind: 'blocked', criticalCount: 2, exitCode: 1});
	expect(outcome.phases).toEqual(['searching', 'summarizing', 'privilege-check']);
	expect(asked).toEqual([]);
	expect(context.reporter.names()).toContain('nothingDeletable');
});

test('unprivileged runs drop critical entries and continue with the rest', async () => {
	const context = createContext({
		options: createRunOptions({force: true, dryRun: true}),
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/etc/app.log'), entry('/work/a.log'), entry('/opt/b.log')]),
		context,
	);

	expect(outcome.kind).toBe('dry-run');
	if (outcome.kind !== 'dry-run') return;
	expect(outcome.candidates.map(item => item.path)).toEqual([
		'/work/a.log',
		'/opt/b.log',
	]);
	expect(outcome.candidates.some(item => item.category === 'critical')).toBe(false);
	expect(context.reporter.events).toContainEqual({
		name: 'proceedingWithoutCritical',
		remaining: 2,
	});
});

test('force with dry-run asks nothing and deletes nothing', async () => {
	const deletion = createDeletion();
	const {prompter, asked} = createScriptedPrompter();
	const context = createContext({
		options: createRunOptions({force: true, dryRun: true}),
		prompter,
		deletion,
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/work/a.log'), entry('/work/sub', true)]),
		context,
	);

	expect(outcome.kind).toBe('dry-run');
	expect(outcome.exitCode).toBe(0);
	expect(outcome.phases).toEqual([
		'searching',
		'summarizing',
		'privilege-check',
		'previewing',
		'dry-run',
	]);
	expect(asked).toEqual([]);
	expect(deletion.remove).not.toHaveBeenCalled();
});

test('dry-run still applies the entered exclusions', async () => {
	const deletion = createDeletion();
	const context = createContext({
		options: createRunOptions({dryRun: true}),
		prompter: createScriptedPrompter({exclusions: 'keep'}).prompter,
		deletion,
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/work/keep.log'), entry('/work/drop.log')]),
		context,
	);

	expect(outcome.kind).toBe('dry-run');
	if (outcome.kind !== 'dry-run') return;
	expect(outcome.candidates.map(item => item.path)).toEqual(['/work/drop.log']);
	expect(deletion.remove).not.toHaveBeenCalled();
});

test('exclusions are listed and the kept entries deleted after confirmation', async () => {
	const deletion = createDeletion();
	const {prompter, asked} = createScriptedPrompter({
		exclusions: '*.tmp, important.txt',
		confirmDeletion: 'y',
	});
	const context = createContext({prompter, deletion});

	const outcome = await runDeletionGate(
		fromResults([
			entry('/work/a.tmp'),
			entry('/work/important.txt'),
			entry('/work/b.log'),
		]),
		context,
	);

	expect(asked).toEqual(['exclusions', 'confirmDeletion']);
	expect(context.reporter.events).toContainEqual({
		name: 'excluded',
		paths: ['/work/a.tmp', '/work/important.txt'],
	});
	expect(context.reporter.events).toContainEqual({
		name: 'preview',
		paths: ['/work/b.log'],
		limit: 10,
	});
	expect(deletion.removed).toEqual(['/work/b.log']);
	expect(outcome).toMatchObject({kind: 'completed', exitCode: 0});
	expect(outcome.phases.at(-2)).toBe('deleting');
	expect(outcome.phases.at(-1)).toBe('done');
});

test('excluding every match ends successfully without deleting', async () => {
	const deletion = createDeletion();
	const context = createContext({
		prompter: createScriptedPrompter({exclusions: '*.log'}).prompter,
		deletion,
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/work/a.log'), entry('/work/b.log')]),
		context,
	);

	expect(outcome).toMatchObject({
		kind: 'all-excluded',
		excludedCount: 2,
		exitCode: 0,
	});
	expect(context.reporter.names()).toContain('allExcluded');
	expect(deletion.remove).not.toHaveBeenCalled();
});

test('aborting the exclusion prompt cancels with exit code 2', async () => {
	const context = createContext({
		prompter: createScriptedPrompter({exclusions: null}).prompter,
	});

	const outcome = await runDeletionGate(fromResults([entry('/work/a.log')]), context);

	expect(outcome).toMatchObject({
		kind: 'cancelled',
		stage: 'excluding',
		exitCode: 2,
	});
	expect(context.reporter.events.at(-1)).toEqual({
		name: 'cancelled',
		stage: 'excluding',
	});
});

test('anything but y at the final confirmation cancels', async () => {
	for (const answer of ['n', '', 'yes', null]) {
		const deletion = createDeletion();
		const context = createContext({
			prompter: createScriptedPrompter({exclusions: '', confirmDeletion: answer})
				.prompter,
			deletion,
		});

		const outcome = await runDeletionGate(
			fromResults([entry('/work/a.log')]),
			context,
		);

		expect(outcome).toMatchObject({
			kind: 'cancelled',
			stage: 'confirm-final',
			exitCode: 2,
		});
		expect(deletion.remove).not.toHaveBeenCalled();
	}
});

test('an upper-case Y confirms deletion', async () => {
	const deletion = createDeletion();
	const context = createContext({
		prompter: createScriptedPrompter({exclusions: '', confirmDeletion: 'Y'})
			.prompter,
		deletion,
	});

	const outcome = await runDeletionGate(fromResults([entry('/work/a.log')]), context);

	expect(outcome.kind).toBe('completed');
	expect(deletion.removed).toEqual(['/work/a.log']);
});

test('elevated runs with critical entries demand the exact phrase', async () => {
	const deletion = createDeletion();
	const {prompter, asked} = createScriptedPrompter({
		exclusions: '',
		criticalPhrase: 'yes delete system files',
	});
	const context = createContext({elevated: true, prompter, deletion});

	const outcome = await runDeletionGate(
		fromResults([
			entry('/etc/app/a.log'),
			entry('/etc/app/b.log'),
			entry('/work/c.log'),
		]),
		context,
	);

	expect(outcome).toMatchObject({
		kind: 'cancelled',
		stage: 'confirm-critical',
		exitCode: 2,
	});
	expect(asked).toEqual(['exclusions', 'criticalPhrase']);
	expect(context.reporter.events).toContainEqual({
		name: 'criticalWarning',
		criticalCount: 2,
		breakdown: new Map([['/etc', 2]]),
	});
	expect(deletion.remove).not.toHaveBeenCalled();
});

test('elevated runs delete critical entries after both confirmations', async () => {
	const deletion = createDeletion();
	const context = createContext({
		elevated: true,
		prompter: createScriptedPrompter({
			exclusions: '',
			criticalPhrase: CRITICAL_CONFIRMATION_PHRASE,
			confirmDeletion: 'y',
		}).prompter,
		deletion,
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/etc/app/a.log'), entry('/work/c.log')]),
		context,
	);

	expect(outcome.kind).toBe('completed');
	expect(outcome.phases).toContain('confirm-critical');
	expect(deletion.removed).toEqual(['/etc/app/a.log', '/work/c.log']);
});

test('force skips the critical phrase for elevated runs', async () => {
	const deletion = createDeletion();
	const {prompter, asked} = createScriptedPrompter();
	const context = createContext({
		options: createRunOptions({force: true}),
		elevated: true,
		prompter,
		deletion,
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/etc/app/a.log')]),
		context,
	);

	expect(outcome.kind).toBe('completed');
	expect(asked).toEqual([]);
	expect(outcome.phases).not.toContain('confirm-critical');
	expect(outcome.phases).not.toContain('confirm-final');
});

test('failed deletions are reported and the run still exits 0', async () => {
	const deletion = createDeletion(['/work/b.log']);
	const context = createContext({
		options: createRunOptions({force: true}),
		deletion,
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/work/a.log'), entry('/work/b.log'), entry('/work/c.log')]),
		context,
	);

	expect(outcome.exitCode).toBe(0);
	if (outcome.kind !== 'completed') throw new Error(outcome.kind);
	const {summary} = outcome;
	expect(summary.deletedCount).toBe(2);
	expect(summary.failureCount).toBe(1);
	expect(summary.deletedCount + summary.failureCount).toBe(summary.results.length);
	expect(
		context.reporter.events.filter(event => event.name === 'deleteResult'),
	).toHaveLength(3);
});

test('entries removed since the search are skipped', async () => {
	const remove = vi.fn(
		async (targetPath: string): Promise<DeleteResult> => ({
			path: targetPath,
			ok: true,
		}),
	);
	const context = createContext({
		options: createRunOptions({force: true}),
		deletion: {
			remove,
			exists: async targetPath => targetPath !== '/work/sub/a.log',
		},
	});

	const outcome = await runDeletionGate(
		fromResults([entry('/work/sub', true), entry('/work/sub/a.log')]),
		context,
	);

	if (outcome.kind !== 'completed') throw new Error(outcome.kind);
	expect(outcome.summary.skippedCount).toBe(1);
	expect(remove).toHaveBeenCalledTimes(1);
});

test('show-size reports the total before exclusions and again in the preview', async () => {
	const measureSize = vi.fn(async (paths: string[]) => paths.length * 1024);
	const context = createContext({
		options: createRunOptions({showSize: true, dryRun: true}),
		prompter: createScriptedPrompter({exclusions: 'b.log'}).prompter,
		measureSize,
	});

	await runDeletionGate(
		fromResults([entry('/work/a.log'), entry('/work/b.log')]),
		context,
	);

	expect(
		context.reporter.events.filter(event => event.name === 'totalSize'),
	).toEqual([
		{name: 'totalSize', bytes: 2048},
		{name: 'totalSize', bytes: 1024},
	]);
	expect(measureSize).toHaveBeenNthCalledWith(2, ['/work/a.log']);
});
