import path from 'node:path';
import type {Writable} from 'node:stream';
import {createColors, isColorSupported} from 'colorette';
import {human, pluralize} from '../core/format.js';
import type {CancelStage, GateReporter} from '../core/gate.js';
import type {
	CategoryCounts,
	DeleteResult,
	DeleteSummary,
	RunOptions,
	SafetyCategory,
	SearchMethod,
	SearchResult,
} from '../core/types.js';

const RULE = '━'.repeat(40);
const WIDE_RULE = '━'.repeat(52);

const CATEGORY_ICONS: Record<SafetyCategory, string> = {
	critical: '!!!',
	warning: '!  ',
	safe: '   ',
};

export interface SweepReporter extends GateReporter {
	searchStarted(
		options: Pick<RunOptions, 'root' | 'pattern' | 'emptyDirs'>,
		method: SearchMethod,
	): void;
	warn(message: string): void;
	error(message: string): void;
}

export interface TextReporterOptions {
	output: Writable;
	errorOutput?: Writable;
	useColor?: boolean;
	showSize?: boolean;
	/** Appended to directory paths; defaults to the platform separator. */
	separator?: string;
}

const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/** Renders every run event as plain lines on the given streams. */
export const createTextReporter = ({
	output,
	errorOutput = output,
	useColor = isColorSupported,
	showSize = false,
	separator = path.sep,
}: TextReporterOptions): SweepReporter => {
	const colors = createColors({useColor});

	const line = (text = ''): void => {
		output.write(`${text}\n`);
	};

	const displayPath = (result: SearchResult): string =>
		result.isDirectory ? `${result.path}${separator}` : result.path;

	return {
		searchStarted(
			options: Pick<RunOptions, 'root' | 'pattern' | 'emptyDirs'>,
			method: SearchMethod,
		): void {
			const {bold, blue, cyan, green, yellow} = colors;
			line();
			line(bold('Searching...'));
			line(`${blue('Path:')} ${cyan(options.root)}`);
			line(
				`${blue('Pattern:')} ${yellow(options.emptyDirs ? '(empty directories)' : options.pattern)}`,
			);
			line(
				`${blue('Method:')} ${
					method === 'fd'
						? green('fd (parallel search)')
						: yellow("walk (install 'fd' for faster search)")
				}`,
			);
			line();
		},

		result(result: SearchResult): void {
			const {bold, red, yellow, dim} = colors;
			const paint =
				result.category === 'critical'
					? (text: string) => bold(red(text))
					: result.category === 'warning'
						? yellow
						: red;
			const sizeInfo =
				showSize && result.size !== undefined
					? dim(` (${human(result.size)})`)
					: '';
			line(
				`${paint(`  ${CATEGORY_ICONS[result.category]}`)} ${paint(displayPath(result))}${sizeInfo}`,
			);
		},

		displayLimitReached(): void {
			line(colors.yellow('  ... (more results, display limit reached)'));
		},

		noMatches(pattern: string, autoExclude: boolean): void {
			const {bold, cyan, yellow} = colors;
			line();
			line(`${yellow(bold('No matches found'))} for pattern: ${cyan(pattern)}`);
			if (autoExclude) {
				line(
					`${yellow('Note:')} Auto-exclusions are enabled. Use ${cyan('-a')} flag to disable.`,
				);
			}
		},

		matchSummary(total: number, counts: CategoryCounts): void {
			const {bold, green, red, yellow} = colors;
			line();
			line(bold(RULE));
			line(`${bold('Found')} ${yellow(String(total))}${bold(' total matches')}`);
			if (counts.critical > 0) {
				line(`  ${bold(red('!!! Critical system files:'))} ${counts.critical}`);
			}
			if (counts.warning > 0) {
				line(`  ${yellow('!   Warning-level files:')} ${counts.warning}`);
			}
			if (counts.safe > 0) {
				line(`  ${green('OK  Safe files:')} ${counts.safe}`);
			}
		},

		criticalBlocked(criticalCount: number): void {
			const {bold, red, yellow} = colors;
			const danger = (text: string) => bold(red(text));
			line();
			line(danger(WIDE_RULE));
			line(
				`${danger('!!! DANGER:')} ${criticalCount} ${danger('files are CRITICAL SYSTEM FILES!')}`,
			);
			line(danger('X Cannot delete (insufficient permissions)'));
			line(
				yellow(
					'Run as root or Administrator if you really need to delete system files',
				),
			);
			line(danger(WIDE_RULE));
		},

		nothingDeletable(): void {
			line(
				colors.yellow(
					'All matched files are system files. Nothing can be deleted without elevated privileges.',
				),
			);
		},

		proceedingWithoutCritical(remaining: number): void {
			line(
				colors.green(
					`Proceeding with ${remaining} safe/warning-level files only...`,
				),
			);
		},

		sizeCalculating(): void {
			line();
			line(colors.blue('Calculating total size...'));
		},

		totalSize(bytes: number): void {
			const {bold, yellow} = colors;
			line(`${bold('Total size:')} ${yellow(human(bytes))}`);
		},

		excluded(results: readonly SearchResult[]): void {
			if (results.length === 0) return;
			const {bold, green} = colors;
			line();
			line(`${green(bold('Excluded'))} (${results.length} items):`);
			for (const result of results) {
				line(`${green('  OK')} ${result.path}`);
			}
		},

		allExcluded(): void {
			const {bold, green} = colors;
			line();
			line(green(bold('All files excluded. Nothing to delete.')));
		},

		preview(results: readonly SearchResult[], limit: number): void {
			const {bold, red, yellow} = colors;
			line();
			line(bold(RULE));
			line(`${bold(red('Will delete'))} ${results.length} items:`);
			line();
			for (const result of results.slice(0, limit)) {
				line(
					`${red(result.isDirectory ? '  [D]' : '  [F]')} ${red(displayPath(result))}`,
				);
			}
			const remaining = results.length - limit;
			if (remaining > 0) {
				line(yellow(`  ... and ${remaining} more`));
			}
		},

		dryRun(): void {
			const {bold, cyan, yellow} = colors;
			line();
			line(`${yellow(bold('DRY-RUN MODE:'))} No files were deleted`);
			line(`Remove ${cyan('-n')} flag to actually delete these files`);
		},

		criticalWarning(criticalCount: number, breakdown: Map<string, number>): void {
			const {bold, red, yellow} = colors;
			const danger = (text: string) => bold(red(text));
			line();
			line(danger('!!! CRITICAL DANGER WARNING !!!'));
			line(danger(WIDE_RULE));
			line(
				`${danger('You are about to delete')} ${criticalCount} ${danger('SYSTEM FILES!')}`,
			);
			if (breakdown.size > 0) {
				line();
				line(yellow(bold('AFFECTED LOCATIONS:')));
				for (const [prefix, count] of breakdown) {
					line(red(`  - ${prefix}: ${pluralize(count, 'item')}`));
				}
			}
			line();
			line(yellow(bold('CONSEQUENCES:')));
			line(red('  - May break the operating system boot'));
			line(red('  - May break critical services'));
			line(red('  - May make the system unrecoverable'));
			line();
		},

		cancelled(stage: CancelStage): void {
			line();
			line(
				stage === 'confirm-critical'
					? colors.green('Operation cancelled. System is safe.')
					: colors.yellow('Operation cancelled'),
			);
		},

		deletionStarted(count: number): void {
			const {bold, red} = colors;
			line();
			line(bold(red(`Deleting ${pluralize(count, 'item')}...`)));
			line();
		},

		deleteResult(result: DeleteResult): void {
			const {green, red, yellow} = colors;
			if (result.ok) {
				line(`${green('OK')} Deleted: ${red(result.path)}`);
				return;
			}
			line(
				`${red('X')} Failed: ${result.path} ${yellow(`(${describeError(result.error)})`)}`,
			);
		},

		deletionSummary(summary: DeleteSummary): void {
			const {bold, green, red, dim} = colors;
			line();
			line(bold(RULE));
			line(
				`${green(bold('OK Deleted:'))} ${pluralize(summary.deletedCount, 'item')}`,
			);
			if (summary.failureCount > 0) {
				line(
					`${bold(red('X Failed:'))} ${pluralize(summary.failureCount, 'item')} (try running with elevated privileges)`,
				);
			}
			if (summary.skippedCount > 0) {
				line(
					dim(`Skipped: ${pluralize(summary.skippedCount, 'item')} (already removed)`),
				);
			}
			line(bold(RULE));
		},

		warn(message: string): void {
			errorOutput.write(`${colors.yellow('WARNING:')} ${message}\n`);
		},

		error(message: string): void {
			errorOutput.write(`${colors.red('ERROR:')} ${message}\n`);
		},
	};
};
