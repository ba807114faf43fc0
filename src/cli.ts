#!/usr/bin/env node

import process from 'node:process';
import meow from 'meow';
import {loadConfig} from './core/config.js';
import {EXIT_CODES, type ExitCode} from './core/gate.js';
import {openRunLog} from './core/logger.js';
import {
	resolveRunOptions,
	resolveSearchRoot,
	type RunTarget,
} from './core/options.js';
import {isElevated, isFilesystemRoot} from './core/privileges.js';
import {promptSearchTarget, runSweep} from './index.js';
import {createClackPrompter} from './ui/prompter.js';
import {createTextReporter} from './ui/reporter.js';

const cli = meow(
	`
	Usage
	  $ globsweep [options] [pattern] [path]

	Description
	  Find files and folders by glob pattern and delete them after a preview,
	  optional exclusions and confirmation. System locations are protected.
	  Without a pattern, globsweep asks for the search path and pattern.

	Options
	  --dry-run, -n          Preview only, don't delete anything
	  --force, -f            Skip the exclusion prompt and all confirmations
	  --ignore-case, -i      Case-insensitive pattern matching
	  --type, -t <f|d>       Only files (f) or only directories (d)
	  --all, -a              Disable auto-exclusion of common directories
	  --show-size            Display sizes and the total size of matches
	  --older-than <days>    Only match entries older than N days
	  --larger-than <size>   Only match files larger than SIZE (K, M, G)
	  --empty-dirs           Find and delete empty directories only
	  --max-display <num>    Maximum results to display (default: 100)
	  --help, -h             Show this help message
	  --version              Show the version

	Auto-excluded by default (use -a to disable)
	  node_modules, .git, .npm, .cache, .vscode, .idea

	Examples
	  $ globsweep "*.log"
	  $ globsweep -n "*.tmp"
	  $ globsweep --older-than 30 --larger-than 100M "*.mp4"
	  $ globsweep -t d dist
	  $ globsweep --empty-dirs
	`,
	{
		importMeta: import.meta,
		autoHelp: false,
		flags: {
			dryRun: {
				type: 'boolean',
				shortFlag: 'n',
				default: false,
			},
			force: {
				type: 'boolean',
				shortFlag: 'f',
				default: false,
			},
			ignoreCase: {
				type: 'boolean',
				shortFlag: 'i',
				default: false,
			},
			type: {
				type: 'string',
				shortFlag: 't',
			},
			all: {
				type: 'boolean',
				shortFlag: 'a',
				default: false,
			},
			showSize: {
				type: 'boolean',
				default: false,
			},
			olderThan: {
				type: 'number',
			},
			largerThan: {
				type: 'string',
			},
			emptyDirs: {
				type: 'boolean',
				default: false,
			},
			maxDisplay: {
				type: 'number',
			},
			help: {
				type: 'boolean',
				shortFlag: 'h',
				default: false,
			},
		},
	},
);

const describeError = (error: unknown): string =>
	String(error instanceof Error ? error.message : error);

const main = async (): Promise<ExitCode> => {
	if (cli.flags.help) cli.showHelp(0);

	const cwd = process.cwd();
	const reporter = createTextReporter({
		output: process.stdout,
		errorOutput: process.stderr,
		showSize: cli.flags.showSize,
	});
	const config = await loadConfig(cwd);
	const logger = await openRunLog({
		enabled: config.runLog,
		onError(error) {
			reporter.warn(`run log disabled: ${describeError(error)}`);
		},
	});

	try {
		if (isFilesystemRoot(cwd) && !(await isElevated())) {
			reporter.error(
				'Running from the filesystem root requires root or Administrator privileges',
			);
			return EXIT_CODES.elevationRequired;
		}

		const prompter = createClackPrompter();
		const [patternArgument, pathArgument = '.'] = cli.input;
		const interactive = !patternArgument && !cli.flags.emptyDirs;
		let target: RunTarget;
		if (interactive) {
			prompter.begin('globsweep');
			const prompted = await promptSearchTarget(prompter, cwd);
			if (!prompted) {
				prompter.abort('Operation cancelled.');
				return EXIT_CODES.cancelled;
			}
			target = prompted;
		} else {
			target = {
				pattern: patternArgument ?? '',
				root: await resolveSearchRoot(pathArgument, cwd),
			};
		}

		const options = resolveRunOptions(target, cli.flags, config);
		const result = await runSweep(options, {
			prompter,
			reporter,
			config,
			logger,
		});
		if (interactive) {
			prompter.end(
				result.kind === 'completed'
					? 'Cleanup finished.'
					: 'No changes were made.',
			);
		}
		return result.exitCode;
	} catch (error) {
		reporter.error(describeError(error));
		logger.error('run failed', {reason: describeError(error)});
		return EXIT_CODES.failure;
	} finally {
		await logger.close();
	}
};

process.exitCode = await main();
