import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type {Writable} from 'node:stream';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
	level?: LogLevel;
	format?: LogFormat;
	destination?: Writable;
	scope?: string;
	now?: () => Date;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
	silent: 100,
	error: 40,
	warn: 30,
	info: 20,
	debug: 10,
};

const formatScope = (scope?: string): string => (scope ? `[${scope}] ` : '');

export class Logger {
	private readonly level: LogLevel;
	private readonly format: LogFormat;
	private readonly destination: Writable | undefined;
	private readonly scope: string | undefined;
	private readonly now: () => Date;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? 'info';
		this.format = options.format ?? 'text';
		this.destination = options.destination;
		this.scope = options.scope;
		this.now = options.now ?? (() => new Date());
	}

	child(scope: string): Logger {
		return new Logger({
			level: this.level,
			format: this.format,
			destination: this.destination,
			scope: this.scope ? `${this.scope}:${scope}` : scope,
			now: this.now,
		});
	}

	debug(message: string, metadata: Record<string, unknown> = {}): void {
		this.write('debug', message, metadata);
	}

	info(message: string, metadata: Record<string, unknown> = {}): void {
		this.write('info', message, metadata);
	}

	warn(message: string, metadata: Record<string, unknown> = {}): void {
		this.write('warn', message, metadata);
	}

	error(message: string, metadata: Record<string, unknown> = {}): void {
		this.write('error', message, metadata);
	}

	async close(): Promise<void> {
		const destination = this.destination;
		if (!destination || destination.writableEnded) return;
		await new Promise<void>(resolve => {
			destination.end(resolve);
		});
	}

	private write(
		level: Exclude<LogLevel, 'silent'>,
		message: string,
		metadata: Record<string, unknown>,
	): void {
		if (!this.destination || this.destination.writableEnded) return;
		if (LEVEL_VALUES[this.level] > LEVEL_VALUES[level]) return;

		const timestamp = this.now().toISOString();
		if (this.format === 'json') {
			const payload = {
				level,
				time: timestamp,
				message,
				scope: this.scope,
				...metadata,
			};
			this.destination.write(`${JSON.stringify(payload)}\n`);
			return;
		}

		const serializedMetadata =
			Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
		this.destination.write(
			`${timestamp} ${level.toUpperCase()} ${formatScope(this.scope)}${message}${serializedMetadata}\n`,
		);
	}
}

export const RUN_LOG_FILE_NAME = 'globsweep.log';

export const resolveRunLogDirectory = (
	env: NodeJS.ProcessEnv = process.env,
): string =>
	env.GLOBSWEEP_LOG_DIR && env.GLOBSWEEP_LOG_DIR.trim().length > 0
		? path.resolve(env.GLOBSWEEP_LOG_DIR)
		: path.join(os.homedir(), '.globsweep');

export interface RunLogOptions {
	enabled: boolean;
	directory?: string;
	onError?: (error: unknown) => void;
}

/**
 * Opens the append-only run log. A disabled or unavailable log yields a logger
 * without destination, so callers never branch on it.
 */
export const openRunLog = async ({
	enabled,
	directory = resolveRunLogDirectory(),
	onError,
}: RunLogOptions): Promise<Logger> => {
	if (!enabled) return new Logger({level: 'silent'});

	try {
		await fs.promises.mkdir(directory, {recursive: true});
	} catch (error) {
		onError?.(error);
		return new Logger({level: 'silent'});
	}

	const stream = fs.createWriteStream(path.join(directory, RUN_LOG_FILE_NAME), {
		flags: 'a',
	});
	stream.on('error', error => {
		onError?.(error);
	});

	return new Logger({destination: stream, scope: 'globsweep'});
};
