import {execFile} from 'node:child_process';
import path from 'node:path';
import {promisify} from 'node:util';

const execFileAsync = promisify(execFile);

export interface ElevationProbe {
	platform?: NodeJS.Platform;
	getuid?: () => number;
	runCommand?: (command: string, args: string[]) => Promise<unknown>;
}

const defaultRunCommand = async (
	command: string,
	args: string[],
): Promise<unknown> => execFileAsync(command, args, {windowsHide: true});

/**
 * Root (uid 0) on POSIX. On Windows `net session` only succeeds inside an
 * Administrator session.
 */
export const isElevated = async ({
	platform = process.platform,
	getuid = process.getuid?.bind(process),
	runCommand = defaultRunCommand,
}: ElevationProbe = {}): Promise<boolean> => {
	if (platform === 'win32') {
		try {
			await runCommand('net', ['session']);
			return true;
		} catch {
			return false;
		}
	}

	return typeof getuid === 'function' && getuid() === 0;
};

export const isFilesystemRoot = (
	directory: string,
	platform: NodeJS.Platform = process.platform,
): boolean => {
	const flavour = platform === 'win32' ? path.win32 : path.posix;
	const resolved = flavour.resolve(directory);
	return flavour.parse(resolved).root === resolved;
};
