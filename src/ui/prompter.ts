import {cancel, intro, isCancel, outro, text} from '@clack/prompts';
import type {GatePrompter} from '../core/gate.js';

export interface TargetPrompter {
	searchRoot(): Promise<string | null>;
	pattern(): Promise<string | null>;
}

export interface SessionPrompter extends GatePrompter, TargetPrompter {
	begin(title: string): void;
	end(message: string): void;
	abort(message: string): void;
}

const ask = async (
	message: string,
	placeholder?: string,
): Promise<string | null> => {
	const answer = await text({message, placeholder, defaultValue: ''});
	return isCancel(answer) ? null : answer;
};

/** Terminal prompts; an aborted prompt (Ctrl-C) resolves to `null`. */
export const createClackPrompter = (): SessionPrompter => ({
	begin(title) {
		intro(title);
	},
	end(message) {
		outro(message);
	},
	abort(message) {
		cancel(message);
	},
	async searchRoot() {
		return ask(
			'Enter path to search (default: current directory)',
			'Press Enter for the current directory',
		);
	},
	async pattern() {
		return ask('Enter file/folder name or pattern to delete', '*.log');
	},
	async exclusions() {
		return ask(
			'Enter exclusion patterns (comma-separated, or press Enter to skip)',
			'*/important/*, *.txt, */backup/*',
		);
	},
	async criticalPhrase(phrase) {
		return ask(`To proceed, type exactly: ${phrase}`);
	},
	async confirmDeletion() {
		return ask('Proceed with deletion? (y/N)', 'N');
	},
});
