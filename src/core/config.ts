import fs from 'node:fs/promises';
import path from 'node:path';
import type {SearchStrategy, SweepConfig} from './types.js';

const SEARCH_STRATEGIES: readonly SearchStrategy[] = ['auto', 'fd', 'walk'];

export const CONFIG_PACKAGE_KEY = 'globsweep';
export const CONFIG_FILE_NAME = '.globsweeprc.json';
export const DEFAULT_MAX_DISPLAY = 100;
export const DEFAULT_PREVIEW_LIMIT = 10;

export const DEFAULT_CONFIG: SweepConfig = {
	criticalPaths: [],
	warningPaths: [],
	autoExclude: [],
	maxDisplay: undefined,
	searchStrategy: 'auto',
	runLog: true,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const normalizeStringList = (value: unknown): string[] => {
	if (!Array.isArray(value)) return [];

	const unique = new Set<string>();
	for (const entry of value) {
		if (typeof entry !== 'string') continue;
		const trimmed = entry.trim();
		if (trimmed) unique.add(trimmed);
	}

	return [...unique];
};

const parseBoolean = (value: unknown, fallback: boolean): boolean =>
	typeof value === 'boolean' ? value : fallback;

const parseMaxDisplay = (value: unknown): number | undefined => {
	if (typeof value !== 'number') return undefined;
	if (!Number.isInteger(value) || value < 0) return undefined;
	return value;
};

const isSearchStrategy = (value: unknown): value is SearchStrategy =>
	typeof value === 'string' &&
	SEARCH_STRATEGIES.some(strategy => strategy === value);

export const normalizeConfig = (value: unknown): SweepConfig => {
	const raw = isRecord(value) ? value : {};

	return {
		criticalPaths: normalizeStringList(raw.criticalPaths),
		warningPaths: normalizeStringList(raw.warningPaths),
		autoExclude: normalizeStringList(raw.autoExclude),
		maxDisplay: parseMaxDisplay(raw.maxDisplay),
		searchStrategy: isSearchStrategy(raw.searchStrategy)
			? raw.searchStrategy
			: DEFAULT_CONFIG.searchStrategy,
		runLog: parseBoolean(raw.runLog, DEFAULT_CONFIG.runLog),
	};
};

const readJson = async (filePath: string): Promise<Record<string, unknown>> => {
	try {
		const content = await fs.readFile(filePath, 'utf8');
		const parsed: unknown = JSON.parse(content);
		return isRecord(parsed) ? parsed : {};
	} catch {
		return {};
	}
};

export const loadConfig = async (cwd: string): Promise<SweepConfig> => {
	const packageJson = await readJson(path.join(cwd, 'package.json'));
	const packageEntry = packageJson[CONFIG_PACKAGE_KEY];
	const packageConfig = isRecord(packageEntry) ? packageEntry : {};
	const rcConfig = await readJson(path.join(cwd, CONFIG_FILE_NAME));

	return normalizeConfig({
		...DEFAULT_CONFIG,
		...packageConfig,
		...rcConfig,
	});
};
