export type SafetyCategory = 'safe' | 'warning' | 'critical';
export type TypeFilter = 'file' | 'directory';
export type SearchMethod = 'fd' | 'walk';
export type SearchStrategy = 'auto' | SearchMethod;

export interface SearchResult {
	readonly path: string;
	readonly category: SafetyCategory;
	readonly isDirectory: boolean;
	/** Byte size of a file, when the search stat'ed it. */
	readonly size?: number;
}

export interface SafetyPathList {
	readonly critical: readonly string[];
	readonly warning: readonly string[];
}

export interface CategoryCounts {
	critical: number;
	warning: number;
	safe: number;
}

export interface RunOptions {
	readonly pattern: string;
	readonly root: string;
	readonly dryRun: boolean;
	readonly force: boolean;
	readonly ignoreCase: boolean;
	readonly typeFilter?: TypeFilter;
	readonly autoExclude: boolean;
	readonly showSize: boolean;
	readonly olderThanDays?: number;
	readonly largerThan?: string;
	readonly largerThanBytes?: number;
	readonly emptyDirs: boolean;
	readonly maxDisplay: number;
	readonly previewLimit: number;
}

export type SearchOptions = Pick<
	RunOptions,
	| 'pattern'
	| 'root'
	| 'ignoreCase'
	| 'typeFilter'
	| 'autoExclude'
	| 'olderThanDays'
	| 'largerThanBytes'
	| 'emptyDirs'
>;

export interface SweepConfig {
	criticalPaths: string[];
	warningPaths: string[];
	autoExclude: string[];
	maxDisplay?: number;
	searchStrategy: SearchStrategy;
	runLog: boolean;
}

export interface DeleteSuccessResult {
	path: string;
	ok: true;
}

export interface DeleteFailureResult {
	path: string;
	ok: false;
	error: unknown;
}

export type DeleteResult = DeleteSuccessResult | DeleteFailureResult;

export interface DeleteSummary {
	results: DeleteResult[];
	deletedCount: number;
	failureCount: number;
	skippedCount: number;
}

export interface PathStats {
	size: number;
	fileCount: number;
	isDirectory: boolean;
	error?: string;
}
