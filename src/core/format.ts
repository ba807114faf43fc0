const FORMAT_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

export const human = (bytes: number | null | undefined): string => {
	if (bytes === 0) return '0 B';
	if (typeof bytes !== 'number' || !Number.isFinite(bytes) || bytes < 0) {
		return '-';
	}

	const unitIndex = Math.min(
		Math.floor(Math.log(bytes) / Math.log(1024)),
		FORMAT_UNITS.length - 1,
	);
	const value = bytes / 1024 ** unitIndex;
	const decimals = value >= 10 || unitIndex === 0 ? 0 : 1;

	return `${value.toFixed(decimals)} ${FORMAT_UNITS[unitIndex]}`;
};

export const pluralize = (count: number, singular: string, plural?: string) =>
	count === 1 ? `${count} ${singular}` : `${count} ${plural ?? `${singular}s`}`;
