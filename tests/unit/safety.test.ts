import {expect, test} from 'vitest';
import {
	countByCategory,
	createPathClassifier,
	createSafetyPathList,
	criticalBreakdown,
	filterOutCritical,
	isAutoExcluded,
	POSIX_CRITICAL_PATHS,
} from '../../src/core/safety.js';
import type {SearchResult} from '../../src/core/types.js';

const posix = createPathClassifier({
	paths: createSafetyPathList({platform: 'linux', env: {}}),
	platform: 'linux',
});

test('critical entries win over warning entries', () => {
	const classifier = createPathClassifier({
		paths: {critical: ['/srv/system'], warning: ['/srv']},
		platform: 'linux',
	});

	expect(classifier.classify('/srv/system/app')).toBe('critical');
	expect(classifier.classify('/srv/www')).toBe('warning');
	expect(classifier.classify('/home/user/a.log')).toBe('safe');
});

test('POSIX defaults flag system locations', () => {
	expect(posix.classify('/etc/myapp/app.conf')).toBe('critical');
	expect(posix.classify('/usr/share/doc')).toBe('critical');
	expect(posix.classify('/var/log/syslog')).toBe('warning');
	expect(posix.classify('/home/user/build')).toBe('safe');
});

test('prefix matching is not segment aware', () => {
	expect(posix.classify('/etcetera/notes.txt')).toBe('critical');
	expect(posix.classify('/optional/file')).toBe('warning');
});

test('paths are normalized before matching', () => {
	expect(posix.classify('/home/user/../../etc/passwd')).toBe('critical');
});

test('macOS adds its system directories and ignores case', () => {
	const darwin = createPathClassifier({
		paths: createSafetyPathList({platform: 'darwin', env: {}}),
		platform: 'darwin',
	});

	expect(darwin.classify('/system/Library/Fonts')).toBe('critical');
	expect(posix.classify('/System/Library/Fonts')).toBe('safe');
});

test('Windows lists take environment locations into account', () => {
	const paths = createSafetyPathList({
		platform: 'win32',
		env: {SystemRoot: String.raw`D:\Windows`, TEMP: String.raw`D:\Scratch`},
	});
	const windows = createPathClassifier({paths, platform: 'win32'});

	expect(windows.classify(String.raw`c:\windows\system32\drivers`)).toBe('critical');
	expect(windows.classify(String.raw`D:\Windows\Temp\x.log`)).toBe('critical');
	expect(windows.classify(String.raw`D:\Scratch\x.log`)).toBe('warning');
	expect(windows.classify(String.raw`C:\Users\someone\x.log`)).toBe('warning');
	expect(windows.classify(String.raw`D:\Projects\x.log`)).toBe('safe');
});

test('configured paths are appended to the platform lists', () => {
	const paths = createSafetyPathList({
		platform: 'linux',
		env: {},
		extraCritical: ['/data/db', '  '],
		extraWarning: ['/data'],
	});

	expect(paths.critical).toEqual([...POSIX_CRITICAL_PATHS, '/data/db']);
	expect(paths.warning.at(-1)).toBe('/data');
	expect(Object.isFrozen(paths.critical)).toBe(true);
});

test('auto-exclusion matches substrings and globs case-insensitively', () => {
	const patterns = ['node_modules', '.git', '*.bak'];

	expect(isAutoExcluded('pkg/node_modules/lib', patterns)).toBe(true);
	expect(isAutoExcluded('.GIT', patterns)).toBe(true);
	expect(isAutoExcluded('notes/OLD.BAK', patterns)).toBe(true);
	expect(isAutoExcluded(String.raw`src\.git\hooks`, patterns)).toBe(true);
	expect(isAutoExcluded('src/index.ts', patterns)).toBe(false);
	expect(isAutoExcluded('anything', ['  '])).toBe(false);
});

const results: SearchResult[] = [
	{path: '/etc/a.conf', category: 'critical', isDirectory: false},
	{path: '/etc/ssl/b.pem', category: 'critical', isDirectory: false},
	{path: '/usr/bin/tool', category: 'critical', isDirectory: false},
	{path: '/opt/app/c.log', category: 'warning', isDirectory: false},
	{path: '/home/user/d.log', category: 'safe', isDirectory: false},
];

test('countByCategory tallies every tier', () => {
	expect(countByCategory(results)).toEqual({critical: 3, warning: 1, safe: 1});
});

test('filterOutCritical only removes critical entries and keeps order', () => {
	const filtered = filterOutCritical(results);

	expect(filtered.map(item => item.path)).toEqual([
		'/opt/app/c.log',
		'/home/user/d.log',
	]);
	expect(countByCategory(filtered).critical).toBe(0);
	expect(filterOutCritical(filtered)).toEqual(filtered);
});

test('criticalBreakdown groups critical entries by matching prefix', () => {
	expect(criticalBreakdown(results, posix)).toEqual(
		new Map([
			['/etc', 2],
			['/usr/bin', 1],
		]),
	);
});
