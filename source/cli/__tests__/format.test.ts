import {describe, it, expect, beforeAll, afterAll} from 'vitest';
import chalk from 'chalk';
import type {SearchResult} from '../../engine/search/types.js';
import {
	describeAction,
	formatHistory,
	formatResults,
	toResultRecords,
} from '../format.js';

const results: SearchResult[] = [
	{
		kind: 'installed',
		name: 'Visual Studio Code',
		path: '/Applications/Visual Studio Code.app',
		description: 'Code editor',
	},
	{
		kind: 'catalog',
		entry: {
			token: 'codeedit',
			fullToken: 'codeedit',
			displayNames: ['CodeEdit'],
			deprecated: false,
			providedProgramFilenames: [],
		},
	},
];

const scoreFor = (result: SearchResult): number | undefined =>
	result.kind === 'installed' ? 1100 : undefined;

describe('format', () => {
	let level: typeof chalk.level;

	beforeAll(() => {
		level = chalk.level;
		chalk.level = 0;
	});

	afterAll(() => {
		chalk.level = level;
	});

	it('formats ranked results with subtitles and scores', () => {
		const output = formatResults(results, {
			query: 'code',
			elapsedMs: 12,
			homeDir: '/home/tester',
			scoreFor,
		});

		expect(output.split('\n')).toEqual([
			'Found 2 results for "code" (12ms):',
			'',
			'[installed] Visual Studio Code (1100)',
			'  /Applications/Visual Studio Code.app — Code editor',
			'[catalog] CodeEdit',
		]);
	});

	it('reports an empty result list', () => {
		expect(formatResults([], {query: 'zzz', elapsedMs: 3})).toBe(
			'No results found for "zzz" (3ms)',
		);
	});

	it('builds JSON records', () => {
		expect(toResultRecords(results, {homeDir: '/home/tester', scoreFor})).toEqual([
			{
				kind: 'installed',
				name: 'Visual Studio Code',
				subtitle: '/Applications/Visual Studio Code.app — Code editor',
				action: {
					type: 'launch',
					name: 'Visual Studio Code',
					path: '/Applications/Visual Studio Code.app',
					bundleId: undefined,
				},
				score: 1100,
			},
			{
				kind: 'catalog',
				name: 'CodeEdit',
				action: {type: 'open-homepage', token: 'codeedit', homepage: undefined},
			},
		]);
	});

	it('describes actions', () => {
		expect(describeAction({type: 'launch', name: 'Maps', bundleId: 'com.maps'})).toBe(
			'launch com.maps',
		);
		expect(describeAction({type: 'open-homepage', token: 'codeedit'})).toBe(
			'open codeedit',
		);
		expect(describeAction({type: 'rerun', command: 'ls'})).toBe('run ls');
	});

	it('lists history with display names', () => {
		expect(formatHistory([])).toBe('No command history yet.');
		expect(
			formatHistory([
				{command: 'vsc', display: 'Visual Studio Code'},
				{command: 'ls'},
			]).split('\n'),
		).toEqual([' 1. vsc → Visual Studio Code', ' 2. ls']);
	});
});
