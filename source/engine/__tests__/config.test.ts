import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import {
	DEFAULT_CONFIG,
	loadConfig,
	resolveCatalogPath,
	resolveConfig,
	saveConfig,
} from '../lib/config.js';
import {
	getConfigPath,
	getDefaultProgramRoots,
	getRunwayHomeDir,
	getServiceLogPath,
} from '../lib/constants.js';
import {ConfigError} from '../lib/errors.js';
import {createTempDir, writeFile, type TempDir} from './helpers.js';

describe('config', () => {
	let temp: TempDir;
	const originalHome = process.env['RUNWAY_HOME'];

	beforeEach(async () => {
		temp = await createTempDir('runway-config-test-');
		process.env['RUNWAY_HOME'] = temp.root;
	});

	afterEach(async () => {
		if (originalHome === undefined) delete process.env['RUNWAY_HOME'];
		else process.env['RUNWAY_HOME'] = originalHome;
		await temp.cleanup();
	});

	it('resolves paths under the home override', () => {
		expect(getRunwayHomeDir()).toBe(temp.root);
		expect(getConfigPath()).toBe(path.join(temp.root, 'config.json'));
		expect(resolveCatalogPath(DEFAULT_CONFIG)).toBe(
			path.join(temp.root, 'catalog.json'),
		);
		expect(path.dirname(getServiceLogPath('engine'))).toBe(
			path.join(temp.root, 'logs', 'engine'),
		);
	});

	it('returns defaults when no config file exists', async () => {
		expect(await loadConfig()).toEqual(DEFAULT_CONFIG);
	});

	it('merges sections over the defaults', async () => {
		await writeFile(
			temp.root,
			'config.json',
			JSON.stringify({
				history: {maxEntries: 50},
				catalog: {path: '/srv/catalog.json'},
				providerTimeoutMs: 250,
			}),
		);

		const config = await loadConfig();

		expect(config.history).toEqual({...DEFAULT_CONFIG.history, maxEntries: 50});
		expect(config.installed).toEqual(DEFAULT_CONFIG.installed);
		expect(resolveCatalogPath(config)).toBe('/srv/catalog.json');
		expect(config.providerTimeoutMs).toBe(250);
	});

	it('throws ConfigError for invalid JSON', async () => {
		await writeFile(temp.root, 'config.json', '{"history": ');

		await expect(loadConfig()).rejects.toBeInstanceOf(ConfigError);
	});

	it('throws ConfigError naming the invalid field', async () => {
		await writeFile(
			temp.root,
			'config.json',
			JSON.stringify({history: {maxEntries: 0}}),
		);

		await expect(loadConfig()).rejects.toThrow(/history\.maxEntries/);
	});

	it('saves a config that loads back unchanged', async () => {
		const config = resolveConfig({classifier: {enabled: false}});
		await saveConfig(config);

		const raw = await fs.readFile(getConfigPath(), 'utf-8');
		expect(raw.endsWith('\n')).toBe(true);
		expect(await loadConfig()).toEqual(config);
	});
});

describe('getDefaultProgramRoots', () => {
	const originalDataHome = process.env['XDG_DATA_HOME'];
	const originalDataDirs = process.env['XDG_DATA_DIRS'];

	afterEach(() => {
		if (originalDataHome === undefined) delete process.env['XDG_DATA_HOME'];
		else process.env['XDG_DATA_HOME'] = originalDataHome;
		if (originalDataDirs === undefined) delete process.env['XDG_DATA_DIRS'];
		else process.env['XDG_DATA_DIRS'] = originalDataDirs;
	});

	it('lists application bundle folders on macOS', () => {
		expect(getDefaultProgramRoots('darwin', '/Users/tester')).toEqual([
			'/Applications',
			'/System/Applications',
			'/System/Library/CoreServices',
			'/Users/tester/Applications',
		]);
	});

	it('lists XDG application folders on Linux without duplicates', () => {
		delete process.env['XDG_DATA_HOME'];
		process.env['XDG_DATA_DIRS'] = '/usr/share:/usr/share:/opt/share';

		expect(getDefaultProgramRoots('linux', '/home/tester')).toEqual([
			'/home/tester/.local/share/applications',
			'/usr/share/applications',
			'/opt/share/applications',
		]);
	});
});
