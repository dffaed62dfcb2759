import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import {
	decodeHistoryDocument,
	JsonFileHistoryPersistence,
} from '../history/persistence.js';
import type {HistoryEntry} from '../history/types.js';
import {HistoryPersistenceError} from '../lib/errors.js';
import {createSpyLogger, createTempDir, type TempDir} from './helpers.js';

describe('decodeHistoryDocument', () => {
	it('migrates a bare list of commands', () => {
		expect(decodeHistoryDocument(['safari', '  ', ' notes '])).toEqual({
			entries: [{command: 'safari'}, {command: 'notes'}],
			skipped: 1,
		});
	});

	it('skips malformed entries individually', () => {
		const decoded = decodeHistoryDocument({
			schemaVersion: 1,
			entries: [
				{command: 'ok'},
				{command: ''},
				{nope: 1},
				'text',
				{command: 'open', target: {kind: 'url', url: 'https://example.com'}},
			],
		});

		expect(decoded).toEqual({
			entries: [
				{command: 'ok'},
				{command: 'open', target: {kind: 'url', url: 'https://example.com'}},
			],
			skipped: 3,
		});
	});

	it('rejects unknown document shapes', () => {
		expect(decodeHistoryDocument({entries: []})).toBeNull();
		expect(decodeHistoryDocument({schemaVersion: 2, entries: []})).toBeNull();
		expect(decodeHistoryDocument('history')).toBeNull();
	});
});

describe('JsonFileHistoryPersistence', () => {
	let temp: TempDir;
	let historyPath: string;

	beforeEach(async () => {
		temp = await createTempDir('runway-history-test-');
		historyPath = path.join(temp.root, 'data', 'history.json');
	});

	afterEach(async () => {
		await temp.cleanup();
	});

	it('loads an empty history when the file is missing', async () => {
		const persistence = new JsonFileHistoryPersistence(historyPath);
		expect(await persistence.load()).toEqual([]);
	});

	it('round-trips entries with their targets', async () => {
		const entries: HistoryEntry[] = [
			{
				command: 'vsc',
				display: 'Visual Studio Code',
				target: {
					kind: 'installed',
					name: 'Visual Studio Code',
					path: '/Applications/Visual Studio Code.app',
				},
			},
			{command: 'ff', target: {kind: 'catalog', token: 'firefox'}},
			{command: 'docs', target: {kind: 'filesystem', path: '/srv/docs', isDirectory: true}},
		];
		const persistence = new JsonFileHistoryPersistence(historyPath);

		await persistence.save(entries);

		expect(await persistence.load()).toEqual(entries);
	});

	it('writes a versioned document atomically', async () => {
		const persistence = new JsonFileHistoryPersistence(historyPath);
		await persistence.save([{command: 'mail'}]);

		const raw = await fs.readFile(historyPath, 'utf-8');
		expect(JSON.parse(raw)).toEqual({
			schemaVersion: 1,
			entries: [{command: 'mail'}],
		});
		expect(await fs.readdir(path.dirname(historyPath))).toEqual(['history.json']);
	});

	it('recovers from a corrupt file with an empty history', async () => {
		await fs.mkdir(path.dirname(historyPath), {recursive: true});
		await fs.writeFile(historyPath, '{"schemaVersion": 1, "entr');
		const logger = createSpyLogger();
		const persistence = new JsonFileHistoryPersistence(historyPath, logger);

		expect(await persistence.load()).toEqual([]);
		expect(logger.warn).toHaveBeenCalledWith(
			'HistoryPersistence',
			'History file is not valid JSON',
			expect.objectContaining({path: historyPath}),
		);
	});

	it('reports skipped entries', async () => {
		await fs.mkdir(path.dirname(historyPath), {recursive: true});
		await fs.writeFile(
			historyPath,
			JSON.stringify({schemaVersion: 1, entries: [{command: 'maps'}, 42]}),
		);
		const logger = createSpyLogger();
		const persistence = new JsonFileHistoryPersistence(historyPath, logger);

		expect(await persistence.load()).toEqual([{command: 'maps'}]);
		expect(logger.warn).toHaveBeenCalledWith(
			'HistoryPersistence',
			'Skipped malformed entries',
			{path: historyPath, skipped: 1},
		);
	});

	it('wraps write failures in HistoryPersistenceError', async () => {
		// A regular file where the parent directory should be
		const blocker = path.join(temp.root, 'blocker');
		await fs.writeFile(blocker, '');
		const persistence = new JsonFileHistoryPersistence(
			path.join(blocker, 'history.json'),
		);

		await expect(persistence.save([{command: 'mail'}])).rejects.toBeInstanceOf(
			HistoryPersistenceError,
		);
	});
});
