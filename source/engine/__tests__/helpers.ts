/**
 * Test helpers: catalog fixtures, in-memory persistence and fake providers.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {vi} from 'vitest';
import type {CatalogEntry} from '../catalog/types.js';
import type {HistoryEntry, HistoryPersistence} from '../history/types.js';
import type {Logger} from '../lib/logger.js';
import type {SearchQuery} from '../search/query.js';
import type {
	ProviderContext,
	ProviderResult,
	SearchProvider,
	SearchSource,
} from '../search/types.js';

/** Temp directory with cleanup */
export interface TempDir {
	root: string;
	cleanup: () => Promise<void>;
}

export async function createTempDir(prefix = 'runway-test-'): Promise<TempDir> {
	const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
	return {
		root,
		cleanup: async () => {
			await fs.rm(root, {recursive: true, force: true});
		},
	};
}

/**
 * Write a file, creating parent directories.
 */
export async function writeFile(
	root: string,
	relativePath: string,
	content = '',
): Promise<string> {
	const filePath = path.join(root, relativePath);
	await fs.mkdir(path.dirname(filePath), {recursive: true});
	await fs.writeFile(filePath, content);
	return filePath;
}

export function catalogEntry(
	overrides: Partial<CatalogEntry> & {token: string},
): CatalogEntry {
	return {
		fullToken: overrides.token,
		displayNames: [overrides.token],
		deprecated: false,
		providedProgramFilenames: [],
		...overrides,
	};
}

/**
 * Logger whose methods are spies.
 */
export function createSpyLogger() {
	return {
		debug: vi.fn<Logger['debug']>(),
		info: vi.fn<Logger['info']>(),
		warn: vi.fn<Logger['warn']>(),
		error: vi.fn<Logger['error']>(),
	};
}

export class MemoryHistoryPersistence implements HistoryPersistence {
	saved: HistoryEntry[][] = [];
	failSaves = false;

	constructor(private readonly initial: HistoryEntry[] = []) {}

	async load(): Promise<HistoryEntry[]> {
		return this.initial.slice();
	}

	async save(entries: readonly HistoryEntry[]): Promise<void> {
		if (this.failSaves) throw new Error('disk full');
		this.saved.push(entries.slice());
	}

	get lastSaved(): HistoryEntry[] | undefined {
		return this.saved[this.saved.length - 1];
	}
}

type ProviderHandler = (
	query: SearchQuery,
	context: ProviderContext,
) => ProviderResult[] | Promise<ProviderResult[]>;

/**
 * Provider that answers through a handler and records every call.
 */
export class FakeProvider implements SearchProvider {
	readonly calls: Array<{query: string; context: ProviderContext}> = [];

	constructor(
		readonly source: SearchSource,
		private readonly handler: ProviderHandler,
	) {}

	async search(
		query: SearchQuery,
		context: ProviderContext,
	): Promise<ProviderResult[]> {
		this.calls.push({query: query.raw, context});
		return this.handler(query, context);
	}
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>(done => {
		resolve = done;
	});
	return {promise, resolve};
}
