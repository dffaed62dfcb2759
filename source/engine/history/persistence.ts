/**
 * JSON file persistence for command history.
 *
 * Document format:
 *   {"schemaVersion": 1, "entries": [{"command": "...", ...}, ...]}
 *
 * A bare array of command strings (the pre-schema format) is migrated on load.
 * Missing or corrupt files load as an empty history; writes are atomic
 * (temp file + rename) under a cross-process lock.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import {z} from 'zod';
import {getHistoryPath} from '../lib/constants.js';
import {errorMessage, HistoryPersistenceError} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {HistoryEntry, HistoryPersistence} from './types.js';

export const HISTORY_SCHEMA_VERSION = 1;

// ============================================================================
// Schema
// ============================================================================

const targetSchema = z.discriminatedUnion('kind', [
	z.object({kind: z.literal('catalog'), token: z.string().min(1)}),
	z.object({
		kind: z.literal('installed'),
		name: z.string().min(1),
		path: z.string().optional(),
		bundleId: z.string().optional(),
	}),
	z.object({kind: z.literal('url'), url: z.string().min(1)}),
	z.object({
		kind: z.literal('filesystem'),
		path: z.string().min(1),
		isDirectory: z.boolean(),
	}),
]);

const entrySchema = z.object({
	command: z.string().trim().min(1),
	display: z.string().optional(),
	subtitle: z.string().optional(),
	target: targetSchema.optional(),
});

const documentSchema = z.object({
	schemaVersion: z.literal(HISTORY_SCHEMA_VERSION),
	entries: z.array(z.unknown()),
});

const legacySchema = z.array(z.string());

function toEntry(parsed: z.infer<typeof entrySchema>): HistoryEntry {
	const entry: HistoryEntry = {command: parsed.command};
	if (parsed.display) entry.display = parsed.display;
	if (parsed.subtitle) entry.subtitle = parsed.subtitle;
	if (parsed.target) entry.target = parsed.target;
	return entry;
}

/**
 * Decode a parsed history document. Returns null when the document shape is
 * unrecognized. Individual malformed entries are skipped.
 */
export function decodeHistoryDocument(
	raw: unknown,
): {entries: HistoryEntry[]; skipped: number} | null {
	const legacy = legacySchema.safeParse(raw);
	if (legacy.success) {
		const entries = legacy.data
			.map(command => command.trim())
			.filter(command => command.length > 0)
			.map(command => ({command}));
		return {entries, skipped: legacy.data.length - entries.length};
	}

	const document = documentSchema.safeParse(raw);
	if (!document.success) return null;

	const entries: HistoryEntry[] = [];
	let skipped = 0;
	for (const item of document.data.entries) {
		const parsed = entrySchema.safeParse(item);
		if (parsed.success) {
			entries.push(toEntry(parsed.data));
		} else {
			skipped++;
		}
	}
	return {entries, skipped};
}

// ============================================================================
// File Persistence
// ============================================================================

export class JsonFileHistoryPersistence implements HistoryPersistence {
	readonly filePath: string;
	private readonly logger: Logger;

	constructor(filePath: string = getHistoryPath(), logger?: Logger) {
		this.filePath = filePath;
		this.logger = logger ?? createNullLogger();
	}

	async load(): Promise<HistoryEntry[]> {
		let content: string;
		try {
			content = await fs.readFile(this.filePath, 'utf-8');
		} catch (error) {
			if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
				return [];
			}
			this.logger.warn('HistoryPersistence', 'Failed to read history', {
				path: this.filePath,
				error: errorMessage(error),
			});
			return [];
		}

		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (error) {
			this.logger.warn('HistoryPersistence', 'History file is not valid JSON', {
				path: this.filePath,
				error: errorMessage(error),
			});
			return [];
		}

		const decoded = decodeHistoryDocument(raw);
		if (!decoded) {
			this.logger.warn('HistoryPersistence', 'Unrecognized history format', {
				path: this.filePath,
			});
			return [];
		}

		if (decoded.skipped > 0) {
			this.logger.warn('HistoryPersistence', 'Skipped malformed entries', {
				path: this.filePath,
				skipped: decoded.skipped,
			});
		}
		return decoded.entries;
	}

	async save(entries: readonly HistoryEntry[]): Promise<void> {
		const dir = path.dirname(this.filePath);
		const document = {schemaVersion: HISTORY_SCHEMA_VERSION, entries};

		let release: (() => Promise<void>) | undefined;
		try {
			await fs.mkdir(dir, {recursive: true});
			release = await lockfile.lock(dir, {
				lockfilePath: `${this.filePath}.lock`,
				stale: 10_000,
				retries: {retries: 5, minTimeout: 20, maxTimeout: 200},
			});

			const tempPath = `${this.filePath}.tmp`;
			await fs.writeFile(tempPath, JSON.stringify(document, null, '\t') + '\n');
			await fs.rename(tempPath, this.filePath);
		} catch (error) {
			throw new HistoryPersistenceError(this.filePath, errorMessage(error), {
				cause: error,
			});
		} finally {
			if (release) await release();
		}
	}
}
