/**
 * HistoryStore - Recency-ordered list of commands the user ran successfully.
 *
 * Mutations apply to the in-memory list synchronously, so concurrent readers
 * on the event loop always see a consistent list. Persistence happens in the
 * background through a single-slot queue and never fails a mutation.
 */

import pLimit from 'p-limit';
import {toError} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import {fuzzyScore} from './scoring.js';
import type {
	HistoryEntry,
	HistoryMatch,
	HistoryPersistence,
	RecordOptions,
} from './types.js';

/** Default cap on remembered commands */
export const DEFAULT_MAX_HISTORY_ENTRIES = 200;

export interface HistoryStoreOptions {
	maxEntries?: number;
	persistence?: HistoryPersistence;
	logger?: Logger;
}

function sameCommand(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase();
}

/**
 * Trim commands, drop blanks and later case-insensitive duplicates, and cap.
 */
export function normalizeEntries(
	entries: readonly HistoryEntry[],
	maxEntries: number,
): HistoryEntry[] {
	const seen = new Set<string>();
	const normalized: HistoryEntry[] = [];

	for (const entry of entries) {
		const command = entry.command.trim();
		if (!command) continue;
		const key = command.toLowerCase();
		if (seen.has(key)) continue;
		seen.add(key);
		normalized.push({...entry, command});
		if (normalized.length === maxEntries) break;
	}

	return normalized;
}

export class HistoryStore {
	private entries: HistoryEntry[];
	private readonly maxEntries: number;
	private readonly persistence: HistoryPersistence | null;
	private readonly logger: Logger;
	private readonly saveQueue = pLimit(1);
	private lastSave: Promise<void> = Promise.resolve();

	constructor(
		entries: readonly HistoryEntry[] = [],
		options: HistoryStoreOptions = {},
	) {
		this.maxEntries = options.maxEntries ?? DEFAULT_MAX_HISTORY_ENTRIES;
		this.persistence = options.persistence ?? null;
		this.logger = options.logger ?? createNullLogger();
		this.entries = normalizeEntries(entries, this.maxEntries);
	}

	/**
	 * Create a store from its persisted entries.
	 */
	static async load(
		options: HistoryStoreOptions & {persistence: HistoryPersistence},
	): Promise<HistoryStore> {
		const entries = await options.persistence.load();
		return new HistoryStore(entries, options);
	}

	get size(): number {
		return this.entries.length;
	}

	/**
	 * Snapshot of every entry, most recent first.
	 */
	all(): HistoryEntry[] {
		return this.entries.slice();
	}

	/**
	 * Record a command the user launched successfully.
	 * An existing entry with the same command (ignoring case) moves to the
	 * front and takes the new metadata.
	 */
	record(command: string, options: RecordOptions = {}): void {
		const trimmed = command.trim();
		if (!trimmed) return;

		const existing = this.entries.findIndex(entry =>
			sameCommand(entry.command, trimmed),
		);
		if (existing !== -1) {
			this.entries.splice(existing, 1);
		}

		const entry: HistoryEntry = {command: trimmed};
		if (options.display) entry.display = options.display;
		if (options.subtitle) entry.subtitle = options.subtitle;
		if (options.target) entry.target = options.target;
		this.entries.unshift(entry);

		if (this.entries.length > this.maxEntries) {
			this.entries.length = this.maxEntries;
		}

		this.persist();
	}

	/**
	 * Forget a command. Returns true if an entry was removed.
	 */
	remove(command: string): boolean {
		const trimmed = command.trim();
		const index = this.entries.findIndex(entry =>
			sameCommand(entry.command, trimmed),
		);
		if (index === -1) return false;

		this.entries.splice(index, 1);
		this.persist();
		return true;
	}

	recentEntries(limit: number): HistoryEntry[] {
		return this.entries.slice(0, Math.max(0, limit));
	}

	/**
	 * The most recent command that completes `prefix`, if any.
	 */
	bestCompletion(prefix: string): string | undefined {
		return this.completions(prefix, 1)[0];
	}

	/**
	 * Commands starting with `prefix` (ignoring case), in recency order.
	 */
	completions(prefix: string, limit = 10): string[] {
		const lower = prefix.trim().toLowerCase();
		if (!lower) return [];

		const matches: string[] = [];
		for (const entry of this.entries) {
			if (matches.length >= limit) break;
			if (entry.command.toLowerCase().startsWith(lower)) {
				matches.push(entry.command);
			}
		}
		return matches;
	}

	/**
	 * Entries matching `query`, best score first. Equal scores keep recency
	 * order.
	 */
	fuzzyMatches(query: string, limit = 5): HistoryMatch[] {
		const lower = query.trim().toLowerCase();
		if (!lower) return [];

		const scored: Array<HistoryMatch & {index: number}> = [];
		this.entries.forEach((entry, index) => {
			const score = fuzzyScore(entry.command, lower);
			if (score !== null) scored.push({entry, score, index});
		});

		scored.sort((a, b) => b.score - a.score || a.index - b.index);
		return scored.slice(0, limit).map(({entry, score}) => ({entry, score}));
	}

	/**
	 * Wait until every queued save has finished.
	 */
	async flush(): Promise<void> {
		await this.lastSave;
	}

	private persist(): void {
		const persistence = this.persistence;
		if (!persistence) return;

		const snapshot = this.entries.slice();
		this.lastSave = this.saveQueue(() => persistence.save(snapshot)).catch(
			(error: unknown) => {
				this.logger.error('HistoryStore', 'Failed to save history', toError(error));
			},
		);
	}
}
