/**
 * ProgramIndex - Filesystem index of launchable programs.
 *
 * Scans platform program roots with fast-glob for application bundles
 * (`*.app`), desktop entries (`*.desktop`) and shortcuts (`*.lnk`), caches the
 * records, and answers `*`/`?` wildcard queries against program names.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import pLimit from 'p-limit';
import {throwIfAborted} from '../lib/abort.js';
import {errorMessage} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import {matchesWildcard, wildcardToRegExp} from '../search/fuzzy.js';
import {parseDesktopEntry} from './desktop-entry.js';

// ============================================================================
// Types
// ============================================================================

export interface ProgramRecord {
	name: string;
	path?: string;
	bundleId?: string;
	description?: string;
}

export interface ProgramQueryOptions {
	/** Maximum records returned */
	limit: number;
	signal?: AbortSignal;
}

/**
 * Metadata index of installed programs.
 *
 * `pattern` is a case- and diacritic-insensitive wildcard (`*` any run,
 * `?` one character) matched against the whole program name or filename.
 */
export interface ProgramIndex {
	query(pattern: string, options: ProgramQueryOptions): Promise<ProgramRecord[]>;
}

export interface FileSystemProgramIndexOptions {
	roots: string[];
	/** Directory depth scanned below each root */
	maxDepth: number;
	/** How long a scan stays fresh; 0 rescans on every query */
	refreshIntervalMs: number;
	logger?: Logger;
	now?: () => number;
}

const PROGRAM_PATTERNS = ['**/*.app', '**/*.desktop', '**/*.lnk'];
const FILE_READ_CONCURRENCY = 8;
const BUNDLE_ID_PATTERN =
	/<key>CFBundleIdentifier<\/key>\s*<string>([^<]+)<\/string>/;

// ============================================================================
// Record Builders
// ============================================================================

async function readBundleId(bundlePath: string): Promise<string | undefined> {
	try {
		const plist = await fs.readFile(
			path.join(bundlePath, 'Contents', 'Info.plist'),
			'utf-8',
		);
		return BUNDLE_ID_PATTERN.exec(plist)?.[1]?.trim() || undefined;
	} catch {
		// Missing or binary plist: the bundle still launches by path
		return undefined;
	}
}

async function bundleRecord(bundlePath: string): Promise<ProgramRecord> {
	const record: ProgramRecord = {
		name: path.basename(bundlePath, path.extname(bundlePath)),
		path: bundlePath,
	};
	const bundleId = await readBundleId(bundlePath);
	if (bundleId) record.bundleId = bundleId;
	return record;
}

async function desktopRecord(filePath: string): Promise<ProgramRecord | null> {
	const entry = parseDesktopEntry(await fs.readFile(filePath, 'utf-8'));
	if (!entry) return null;

	const record: ProgramRecord = {
		name: entry.name,
		path: filePath,
		bundleId: path.basename(filePath, '.desktop'),
	};
	if (entry.comment) record.description = entry.comment;
	return record;
}

function shortcutRecord(filePath: string): ProgramRecord {
	return {name: path.basename(filePath, path.extname(filePath)), path: filePath};
}

// ============================================================================
// FileSystemProgramIndex
// ============================================================================

export class FileSystemProgramIndex implements ProgramIndex {
	private readonly roots: string[];
	private readonly maxDepth: number;
	private readonly refreshIntervalMs: number;
	private readonly logger: Logger;
	private readonly now: () => number;

	private records: ProgramRecord[] = [];
	private scannedAt: number | null = null;
	private inflight: Promise<ProgramRecord[]> | null = null;

	constructor(options: FileSystemProgramIndexOptions) {
		this.roots = options.roots;
		this.maxDepth = options.maxDepth;
		this.refreshIntervalMs = options.refreshIntervalMs;
		this.logger = options.logger ?? createNullLogger();
		this.now = options.now ?? Date.now;
	}

	async query(
		pattern: string,
		options: ProgramQueryOptions,
	): Promise<ProgramRecord[]> {
		throwIfAborted(options.signal, 'Program index query');
		const records = await this.snapshot();
		throwIfAborted(options.signal, 'Program index query');

		const matcher = wildcardToRegExp(pattern);
		const matches: ProgramRecord[] = [];
		for (const record of records) {
			if (matches.length >= options.limit) break;
			const filename = record.path ? path.basename(record.path) : '';
			if (
				matchesWildcard(record.name, matcher) ||
				(filename && matchesWildcard(filename, matcher))
			) {
				matches.push(record);
			}
		}
		return matches;
	}

	/**
	 * Force a rescan. Concurrent callers share one scan.
	 */
	async refresh(): Promise<ProgramRecord[]> {
		if (!this.inflight) {
			this.inflight = this.scan().finally(() => {
				this.inflight = null;
			});
		}
		return this.inflight;
	}

	private async snapshot(): Promise<ProgramRecord[]> {
		const fresh =
			this.scannedAt !== null &&
			this.now() - this.scannedAt < this.refreshIntervalMs;
		if (fresh) return this.records;
		return this.refresh();
	}

	private async scan(): Promise<ProgramRecord[]> {
		const start = this.now();
		const limit = pLimit(FILE_READ_CONCURRENCY);
		const records: ProgramRecord[] = [];
		const seenDesktopIds = new Set<string>();

		for (const root of this.roots) {
			const found = await fg(PROGRAM_PATTERNS, {
				cwd: root,
				absolute: true,
				onlyFiles: false,
				deep: this.maxDepth,
				followSymbolicLinks: false,
				caseSensitiveMatch: false,
				suppressErrors: true,
			});
			found.sort();

			// First root wins for desktop entries with the same file id
			const paths = found.filter(filePath => {
				if (!filePath.toLowerCase().endsWith('.desktop')) return true;
				const id = path.basename(filePath).toLowerCase();
				if (seenDesktopIds.has(id)) return false;
				seenDesktopIds.add(id);
				return true;
			});

			const built = await Promise.all(
				paths.map(filePath =>
					limit(async () => {
						try {
							return await this.buildRecord(filePath);
						} catch (error) {
							this.logger.debug('ProgramIndex', 'Skipped unreadable entry', {
								path: filePath,
								error: errorMessage(error),
							});
							return null;
						}
					}),
				),
			);

			for (const record of built) {
				if (record) records.push(record);
			}
		}

		this.records = records;
		this.scannedAt = this.now();
		this.logger.info('ProgramIndex', 'Scanned program roots', {
			roots: this.roots.length,
			programs: records.length,
			durationMs: this.scannedAt - start,
		});
		return records;
	}

	private async buildRecord(filePath: string): Promise<ProgramRecord | null> {
		const extension = path.extname(filePath).toLowerCase();
		if (extension === '.app') return bundleRecord(filePath);
		if (extension === '.desktop') return desktopRecord(filePath);
		return shortcutRecord(filePath);
	}
}

// ============================================================================
// In-memory index
// ============================================================================

/**
 * Fixed-record index, used when programs are supplied by the host.
 */
export class StaticProgramIndex implements ProgramIndex {
	constructor(private readonly records: readonly ProgramRecord[]) {}

	async query(
		pattern: string,
		options: ProgramQueryOptions,
	): Promise<ProgramRecord[]> {
		throwIfAborted(options.signal, 'Program index query');
		const matcher = wildcardToRegExp(pattern);
		return this.records
			.filter(
				record =>
					matchesWildcard(record.name, matcher) ||
					(record.path !== undefined &&
						matchesWildcard(path.basename(record.path), matcher)),
			)
			.slice(0, options.limit);
	}
}
