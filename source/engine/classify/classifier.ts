/**
 * QueryClassifier - Recognizes URLs and filesystem paths typed into the query.
 *
 * Classification runs in order and stops at the first rule that applies:
 *   (a) the whole input is a link (explicit scheme, mailto, or bare host)
 *   (b) the input has a dot, no whitespace and is not path-prefixed
 *   (c) the input looks like a path and can be listed
 */

import type {Stats} from 'node:fs';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {errorMessage} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {SearchQuery} from '../search/query.js';
import type {FileSystemEntryResult, SearchResult} from '../search/types.js';

export const DEFAULT_MAX_LISTING = 50;

const WHITESPACE = /\s/;
const EXPLICIT_SCHEME = /^[a-z][a-z0-9+.-]*:\/\/\S+$/i;
const MAILTO = /^mailto:[^@\s]+@[^@\s]+\.[^@\s]+$/i;
const BARE_HOST =
	/^(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z]{2,}(?::\d{1,5})?(?:[/?#]\S*)?$/i;
const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:/i;

// ============================================================================
// URL detection
// ============================================================================

function parses(candidate: string): boolean {
	try {
		new URL(candidate);
		return true;
	} catch {
		return false;
	}
}

function isPathPrefixed(input: string): boolean {
	return input.startsWith('/') || input.startsWith('~') || input.startsWith('.');
}

/**
 * Resolve trimmed input to an absolute URL string, or null.
 *
 * @example detectUrl('example.com') // 'https://example.com'
 * @example detectUrl('./notes.txt') // null
 */
export function detectUrl(input: string): string | null {
	if (!input || WHITESPACE.test(input)) return null;

	if (EXPLICIT_SCHEME.test(input) || MAILTO.test(input)) {
		return parses(input) ? input : null;
	}

	if (BARE_HOST.test(input)) {
		const candidate = `https://${input}`;
		return parses(candidate) ? candidate : null;
	}

	if (input.includes('.') && !isPathPrefixed(input)) {
		const candidate = `https://${input}`;
		return parses(candidate) ? candidate : null;
	}

	return null;
}

/**
 * True for input that should be treated as a filesystem path.
 */
export function looksLikePath(input: string): boolean {
	if (!input) return false;
	if (!isPathPrefixed(input) && !input.includes('/')) return false;
	return !SCHEME_PREFIX.test(input);
}

// ============================================================================
// Classifier
// ============================================================================

export interface ClassifierOptions {
	/** Directory `~` expands to (default: os.homedir()) */
	homeDir?: string;
	/** Directory relative paths resolve against (default: process.cwd()) */
	baseDir?: string;
	maxListing?: number;
	logger?: Logger;
}

interface ListedChild {
	name: string;
	isDirectory: boolean;
}

export class QueryClassifier {
	private readonly homeDir: string;
	private readonly baseDir: string;
	private readonly maxListing: number;
	private readonly logger: Logger;

	constructor(options: ClassifierOptions = {}) {
		this.homeDir = options.homeDir ?? os.homedir();
		this.baseDir = options.baseDir ?? process.cwd();
		this.maxListing = options.maxListing ?? DEFAULT_MAX_LISTING;
		this.logger = options.logger ?? createNullLogger();
	}

	async classify(query: SearchQuery): Promise<SearchResult[]> {
		const input = query.trimmed;
		if (!input) return [];

		const url = detectUrl(input);
		if (url) return [{kind: 'url', url}];

		if (!looksLikePath(input)) return [];

		try {
			return await this.listPath(input);
		} catch (error) {
			this.logger.debug('QueryClassifier', 'Path listing failed', {
				input,
				error: errorMessage(error),
			});
			return [];
		}
	}

	/**
	 * Expand `~` and resolve relative input to an absolute path.
	 */
	resolvePath(input: string): string {
		if (input === '~') return this.homeDir;
		if (input.startsWith('~/')) {
			return path.join(this.homeDir, input.slice(2));
		}
		return path.resolve(this.baseDir, input);
	}

	private async listPath(input: string): Promise<FileSystemEntryResult[]> {
		const resolved = this.resolvePath(input);
		const stats = await statOrNull(resolved);

		if (stats?.isDirectory()) {
			const children = await this.readChildren(resolved);
			return this.toResults(
				resolved,
				children.filter(child => !child.name.startsWith('.')),
			);
		}

		if (stats) {
			return [{kind: 'filesystem', path: resolved, isDirectory: false}];
		}

		const parent = path.dirname(resolved);
		const parentStats = await statOrNull(parent);
		if (!parentStats?.isDirectory()) return [];

		const prefix = path.basename(resolved).toLowerCase();
		const includeHidden = prefix.startsWith('.');
		const children = await this.readChildren(parent);
		return this.toResults(
			parent,
			children.filter(
				child =>
					child.name.toLowerCase().startsWith(prefix) &&
					(includeHidden || !child.name.startsWith('.')),
			),
		);
	}

	private async readChildren(directory: string): Promise<ListedChild[]> {
		const entries = await fs.readdir(directory, {withFileTypes: true});
		return Promise.all(
			entries.map(async entry => {
				let isDirectory = entry.isDirectory();
				if (entry.isSymbolicLink()) {
					const target = await statOrNull(path.join(directory, entry.name));
					isDirectory = target?.isDirectory() ?? false;
				}
				return {name: entry.name, isDirectory};
			}),
		);
	}

	private toResults(
		directory: string,
		children: ListedChild[],
	): FileSystemEntryResult[] {
		return children
			.sort((a, b) => {
				if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
				return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
			})
			.slice(0, this.maxListing)
			.map(
				(child): FileSystemEntryResult => ({
					kind: 'filesystem',
					path: path.join(directory, child.name),
					isDirectory: child.isDirectory,
				}),
			);
	}
}

async function statOrNull(target: string): Promise<Stats | null> {
	try {
		return await fs.stat(target);
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === 'ENOENT' || code === 'ENOTDIR') return null;
		throw error;
	}
}
