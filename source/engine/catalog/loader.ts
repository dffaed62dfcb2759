/**
 * Catalog loading.
 *
 * Reads the catalog JSON document (`{data: [...]}` in the package manager's
 * cask format), trims every entry to the fields the engine uses and builds a
 * CatalogStore. Malformed entries are skipped individually.
 */

import fs from 'node:fs/promises';
import {z} from 'zod';
import {CatalogLoadError, errorMessage} from '../lib/errors.js';
import type {Logger} from '../lib/logger.js';
import {CatalogStore} from './store.js';
import type {CatalogEntry} from './types.js';

// ============================================================================
// Schema
// ============================================================================

const optionalText = z
	.unknown()
	.transform(value => sanitizeString(value))
	.optional();

const rawEntrySchema = z.object({
	token: z.string().trim().min(1),
	full_token: optionalText,
	name: z.unknown().optional(),
	desc: optionalText,
	homepage: optionalText,
	url: optionalText,
	version: optionalText,
	deprecated: z.unknown().optional(),
	artifacts: z.unknown().optional(),
});

const documentSchema = z.object({
	data: z.array(z.unknown()),
});

// ============================================================================
// Normalization
// ============================================================================

function sanitizeString(value: unknown): string | undefined {
	if (typeof value !== 'string') return undefined;
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeStringArray(value: unknown): string[] {
	if (Array.isArray(value)) {
		return value
			.map(item => sanitizeString(item))
			.filter((item): item is string => item !== undefined);
	}
	const single = sanitizeString(value);
	return single ? [single] : [];
}

/**
 * Collect `app` artifact filenames; other artifact kinds are ignored.
 */
function extractProgramFilenames(artifacts: unknown): string[] {
	if (!Array.isArray(artifacts)) return [];

	const filenames: string[] = [];
	for (const artifact of artifacts) {
		if (typeof artifact !== 'object' || artifact === null) continue;
		if (Array.isArray(artifact) || !('app' in artifact)) continue;
		filenames.push(...normalizeStringArray(artifact.app));
	}
	return filenames;
}

/**
 * Convert one raw catalog record into a CatalogEntry, or null when it lacks
 * a usable token.
 */
export function parseCatalogEntry(raw: unknown): CatalogEntry | null {
	const parsed = rawEntrySchema.safeParse(raw);
	if (!parsed.success) return null;

	const item = parsed.data;
	const names = normalizeStringArray(item.name);

	return {
		token: item.token,
		fullToken: item.full_token ?? item.token,
		displayNames: names.length > 0 ? names : [item.token],
		description: item.desc,
		homepage: item.homepage,
		url: item.url,
		version: item.version,
		deprecated: item.deprecated === true,
		providedProgramFilenames: extractProgramFilenames(item.artifacts),
	};
}

/**
 * Parse a whole catalog document.
 */
export function parseCatalogDocument(document: unknown): {
	entries: CatalogEntry[];
	skipped: number;
} {
	const parsed = documentSchema.safeParse(document);
	if (!parsed.success) {
		throw new Error('expected an object with a "data" array');
	}

	const entries: CatalogEntry[] = [];
	let skipped = 0;
	for (const raw of parsed.data.data) {
		const entry = parseCatalogEntry(raw);
		if (entry) {
			entries.push(entry);
		} else {
			skipped += 1;
		}
	}
	return {entries, skipped};
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load the catalog at `catalogPath`.
 *
 * A missing file yields an empty store. A file that exists but cannot be
 * read or parsed throws CatalogLoadError.
 */
export async function loadCatalog(
	catalogPath: string,
	logger?: Logger,
): Promise<CatalogStore> {
	let content: string;
	try {
		content = await fs.readFile(catalogPath, 'utf-8');
	} catch (error) {
		if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
			logger?.info('Catalog', 'No catalog found, continuing without one', {
				catalogPath,
			});
			return CatalogStore.empty();
		}
		throw new CatalogLoadError(catalogPath, errorMessage(error), {
			cause: error,
		});
	}

	let result: {entries: CatalogEntry[]; skipped: number};
	try {
		result = parseCatalogDocument(JSON.parse(content));
	} catch (error) {
		throw new CatalogLoadError(catalogPath, errorMessage(error), {
			cause: error,
		});
	}

	logger?.info('Catalog', 'Loaded catalog', {
		catalogPath,
		entries: result.entries.length,
		skipped: result.skipped,
	});
	return new CatalogStore(result.entries);
}
