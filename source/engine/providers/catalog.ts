/**
 * CatalogProvider - Substring search over the offline package catalog.
 */

import type {CatalogStore} from '../catalog/store.js';
import {
	catalogDisplayName,
	catalogSearchableTerms,
	type CatalogEntry,
} from '../catalog/types.js';
import type {SearchQuery} from '../search/query.js';
import type {ProviderResult, SearchProvider} from '../search/types.js';

export const CATALOG_SCORE = {
	primaryExact: 1000,
	nameExact: 950,
	primaryPrefix: 900,
	namePrefix: 850,
	primaryContains: 800,
	nameContains: 750,
	description: 500,
	fallback: 100,
} as const;

export const DEFAULT_DEPRECATION_PENALTY = 200;

export function catalogEntryMatches(entry: CatalogEntry, lowercasedQuery: string): boolean {
	return catalogSearchableTerms(entry).some(term =>
		term.toLowerCase().includes(lowercasedQuery),
	);
}

/**
 * Relevance of an entry. The display name and token are checked first, then
 * every name variant, then the description.
 */
export function scoreCatalogEntry(entry: CatalogEntry, lowercasedQuery: string): number {
	const display = catalogDisplayName(entry).toLowerCase();
	const token = entry.token.toLowerCase();

	if (display === lowercasedQuery || token === lowercasedQuery) {
		return CATALOG_SCORE.primaryExact;
	}
	if (display.startsWith(lowercasedQuery) || token.startsWith(lowercasedQuery)) {
		return CATALOG_SCORE.primaryPrefix;
	}
	if (display.includes(lowercasedQuery) || token.includes(lowercasedQuery)) {
		return CATALOG_SCORE.primaryContains;
	}

	for (const name of entry.displayNames) {
		const lower = name.toLowerCase();
		if (lower === lowercasedQuery) return CATALOG_SCORE.nameExact;
		if (lower.startsWith(lowercasedQuery)) return CATALOG_SCORE.namePrefix;
		if (lower.includes(lowercasedQuery)) return CATALOG_SCORE.nameContains;
	}

	if (entry.description?.toLowerCase().includes(lowercasedQuery)) {
		return CATALOG_SCORE.description;
	}
	return CATALOG_SCORE.fallback;
}

export function applyDeprecationPenalty(
	entry: CatalogEntry,
	score: number,
	penalty: number = DEFAULT_DEPRECATION_PENALTY,
): number {
	if (!entry.deprecated) return score;
	return Math.max(score - penalty, 0);
}

export interface CatalogProviderOptions {
	deprecationPenalty?: number;
}

export class CatalogProvider implements SearchProvider {
	readonly source = 'catalog' as const;
	private readonly penalty: number;

	constructor(
		private readonly catalog: CatalogStore,
		options: CatalogProviderOptions = {},
	) {
		this.penalty = options.deprecationPenalty ?? DEFAULT_DEPRECATION_PENALTY;
	}

	async search(query: SearchQuery): Promise<ProviderResult[]> {
		if (query.isEmpty) return [];

		const lower = query.lowercased;
		const results: ProviderResult[] = [];
		for (const entry of this.catalog.entries) {
			if (!catalogEntryMatches(entry, lower)) continue;

			const score = applyDeprecationPenalty(
				entry,
				scoreCatalogEntry(entry, lower),
				this.penalty,
			);
			if (score <= 0) continue;

			results.push({source: 'catalog', result: {kind: 'catalog', entry}, score});
		}
		return results;
	}
}
