/**
 * Re-resolve stored history targets into concrete search results.
 */

import type {CatalogStore} from '../catalog/store.js';
import type {
	HistoryCommandResult,
	InstalledProgramResult,
	SearchResult,
} from '../search/types.js';
import type {HistoryEntry, HistoryTarget} from './types.js';

export class HistoryTargetResolver {
	constructor(private readonly catalog: CatalogStore) {}

	/**
	 * The result a target stands for today. Catalog targets whose package has
	 * left the catalog no longer resolve.
	 */
	resolve(target: HistoryTarget | undefined): SearchResult | undefined {
		if (!target) return undefined;

		switch (target.kind) {
			case 'catalog': {
				const entry = this.catalog.lookupByNameOrToken(target.token);
				return entry ? {kind: 'catalog', entry} : undefined;
			}
			case 'installed': {
				const catalogRef = this.catalog.lookupByNameOrToken(target.name);
				const result: InstalledProgramResult = {kind: 'installed', name: target.name};
				if (target.path) result.path = target.path;
				if (target.bundleId) result.bundleId = target.bundleId;
				if (catalogRef) {
					result.catalogRef = catalogRef;
					if (catalogRef.description) result.description = catalogRef.description;
				}
				return result;
			}
			case 'url':
				return {kind: 'url', url: target.url};
			case 'filesystem':
				return {
					kind: 'filesystem',
					path: target.path,
					isDirectory: target.isDirectory,
				};
		}
	}

	/**
	 * Build the result row for a history entry.
	 */
	toResult(entry: HistoryEntry, isRecent: boolean): HistoryCommandResult {
		const result: HistoryCommandResult = {
			kind: 'history',
			command: entry.command,
			isRecent,
		};
		if (entry.display) result.display = entry.display;
		if (entry.subtitle) result.subtitle = entry.subtitle;
		if (entry.target) result.target = entry.target;

		const resolved = this.resolve(entry.target);
		if (resolved) result.resolved = resolved;
		return result;
	}
}
