/**
 * CatalogStore - Read-only, indexed view of the package catalog.
 *
 * Built once at startup and shared by reference. All lookups are
 * case-insensitive; on key collisions the entry loaded last wins.
 */

import {catalogDisplayName, type CatalogEntry} from './types.js';

export class CatalogStore {
	readonly entries: readonly CatalogEntry[];
	private readonly nameIndex = new Map<string, CatalogEntry>();
	private readonly tokenIndex = new Map<string, CatalogEntry>();
	private readonly filenameIndex = new Map<string, CatalogEntry>();

	constructor(entries: readonly CatalogEntry[]) {
		this.entries = entries;

		for (const entry of entries) {
			this.tokenIndex.set(entry.token.toLowerCase(), entry);
			this.nameIndex.set(catalogDisplayName(entry).toLowerCase(), entry);
			for (const name of entry.displayNames) {
				this.nameIndex.set(name.toLowerCase(), entry);
			}
			for (const filename of entry.providedProgramFilenames) {
				this.filenameIndex.set(filename.toLowerCase(), entry);
			}
		}
	}

	static empty(): CatalogStore {
		return new CatalogStore([]);
	}

	get size(): number {
		return this.entries.length;
	}

	/**
	 * Look up by any display name, then by token.
	 */
	lookupByNameOrToken(raw: string): CatalogEntry | undefined {
		const key = raw.toLowerCase();
		return this.nameIndex.get(key) ?? this.tokenIndex.get(key);
	}

	/**
	 * Look up by a provided program filename such as `Visual Studio Code.app`.
	 */
	lookupByProvidedFilename(filename: string): CatalogEntry | undefined {
		return this.filenameIndex.get(filename.toLowerCase());
	}
}
