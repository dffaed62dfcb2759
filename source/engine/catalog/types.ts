/**
 * Catalog types.
 *
 * The catalog is an offline list of installable packages. Each entry knows
 * which program bundles it provides so the conductor can hide packages that
 * are already installed.
 */

export interface CatalogEntry {
	/** Short package identifier, e.g. `visual-studio-code` */
	token: string;
	/** Fully qualified identifier, e.g. `homebrew/cask/visual-studio-code` */
	fullToken: string;
	/** Human-readable names; the first one is the display name */
	displayNames: string[];
	description?: string;
	homepage?: string;
	url?: string;
	version?: string;
	deprecated: boolean;
	/** Program bundle filenames installed by this package, e.g. `Foo.app` */
	providedProgramFilenames: string[];
}

/**
 * The name shown for a catalog entry.
 */
export function catalogDisplayName(entry: CatalogEntry): string {
	return entry.displayNames[0] ?? entry.token;
}

/**
 * Every string a query may match against, in scoring order.
 */
export function catalogSearchableTerms(entry: CatalogEntry): string[] {
	const terms = [...entry.displayNames, entry.token, entry.fullToken];
	if (entry.description) terms.push(entry.description);
	return terms;
}
