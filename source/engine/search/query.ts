/**
 * Immutable view of the user's input shared with every provider.
 */
export class SearchQuery {
	readonly raw: string;
	readonly trimmed: string;
	readonly lowercased: string;

	constructor(raw: string) {
		this.raw = raw;
		this.trimmed = raw.trim();
		this.lowercased = this.trimmed.toLowerCase();
	}

	get isEmpty(): boolean {
		return this.trimmed.length === 0;
	}
}
