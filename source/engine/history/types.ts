/**
 * History types.
 */

/**
 * What a remembered command originally resolved to.
 *
 * Stored alongside the command so a history row can be re-resolved into the
 * concrete result it launched instead of replaying a bare string.
 */
export type HistoryTarget =
	| {kind: 'catalog'; token: string}
	| {kind: 'installed'; name: string; path?: string; bundleId?: string}
	| {kind: 'url'; url: string}
	| {kind: 'filesystem'; path: string; isDirectory: boolean};

export interface HistoryEntry {
	/** The text the user ran, trimmed */
	command: string;
	/** Name of what the command launched, if different from the command */
	display?: string;
	subtitle?: string;
	target?: HistoryTarget;
}

export interface HistoryMatch {
	entry: HistoryEntry;
	score: number;
}

/**
 * Ordered load/save of the entry list, most recent first.
 */
export interface HistoryPersistence {
	load(): Promise<HistoryEntry[]>;
	save(entries: readonly HistoryEntry[]): Promise<void>;
}

export interface RecordOptions {
	display?: string;
	subtitle?: string;
	target?: HistoryTarget;
}
