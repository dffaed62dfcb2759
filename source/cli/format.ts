/**
 * Terminal formatting for search results and history.
 */

import chalk from 'chalk';
import type {HistoryEntry} from '../engine/history/types.js';
import {
	displayName,
	primaryAction,
	subtitleFor,
	type PrimaryAction,
	type PresentationOptions,
} from '../engine/search/results.js';
import type {SearchResult, SearchResultKind} from '../engine/search/types.js';

/**
 * Color mapping for result kinds.
 */
const KIND_COLORS: Record<SearchResultKind, (s: string) => string> = {
	installed: chalk.green,
	catalog: chalk.magenta,
	history: chalk.cyan,
	url: chalk.blue,
	filesystem: chalk.yellow,
};

export interface ResultFormatOptions extends PresentationOptions {
	query: string;
	elapsedMs: number;
	/** Ranking score per result, shown when provided */
	scoreFor?: (result: SearchResult) => number | undefined;
}

export function describeAction(action: PrimaryAction): string {
	switch (action.type) {
		case 'launch':
			return `launch ${action.bundleId ?? action.path ?? action.name}`;
		case 'open-homepage':
			return action.homepage ? `open ${action.homepage}` : `open ${action.token}`;
		case 'open-url':
			return `open ${action.url}`;
		case 'open-file':
			return `open ${action.path}`;
		case 'browse-directory':
			return `browse ${action.path}`;
		case 'rerun':
			return `run ${action.command}`;
	}
}

/**
 * Format ranked results for display with colors.
 */
export function formatResults(
	results: SearchResult[],
	options: ResultFormatOptions,
): string {
	if (results.length === 0) {
		return chalk.dim(
			`No results found for "${options.query}" (${options.elapsedMs}ms)`,
		);
	}

	const lines = [
		chalk.bold(`Found ${results.length} results for `) +
			chalk.cyan(`"${options.query}"`) +
			chalk.dim(` (${options.elapsedMs}ms):`),
		'',
	];

	for (const result of results) {
		const badge = KIND_COLORS[result.kind](`[${result.kind}]`);
		const score = options.scoreFor?.(result);
		lines.push(
			`${badge} ${chalk.white(displayName(result))}` +
				(score === undefined ? '' : chalk.dim(` (${score})`)),
		);

		const subtitle = subtitleFor(result, options);
		if (subtitle) lines.push(chalk.dim(`  ${subtitle}`));
	}

	return lines.join('\n');
}

export interface ResultRecord {
	kind: SearchResultKind;
	name: string;
	subtitle?: string;
	action: PrimaryAction;
	score?: number;
}

/**
 * Plain records for `--json` output.
 */
export function toResultRecords(
	results: SearchResult[],
	options: Omit<ResultFormatOptions, 'query' | 'elapsedMs'> = {},
): ResultRecord[] {
	return results.map(result => {
		const record: ResultRecord = {
			kind: result.kind,
			name: displayName(result),
			action: primaryAction(result),
		};
		const subtitle = subtitleFor(result, options);
		if (subtitle) record.subtitle = subtitle;
		const score = options.scoreFor?.(result);
		if (score !== undefined) record.score = score;
		return record;
	});
}

/**
 * Numbered list of history entries, most recent first.
 */
export function formatHistory(entries: HistoryEntry[]): string {
	if (entries.length === 0) {
		return chalk.dim('No command history yet.');
	}

	return entries
		.map((entry, index) => {
			const rank = chalk.dim(`${String(index + 1).padStart(2)}.`);
			const shown =
				entry.display && entry.display !== entry.command
					? `${entry.command} ${chalk.dim(`→ ${entry.display}`)}`
					: entry.command;
			return `${rank} ${shown}`;
		})
		.join('\n');
}
