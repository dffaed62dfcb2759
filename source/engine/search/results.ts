/**
 * Per-variant behaviour of search results.
 */

import os from 'node:os';
import path from 'node:path';
import {catalogDisplayName} from '../catalog/types.js';
import type {HistoryTarget} from '../history/types.js';
import type {SearchResult} from './types.js';

// ============================================================================
// Identity
// ============================================================================

/**
 * Name shown for a result row.
 */
export function displayName(result: SearchResult): string {
	switch (result.kind) {
		case 'installed':
			return result.name;
		case 'catalog':
			return catalogDisplayName(result.entry);
		case 'history':
			return result.display ?? result.command;
		case 'url':
			return result.url;
		case 'filesystem': {
			if (result.displayOverride) return result.displayOverride;
			let name = path.basename(result.path);
			if (!name) name = result.path;
			if (result.isDirectory && !name.endsWith('/')) {
				return `${name}/`;
			}
			return name;
		}
	}
}

/**
 * Canonical key deciding whether two results are the same real-world entity.
 */
export function identityKey(result: SearchResult): string {
	switch (result.kind) {
		case 'installed':
			if (result.bundleId) return result.bundleId.toLowerCase();
			if (result.path) return result.path.toLowerCase();
			return result.name.toLowerCase();
		case 'catalog':
			return catalogDisplayName(result.entry).toLowerCase();
		case 'history':
			return result.command.toLowerCase();
		case 'url':
			return result.url.toLowerCase();
		case 'filesystem':
			return result.path.toLowerCase();
	}
}

export function isHistory(result: SearchResult): boolean {
	return result.kind === 'history';
}

// ============================================================================
// Presentation
// ============================================================================

export interface PresentationOptions {
	/** Home directory abbreviated to `~` in paths (default: os.homedir()) */
	homeDir?: string;
}

/**
 * Trim a subtitle component and collapse newlines. Blank text yields undefined.
 */
export function sanitizeSubtitle(text: string | undefined): string | undefined {
	if (text === undefined) return undefined;
	const trimmed = text.trim();
	if (!trimmed) return undefined;
	return trimmed.replace(/\r?\n/g, ' ');
}

function abbreviateHome(text: string, homeDir: string): string {
	if (!homeDir) return text;
	return text.split(homeDir).join('~');
}

/**
 * Secondary line for a result row.
 */
export function subtitleFor(
	result: SearchResult,
	options: PresentationOptions = {},
): string | undefined {
	const homeDir = options.homeDir ?? os.homedir();

	switch (result.kind) {
		case 'installed': {
			const location = sanitizeSubtitle(result.path);
			const shownPath =
				location === undefined ? undefined : abbreviateHome(location, homeDir);
			const description = sanitizeSubtitle(result.description);
			if (shownPath && description) return `${shownPath} — ${description}`;
			return shownPath ?? description;
		}
		case 'catalog':
			return (
				sanitizeSubtitle(result.entry.description) ??
				sanitizeSubtitle(result.entry.homepage)
			);
		case 'history':
			return (
				sanitizeSubtitle(result.subtitle) ??
				(result.resolved ? subtitleFor(result.resolved, options) : undefined)
			);
		case 'url':
			return 'Opens in default browser';
		case 'filesystem':
			return 'Opens in file manager';
	}
}

/**
 * What activating a result would do. Executing it is the caller's concern.
 */
export type PrimaryAction =
	| {type: 'launch'; name: string; path?: string; bundleId?: string}
	| {type: 'open-homepage'; token: string; homepage?: string}
	| {type: 'open-url'; url: string}
	| {type: 'open-file'; path: string}
	| {type: 'browse-directory'; path: string}
	| {type: 'rerun'; command: string};

export function primaryAction(result: SearchResult): PrimaryAction {
	switch (result.kind) {
		case 'installed':
			return {
				type: 'launch',
				name: result.name,
				path: result.path,
				bundleId: result.bundleId,
			};
		case 'catalog':
			return {
				type: 'open-homepage',
				token: result.entry.token,
				homepage: result.entry.homepage,
			};
		case 'history':
			if (result.resolved) return primaryAction(result.resolved);
			return {type: 'rerun', command: result.command};
		case 'url':
			return {type: 'open-url', url: result.url};
		case 'filesystem':
			return result.isDirectory
				? {type: 'browse-directory', path: result.path}
				: {type: 'open-file', path: result.path};
	}
}

/**
 * Reference to store in history when a result is launched successfully.
 * History rows store their own target (or none) so re-running keeps it.
 */
export function historyTargetFor(
	result: SearchResult,
): HistoryTarget | undefined {
	switch (result.kind) {
		case 'installed':
			return {
				kind: 'installed',
				name: result.name,
				path: result.path,
				bundleId: result.bundleId,
			};
		case 'catalog':
			return {kind: 'catalog', token: result.entry.token};
		case 'history':
			return result.target;
		case 'url':
			return {kind: 'url', url: result.url};
		case 'filesystem':
			return {
				kind: 'filesystem',
				path: result.path,
				isDirectory: result.isDirectory,
			};
	}
}
