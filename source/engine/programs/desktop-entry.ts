/**
 * Parser for freedesktop `.desktop` launcher files.
 */

export interface DesktopEntry {
	name: string;
	/** Exec line with field codes removed */
	exec: string;
	icon?: string;
	comment?: string;
}

const SECTION_HEADER = '[Desktop Entry]';

function valueOf(line: string, key: string): string | undefined {
	if (!line.startsWith(`${key}=`)) return undefined;
	return line.slice(key.length + 1).trim();
}

/**
 * Remove %-field codes and Flatpak `@@u ... @@` markers from an Exec line.
 */
export function stripFieldCodes(exec: string): string {
	return exec
		.replace(/@@[uUnN]?\s*(%[fFuU])?\s*@@/g, '')
		.replace(/%[fFuUdDnNickvm]/g, '')
		.replace(/\s+/g, ' ')
		.trim();
}

/**
 * Parse the `[Desktop Entry]` group of a desktop file.
 *
 * Returns null for hidden entries (`NoDisplay=true` or `Hidden=true`) and for
 * entries without a Name or Exec. Localized keys such as `Name[de]` are
 * ignored.
 */
export function parseDesktopEntry(content: string): DesktopEntry | null {
	let inEntry = false;
	let name = '';
	let exec = '';
	let icon = '';
	let comment = '';
	let hidden = false;

	for (const line of content.split(/\r?\n/)) {
		const trimmed = line.trim();
		if (trimmed === SECTION_HEADER) {
			inEntry = true;
			continue;
		}
		if (!inEntry || trimmed.startsWith('#')) continue;
		if (trimmed.startsWith('[')) break;

		name = valueOf(trimmed, 'Name') ?? name;
		exec = valueOf(trimmed, 'Exec') ?? exec;
		icon = valueOf(trimmed, 'Icon') ?? icon;
		comment = valueOf(trimmed, 'Comment') ?? comment;

		const flag = valueOf(trimmed, 'NoDisplay') ?? valueOf(trimmed, 'Hidden');
		if (flag?.toLowerCase() === 'true') hidden = true;
	}

	if (hidden || !name || !exec) return null;

	const entry: DesktopEntry = {name, exec: stripFieldCodes(exec)};
	if (icon) entry.icon = icon;
	if (comment) entry.comment = comment;
	return entry;
}
