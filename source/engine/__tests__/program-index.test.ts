import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import path from 'node:path';
import {parseDesktopEntry, stripFieldCodes} from '../programs/desktop-entry.js';
import {
	FileSystemProgramIndex,
	StaticProgramIndex,
} from '../programs/program-index.js';
import {createSpyLogger, createTempDir, writeFile, type TempDir} from './helpers.js';

const INFO_PLIST = `<?xml version="1.0" encoding="UTF-8"?>
<plist version="1.0">
<dict>
	<key>CFBundleIdentifier</key>
	<string>com.example.foo</string>
</dict>
</plist>
`;

function desktopFile(lines: string[]): string {
	return ['[Desktop Entry]', 'Type=Application', ...lines, ''].join('\n');
}

describe('stripFieldCodes', () => {
	it('removes field codes and flatpak markers', () => {
		expect(stripFieldCodes('editor %U')).toBe('editor');
		expect(stripFieldCodes('viewer --new %f --x')).toBe('viewer --new --x');
		expect(stripFieldCodes('flatpak run org.App @@u %U @@')).toBe(
			'flatpak run org.App',
		);
	});
});

describe('parseDesktopEntry', () => {
	it('reads the desktop entry group', () => {
		const content = [
			'# comment',
			'[Desktop Entry]',
			'Name=Text Editor',
			'Name[de]=Texteditor',
			'Exec=editor %F',
			'Icon=editor',
			'Comment=Edit text',
			'',
			'[Desktop Action new-window]',
			'Name=New Window',
			'Exec=editor --new-window',
		].join('\n');

		expect(parseDesktopEntry(content)).toEqual({
			name: 'Text Editor',
			exec: 'editor',
			icon: 'editor',
			comment: 'Edit text',
		});
	});

	it('returns null for hidden or incomplete entries', () => {
		expect(
			parseDesktopEntry(desktopFile(['Name=A', 'Exec=a', 'NoDisplay=true'])),
		).toBeNull();
		expect(
			parseDesktopEntry(desktopFile(['Name=A', 'Exec=a', 'Hidden=True'])),
		).toBeNull();
		expect(parseDesktopEntry(desktopFile(['Name=A']))).toBeNull();
		expect(parseDesktopEntry('Name=A\nExec=a\n')).toBeNull();
	});

	it('omits absent optional fields', () => {
		expect(parseDesktopEntry(desktopFile(['Name=A', 'Exec=a']))).toEqual({
			name: 'A',
			exec: 'a',
		});
	});
});

describe('FileSystemProgramIndex', () => {
	let temp: TempDir;
	let rootA: string;
	let rootB: string;
	let clock: number;
	let logger: ReturnType<typeof createSpyLogger>;

	beforeEach(async () => {
		temp = await createTempDir('runway-programs-test-');
		rootA = path.join(temp.root, 'a');
		rootB = path.join(temp.root, 'b');
		clock = 0;
		logger = createSpyLogger();

		await writeFile(rootA, 'Foo.app/Contents/Info.plist', INFO_PLIST);
		await writeFile(rootA, 'Bar.app/Contents/MacOS/bar', '');
		await writeFile(rootA, 'Tool.lnk', '');
		await writeFile(
			rootA,
			'editor.desktop',
			desktopFile(['Name=Text Editor', 'Exec=editor %U', 'Comment=Edit text']),
		);
		await writeFile(
			rootA,
			'secret.desktop',
			desktopFile(['Name=Secret', 'Exec=secret', 'NoDisplay=true']),
		);
		await writeFile(
			rootB,
			'editor.desktop',
			desktopFile(['Name=Shadowed Editor', 'Exec=other']),
		);
		await writeFile(rootB, 'viewer.desktop', desktopFile(['Name=Viewer', 'Exec=viewer']));
		await writeFile(rootB, 'broken.desktop/placeholder', '');
	});

	afterEach(async () => {
		await temp.cleanup();
	});

	function createIndex(refreshIntervalMs = 1000) {
		return new FileSystemProgramIndex({
			roots: [rootA, rootB, path.join(temp.root, 'missing')],
			maxDepth: 4,
			refreshIntervalMs,
			logger,
			now: () => clock,
		});
	}

	it('indexes bundles, desktop entries and shortcuts in root order', async () => {
		const records = await createIndex().query('*', {limit: 20});

		expect(records).toEqual([
			{
				name: 'Bar',
				path: path.join(rootA, 'Bar.app'),
			},
			{
				name: 'Foo',
				path: path.join(rootA, 'Foo.app'),
				bundleId: 'com.example.foo',
			},
			{name: 'Tool', path: path.join(rootA, 'Tool.lnk')},
			{
				name: 'Text Editor',
				path: path.join(rootA, 'editor.desktop'),
				bundleId: 'editor',
				description: 'Edit text',
			},
			{
				name: 'Viewer',
				path: path.join(rootB, 'viewer.desktop'),
				bundleId: 'viewer',
			},
		]);
		expect(logger.debug).toHaveBeenCalledWith(
			'ProgramIndex',
			'Skipped unreadable entry',
			expect.objectContaining({path: path.join(rootB, 'broken.desktop')}),
		);
	});

	it('matches wildcards against names and filenames', async () => {
		const index = createIndex();

		const byName = await index.query('*EDIT*', {limit: 20});
		const byFilename = await index.query('*.lnk', {limit: 20});
		const limited = await index.query('*', {limit: 2});

		expect(byName.map(record => record.name)).toEqual(['Text Editor']);
		expect(byFilename.map(record => record.name)).toEqual(['Tool']);
		expect(limited.map(record => record.name)).toEqual(['Bar', 'Foo']);
	});

	it('reuses a fresh scan and rescans once it goes stale', async () => {
		const index = createIndex(1000);
		await index.query('*', {limit: 20});

		await writeFile(rootA, 'New.app/Contents/MacOS/new', '');
		clock = 500;
		const cached = await index.query('new', {limit: 20});
		clock = 1500;
		const rescanned = await index.query('new', {limit: 20});

		expect(cached).toEqual([]);
		expect(rescanned).toEqual([{name: 'New', path: path.join(rootA, 'New.app')}]);
		expect(logger.info).toHaveBeenCalledTimes(2);
	});

	it('shares one scan between concurrent refreshes', async () => {
		const index = createIndex();

		const [first, second] = await Promise.all([index.refresh(), index.refresh()]);

		expect(first).toBe(second);
		expect(logger.info).toHaveBeenCalledTimes(1);
	});

	it('rejects queries whose signal is already aborted', async () => {
		const controller = new AbortController();
		controller.abort('superseded');

		await expect(
			createIndex().query('*', {limit: 20, signal: controller.signal}),
		).rejects.toMatchObject({
			name: 'AbortError',
			message: 'Program index query: superseded',
		});
		expect(logger.info).not.toHaveBeenCalled();
	});
});

describe('StaticProgramIndex', () => {
	it('filters fixed records with the wildcard', async () => {
		const index = new StaticProgramIndex([
			{name: 'Calculator', path: '/Apps/Calculator.app'},
			{name: 'Calendar'},
			{name: 'Notes', path: '/Apps/Notes.app'},
		]);

		const matches = await index.query('*c*l*', {limit: 5});
		const byFilename = await index.query('notes.app', {limit: 5});

		expect(matches.map(record => record.name)).toEqual(['Calculator', 'Calendar']);
		expect(byFilename.map(record => record.name)).toEqual(['Notes']);
	});
});
