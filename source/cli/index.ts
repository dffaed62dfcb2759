#!/usr/bin/env node
import os from 'node:os';
import chalk from 'chalk';
import meow from 'meow';
import {createScoreRecorder} from '../engine/conductor.js';
import {createLauncher} from '../engine/launcher.js';
import {DEFAULT_CONFIG, loadConfig, saveConfig} from '../engine/lib/config.js';
import {getConfigPath} from '../engine/lib/constants.js';
import {errorMessage} from '../engine/lib/errors.js';
import {createServiceLogger} from '../engine/lib/logger.js';
import {primaryAction} from '../engine/search/results.js';
import {
	describeAction,
	formatHistory,
	formatResults,
	toResultRecords,
} from './format.js';

const cli = meow(
	`
	Usage
	  $ runway <query>

	Options
	  --recent              Show recently launched commands
	  --complete <prefix>   Show history completions for a prefix
	  --record <command>    Remember a command as successfully launched
	  --display <name>      Display name stored with --record
	  --forget <command>    Remove a command from history
	  --catalog <path>      Catalog JSON to search instead of the configured one
	  --limit <n>           Maximum results shown (default: 20)
	  --json                Print results as JSON
	  --debug-scores        Show ranking scores
	  --init                Write the default config file
	  --help                Show help
	  --version             Show version

	Examples
	  $ runway code
	  $ runway --record "visual studio code" --display "Visual Studio Code"
`,
	{
		importMeta: import.meta,
		flags: {
			recent: {type: 'boolean', default: false},
			complete: {type: 'string'},
			record: {type: 'string'},
			display: {type: 'string'},
			forget: {type: 'string'},
			catalog: {type: 'string'},
			limit: {type: 'number', default: 20},
			json: {type: 'boolean', default: false},
			debugScores: {type: 'boolean', default: false},
			init: {type: 'boolean', default: false},
		},
	},
);

const logger = createServiceLogger('cli');

async function main(): Promise<void> {
	const {flags} = cli;

	if (flags.init) {
		const configPath = getConfigPath();
		await saveConfig(DEFAULT_CONFIG, configPath);
		console.log(`Wrote default config to ${configPath}`);
		return;
	}

	const config = await loadConfig();
	if (flags.catalog) {
		config.catalog = {...config.catalog, path: flags.catalog};
	}

	const recorder = createScoreRecorder();
	const launcher = await createLauncher({
		config,
		logger,
		onScores: flags.debugScores ? recorder.observer : undefined,
	});

	try {
		if (flags.record !== undefined) {
			launcher.recordSuccess(flags.record, {display: flags.display});
			console.log(`Remembered ${chalk.cyan(flags.record.trim())}`);
			return;
		}

		if (flags.forget !== undefined) {
			const removed = launcher.removeHistoryEntry(flags.forget);
			console.log(
				removed
					? `Forgot ${chalk.cyan(flags.forget.trim())}`
					: chalk.dim(`"${flags.forget}" is not in history`),
			);
			return;
		}

		if (flags.complete !== undefined) {
			const completions = launcher.completions(flags.complete);
			console.log(
				completions.length > 0
					? completions.join('\n')
					: chalk.dim(`No completions for "${flags.complete}"`),
			);
			return;
		}

		if (flags.recent) {
			console.log(formatHistory(launcher.recentEntries()));
			return;
		}

		const query = cli.input.join(' ');
		const start = Date.now();
		const results = (await launcher.searchOnce(query)).slice(0, flags.limit);
		const elapsedMs = Date.now() - start;
		const scoreFor = flags.debugScores ? recorder.scoreFor : undefined;

		if (flags.json) {
			console.log(JSON.stringify(toResultRecords(results, {scoreFor}), null, 2));
			return;
		}

		console.log(
			formatResults(results, {query, elapsedMs, scoreFor, homeDir: os.homedir()}),
		);
		const [top] = results;
		if (top) {
			console.log(chalk.dim(`\n↵ ${describeAction(primaryAction(top))}`));
		}
	} finally {
		await launcher.close();
	}
}

main().catch((error: unknown) => {
	logger.error('cli', 'Command failed', error instanceof Error ? error : undefined);
	console.error(chalk.red(`Error: ${errorMessage(error)}`));
	process.exitCode = 1;
});
