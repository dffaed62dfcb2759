/**
 * Launcher - Composition root and inbound API of the search engine.
 *
 * Loads configuration, the catalog and command history, builds the program
 * index, providers and classifier, and wires them into a SearchConductor.
 */

import os from 'node:os';
import {loadCatalog} from './catalog/loader.js';
import {CatalogStore} from './catalog/store.js';
import {QueryClassifier} from './classify/classifier.js';
import {
	SearchConductor,
	type DeliveryScheduler,
	type ScoreObserver,
	type SearchCompletion,
	type SearchOutcome,
} from './conductor.js';
import {JsonFileHistoryPersistence} from './history/persistence.js';
import {HistoryStore} from './history/store.js';
import {HistoryTargetResolver} from './history/targets.js';
import type {HistoryEntry, HistoryPersistence, RecordOptions} from './history/types.js';
import {loadConfig, resolveCatalogPath, type RunwayConfig} from './lib/config.js';
import {getDefaultProgramRoots} from './lib/constants.js';
import {errorMessage} from './lib/errors.js';
import {createNullLogger, type Logger} from './lib/logger.js';
import {FileSystemProgramIndex, type ProgramIndex} from './programs/program-index.js';
import {CatalogProvider} from './providers/catalog.js';
import {HistoryProvider} from './providers/history.js';
import {InstalledProgramsProvider} from './providers/installed.js';
import {displayName, historyTargetFor} from './search/results.js';
import type {SearchProvider, SearchResult} from './search/types.js';

export interface LauncherOptions {
	/** Resolved configuration; loaded from `configPath` when omitted */
	config?: RunwayConfig;
	configPath?: string;
	/** Prebuilt catalog; loaded from the configured path when omitted */
	catalog?: CatalogStore;
	programIndex?: ProgramIndex;
	historyPersistence?: HistoryPersistence;
	homeDir?: string;
	/** Directory relative path queries resolve against */
	baseDir?: string;
	deliver?: DeliveryScheduler;
	onScores?: ScoreObserver;
	logger?: Logger;
}

export class Launcher {
	constructor(
		readonly config: RunwayConfig,
		readonly catalog: CatalogStore,
		readonly history: HistoryStore,
		readonly conductor: SearchConductor,
		private readonly logger: Logger,
	) {}

	search(raw: string, completion?: SearchCompletion): Promise<SearchOutcome> {
		return this.conductor.search(raw, completion);
	}

	/**
	 * Run a search and return its ranked results.
	 * Resolves to an empty list if a newer search superseded this one.
	 */
	async searchOnce(raw: string): Promise<SearchResult[]> {
		const outcome = await this.conductor.search(raw);
		return outcome.status === 'delivered' ? outcome.results : [];
	}

	/**
	 * Remember a command that launched successfully.
	 */
	recordSuccess(command: string, options: RecordOptions = {}): void {
		this.history.record(command, options);
		this.logger.debug('Launcher', 'Recorded command', {command: command.trim()});
	}

	/**
	 * Remember a launched result under the text the user typed.
	 */
	recordResult(result: SearchResult, command: string = displayName(result)): void {
		const options: RecordOptions = {};
		const target = historyTargetFor(result);
		if (target) options.target = target;
		const display = result.kind === 'history' ? result.display : displayName(result);
		if (display) options.display = display;
		this.recordSuccess(command, options);
	}

	removeHistoryEntry(command: string): boolean {
		return this.history.remove(command);
	}

	bestCompletion(prefix: string): string | undefined {
		return this.history.bestCompletion(prefix);
	}

	completions(prefix: string, limit?: number): string[] {
		return this.history.completions(prefix, limit);
	}

	recentEntries(limit: number = this.config.history.recentLimit): HistoryEntry[] {
		return this.history.recentEntries(limit);
	}

	/**
	 * Invalidate pending searches and wait for history writes.
	 */
	async close(): Promise<void> {
		this.conductor.cancel();
		await this.history.flush();
	}
}

async function loadCatalogOrEmpty(config: RunwayConfig, logger: Logger): Promise<CatalogStore> {
	try {
		return await loadCatalog(resolveCatalogPath(config), logger);
	} catch (error) {
		logger.error(
			'Launcher',
			`Continuing without catalog: ${errorMessage(error)}`,
			error instanceof Error ? error : undefined,
		);
		return CatalogStore.empty();
	}
}

/**
 * Build a launcher from configuration on disk and the given overrides.
 *
 * Throws ConfigError if config.json exists but is invalid.
 */
export async function createLauncher(options: LauncherOptions = {}): Promise<Launcher> {
	const logger = options.logger ?? createNullLogger();
	const config = options.config ?? (await loadConfig(options.configPath));
	const homeDir = options.homeDir ?? os.homedir();

	const catalog = options.catalog ?? (await loadCatalogOrEmpty(config, logger));

	const persistence =
		options.historyPersistence ?? new JsonFileHistoryPersistence(undefined, logger);
	const history = await HistoryStore.load({
		persistence,
		maxEntries: config.history.maxEntries,
		logger,
	});
	const resolver = new HistoryTargetResolver(catalog);

	const roots =
		config.installed.searchRoots.length > 0
			? config.installed.searchRoots
			: getDefaultProgramRoots(process.platform, homeDir);
	const programIndex =
		options.programIndex ??
		new FileSystemProgramIndex({
			roots,
			maxDepth: config.installed.maxDepth,
			refreshIntervalMs: config.installed.refreshIntervalMs,
			logger,
		});

	const providers: SearchProvider[] = [
		new InstalledProgramsProvider({
			index: programIndex,
			catalog,
			metadataLimit: config.installed.metadataLimit,
			minSystemQueryLength: config.installed.minSystemQueryLength,
			queryConcurrency: config.installed.queryConcurrency,
			homeDir,
			logger,
		}),
		new HistoryProvider(history, resolver, {
			scoring: config.history,
			deprecationPenalty: config.catalog.deprecationPenalty,
		}),
		new CatalogProvider(catalog, {
			deprecationPenalty: config.catalog.deprecationPenalty,
		}),
	];

	const classifier = config.classifier.enabled
		? new QueryClassifier({
				homeDir,
				baseDir: options.baseDir,
				maxListing: config.classifier.maxListing,
				logger,
			})
		: undefined;

	const conductor = new SearchConductor({
		providers,
		history,
		resolver,
		classifier,
		recentLimit: config.history.recentLimit,
		providerTimeoutMs: config.providerTimeoutMs,
		deliver: options.deliver,
		onScores: options.onScores,
		logger,
	});

	logger.info('Launcher', 'Launcher ready', {
		catalogEntries: catalog.size,
		historyEntries: history.size,
		programRoots: options.programIndex ? 0 : roots.length,
	});

	return new Launcher(config, catalog, history, conductor, logger);
}
