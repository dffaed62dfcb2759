/**
 * Runway search engine - public API.
 */

// Launcher
export {createLauncher, Launcher, type LauncherOptions} from './launcher.js';

// Conductor
export {
	SearchConductor,
	rerank,
	pinResults,
	priorityFor,
	createScoreRecorder,
	DEFAULT_RECENT_LIMIT,
	type ConductorOptions,
	type DeliveryScheduler,
	type QueryClassification,
	type RankedResults,
	type ScoreObserver,
	type ScoreRecorder,
	type SearchCompletion,
	type SearchOutcome,
} from './conductor.js';

// Search model
export {SearchQuery} from './search/query.js';
export {
	displayName,
	identityKey,
	isHistory,
	subtitleFor,
	sanitizeSubtitle,
	primaryAction,
	historyTargetFor,
	type PresentationOptions,
	type PrimaryAction,
} from './search/results.js';
export type {
	SearchResult,
	SearchResultKind,
	SearchSource,
	SearchProvider,
	ProviderResult,
	ProviderContext,
	InstalledProgramResult,
	CatalogEntryResult,
	HistoryCommandResult,
	UrlTargetResult,
	FileSystemEntryResult,
} from './search/types.js';
export {
	wildcardPattern,
	wildcardToRegExp,
	matchesWildcard,
	foldForMatching,
	tokenize,
	isEditDistanceLeOne,
} from './search/fuzzy.js';

// Catalog
export {CatalogStore} from './catalog/store.js';
export {loadCatalog, parseCatalogDocument, parseCatalogEntry} from './catalog/loader.js';
export {catalogDisplayName, type CatalogEntry} from './catalog/types.js';

// History
export {HistoryStore, type HistoryStoreOptions} from './history/store.js';
export {JsonFileHistoryPersistence} from './history/persistence.js';
export {HistoryTargetResolver} from './history/targets.js';
export {fuzzyScore, HISTORY_SCORE} from './history/scoring.js';
export type {
	HistoryEntry,
	HistoryMatch,
	HistoryPersistence,
	HistoryTarget,
	RecordOptions,
} from './history/types.js';

// Programs
export {
	FileSystemProgramIndex,
	StaticProgramIndex,
	type ProgramIndex,
	type ProgramRecord,
	type ProgramQueryOptions,
} from './programs/program-index.js';
export {parseDesktopEntry, type DesktopEntry} from './programs/desktop-entry.js';

// Providers
export {InstalledProgramsProvider} from './providers/installed.js';
export {CatalogProvider} from './providers/catalog.js';
export {HistoryProvider} from './providers/history.js';

// Classification
export {QueryClassifier, detectUrl, looksLikePath} from './classify/classifier.js';

// Configuration, errors, logging
export {
	loadConfig,
	saveConfig,
	resolveConfig,
	DEFAULT_CONFIG,
	type RunwayConfig,
} from './lib/config.js';
export {ConfigError, CatalogLoadError, HistoryPersistenceError} from './lib/errors.js';
export {createServiceLogger, createNullLogger, type Logger} from './lib/logger.js';
