export * from "./types";
export {
	AnalysisError,
	HistoryReadError,
	InvalidInputShapeError,
	InvalidSettingsError,
} from "./errors";
export type { AnalysisErrorCode } from "./errors";
export {
	AnalysisSettingsSchema,
	DEFAULT_PRODUCTIVITY_WEIGHTS,
	DEFAULT_SETTINGS,
	parseSettings,
	resolveSettings,
} from "./settings/types";
export type { AnalysisSettings } from "./settings/types";
export { setDebugEnabled } from "./log";

export { decodeTimestamp, normalizeRows, parseDomain, registrableDomain } from "./collect/normalize";
export type { NormalizeOptions } from "./collect/normalize";
export { HISTORY_DATABASE_KINDS, querySqlite, readBrowserHistory } from "./collect/browser";
export type { HistoryDatabaseKind, QueryFn, ReadHistoryOptions } from "./collect/browser";

export {
	CATEGORY_RULES,
	categorizeDomain,
	categorizeEntries,
	categorizeEntry,
	dominantCategory,
	subcategoryOf,
} from "./filter/categorize";
export { searchHistory } from "./filter/search";

export { buildSessions, groupByGap } from "./analyze/sessions";
export { computeDomainStats, findRepeatVisits, summarizeCounts } from "./analyze/frequency";
export { findLearningPaths, findTopicTracks } from "./analyze/learning";
export { bucketOf, scoreProductivity } from "./analyze/productivity";
export type { ProductivityWeights } from "./analyze/productivity";
export { buildReportHelpers, summarizeSessions } from "./analyze/insights";
export { analyzeHistory, DEPTH_STAGES } from "./analyze/report";
export type { AnalysisStage } from "./analyze/report";
