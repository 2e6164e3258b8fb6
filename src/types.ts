// ── Raw input ────────────────────────────────────────────

/**
 * How a row's timestamp is encoded.
 *
 * - chromium: microseconds since 1601-01-01 UTC (Chrome, Edge, Brave, …)
 * - firefox:  microseconds since the Unix epoch (places.sqlite)
 * - safari:   seconds since 2001-01-01 UTC (History.db)
 * - unix_s / unix_ms: Unix epoch in seconds / milliseconds
 * - iso:      ISO-8601 string; no zone designator means UTC
 */
export const TIMESTAMP_SOURCES = [
	"chromium", "firefox", "safari", "unix_s", "unix_ms", "iso",
] as const;

export type TimestampSource = typeof TIMESTAMP_SOURCES[number];

/**
 * One row as handed over by whatever extracted it from browser storage.
 * Only `url` and `timestamp` are load-bearing; everything is checked at runtime
 * because rows usually come from JSON or SQLite.
 */
export interface RawHistoryRow {
	url: string;
	title?: string | null;
	timestamp: number | string | Date;
	visit_count?: number | null;
	/** Omit to let the normalizer infer the encoding from the value. */
	source?: TimestampSource;
}

// ── Normalized entries ───────────────────────────────────

export interface HistoryEntry {
	readonly url: string;
	readonly title: string;
	readonly visitedAt: Date;
	readonly visitCount: number;
	/** Registrable domain, lowercased. "" when the URL is not a parsable web URL. */
	readonly domain: string;
	/** Full hostname without a leading "www.". "" whenever domain is "". */
	readonly host: string;
	readonly source: TimestampSource;
}

export interface NormalizeResult {
	entries: HistoryEntry[];
	/** Rows repaired with defaults, plus rows that had to be skipped. */
	degradedRowCount: number;
	/** Rows dropped because no usable timestamp (or no object) was present. */
	skippedRowCount: number;
}

// ── Categories ───────────────────────────────────────────

/** Declaration order doubles as the tie-break order everywhere. */
export const CATEGORIES = [
	"work",
	"development",
	"learning",
	"reference",
	"news",
	"social",
	"entertainment",
	"shopping",
	"finance",
	"health",
	"uncategorized",
] as const;

export type Category = typeof CATEGORIES[number];

export type ProductivityBucket = "productive" | "distracting" | "neutral";

export type CategoryAssignments = ReadonlyMap<HistoryEntry, Category>;

export interface UncategorizedDomain {
	domain: string;
	sampleTitles: string[];
}

export interface CategorizationResult {
	assignments: CategoryAssignments;
	/** Most frequent category per domain. */
	domainCategories: Record<string, Category>;
	subcategories: Record<string, string>;
	uncategorizedDomains: UncategorizedDomain[];
	/** Entry counts per category, every category present. */
	categoryBreakdown: Record<Category, number>;
}

// ── Sessions ─────────────────────────────────────────────

export type TimePeriod =
	| "early_morning"
	| "morning"
	| "lunch"
	| "afternoon"
	| "evening"
	| "night"
	| "late_night";

export type SessionType =
	| "highly_productive"
	| "mostly_productive"
	| "mixed"
	| "mostly_leisure"
	| "leisure";

export interface TimePattern {
	hourOfDay: number;
	dayOfWeek: string;
	isWeekend: boolean;
	timePeriod: TimePeriod;
}

export interface FocusMetrics {
	uniqueDomains: number;
	domainSwitches: number;
	avgMinutesPerDomain: number;
	topDomains: Array<{ domain: string; count: number }>;
	/** 0–1, higher is more focused. 0 for zero-length sessions. */
	focusScore: number;
}

export interface Session {
	id: string;
	startTime: Date;
	endTime: Date;
	entries: HistoryEntry[];
	durationMs: number;
	dominantCategory: Category;
	categoryDistribution: Partial<Record<Category, number>>;
	timePattern: TimePattern;
	focus: FocusMetrics;
	sessionType: SessionType;
	/** Share of entries whose category weighs as productive. */
	productiveShare: number;
	isRabbitHole: boolean;
	isResearch: boolean;
	summary: string;
}

// ── Frequency & patterns ─────────────────────────────────

export interface DomainStat {
	domain: string;
	visitCount: number;
	entryCount: number;
	pageCount: number;
	distinctDayCount: number;
	firstSeen: Date;
	lastSeen: Date;
	sampleTitles: string[];
}

export interface LearningPathSegment {
	entries: HistoryEntry[];
	startTime: Date;
	endTime: Date;
	durationMs: number;
	domains: string[];
	/** false for a lone learning visit. */
	isPath: boolean;
}

export interface RepeatVisit {
	url: string;
	title: string;
	domain: string;
	visitCount: number;
	entryCount: number;
	distinctDayCount: number;
}

export type LearningResourceType =
	| "tutorial"
	| "documentation"
	| "questions"
	| "examples"
	| "video"
	| "general";

export interface TopicTrack {
	technology: string;
	visitCount: number;
	resourceTypes: Partial<Record<LearningResourceType, number>>;
	timeSpan: { start: Date; end: Date };
	sampleResources: HistoryEntry[];
}

export interface CountSummary {
	totalVisits: number;
	uniqueDomainCount: number;
	firstVisit: Date | null;
	lastVisit: Date | null;
}

// ── Productivity ─────────────────────────────────────────

export interface BucketDurations {
	productiveMs: number;
	distractingMs: number;
	neutralMs: number;
}

export interface ProductivityScore extends BucketDurations {
	productivityRatio: number;
	distractionRatio: number;
	byTimePeriod: Partial<Record<TimePeriod, BucketDurations>>;
	visitBreakdown: Record<ProductivityBucket, number>;
	topProductiveDomains: Array<{ domain: string; count: number }>;
	topDistractingDomains: Array<{ domain: string; count: number }>;
}

// ── Insights & report ────────────────────────────────────

export interface SessionInsights {
	totalSessions: number;
	avgSessionMinutes: number;
	sessionTypes: Partial<Record<SessionType, number>>;
	timePeriodDistribution: Partial<Record<TimePeriod, number>>;
	productiveSessionCount: number;
	rabbitHoleSessionIds: string[];
	researchSessionIds: string[];
	weekendSessionCount: number;
	weekdaySessionCount: number;
}

export interface ReportHelpers {
	typicalSession: string;
	productivitySummary: string;
	timeHabits: string;
	focusAnalysis: string;
}

export type AnalysisDepth = "quick_summary" | "basic" | "comprehensive";

export interface AnalysisReport {
	analysisDepth: AnalysisDepth;
	entriesAnalyzed: number;
	degradedRowCount: number;
	skippedRowCount: number;
	summary: CountSummary;
	// basic
	categories?: Record<string, Category>;
	subcategories?: Record<string, string>;
	categoryBreakdown?: Record<Category, number>;
	uncategorizedDomains?: UncategorizedDomain[];
	domainStats?: DomainStat[];
	// comprehensive
	sessions?: Session[];
	sessionInsights?: SessionInsights;
	reportHelpers?: ReportHelpers;
	learningPaths?: LearningPathSegment[];
	repeatVisits?: RepeatVisit[];
	topicTracks?: TopicTrack[];
	productivity?: ProductivityScore;
}
