/**
 * Report assembly.
 *
 * analyzeHistory() is the one entry point that runs the whole pipeline:
 *
 *   normalize → categorize → domain stats
 *             → sessions → learning paths → productivity → insights
 *
 * The analysis depth picks a set of stages rather than a code path. Each
 * depth's set contains the previous one, so a comprehensive report is always
 * a superset of a basic one.
 */

import { AnalysisDepth, AnalysisReport } from "../types";
import { AnalysisSettings, resolveSettings } from "../settings/types";
import { normalizeRows, NormalizeOptions } from "../collect/normalize";
import { categorizeEntries } from "../filter/categorize";
import { debug, setDebugEnabled } from "../log";
import { buildSessions } from "./sessions";
import { computeDomainStats, findRepeatVisits, summarizeCounts } from "./frequency";
import { findLearningPaths, findTopicTracks } from "./learning";
import { scoreProductivity } from "./productivity";
import { buildReportHelpers, summarizeSessions } from "./insights";

const MIN_MS = 60_000;

// ── Stage selection ──────────────────────────────────────

export type AnalysisStage =
	| "counts"
	| "categories"
	| "domainStats"
	| "sessions"
	| "learningPaths"
	| "productivity"
	| "sessionInsights"
	| "repeatVisits"
	| "topicTracks";

const QUICK_STAGES: readonly AnalysisStage[] = ["counts"];
const BASIC_STAGES: readonly AnalysisStage[] = [...QUICK_STAGES, "categories", "domainStats"];
const COMPREHENSIVE_STAGES: readonly AnalysisStage[] = [
	...BASIC_STAGES,
	"sessions",
	"learningPaths",
	"productivity",
	"sessionInsights",
	"repeatVisits",
	"topicTracks",
];

export const DEPTH_STAGES: Record<AnalysisDepth, ReadonlySet<AnalysisStage>> = {
	quick_summary: new Set(QUICK_STAGES),
	basic: new Set(BASIC_STAGES),
	comprehensive: new Set(COMPREHENSIVE_STAGES),
};

function timed<T>(label: string, fn: () => T): T {
	const start = performance.now();
	const result = fn();
	debug(`${label}: ${(performance.now() - start).toFixed(1)}ms`);
	return result;
}

// ── Pipeline ─────────────────────────────────────────────

/**
 * Run the analysis over raw history rows.
 *
 * Throws InvalidInputShapeError when `rows` is not a list of records and
 * InvalidSettingsError when `settings` fails validation. Bad individual rows
 * never throw; they show up in `degradedRowCount` / `skippedRowCount`.
 */
export function analyzeHistory(
	rows: unknown,
	settings: Partial<AnalysisSettings> = {},
	normalizeOptions: NormalizeOptions = {}
): AnalysisReport {
	const resolved = resolveSettings(settings);
	setDebugEnabled(resolved.debugMode);
	const stages = DEPTH_STAGES[resolved.analysisDepth];

	const normalized = timed("normalize", () => normalizeRows(rows, normalizeOptions));
	const { entries } = normalized;
	debug(
		`${entries.length} entries, ${normalized.degradedRowCount} degraded, ` +
		`${normalized.skippedRowCount} skipped; depth=${resolved.analysisDepth}`
	);

	const report: AnalysisReport = {
		analysisDepth: resolved.analysisDepth,
		entriesAnalyzed: entries.length,
		degradedRowCount: normalized.degradedRowCount,
		skippedRowCount: normalized.skippedRowCount,
		summary: summarizeCounts(entries),
	};

	if (!stages.has("categories")) return report;

	const categorized = timed("categorize", () =>
		categorizeEntries(entries, resolved.categoryOverrides, resolved.sampleTitleLimit)
	);
	report.categories = categorized.domainCategories;
	report.subcategories = categorized.subcategories;
	report.categoryBreakdown = categorized.categoryBreakdown;
	report.uncategorizedDomains = categorized.uncategorizedDomains;

	if (stages.has("domainStats")) {
		report.domainStats = timed("domain stats", () => computeDomainStats(entries, resolved));
	}

	if (!stages.has("sessions")) return report;

	const sessions = timed("sessions", () =>
		buildSessions(entries, resolved.sessionGapMinutes * MIN_MS, categorized.assignments, resolved)
	);
	report.sessions = sessions;

	if (stages.has("learningPaths")) {
		report.learningPaths = timed("learning paths", () =>
			findLearningPaths(
				entries,
				categorized.assignments,
				resolved.learningGapMinutes * MIN_MS,
				resolved.learningCategories
			)
		);
	}
	if (stages.has("productivity")) {
		report.productivity = timed("productivity", () =>
			scoreProductivity(sessions, resolved.productivityWeights, categorized.assignments)
		);
	}
	if (stages.has("sessionInsights")) {
		report.sessionInsights = summarizeSessions(sessions);
		report.reportHelpers = buildReportHelpers(sessions);
	}
	if (stages.has("repeatVisits")) {
		report.repeatVisits = timed("repeat visits", () => findRepeatVisits(entries, resolved));
	}
	if (stages.has("topicTracks")) {
		report.topicTracks = timed("topic tracks", () => findTopicTracks(entries));
	}

	return report;
}
