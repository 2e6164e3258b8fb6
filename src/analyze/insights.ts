import { CATEGORIES, ReportHelpers, Session, SessionInsights, TimePeriod } from "../types";

const MIN_MS = 60_000;
/** A session counts as productive when more than half its visits are. */
const PRODUCTIVE_SHARE_THRESHOLD = 0.5;
const NO_SESSIONS = "No sessions found";

function round2(n: number): number {
	return Math.round(n * 100) / 100;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
	counts[key] = (counts[key] ?? 0) + 1;
}

/** Most frequent value; the first one seen wins a tie. */
function mostCommon<T>(values: readonly T[]): T | undefined {
	const counts = new Map<T, number>();
	let best: T | undefined;
	let bestCount = 0;
	for (const v of values) {
		const n = (counts.get(v) ?? 0) + 1;
		counts.set(v, n);
		if (n > bestCount) {
			best = v;
			bestCount = n;
		}
	}
	return best;
}

function periodLabel(period: TimePeriod): string {
	return period.replace("_", " ");
}

function isProductive(session: Session): boolean {
	return session.productiveShare > PRODUCTIVE_SHARE_THRESHOLD;
}

function totalMinutes(sessions: readonly Session[]): number {
	return sessions.reduce((sum, s) => sum + s.durationMs, 0) / MIN_MS;
}

// ── Aggregates ───────────────────────────────────────────

export function summarizeSessions(sessions: readonly Session[]): SessionInsights {
	const insights: SessionInsights = {
		totalSessions: sessions.length,
		avgSessionMinutes: sessions.length > 0 ? round2(totalMinutes(sessions) / sessions.length) : 0,
		sessionTypes: {},
		timePeriodDistribution: {},
		productiveSessionCount: 0,
		rabbitHoleSessionIds: [],
		researchSessionIds: [],
		weekendSessionCount: 0,
		weekdaySessionCount: 0,
	};

	for (const s of sessions) {
		increment(insights.sessionTypes, s.sessionType);
		increment(insights.timePeriodDistribution, s.timePattern.timePeriod);
		if (isProductive(s)) insights.productiveSessionCount++;
		if (s.isRabbitHole) insights.rabbitHoleSessionIds.push(s.id);
		if (s.isResearch) insights.researchSessionIds.push(s.id);
		if (s.timePattern.isWeekend) insights.weekendSessionCount++;
		else insights.weekdaySessionCount++;
	}

	return insights;
}

// ── One-line descriptions ────────────────────────────────

function describeTypicalSession(sessions: readonly Session[]): string {
	const avg = Math.round(totalMinutes(sessions) / sessions.length);
	const type = mostCommon(sessions.map((s) => s.sessionType)) ?? "mixed";
	const period = mostCommon(sessions.map((s) => s.timePattern.timePeriod)) ?? "morning";
	return `Typical session: ${avg} minutes of ${type.replace("_", " ")} browsing, usually in the ${periodLabel(period)}`;
}

function describeProductivity(sessions: readonly Session[]): string {
	const productive = sessions.filter(isProductive);
	const minutes = Math.round(totalMinutes(productive));
	const noun = productive.length === 1 ? "session" : "sessions";
	return `Productivity summary: ${minutes} minutes of productive browsing across ${productive.length} ${noun}`;
}

function describeTimeHabits(sessions: readonly Session[]): string {
	const parts: string[] = [];
	for (const category of CATEGORIES) {
		const periods: TimePeriod[] = [];
		for (const s of sessions) {
			const period = s.timePattern.timePeriod;
			if ((s.categoryDistribution[category] ?? 0) > 0 && !periods.includes(period)) {
				periods.push(period);
			}
		}
		if (periods.length > 0) parts.push(`${category} in ${periods.map(periodLabel).join(", ")}`);
	}
	return `Time habits: ${parts.join("; ")}`;
}

function describeFocus(sessions: readonly Session[]): string {
	const avgScore = round2(sessions.reduce((sum, s) => sum + s.focus.focusScore, 0) / sessions.length);
	const bestPeriod = mostCommon(sessions.filter(isProductive).map((s) => s.timePattern.timePeriod));
	const where = bestPeriod
		? `most productive sessions in the ${periodLabel(bestPeriod)}`
		: "no productive sessions";
	return `Focus patterns: average focus score ${avgScore}; ${where}`;
}

/** Short human-readable lines for a report header. */
export function buildReportHelpers(sessions: readonly Session[]): ReportHelpers {
	if (sessions.length === 0) {
		return {
			typicalSession: NO_SESSIONS,
			productivitySummary: NO_SESSIONS,
			timeHabits: NO_SESSIONS,
			focusAnalysis: NO_SESSIONS,
		};
	}
	return {
		typicalSession: describeTypicalSession(sessions),
		productivitySummary: describeProductivity(sessions),
		timeHabits: describeTimeHabits(sessions),
		focusAnalysis: describeFocus(sessions),
	};
}
