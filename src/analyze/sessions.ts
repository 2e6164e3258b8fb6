/**
 * Session building.
 *
 * Splits time-ordered entries into sessions wherever the gap between two
 * consecutive visits reaches the inactivity threshold, then derives each
 * session's shape: dominant category, time-of-day pattern, focus metrics and
 * a productivity-based session type.
 *
 * Pure and synchronous. No I/O.
 */

import {
	Category,
	CategoryAssignments,
	FocusMetrics,
	HistoryEntry,
	Session,
	SessionType,
	TimePattern,
	TimePeriod,
} from "../types";
import { AnalysisSettings } from "../settings/types";
import { dominantCategory } from "../filter/categorize";
import { bucketOf } from "./productivity";

const MIN_MS = 60_000;
const RABBIT_HOLE_MIN_MS = 30 * MIN_MS;
const RABBIT_HOLE_MAX_DOMAINS = 3;
const RABBIT_HOLE_MIN_REPEATS = 5;
const RESEARCH_MIN_DOMAINS = 5;
const TOP_DOMAIN_COUNT = 3;

// ── Gap grouping ─────────────────────────────────────────

/**
 * Single linear scan shared by sessions and learning paths: a new group
 * starts whenever `timeOf(item) - timeOf(previous) >= gapMs`. Equal times are
 * a zero gap. Items must already be in ascending time order.
 */
export function groupByGap<T>(
	items: readonly T[],
	gapMs: number,
	timeOf: (item: T) => number
): T[][] {
	const groups: T[][] = [];
	let current: T[] = [];
	let prevTime = 0;

	for (const item of items) {
		const t = timeOf(item);
		if (current.length > 0 && t - prevTime >= gapMs) {
			groups.push(current);
			current = [];
		}
		current.push(item);
		prevTime = t;
	}
	if (current.length > 0) groups.push(current);

	return groups;
}

// ── Time bucketing ───────────────────────────────────────

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

/** The instant moved by the configured offset; read it back with getUTC*(). */
function shifted(date: Date, utcOffsetMinutes: number): Date {
	return new Date(date.getTime() + utcOffsetMinutes * MIN_MS);
}

/** Calendar day ("YYYY-MM-DD") of an instant in the configured offset. */
export function dayKey(date: Date, utcOffsetMinutes: number): string {
	return shifted(date, utcOffsetMinutes).toISOString().slice(0, 10);
}

export function timePeriodOf(hour: number): TimePeriod {
	if (hour >= 5 && hour < 9) return "early_morning";
	if (hour >= 9 && hour < 12) return "morning";
	if (hour === 12) return "lunch";
	if (hour >= 13 && hour < 17) return "afternoon";
	if (hour >= 17 && hour < 20) return "evening";
	if (hour >= 20 && hour < 23) return "night";
	return "late_night";
}

export function timePatternOf(date: Date, utcOffsetMinutes: number): TimePattern {
	const local = shifted(date, utcOffsetMinutes);
	const hourOfDay = local.getUTCHours();
	const day = local.getUTCDay();
	return {
		hourOfDay,
		dayOfWeek: WEEKDAYS[day],
		isWeekend: day === 0 || day === 6,
		timePeriod: timePeriodOf(hourOfDay),
	};
}

// ── Session shape ────────────────────────────────────────

function round2(n: number): number {
	return Math.round(n * 100) / 100;
}

function countBy<T>(items: readonly T[], key: (item: T) => string): Map<string, number> {
	const counts = new Map<string, number>();
	for (const item of items) {
		const k = key(item);
		counts.set(k, (counts.get(k) ?? 0) + 1);
	}
	return counts;
}

/**
 * Domain-switch rate and domain spread per minute, folded into one 0–1
 * score. A session that stays on one page for an hour scores near 1.
 */
export function computeFocus(entries: readonly HistoryEntry[], durationMs: number): FocusMetrics {
	const withDomain = entries.filter((e) => e.domain !== "");
	const counts = countBy(withDomain, (e) => e.domain);
	const uniqueDomains = counts.size;

	let domainSwitches = 0;
	for (let i = 1; i < withDomain.length; i++) {
		if (withDomain[i].domain !== withDomain[i - 1].domain) domainSwitches++;
	}

	const minutes = durationMs / MIN_MS;
	const avgMinutesPerDomain = uniqueDomains > 0 ? round2(minutes / uniqueDomains) : 0;

	// Map preserves first-seen order, and sort is stable, so ties keep it
	const topDomains = [...counts.entries()]
		.map(([domain, count]) => ({ domain, count }))
		.sort((a, b) => b.count - a.count)
		.slice(0, TOP_DOMAIN_COUNT);

	let focusScore = 0;
	if (minutes > 0) {
		const switchRate = domainSwitches / minutes;
		const spreadRate = uniqueDomains / minutes;
		focusScore = round2(1 - Math.min(1, (switchRate + spreadRate) / 2));
	}

	return { uniqueDomains, domainSwitches, avgMinutesPerDomain, topDomains, focusScore };
}

export function sessionTypeOf(productiveShare: number, distractingShare: number): SessionType {
	if (productiveShare >= 0.7) return "highly_productive";
	if (productiveShare >= 0.5) return "mostly_productive";
	if (distractingShare >= 0.7) return "leisure";
	if (distractingShare >= 0.5) return "mostly_leisure";
	return "mixed";
}

function durationDescriptor(durationMs: number): string {
	const minutes = durationMs / MIN_MS;
	if (minutes < 5) return "Quick";
	if (minutes < 15) return "Short";
	if (minutes < 45) return "Moderate";
	if (minutes < 90) return "Long";
	return "Extended";
}

function plural(n: number, word: string): string {
	return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function describeSession(
	entryCount: number,
	durationMs: number,
	focus: FocusMetrics,
	timePeriod: TimePeriod,
	dominant: Category,
	isRabbitHole: boolean
): string {
	let text =
		`${durationDescriptor(durationMs)} ${timePeriod.replace("_", " ")} session: ` +
		`${plural(entryCount, "visit")} across ${plural(focus.uniqueDomains, "domain")}, mostly ${dominant}`;
	if (isRabbitHole && focus.topDomains.length > 0) {
		text += `; deep dive into ${focus.topDomains[0].domain}`;
	}
	return text;
}

// ── Public API ───────────────────────────────────────────

export type SessionSettings = Pick<AnalysisSettings, "productivityWeights" | "utcOffsetMinutes">;

function buildSession(
	id: string,
	entries: HistoryEntry[],
	categories: CategoryAssignments,
	settings: SessionSettings
): Session {
	const startTime = entries[0].visitedAt;
	const endTime = entries[entries.length - 1].visitedAt;
	const durationMs = endTime.getTime() - startTime.getTime();

	const entryCategories = entries.map((e) => categories.get(e) ?? "uncategorized");
	const categoryDistribution: Partial<Record<Category, number>> = {};
	let productive = 0;
	let distracting = 0;
	let studyish = 0;
	for (const category of entryCategories) {
		categoryDistribution[category] = (categoryDistribution[category] ?? 0) + 1;
		const bucket = bucketOf(category, settings.productivityWeights);
		if (bucket === "productive") productive++;
		else if (bucket === "distracting") distracting++;
		if (category === "learning" || category === "development") studyish++;
	}

	const n = entries.length;
	const productiveShare = round2(productive / n);
	const dominant = dominantCategory(entryCategories);
	const timePattern = timePatternOf(startTime, settings.utcOffsetMinutes);
	const focus = computeFocus(entries, durationMs);

	const maxDomainCount = focus.topDomains.length > 0 ? focus.topDomains[0].count : 0;
	const isRabbitHole =
		focus.uniqueDomains > 0 &&
		focus.uniqueDomains <= RABBIT_HOLE_MAX_DOMAINS &&
		durationMs > RABBIT_HOLE_MIN_MS &&
		maxDomainCount > RABBIT_HOLE_MIN_REPEATS;
	const isResearch = studyish / n > 0.5 && focus.uniqueDomains >= RESEARCH_MIN_DOMAINS;

	return {
		id,
		startTime,
		endTime,
		entries,
		durationMs,
		dominantCategory: dominant,
		categoryDistribution,
		timePattern,
		focus,
		sessionType: sessionTypeOf(productive / n, distracting / n),
		productiveShare,
		isRabbitHole,
		isResearch,
		summary: describeSession(n, durationMs, focus, timePattern.timePeriod, dominant, isRabbitHole),
	};
}

/**
 * Group ascending entries into sessions. Every entry lands in exactly one
 * session and sessions come back in time order; an empty list gives [].
 *
 * @param categories  per-entry categories; entries missing from it count as uncategorized
 */
export function buildSessions(
	entries: readonly HistoryEntry[],
	gapMs: number,
	categories: CategoryAssignments,
	settings: SessionSettings
): Session[] {
	return groupByGap(entries, gapMs, (e) => e.visitedAt.getTime()).map((group, i) =>
		buildSession(`session-${i + 1}`, group, categories, settings)
	);
}
