import { CountSummary, DomainStat, HistoryEntry, RepeatVisit } from "../types";
import { AnalysisSettings } from "../settings/types";
import { dayKey } from "./sessions";

// ── Counts ───────────────────────────────────────────────

/** Totals for the quick summary. Visits are summed visit counts, not rows. */
export function summarizeCounts(entries: readonly HistoryEntry[]): CountSummary {
	const domains = new Set<string>();
	let totalVisits = 0;
	for (const e of entries) {
		totalVisits += e.visitCount;
		if (e.domain) domains.add(e.domain);
	}
	return {
		totalVisits,
		uniqueDomainCount: domains.size,
		firstVisit: entries.length > 0 ? entries[0].visitedAt : null,
		lastVisit: entries.length > 0 ? entries[entries.length - 1].visitedAt : null,
	};
}

// ── Domain frequency ─────────────────────────────────────

interface DomainAccumulator {
	stat: DomainStat;
	urls: Set<string>;
	days: Set<string>;
}

function addSampleTitle(titles: string[], title: string, limit: number): void {
	if (title && titles.length < limit && !titles.includes(title)) titles.push(title);
}

export type DomainStatSettings = Pick<
	AnalysisSettings,
	"domainStatLimit" | "sampleTitleLimit" | "utcOffsetMinutes"
>;

/**
 * Rank domains by summed visit count, most recent `lastSeen` first on ties.
 * Entries without a domain are left out. The sort is stable, so identical
 * input always yields an identically ordered list.
 */
export function computeDomainStats(
	entries: readonly HistoryEntry[],
	settings: DomainStatSettings
): DomainStat[] {
	const byDomain = new Map<string, DomainAccumulator>();

	for (const e of entries) {
		if (!e.domain) continue;
		let acc = byDomain.get(e.domain);
		if (!acc) {
			acc = {
				stat: {
					domain: e.domain,
					visitCount: 0,
					entryCount: 0,
					pageCount: 0,
					distinctDayCount: 0,
					firstSeen: e.visitedAt,
					lastSeen: e.visitedAt,
					sampleTitles: [],
				},
				urls: new Set(),
				days: new Set(),
			};
			byDomain.set(e.domain, acc);
		}
		const { stat } = acc;
		stat.visitCount += e.visitCount;
		stat.entryCount++;
		if (e.visitedAt < stat.firstSeen) stat.firstSeen = e.visitedAt;
		if (e.visitedAt > stat.lastSeen) stat.lastSeen = e.visitedAt;
		acc.urls.add(e.url);
		acc.days.add(dayKey(e.visitedAt, settings.utcOffsetMinutes));
		addSampleTitle(stat.sampleTitles, e.title, settings.sampleTitleLimit);
	}

	const stats = [...byDomain.values()].map(({ stat, urls, days }) => ({
		...stat,
		pageCount: urls.size,
		distinctDayCount: days.size,
	}));

	stats.sort(
		(a, b) => b.visitCount - a.visitCount || b.lastSeen.getTime() - a.lastSeen.getTime()
	);

	return settings.domainStatLimit === null ? stats : stats.slice(0, settings.domainStatLimit);
}

// ── Repeat visits ────────────────────────────────────────

/**
 * URLs the user keeps coming back to: seen on two or more calendar days, or
 * with a summed visit count above one. Most visited first.
 */
export function findRepeatVisits(
	entries: readonly HistoryEntry[],
	settings: Pick<AnalysisSettings, "utcOffsetMinutes">
): RepeatVisit[] {
	const byUrl = new Map<string, { visit: RepeatVisit; days: Set<string> }>();

	for (const e of entries) {
		if (!e.url) continue;
		let acc = byUrl.get(e.url);
		if (!acc) {
			acc = {
				visit: { url: e.url, title: "", domain: e.domain, visitCount: 0, entryCount: 0, distinctDayCount: 0 },
				days: new Set(),
			};
			byUrl.set(e.url, acc);
		}
		acc.visit.visitCount += e.visitCount;
		acc.visit.entryCount++;
		// Latest non-empty title wins; entries arrive in time order
		if (e.title) acc.visit.title = e.title;
		acc.days.add(dayKey(e.visitedAt, settings.utcOffsetMinutes));
	}

	return [...byUrl.values()]
		.map(({ visit, days }) => ({ ...visit, distinctDayCount: days.size }))
		.filter((v) => v.distinctDayCount >= 2 || v.visitCount > 1)
		.sort((a, b) => b.visitCount - a.visitCount || b.distinctDayCount - a.distinctDayCount);
}
