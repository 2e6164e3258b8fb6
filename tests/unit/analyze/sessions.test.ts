import { describe, it, expect } from "vitest";
import {
	buildSessions,
	computeFocus,
	dayKey,
	groupByGap,
	sessionTypeOf,
	timePatternOf,
	timePeriodOf,
} from "../../../src/analyze/sessions";
import { DEFAULT_SETTINGS } from "../../../src/settings/types";
import { Category, HistoryEntry } from "../../../src/types";
import { BASE_MS, MIN, assignAll, at, makeEntry } from "../../fixtures/history";

const GAP = 30 * MIN;

const BY_DOMAIN: Record<string, Category> = {
	"github.com": "development",
	"stackoverflow.com": "development",
	"youtube.com": "entertainment",
	"reddit.com": "social",
	"coursera.org": "learning",
	"edx.org": "learning",
	"arxiv.org": "learning",
	"udemy.com": "learning",
};

function categoriesFor(entries: HistoryEntry[]): Map<HistoryEntry, Category> {
	return assignAll(entries, (e) => BY_DOMAIN[e.domain] ?? "uncategorized");
}

function sessionsOf(entries: HistoryEntry[]) {
	return buildSessions(entries, GAP, categoriesFor(entries), DEFAULT_SETTINGS);
}

// ── groupByGap ───────────────────────────────────────────

describe("groupByGap", () => {
	const identity = (n: number) => n;

	it("returns [] for empty input", () => {
		expect(groupByGap([], 30, identity)).toEqual([]);
	});

	it("splits where the gap reaches the threshold", () => {
		expect(groupByGap([0, 10, 50], 30, identity)).toEqual([[0, 10], [50]]);
		expect(groupByGap([0, 30], 30, identity)).toEqual([[0], [30]]);
		expect(groupByGap([0, 29], 30, identity)).toEqual([[0, 29]]);
	});

	it("treats equal times as a zero gap", () => {
		expect(groupByGap([5, 5, 5], 1, identity)).toEqual([[5, 5, 5]]);
	});

	it("measures each gap from the previous item, not the group start", () => {
		expect(groupByGap([0, 20, 40, 60], 30, identity)).toEqual([[0, 20, 40, 60]]);
	});
});

// ── Time bucketing ───────────────────────────────────────

describe("timePeriodOf", () => {
	it("maps hours to periods", () => {
		expect([5, 8, 9, 11, 12, 13, 16, 17, 19, 20, 22, 23, 0, 4].map(timePeriodOf)).toEqual([
			"early_morning", "early_morning", "morning", "morning", "lunch", "afternoon", "afternoon",
			"evening", "evening", "night", "night", "late_night", "late_night", "late_night",
		]);
	});
});

describe("timePatternOf", () => {
	it("reads hour and weekday in UTC by default", () => {
		expect(timePatternOf(at(0), 0)).toEqual({
			hourOfDay: 9,
			dayOfWeek: "Monday",
			isWeekend: false,
			timePeriod: "morning",
		});
	});

	it("applies the configured offset", () => {
		expect(timePatternOf(at(0), -600)).toEqual({
			hourOfDay: 23,
			dayOfWeek: "Sunday",
			isWeekend: true,
			timePeriod: "late_night",
		});
	});
});

describe("dayKey", () => {
	it("returns the calendar day in the configured offset", () => {
		expect(dayKey(new Date(BASE_MS), 0)).toBe("2024-01-01");
		expect(dayKey(new Date(BASE_MS), -600)).toBe("2023-12-31");
	});
});

// ── Session shape ────────────────────────────────────────

describe("computeFocus", () => {
	it("scores zero-length sessions as 0", () => {
		const focus = computeFocus([makeEntry("https://github.com/", 0)], 0);
		expect(focus).toEqual({
			uniqueDomains: 1,
			domainSwitches: 0,
			avgMinutesPerDomain: 0,
			topDomains: [{ domain: "github.com", count: 1 }],
			focusScore: 0,
		});
	});

	it("ignores entries without a domain", () => {
		const focus = computeFocus([makeEntry("not a url", 0), makeEntry("https://a.com/", 1)], MIN);
		expect(focus.uniqueDomains).toBe(1);
		expect(focus.domainSwitches).toBe(0);
	});
});

describe("sessionTypeOf", () => {
	it("classifies by productive share first, then distracting share", () => {
		expect(sessionTypeOf(0.7, 0)).toBe("highly_productive");
		expect(sessionTypeOf(0.5, 0.5)).toBe("mostly_productive");
		expect(sessionTypeOf(0.2, 0.7)).toBe("leisure");
		expect(sessionTypeOf(0.2, 0.5)).toBe("mostly_leisure");
		expect(sessionTypeOf(0.4, 0.4)).toBe("mixed");
	});
});

// ── buildSessions ────────────────────────────────────────

describe("buildSessions", () => {
	it("returns [] for empty input", () => {
		expect(sessionsOf([])).toEqual([]);
	});

	it("splits a.com, a.com, b.com at a 40 minute gap", () => {
		const entries = [
			makeEntry("https://a.com/", 0),
			makeEntry("https://a.com/", 10),
			makeEntry("https://b.com/", 50),
		];
		const sessions = sessionsOf(entries);
		expect(sessions).toHaveLength(2);
		expect(sessions[0].entries).toEqual([entries[0], entries[1]]);
		expect(sessions[1].entries).toEqual([entries[2]]);
		expect(sessions.map((s) => s.id)).toEqual(["session-1", "session-2"]);
		expect(sessions.map((s) => s.durationMs)).toEqual([10 * MIN, 0]);
	});

	it("gives a single entry one session of duration zero", () => {
		const [session] = sessionsOf([makeEntry("https://github.com/", 0)]);
		expect(session.durationMs).toBe(0);
		expect(session.startTime).toEqual(session.endTime);
		expect(session.focus.focusScore).toBe(0);
		expect(session.summary).toBe("Quick morning session: 1 visit across 1 domain, mostly development");
	});

	it("derives category, time pattern, focus and type", () => {
		const entries = [
			makeEntry("https://github.com/a", 0),
			makeEntry("https://github.com/b", 10),
			makeEntry("https://stackoverflow.com/q/1", 20),
			makeEntry("https://www.youtube.com/watch?v=1", 25),
		];
		const [session] = sessionsOf(entries);

		expect(session.durationMs).toBe(25 * MIN);
		expect(session.dominantCategory).toBe("development");
		expect(session.categoryDistribution).toEqual({ development: 3, entertainment: 1 });
		expect(session.timePattern.timePeriod).toBe("morning");
		expect(session.focus).toEqual({
			uniqueDomains: 3,
			domainSwitches: 2,
			avgMinutesPerDomain: 8.33,
			topDomains: [
				{ domain: "github.com", count: 2 },
				{ domain: "stackoverflow.com", count: 1 },
				{ domain: "youtube.com", count: 1 },
			],
			focusScore: 0.9,
		});
		expect(session.productiveShare).toBe(0.75);
		expect(session.sessionType).toBe("highly_productive");
		expect(session.isRabbitHole).toBe(false);
		expect(session.isResearch).toBe(false);
		expect(session.summary).toBe("Moderate morning session: 4 visits across 3 domains, mostly development");
	});

	it("flags a long stay on one domain as a rabbit hole", () => {
		const entries = [0, 5, 10, 15, 20, 25, 30, 35, 40].map((m) => makeEntry(`https://www.reddit.com/r/x/${m}`, m));
		const [session] = sessionsOf(entries);
		expect(session.isRabbitHole).toBe(true);
		expect(session.sessionType).toBe("leisure");
		expect(session.summary).toBe(
			"Moderate morning session: 9 visits across 1 domain, mostly social; deep dive into reddit.com"
		);
	});

	it("flags learning spread over many domains as research", () => {
		const entries = ["coursera.org", "edx.org", "arxiv.org", "github.com", "udemy.com"].map((d, i) =>
			makeEntry(`https://${d}/`, i)
		);
		const [session] = sessionsOf(entries);
		expect(session.isResearch).toBe(true);
		expect(session.dominantCategory).toBe("learning");
	});

	it("treats entries missing from the category map as uncategorized", () => {
		const entries = [makeEntry("https://a.com/", 0), makeEntry("https://b.com/", 1)];
		const [session] = buildSessions(entries, GAP, new Map(), DEFAULT_SETTINGS);
		expect(session.dominantCategory).toBe("uncategorized");
		expect(session.sessionType).toBe("mixed");
	});

	it("partitions the input exactly and respects the gap on both sides", () => {
		const offsets = [0, 3, 3, 29, 60, 61, 95, 200, 229, 259, 300];
		const entries = offsets.map((m, i) => makeEntry(`https://site${i % 3}.com/`, m));
		const sessions = sessionsOf(entries);

		expect(sessions.flatMap((s) => s.entries)).toEqual(entries);
		for (const s of sessions) {
			for (let i = 1; i < s.entries.length; i++) {
				const gap = s.entries[i].visitedAt.getTime() - s.entries[i - 1].visitedAt.getTime();
				expect(gap).toBeLessThan(GAP);
			}
		}
		for (let i = 1; i < sessions.length; i++) {
			expect(sessions[i].startTime.getTime() - sessions[i - 1].endTime.getTime()).toBeGreaterThanOrEqual(GAP);
		}
		expect(sessions.map((s) => s.entries.length)).toEqual([4, 2, 1, 2, 1, 1]);
	});
});
