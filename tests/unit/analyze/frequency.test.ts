import { describe, it, expect } from "vitest";
import { computeDomainStats, findRepeatVisits, summarizeCounts } from "../../../src/analyze/frequency";
import { DEFAULT_SETTINGS } from "../../../src/settings/types";
import { DAY, MIN, at, makeEntry } from "../../fixtures/history";

const DAY_MIN = DAY / MIN;

describe("summarizeCounts", () => {
	it("returns zeros and nulls for no entries", () => {
		expect(summarizeCounts([])).toEqual({ totalVisits: 0, uniqueDomainCount: 0, firstVisit: null, lastVisit: null });
	});

	it("sums visit counts and counts domains, ignoring entries without one", () => {
		const entries = [makeEntry("https://a.com/", 0, "", 2), makeEntry("not a url", 5), makeEntry("https://a.com/b", 9)];
		expect(summarizeCounts(entries)).toEqual({
			totalVisits: 4,
			uniqueDomainCount: 1,
			firstVisit: at(0),
			lastVisit: at(9),
		});
	});
});

describe("computeDomainStats", () => {
	const entries = [
		makeEntry("https://github.com/a", 0, "A", 2),
		makeEntry("https://example.com/", 10, "Ex"),
		makeEntry("https://github.com/b", 20, "B"),
		makeEntry("not a url", 30, "Nowhere"),
		makeEntry("https://example.com/", DAY_MIN, "Ex", 2),
	];

	it("aggregates per domain and leaves out entries without one", () => {
		const stats = computeDomainStats(entries, DEFAULT_SETTINGS);
		expect(stats).toEqual([
			{
				domain: "example.com",
				visitCount: 3,
				entryCount: 2,
				pageCount: 1,
				distinctDayCount: 2,
				firstSeen: at(10),
				lastSeen: at(DAY_MIN),
				sampleTitles: ["Ex"],
			},
			{
				domain: "github.com",
				visitCount: 3,
				entryCount: 2,
				pageCount: 2,
				distinctDayCount: 1,
				firstSeen: at(0),
				lastSeen: at(20),
				sampleTitles: ["A", "B"],
			},
		]);
	});

	it("ranks by visit count before recency", () => {
		const stats = computeDomainStats(
			[makeEntry("https://old.com/", 0, "", 5), makeEntry("https://new.com/", 60)],
			DEFAULT_SETTINGS
		);
		expect(stats.map((s) => s.domain)).toEqual(["old.com", "new.com"]);
	});

	it("keeps first-seen order when count and recency tie", () => {
		const tied = [makeEntry("https://b.com/", 0), makeEntry("https://a.com/", 0)];
		expect(computeDomainStats(tied, DEFAULT_SETTINGS).map((s) => s.domain)).toEqual(["b.com", "a.com"]);
	});

	it("applies the domain and sample-title limits", () => {
		const stats = computeDomainStats(entries, { ...DEFAULT_SETTINGS, domainStatLimit: 1, sampleTitleLimit: 1 });
		expect(stats.map((s) => s.domain)).toEqual(["example.com"]);

		const titles = computeDomainStats(entries, { ...DEFAULT_SETTINGS, sampleTitleLimit: 1 });
		expect(titles[1].sampleTitles).toEqual(["A"]);
	});

	it("counts distinct days in the configured offset", () => {
		// 09:00 and 23:30 UTC are the same day in UTC and different days at UTC+1
		const late = [makeEntry("https://a.com/", 0), makeEntry("https://a.com/", 14 * 60 + 30)];
		expect(computeDomainStats(late, DEFAULT_SETTINGS)[0].distinctDayCount).toBe(1);
		expect(computeDomainStats(late, { ...DEFAULT_SETTINGS, utcOffsetMinutes: 60 })[0].distinctDayCount).toBe(2);
	});

	it("produces identical output on repeated runs", () => {
		expect(computeDomainStats(entries, DEFAULT_SETTINGS)).toEqual(computeDomainStats(entries, DEFAULT_SETTINGS));
	});
});

describe("findRepeatVisits", () => {
	it("keeps URLs seen on several days or visited more than once", () => {
		const entries = [
			makeEntry("https://a.com/x", 0, "Old"),
			makeEntry("https://b.com/", 5, "Bee", 3),
			makeEntry("https://c.com/", 6, "Once"),
			makeEntry("", 7),
			makeEntry("https://a.com/x", DAY_MIN, "New"),
		];
		expect(findRepeatVisits(entries, DEFAULT_SETTINGS)).toEqual([
			{ url: "https://b.com/", title: "Bee", domain: "b.com", visitCount: 3, entryCount: 1, distinctDayCount: 1 },
			{ url: "https://a.com/x", title: "New", domain: "a.com", visitCount: 2, entryCount: 2, distinctDayCount: 2 },
		]);
	});

	it("returns [] when nothing repeats", () => {
		expect(findRepeatVisits([makeEntry("https://a.com/", 0)], DEFAULT_SETTINGS)).toEqual([]);
	});
});
