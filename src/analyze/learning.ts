/**
 * Learning signals.
 *
 * Two views of the same question ("what was the user studying?"):
 *   - learning paths: runs of learning-category visits close together in time
 *   - topic tracks: visits grouped by technology, whatever their category
 */

import {
	Category,
	CategoryAssignments,
	HistoryEntry,
	LearningPathSegment,
	LearningResourceType,
	TopicTrack,
} from "../types";
import { groupByGap } from "./sessions";

// ── Learning paths ───────────────────────────────────────

/**
 * Keep entries whose category is in `learningCategories`, then split them
 * wherever two consecutive ones are `gapMs` or more apart. Single-entry
 * segments are kept with `isPath: false`.
 */
export function findLearningPaths(
	entries: readonly HistoryEntry[],
	assignments: CategoryAssignments,
	gapMs: number,
	learningCategories: readonly Category[]
): LearningPathSegment[] {
	const wanted = new Set(learningCategories);
	const learning = entries.filter((e) => wanted.has(assignments.get(e) ?? "uncategorized"));

	return groupByGap(learning, gapMs, (e) => e.visitedAt.getTime()).map((group) => {
		const startTime = group[0].visitedAt;
		const endTime = group[group.length - 1].visitedAt;
		const domains: string[] = [];
		for (const e of group) {
			if (e.domain && !domains.includes(e.domain)) domains.push(e.domain);
		}
		return {
			entries: group,
			startTime,
			endTime,
			durationMs: endTime.getTime() - startTime.getTime(),
			domains,
			isPath: group.length > 1,
		};
	});
}

// ── Topic tracks ─────────────────────────────────────────

const MIN_TRACK_VISITS = 3;
const SAMPLE_RESOURCE_LIMIT = 5;

/** Technology → pattern over the lowercased URL and title. */
const TECH_PATTERNS: Array<[string, RegExp]> = [
	["python", /python|django|flask|pandas|numpy/],
	["javascript", /javascript|typescript|\bjs\b|react|\bvue\b|angular|node\.?js/],
	["rust", /rust-lang|\brust\b/],
	["go", /golang|go-lang|go\.dev/],
	["machine_learning", /tensorflow|pytorch|scikit|\bml\b|machine[- ]learning/],
	["web", /\bhtml\b|\bcss\b|web-dev|frontend|backend/],
];

/** Resource type, read from the URL only. First match wins. */
const RESOURCE_PATTERNS: Array<[LearningResourceType, RegExp]> = [
	["tutorial", /tutorial|guide|learn|course/],
	["documentation", /docs|documentation|reference|api/],
	["questions", /stackoverflow|how-to|what-is|why-does/],
	["examples", /example|demo|sample|code/],
	["video", /youtube.*watch|video|lecture/],
];

export function resourceTypeOf(url: string): LearningResourceType {
	const lower = url.toLowerCase();
	for (const [type, pattern] of RESOURCE_PATTERNS) {
		if (pattern.test(lower)) return type;
	}
	return "general";
}

/**
 * Group entries by the technology their URL or title mentions. An entry can
 * feed several tracks. Technologies with fewer than three visits are not
 * reported. Most visited track first, declaration order on ties.
 */
export function findTopicTracks(entries: readonly HistoryEntry[]): TopicTrack[] {
	const byTech = new Map<string, HistoryEntry[]>();

	for (const e of entries) {
		const url = e.url.toLowerCase();
		const title = e.title.toLowerCase();
		for (const [tech, pattern] of TECH_PATTERNS) {
			if (!pattern.test(url) && !pattern.test(title)) continue;
			const list = byTech.get(tech);
			if (list) list.push(e);
			else byTech.set(tech, [e]);
		}
	}

	const tracks: TopicTrack[] = [];
	for (const [tech] of TECH_PATTERNS) {
		const visits = byTech.get(tech);
		if (!visits || visits.length < MIN_TRACK_VISITS) continue;

		const resourceTypes: Partial<Record<LearningResourceType, number>> = {};
		for (const v of visits) {
			const type = resourceTypeOf(v.url);
			resourceTypes[type] = (resourceTypes[type] ?? 0) + 1;
		}

		tracks.push({
			technology: tech,
			visitCount: visits.length,
			resourceTypes,
			timeSpan: { start: visits[0].visitedAt, end: visits[visits.length - 1].visitedAt },
			sampleResources: visits.slice(0, SAMPLE_RESOURCE_LIMIT),
		});
	}

	return tracks.sort((a, b) => b.visitCount - a.visitCount);
}
