import {
	BucketDurations,
	Category,
	CategoryAssignments,
	ProductivityBucket,
	ProductivityScore,
	Session,
	TimePeriod,
} from "../types";

const TOP_DOMAIN_LIMIT = 5;

export type ProductivityWeights = Partial<Record<Category, ProductivityBucket>>;

/**
 * Bucket for a category under the given weight table. Categories the table
 * leaves out are neutral, and "uncategorized" is neutral whatever the table says.
 */
export function bucketOf(category: Category, weights: ProductivityWeights): ProductivityBucket {
	if (category === "uncategorized") return "neutral";
	return weights[category] ?? "neutral";
}

function emptyDurations(): BucketDurations {
	return { productiveMs: 0, distractingMs: 0, neutralMs: 0 };
}

function addDuration(target: BucketDurations, bucket: ProductivityBucket, ms: number): void {
	switch (bucket) {
		case "productive": target.productiveMs += ms; break;
		case "distracting": target.distractingMs += ms; break;
		case "neutral": target.neutralMs += ms; break;
	}
}

function ratio(part: number, whole: number): number {
	return whole > 0 ? part / whole : 0;
}

function topDomains(counts: Map<string, number>): Array<{ domain: string; count: number }> {
	return [...counts.entries()]
		.map(([domain, count]) => ({ domain, count }))
		.sort((a, b) => b.count - a.count)
		.slice(0, TOP_DOMAIN_LIMIT);
}

/**
 * Attribute each session's whole duration to the bucket of its dominant
 * category. Nothing is dropped: the three bucket totals always add up to the
 * summed session durations.
 *
 * The per-visit breakdown and top-domain lists look at individual entries,
 * using `categories` for each entry's own category.
 */
export function scoreProductivity(
	sessions: readonly Session[],
	weights: ProductivityWeights,
	categories: CategoryAssignments
): ProductivityScore {
	const totals = emptyDurations();
	const byTimePeriod: Partial<Record<TimePeriod, BucketDurations>> = {};
	const visitBreakdown: Record<ProductivityBucket, number> = { productive: 0, distracting: 0, neutral: 0 };
	const productiveDomains = new Map<string, number>();
	const distractingDomains = new Map<string, number>();

	for (const session of sessions) {
		const bucket = bucketOf(session.dominantCategory, weights);
		addDuration(totals, bucket, session.durationMs);

		const period = session.timePattern.timePeriod;
		const periodTotals = byTimePeriod[period] ?? emptyDurations();
		addDuration(periodTotals, bucket, session.durationMs);
		byTimePeriod[period] = periodTotals;

		for (const entry of session.entries) {
			const entryBucket = bucketOf(categories.get(entry) ?? "uncategorized", weights);
			visitBreakdown[entryBucket]++;
			if (!entry.domain) continue;
			if (entryBucket === "productive") {
				productiveDomains.set(entry.domain, (productiveDomains.get(entry.domain) ?? 0) + 1);
			} else if (entryBucket === "distracting") {
				distractingDomains.set(entry.domain, (distractingDomains.get(entry.domain) ?? 0) + 1);
			}
		}
	}

	const allMs = totals.productiveMs + totals.distractingMs + totals.neutralMs;

	return {
		...totals,
		productivityRatio: ratio(totals.productiveMs, totals.productiveMs + totals.distractingMs),
		distractionRatio: ratio(totals.distractingMs, allMs),
		byTimePeriod,
		visitBreakdown,
		topProductiveDomains: topDomains(productiveDomains),
		topDistractingDomains: topDomains(distractingDomains),
	};
}
