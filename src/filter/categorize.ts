import { z } from "zod";
import rawRules from "./category-rules.json";
import {
	CATEGORIES,
	Category,
	CategorizationResult,
	HistoryEntry,
	UncategorizedDomain,
} from "../types";

// ── Rule tables ──────────────────────────────────────────────
//
// Matcher chain, first hit wins:
//   1. Caller overrides (domain → category)
//   2. Domain table — most specific host suffix first, so mail.google.com
//      beats the generic google.com entry
//   3. Title keywords, in taxonomy order
//   4. URL path patterns, in taxonomy order
//   5. Generic-domain fallback (search engines → reference)
//   6. "uncategorized"
//
// The tables live in category-rules.json and are validated on load.

const CategorySchema = z.enum(CATEGORIES);

const CategoryRulesSchema = z.object({
	domains: z.record(CategorySchema, z.array(z.string())),
	subcategories: z.record(CategorySchema, z.record(z.string(), z.array(z.string()))),
	titleKeywords: z.record(CategorySchema, z.array(z.string())),
	pathPatterns: z.record(CategorySchema, z.array(z.string())),
	genericDomains: z.record(
		z.string(),
		z.object({
			fallback: CategorySchema.nullable(),
			domains: z.array(z.string()),
		})
	),
});

export type CategoryRules = z.infer<typeof CategoryRulesSchema>;

export const CATEGORY_RULES: CategoryRules = CategoryRulesSchema.parse(rawRules);

type DomainRule =
	| { kind: "category"; category: Category }
	| { kind: "generic"; group: string; fallback: Category | null };

function buildDomainTable(rules: CategoryRules): Map<string, DomainRule> {
	const table = new Map<string, DomainRule>();
	for (const category of CATEGORIES) {
		for (const domain of rules.domains[category] ?? []) {
			if (!table.has(domain)) table.set(domain, { kind: "category", category });
		}
	}
	for (const [group, { fallback, domains }] of Object.entries(rules.genericDomains)) {
		for (const domain of domains) {
			if (!table.has(domain)) table.set(domain, { kind: "generic", group, fallback });
		}
	}
	return table;
}

function buildSubcategoryTable(rules: CategoryRules): Map<string, { category: Category; name: string }> {
	const table = new Map<string, { category: Category; name: string }>();
	for (const category of CATEGORIES) {
		for (const [name, domains] of Object.entries(rules.subcategories[category] ?? {})) {
			for (const domain of domains) {
				if (!table.has(domain)) table.set(domain, { category, name });
			}
		}
	}
	return table;
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileOrdered(
	source: Partial<Record<Category, string[]>>,
	toRegExp: (pattern: string) => RegExp
): Array<[RegExp, Category]> {
	const compiled: Array<[RegExp, Category]> = [];
	for (const category of CATEGORIES) {
		for (const pattern of source[category] ?? []) {
			compiled.push([toRegExp(pattern), category]);
		}
	}
	return compiled;
}

const DOMAIN_TABLE = buildDomainTable(CATEGORY_RULES);
const SUBCATEGORY_TABLE = buildSubcategoryTable(CATEGORY_RULES);
const TITLE_KEYWORDS = compileOrdered(
	CATEGORY_RULES.titleKeywords,
	(k) => new RegExp(`\\b${escapeRegExp(k)}\\b`, "i")
);
const PATH_PATTERNS = compileOrdered(CATEGORY_RULES.pathPatterns, (p) => new RegExp(p, "i"));

// ── Matcher chain ────────────────────────────────────────────

/**
 * A host and each of its parent domains, most specific first, stopping
 * before the bare TLD: en.m.wikipedia.org → [en.m.wikipedia.org, m.wikipedia.org, wikipedia.org].
 */
export function hostSuffixes(host: string): string[] {
	const labels = host.split(".").filter(Boolean);
	if (labels.length <= 1) return labels;
	const suffixes: string[] = [];
	for (let i = 0; i < labels.length - 1; i++) {
		suffixes.push(labels.slice(i).join("."));
	}
	return suffixes;
}

interface MatchContext {
	url: string;
	title: string;
	suffixes: string[];
	overrides: Readonly<Record<string, Category>>;
	domainRule: DomainRule | null;
}

type Matcher = (ctx: MatchContext) => Category | null;

function lookupDomainRule(suffixes: string[]): DomainRule | null {
	for (const s of suffixes) {
		const rule = DOMAIN_TABLE.get(s);
		if (rule) return rule;
	}
	return null;
}

const matchOverride: Matcher = ({ suffixes, overrides }) => {
	for (const s of suffixes) {
		if (Object.prototype.hasOwnProperty.call(overrides, s)) return overrides[s];
	}
	return null;
};

const matchDomainTable: Matcher = ({ domainRule }) =>
	domainRule?.kind === "category" ? domainRule.category : null;

const matchTitleKeywords: Matcher = ({ title }) => {
	if (!title) return null;
	for (const [pattern, category] of TITLE_KEYWORDS) {
		if (pattern.test(title)) return category;
	}
	return null;
};

const matchPathPatterns: Matcher = ({ url }) => {
	let pathname: string;
	try {
		pathname = new URL(url).pathname;
	} catch {
		return null;
	}
	for (const [pattern, category] of PATH_PATTERNS) {
		if (pattern.test(pathname)) return category;
	}
	return null;
};

const matchGenericFallback: Matcher = ({ domainRule }) =>
	domainRule?.kind === "generic" ? domainRule.fallback : null;

const MATCHERS: readonly Matcher[] = [
	matchOverride,
	matchDomainTable,
	matchTitleKeywords,
	matchPathPatterns,
	matchGenericFallback,
];

function runMatchers(ctx: MatchContext): Category {
	for (const matcher of MATCHERS) {
		const category = matcher(ctx);
		if (category) return category;
	}
	return "uncategorized";
}

// ── Public API ───────────────────────────────────────────────

/**
 * Categorize a bare host or domain with an optional title and URL.
 * Deterministic: the same arguments always produce the same category.
 */
export function categorizeDomain(
	domain: string,
	title = "",
	overrides: Readonly<Record<string, Category>> = {},
	url = ""
): Category {
	const host = domain.trim().toLowerCase().replace(/^www\./, "");
	const suffixes = hostSuffixes(host);
	return runMatchers({
		url,
		title,
		suffixes,
		overrides,
		domainRule: lookupDomainRule(suffixes),
	});
}

export function categorizeEntry(
	entry: HistoryEntry,
	overrides: Readonly<Record<string, Category>> = {}
): Category {
	return categorizeDomain(entry.host || entry.domain, entry.title, overrides, entry.url);
}

/** Named subcategory for a host within the given category, if the rules define one. */
export function subcategoryOf(host: string, category: Category): string | null {
	for (const s of hostSuffixes(host)) {
		const sub = SUBCATEGORY_TABLE.get(s);
		if (sub) return sub.category === category ? sub.name : null;
	}
	return null;
}

/**
 * Pick the category with the most votes. Ties go to the category declared
 * first in CATEGORIES; no votes at all means "uncategorized".
 */
export function dominantCategory(votes: Iterable<Category>): Category {
	const counts = new Map<Category, number>();
	for (const c of votes) counts.set(c, (counts.get(c) ?? 0) + 1);

	let best: Category = "uncategorized";
	let bestCount = 0;
	for (const category of CATEGORIES) {
		const n = counts.get(category) ?? 0;
		if (n > bestCount) {
			best = category;
			bestCount = n;
		}
	}
	return best;
}

export function emptyCategoryBreakdown(): Record<Category, number> {
	return {
		work: 0,
		development: 0,
		learning: 0,
		reference: 0,
		news: 0,
		social: 0,
		entertainment: 0,
		shopping: 0,
		finance: 0,
		health: 0,
		uncategorized: 0,
	};
}

/**
 * Categorize a batch of entries.
 *
 * Besides the per-entry assignments, returns the per-domain view (most
 * frequent category per domain) and every domain whose most frequent
 * category is "uncategorized", once, with a few sample titles so the caller
 * can ask the user to classify it. Entries without a domain are assigned a category but
 * never appear in the domain-keyed views.
 */
export function categorizeEntries(
	entries: readonly HistoryEntry[],
	overrides: Readonly<Record<string, Category>> = {},
	sampleTitleLimit = 5
): CategorizationResult {
	const assignments = new Map<HistoryEntry, Category>();
	const votesByDomain = new Map<string, Category[]>();
	const subcategories: Record<string, string> = {};
	const uncategorized = new Map<string, UncategorizedDomain>();
	const categoryBreakdown = emptyCategoryBreakdown();

	for (const entry of entries) {
		const category = categorizeEntry(entry, overrides);
		assignments.set(entry, category);
		categoryBreakdown[category]++;

		if (!entry.domain) continue;

		const votes = votesByDomain.get(entry.domain);
		if (votes) {
			votes.push(category);
		} else {
			votesByDomain.set(entry.domain, [category]);
		}

		if (!(entry.domain in subcategories)) {
			const sub = subcategoryOf(entry.host, category);
			if (sub) subcategories[entry.domain] = sub;
		}

		if (category === "uncategorized") {
			let bucket = uncategorized.get(entry.domain);
			if (!bucket) {
				bucket = { domain: entry.domain, sampleTitles: [] };
				uncategorized.set(entry.domain, bucket);
			}
			if (
				entry.title &&
				bucket.sampleTitles.length < sampleTitleLimit &&
				!bucket.sampleTitles.includes(entry.title)
			) {
				bucket.sampleTitles.push(entry.title);
			}
		}
	}

	const domainCategories: Record<string, Category> = {};
	for (const [domain, votes] of votesByDomain) {
		domainCategories[domain] = dominantCategory(votes);
	}

	return {
		assignments,
		domainCategories,
		subcategories,
		uncategorizedDomains: [...uncategorized.values()].filter(
			(d) => domainCategories[d.domain] === "uncategorized"
		),
		categoryBreakdown,
	};
}
