import { z } from "zod";
import { InvalidSettingsError } from "../errors";
import { CATEGORIES, Category, ProductivityBucket } from "../types";

const CategorySchema = z.enum(CATEGORIES);
const BucketSchema = z.enum(["productive", "distracting", "neutral"]);

export const AnalysisDepthSchema = z.enum(["quick_summary", "basic", "comprehensive"]);

export const AnalysisSettingsSchema = z.object({
	/** Inactivity gap that closes a session. */
	sessionGapMinutes: z.number().positive(),
	/** Gap that ends a learning-path segment; normally shorter than the session gap. */
	learningGapMinutes: z.number().positive(),
	/** domain → category, applied before any built-in rule. */
	categoryOverrides: z.record(z.string(), CategorySchema),
	productivityWeights: z.record(CategorySchema, BucketSchema),
	analysisDepth: AnalysisDepthSchema,
	/** Categories whose entries feed learning-path detection. */
	learningCategories: z.array(CategorySchema).min(1),
	/**
	 * Offset applied before reading hour-of-day and calendar day. Timestamps
	 * themselves stay absolute; this only moves the bucketing.
	 */
	utcOffsetMinutes: z.number().int().min(-720).max(840),
	/** Keep only the top N domain stats. null = all. */
	domainStatLimit: z.number().int().positive().nullable(),
	sampleTitleLimit: z.number().int().min(0),
	debugMode: z.boolean(),
});

export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;

export const DEFAULT_PRODUCTIVITY_WEIGHTS: Record<Category, ProductivityBucket> = {
	work: "productive",
	development: "productive",
	learning: "productive",
	reference: "neutral",
	news: "neutral",
	social: "distracting",
	entertainment: "distracting",
	shopping: "distracting",
	finance: "neutral",
	health: "neutral",
	uncategorized: "neutral",
};

export const DEFAULT_SETTINGS: AnalysisSettings = {
	sessionGapMinutes: 30,
	learningGapMinutes: 15,
	categoryOverrides: {},
	productivityWeights: DEFAULT_PRODUCTIVITY_WEIGHTS,
	analysisDepth: "comprehensive",
	learningCategories: ["learning"],
	utcOffsetMinutes: 0,
	domainStatLimit: null,
	sampleTitleLimit: 5,
	debugMode: false,
};

/** Lowercase and drop a leading "www." so override keys line up with entry hosts. */
export function normalizeDomainKey(domain: string): string {
	return domain.trim().toLowerCase().replace(/^www\./, "");
}

/**
 * Validate settings from an untrusted source (a JSON file, a tool call) and
 * fill in defaults. Weights are merged key by key so a caller can change one
 * category without restating the table.
 */
/** Keys set to undefined mean "not given" and must not hide a default. */
function definedOnly(obj: object): Record<string, unknown> {
	return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

export function parseSettings(raw: unknown): AnalysisSettings {
	if (raw === undefined || raw === null) return { ...DEFAULT_SETTINGS };
	if (typeof raw !== "object" || Array.isArray(raw)) {
		throw new InvalidSettingsError(["settings must be an object"]);
	}

	const given = definedOnly(raw);
	const candidate: Record<string, unknown> = { ...DEFAULT_SETTINGS, ...given };
	const weights = given.productivityWeights;
	if (weights && typeof weights === "object" && !Array.isArray(weights)) {
		candidate.productivityWeights = { ...DEFAULT_PRODUCTIVITY_WEIGHTS, ...definedOnly(weights) };
	}

	const parsed = AnalysisSettingsSchema.safeParse(candidate);
	if (!parsed.success) {
		throw new InvalidSettingsError(
			parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
		);
	}

	const overrides: Record<string, Category> = {};
	for (const [domain, category] of Object.entries(parsed.data.categoryOverrides)) {
		overrides[normalizeDomainKey(domain)] = category;
	}
	return { ...parsed.data, categoryOverrides: overrides };
}

export function resolveSettings(overrides: Partial<AnalysisSettings> = {}): AnalysisSettings {
	return parseSettings(overrides);
}
