import { z } from "zod";
import { InvalidInputShapeError } from "../errors";
import {
	HistoryEntry,
	NormalizeResult,
	TIMESTAMP_SOURCES,
	TimestampSource,
} from "../types";

// ── Epoch conversion ─────────────────────────────

/** Milliseconds between 1601-01-01 (Windows/Chromium epoch) and 1970-01-01. */
const CHROME_EPOCH_OFFSET_MS = 11_644_473_600_000;
/** Seconds between 1970-01-01 and 2001-01-01 (Core Data / Safari epoch). */
const APPLE_EPOCH_OFFSET_S = 978_307_200;

export function chromeEpochToDate(ts: number): Date {
	return new Date(Math.floor(ts / 1000 - CHROME_EPOCH_OFFSET_MS));
}

export function firefoxEpochToDate(ts: number): Date {
	return new Date(Math.floor(ts / 1000));
}

export function safariEpochToDate(ts: number): Date {
	return new Date(Math.round((ts + APPLE_EPOCH_OFFSET_S) * 1000));
}

/** Reverse of chromeEpochToDate — used to build `since` filters for Chromium queries. */
export function dateToChromeEpoch(date: Date): number {
	return (date.getTime() + CHROME_EPOCH_OFFSET_MS) * 1000;
}

/**
 * Guess the encoding of a bare number by magnitude. Each threshold sits in
 * the early 1970s of the next-coarser unit, so no present-day value lands in
 * the wrong bucket. Safari values overlap Unix seconds and must be tagged.
 */
export function inferNumericSource(value: number): TimestampSource {
	if (value >= 1e16) return "chromium";
	if (value >= 1e14) return "firefox";
	if (value >= 1e11) return "unix_ms";
	return "unix_s";
}

const NUMERIC_STRING_RE = /^-?\d+(\.\d+)?$/;
const ZONED_ISO_RE = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;
const LOCAL_ISO_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;

function parseIsoUtc(raw: string): Date | null {
	let text = raw;
	if (!ZONED_ISO_RE.test(text)) {
		if (LOCAL_ISO_RE.test(text)) {
			text = `${text.replace(" ", "T")}Z`;
		} else if (!DATE_ONLY_RE.test(text)) {
			return null;
		}
	}
	const ms = Date.parse(text);
	return Number.isNaN(ms) ? null : new Date(ms);
}

function decodeNumber(value: number, source: TimestampSource): Date | null {
	if (!Number.isFinite(value) || value <= 0) return null;
	switch (source) {
		case "chromium": return chromeEpochToDate(value);
		case "firefox": return firefoxEpochToDate(value);
		case "safari": return safariEpochToDate(value);
		case "unix_ms": return new Date(Math.floor(value));
		case "unix_s": return new Date(Math.round(value * 1000));
		case "iso": return null;
	}
}

export interface DecodedTimestamp {
	date: Date;
	source: TimestampSource;
}

/**
 * Decode a source-specific timestamp into an absolute instant.
 * Returns null when the value cannot be read; never throws.
 */
export function decodeTimestamp(raw: unknown, source?: TimestampSource): DecodedTimestamp | null {
	if (raw instanceof Date) {
		return Number.isNaN(raw.getTime()) ? null : { date: new Date(raw.getTime()), source: source ?? "iso" };
	}

	let value: number | null = null;
	if (typeof raw === "number") {
		value = raw;
	} else if (typeof raw === "bigint") {
		value = Number(raw);
	} else if (typeof raw === "string") {
		const text = raw.trim();
		if (NUMERIC_STRING_RE.test(text)) {
			value = Number(text);
		} else if (source === undefined || source === "iso") {
			const date = text ? parseIsoUtc(text) : null;
			return date ? { date, source: "iso" } : null;
		} else {
			return null;
		}
	} else {
		return null;
	}

	const resolved = source && source !== "iso" ? source : inferNumericSource(value);
	const date = decodeNumber(value, resolved);
	if (!date || Number.isNaN(date.getTime())) return null;
	return { date, source: resolved };
}

// ── Domain extraction ────────────────────────────

/**
 * Second-level public suffixes where the registrable domain keeps three
 * labels (bbc.co.uk, not co.uk).
 */
const MULTI_PART_SUFFIXES = new Set([
	"co.uk", "org.uk", "ac.uk", "gov.uk", "ltd.uk", "me.uk",
	"com.au", "net.au", "org.au", "edu.au", "gov.au",
	"co.nz", "org.nz", "co.jp", "ne.jp", "or.jp", "ac.jp",
	"co.kr", "co.in", "co.za", "co.il",
	"com.br", "com.cn", "com.mx", "com.tr", "com.sg", "com.hk", "com.tw", "com.ar",
]);

const IPV4_RE = /^\d{1,3}(\.\d{1,3}){3}$/;

/** Reduce a hostname to its registrable domain: docs.python.org → python.org. */
export function registrableDomain(host: string): string {
	const h = host.toLowerCase().replace(/\.$/, "");
	if (!h) return "";
	if (IPV4_RE.test(h) || h.startsWith("[")) return h;
	const labels = h.split(".").filter(Boolean);
	if (labels.length <= 2) return labels.join(".");
	const lastTwo = labels.slice(-2).join(".");
	if (MULTI_PART_SUFFIXES.has(lastTwo)) return labels.slice(-3).join(".");
	return lastTwo;
}

/**
 * Parse the host and registrable domain from a URL. Anything that is not an
 * http(s) URL with a hostname yields empty strings.
 */
export function parseDomain(rawUrl: string): { host: string; domain: string } {
	try {
		const url = new URL(rawUrl);
		if (url.protocol !== "http:" && url.protocol !== "https:") return { host: "", domain: "" };
		const host = url.hostname.toLowerCase().replace(/\.$/, "").replace(/^www\./, "");
		if (!host) return { host: "", domain: "" };
		return { host, domain: registrableDomain(host) };
	} catch {
		return { host: "", domain: "" };
	}
}

// ── Row normalization ────────────────────────────

const InputShapeSchema = z.array(z.unknown());
const UrlField = z.string().trim().min(1);
const TitleField = z.string().nullish();
const VisitCountField = z
	.union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
	.pipe(z.number().int().nonnegative())
	.nullish();
const SourceField = z.enum(TIMESTAMP_SOURCES).optional();

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export interface NormalizeOptions {
	/** Encoding for rows that carry no `source`. Omit to infer per value. */
	defaultSource?: TimestampSource;
}

type RowOutcome =
	| { kind: "ok"; entry: HistoryEntry; degraded: boolean }
	| { kind: "skipped" };

function normalizeRow(row: Record<string, unknown>, options: NormalizeOptions): RowOutcome {
	let degraded = false;

	const sourceResult = SourceField.safeParse(row.source);
	if (!sourceResult.success) degraded = true;
	const source = (sourceResult.success ? sourceResult.data : undefined) ?? options.defaultSource;

	const decoded = decodeTimestamp(row.timestamp ?? row.visited_at ?? row.last_visit_time, source);
	if (!decoded) return { kind: "skipped" };

	const urlResult = UrlField.safeParse(row.url);
	if (!urlResult.success) degraded = true;
	const url = urlResult.success ? urlResult.data : "";

	const titleResult = TitleField.safeParse(row.title);
	if (!titleResult.success) degraded = true;
	const title = titleResult.success ? (titleResult.data ?? "") : "";

	const countResult = VisitCountField.safeParse(row.visit_count ?? row.visitCount);
	if (!countResult.success) degraded = true;
	const visitCount = countResult.success ? (countResult.data ?? 1) : 1;

	const { host, domain } = url ? parseDomain(url) : { host: "", domain: "" };

	const entry: HistoryEntry = Object.freeze({
		url,
		title: title.trim(),
		visitedAt: decoded.date,
		visitCount,
		domain,
		host,
		source: decoded.source,
	});
	return { kind: "ok", entry, degraded };
}

/**
 * Convert raw rows from any supported browser source into HistoryEntry values
 * sorted ascending by visit time.
 *
 * Bad rows never abort the batch: fields that cannot be read fall back to
 * defaults and the row counts as degraded; rows with no readable timestamp
 * are dropped and counted as skipped (and degraded). Only an input that is
 * not a list of records at all is rejected.
 */
export function normalizeRows(input: unknown, options: NormalizeOptions = {}): NormalizeResult {
	const shape = InputShapeSchema.safeParse(input);
	if (!shape.success) {
		throw new InvalidInputShapeError(
			`Expected an array of history rows, received ${input === null ? "null" : typeof input}`
		);
	}
	const rows = shape.data;
	if (rows.length > 0 && !rows.some(isRecord)) {
		throw new InvalidInputShapeError("Expected history rows to be objects; none of the elements are");
	}

	const entries: HistoryEntry[] = [];
	let degradedRowCount = 0;
	let skippedRowCount = 0;

	for (const row of rows) {
		if (!isRecord(row)) {
			skippedRowCount++;
			degradedRowCount++;
			continue;
		}
		const outcome = normalizeRow(row, options);
		if (outcome.kind === "skipped") {
			skippedRowCount++;
			degradedRowCount++;
			continue;
		}
		if (outcome.degraded) degradedRowCount++;
		entries.push(outcome.entry);
	}

	entries.sort((a, b) => a.visitedAt.getTime() - b.visitedAt.getTime());
	return { entries, degradedRowCount, skippedRowCount };
}
