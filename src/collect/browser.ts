import { readFile } from "fs/promises";
import { createRequire } from "module";
import initSqlJs from "sql.js";
import { HistoryReadError } from "../errors";
import { debug, warn } from "../log";
import { RawHistoryRow, TimestampSource } from "../types";
import { dateToChromeEpoch } from "./normalize";

// ── SQLite via sql.js (WebAssembly) ──────────────
// SQLite compiled to WASM: no native binaries and no sqlite3 CLI. The file is
// read into memory and opened there, so the browser's copy is never written.

export type SqlValue = number | string | Uint8Array | null;

/** Runs one parameterized statement against a database file and returns the raw rows. */
export type QueryFn = (dbPath: string, sql: string, params: SqlValue[]) => Promise<SqlValue[][]>;

const requireFromHere = createRequire(import.meta.url);

let _sqlJs: ReturnType<typeof initSqlJs> | undefined;
function loadSqlJs(): ReturnType<typeof initSqlJs> {
	_sqlJs ??= initSqlJs({ locateFile: (file: string) => requireFromHere.resolve(`sql.js/dist/${file}`) });
	return _sqlJs;
}

export async function querySqlite(dbPath: string, sql: string, params: SqlValue[]): Promise<SqlValue[][]> {
	const SQL = await loadSqlJs();
	const buf = await readFile(dbPath);
	const db = new SQL.Database(buf);
	try {
		const stmt = db.prepare(sql);
		try {
			stmt.bind(params);
			const rows: SqlValue[][] = [];
			while (stmt.step()) rows.push(stmt.get());
			return rows;
		} finally {
			stmt.free();
		}
	} finally {
		db.close();
	}
}

// ── Per-browser queries ──────────────────────────

export type HistoryDatabaseKind = "chromium" | "firefox" | "safari";

export const HISTORY_DATABASE_KINDS: readonly HistoryDatabaseKind[] = ["chromium", "firefox", "safari"];

const APPLE_EPOCH_OFFSET_S = 978_307_200;

interface HistoryQuery {
	source: TimestampSource;
	/** Columns: url, title, visit time, visit count. Params: since, limit. */
	sql: string;
	encodeSince: (since: Date) => number;
}

// Chromium: transition & 0xFF of 3/4 is AUTO_SUBFRAME/MANUAL_SUBFRAME, i.e.
// iframe loads rather than pages the user opened.
const QUERIES: Record<HistoryDatabaseKind, HistoryQuery> = {
	chromium: {
		source: "chromium",
		sql:
			"SELECT urls.url, urls.title, visits.visit_time, urls.visit_count FROM visits " +
			"JOIN urls ON visits.url = urls.id " +
			"WHERE visits.visit_time > ? AND (visits.transition & 255) NOT IN (3, 4) " +
			"ORDER BY visits.visit_time DESC LIMIT ?",
		encodeSince: dateToChromeEpoch,
	},
	firefox: {
		source: "firefox",
		sql:
			"SELECT p.url, p.title, h.visit_date, p.visit_count FROM moz_historyvisits h " +
			"JOIN moz_places p ON h.place_id = p.id " +
			"WHERE h.visit_date > ? AND p.hidden = 0 " +
			"ORDER BY h.visit_date DESC LIMIT ?",
		encodeSince: (since) => since.getTime() * 1000,
	},
	safari: {
		source: "safari",
		sql:
			"SELECT i.url, v.title, v.visit_time, i.visit_count FROM history_visits v " +
			"JOIN history_items i ON v.history_item = i.id " +
			"WHERE v.visit_time > ? " +
			"ORDER BY v.visit_time DESC LIMIT ?",
		encodeSince: (since) => since.getTime() / 1000 - APPLE_EPOCH_OFFSET_S,
	},
};

export interface ReadHistoryOptions {
	/** Only visits strictly after this instant. */
	since?: Date;
	/** Most recent N visits. */
	limit?: number;
}

function cellText(value: SqlValue | undefined): string | null {
	if (typeof value === "string") return value;
	if (typeof value === "number") return String(value);
	return null;
}

function toRawRow(row: SqlValue[], source: TimestampSource): RawHistoryRow | null {
	const [url, title, time, count] = row;
	if (typeof time !== "number" && typeof time !== "string") return null;
	return {
		url: cellText(url) ?? "",
		title: cellText(title),
		timestamp: time,
		visit_count: typeof count === "number" ? count : null,
		source,
	};
}

/**
 * Read visits from an already-located browser history database.
 *
 * Rows come back unnormalized, newest first, tagged with the timestamp
 * encoding of their browser so normalizeRows never has to guess. `query` is
 * injectable so tests can stand in for sql.js.
 */
export async function readBrowserHistory(
	historyPath: string,
	kind: HistoryDatabaseKind,
	options: ReadHistoryOptions = {},
	query: QueryFn = querySqlite
): Promise<RawHistoryRow[]> {
	const { source, sql, encodeSince } = QUERIES[kind];
	// SQLite reads a negative LIMIT as "no limit"
	const params: SqlValue[] = [
		options.since ? encodeSince(options.since) : 0,
		options.limit ?? -1,
	];

	let rows: SqlValue[][];
	try {
		rows = await query(historyPath, sql, params);
	} catch (e) {
		warn(`${kind} history query failed for ${historyPath}:`, e);
		throw new HistoryReadError(historyPath, e);
	}

	const result: RawHistoryRow[] = [];
	let dropped = 0;
	for (const row of rows) {
		const raw = toRawRow(row, source);
		if (raw) result.push(raw);
		else dropped++;
	}
	debug(`read ${result.length} ${kind} visits from ${historyPath} (${dropped} without a visit time)`);
	return result;
}
