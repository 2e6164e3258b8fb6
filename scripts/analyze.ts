/**
 * analyze.ts — History analysis CLI
 *
 * Read browser history from a SQLite file or a JSON dump, run the analysis
 * and print the report as JSON.
 *
 * Usage:
 *   npx tsx scripts/analyze.ts --db <path> --browser chromium|firefox|safari [options]
 *   npx tsx scripts/analyze.ts --input rows.json [options]
 *
 * Options:
 *   --db <path>              History database (Chromium "History", places.sqlite, History.db)
 *   --browser <kind>         chromium | firefox | safari (required with --db)
 *   --input <file>           JSON array of raw rows instead of a database
 *   --since-days <n>         Only visits from the last n days (with --db)
 *   --limit <n>              Only the n most recent visits (with --db)
 *   --config <file>          JSON settings file
 *   --depth <depth>          quick_summary | basic | comprehensive
 *   --search <query>         Print matching entries instead of a report
 *   --out <file>             Write to file instead of stdout
 *   --debug                  Stage timings on stderr
 */

import { readFileSync, writeFileSync } from "fs";
import { parseArgs } from "util";

import { AnalysisError } from "../src/errors";
import { error } from "../src/log";
import { AnalysisDepthSchema, parseSettings } from "../src/settings/types";
import { HISTORY_DATABASE_KINDS, HistoryDatabaseKind, readBrowserHistory } from "../src/collect/browser";
import { normalizeRows } from "../src/collect/normalize";
import { searchHistory } from "../src/filter/search";
import { analyzeHistory } from "../src/analyze/report";

const DAY_MS = 86_400_000;

function isDatabaseKind(value: string): value is HistoryDatabaseKind {
	return HISTORY_DATABASE_KINDS.some((k) => k === value);
}

function positiveInt(flag: string, value: string | undefined): number | undefined {
	if (value === undefined) return undefined;
	const n = Number(value);
	if (!Number.isInteger(n) || n <= 0) throw new Error(`--${flag} expects a positive integer, got "${value}"`);
	return n;
}

function readJson(path: string): unknown {
	return JSON.parse(readFileSync(path, "utf-8"));
}

function output(data: unknown, outFile: string | undefined): void {
	const text = JSON.stringify(data, null, 2);
	if (outFile) {
		writeFileSync(outFile, text, "utf-8");
		console.error(`[analyze] Written to ${outFile}`);
	} else {
		process.stdout.write(text + "\n");
	}
}

async function loadRows(values: {
	db?: string;
	browser?: string;
	input?: string;
	"since-days"?: string;
	limit?: string;
}): Promise<unknown> {
	if (values.input) return readJson(values.input);

	if (!values.db) throw new Error("Pass --db <path> --browser <kind>, or --input <file>");
	const kind = values.browser ?? "";
	if (!isDatabaseKind(kind)) {
		throw new Error(`--browser must be one of ${HISTORY_DATABASE_KINDS.join(", ")}`);
	}
	const sinceDays = positiveInt("since-days", values["since-days"]);
	return readBrowserHistory(values.db, kind, {
		since: sinceDays === undefined ? undefined : new Date(Date.now() - sinceDays * DAY_MS),
		limit: positiveInt("limit", values.limit),
	});
}

async function main(): Promise<void> {
	const { values } = parseArgs({
		options: {
			db: { type: "string" },
			browser: { type: "string" },
			input: { type: "string" },
			"since-days": { type: "string" },
			limit: { type: "string" },
			config: { type: "string" },
			depth: { type: "string" },
			search: { type: "string" },
			out: { type: "string" },
			debug: { type: "boolean", default: false },
		},
		strict: true,
	});

	const settings = parseSettings(values.config ? readJson(values.config) : undefined);
	if (values.depth !== undefined) settings.analysisDepth = AnalysisDepthSchema.parse(values.depth);
	if (values.debug) settings.debugMode = true;

	const rows = await loadRows(values);

	if (values.search !== undefined) {
		const { entries } = normalizeRows(rows);
		output(searchHistory(entries, values.search), values.out);
		return;
	}

	output(analyzeHistory(rows, settings), values.out);
}

main().catch((e: unknown) => {
	if (e instanceof AnalysisError) {
		error(`[${e.code}] ${e.message}`);
	} else {
		error("Fatal error:", e instanceof Error ? e.message : String(e));
	}
	process.exit(1);
});
