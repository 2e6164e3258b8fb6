import { HistoryEntry } from "../types";

/**
 * Entries whose URL or title contains `query`, ignoring case, in input order.
 * A blank query matches nothing.
 */
export function searchHistory(entries: readonly HistoryEntry[], query: string): HistoryEntry[] {
	const needle = query.trim().toLowerCase();
	if (!needle) return [];
	return entries.filter(
		(e) => e.url.toLowerCase().includes(needle) || e.title.toLowerCase().includes(needle)
	);
}
