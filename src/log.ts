/**
 * Namespaced logging for the history analyzer.
 *
 * Library code should use these functions instead of raw console.* calls.
 */

const PREFIX = "History Insights";

let _debugEnabled = false;

/** Synced from settings.debugMode at the start of each analysis run. */
export function setDebugEnabled(enabled: boolean): void {
	_debugEnabled = enabled;
}

/** Debug-level logging — gated behind settings.debugMode. */
export function debug(...args: unknown[]): void {
	if (!_debugEnabled) return;
	console.debug(`${PREFIX}:`, ...args);
}

/** Warning-level logging — non-fatal issues worth investigating. */
export function warn(...args: unknown[]): void {
	console.warn(`${PREFIX}:`, ...args);
}

/** Error-level logging — unexpected failures. */
export function error(...args: unknown[]): void {
	console.error(`${PREFIX}:`, ...args);
}
