/**
 * Formatting and color logic for the console logger.
 *
 * Uses ANSI escape codes directly.
 */

import type { LogEntry, LogLevel, LogPhase } from '@cadence/sdk';

// ANSI color codes
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const MAGENTA = '\x1b[35m';
const CYAN = '\x1b[36m';

interface PhaseStyle {
	icon: string;
	color: string;
}

const PHASE_STYLES: Record<LogPhase, PhaseStyle> = {
	'registry.init': { icon: '\u25cf', color: BLUE }, // ●
	'registry.duplicate': { icon: '\u26a0', color: YELLOW }, // ⚠
	'unit.loaded': { icon: '\u25c6', color: CYAN }, // ◆
	'unit.skipped': { icon: '\u25c6', color: DIM }, // ◆
	'unit.error': { icon: '\u2717', color: RED }, // ✗
	'unit.duplicate': { icon: '\u26a0', color: YELLOW }, // ⚠
	'resolve.order': { icon: '\u25ba', color: CYAN }, // ►
	'resolve.external': { icon: '\u25ba', color: DIM }, // ►
	'resolve.missing_dependency': { icon: '\u26a0', color: YELLOW }, // ⚠
	'resolve.circular': { icon: '\u21bb', color: YELLOW }, // ↻
	'lifecycle.init': { icon: '\u2713', color: GREEN }, // ✓
	'lifecycle.skip': { icon: '\u25b7', color: DIM }, // ▷
	'lifecycle.error': { icon: '\u26d4', color: RED }, // ⛔
	'lifecycle.log': { icon: '\u25b7', color: BLUE }, // ▷
	'signal.connect': { icon: '\u25b7', color: CYAN }, // ▷
	'signal.error': { icon: '\u2717', color: RED }, // ✗
	'runtime.discover': { icon: '\u25cf', color: MAGENTA }, // ●
	'runtime.start': { icon: '\u25cf', color: MAGENTA }, // ●
	'runtime.shutdown': { icon: '\u25cf', color: MAGENTA }, // ●
};

/**
 * Format a log entry as a compact one-line string.
 */
export function formatCompact(entry: LogEntry, useColor: boolean): string {
	const style = PHASE_STYLES[entry.phase];
	const time = formatTime(entry.timestamp);
	const phase = entry.phase;
	const icon = style.icon;

	const parts: string[] = [];

	if (useColor) {
		parts.push(`${DIM}${time}${RESET}`);
		parts.push(`${style.color}${icon}${RESET}`);
		parts.push(`${style.color}${phase}${RESET}`);
	} else {
		parts.push(time);
		parts.push(icon);
		parts.push(phase);
	}

	if (entry.context) parts.push(`ctx=${entry.context}`);
	if (entry.unit) parts.push(`unit=${entry.unit}`);
	if (entry.signal) parts.push(`signal=${entry.signal}`);
	if (entry.dependency) parts.push(`dep=${entry.dependency}`);
	if (entry.result) parts.push(`result=${entry.result}`);
	if (entry.duration_ms !== undefined) parts.push(`${entry.duration_ms}ms`);
	if (entry.error) {
		if (useColor) {
			parts.push(`${RED}err=${entry.error}${RESET}`);
		} else {
			parts.push(`err=${entry.error}`);
		}
	}

	return parts.join(' ');
}

/**
 * Format a log entry in verbose multi-line format.
 */
export function formatVerbose(entry: LogEntry, useColor: boolean): string {
	const lines: string[] = [formatCompact(entry, useColor)];

	if (entry.metadata) {
		const meta = JSON.stringify(entry.metadata, null, 2);
		if (useColor) {
			lines.push(`  ${DIM}metadata: ${meta}${RESET}`);
		} else {
			lines.push(`  metadata: ${meta}`);
		}
	}

	return lines.join('\n');
}

/**
 * Extract HH:MM:SS.mmm from an ISO timestamp.
 */
function formatTime(timestamp: string): string {
	const d = new Date(timestamp);
	if (Number.isNaN(d.getTime())) return timestamp;
	const h = String(d.getHours()).padStart(2, '0');
	const m = String(d.getMinutes()).padStart(2, '0');
	const s = String(d.getSeconds()).padStart(2, '0');
	const ms = String(d.getMilliseconds()).padStart(3, '0');
	return `${h}:${m}:${s}.${ms}`;
}

/**
 * Map log phases to severity levels for filtering.
 */
const PHASE_LEVELS: Record<LogPhase, number> = {
	'registry.init': 1, // info
	'registry.duplicate': 2, // warn
	'unit.loaded': 0, // debug
	'unit.skipped': 1, // info
	'unit.error': 3, // error
	'unit.duplicate': 2, // warn
	'resolve.order': 0, // debug
	'resolve.external': 0, // debug
	'resolve.missing_dependency': 2, // warn
	'resolve.circular': 2, // warn
	'lifecycle.init': 0, // debug
	'lifecycle.skip': 0, // debug
	'lifecycle.error': 3, // error
	'lifecycle.log': 1, // controller's own level when given
	'signal.connect': 0, // debug
	'signal.error': 3, // error
	'runtime.discover': 1, // info
	'runtime.start': 1, // info
	'runtime.shutdown': 1, // info
};

const LEVEL_VALUES: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === 'string' && Object.hasOwn(LEVEL_VALUES, value);
}

/**
 * Severity of an entry. Controller log lines carry their own level.
 */
export function entryLevel(entry: LogEntry): number {
	const own = entry.metadata?.level;
	if (entry.phase === 'lifecycle.log' && isLogLevel(own)) {
		return LEVEL_VALUES[own];
	}
	return PHASE_LEVELS[entry.phase];
}

/**
 * Check if a log entry should be shown at the given level.
 */
export function shouldLog(entry: LogEntry, level: string): boolean {
	const configLevel = isLogLevel(level) ? LEVEL_VALUES[level] : 1;
	return entryLevel(entry) >= configLevel;
}
