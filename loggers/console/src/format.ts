/**
 * Formatting helpers for the console logger.
 *
 * Compact form, one line per entry:
 *   10:30:45.123 ✗ unit.fail        unit=email/gmail_to_canonical@1.0.0 12ms checksum mismatch (...)
 */

import type { LogEntry, LogPhase } from '@canonizer/sdk';

// ─── Levels ──────────────────────────────────────────────────────────────────

const LEVELS: Record<string, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const PHASE_LEVEL: Record<LogPhase, string> = {
	'scan.start': 'debug',
	'scan.complete': 'info',
	'unit.start': 'debug',
	'unit.pass': 'info',
	'unit.fail': 'warn',
	'checksum.pass': 'debug',
	'checksum.fail': 'warn',
	'golden.pass': 'debug',
	'golden.fail': 'warn',
	'schema.notice': 'warn',
	'index.write': 'info',
	'index.unchanged': 'info',
	'index.skip': 'warn',
	'system.error': 'error',
};

/** Whether an entry of `phase` is shown at the configured `level`. Unknowns are shown. */
export function shouldLog(phase: LogPhase, level: string): boolean {
	const threshold = LEVELS[level];
	const phaseLevel = LEVELS[PHASE_LEVEL[phase]];
	if (threshold === undefined || phaseLevel === undefined) return true;
	return phaseLevel >= threshold;
}

// ─── ANSI ────────────────────────────────────────────────────────────────────

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

const PHASE_STYLE: Record<LogPhase, { icon: string; color: string }> = {
	'scan.start': { icon: '●', color: CYAN },
	'scan.complete': { icon: '●', color: CYAN },
	'unit.start': { icon: '◆', color: CYAN },
	'unit.pass': { icon: '✓', color: GREEN },
	'unit.fail': { icon: '✗', color: RED },
	'checksum.pass': { icon: '#', color: GREEN },
	'checksum.fail': { icon: '#', color: RED },
	'golden.pass': { icon: '▷', color: GREEN },
	'golden.fail': { icon: '▷', color: RED },
	'schema.notice': { icon: 'ℹ', color: YELLOW },
	'index.write': { icon: '⇩', color: GREEN },
	'index.unchanged': { icon: '=', color: DIM },
	'index.skip': { icon: '↷', color: YELLOW },
	'system.error': { icon: '⚠', color: RED },
};

const FAILURE_PHASES = new Set<LogPhase>([
	'unit.fail',
	'checksum.fail',
	'golden.fail',
	'system.error',
]);

function paint(text: string, color: string, useColor: boolean): string {
	return useColor ? `${color}${text}${RESET}` : text;
}

function formatTime(timestamp: string): string {
	const d = new Date(timestamp);
	if (Number.isNaN(d.getTime())) return timestamp;
	const pad = (n: number, width = 2) => String(n).padStart(width, '0');
	return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

// ─── Formatters ──────────────────────────────────────────────────────────────

export function formatCompact(entry: LogEntry, useColor: boolean): string {
	const style = PHASE_STYLE[entry.phase] ?? { icon: '?', color: RESET };
	const parts = [
		paint(formatTime(entry.timestamp), DIM, useColor),
		paint(`${style.icon} ${entry.phase.padEnd(15)}`, style.color, useColor),
	];

	if (entry.unit) parts.push(`unit=${entry.unit}`);
	if (entry.test) parts.push(`test=${entry.test}`);
	if (entry.duration_ms !== undefined) parts.push(paint(`${entry.duration_ms}ms`, DIM, useColor));
	if (entry.message) {
		parts.push(FAILURE_PHASES.has(entry.phase) ? paint(entry.message, RED, useColor) : entry.message);
	}

	return parts.join(' ');
}

export function formatVerbose(entry: LogEntry, useColor: boolean, showMetadata: boolean): string {
	const line = formatCompact(entry, useColor);
	if (!showMetadata || !entry.metadata || Object.keys(entry.metadata).length === 0) {
		return line;
	}
	const body = JSON.stringify(entry.metadata, null, 2)
		.split('\n')
		.map((l) => `    ${l}`)
		.join('\n');
	return `${line}\n${paint(`  metadata:\n${body}`, DIM, useColor)}`;
}
