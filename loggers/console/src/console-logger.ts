/**
 * Console logger — human-readable colored output for validation runs.
 *
 * Writes to process.stderr so stdout stays clean for JSON output.
 */

import type { LogEntry, Logger } from '@canonizer/sdk';
import { formatCompact, formatVerbose, shouldLog } from './format.js';

export type ConsoleLogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

export class ConsoleLogger implements Logger {
	readonly id = 'console';
	private level = 'info';
	private useColor = true;
	private compact = true;
	private showMetadata = false;
	private writeFailed = false;

	async init(config: Record<string, unknown>): Promise<void> {
		const { level, color, compact, show_metadata } = config;
		if (typeof level === 'string' && LOG_LEVELS.includes(level)) this.level = level;
		if (typeof color === 'boolean') this.useColor = color;
		if (typeof compact === 'boolean') this.compact = compact;
		if (typeof show_metadata === 'boolean') this.showMetadata = show_metadata;
	}

	async log(entry: LogEntry): Promise<void> {
		if (!shouldLog(entry.phase, this.level)) return;

		const formatted = this.compact
			? formatCompact(entry, this.useColor)
			: formatVerbose(entry, this.useColor, this.showMetadata);

		try {
			process.stderr.write(`${formatted}\n`);
		} catch (err) {
			// Loggers must not throw; a broken stderr is reported once as a warning
			if (!this.writeFailed) {
				this.writeFailed = true;
				process.emitWarning(
					`console logger cannot write: ${err instanceof Error ? err.message : String(err)}`,
				);
			}
		}
	}

	async flush(): Promise<void> {
		// Console output is unbuffered — nothing to flush
	}

	async shutdown(): Promise<void> {
		// No resources to clean up
	}
}
