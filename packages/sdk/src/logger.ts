/**
 * Logger interface — passive observers of a validation run.
 *
 * Loggers receive LogEntry records for every pipeline phase:
 * scan start/complete, unit results, checksum and golden test outcomes,
 * index writes.
 */

import type { LogEntry } from './types.js';

/**
 * Logger interface.
 *
 * Implement this to create a new log destination.
 * Loggers are called for every pipeline step — they should be fast.
 */
export interface Logger {
	/** Unique logger ID */
	readonly id: string;

	/** Initialize with config */
	init(config: Record<string, unknown>): Promise<void>;

	/**
	 * Called for every pipeline step.
	 * Should not throw — log errors should be handled internally.
	 */
	log(entry: LogEntry): Promise<void>;

	/** Flush any buffered entries */
	flush(): Promise<void>;

	/** Clean shutdown (flush + close) */
	shutdown(): Promise<void>;
}

/**
 * Logger registration — what a logger package exports.
 */
export interface LoggerRegistration {
	/** Unique logger ID */
	id: string;
	/** Logger class */
	logger: new () => Logger;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
}
