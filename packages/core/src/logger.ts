/**
 * LoggerManager — fans pipeline log entries out to every registered logger.
 *
 * A logger that rejects never fails the run; the failure is handed to the
 * `onError` callback (a process warning by default).
 */

import type { LogEntry, Logger } from '@canonizer/sdk';

export type LoggerErrorHandler = (error: Error, logger: Logger) => void;

const emitWarning: LoggerErrorHandler = (error, logger) => {
	process.emitWarning(`Logger "${logger.id}" failed: ${error.message}`, 'LoggerWarning');
};

export class LoggerManager {
	private readonly loggers: readonly Logger[];
	private readonly onError: LoggerErrorHandler;

	constructor(loggers: readonly Logger[] = [], onError: LoggerErrorHandler = emitWarning) {
		this.loggers = [...loggers];
		this.onError = onError;
	}

	async log(entry: LogEntry): Promise<void> {
		await this.each((logger) => logger.log(entry));
	}

	async flush(): Promise<void> {
		await this.each((logger) => logger.flush());
	}

	async shutdown(): Promise<void> {
		await this.each((logger) => logger.shutdown());
	}

	private async each(fn: (logger: Logger) => Promise<void>): Promise<void> {
		const results = await Promise.allSettled(this.loggers.map((logger) => fn(logger)));
		results.forEach((result, i) => {
			if (result.status === 'rejected') {
				const reason: unknown = result.reason;
				this.onError(reason instanceof Error ? reason : new Error(String(reason)), this.loggers[i]);
			}
		});
	}
}
