/**
 * CLI-level errors. Registry failures are reported through the validation
 * report; these cover what stops the CLI before a run can start.
 */

export class ConfigError extends Error {
	override readonly name = 'ConfigError';

	constructor(
		/** Config file or environment variable at fault */
		readonly source: string,
		readonly reason: string,
	) {
		super(`${source}: ${reason}`);
	}
}
