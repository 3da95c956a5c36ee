/**
 * can-registry index — Regenerate REGISTRY_INDEX.json.
 *
 * Always validates the whole registry first. A registry with any failing
 * unit leaves the existing index untouched and exits 1.
 */

import type { Command } from 'commander';
import * as output from '../output.js';
import type { GlobalOptions } from '../runner.js';
import { readGlobalOptions } from '../runner.js';
import type { ValidateOutcome } from './validate.js';
import { runValidate } from './validate.js';

export interface IndexCommandOptions {
	output?: string;
}

export async function runIndex(
	path: string | undefined,
	opts: IndexCommandOptions,
	globals: GlobalOptions,
): Promise<ValidateOutcome> {
	const outcome = await runValidate(path, { writeIndex: true, output: opts.output }, globals);
	const index = outcome.index;

	if (index && index.status !== 'skipped' && !output.isJsonMode()) {
		output.blank();
		output.table(
			[
				{ header: 'TRANSFORM', key: 'id' },
				{ header: 'VERSION', key: 'version' },
				{ header: 'STATUS', key: 'status' },
			],
			index.index.transforms.map((t) => ({ id: t.id, version: t.version, status: t.status })),
		);
	}

	return { ...outcome, exitCode: index?.status === 'skipped' ? 1 : outcome.exitCode };
}

// ─── Command registration ────────────────────────────────────────────────────

export function registerIndexCommand(program: Command): void {
	program
		.command('index [path]')
		.description('Validate the registry and regenerate its index')
		.option('-o, --output <file>', 'Index file (default: REGISTRY_INDEX.json in the registry)')
		.action(async (path: string | undefined, opts: Record<string, unknown>, cmd: Command) => {
			try {
				const globals = readGlobalOptions(cmd.optsWithGlobals());
				const { exitCode } = await runIndex(
					path,
					{ output: typeof opts.output === 'string' ? opts.output : undefined },
					globals,
				);
				process.exitCode = exitCode;
			} catch (err) {
				output.error(`Index failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
