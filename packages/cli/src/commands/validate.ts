/**
 * can-registry validate — Check every unit in a registry.
 *
 * Exit code 0 when every unit passes, 1 otherwise. With --write-index the
 * index is regenerated after a fully passing run.
 */

import { resolve } from 'node:path';
import type { RegenerateIndexResult, ValidationReport, ValidationScope } from '@canonizer/core';
import { RegistryValidator, VALIDATION_SCOPES, regenerateIndex } from '@canonizer/core';
import type { Command } from 'commander';
import { InvalidArgumentError, Option } from 'commander';
import { loadRegistryConfig } from '../config.js';
import * as output from '../output.js';
import type { GlobalOptions } from '../runner.js';
import {
	createEvaluator,
	createLoggers,
	effectiveLogLevel,
	printIndexResult,
	printReport,
	readGlobalOptions,
	serializeIndexResult,
	serializeReport,
} from '../runner.js';

export type PartialScope = Exclude<ValidationScope, 'all'>;

const PARTIAL_SCOPES = VALIDATION_SCOPES.filter((scope): scope is PartialScope => scope !== 'all');

export interface ValidateCommandOptions {
	only?: PartialScope;
	concurrency?: number;
	writeIndex?: boolean;
	/** Index output file; defaults to the configured one */
	output?: string;
}

export function parsePositiveInt(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n) || n < 1) {
		throw new InvalidArgumentError('Must be a positive integer.');
	}
	return n;
}

function isPartialScope(value: unknown): value is PartialScope {
	return PARTIAL_SCOPES.some((scope) => scope === value);
}

export interface ValidateOutcome {
	exitCode: number;
	report: ValidationReport;
	index?: RegenerateIndexResult;
}

/**
 * Validate the registry at `path` and optionally regenerate its index.
 * Rendering follows the current output mode.
 */
export async function runValidate(
	path: string | undefined,
	opts: ValidateCommandOptions,
	globals: GlobalOptions,
): Promise<ValidateOutcome> {
	const root = resolve(path ?? '.');
	const config = await loadRegistryConfig({ root, configPath: globals.config });
	const level = effectiveLogLevel(config, globals);
	const loggers = await createLoggers({ ...config.logging, level });
	output.verbose(`Config: ${config.source ?? 'defaults'} (log level ${level})`);

	const validator = new RegistryValidator({
		root,
		evaluator: createEvaluator(),
		loggers,
		acceptedDrafts: config.schemas.accepted_drafts,
		requiredDirs: config.validate.required_dirs,
		concurrency: opts.concurrency ?? config.validate.concurrency,
		scope: opts.only ?? 'all',
	});

	const spin = output.spinner(`Validating ${root}`);
	let finished = 0;
	validator.on('unit', (unit) => {
		finished++;
		spin.text = `Validated ${finished} unit${finished === 1 ? '' : 's'} (${unit.id})`;
	});

	let report: ValidationReport;
	let index: RegenerateIndexResult | undefined;
	try {
		report = await validator.validate();
		if (opts.writeIndex) {
			index = await regenerateIndex(report, { output: opts.output ?? config.index.output, loggers });
		}
	} finally {
		spin.stop();
		await validator.shutdown();
	}

	if (output.isJsonMode()) {
		output.json({
			...serializeReport(report),
			...(index ? { index: serializeIndexResult(index) } : {}),
		});
	} else {
		printReport(report);
		if (index) printIndexResult(index);
	}

	return { exitCode: report.ok ? 0 : 1, report, index };
}

// ─── Command registration ────────────────────────────────────────────────────

export function registerValidateCommand(program: Command): void {
	program
		.command('validate [path]')
		.description('Validate structure, transforms, and schemas of a registry')
		.addOption(
			new Option('--only <part>', 'Validate only one part of the registry').choices(PARTIAL_SCOPES),
		)
		.option('--concurrency <n>', 'Units validated in parallel', parsePositiveInt)
		.option('--write-index', 'Regenerate the index when every unit passes')
		.action(async (path: string | undefined, opts: Record<string, unknown>, cmd: Command) => {
			try {
				const globals = readGlobalOptions(cmd.optsWithGlobals());
				const { exitCode } = await runValidate(
					path,
					{
						only: isPartialScope(opts.only) ? opts.only : undefined,
						concurrency: typeof opts.concurrency === 'number' ? opts.concurrency : undefined,
						writeIndex: opts.writeIndex === true,
					},
					globals,
				);
				process.exitCode = exitCode;
			} catch (err) {
				output.error(`Validation failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
