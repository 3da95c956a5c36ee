/**
 * Shared wiring for the validate and index commands: global options,
 * engine and logger setup, and report rendering.
 */

import type { RegenerateIndexResult, ValidationReport } from '@canonizer/core';
import { register as registerJsonata } from '@canonizer/engine-jsonata';
import { register as registerConsoleLogger } from '@canonizer/logger-console';
import type { Evaluator, EvaluatorRegistration, Logger } from '@canonizer/sdk';
import { TRANSFORM_ENGINE } from '@canonizer/sdk';
import { Ajv } from 'ajv';
import type { SchemaObject } from 'ajv';
import type { LogLevel, RegistryConfig } from './config.js';
import { ConfigError } from './errors.js';
import * as output from './output.js';

// ─── Global options ──────────────────────────────────────────────────────────

export interface GlobalOptions {
	config?: string;
	json: boolean;
	quiet: boolean;
	verbose: boolean;
}

export function readGlobalOptions(opts: Record<string, unknown>): GlobalOptions {
	return {
		config: typeof opts.config === 'string' ? opts.config : undefined,
		json: opts.json === true,
		quiet: opts.quiet === true,
		verbose: opts.verbose === true,
	};
}

export function applyOutputModes(globals: GlobalOptions): void {
	output.setJsonMode(globals.json);
	output.setQuietMode(globals.quiet);
	output.setVerboseMode(globals.verbose);
}

// ─── Engine and loggers ──────────────────────────────────────────────────────

const ENGINES: Array<() => EvaluatorRegistration> = [registerJsonata];

/** Instantiate the registered evaluator for `engine`. */
export function createEvaluator(engine: string = TRANSFORM_ENGINE): Evaluator {
	const registration = ENGINES.map((register) => register()).find((r) => r.engine === engine);
	if (!registration) throw new Error(`no evaluator registered for engine "${engine}"`);
	return new registration.evaluator();
}

/** `--verbose` lowers the threshold to info, `--quiet` raises it to error. */
export function effectiveLogLevel(config: RegistryConfig, globals: GlobalOptions): LogLevel {
	if (globals.quiet) return 'error';
	if (globals.verbose && (config.logging.level === 'warn' || config.logging.level === 'error')) {
		return 'info';
	}
	return config.logging.level;
}

const ajv = new Ajv({ allErrors: true });

function isSchemaObject(value: unknown): value is SchemaObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create the console logger. `settings` is its init config and is checked
 * against the registration's config schema before the logger sees it.
 */
export async function createLoggers(settings: Record<string, unknown>): Promise<Logger[]> {
	const registration = registerConsoleLogger();
	const config: Record<string, unknown> = { color: process.stderr.isTTY === true, ...settings };
	if (isSchemaObject(registration.configSchema)) {
		const validate = ajv.compile(registration.configSchema);
		if (!validate(config)) {
			throw new ConfigError(
				`logger "${registration.id}"`,
				ajv.errorsText(validate.errors, { dataVar: 'logging' }),
			);
		}
	}
	const logger = new registration.logger();
	await logger.init(config);
	return [logger];
}

// ─── Report rendering ────────────────────────────────────────────────────────

export function serializeReport(report: ValidationReport) {
	return {
		root: report.root,
		scope: report.scope,
		ok: report.ok,
		passed: report.passed,
		failed: report.failed,
		notices: report.notices,
		units: report.units.map((unit) => ({
			kind: unit.kind,
			id: unit.id,
			path: unit.path,
			status: unit.status,
			duration_ms: unit.duration_ms,
			failures: unit.failures.map((failure) => failure.toJSON()),
			notices: unit.notices,
			tests: unit.tests.map((test) => ({
				input: test.input,
				expect: test.expect,
				status: test.status,
				duration_ms: test.duration_ms,
			})),
		})),
	};
}

export function serializeIndexResult(result: RegenerateIndexResult) {
	if (result.status === 'skipped') {
		return { status: result.status, path: result.path, reason: result.reason };
	}
	return {
		status: result.status,
		path: result.path,
		transforms: result.index.transforms.length,
		schemas: result.index.schemas.length,
	};
}

/** One line per failed check, notices as warnings, then a summary. */
export function printReport(report: ValidationReport): void {
	for (const unit of report.units) {
		if (unit.status === 'fail') {
			for (const failure of unit.failures) output.validFail(unit.id, failure.message);
		} else if (output.isVerboseMode()) {
			const tests = unit.tests.length;
			output.validPass(unit.id, tests > 0 ? `${tests} golden test${tests === 1 ? '' : 's'}` : 'ok');
		}
		for (const notice of unit.notices) output.validWarn(unit.id, notice);
	}

	output.blank();
	const total = report.passed + report.failed;
	if (report.ok) {
		output.success(`${total} unit${total === 1 ? '' : 's'} passed`);
	} else {
		output.error(`${report.failed} of ${total} units failed`);
	}
}

export function printIndexResult(result: RegenerateIndexResult): void {
	switch (result.status) {
		case 'written':
			output.success(`Index written: ${result.path}`);
			break;
		case 'unchanged':
			output.info(`  = Index unchanged: ${result.path}`);
			break;
		case 'skipped':
			output.warn(`Index not written: ${result.reason}`);
			break;
	}
}
