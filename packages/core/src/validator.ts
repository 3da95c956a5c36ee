/**
 * RegistryValidator — runs every check over a registry tree.
 *
 * Library-first API:
 *   const validator = new RegistryValidator({ root, evaluator });
 *   const report = await validator.validate();
 *
 * Failures are collected per unit and the run always visits every unit.
 * The report is the only input the index builder accepts.
 */

import { EventEmitter } from 'node:events';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type {
	Evaluator,
	LogEntry,
	Logger,
	RegistryError,
	SchemaLocation,
	SchemaUnit,
	TransformLocation,
	TransformUnit,
	UnitKind,
} from '@canonizer/sdk';
import { StructureError, TRANSFORM_ENGINE } from '@canonizer/sdk';
import { verifyChecksum } from './checksum.js';
import type { GoldenTestResult } from './golden.js';
import { runGoldenTests } from './golden.js';
import { LoggerManager } from './logger.js';
import type { LoggerErrorHandler } from './logger.js';
import { loadMetadata } from './metadata.js';
import {
	DEFAULT_REQUIRED_DIRS,
	checkStructure,
	isDirectory,
	isFile,
	resolveSchemas,
	resolveTransforms,
} from './resolver.js';
import { DEFAULT_ACCEPTED_DRAFTS, SchemaDocumentValidator } from './schema.js';

// ─── Report types ─────────────────────────────────────────────────────────────

export type ValidationScope = 'all' | 'structure' | 'transforms' | 'schemas';

export const VALIDATION_SCOPES: readonly ValidationScope[] = [
	'all',
	'structure',
	'transforms',
	'schemas',
];

export interface UnitReport {
	kind: UnitKind;
	/** `category/name@version`, `vendor/name@version`, or `structure` */
	id: string;
	/** Path relative to the registry root */
	path: string;
	status: 'pass' | 'fail';
	failures: RegistryError[];
	tests: GoldenTestResult[];
	notices: string[];
	duration_ms: number;
}

export interface ValidationReport {
	root: string;
	scope: ValidationScope;
	ok: boolean;
	passed: number;
	failed: number;
	units: UnitReport[];
	notices: string[];
	/** Transform units that passed every check */
	transforms: TransformUnit[];
	/** Schema units that passed every check */
	schemas: SchemaUnit[];
}

// ─── Options ──────────────────────────────────────────────────────────────────

export interface RegistryValidatorOptions {
	/** Registry root directory */
	root: string;
	/** Transform engine used for golden tests */
	evaluator: Evaluator;
	loggers?: Logger[];
	onLoggerError?: LoggerErrorHandler;
	/** `$schema` URIs schema documents may declare */
	acceptedDrafts?: string[];
	/** Top-level directories that must exist (default: transforms, schemas) */
	requiredDirs?: string[];
	/** Units validated in parallel (default 1) */
	concurrency?: number;
	scope?: ValidationScope;
	clock?: () => Date;
}

interface ValidatorEvents {
	unit: [UnitReport];
}

const KIND_ORDER: Record<UnitKind, number> = { structure: 0, transform: 1, schema: 2 };

/** Run `fn` over `items` with at most `limit` in flight; results keep input order. */
async function mapConcurrent<T, R>(
	items: T[],
	limit: number,
	fn: (item: T) => Promise<R>,
): Promise<R[]> {
	const results: R[] = new Array(items.length);
	let next = 0;
	const worker = async (): Promise<void> => {
		while (next < items.length) {
			const i = next++;
			results[i] = await fn(items[i]);
		}
	};
	const workers = Math.max(1, Math.min(limit, items.length));
	await Promise.all(Array.from({ length: workers }, worker));
	return results;
}

function unitId(location: TransformLocation): string {
	return `${location.id}@${location.version}`;
}

function schemaId(location: SchemaLocation): string {
	return `${location.vendor}/${location.name}@${location.version}`;
}

// ─── Validator ────────────────────────────────────────────────────────────────

export class RegistryValidator extends EventEmitter<ValidatorEvents> {
	private readonly root: string;
	private readonly evaluator: Evaluator;
	private readonly loggers: LoggerManager;
	private readonly schemaValidator: SchemaDocumentValidator;
	private readonly requiredDirs: string[];
	private readonly concurrency: number;
	private readonly scope: ValidationScope;
	private readonly clock: () => Date;

	constructor(options: RegistryValidatorOptions) {
		super();
		// Metadata only admits one engine, so any other evaluator fails every unit
		if (options.evaluator.engine !== TRANSFORM_ENGINE) {
			throw new Error(
				`evaluator engine "${options.evaluator.engine}" cannot run ${TRANSFORM_ENGINE} transforms`,
			);
		}
		const concurrency = options.concurrency ?? 1;
		if (!Number.isInteger(concurrency) || concurrency < 1) {
			throw new Error(`concurrency must be a positive integer (got ${concurrency})`);
		}
		this.root = options.root;
		this.evaluator = options.evaluator;
		this.loggers = new LoggerManager(options.loggers, options.onLoggerError);
		this.schemaValidator = new SchemaDocumentValidator(
			options.acceptedDrafts ?? DEFAULT_ACCEPTED_DRAFTS,
		);
		this.requiredDirs = options.requiredDirs ?? DEFAULT_REQUIRED_DIRS;
		this.concurrency = concurrency;
		this.scope = options.scope ?? 'all';
		this.clock = options.clock ?? (() => new Date());
	}

	private includes(part: Exclude<ValidationScope, 'all'>): boolean {
		return this.scope === 'all' || this.scope === part;
	}

	private async log(entry: Omit<LogEntry, 'timestamp'>): Promise<void> {
		await this.loggers.log({ timestamp: this.clock().toISOString(), ...entry });
	}

	async validate(): Promise<ValidationReport> {
		const started = Date.now();
		await this.log({ phase: 'scan.start', message: this.root, metadata: { scope: this.scope } });

		const units: UnitReport[] = [];
		const transforms: TransformUnit[] = [];
		const schemas: SchemaUnit[] = [];

		if (this.includes('structure')) {
			units.push(await this.finish(await this.checkStructure()));
		}

		if (this.includes('transforms')) {
			const locations = await resolveTransforms(this.root);
			const results = await mapConcurrent(locations, this.concurrency, (location) =>
				this.checkTransform(location),
			);
			for (const { report, unit } of results) {
				units.push(report);
				if (unit) transforms.push(unit);
			}
		}

		if (this.includes('schemas')) {
			const { locations, problems } = await resolveSchemas(this.root);
			for (const problem of problems) {
				units.push(
					await this.finish(
						this.makeReport('schema', problem.id, problem.path, Date.now(), {
							failures: [problem.error],
						}),
					),
				);
			}
			const results = await mapConcurrent(locations, this.concurrency, (location) =>
				this.checkSchema(location),
			);
			for (const { report, unit } of results) {
				units.push(report);
				if (unit) schemas.push(unit);
			}
		}

		units.sort(
			(a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
		);
		const failed = units.filter((u) => u.status === 'fail').length;
		const report: ValidationReport = {
			root: this.root,
			scope: this.scope,
			ok: failed === 0,
			passed: units.length - failed,
			failed,
			units,
			notices: units.flatMap((u) => u.notices),
			transforms,
			schemas,
		};

		await this.log({
			phase: 'scan.complete',
			message: `${report.passed} passed, ${report.failed} failed`,
			duration_ms: Date.now() - started,
			metadata: { passed: report.passed, failed: report.failed },
		});
		await this.loggers.flush();
		return report;
	}

	/** Flush and shut down every logger. */
	async shutdown(): Promise<void> {
		await this.loggers.shutdown();
	}

	// ─── Unit reports ─────────────────────────────────────────────────────

	private async finish(report: UnitReport): Promise<UnitReport> {
		if (report.status === 'pass') {
			await this.log({
				phase: 'unit.pass',
				unit: report.id,
				kind: report.kind,
				duration_ms: report.duration_ms,
			});
		} else {
			await this.log({
				phase: 'unit.fail',
				unit: report.id,
				kind: report.kind,
				duration_ms: report.duration_ms,
				message: report.failures.map((f) => f.message).join('; '),
				metadata: { failures: report.failures.length },
			});
		}
		this.emit('unit', report);
		return report;
	}

	private makeReport(
		kind: UnitKind,
		id: string,
		path: string,
		started: number,
		parts: { failures: RegistryError[]; tests?: GoldenTestResult[]; notices?: string[] },
	): UnitReport {
		return {
			kind,
			id,
			path,
			status: parts.failures.length === 0 ? 'pass' : 'fail',
			failures: parts.failures,
			tests: parts.tests ?? [],
			notices: parts.notices ?? [],
			duration_ms: Date.now() - started,
		};
	}

	private async unexpected(id: string, path: string, err: unknown): Promise<StructureError> {
		const message = err instanceof Error ? err.message : String(err);
		await this.log({ phase: 'system.error', unit: id, message });
		return new StructureError(path, `unexpected error: ${message}`);
	}

	// ─── Structure ────────────────────────────────────────────────────────

	private async checkStructure(): Promise<UnitReport> {
		const started = Date.now();
		const failures = await checkStructure(this.root, this.requiredDirs);
		return this.makeReport('structure', 'structure', '.', started, { failures });
	}

	// ─── Transforms ───────────────────────────────────────────────────────

	private async checkTransform(
		location: TransformLocation,
	): Promise<{ report: UnitReport; unit?: TransformUnit }> {
		const id = unitId(location);
		const started = Date.now();
		await this.log({ phase: 'unit.start', unit: id, kind: 'transform' });

		let unit: TransformUnit | undefined;
		let failures: RegistryError[];
		let tests: GoldenTestResult[] = [];
		try {
			const result = await this.runTransformChecks(location, id);
			failures = result.failures;
			tests = result.tests;
			unit = result.unit;
		} catch (err) {
			failures = [await this.unexpected(id, location.path, err)];
		}

		const report = await this.finish(
			this.makeReport('transform', id, location.path, started, { failures, tests }),
		);
		return { report, unit: report.status === 'pass' ? unit : undefined };
	}

	private async runTransformChecks(
		location: TransformLocation,
		id: string,
	): Promise<{ failures: RegistryError[]; tests: GoldenTestResult[]; unit?: TransformUnit }> {
		const logicFile = join(location.dir, 'spec.jsonata');
		const metaFile = join(location.dir, 'spec.meta.yaml');

		const missing: RegistryError[] = [];
		if (!(await isFile(logicFile))) {
			missing.push(new StructureError(`${location.path}/spec.jsonata`, 'required file not found'));
		}
		if (!(await isFile(metaFile))) {
			missing.push(new StructureError(`${location.path}/spec.meta.yaml`, 'required file not found'));
		}
		if (!(await isDirectory(join(location.dir, 'tests')))) {
			missing.push(new StructureError(`${location.path}/tests`, 'required directory not found'));
		}
		if (missing.length > 0) return { failures: missing, tests: [] };

		const { metadata, errors } = await loadMetadata(metaFile, {
			id: location.id,
			version: location.version,
		});
		if (!metadata) return { failures: errors, tests: [] };

		const logic = await readFile(logicFile);
		const checksumError = verifyChecksum(logic, metadata.checksum.jsonata_sha256);
		if (checksumError) {
			await this.log({
				phase: 'checksum.fail',
				unit: id,
				kind: 'transform',
				message: checksumError.message,
			});
			return { failures: [checksumError], tests: [] };
		}
		await this.log({ phase: 'checksum.pass', unit: id, kind: 'transform' });

		const tests = await runGoldenTests({
			unitDir: location.dir,
			script: logic.toString('utf-8'),
			tests: metadata.tests,
			evaluator: this.evaluator,
			onResult: (result) =>
				this.log({
					phase: result.status === 'pass' ? 'golden.pass' : 'golden.fail',
					unit: id,
					kind: 'transform',
					test: result.input,
					duration_ms: result.duration_ms,
					message: result.errors.map((e) => e.message).join('; ') || undefined,
				}),
		});

		return {
			failures: tests.flatMap((t) => t.errors),
			tests,
			unit: { ...location, metadata },
		};
	}

	// ─── Schemas ──────────────────────────────────────────────────────────

	private async checkSchema(
		location: SchemaLocation,
	): Promise<{ report: UnitReport; unit?: SchemaUnit }> {
		const id = schemaId(location);
		const started = Date.now();
		await this.log({ phase: 'unit.start', unit: id, kind: 'schema' });

		let unit: SchemaUnit | undefined;
		let failures: RegistryError[];
		let notices: string[] = [];
		try {
			const text = await readFile(location.file, 'utf-8');
			const result = this.schemaValidator.validate(location, text);
			unit = result.unit;
			failures = result.errors;
			notices = result.notices;
		} catch (err) {
			failures = [await this.unexpected(id, location.path, err)];
		}

		for (const notice of notices) {
			await this.log({ phase: 'schema.notice', unit: id, kind: 'schema', message: notice });
		}

		const report = await this.finish(
			this.makeReport('schema', id, location.path, started, { failures, notices }),
		);
		return { report, unit: report.status === 'pass' ? unit : undefined };
	}
}
