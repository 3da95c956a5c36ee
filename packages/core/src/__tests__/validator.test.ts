import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ChecksumError, FakeEvaluator, MockLogger } from '@canonizer/sdk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { computeSha256 } from '../checksum.js';
import { regenerateIndex } from '../registry.js';
import type { UnitReport } from '../validator.js';
import { RegistryValidator } from '../validator.js';
import {
	SAMPLE_INPUT,
	makeTempRegistry,
	uppercaseHandler,
	writeSchema,
	writeTransform,
} from './helpers.js';

const FIXED_CLOCK = () => new Date('2025-06-01T12:00:00.000Z');
const GMAIL = 'email/gmail_to_canonical@1.0.0';

describe('RegistryValidator', () => {
	let root: string;
	let evaluator: FakeEvaluator;
	let logger: MockLogger;

	beforeEach(async () => {
		root = await makeTempRegistry();
		evaluator = new FakeEvaluator(uppercaseHandler);
		logger = new MockLogger();
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	function validator(options: Partial<ConstructorParameters<typeof RegistryValidator>[0]> = {}) {
		return new RegistryValidator({ root, evaluator, loggers: [logger], clock: FIXED_CLOCK, ...options });
	}

	function unit(units: UnitReport[], id: string): UnitReport | undefined {
		return units.find((u) => u.id === id);
	}

	// ─── Construction ─────────────────────────────────────────────────────

	it('rejects an evaluator for another engine', () => {
		expect(() => validator({ evaluator: new FakeEvaluator(uppercaseHandler, 'jq') })).toThrow(
			'evaluator engine "jq" cannot run jsonata transforms',
		);
	});

	it('rejects a concurrency that is not a positive integer', () => {
		expect(() => validator({ concurrency: Number('x') })).toThrow(
			'concurrency must be a positive integer (got NaN)',
		);
		expect(() => validator({ concurrency: 0 })).toThrow('concurrency must be a positive integer (got 0)');
		expect(() => validator({ concurrency: 1.5 })).toThrow(
			'concurrency must be a positive integer (got 1.5)',
		);
	});

	// ─── Passing registry ─────────────────────────────────────────────────

	it('passes a well-formed transform and schema', async () => {
		await writeTransform(root);
		await writeSchema(root);

		const report = await validator().validate();

		expect(report.ok).toBe(true);
		expect(report.units.map((u) => [u.kind, u.id, u.status])).toEqual([
			['structure', 'structure', 'pass'],
			['transform', GMAIL, 'pass'],
			['schema', 'com.google/gmail_email@1-0-0', 'pass'],
		]);
		expect(report.passed).toBe(3);
		expect(report.transforms.map((t) => t.metadata.id)).toEqual(['email/gmail_to_canonical']);
		expect(report.schemas.map((s) => s.uri)).toEqual([
			'iglu:com.google/gmail_email/jsonschema/1-0-0',
		]);
		expect(evaluator.calls).toHaveLength(1);
		expect(evaluator.calls[0].input).toEqual(SAMPLE_INPUT);
	});

	// ─── Checksum gate ────────────────────────────────────────────────────

	it('stops at a checksum mismatch without evaluating', async () => {
		await writeTransform(root, { checksum: 'f'.repeat(64) });

		const report = await validator({ scope: 'transforms' }).validate();
		const gmail = unit(report.units, GMAIL);

		expect(gmail?.status).toBe('fail');
		expect(gmail?.failures).toHaveLength(1);
		expect(gmail?.failures[0]).toBeInstanceOf(ChecksumError);
		expect(gmail?.tests).toEqual([]);
		expect(evaluator.totalCalls).toBe(0);
		expect(logger.entriesForPhase('checksum.fail')).toHaveLength(1);
		expect(report.transforms).toEqual([]);
	});

	it('accepts an upper-case declared checksum', async () => {
		const script = '$\n';
		await writeTransform(root, {
			script,
			checksum: computeSha256(script).toUpperCase(),
			tests: [
				{
					input: 'tests/input.json',
					expect: 'tests/expected.json',
					inputBody: '{"a":1}',
					expectBody: '{"a":1}',
				},
			],
		});
		evaluator.setHandler((_script, input) => input);

		const report = await validator({ scope: 'transforms' }).validate();
		expect(report.ok).toBe(true);
	});

	// ─── Metadata ─────────────────────────────────────────────────────────

	it('rejects a transform with no golden tests before evaluating', async () => {
		await writeTransform(root, { tests: [] });

		const report = await validator({ scope: 'transforms' }).validate();
		const failures = unit(report.units, GMAIL)?.failures ?? [];

		expect(failures.map((f) => [f.kind, f.message])).toEqual([
			['metadata', 'tests: must declare at least one golden test'],
		]);
		expect(evaluator.totalCalls).toBe(0);
	});

	it('reports missing unit files as structure errors', async () => {
		await mkdir(join(root, 'transforms', 'email', 'empty', '1.0.0'), { recursive: true });

		const report = await validator({ scope: 'transforms' }).validate();
		expect(unit(report.units, 'email/empty@1.0.0')?.failures.map((f) => f.message)).toEqual([
			'transforms/email/empty/1.0.0/spec.jsonata: required file not found',
			'transforms/email/empty/1.0.0/spec.meta.yaml: required file not found',
			'transforms/email/empty/1.0.0/tests: required directory not found',
		]);
	});

	// ─── Golden tests ─────────────────────────────────────────────────────

	it('names the diverging path when a fixture changes by one character', async () => {
		await writeTransform(root, {
			tests: [
				{
					input: 'tests/input.json',
					expect: 'tests/expected.json',
					inputBody: JSON.stringify(SAMPLE_INPUT),
					expectBody: JSON.stringify({ field1: 'value1', field2: 'VALUE3' }),
				},
			],
		});

		const report = await validator({ scope: 'transforms' }).validate();
		const failures = unit(report.units, GMAIL)?.failures ?? [];

		expect(failures).toHaveLength(1);
		expect(failures[0].kind).toBe('assertion');
		expect(failures[0].message).toBe('golden mismatch at $.field2: expected "VALUE3", got "VALUE2"');
		expect(logger.entriesForPhase('golden.fail').map((e) => e.test)).toEqual(['tests/input.json']);
	});

	// ─── Fail-soft ────────────────────────────────────────────────────────

	it('visits every unit and counts one failure among ten', async () => {
		for (let i = 0; i < 10; i++) {
			await writeTransform(root, { name: `source_${i}`, status: i === 4 ? 'released' : 'stable' });
		}

		const report = await validator().validate();

		expect(report.units.filter((u) => u.kind === 'transform')).toHaveLength(10);
		expect(report.failed).toBe(1);
		expect(report.units.filter((u) => u.kind === 'transform' && u.status === 'pass')).toHaveLength(9);
		// nine transforms plus the structure check
		expect(report.passed).toBe(10);
		expect(unit(report.units, 'email/source_4@1.0.0')?.failures.map((f) => f.message)).toEqual([
			'status: must be one of draft, stable, deprecated (got "released")',
		]);

		const result = await regenerateIndex(report, { clock: FIXED_CLOCK });
		expect(result).toEqual({
			status: 'skipped',
			path: join(root, 'REGISTRY_INDEX.json'),
			reason: '1 unit failed validation',
		});
		await expect(readFile(join(root, 'REGISTRY_INDEX.json'))).rejects.toThrow();
	});

	it('reports missing top-level directories', async () => {
		await rm(join(root, 'schemas'), { recursive: true });

		const report = await validator().validate();
		expect(report.ok).toBe(false);
		expect(unit(report.units, 'structure')?.failures.map((f) => f.message)).toEqual([
			'schemas: required directory not found',
		]);
	});

	it('keeps reporting when a file sits where a directory belongs', async () => {
		await writeTransform(root);
		await writeSchema(root);
		await mkdir(join(root, 'schemas', 'org.acme', 'thing'), { recursive: true });
		await writeFile(join(root, 'schemas', 'org.acme', 'thing', 'jsonschema'), '{}');

		const report = await validator().validate();

		expect(report.ok).toBe(false);
		expect(report.units.map((u) => [u.id, u.status])).toEqual([
			['structure', 'pass'],
			[GMAIL, 'pass'],
			['com.google/gmail_email@1-0-0', 'pass'],
			['org.acme/thing', 'fail'],
		]);
		expect(unit(report.units, 'org.acme/thing')?.failures.map((f) => f.message)).toEqual([
			'schemas/org.acme/thing/jsonschema: expected a directory of schema files',
		]);
	});

	it('reports a transforms file instead of aborting the run', async () => {
		await rm(join(root, 'transforms'), { recursive: true });
		await writeFile(join(root, 'transforms'), 'not a directory');
		await writeSchema(root);

		const report = await validator().validate();

		expect(report.units.map((u) => [u.id, u.status])).toEqual([
			['structure', 'fail'],
			['com.google/gmail_email@1-0-0', 'pass'],
		]);
		expect(unit(report.units, 'structure')?.failures.map((f) => f.message)).toEqual([
			'transforms: required directory is not a directory',
		]);
	});

	it('rejects a zero-padded schema version beside its canonical twin', async () => {
		await writeSchema(root, { version: '1-0-0' });
		await writeSchema(root, { version: '01-0-0' });

		const report = await validator({ scope: 'schemas' }).validate();

		expect(report.units.map((u) => [u.id, u.status])).toEqual([
			['com.google/gmail_email@01-0-0', 'fail'],
			['com.google/gmail_email@1-0-0', 'pass'],
		]);
		expect(report.schemas.map((s) => s.version)).toEqual(['1-0-0']);
	});

	it('fails a schema that breaks its meta-schema and keeps deprecation as a notice', async () => {
		await writeSchema(root, {
			name: 'old_email',
			document: { $schema: 'http://json-schema.org/draft-07/schema#', deprecated: true },
		});
		await writeSchema(root, {
			name: 'broken',
			document: { $schema: 'http://json-schema.org/draft-07/schema#', type: 7 },
		});

		const report = await validator({ scope: 'schemas' }).validate();

		expect(report.units.map((u) => [u.id, u.status])).toEqual([
			['com.google/broken@1-0-0', 'fail'],
			['com.google/old_email@1-0-0', 'pass'],
		]);
		expect(report.notices).toEqual(['com.google/old_email@1-0-0 is deprecated']);
		expect(logger.entriesForPhase('schema.notice')).toHaveLength(1);
	});

	// ─── Ordering and events ──────────────────────────────────────────────

	it('produces the same report at any concurrency', async () => {
		for (const name of ['zeta', 'alpha', 'mid']) {
			await writeTransform(root, { name });
			await writeSchema(root, { name });
		}

		const summarize = (units: UnitReport[]) => units.map((u) => [u.id, u.status]);
		const serial = await validator({ concurrency: 1 }).validate();
		const parallel = await validator({ concurrency: 4 }).validate();

		expect(summarize(parallel.units)).toEqual(summarize(serial.units));
		expect(serial.units.map((u) => u.id)).toEqual([
			'structure',
			'email/alpha@1.0.0',
			'email/mid@1.0.0',
			'email/zeta@1.0.0',
			'com.google/alpha@1-0-0',
			'com.google/mid@1-0-0',
			'com.google/zeta@1-0-0',
		]);
	});

	it('emits a unit event for every finished unit', async () => {
		await writeTransform(root);
		await writeSchema(root);

		const seen: string[] = [];
		const v = validator();
		v.on('unit', (report) => seen.push(report.id));
		await v.validate();

		expect(seen.sort()).toEqual(['com.google/gmail_email@1-0-0', GMAIL, 'structure'].sort());
	});

	it('logs the scan lifecycle and flushes loggers', async () => {
		await writeTransform(root);

		await validator({ scope: 'transforms' }).validate();

		expect(logger.entries[0].phase).toBe('scan.start');
		expect(logger.entries[logger.entries.length - 1]).toMatchObject({
			phase: 'scan.complete',
			message: '1 passed, 0 failed',
		});
		expect(logger.entriesForUnit(GMAIL).map((e) => e.phase)).toEqual([
			'unit.start',
			'checksum.pass',
			'golden.pass',
			'unit.pass',
		]);
		expect(logger.flushed).toBe(true);
	});
});

describe('regenerateIndex', () => {
	let root: string;

	beforeEach(async () => {
		root = await makeTempRegistry();
		await writeTransform(root);
		await writeSchema(root);
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	async function validate() {
		return new RegistryValidator({
			root,
			evaluator: new FakeEvaluator(uppercaseHandler),
		}).validate();
	}

	it('writes the index for a fully valid registry', async () => {
		const logger = new MockLogger();
		const result = await regenerateIndex(await validate(), { clock: FIXED_CLOCK, loggers: [logger] });

		expect(result.status).toBe('written');
		const index = JSON.parse(await readFile(join(root, 'REGISTRY_INDEX.json'), 'utf-8'));
		expect(index.generated_at).toBe('2025-06-01T12:00:00.000Z');
		expect(index.transforms.map((t: { path: string }) => t.path)).toEqual([
			'transforms/email/gmail_to_canonical/1.0.0/',
		]);
		expect(logger.entriesForPhase('index.write')).toHaveLength(1);
	});

	it('is byte-identical when re-run on an unchanged registry', async () => {
		await regenerateIndex(await validate(), { clock: FIXED_CLOCK });
		const first = await readFile(join(root, 'REGISTRY_INDEX.json'), 'utf-8');

		const later = () => new Date('2025-09-09T09:09:09.000Z');
		const result = await regenerateIndex(await validate(), { clock: later });

		expect(result.status).toBe('unchanged');
		expect(await readFile(join(root, 'REGISTRY_INDEX.json'), 'utf-8')).toBe(first);
	});

	it('refuses a report that covered only part of the registry', async () => {
		const report = await new RegistryValidator({
			root,
			evaluator: new FakeEvaluator(uppercaseHandler),
			scope: 'schemas',
		}).validate();

		const result = await regenerateIndex(report, { output: 'out/index.json' });
		expect(result).toEqual({
			status: 'skipped',
			path: join(root, 'out/index.json'),
			reason: 'validation covered only schemas',
		});
	});
});
