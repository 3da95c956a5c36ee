import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { FakeEvaluator } from '@canonizer/sdk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runGoldenTests } from '../golden.js';
import {
	SAMPLE_EXPECTED,
	SAMPLE_INPUT,
	UPPERCASE_SCRIPT,
	makeTempRegistry,
	uppercaseHandler,
} from './helpers.js';

describe('runGoldenTests', () => {
	let root: string;
	let unitDir: string;
	let evaluator: FakeEvaluator;

	beforeEach(async () => {
		root = await makeTempRegistry();
		unitDir = join(root, 'unit');
		await mkdir(join(unitDir, 'tests'), { recursive: true });
		await writeFile(join(unitDir, 'tests', 'input.json'), JSON.stringify(SAMPLE_INPUT));
		await writeFile(join(unitDir, 'tests', 'expected.json'), JSON.stringify(SAMPLE_EXPECTED));
		evaluator = new FakeEvaluator(uppercaseHandler);
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	const test = { input: 'tests/input.json', expect: 'tests/expected.json' };

	it('passes when the output matches the expected fixture', async () => {
		const [result] = await runGoldenTests({
			unitDir,
			script: UPPERCASE_SCRIPT,
			tests: [test],
			evaluator,
		});
		expect(result.status).toBe('pass');
		expect(result.errors).toEqual([]);
		expect(evaluator.calls).toEqual([{ script: UPPERCASE_SCRIPT, input: SAMPLE_INPUT }]);
	});

	it('reports the diverging path when one character of the fixture changes', async () => {
		await writeFile(
			join(unitDir, 'tests', 'expected.json'),
			JSON.stringify({ field1: 'value1', field2: 'VALUE3' }),
		);
		const [result] = await runGoldenTests({
			unitDir,
			script: UPPERCASE_SCRIPT,
			tests: [test],
			evaluator,
		});
		expect(result.status).toBe('fail');
		expect(result.errors).toHaveLength(1);
		expect(result.errors[0].kind).toBe('assertion');
		expect(result.errors[0].toJSON()).toMatchObject({
			path: '$.field2',
			expected: 'VALUE3',
			actual: 'VALUE2',
		});
	});

	it('reports engine failures as evaluation errors', async () => {
		evaluator.setHandler(() => {
			throw new Error('T1006: attempted to invoke a non-function');
		});
		const [result] = await runGoldenTests({ unitDir, script: '$nope()', tests: [test], evaluator });
		expect(result.errors.map((e) => [e.kind, e.message])).toEqual([
			['evaluation', 'T1006: attempted to invoke a non-function'],
		]);
	});

	it('reports unparseable fixtures without evaluating', async () => {
		await writeFile(join(unitDir, 'tests', 'input.json'), '{ not json');
		const [result] = await runGoldenTests({
			unitDir,
			script: UPPERCASE_SCRIPT,
			tests: [test],
			evaluator,
		});
		expect(result.errors).toHaveLength(1);
		expect(result.errors[0].kind).toBe('fixture');
		expect(result.errors[0].message.startsWith('tests/input.json: invalid JSON:')).toBe(true);
		expect(evaluator.totalCalls).toBe(0);
	});

	it('reports both missing fixtures', async () => {
		const [result] = await runGoldenTests({
			unitDir,
			script: UPPERCASE_SCRIPT,
			tests: [{ input: 'tests/nope.json', expect: 'tests/gone.json' }],
			evaluator,
		});
		expect(result.errors.map((e) => e.message)).toEqual([
			'tests/nope.json: file not found',
			'tests/gone.json: file not found',
		]);
	});

	it('refuses fixture paths outside the unit directory', async () => {
		const [result] = await runGoldenTests({
			unitDir,
			script: UPPERCASE_SCRIPT,
			tests: [{ input: '../../etc/passwd', expect: 'tests/expected.json' }],
			evaluator,
		});
		expect(result.errors.map((e) => e.message)).toEqual([
			'../../etc/passwd: path escapes the transform directory',
		]);
	});

	it('runs every test in declared order even after a failure', async () => {
		const seen: number[] = [];
		const results = await runGoldenTests({
			unitDir,
			script: UPPERCASE_SCRIPT,
			tests: [{ input: 'tests/missing.json', expect: 'tests/expected.json' }, test],
			evaluator,
			onResult: (result) => {
				seen.push(result.index);
			},
		});
		expect(results.map((r) => r.status)).toEqual(['fail', 'pass']);
		expect(seen).toEqual([0, 1]);
	});
});
