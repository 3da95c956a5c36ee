/**
 * Golden test runner — executes a transform against its declared fixtures.
 *
 * Every declared test runs, in order, even after an earlier one fails.
 * Fixture problems (missing file, invalid JSON) are reported separately
 * from engine failures and from output mismatches.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, relative, resolve } from 'node:path';
import type { Evaluator, GoldenTestSpec, RegistryError } from '@canonizer/sdk';
import { EvaluationError, FixtureError, GoldenMismatchError } from '@canonizer/sdk';
import { findFirstDifference } from './diff.js';

export interface GoldenTestResult {
	/** Position in the metadata `tests` list */
	index: number;
	input: string;
	expect: string;
	status: 'pass' | 'fail';
	duration_ms: number;
	errors: RegistryError[];
}

export interface GoldenRunOptions {
	/** Directory the fixture paths are relative to */
	unitDir: string;
	/** Verified transform logic */
	script: string;
	tests: GoldenTestSpec[];
	evaluator: Evaluator;
	/** Called after each test finishes */
	onResult?: (result: GoldenTestResult) => void | Promise<void>;
}

type FixtureLoad = { ok: true; value: unknown } | { ok: false; error: FixtureError };

function isMissing(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function loadFixture(unitDir: string, file: string): Promise<FixtureLoad> {
	const full = resolve(unitDir, file);
	const rel = relative(unitDir, full);
	if (rel.startsWith('..') || isAbsolute(rel)) {
		return { ok: false, error: new FixtureError(file, 'path escapes the transform directory') };
	}

	let text: string;
	try {
		text = await readFile(full, 'utf-8');
	} catch (err) {
		if (isMissing(err)) return { ok: false, error: new FixtureError(file, 'file not found') };
		throw err;
	}

	try {
		return { ok: true, value: JSON.parse(text) };
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		return { ok: false, error: new FixtureError(file, `invalid JSON: ${reason}`) };
	}
}

/** Run a single golden test. */
export async function runGoldenTest(
	options: Omit<GoldenRunOptions, 'tests' | 'onResult'>,
	test: GoldenTestSpec,
	index: number,
): Promise<GoldenTestResult> {
	const start = Date.now();
	const finish = (errors: RegistryError[]): GoldenTestResult => ({
		index,
		input: test.input,
		expect: test.expect,
		status: errors.length === 0 ? 'pass' : 'fail',
		duration_ms: Date.now() - start,
		errors,
	});

	const [input, expected] = await Promise.all([
		loadFixture(options.unitDir, test.input),
		loadFixture(options.unitDir, test.expect),
	]);
	const fixtureErrors: RegistryError[] = [];
	if (!input.ok) fixtureErrors.push(input.error);
	if (!expected.ok) fixtureErrors.push(expected.error);
	if (!input.ok || !expected.ok) return finish(fixtureErrors);

	const outcome = await options.evaluator.evaluate(options.script, input.value);
	if (outcome.status === 'error') {
		return finish([new EvaluationError(test.input, outcome.message)]);
	}

	const diff = findFirstDifference(expected.value, outcome.output);
	if (diff) {
		return finish([new GoldenMismatchError(test.input, diff.path, diff.expected, diff.actual)]);
	}
	return finish([]);
}

/** Run every declared golden test in order. */
export async function runGoldenTests(options: GoldenRunOptions): Promise<GoldenTestResult[]> {
	const results: GoldenTestResult[] = [];
	for (const [index, test] of options.tests.entries()) {
		const result = await runGoldenTest(options, test, index);
		results.push(result);
		await options.onResult?.(result);
	}
	return results;
}
