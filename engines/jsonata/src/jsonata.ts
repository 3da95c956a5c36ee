/**
 * JSONata evaluator — runs transform scripts with the jsonata library.
 *
 * Compiled expressions are cached per script text, so a transform with
 * several golden tests is parsed once. Results are normalized to plain
 * JSON before they reach the comparator: JSONata sequences carry extra
 * properties that a structural diff must not see.
 */

import type { EvaluationOutcome, Evaluator } from '@canonizer/sdk';
import { TRANSFORM_ENGINE } from '@canonizer/sdk';
import jsonata from 'jsonata';

/** JSONata reports failures as objects carrying `code` and `message` */
export function describeEngineError(err: unknown): string {
	if (typeof err === 'object' && err !== null) {
		const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
		const message = 'message' in err && typeof err.message === 'string' ? err.message : undefined;
		if (message !== undefined) return code ? `${code}: ${message}` : message;
		if (code !== undefined) return code;
	}
	return String(err);
}

/** Strip engine-specific decoration; `undefined` stays `undefined`. */
export function toPlainJson(value: unknown): unknown {
	if (value === undefined) return undefined;
	const text = JSON.stringify(value);
	return text === undefined ? undefined : JSON.parse(text);
}

export class JsonataEvaluator implements Evaluator {
	readonly engine = TRANSFORM_ENGINE;
	private readonly compiled = new Map<string, jsonata.Expression>();

	private compile(script: string): jsonata.Expression {
		let expression = this.compiled.get(script);
		if (!expression) {
			expression = jsonata(script);
			this.compiled.set(script, expression);
		}
		return expression;
	}

	async evaluate(script: string, input: unknown): Promise<EvaluationOutcome> {
		try {
			const output: unknown = await this.compile(script).evaluate(input);
			return { status: 'ok', output: toPlainJson(output) };
		} catch (err) {
			return { status: 'error', message: describeEngineError(err) };
		}
	}

	/** Number of distinct scripts compiled so far */
	get cacheSize(): number {
		return this.compiled.size;
	}
}
