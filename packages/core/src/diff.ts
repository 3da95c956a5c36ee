/**
 * Deep structural comparison for golden tests.
 *
 * Objects compare by key set (order-insensitive), arrays by length and
 * element order, numbers and strings by exact equality. The first
 * divergence is reported as a JSONPath-like location (`$.a.b[2]`).
 */

export interface Difference {
	path: string;
	expected: unknown;
	actual: unknown;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function childPath(parent: string, key: string | number): string {
	if (typeof key === 'number') return `${parent}[${key}]`;
	return IDENTIFIER.test(key) ? `${parent}.${key}` : `${parent}[${JSON.stringify(key)}]`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find the first place where `actual` diverges from `expected`.
 * Object keys are visited in sorted order so the reported path is stable.
 * Returns null when the two values are structurally equal.
 */
export function findFirstDifference(
	expected: unknown,
	actual: unknown,
	path = '$',
): Difference | null {
	if (Array.isArray(expected) || Array.isArray(actual)) {
		if (!Array.isArray(expected) || !Array.isArray(actual)) {
			return { path, expected, actual };
		}
		const length = Math.max(expected.length, actual.length);
		for (let i = 0; i < length; i++) {
			if (i >= expected.length || i >= actual.length) {
				return { path: childPath(path, i), expected: expected[i], actual: actual[i] };
			}
			const diff = findFirstDifference(expected[i], actual[i], childPath(path, i));
			if (diff) return diff;
		}
		return null;
	}

	if (isPlainObject(expected) || isPlainObject(actual)) {
		if (!isPlainObject(expected) || !isPlainObject(actual)) {
			return { path, expected, actual };
		}
		const keys = [...new Set([...Object.keys(expected), ...Object.keys(actual)])].sort();
		for (const key of keys) {
			const inExpected = Object.hasOwn(expected, key);
			const inActual = Object.hasOwn(actual, key);
			if (!inExpected || !inActual) {
				return { path: childPath(path, key), expected: expected[key], actual: actual[key] };
			}
			const diff = findFirstDifference(expected[key], actual[key], childPath(path, key));
			if (diff) return diff;
		}
		return null;
	}

	// Primitives (and undefined for "no result"): exact equality, no float tolerance
	return expected === actual ? null : { path, expected, actual };
}
