/**
 * Error taxonomy for registry validation.
 *
 * These are collected per unit rather than thrown through the run: a unit
 * report carries every failure found for that unit, and the run carries on
 * to the next unit.
 */

export type RegistryErrorKind =
	| 'structure'
	| 'metadata'
	| 'checksum'
	| 'evaluation'
	| 'assertion'
	| 'schema'
	| 'fixture';

/** Render a JSON-ish value for a one-line message */
export function describeValue(value: unknown): string {
	if (value === undefined) return 'undefined';
	const text = JSON.stringify(value);
	return text.length > 80 ? `${text.slice(0, 77)}...` : text;
}

export abstract class RegistryError extends Error {
	abstract readonly kind: RegistryErrorKind;

	protected abstract details(): Record<string, unknown>;

	toJSON(): Record<string, unknown> {
		return { kind: this.kind, message: this.message, ...this.details() };
	}
}

/** A required directory or unit file is missing */
export class StructureError extends RegistryError {
	readonly kind = 'structure';

	constructor(
		readonly path: string,
		readonly reason: string,
	) {
		super(`${path}: ${reason}`);
		this.name = 'StructureError';
	}

	protected details(): Record<string, unknown> {
		return { path: this.path, reason: this.reason };
	}
}

/** A metadata field is missing or malformed */
export class MetadataError extends RegistryError {
	readonly kind = 'metadata';

	constructor(
		readonly field: string,
		readonly reason: string,
	) {
		super(`${field}: ${reason}`);
		this.name = 'MetadataError';
	}

	protected details(): Record<string, unknown> {
		return { field: this.field, reason: this.reason };
	}
}

/** The logic file does not match its declared digest */
export class ChecksumError extends RegistryError {
	readonly kind = 'checksum';

	constructor(
		readonly expected: string,
		readonly actual: string,
	) {
		super(`checksum mismatch (expected ${expected}, got ${actual})`);
		this.name = 'ChecksumError';
	}

	protected details(): Record<string, unknown> {
		return { expected: this.expected, actual: this.actual };
	}
}

/** The transform engine failed on a test input */
export class EvaluationError extends RegistryError {
	readonly kind = 'evaluation';

	constructor(
		readonly test: string,
		message: string,
	) {
		super(message);
		this.name = 'EvaluationError';
	}

	protected details(): Record<string, unknown> {
		return { test: this.test };
	}
}

/** The transform output diverges from the expected golden fixture */
export class GoldenMismatchError extends RegistryError {
	readonly kind = 'assertion';

	constructor(
		readonly test: string,
		readonly path: string,
		readonly expected: unknown,
		readonly actual: unknown,
	) {
		super(
			`golden mismatch at ${path}: expected ${describeValue(expected)}, got ${describeValue(actual)}`,
		);
		this.name = 'GoldenMismatchError';
	}

	protected details(): Record<string, unknown> {
		return {
			test: this.test,
			path: this.path,
			expected: this.expected ?? null,
			actual: this.actual ?? null,
		};
	}
}

/** A schema document is malformed */
export class SchemaError extends RegistryError {
	readonly kind = 'schema';

	constructor(readonly reason: string) {
		super(reason);
		this.name = 'SchemaError';
	}

	protected details(): Record<string, unknown> {
		return { reason: this.reason };
	}
}

/** A golden test fixture is missing or is not JSON */
export class FixtureError extends RegistryError {
	readonly kind = 'fixture';

	constructor(
		readonly file: string,
		readonly reason: string,
	) {
		super(`${file}: ${reason}`);
		this.name = 'FixtureError';
	}

	protected details(): Record<string, unknown> {
		return { file: this.file, reason: this.reason };
	}
}
