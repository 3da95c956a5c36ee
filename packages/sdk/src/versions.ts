/**
 * SemVer, SchemaVer and Iglu URN helpers.
 *
 * The registry only needs strict triples: no pre-release tags, no build
 * metadata, no leading `v`, no leading zeros. Each version has exactly one
 * spelling, so comparing two distinct versions never yields 0.
 */

import type { IgluUri, SchemaVer, SemVer } from './types.js';

const SEMVER_PATTERN = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;
const SCHEMAVER_PATTERN = /^(0|[1-9]\d*)-(0|[1-9]\d*)-(0|[1-9]\d*)$/;
const IGLU_URI_PATTERN =
	/^iglu:([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)\/jsonschema\/((?:0|[1-9]\d*)-(?:0|[1-9]\d*)-(?:0|[1-9]\d*))$/;
const IGLU_RANGE_PATTERN =
	/^iglu:([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)\/jsonschema\/(0|[1-9]\d*)-(0|[1-9]\d*|\*)-(0|[1-9]\d*|\*)$/;

// ─── SemVer ───────────────────────────────────────────────────────────────────

export function parseSemVer(value: string): SemVer | null {
	const match = SEMVER_PATTERN.exec(value);
	if (!match) return null;
	return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
}

/** Numeric comparison; unparseable versions sort after valid ones, then lexically. */
export function compareSemVer(a: string, b: string): number {
	const left = parseSemVer(a);
	const right = parseSemVer(b);
	if (!left || !right) {
		if (left) return -1;
		if (right) return 1;
		return a < b ? -1 : a > b ? 1 : 0;
	}
	return left.major - right.major || left.minor - right.minor || left.patch - right.patch;
}

// ─── SchemaVer ────────────────────────────────────────────────────────────────

export function parseSchemaVer(value: string): SchemaVer | null {
	const match = SCHEMAVER_PATTERN.exec(value);
	if (!match) return null;
	return { model: Number(match[1]), revision: Number(match[2]), addition: Number(match[3]) };
}

export function formatSchemaVer(version: SchemaVer): string {
	return `${version.model}-${version.revision}-${version.addition}`;
}

export function compareSchemaVer(a: string, b: string): number {
	const left = parseSchemaVer(a);
	const right = parseSchemaVer(b);
	if (!left || !right) {
		if (left) return -1;
		if (right) return 1;
		return a < b ? -1 : a > b ? 1 : 0;
	}
	return (
		left.model - right.model || left.revision - right.revision || left.addition - right.addition
	);
}

// ─── Iglu ─────────────────────────────────────────────────────────────────────

export function parseIgluUri(value: string): IgluUri | null {
	const match = IGLU_URI_PATTERN.exec(value);
	if (!match) return null;
	const version = parseSchemaVer(match[3]);
	if (!version) return null;
	return { vendor: match[1], name: match[2], format: 'jsonschema', version };
}

export function formatIgluUri(vendor: string, name: string, version: string): string {
	return `iglu:${vendor}/${name}/jsonschema/${version}`;
}

/**
 * Check an Iglu range such as `iglu:com.acme/order/jsonschema/1-*-*`.
 * The model is always concrete; revision and addition may be `*`, but a
 * concrete addition under a wildcard revision is meaningless.
 */
export function isIgluRange(value: string): boolean {
	const match = IGLU_RANGE_PATTERN.exec(value);
	if (!match) return false;
	return !(match[4] === '*' && match[5] !== '*');
}
