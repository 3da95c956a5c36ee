/**
 * Metadata loader — parses and validates a transform's `spec.meta.yaml`.
 *
 * Every malformed field is reported, not just the first, so a contributor
 * sees the whole list in one run.
 */

import { readFile } from 'node:fs/promises';
import type { GoldenTestSpec, TransformMetadata, TransformStatus } from '@canonizer/sdk';
import {
	MetadataError,
	TRANSFORM_ENGINE,
	TRANSFORM_STATUSES,
	isIgluRange,
	parseIgluUri,
	parseSemVer,
} from '@canonizer/sdk';
import { CORE_SCHEMA, load } from 'js-yaml';

export interface MetadataResult {
	metadata?: TransformMetadata;
	errors: MetadataError[];
}

/** Identity the metadata must agree with (taken from the directory layout) */
export interface ExpectedIdentity {
	id: string;
	version: string;
}

const ID_PATTERN = /^[^/\s]+\/[^/\s]+$/;
const SHA256_PATTERN = /^[0-9a-fA-F]{64}$/;
const UTC_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|\+00:00)$/;

// ─── Field readers ────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStatus(value: string): value is TransformStatus {
	return TRANSFORM_STATUSES.some((status) => status === value);
}

/**
 * Read a required string field. Records "is required" or "must be a string"
 * and returns undefined when the field is unusable.
 */
function readString(
	doc: Record<string, unknown>,
	key: string,
	field: string,
	errors: MetadataError[],
): string | undefined {
	const value = doc[key];
	if (value === undefined || value === null) {
		errors.push(new MetadataError(field, 'is required'));
		return undefined;
	}
	if (typeof value !== 'string') {
		errors.push(new MetadataError(field, `must be a string (got ${typeName(value)})`));
		return undefined;
	}
	return value;
}

function readMapping(
	doc: Record<string, unknown>,
	key: string,
	errors: MetadataError[],
): Record<string, unknown> | undefined {
	const value = doc[key];
	if (value === undefined || value === null) {
		errors.push(new MetadataError(key, 'is required'));
		return undefined;
	}
	if (!isRecord(value)) {
		errors.push(new MetadataError(key, `must be a mapping (got ${typeName(value)})`));
		return undefined;
	}
	return value;
}

function typeName(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'list';
	return typeof value;
}

function readTests(doc: Record<string, unknown>, errors: MetadataError[]): GoldenTestSpec[] {
	const value = doc.tests;
	if (value === undefined || value === null) {
		errors.push(new MetadataError('tests', 'is required'));
		return [];
	}
	if (!Array.isArray(value)) {
		errors.push(new MetadataError('tests', `must be a list (got ${typeName(value)})`));
		return [];
	}
	if (value.length === 0) {
		errors.push(new MetadataError('tests', 'must declare at least one golden test'));
		return [];
	}

	const tests: GoldenTestSpec[] = [];
	value.forEach((item: unknown, i) => {
		const field = `tests[${i}]`;
		if (!isRecord(item)) {
			errors.push(new MetadataError(field, 'must be a mapping with input and expect'));
			return;
		}
		const before = errors.length;
		const input = readString(item, 'input', `${field}.input`, errors);
		const expect = readString(item, 'expect', `${field}.expect`, errors);
		if (input === '') errors.push(new MetadataError(`${field}.input`, 'must not be empty'));
		if (expect === '') errors.push(new MetadataError(`${field}.expect`, 'must not be empty'));
		if (errors.length === before && input !== undefined && expect !== undefined) {
			tests.push({ input, expect });
		}
	});
	return tests;
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

/**
 * Validate an already-parsed metadata document.
 * Returns metadata only when there are no errors.
 */
export function validateMetadata(raw: unknown, expected?: ExpectedIdentity): MetadataResult {
	const errors: MetadataError[] = [];

	if (!isRecord(raw)) {
		errors.push(new MetadataError('(document)', 'must be a YAML mapping'));
		return { errors };
	}

	const id = readString(raw, 'id', 'id', errors);
	if (id !== undefined) {
		if (!ID_PATTERN.test(id)) {
			errors.push(new MetadataError('id', `must be <category>/<name> (got "${id}")`));
		} else if (expected && id !== expected.id) {
			errors.push(
				new MetadataError('id', `does not match directory (expected ${expected.id}, got ${id})`),
			);
		}
	}

	const version = readString(raw, 'version', 'version', errors);
	if (version !== undefined) {
		if (!parseSemVer(version)) {
			errors.push(
				new MetadataError('version', `must be SemVer MAJOR.MINOR.PATCH (got "${version}")`),
			);
		} else if (expected && version !== expected.version) {
			errors.push(
				new MetadataError(
					'version',
					`does not match directory (expected ${expected.version}, got ${version})`,
				),
			);
		}
	}

	const engine = readString(raw, 'engine', 'engine', errors);
	if (engine !== undefined && engine !== TRANSFORM_ENGINE) {
		errors.push(new MetadataError('engine', `must be "${TRANSFORM_ENGINE}" (got "${engine}")`));
	}

	const fromSchema = readString(raw, 'from_schema', 'from_schema', errors);
	if (fromSchema !== undefined && !parseIgluUri(fromSchema)) {
		errors.push(new MetadataError('from_schema', `must be an Iglu URN (got "${fromSchema}")`));
	}

	const toSchema = readString(raw, 'to_schema', 'to_schema', errors);
	if (toSchema !== undefined && !parseIgluUri(toSchema)) {
		errors.push(new MetadataError('to_schema', `must be an Iglu URN (got "${toSchema}")`));
	}

	const tests = readTests(raw, errors);

	let digest: string | undefined;
	const checksum = readMapping(raw, 'checksum', errors);
	if (checksum) {
		digest = readString(checksum, 'jsonata_sha256', 'checksum.jsonata_sha256', errors);
		if (digest !== undefined && !SHA256_PATTERN.test(digest)) {
			errors.push(new MetadataError('checksum.jsonata_sha256', 'must be 64 hex characters'));
		}
	}

	let author: string | undefined;
	let createdUtc: string | undefined;
	const provenance = readMapping(raw, 'provenance', errors);
	if (provenance) {
		author = readString(provenance, 'author', 'provenance.author', errors);
		if (author !== undefined && author.trim() === '') {
			errors.push(new MetadataError('provenance.author', 'must not be empty'));
		}
		createdUtc = readString(provenance, 'created_utc', 'provenance.created_utc', errors);
		if (
			createdUtc !== undefined &&
			(!UTC_TIMESTAMP_PATTERN.test(createdUtc) || Number.isNaN(Date.parse(createdUtc)))
		) {
			errors.push(
				new MetadataError(
					'provenance.created_utc',
					`must be an ISO-8601 UTC timestamp (got "${createdUtc}")`,
				),
			);
		}
	}

	const status = readString(raw, 'status', 'status', errors);
	if (status !== undefined && !isStatus(status)) {
		errors.push(
			new MetadataError(
				'status',
				`must be one of ${TRANSFORM_STATUSES.join(', ')} (got "${status}")`,
			),
		);
	}

	let fromSchemaRange: string | undefined;
	const compat = raw.compat;
	if (compat !== undefined && compat !== null) {
		if (!isRecord(compat)) {
			errors.push(new MetadataError('compat', `must be a mapping (got ${typeName(compat)})`));
		} else if (compat.from_schema_range !== undefined) {
			fromSchemaRange = readString(compat, 'from_schema_range', 'compat.from_schema_range', errors);
			if (fromSchemaRange !== undefined && !isIgluRange(fromSchemaRange)) {
				errors.push(
					new MetadataError(
						'compat.from_schema_range',
						`must be an Iglu range (got "${fromSchemaRange}")`,
					),
				);
			}
		}
	}

	if (
		errors.length > 0 ||
		id === undefined ||
		version === undefined ||
		fromSchema === undefined ||
		toSchema === undefined ||
		digest === undefined ||
		author === undefined ||
		createdUtc === undefined ||
		status === undefined ||
		!isStatus(status)
	) {
		return { errors };
	}

	const metadata: TransformMetadata = {
		id,
		version,
		engine: TRANSFORM_ENGINE,
		from_schema: fromSchema,
		to_schema: toSchema,
		tests,
		checksum: { jsonata_sha256: digest },
		provenance: { author, created_utc: createdUtc },
		status,
	};
	if (fromSchemaRange !== undefined) {
		metadata.compat = { from_schema_range: fromSchemaRange };
	}
	return { metadata, errors };
}

/**
 * Parse `spec.meta.yaml` text. Pure: no I/O.
 *
 * Uses the YAML core schema so timestamps stay strings instead of
 * becoming Date objects.
 */
export function parseMetadataDocument(text: string, expected?: ExpectedIdentity): MetadataResult {
	let raw: unknown;
	try {
		raw = load(text, { schema: CORE_SCHEMA });
	} catch (err) {
		const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
		return { errors: [new MetadataError('(document)', `invalid YAML: ${reason}`)] };
	}
	return validateMetadata(raw, expected);
}

export async function loadMetadata(file: string, expected?: ExpectedIdentity): Promise<MetadataResult> {
	const text = await readFile(file, 'utf-8');
	return parseMetadataDocument(text, expected);
}
