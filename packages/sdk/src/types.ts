/**
 * Core data model for the Canonizer registry.
 *
 * A registry is a directory tree of transform units (JSONata logic plus
 * metadata and golden fixtures) and schema units (JSON Schema documents
 * addressed by Iglu URNs). Everything else — reports, the index — is
 * derived from those directories.
 */

// ─── Versions ─────────────────────────────────────────────────────────────────

/** SemVer `MAJOR.MINOR.PATCH` — used for transform versions */
export interface SemVer {
	major: number;
	minor: number;
	patch: number;
}

/** Iglu SchemaVer `MODEL-REVISION-ADDITION` — used for schema versions */
export interface SchemaVer {
	model: number;
	revision: number;
	addition: number;
}

/** Parsed `iglu:<vendor>/<name>/jsonschema/<model>-<revision>-<addition>` */
export interface IgluUri {
	vendor: string;
	name: string;
	format: 'jsonschema';
	version: SchemaVer;
}

// ─── Transform units ──────────────────────────────────────────────────────────

export const TRANSFORM_STATUSES = ['draft', 'stable', 'deprecated'] as const;

export type TransformStatus = (typeof TRANSFORM_STATUSES)[number];

/** The only transform engine the registry accepts */
export const TRANSFORM_ENGINE = 'jsonata';

/** One golden test declared in metadata (paths relative to the unit directory) */
export interface GoldenTestSpec {
	input: string;
	expect: string;
}

export interface TransformProvenance {
	author: string;
	/** ISO-8601 UTC timestamp */
	created_utc: string;
}

export interface TransformCompat {
	/** Iglu range, e.g. `iglu:com.google/gmail_email/jsonschema/1-*-*` */
	from_schema_range: string;
}

/** Parsed and validated contents of `spec.meta.yaml` */
export interface TransformMetadata {
	id: string;
	version: string;
	engine: typeof TRANSFORM_ENGINE;
	from_schema: string;
	to_schema: string;
	tests: GoldenTestSpec[];
	checksum: { jsonata_sha256: string };
	provenance: TransformProvenance;
	status: TransformStatus;
	compat?: TransformCompat;
}

/** Where a transform unit lives in the registry tree */
export interface TransformLocation {
	/** `<category>/<name>` */
	id: string;
	category: string;
	name: string;
	/** Version directory name */
	version: string;
	/** Absolute path of the version directory */
	dir: string;
	/** Path relative to the registry root, POSIX separators */
	path: string;
}

export interface TransformUnit extends TransformLocation {
	metadata: TransformMetadata;
}

// ─── Schema units ─────────────────────────────────────────────────────────────

/** Where a schema unit lives in the registry tree */
export interface SchemaLocation {
	vendor: string;
	name: string;
	/** File name stem, expected to be SchemaVer */
	version: string;
	/** Absolute path of the schema file */
	file: string;
	/** Path relative to the registry root, POSIX separators */
	path: string;
}

export interface SchemaUnit extends SchemaLocation {
	/** Iglu URN of this schema */
	uri: string;
	/** `$schema` draft the document declares */
	draft: string;
	document: Record<string, unknown>;
}

// ─── Index ────────────────────────────────────────────────────────────────────

export const INDEX_FORMAT_VERSION = '1.0.0';

export interface TransformSummary {
	id: string;
	version: string;
	from_schema: string;
	to_schema: string;
	status: TransformStatus;
	path: string;
	/** Digest consumers check fetched logic against */
	checksum: { jsonata_sha256: string };
	author: string;
	created_utc: string;
	compat?: TransformCompat;
}

export interface SchemaSummary {
	vendor: string;
	name: string;
	version: string;
	uri: string;
	path: string;
}

/** Derived, read-only aggregate of a fully valid registry */
export interface RegistryIndex {
	version: typeof INDEX_FORMAT_VERSION;
	generated_at: string;
	transforms: TransformSummary[];
	schemas: SchemaSummary[];
}

// ─── Logging ──────────────────────────────────────────────────────────────────

export type LogPhase =
	| 'scan.start'
	| 'scan.complete'
	| 'unit.start'
	| 'unit.pass'
	| 'unit.fail'
	| 'checksum.pass'
	| 'checksum.fail'
	| 'golden.pass'
	| 'golden.fail'
	| 'schema.notice'
	| 'index.write'
	| 'index.unchanged'
	| 'index.skip'
	| 'system.error';

export type UnitKind = 'structure' | 'transform' | 'schema';

export interface LogEntry {
	timestamp: string;
	phase: LogPhase;
	/** Unit identity, e.g. `email/gmail_to_canonical@1.0.0` */
	unit?: string;
	kind?: UnitKind;
	/** Golden test label (input fixture path) */
	test?: string;
	message?: string;
	duration_ms?: number;
	metadata?: Record<string, unknown>;
}
