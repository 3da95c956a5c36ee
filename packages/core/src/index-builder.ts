/**
 * Index builder — derives REGISTRY_INDEX.json from validated units.
 *
 * The index is a pure function of the registry directories plus a build
 * timestamp. Ordering is a strict total order (identity, then numeric
 * version), and an unchanged registry keeps its previous timestamp so
 * re-running produces byte-identical output.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type {
	RegistryIndex,
	SchemaSummary,
	SchemaUnit,
	TransformSummary,
	TransformUnit,
} from '@canonizer/sdk';
import { INDEX_FORMAT_VERSION, compareSchemaVer, compareSemVer } from '@canonizer/sdk';

export const DEFAULT_INDEX_FILE = 'REGISTRY_INDEX.json';

function compareText(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

// ─── Build ────────────────────────────────────────────────────────────────────

export function summarizeTransform(unit: TransformUnit): TransformSummary {
	const summary: TransformSummary = {
		id: unit.metadata.id,
		version: unit.metadata.version,
		from_schema: unit.metadata.from_schema,
		to_schema: unit.metadata.to_schema,
		status: unit.metadata.status,
		path: `${unit.path}/`,
		checksum: { jsonata_sha256: unit.metadata.checksum.jsonata_sha256 },
		author: unit.metadata.provenance.author,
		created_utc: unit.metadata.provenance.created_utc,
	};
	if (unit.metadata.compat) {
		summary.compat = { from_schema_range: unit.metadata.compat.from_schema_range };
	}
	return summary;
}

export function summarizeSchema(unit: SchemaUnit): SchemaSummary {
	return {
		vendor: unit.vendor,
		name: unit.name,
		version: unit.version,
		uri: unit.uri,
		path: unit.path,
	};
}

export function buildIndex(
	transforms: TransformUnit[],
	schemas: SchemaUnit[],
	generatedAt: string,
): RegistryIndex {
	return {
		version: INDEX_FORMAT_VERSION,
		generated_at: generatedAt,
		transforms: transforms
			.map(summarizeTransform)
			.sort((a, b) => compareText(a.id, b.id) || compareSemVer(a.version, b.version)),
		schemas: schemas
			.map(summarizeSchema)
			.sort(
				(a, b) =>
					compareText(a.vendor, b.vendor) ||
					compareText(a.name, b.name) ||
					compareSchemaVer(a.version, b.version),
			),
	};
}

export function serializeIndex(index: RegistryIndex): string {
	return `${JSON.stringify(index, null, 2)}\n`;
}

// ─── Write ────────────────────────────────────────────────────────────────────

export interface WriteIndexResult {
	status: 'written' | 'unchanged';
	path: string;
	index: RegistryIndex;
}

async function readPrevious(file: string): Promise<string | undefined> {
	try {
		return await readFile(file, 'utf-8');
	} catch (err) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
		throw err;
	}
}

/**
 * The previous `generated_at`, when re-stamping `next` with it reproduces
 * the previous file byte for byte.
 */
function reusableTimestamp(previous: string, next: RegistryIndex): string | undefined {
	let parsed: unknown;
	try {
		parsed = JSON.parse(previous);
	} catch {
		// A corrupt index is simply regenerated
		return undefined;
	}
	if (typeof parsed !== 'object' || parsed === null || !('generated_at' in parsed)) {
		return undefined;
	}
	const stamp = parsed.generated_at;
	if (typeof stamp !== 'string') return undefined;
	return serializeIndex({ ...next, generated_at: stamp }) === previous ? stamp : undefined;
}

/**
 * Write the index atomically (temp file + rename), creating its directory.
 * When only `generated_at` would change, the existing file is left as is.
 */
export async function writeIndex(file: string, index: RegistryIndex): Promise<WriteIndexResult> {
	const previous = await readPrevious(file);
	const stamp = previous === undefined ? undefined : reusableTimestamp(previous, index);
	if (stamp !== undefined) {
		return { status: 'unchanged', path: file, index: { ...index, generated_at: stamp } };
	}

	await mkdir(dirname(file), { recursive: true });
	const temp = join(dirname(file), `.${basename(file)}.${process.pid}.tmp`);
	try {
		await writeFile(temp, serializeIndex(index), 'utf-8');
		await rename(temp, file);
	} catch (err) {
		await rm(temp, { force: true });
		throw err;
	}
	return { status: 'written', path: file, index };
}
