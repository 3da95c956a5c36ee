/**
 * Path resolver — enumerates transform and schema units in a registry tree.
 *
 *   transforms/<category>/<name>/<version>/
 *   schemas/<vendor>/<name>/jsonschema/<version>.json
 *
 * Dot-entries and non-directories are skipped. Results are sorted so the
 * rest of the pipeline never depends on filesystem enumeration order.
 * A `jsonschema` entry that is not a directory is returned as a layout
 * problem for the validator to report.
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { SchemaLocation, TransformLocation } from '@canonizer/sdk';
import { StructureError } from '@canonizer/sdk';

export const DEFAULT_REQUIRED_DIRS = ['transforms', 'schemas'];

/** A path that must be a directory but is something else */
export interface LayoutProblem {
	/** `vendor/name` the entry belongs to */
	id: string;
	/** Path relative to the registry root */
	path: string;
	error: StructureError;
}

export interface SchemaEnumeration {
	locations: SchemaLocation[];
	problems: LayoutProblem[];
}

// ─── Directory helpers ────────────────────────────────────────────────────────

/** ENOENT, or ENOTDIR when a file sits where a directory was expected */
function isMissing(err: unknown): boolean {
	return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch (err) {
		if (isMissing(err)) return false;
		throw err;
	}
}

/** Visible subdirectory names of `dir`, sorted. Missing `dir` yields []. */
async function listDirs(dir: string): Promise<string[]> {
	try {
		const entries = await readdir(dir, { withFileTypes: true });
		return entries
			.filter((e) => e.isDirectory() && !e.name.startsWith('.'))
			.map((e) => e.name)
			.sort();
	} catch (err) {
		if (isMissing(err)) return [];
		throw err;
	}
}

async function listFiles(dir: string, extension: string): Promise<string[]> {
	try {
		const entries = await readdir(dir, { withFileTypes: true });
		return entries
			.filter((e) => e.isFile() && !e.name.startsWith('.') && e.name.endsWith(extension))
			.map((e) => e.name)
			.sort();
	} catch (err) {
		if (isMissing(err)) return [];
		throw err;
	}
}

export async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch (err) {
		if (isMissing(err)) return false;
		throw err;
	}
}

export async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile();
	} catch (err) {
		if (isMissing(err)) return false;
		throw err;
	}
}

// ─── Structure ────────────────────────────────────────────────────────────────

/** Report every required top-level directory that is missing. */
export async function checkStructure(
	root: string,
	requiredDirs: string[] = DEFAULT_REQUIRED_DIRS,
): Promise<StructureError[]> {
	const errors: StructureError[] = [];
	for (const dir of requiredDirs) {
		const path = join(root, dir);
		if (await isDirectory(path)) continue;
		errors.push(
			new StructureError(
				dir,
				(await exists(path)) ? 'required directory is not a directory' : 'required directory not found',
			),
		);
	}
	return errors;
}

// ─── Enumeration ──────────────────────────────────────────────────────────────

export async function resolveTransforms(root: string): Promise<TransformLocation[]> {
	const base = join(root, 'transforms');
	const locations: TransformLocation[] = [];

	for (const category of await listDirs(base)) {
		for (const name of await listDirs(join(base, category))) {
			for (const version of await listDirs(join(base, category, name))) {
				locations.push({
					id: `${category}/${name}`,
					category,
					name,
					version,
					dir: join(base, category, name, version),
					path: `transforms/${category}/${name}/${version}`,
				});
			}
		}
	}

	return locations;
}

export async function resolveSchemas(root: string): Promise<SchemaEnumeration> {
	const base = join(root, 'schemas');
	const locations: SchemaLocation[] = [];
	const problems: LayoutProblem[] = [];

	for (const vendor of await listDirs(base)) {
		for (const name of await listDirs(join(base, vendor))) {
			const formatDir = join(base, vendor, name, 'jsonschema');
			if (!(await isDirectory(formatDir)) && (await exists(formatDir))) {
				const path = `schemas/${vendor}/${name}/jsonschema`;
				problems.push({
					id: `${vendor}/${name}`,
					path,
					error: new StructureError(path, 'expected a directory of schema files'),
				});
				continue;
			}
			for (const file of await listFiles(formatDir, '.json')) {
				locations.push({
					vendor,
					name,
					version: file.slice(0, -'.json'.length),
					file: join(formatDir, file),
					path: `schemas/${vendor}/${name}/jsonschema/${file}`,
				});
			}
		}
	}

	return { locations, problems };
}
