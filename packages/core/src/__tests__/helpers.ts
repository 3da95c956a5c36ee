/**
 * Temp-directory registry builders shared by the core tests.
 */

import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { computeSha256 } from '../checksum.js';

export const UPPERCASE_SCRIPT =
	'{ "field1": source.field1, "field2": $uppercase(source.field2) }\n';

export const SAMPLE_INPUT = { source: { field1: 'value1', field2: 'value2' } };
export const SAMPLE_EXPECTED = { field1: 'value1', field2: 'VALUE2' };

/** In-process stand-in for the uppercase JSONata script above */
export function uppercaseHandler(_script: string, input: unknown): unknown {
	if (typeof input !== 'object' || input === null || !('source' in input)) {
		throw new Error('input has no source');
	}
	const source = input.source;
	if (typeof source !== 'object' || source === null) throw new Error('source is not an object');
	const field1 = 'field1' in source ? source.field1 : undefined;
	const field2 = 'field2' in source ? source.field2 : undefined;
	return { field1, field2: String(field2).toUpperCase() };
}

export async function makeTempRegistry(): Promise<string> {
	const root = await mkdtemp(join(tmpdir(), 'canonizer-registry-test-'));
	await mkdir(join(root, 'transforms'), { recursive: true });
	await mkdir(join(root, 'schemas'), { recursive: true });
	return root;
}

async function put(file: string, content: string): Promise<void> {
	await mkdir(dirname(file), { recursive: true });
	await writeFile(file, content, 'utf-8');
}

export interface TransformFixture {
	category?: string;
	name?: string;
	version?: string;
	script?: string;
	/** Override the computed checksum */
	checksum?: string;
	status?: string;
	/** Raw YAML lines appended after the generated fields */
	extraYaml?: string;
	/** Replace the whole metadata document */
	metaYaml?: string;
	tests?: Array<{ input: string; expect: string; inputBody?: string; expectBody?: string }>;
}

/** Write a transform unit and return its directory. */
export async function writeTransform(root: string, fixture: TransformFixture = {}): Promise<string> {
	const category = fixture.category ?? 'email';
	const name = fixture.name ?? 'gmail_to_canonical';
	const version = fixture.version ?? '1.0.0';
	const script = fixture.script ?? UPPERCASE_SCRIPT;
	const dir = join(root, 'transforms', category, name, version);
	const tests = fixture.tests ?? [
		{
			input: 'tests/input.json',
			expect: 'tests/expected.json',
			inputBody: JSON.stringify(SAMPLE_INPUT),
			expectBody: JSON.stringify(SAMPLE_EXPECTED),
		},
	];

	await put(join(dir, 'spec.jsonata'), script);
	await mkdir(join(dir, 'tests'), { recursive: true });
	for (const test of tests) {
		if (test.inputBody !== undefined) await put(join(dir, test.input), test.inputBody);
		if (test.expectBody !== undefined) await put(join(dir, test.expect), test.expectBody);
	}

	const testLines = tests.length
		? tests.map((t) => `  - input: ${t.input}\n    expect: ${t.expect}`).join('\n')
		: ' []';
	const meta =
		fixture.metaYaml ??
		`id: ${category}/${name}
version: ${version}
engine: jsonata
from_schema: iglu:com.google/gmail_email/jsonschema/1-0-0
to_schema: iglu:org.canonical/email/jsonschema/1-0-0
tests:${tests.length ? `\n${testLines}` : testLines}
checksum:
  jsonata_sha256: ${fixture.checksum ?? computeSha256(script)}
provenance:
  author: Test Author
  created_utc: 2025-01-01T00:00:00Z
status: ${fixture.status ?? 'stable'}
${fixture.extraYaml ?? ''}`;
	await put(join(dir, 'spec.meta.yaml'), meta);
	return dir;
}

export interface SchemaFixture {
	vendor?: string;
	name?: string;
	version?: string;
	/** Raw file content; overrides `document` */
	text?: string;
	document?: Record<string, unknown>;
}

export const DRAFT_07 = 'http://json-schema.org/draft-07/schema#';

/** Write a schema file and return its path. */
export async function writeSchema(root: string, fixture: SchemaFixture = {}): Promise<string> {
	const vendor = fixture.vendor ?? 'com.google';
	const name = fixture.name ?? 'gmail_email';
	const version = fixture.version ?? '1-0-0';
	const file = join(root, 'schemas', vendor, name, 'jsonschema', `${version}.json`);
	const document = fixture.document ?? {
		$schema: DRAFT_07,
		type: 'object',
		properties: { field1: { type: 'string' } },
	};
	await put(file, fixture.text ?? `${JSON.stringify(document, null, 2)}\n`);
	return file;
}
