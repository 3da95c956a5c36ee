/**
 * Schema validator — checks that each schema document is itself well-formed.
 *
 * Instances are never validated here; only the schema document, its
 * declared draft, and the agreement between its file path and its
 * embedded Iglu `self` block.
 */

import type { SchemaLocation, SchemaUnit } from '@canonizer/sdk';
import { SchemaError, formatIgluUri, parseSchemaVer } from '@canonizer/sdk';
import { Ajv } from 'ajv';
import { Ajv2019 } from 'ajv/dist/2019.js';
import { Ajv2020 } from 'ajv/dist/2020.js';

type DraftFamily = 'draft-07' | '2019-09' | '2020-12';

const IGLU_SELF_DESCRIBING =
	'http://iglucentral.com/schemas/com.snowplowanalytics.self-desc/schema/jsonschema/1-0-0';

/** `$schema` URIs and the meta-schema each is checked against */
const KNOWN_DRAFTS: Record<string, DraftFamily> = {
	'http://json-schema.org/draft-07/schema': 'draft-07',
	'https://json-schema.org/draft-07/schema': 'draft-07',
	'https://json-schema.org/draft/2019-09/schema': '2019-09',
	'https://json-schema.org/draft/2020-12/schema': '2020-12',
	// Iglu self-describing schemas are checked structurally as draft-07
	[IGLU_SELF_DESCRIBING]: 'draft-07',
};

export const DEFAULT_ACCEPTED_DRAFTS = [
	'http://json-schema.org/draft-07/schema',
	'https://json-schema.org/draft/2019-09/schema',
	'https://json-schema.org/draft/2020-12/schema',
	IGLU_SELF_DESCRIBING,
];

export interface SchemaValidationResult {
	unit?: SchemaUnit;
	errors: SchemaError[];
	/** Informational only, never a failure */
	notices: string[];
}

export function normalizeDraft(uri: string): string {
	return uri.trim().replace(/#$/, '');
}

/** Whether a meta-schema is available for `uri` */
export function isKnownDraft(uri: string): boolean {
	return normalizeDraft(uri) in KNOWN_DRAFTS;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type MetaValidator = Pick<Ajv, 'validateSchema' | 'errorsText' | 'errors'>;

export class SchemaDocumentValidator {
	private readonly accepted: Set<string>;
	private readonly validators = new Map<DraftFamily, MetaValidator>();

	constructor(acceptedDrafts: string[] = DEFAULT_ACCEPTED_DRAFTS) {
		this.accepted = new Set(acceptedDrafts.map(normalizeDraft));
	}

	/** Whether `uri` is an accepted draft the validator knows how to check */
	accepts(uri: string): boolean {
		const normalized = normalizeDraft(uri);
		return this.accepted.has(normalized) && isKnownDraft(normalized);
	}

	private metaValidator(family: DraftFamily): MetaValidator {
		let validator = this.validators.get(family);
		if (!validator) {
			const options = { strict: false, validateFormats: false, logger: false as const };
			if (family === '2019-09') validator = new Ajv2019(options);
			else if (family === '2020-12') validator = new Ajv2020(options);
			else validator = new Ajv(options);
			this.validators.set(family, validator);
		}
		return validator;
	}

	/** Validate one schema file's text against its location. */
	validate(location: SchemaLocation, text: string): SchemaValidationResult {
		const errors: SchemaError[] = [];
		const notices: string[] = [];

		const version = parseSchemaVer(location.version);
		if (!version) {
			errors.push(
				new SchemaError(
					`file name "${location.version}" is not a SchemaVer MODEL-REVISION-ADDITION version`,
				),
			);
		}

		let document: unknown;
		try {
			document = JSON.parse(text);
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			errors.push(new SchemaError(`invalid JSON: ${reason}`));
			return { errors, notices };
		}

		if (!isRecord(document)) {
			errors.push(new SchemaError('schema must be a JSON object'));
			return { errors, notices };
		}

		const declared = document.$schema;
		let draft: string | undefined;
		if (typeof declared !== 'string') {
			errors.push(new SchemaError('missing $schema draft identifier'));
		} else if (!this.accepts(declared)) {
			errors.push(new SchemaError(`$schema "${declared}" is not an accepted draft`));
		} else {
			draft = normalizeDraft(declared);
			const body: Record<string, unknown> = {};
			for (const [key, value] of Object.entries(document)) {
				if (key !== '$schema') body[key] = value;
			}
			const meta = this.metaValidator(KNOWN_DRAFTS[draft]);
			if (meta.validateSchema(body) !== true) {
				errors.push(new SchemaError(`invalid JSON Schema: ${meta.errorsText(meta.errors)}`));
			}
		}

		const self = document.self;
		if (self !== undefined) {
			if (!isRecord(self)) {
				errors.push(new SchemaError('self must be an object'));
			} else {
				const expected: Record<string, string> = {
					vendor: location.vendor,
					name: location.name,
					format: 'jsonschema',
					version: location.version,
				};
				for (const [key, value] of Object.entries(expected)) {
					if (self[key] !== value) {
						errors.push(
							new SchemaError(
								`self.${key} "${String(self[key])}" does not match path (expected "${value}")`,
							),
						);
					}
				}
			}
		}

		if (document.deprecated === true) {
			notices.push(`${location.vendor}/${location.name}@${location.version} is deprecated`);
		}

		if (errors.length > 0 || draft === undefined) return { errors, notices };

		return {
			unit: {
				...location,
				uri: formatIgluUri(location.vendor, location.name, location.version),
				draft,
				document,
			},
			errors,
			notices,
		};
	}
}
