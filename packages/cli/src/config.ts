/**
 * Registry configuration — optional `registry.yaml` plus environment
 * overrides.
 *
 * Precedence: CLI flags > environment > config file > defaults. Flags are
 * applied by the commands; this module resolves the rest.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
	DEFAULT_ACCEPTED_DRAFTS,
	DEFAULT_INDEX_FILE,
	DEFAULT_REQUIRED_DIRS,
	isKnownDraft,
} from '@canonizer/core';
import { Ajv } from 'ajv';
import { CORE_SCHEMA, load } from 'js-yaml';
import { ConfigError } from './errors.js';

export const CONFIG_FILE = 'registry.yaml';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Console logger settings; passed to the logger's `init` */
export interface LoggingConfig {
	level: LogLevel;
	/** One line per entry; `false` selects the multi-line format */
	compact: boolean;
	/** Print entry metadata under each line (multi-line format only) */
	show_metadata: boolean;
}

export interface RegistryConfig {
	index: { output: string };
	schemas: { accepted_drafts: string[] };
	validate: { concurrency: number; required_dirs: string[] };
	logging: LoggingConfig;
	/** File the settings came from, when one was read */
	source?: string;
}

/** Shape of `registry.yaml`; every section is optional. */
interface RegistryConfigFile {
	index?: { output?: string };
	schemas?: { accepted_drafts?: string[] };
	validate?: { concurrency?: number; required_dirs?: string[] };
	logging?: Partial<LoggingConfig>;
}

const CONFIG_SCHEMA = {
	type: 'object',
	additionalProperties: false,
	properties: {
		index: {
			type: 'object',
			additionalProperties: false,
			properties: { output: { type: 'string', minLength: 1 } },
		},
		schemas: {
			type: 'object',
			additionalProperties: false,
			properties: {
				accepted_drafts: { type: 'array', items: { type: 'string' }, minItems: 1 },
			},
		},
		validate: {
			type: 'object',
			additionalProperties: false,
			properties: {
				concurrency: { type: 'integer', minimum: 1 },
				required_dirs: { type: 'array', items: { type: 'string', minLength: 1 } },
			},
		},
		logging: {
			type: 'object',
			additionalProperties: false,
			properties: {
				level: { type: 'string', enum: [...LOG_LEVELS] },
				compact: { type: 'boolean' },
				show_metadata: { type: 'boolean' },
			},
		},
	},
};

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<RegistryConfigFile>(CONFIG_SCHEMA);

export function defaultConfig(): RegistryConfig {
	return {
		index: { output: DEFAULT_INDEX_FILE },
		schemas: { accepted_drafts: [...DEFAULT_ACCEPTED_DRAFTS] },
		validate: { concurrency: 1, required_dirs: [...DEFAULT_REQUIRED_DIRS] },
		logging: { level: 'error', compact: true, show_metadata: false },
	};
}

function isMissing(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/** Parse and validate the text of a config file. */
export function parseRegistryConfig(text: string, source: string): RegistryConfigFile {
	let raw: unknown;
	try {
		raw = load(text, { schema: CORE_SCHEMA, filename: source });
	} catch (err) {
		const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
		throw new ConfigError(source, `invalid YAML: ${reason}`);
	}
	if (raw === undefined || raw === null) return {};

	if (!validateConfigFile(raw)) {
		throw new ConfigError(source, ajv.errorsText(validateConfigFile.errors, { dataVar: 'config' }));
	}

	for (const draft of raw.schemas?.accepted_drafts ?? []) {
		if (!isKnownDraft(draft)) {
			throw new ConfigError(source, `schemas.accepted_drafts: unknown draft "${draft}"`);
		}
	}
	return raw;
}

/** Apply `CANONIZER_LOG_LEVEL` and `CANONIZER_CONCURRENCY`. */
export function applyEnvOverrides(config: RegistryConfig, env: NodeJS.ProcessEnv): RegistryConfig {
	const result = { ...config };

	const level = env.CANONIZER_LOG_LEVEL;
	if (level !== undefined && level !== '') {
		if (!isLogLevel(level)) {
			throw new ConfigError(
				'CANONIZER_LOG_LEVEL',
				`must be one of ${LOG_LEVELS.join(', ')} (got "${level}")`,
			);
		}
		result.logging = { ...result.logging, level };
	}

	const concurrency = env.CANONIZER_CONCURRENCY;
	if (concurrency !== undefined && concurrency !== '') {
		const n = Number(concurrency);
		if (!Number.isInteger(n) || n < 1) {
			throw new ConfigError(
				'CANONIZER_CONCURRENCY',
				`must be a positive integer (got "${concurrency}")`,
			);
		}
		result.validate = { ...result.validate, concurrency: n };
	}

	return result;
}

export interface LoadConfigOptions {
	/** Registry root; `registry.yaml` is looked up here */
	root: string;
	/** Explicit config file; must exist */
	configPath?: string;
	env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the effective configuration for a registry.
 * A missing `registry.yaml` means defaults; a missing `--config` file is an error.
 */
export async function loadRegistryConfig(options: LoadConfigOptions): Promise<RegistryConfig> {
	const explicit = options.configPath !== undefined;
	const file =
		options.configPath !== undefined ? resolve(options.configPath) : join(options.root, CONFIG_FILE);

	let text: string | undefined;
	try {
		text = await readFile(file, 'utf-8');
	} catch (err) {
		if (!isMissing(err)) {
			throw new ConfigError(file, err instanceof Error ? err.message : String(err));
		}
		if (explicit) throw new ConfigError(file, 'config file not found');
	}

	const base = defaultConfig();
	let config = base;
	if (text !== undefined) {
		const parsed = parseRegistryConfig(text, file);
		config = {
			index: { output: parsed.index?.output ?? base.index.output },
			schemas: { accepted_drafts: parsed.schemas?.accepted_drafts ?? base.schemas.accepted_drafts },
			validate: {
				concurrency: parsed.validate?.concurrency ?? base.validate.concurrency,
				required_dirs: parsed.validate?.required_dirs ?? base.validate.required_dirs,
			},
			logging: {
				level: parsed.logging?.level ?? base.logging.level,
				compact: parsed.logging?.compact ?? base.logging.compact,
				show_metadata: parsed.logging?.show_metadata ?? base.logging.show_metadata,
			},
			source: file,
		};
	}

	return applyEnvOverrides(config, options.env ?? process.env);
}
