/**
 * Index regeneration — the fail-closed step after a validation run.
 *
 * A partially valid registry never produces a partial index: the index is
 * only rebuilt from a report that covered the whole registry and found no
 * failures.
 */

import { isAbsolute, join } from 'node:path';
import type { Logger, RegistryIndex } from '@canonizer/sdk';
import { DEFAULT_INDEX_FILE, buildIndex, writeIndex } from './index-builder.js';
import { LoggerManager } from './logger.js';
import type { ValidationReport } from './validator.js';

export interface RegenerateIndexOptions {
	/** Output file, absolute or relative to the registry root */
	output?: string;
	loggers?: Logger[];
	clock?: () => Date;
}

export type RegenerateIndexResult =
	| { status: 'written' | 'unchanged'; path: string; index: RegistryIndex }
	| { status: 'skipped'; path: string; reason: string };

export async function regenerateIndex(
	report: ValidationReport,
	options: RegenerateIndexOptions = {},
): Promise<RegenerateIndexResult> {
	const output = options.output ?? DEFAULT_INDEX_FILE;
	const path = isAbsolute(output) ? output : join(report.root, output);
	const clock = options.clock ?? (() => new Date());
	const loggers = new LoggerManager(options.loggers);
	const timestamp = clock().toISOString();

	let reason: string | undefined;
	if (report.scope !== 'all') {
		reason = `validation covered only ${report.scope}`;
	} else if (!report.ok) {
		reason = `${report.failed} unit${report.failed === 1 ? '' : 's'} failed validation`;
	}
	if (reason !== undefined) {
		await loggers.log({ timestamp, phase: 'index.skip', message: reason });
		return { status: 'skipped', path, reason };
	}

	const index = buildIndex(report.transforms, report.schemas, timestamp);
	const result = await writeIndex(path, index);
	await loggers.log({
		timestamp,
		phase: result.status === 'written' ? 'index.write' : 'index.unchanged',
		message: path,
		metadata: { transforms: index.transforms.length, schemas: index.schemas.length },
	});
	return result;
}
