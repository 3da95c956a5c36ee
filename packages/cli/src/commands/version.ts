/**
 * can-registry version — Print version info.
 *
 * Shows tool version, node version, platform.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Command } from 'commander';
import * as output from '../output.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export async function getVersion(): Promise<string> {
	// Walk up from commands/ to the package manifest
	const pkgPath = resolve(__dirname, '..', '..', 'package.json');
	let content: string;
	try {
		content = await readFile(pkgPath, 'utf-8');
	} catch (err) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return 'unknown';
		throw err;
	}
	const pkg: unknown = JSON.parse(content);
	if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
		return pkg.version;
	}
	return 'unknown';
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info')
		.action(async () => {
			const version = await getVersion();

			if (output.isJsonMode()) {
				output.json({
					'can-registry': version,
					node: process.version,
					platform: `${process.platform} ${process.arch}`,
				});
				return;
			}

			output.info(`can-registry ${version}`);
			output.info(`node         ${process.version}`);
			output.info(`platform     ${process.platform} ${process.arch}`);
		});
}
