/**
 * Command-line program definition for can-registry.
 */

import { Command } from 'commander';
import { registerIndexCommand } from './commands/index-registry.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerVersionCommand } from './commands/version.js';
import { applyOutputModes, readGlobalOptions } from './runner.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('can-registry')
		.description('Validate a transform registry and regenerate its index')
		.option('--config <file>', 'Config file (default: <path>/registry.yaml)')
		.option('--json', 'Machine-readable output')
		.option('--quiet', 'Only print failures')
		.option('--verbose', 'Print passing units and info-level logs')
		.hook('preAction', (thisCommand) => {
			applyOutputModes(readGlobalOptions(thisCommand.opts()));
		});

	registerValidateCommand(program);
	registerIndexCommand(program);
	registerVersionCommand(program);

	return program;
}
