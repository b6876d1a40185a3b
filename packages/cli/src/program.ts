/**
 * The `shiplog` command tree.
 *
 * Built by a function so tests can parse arguments against a fresh program.
 */

import { Command } from 'commander';
import { registerShipCommand } from './commands/ship.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

export { buildSinkOptions, parseLabelFlags, type ShipFlags, type ShipResult, shipLines } from './commands/ship.js';
export { type ValidateResult, validateConfigFile } from './commands/validate.js';

interface GlobalOptions {
	json?: boolean;
	quiet?: boolean;
	verbose?: boolean;
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name('shiplog')
		.description('Ship log lines to Loki and check logger configs')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print errors')
		.option('-v, --verbose', 'Print progress details')
		.hook('preAction', (thisCommand) => {
			const opts: GlobalOptions = thisCommand.opts();
			output.setJsonMode(opts.json === true);
			output.setQuietMode(opts.quiet === true);
			output.setVerboseMode(opts.verbose === true);
		});

	registerShipCommand(program);
	registerValidateCommand(program);
	registerVersionCommand(program);

	return program;
}
