/**
 * shiplog validate: Check a logger config file without building the logger.
 */

import { ConfigError, type FileType, loadLoggerConfig } from '@shiplog/core';
import type { ConfigValidationError } from '@shiplog/sdk';
import type { Command } from 'commander';
import * as output from '../output.js';

export interface ValidateResult {
	file: string;
	valid: boolean;
	/** Summary line: outputs on success, the error message on failure */
	message: string;
	errors: ConfigValidationError[];
}

export function validateConfigFile(file: string, fileType?: FileType): ValidateResult {
	try {
		const config = loadLoggerConfig(file, fileType);
		return {
			file,
			valid: true,
			message: `level ${config.level}, outputs: ${config.outputPaths.join(', ')}`,
			errors: [],
		};
	} catch (err) {
		if (!(err instanceof ConfigError)) throw err;
		return { file, valid: false, message: err.message, errors: err.errors };
	}
}

// ─── Command registration ────────────────────────────────────────────────────

export function registerValidateCommand(program: Command): void {
	program
		.command('validate <file>')
		.description('Validate a logger config file')
		.option('--type <type>', 'Force the file type (json or yaml)')
		.action((file: string, opts: { type?: string }) => {
			const fileType: FileType | undefined =
				opts.type === 'json' || opts.type === 'yaml' ? opts.type : undefined;
			if (opts.type !== undefined && fileType === undefined) {
				output.error(`Unknown file type: ${opts.type}`);
				process.exitCode = 1;
				return;
			}

			const result = validateConfigFile(file, fileType);

			if (output.isJsonMode()) {
				output.json(result);
			} else if (result.valid) {
				output.validPass(file, result.message);
			} else {
				output.validFail(file, result.message);
			}

			if (!result.valid) process.exitCode = 1;
		});
}
