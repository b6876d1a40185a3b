/**
 * shiplog version: Print version info.
 */

import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import * as output from '../output.js';

async function getVersion(): Promise<string> {
	// packages/cli/package.json, two levels up from commands/
	const pkgUrl = new URL('../../package.json', import.meta.url);
	try {
		const pkg: { version?: string } = JSON.parse(await readFile(pkgUrl, 'utf-8'));
		return pkg.version ?? 'unknown';
	} catch (err) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return 'unknown';
		throw err;
	}
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info')
		.action(async () => {
			const version = await getVersion();

			if (output.isJsonMode()) {
				output.json({
					shiplog: version,
					node: process.version,
					platform: `${process.platform} ${process.arch}`,
				});
				return;
			}

			output.info(`shiplog  ${version}`);
			output.info(`node     ${process.version}`);
			output.info(`platform ${process.platform} ${process.arch}`);
		});
}
