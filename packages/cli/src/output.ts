/**
 * CLI output: colored status lines, JSON mode, quiet and verbose modes.
 *
 * Human-readable lines go through these helpers so `--json` and `--quiet`
 * apply everywhere; `json()` always prints.
 */

import type { Diagnostics } from '@shiplog/sdk';
import chalk from 'chalk';

// ─── Global output state ─────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;
let verboseMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
	verboseMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

// ─── Basic output ────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(message);
}

export function success(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.green(`  ✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function warn(message: string): void {
	if (quietMode || jsonMode) return;
	console.warn(chalk.yellow(`  ! ${message}`));
}

export function verbose(message: string): void {
	if (!verboseMode || quietMode || jsonMode) return;
	console.log(chalk.dim(`  … ${message}`));
}

// ─── JSON output ─────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Validation output ───────────────────────────────────────────────────────

export function validPass(file: string, description: string): void {
	if (quietMode || jsonMode) return;
	console.log(`${chalk.green('✓')} ${file}: ${description}`);
}

export function validFail(file: string, description: string): void {
	if (jsonMode) return;
	console.log(`${chalk.red('✗')} ${file}: ${description}`);
}

// ─── Sink diagnostics ────────────────────────────────────────────────────────

function withFields(message: string, fields?: Record<string, unknown>): string {
	return fields && Object.keys(fields).length > 0 ? `${message} ${JSON.stringify(fields)}` : message;
}

/** Route a sink's delivery problems through the CLI's warn and error lines. */
export function cliDiagnostics(): Diagnostics {
	return {
		warn(message, fields) {
			warn(withFields(message, fields));
		},
		error(message, fields) {
			error(withFields(message, fields));
		},
	};
}
