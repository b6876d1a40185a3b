/**
 * shiplog ship: Ship stdin to Loki, one log line per input line.
 *
 * Reads until end of input, then stops the sink so the last batch is pushed
 * before the process exits.
 */

import { createInterface } from 'node:readline';
import { ConfigError, loadLoggerConfig } from '@shiplog/core';
import { type Diagnostics, isValidLabelName, parseDuration } from '@shiplog/sdk';
import { createLokiSink, type LokiSinkOptions, lokiOptionsFromConfig } from '@shiplog/sink-loki';
import type { Command } from 'commander';
import * as output from '../output.js';

export interface ShipFlags {
	config?: string;
	addr?: string;
	path?: string;
	username?: string;
	passwordEnv?: string;
	label: string[];
	batchSize?: string;
	batchWait?: string;
}

export interface ShipResult {
	lines: number;
	batches: number;
	delivered: number;
	failed: number;
	dropped: number;
}

// ─── Flags ───────────────────────────────────────────────────────────────────

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

/**
 * Split `key=value` flags. Entries without `=` or with an invalid label name
 * are returned in `invalid`; later keys win.
 */
export function parseLabelFlags(values: readonly string[]): {
	labels: Record<string, string>;
	invalid: string[];
} {
	const labels: Record<string, string> = {};
	const invalid: string[] = [];

	for (const value of values) {
		const eq = value.indexOf('=');
		const key = eq === -1 ? '' : value.slice(0, eq);
		if (!isValidLabelName(key)) {
			invalid.push(value);
			continue;
		}
		labels[key] = value.slice(eq + 1);
	}

	return { labels, invalid };
}

function parseBatchSize(value: string): number {
	const size = /^\d+$/.test(value) ? Number(value) : 0;
	if (size <= 0) {
		throw new ConfigError('--batch-size must be a positive integer');
	}
	return size;
}

function parseBatchWait(value: string): number {
	if (/^\d+$/.test(value)) return Number(value);
	try {
		return parseDuration(value);
	} catch (err) {
		throw new ConfigError(`--batch-wait: ${err instanceof Error ? err.message : String(err)}`, {
			cause: err,
		});
	}
}

/**
 * Sink options from an optional config file's `sinks.loki` block, with the
 * command-line flags layered on top.
 *
 * @throws ConfigError for an invalid file, flag value or unset password variable
 */
export function buildSinkOptions(
	flags: ShipFlags,
	labels: Record<string, string>,
	env: NodeJS.ProcessEnv = process.env,
): LokiSinkOptions {
	const base: LokiSinkOptions = flags.config
		? lokiOptionsFromConfig(loadLoggerConfig(flags.config, undefined, { env }).sinks.loki ?? {})
		: {};
	const options: LokiSinkOptions = { ...base, labels: { ...base.labels, ...labels } };

	if (flags.addr !== undefined) options.addr = flags.addr;
	if (flags.path !== undefined) options.path = flags.path;
	if (flags.username !== undefined) options.username = flags.username;
	if (flags.passwordEnv !== undefined) {
		const password = env[flags.passwordEnv];
		if (password === undefined) {
			throw new ConfigError(`Environment variable ${flags.passwordEnv} is not set (--password-env)`);
		}
		options.password = password;
	}
	if (flags.batchSize !== undefined) options.maxBatchSize = parseBatchSize(flags.batchSize);
	if (flags.batchWait !== undefined) options.maxBatchWaitMs = parseBatchWait(flags.batchWait);

	return options;
}

// ─── Shipping ────────────────────────────────────────────────────────────────

/**
 * Push every non-blank line to Loki and wait for the final batch.
 */
export async function shipLines(
	lines: AsyncIterable<string>,
	options: LokiSinkOptions,
	diagnostics: Diagnostics = output.cliDiagnostics(),
): Promise<ShipResult> {
	const sink = createLokiSink({ ...options, diagnostics });
	output.verbose(`Pushing to ${sink.url}`);
	sink.start();

	try {
		for await (const line of lines) {
			if (line.trim().length === 0) continue;
			sink.write(line);
		}
	} finally {
		await sink.stop();
	}

	const stats = sink.stats();
	return {
		lines: stats.written,
		batches: stats.batches,
		delivered: stats.delivered,
		failed: stats.failed,
		dropped: stats.dropped,
	};
}

// ─── Command registration ────────────────────────────────────────────────────

export function registerShipCommand(program: Command): void {
	program
		.command('ship')
		.description('Ship log lines from stdin to Loki')
		.option('-c, --config <path>', 'Logger config whose sinks.loki block to use')
		.option('--addr <host:port>', 'Loki address')
		.option('--path <path>', 'Push path')
		.option('--username <name>', 'Basic auth user')
		.option('--password-env <var>', 'Environment variable holding the basic auth password')
		.option('-l, --label <key=value>', 'Stream label (repeatable)', collect, [])
		.option('--batch-size <n>', 'Lines per push')
		.option('--batch-wait <duration>', 'Longest wait between pushes (e.g. 3s)')
		.action(async (flags: ShipFlags) => {
			try {
				const { labels, invalid } = parseLabelFlags(flags.label);
				for (const entry of invalid) {
					output.warn(`Skipping invalid label: ${entry}`);
				}

				const options = buildSinkOptions(flags, labels);
				const input = createInterface({ input: process.stdin, crlfDelay: Number.POSITIVE_INFINITY });
				const result = await shipLines(input, options);

				if (output.isJsonMode()) {
					output.json(result);
				} else if (result.failed > 0) {
					output.error(
						`Shipped ${result.lines} lines in ${result.batches} batches, ${result.failed} failed (${result.dropped} lines dropped)`,
					);
				} else {
					output.success(`Shipped ${result.lines} lines in ${result.batches} batches`);
				}

				if (result.failed > 0) process.exitCode = 1;
			} catch (err) {
				output.error(`Ship failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
