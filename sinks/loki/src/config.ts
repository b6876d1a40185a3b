/**
 * Declarative `sinks.loki` config block.
 *
 * ```yaml
 * sinks:
 *   loki:
 *     addr: loki.internal:3100
 *     username: ${LOKI_USER}
 *     password: ${LOKI_PASSWORD}
 *     labels:
 *       app: api
 *     maxBatchWait: 3s
 *     maxBatchSize: 1000
 *     tls:
 *       caFile: /etc/ssl/loki-ca.pem
 * ```
 */

import { readFileSync } from 'node:fs';
import type { ConnectionOptions } from 'node:tls';
import {
	checkOptionalBoolean,
	checkOptionalDuration,
	checkOptionalInteger,
	checkOptionalString,
	checkOptionalStringMap,
	type ConfigValidationError,
	isRecord,
	toMillis,
} from '@shiplog/sdk';
import type { LokiSinkOptions } from './loki-sink.js';

export interface LokiTlsConfig {
	caFile?: string;
	certFile?: string;
	keyFile?: string;
	serverName?: string;
	insecureSkipVerify?: boolean;
}

/**
 * Check a `sinks.loki` block. `prefix` is the path reported in errors.
 */
export function validateLokiConfig(
	config: Record<string, unknown>,
	prefix = 'sinks.loki',
): ConfigValidationError[] {
	const errors: ConfigValidationError[] = [];

	for (const key of ['addr', 'path', 'username', 'password', 'bearerToken']) {
		checkOptionalString(config, key, prefix, errors);
	}
	checkOptionalStringMap(config, 'labels', prefix, errors);
	checkOptionalDuration(config, 'maxBatchWait', prefix, errors);
	checkOptionalDuration(config, 'stopTimeout', prefix, errors);
	checkOptionalInteger(config, 'maxBatchSize', prefix, errors);

	const tls = config.tls;
	if (tls !== undefined) {
		if (!isRecord(tls)) {
			errors.push({ field: `${prefix}.tls`, message: 'must be an object' });
		} else {
			for (const key of ['caFile', 'certFile', 'keyFile', 'serverName']) {
				checkOptionalString(tls, key, `${prefix}.tls`, errors);
			}
			checkOptionalBoolean(tls, 'insecureSkipVerify', `${prefix}.tls`, errors);
			if ((tls.certFile === undefined) !== (tls.keyFile === undefined)) {
				errors.push({
					field: `${prefix}.tls`,
					message: 'certFile and keyFile must be set together',
				});
			}
		}
	}

	return errors;
}

function optionalString(config: Record<string, unknown>, key: string): string | undefined {
	const value = config[key];
	return typeof value === 'string' ? value : undefined;
}

function optionalMillis(config: Record<string, unknown>, key: string): number | undefined {
	const value = config[key];
	return typeof value === 'string' || typeof value === 'number' ? toMillis(value) : undefined;
}

/** Read the PEM files named by a tls block into Node TLS options. */
export function tlsOptionsFromConfig(tls: Record<string, unknown>): ConnectionOptions {
	const options: ConnectionOptions = {};
	const caFile = optionalString(tls, 'caFile');
	const certFile = optionalString(tls, 'certFile');
	const keyFile = optionalString(tls, 'keyFile');
	const serverName = optionalString(tls, 'serverName');

	if (caFile) options.ca = readFileSync(caFile);
	if (certFile) options.cert = readFileSync(certFile);
	if (keyFile) options.key = readFileSync(keyFile);
	if (serverName) options.servername = serverName;
	if (tls.insecureSkipVerify === true) options.rejectUnauthorized = false;

	return options;
}

/**
 * Map a validated block to sink options. Diagnostics come from the caller.
 */
export function lokiOptionsFromConfig(config: Record<string, unknown>): LokiSinkOptions {
	const labels = config.labels;
	const maxBatchSize = config.maxBatchSize;

	return {
		addr: optionalString(config, 'addr'),
		path: optionalString(config, 'path'),
		username: optionalString(config, 'username'),
		password: optionalString(config, 'password'),
		bearerToken: optionalString(config, 'bearerToken'),
		labels: isRecord(labels) ? stringEntries(labels) : undefined,
		maxBatchWaitMs: optionalMillis(config, 'maxBatchWait'),
		maxBatchSize: typeof maxBatchSize === 'number' ? maxBatchSize : undefined,
		stopTimeoutMs: optionalMillis(config, 'stopTimeout'),
		tls: isRecord(config.tls) ? tlsOptionsFromConfig(config.tls) : undefined,
	};
}

function stringEntries(record: Record<string, unknown>): Record<string, string> {
	const out: Record<string, string> = {};
	for (const [key, value] of Object.entries(record)) {
		if (typeof value === 'string') out[key] = value;
	}
	return out;
}
