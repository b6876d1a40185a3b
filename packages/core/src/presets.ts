/**
 * Ready-made configurations. Every call returns a fresh value.
 */

import { type Logger, pino } from 'pino';
import type { LoggerConfig, RotationConfig } from './config.js';

/** Human-readable stdout logger: console encoding, capital levels, ISO-8601 time under `ts`. */
export function newStdoutLoggerConfig(): LoggerConfig {
	return {
		level: 'info',
		encoding: 'console',
		outputPaths: ['stdout'],
		initialFields: {},
		encoderConfig: {
			messageKey: 'msg',
			levelKey: 'level',
			timeKey: 'ts',
			errorKey: 'err',
			levelEncoder: 'capital',
			timeEncoder: 'iso8601',
		},
		rotation: newDefaultRotationConfig(),
		sinks: {},
	};
}

/**
 * Config for event loggers that carry their own timestamps and levels:
 * the message only, no level or time fields.
 */
export function newEventLoggerConfig(): LoggerConfig {
	return {
		level: 'info',
		encoding: 'console',
		outputPaths: ['stdout'],
		initialFields: {},
		encoderConfig: {
			messageKey: 'msg',
			levelKey: '',
			timeKey: '',
			errorKey: 'err',
			levelEncoder: 'capital',
			timeEncoder: 'iso8601',
		},
		rotation: newDefaultRotationConfig(),
		sinks: {},
	};
}

export function newDefaultRotationConfig(): RotationConfig {
	return {
		maxSize: 1024,
		maxAge: 7,
		maxBackups: 3,
		localTime: true,
		compress: true,
	};
}

/** A logger that discards everything but keeps the pino type. */
export function newNoopLogger(): Logger {
	return pino({ enabled: false });
}
