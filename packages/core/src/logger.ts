/**
 * Logger assembly: turns a LoggerConfig into a pino logger plus the
 * lifecycle of everything it writes to.
 *
 *   const handle = createLoggerFromFile('logger.yaml');
 *   handle.start();
 *   handle.logger.info({ user: 'ut-user' }, 'signed in');
 *   await handle.stop();
 *
 * Each output path becomes one multistream destination: `stdout` and
 * `stderr` go to file descriptors 1 and 2, a registered sink id (`loki`) to
 * that sink, and anything else to a size-rotated file.
 */

import { resolve } from 'node:path';
import {
	createStderrDiagnostics,
	type Diagnostics,
	formatValidationErrors,
	isRecord,
	type Lifecycle,
	type SinkRegistration,
	type WriteSyncer,
} from '@shiplog/sdk';
import {
	type DestinationStream,
	destination,
	type Logger,
	type LoggerOptions,
	multistream,
	pino,
} from 'pino';
import { prettyFactory } from 'pino-pretty';
import {
	defaultSinkRegistrations,
	type FileType,
	loadLoggerConfig,
	type LoggerConfig,
	type LogLevel,
} from './config.js';
import { levelFormatter, timestampFor } from './encoders.js';
import { ConfigError } from './errors.js';
import { RotatingFileWriter, rotatingWriterOptions } from './rotation.js';

export interface CreateLoggerOptions {
	/** Sinks an output path may name (default: the Loki sink) */
	sinks?: SinkRegistration[];
	/** Passed to every sink (default: stderr) */
	diagnostics?: Diagnostics;
	/** Replaces file descriptor 1 for `stdout` outputs */
	stdout?: WriteSyncer;
	/** Replaces file descriptor 2 for `stderr` outputs */
	stderr?: WriteSyncer;
	/** Clock for timestamps and backup names */
	clock?: () => Date;
	/** Base for relative file paths (default: process.cwd()) */
	cwd?: string;
	/** Variables for `${NAME}` references when loading from a file */
	env?: NodeJS.ProcessEnv;
}

export type OutputKind = 'stdout' | 'stderr' | 'sink' | 'file';

export interface LoggerOutput {
	/** The entry from outputPaths */
	path: string;
	kind: OutputKind;
	syncer: WriteSyncer;
}

export interface LoggerHandle {
	readonly logger: Logger;
	readonly config: LoggerConfig;
	/** One per output path, in order */
	readonly outputs: readonly LoggerOutput[];
	/** Start background work (remote sinks). */
	start(): void;
	/**
	 * Flush every output, stop sinks and close files. Later calls return the
	 * same promise.
	 */
	stop(signal?: AbortSignal): Promise<void>;
}

const SECRET_KEYS = new Set(['password', 'bearerToken']);
const MASK = '******';

type StreamLevel = Exclude<LogLevel, 'silent'>;

// ─── Destinations ─────────────────────────────────────────────────────────────

function byteLength(payload: string | Uint8Array): number {
	return typeof payload === 'string' ? Buffer.byteLength(payload) : payload.byteLength;
}

function toText(payload: string | Uint8Array): string {
	return typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');
}

/** Synchronous writer on a standard file descriptor. */
function descriptorSyncer(fd: 1 | 2): WriteSyncer {
	const stream = destination({ dest: fd, sync: true });
	return {
		write(payload) {
			stream.write(toText(payload));
			return byteLength(payload);
		},
		// Writes are synchronous
		sync() {},
	};
}

/**
 * pino writes the level field first; with an empty level key the record
 * opens with the comma of the next field.
 */
function dropLeadingComma(line: string): string {
	return line.startsWith('{,') ? `{${line.slice(2)}` : line;
}

function lineWriter(target: WriteSyncer, format: (line: string) => string): WriteSyncer {
	return {
		write(payload) {
			return target.write(format(toText(payload)));
		},
		sync() {
			target.sync();
		},
	};
}

function pinoOptions(config: LoggerConfig, clock: (() => Date) | undefined): LoggerOptions {
	const encoder = config.encoderConfig;
	const options: LoggerOptions = {
		level: config.level,
		messageKey: encoder.messageKey,
		errorKey: encoder.errorKey,
		// Replaces pid and hostname
		base: { ...config.initialFields },
	};
	if (config.name !== undefined) {
		options.name = config.name;
	}

	if (config.encoding === 'console') {
		// pino-pretty labels numeric levels and renders the time itself
		const levelKey = encoder.levelKey;
		options.formatters = { level: (_label, number) => (levelKey ? { [levelKey]: number } : {}) };
		options.timestamp = timestampFor({ ...encoder, timeEncoder: 'millis' }, clock);
	} else {
		options.formatters = { level: levelFormatter(encoder) };
		options.timestamp = timestampFor(encoder, clock);
	}
	return options;
}

function consoleFormatter(config: LoggerConfig): (line: string) => string {
	const encoder = config.encoderConfig;
	return prettyFactory({
		colorize: false,
		messageKey: encoder.messageKey,
		levelKey: encoder.levelKey || undefined,
		timestampKey: encoder.timeKey || undefined,
		errorLikeObjectKeys: [encoder.errorKey],
		translateTime: encoder.timeKey ? 'SYS:standard' : false,
		ignore: 'pid,hostname',
	});
}

function checkSinkBlocks(config: LoggerConfig, registrations: SinkRegistration[]): void {
	const errors = Object.entries(config.sinks).flatMap(([id, block]) => {
		const registration = registrations.find((r) => r.id === id);
		return registration ? registration.validate(block) : [{ field: `sinks.${id}`, message: 'unknown sink' }];
	});
	if (errors.length > 0) {
		throw new ConfigError(`invalid logger config: ${formatValidationErrors(errors)}`, { errors });
	}
}

// ─── createLogger ─────────────────────────────────────────────────────────────

/**
 * Build a logger from a config. Files are opened on first write; sinks do not
 * flush on a timer until `start()`.
 *
 * @throws ConfigError when a sink block is invalid or names an unknown sink
 */
export function createLogger(config: LoggerConfig, options: CreateLoggerOptions = {}): LoggerHandle {
	const registrations = options.sinks ?? defaultSinkRegistrations();
	const diagnostics = options.diagnostics ?? createStderrDiagnostics();
	const cwd = options.cwd ?? process.cwd();

	checkSinkBlocks(config, registrations);

	const lifecycles: Lifecycle[] = [];
	const files: RotatingFileWriter[] = [];

	const outputs = config.outputPaths.map((path): LoggerOutput => {
		if (path === 'stdout') {
			return { path, kind: 'stdout', syncer: options.stdout ?? descriptorSyncer(1) };
		}
		if (path === 'stderr') {
			return { path, kind: 'stderr', syncer: options.stderr ?? descriptorSyncer(2) };
		}

		const registration = registrations.find((r) => r.id === path);
		if (registration) {
			const sink = registration.create(config.sinks[path] ?? {}, { diagnostics });
			lifecycles.push(sink);
			return { path, kind: 'sink', syncer: sink };
		}

		const writer = new RotatingFileWriter({
			...rotatingWriterOptions(resolve(cwd, path), config.rotation),
			clock: options.clock,
		});
		files.push(writer);
		return { path, kind: 'file', syncer: writer };
	});

	const transforms: Array<(line: string) => string> = [];
	if (!config.encoderConfig.levelKey) transforms.push(dropLeadingComma);
	if (config.encoding === 'console') transforms.push(consoleFormatter(config));
	const format =
		transforms.length > 0
			? (line: string) => transforms.reduce((current, transform) => transform(current), line)
			: null;
	const streamLevel: StreamLevel = config.level === 'silent' ? 'fatal' : config.level;
	const streams = outputs.map((output): { stream: DestinationStream; level: StreamLevel } => ({
		stream: format ? lineWriter(output.syncer, format) : output.syncer,
		level: streamLevel,
	}));

	const logger = pino(pinoOptions(config, options.clock), multistream(streams));

	let stopping: Promise<void> | null = null;

	return {
		logger,
		config,
		outputs,
		start() {
			for (const lifecycle of lifecycles) {
				lifecycle.start();
			}
		},
		stop(signal?: AbortSignal) {
			if (!stopping) {
				stopping = (async () => {
					for (const output of outputs) {
						output.syncer.sync();
					}
					await Promise.all(lifecycles.map((lifecycle) => lifecycle.stop(signal)));
					for (const file of files) {
						file.close();
					}
				})();
			}
			return stopping;
		},
	};
}

/**
 * Load a config file and build its logger.
 *
 * @throws ConfigError for a missing, empty, unparsable or invalid file
 */
export function createLoggerFromFile(
	path: string,
	fileType?: FileType,
	options: CreateLoggerOptions = {},
): LoggerHandle {
	const config = loadLoggerConfig(path, fileType, { sinks: options.sinks, env: options.env });
	return createLogger(config, options);
}

// ─── Serialization ────────────────────────────────────────────────────────────

function maskSecrets(block: Record<string, unknown>): Record<string, unknown> {
	const masked: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(block)) {
		if (SECRET_KEYS.has(key) && typeof value === 'string' && value.length > 0) {
			masked[key] = MASK;
		} else if (isRecord(value)) {
			masked[key] = maskSecrets(value);
		} else {
			masked[key] = value;
		}
	}
	return masked;
}

/**
 * Copy of a config that can be printed or written back as JSON/YAML:
 * encoders by name, passwords and tokens masked.
 */
export function toSerializableConfig(config: LoggerConfig): LoggerConfig {
	const copy: LoggerConfig = {
		level: config.level,
		encoding: config.encoding,
		outputPaths: [...config.outputPaths],
		initialFields: { ...config.initialFields },
		encoderConfig: { ...config.encoderConfig },
		rotation: { ...config.rotation },
		sinks: Object.fromEntries(Object.entries(config.sinks).map(([id, block]) => [id, maskSecrets(block)])),
	};
	if (config.name !== undefined) {
		copy.name = config.name;
	}
	return copy;
}
