/**
 * Logger configuration: parse, validate and normalize JSON/YAML documents.
 *
 * ```yaml
 * level: info
 * encoding: json
 * outputPaths: [stdout, logs/app.log, loki]
 * encoderConfig:
 *   levelEncoder: capital
 *   timeEncoder: iso8601
 * rotation:
 *   maxSize: 100
 *   maxBackups: 3
 * sinks:
 *   loki:
 *     addr: loki.internal:3100
 *     password: ${LOKI_PASSWORD}
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import {
	checkOptionalBoolean,
	checkOptionalEnum,
	checkOptionalInteger,
	checkOptionalString,
	checkOptionalStringList,
	type ConfigValidationError,
	formatValidationErrors,
	isRecord,
	type SinkRegistration,
} from '@shiplog/sdk';
import registerLoki from '@shiplog/sink-loki';
import yaml from 'js-yaml';
import {
	LEVEL_ENCODER_NAMES,
	type LevelEncoderName,
	TIME_ENCODER_NAMES,
	type TimeEncoderName,
} from './encoders.js';
import { ConfigError } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ENCODINGS = ['json', 'console'] as const;
export type Encoding = (typeof ENCODINGS)[number];

export type FileType = 'json' | 'yaml';

export interface EncoderConfig {
	messageKey: string;
	/** Empty string omits the level field */
	levelKey: string;
	/** Empty string omits the timestamp */
	timeKey: string;
	errorKey: string;
	levelEncoder: LevelEncoderName;
	timeEncoder: TimeEncoderName;
}

export interface RotationConfig {
	/** Megabytes before a file is rotated (0 = 100) */
	maxSize: number;
	/** Days to keep backups (0 = forever) */
	maxAge: number;
	/** Backups to keep (0 = all) */
	maxBackups: number;
	/** Name backups after local time instead of UTC */
	localTime: boolean;
	/** Gzip backups */
	compress: boolean;
}

export interface LoggerConfig {
	level: LogLevel;
	encoding: Encoding;
	name?: string;
	/** `stdout`, `stderr`, a registered sink id, or a file path */
	outputPaths: string[];
	initialFields: Record<string, unknown>;
	encoderConfig: EncoderConfig;
	rotation: RotationConfig;
	/** Declarative sink blocks keyed by sink id */
	sinks: Record<string, Record<string, unknown>>;
}

export interface ParseOptions {
	/** Sinks allowed under `sinks:` (default: the Loki sink) */
	sinks?: SinkRegistration[];
	/** Variables for `${NAME}` references (default: process.env) */
	env?: NodeJS.ProcessEnv;
}

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_ENCODER_CONFIG: Readonly<EncoderConfig> = {
	messageKey: 'msg',
	levelKey: 'level',
	timeKey: 'time',
	errorKey: 'err',
	levelEncoder: 'lowercase',
	timeEncoder: 'millis',
};

export const DEFAULT_ROTATION_CONFIG: Readonly<RotationConfig> = {
	maxSize: 100,
	maxAge: 0,
	maxBackups: 0,
	localTime: false,
	compress: false,
};

export function defaultSinkRegistrations(): SinkRegistration[] {
	return [registerLoki()];
}

// ─── Validation ───────────────────────────────────────────────────────────────

function checkNonNegativeInteger(
	config: Record<string, unknown>,
	key: string,
	prefix: string,
	errors: ConfigValidationError[],
): void {
	const before = errors.length;
	checkOptionalInteger(config, key, prefix, errors);
	const value = config[key];
	if (errors.length === before && typeof value === 'number' && value < 0) {
		errors.push({ field: prefix ? `${prefix}.${key}` : key, message: 'must not be negative' });
	}
}

/** Check a rotation block. `prefix` is '' for a standalone rotation document. */
export function validateRotationConfig(
	config: Record<string, unknown>,
	prefix = 'rotation',
): ConfigValidationError[] {
	const errors: ConfigValidationError[] = [];
	for (const key of ['maxSize', 'maxAge', 'maxBackups']) {
		checkNonNegativeInteger(config, key, prefix, errors);
	}
	checkOptionalBoolean(config, 'localTime', prefix, errors);
	checkOptionalBoolean(config, 'compress', prefix, errors);
	return errors;
}

function checkOptionalRecord(
	config: Record<string, unknown>,
	key: string,
	errors: ConfigValidationError[],
): Record<string, unknown> | undefined {
	const value = config[key];
	if (value === undefined) return undefined;
	if (!isRecord(value)) {
		errors.push({ field: key, message: 'must be an object' });
		return undefined;
	}
	return value;
}

/**
 * Check a whole logger document, including each sink block against its
 * registration. Returns every problem found.
 */
export function validateLoggerConfig(
	doc: Record<string, unknown>,
	sinks: SinkRegistration[] = defaultSinkRegistrations(),
): ConfigValidationError[] {
	const errors: ConfigValidationError[] = [];

	checkOptionalEnum(doc, 'level', LOG_LEVELS, '', errors);
	checkOptionalEnum(doc, 'encoding', ENCODINGS, '', errors);
	checkOptionalString(doc, 'name', '', errors);
	checkOptionalStringList(doc, 'outputPaths', '', errors);
	checkOptionalRecord(doc, 'initialFields', errors);

	const encoder = checkOptionalRecord(doc, 'encoderConfig', errors);
	if (encoder) {
		for (const key of ['messageKey', 'levelKey', 'timeKey', 'errorKey']) {
			checkOptionalString(encoder, key, 'encoderConfig', errors);
		}
		checkOptionalEnum(encoder, 'levelEncoder', LEVEL_ENCODER_NAMES, 'encoderConfig', errors);
		checkOptionalEnum(encoder, 'timeEncoder', TIME_ENCODER_NAMES, 'encoderConfig', errors);
		if (encoder.messageKey === '') {
			errors.push({ field: 'encoderConfig.messageKey', message: 'must not be empty' });
		}
	}

	const rotation = checkOptionalRecord(doc, 'rotation', errors);
	if (rotation) {
		errors.push(...validateRotationConfig(rotation));
	}

	const sinkBlocks = checkOptionalRecord(doc, 'sinks', errors);
	if (sinkBlocks) {
		for (const [id, block] of Object.entries(sinkBlocks)) {
			const registration = sinks.find((s) => s.id === id);
			if (!registration) {
				errors.push({ field: `sinks.${id}`, message: 'unknown sink' });
			} else if (!isRecord(block)) {
				errors.push({ field: `sinks.${id}`, message: 'must be an object' });
			} else {
				errors.push(...registration.validate(block));
			}
		}
	}

	return errors;
}

// ─── Environment references ───────────────────────────────────────────────────

const ENV_REF = /^\$\{(.+)\}$/;

function resolveEnvValue(value: unknown, field: string, env: NodeJS.ProcessEnv): unknown {
	if (typeof value === 'string') {
		const match = value.match(ENV_REF);
		if (!match) return value;
		const envValue = env[match[1]];
		if (envValue === undefined) {
			throw new ConfigError(`Environment variable ${match[1]} is not set (${field})`);
		}
		return envValue;
	}
	if (Array.isArray(value)) {
		return value.map((item, i) => resolveEnvValue(item, `${field}[${i}]`, env));
	}
	if (isRecord(value)) {
		return Object.fromEntries(
			Object.entries(value).map(([key, item]) => [key, resolveEnvValue(item, `${field}.${key}`, env)]),
		);
	}
	return value;
}

/** Replace `${NAME}` string values anywhere inside a sink block. */
export function resolveEnvRefs(
	block: Record<string, unknown>,
	field: string,
	env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
	const resolved: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(block)) {
		resolved[key] = resolveEnvValue(value, `${field}.${key}`, env);
	}
	return resolved;
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

/** `.yaml` and `.yml` are YAML; anything else is JSON. */
export function fileTypeFromPath(path: string): FileType {
	const ext = extname(path).toLowerCase();
	return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

function parseDocument(raw: string | Uint8Array, fileType: FileType): Record<string, unknown> {
	const text = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf8');
	if (text.trim().length === 0) {
		throw new ConfigError('config input is empty');
	}

	let parsed: unknown;
	try {
		parsed = fileType === 'yaml' ? yaml.load(text) : JSON.parse(text);
	} catch (err) {
		throw new ConfigError(`failed to parse ${fileType.toUpperCase()} config`, { cause: err });
	}

	if (!isRecord(parsed)) {
		throw new ConfigError('config must be an object');
	}
	return parsed;
}

function readConfigFile(path: string): { absolute: string; raw: Buffer } {
	const absolute = resolve(path);
	if (!existsSync(absolute)) {
		throw new ConfigError(`file does not exist, filePath: ${absolute}`);
	}
	try {
		return { absolute, raw: readFileSync(absolute) };
	} catch (err) {
		throw new ConfigError(`error thrown while reading file, filePath: ${absolute}`, { cause: err });
	}
}

function stringOr(value: unknown, fallback: string): string {
	return typeof value === 'string' ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
	return typeof value === 'number' ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
	return typeof value === 'boolean' ? value : fallback;
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
	return allowed.find((candidate) => candidate === value) ?? fallback;
}

/** Fill a validated rotation block with defaults. */
export function normalizeRotationConfig(doc: Record<string, unknown>): RotationConfig {
	return {
		maxSize: numberOr(doc.maxSize, DEFAULT_ROTATION_CONFIG.maxSize),
		maxAge: numberOr(doc.maxAge, DEFAULT_ROTATION_CONFIG.maxAge),
		maxBackups: numberOr(doc.maxBackups, DEFAULT_ROTATION_CONFIG.maxBackups),
		localTime: booleanOr(doc.localTime, DEFAULT_ROTATION_CONFIG.localTime),
		compress: booleanOr(doc.compress, DEFAULT_ROTATION_CONFIG.compress),
	};
}

function normalizeEncoderConfig(doc: Record<string, unknown>): EncoderConfig {
	return {
		messageKey: stringOr(doc.messageKey, DEFAULT_ENCODER_CONFIG.messageKey),
		levelKey: stringOr(doc.levelKey, DEFAULT_ENCODER_CONFIG.levelKey),
		timeKey: stringOr(doc.timeKey, DEFAULT_ENCODER_CONFIG.timeKey),
		errorKey: stringOr(doc.errorKey, DEFAULT_ENCODER_CONFIG.errorKey),
		levelEncoder: oneOf(LEVEL_ENCODER_NAMES, doc.levelEncoder, DEFAULT_ENCODER_CONFIG.levelEncoder),
		timeEncoder: oneOf(TIME_ENCODER_NAMES, doc.timeEncoder, DEFAULT_ENCODER_CONFIG.timeEncoder),
	};
}

/**
 * Fill a validated document with defaults and resolve `${NAME}` references
 * in sink blocks.
 */
export function normalizeLoggerConfig(
	doc: Record<string, unknown>,
	env: NodeJS.ProcessEnv = process.env,
): LoggerConfig {
	const outputPaths = Array.isArray(doc.outputPaths)
		? doc.outputPaths.filter((p): p is string => typeof p === 'string')
		: ['stdout'];

	const sinks: Record<string, Record<string, unknown>> = {};
	if (isRecord(doc.sinks)) {
		for (const [id, block] of Object.entries(doc.sinks)) {
			if (isRecord(block)) {
				sinks[id] = resolveEnvRefs(block, `sinks.${id}`, env);
			}
		}
	}

	const config: LoggerConfig = {
		level: oneOf(LOG_LEVELS, doc.level, 'info'),
		encoding: oneOf(ENCODINGS, doc.encoding, 'json'),
		outputPaths,
		initialFields: isRecord(doc.initialFields) ? { ...doc.initialFields } : {},
		encoderConfig: normalizeEncoderConfig(isRecord(doc.encoderConfig) ? doc.encoderConfig : {}),
		rotation: normalizeRotationConfig(isRecord(doc.rotation) ? doc.rotation : {}),
		sinks,
	};
	if (typeof doc.name === 'string') {
		config.name = doc.name;
	}
	return config;
}

/**
 * Parse a logger config document.
 *
 * @throws ConfigError when the input is empty, does not parse, or does not validate
 */
export function parseLoggerConfig(
	raw: string | Uint8Array,
	fileType: FileType,
	options: ParseOptions = {},
): LoggerConfig {
	const doc = parseDocument(raw, fileType);
	const errors = validateLoggerConfig(doc, options.sinks ?? defaultSinkRegistrations());
	if (errors.length > 0) {
		throw new ConfigError(`invalid logger config: ${formatValidationErrors(errors)}`, { errors });
	}
	return normalizeLoggerConfig(doc, options.env);
}

/**
 * Read and parse a logger config file. Relative paths resolve against the
 * working directory; the type follows the extension unless given.
 */
export function loadLoggerConfig(path: string, fileType?: FileType, options?: ParseOptions): LoggerConfig {
	const { absolute, raw } = readConfigFile(path);
	return parseLoggerConfig(raw, fileType ?? fileTypeFromPath(absolute), options);
}

/** Parse a standalone rotation document (`maxSize`, `maxAge`, ...). */
export function parseRotationConfig(raw: string | Uint8Array, fileType: FileType): RotationConfig {
	const doc = parseDocument(raw, fileType);
	const errors = validateRotationConfig(doc, '');
	if (errors.length > 0) {
		throw new ConfigError(`invalid rotation config: ${formatValidationErrors(errors)}`, { errors });
	}
	return normalizeRotationConfig(doc);
}

export function loadRotationConfig(path: string, fileType?: FileType): RotationConfig {
	const { absolute, raw } = readConfigFile(path);
	return parseRotationConfig(raw, fileType ?? fileTypeFromPath(absolute));
}
