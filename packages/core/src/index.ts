/**
 * @shiplog/core: build pino loggers from declarative configuration.
 */

export {
	DEFAULT_ENCODER_CONFIG,
	DEFAULT_ROTATION_CONFIG,
	defaultSinkRegistrations,
	type EncoderConfig,
	type Encoding,
	ENCODINGS,
	type FileType,
	fileTypeFromPath,
	loadLoggerConfig,
	loadRotationConfig,
	LOG_LEVELS,
	type LoggerConfig,
	type LogLevel,
	normalizeLoggerConfig,
	normalizeRotationConfig,
	type ParseOptions,
	parseLoggerConfig,
	parseRotationConfig,
	resolveEnvRefs,
	type RotationConfig,
	validateLoggerConfig,
	validateRotationConfig,
} from './config.js';
export {
	LEVEL_ENCODER_NAMES,
	LEVEL_ENCODERS,
	type LevelEncoderName,
	levelFormatter,
	TIME_ENCODER_NAMES,
	TIME_ENCODERS,
	type TimeEncoderName,
	timestampFor,
} from './encoders.js';
export { ConfigError, ShiplogError } from './errors.js';
export {
	type CreateLoggerOptions,
	createLogger,
	createLoggerFromFile,
	type LoggerHandle,
	type LoggerOutput,
	type OutputKind,
	toSerializableConfig,
} from './logger.js';
export {
	newDefaultRotationConfig,
	newEventLoggerConfig,
	newNoopLogger,
	newStdoutLoggerConfig,
} from './presets.js';
export {
	type BackupFile,
	backupName,
	DEFAULT_MAX_SIZE_MB,
	listBackups,
	needsRotation,
	RotatingFileWriter,
	type RotatingFileWriterOptions,
	rotatingWriterOptions,
} from './rotation.js';
