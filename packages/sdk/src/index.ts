/**
 * @shiplog/sdk: contracts shared by the shiplog packages.
 */

export {
	createStderrDiagnostics,
	type DiagnosticLevel,
	type Diagnostics,
	formatDiagnostic,
} from './diagnostics.js';
export {
	closeHttpAgent,
	createFetchWithKeepAlive,
	createHttpAgent,
	type HttpAgent,
	type HttpAgentOptions,
} from './http.js';
export { isValidLabelName, LabelStore, sanitizeLabels } from './labels.js';
export type { SinkContext, SinkRegistration } from './registration.js';
export {
	type Duration,
	isLifecycle,
	type LabelSet,
	type Lifecycle,
	type ManagedSyncer,
	parseDuration,
	toMillis,
	type WriteSyncer,
} from './types.js';
export {
	checkOptionalBoolean,
	checkOptionalDuration,
	checkOptionalEnum,
	checkOptionalInteger,
	checkOptionalString,
	checkOptionalStringList,
	checkOptionalStringMap,
	type ConfigValidationError,
	formatValidationErrors,
	isRecord,
} from './validation.js';
