/**
 * @shiplog/sink-loki: batching Loki push sink and its registration.
 */

import type { SinkRegistration } from '@shiplog/sdk';
import { lokiOptionsFromConfig, validateLokiConfig } from './config.js';
import { createLokiSink } from './loki-sink.js';

export { BatchBuffer } from './batch-buffer.js';
export {
	type LokiTlsConfig,
	lokiOptionsFromConfig,
	tlsOptionsFromConfig,
	validateLokiConfig,
} from './config.js';
export {
	createLokiSink,
	DEFAULT_ADDR,
	DEFAULT_MAX_BATCH_SIZE,
	DEFAULT_MAX_BATCH_WAIT_MS,
	DEFAULT_PATH,
	DEFAULT_STOP_TIMEOUT_MS,
	type FlushEvent,
	type FlushReason,
	LokiSink,
	type LokiSinkEvents,
	type LokiSinkOptions,
	type LokiSinkStats,
	RESERVED_LABEL_NAME,
	RESERVED_LABEL_VALUE,
	type SendEvent,
} from './loki-sink.js';
export { buildPushRequest, type LokiEntry, type LokiStream, nowNanos, type PushRequest } from './push.js';
export {
	basicAuthHeader,
	LokiTransport,
	type LokiTransportOptions,
	PUSH_SUCCESS_STATUS,
	resolveAddress,
	type SendOutcome,
} from './transport.js';

export default function register(): SinkRegistration {
	return {
		id: 'loki',
		validate: (config) => validateLokiConfig(config),
		create: (config, context) =>
			createLokiSink({ ...lokiOptionsFromConfig(config), diagnostics: context.diagnostics }),
	};
}
