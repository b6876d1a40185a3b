/**
 * Loki push API wire format.
 *
 * Refer https://grafana.com/docs/loki/latest/reference/loki-http-api/#ingest-logs
 *
 * ```json
 * { "streams": [ { "stream": { "app": "api" }, "values": [ ["<unix ns>", "<line>"] ] } ] }
 * ```
 */

import type { LabelSet } from '@shiplog/sdk';

/** One buffered log line. */
export interface LokiEntry {
	/** Nanoseconds since the Unix epoch */
	readonly timestamp: bigint;
	readonly line: string;
	/** Entry-scoped labels; win over sink labels on conflict */
	readonly labels?: LabelSet;
}

export interface LokiStream {
	stream: LabelSet;
	values: Array<[string, string]>;
}

export interface PushRequest {
	streams: LokiStream[];
}

export function nowNanos(): bigint {
	return BigInt(Date.now()) * 1_000_000n;
}

function streamKey(labels: LabelSet): string {
	return JSON.stringify(
		Object.keys(labels)
			.sort()
			.map((name) => [name, labels[name]]),
	);
}

/**
 * Group entries into streams by effective label set.
 *
 * Streams appear in order of first occurrence; values keep entry order.
 */
export function buildPushRequest(entries: readonly LokiEntry[], labels: LabelSet): PushRequest {
	const streams = new Map<string, LokiStream>();

	for (const entry of entries) {
		const effective = entry.labels ? { ...labels, ...entry.labels } : labels;
		const key = streamKey(effective);
		let stream = streams.get(key);
		if (!stream) {
			stream = { stream: effective, values: [] };
			streams.set(key, stream);
		}
		stream.values.push([entry.timestamp.toString(), entry.line]);
	}

	return { streams: [...streams.values()] };
}
