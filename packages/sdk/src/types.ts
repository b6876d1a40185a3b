/**
 * Core contracts shared by every shiplog package.
 */

// ─── Write Syncer ─────────────────────────────────────────────────────────────

/**
 * The destination contract a structured logger drives.
 *
 * Shape-compatible with pino's `DestinationStream`: pino calls `write()` with
 * one serialized record per call.
 */
export interface WriteSyncer {
	/** Accept one serialized record. Returns the number of bytes accepted. */
	write(payload: string | Uint8Array): number;

	/** Flush anything the destination holds synchronously. */
	sync(): void;
}

// ─── Lifecycle ────────────────────────────────────────────────────────────────

/**
 * Bootstrap/interrupt contract for components with background work.
 * `start()` is called once; `stop()` resolves once background work has drained.
 */
export interface Lifecycle {
	start(): void;
	stop(signal?: AbortSignal): Promise<void>;
}

/** A write syncer that also owns background work (remote sinks, pooled writers). */
export type ManagedSyncer = WriteSyncer & Lifecycle;

export function isLifecycle(value: object): value is Lifecycle {
	return (
		'start' in value &&
		typeof value.start === 'function' &&
		'stop' in value &&
		typeof value.stop === 'function'
	);
}

// ─── Labels ───────────────────────────────────────────────────────────────────

/** Label name → label value. Keys follow {@link isValidLabelName}. */
export type LabelSet = Record<string, string>;

// ─── Durations ────────────────────────────────────────────────────────────────

/** A duration string (`"250ms"`, `"3s"`, `"5m"`, `"2h"`, `"7d"`) or milliseconds. */
export type Duration = string | number;

const DURATION_UNITS: Record<string, number> = {
	ms: 1,
	s: 1000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
};

/**
 * Parse a duration string like `"3s"` into milliseconds.
 */
export function parseDuration(value: string): number {
	const match = value.trim().match(/^(\d+)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(`Invalid duration format: "${value}"`);
	}
	return Number.parseInt(match[1], 10) * DURATION_UNITS[match[2]];
}

/** Resolve a {@link Duration} to milliseconds. */
export function toMillis(value: Duration): number {
	return typeof value === 'number' ? value : parseDuration(value);
}
