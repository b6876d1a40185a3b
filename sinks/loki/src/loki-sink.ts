/**
 * LokiSink: a write syncer that batches log lines and pushes them to Loki.
 *
 *   const sink = createLokiSink({ addr: 'loki:3100', labels: { app: 'api' } });
 *   sink.start();
 *   const logger = pino(sink);
 *   ...
 *   await sink.stop();
 *
 * `write()` only appends to an in-memory buffer. A single background loop
 * owns every network send: it wakes when the buffer reaches `maxBatchSize`,
 * when `maxBatchWaitMs` elapses, or when `stop()` is called, and sends the
 * drained batch before waiting again. At most one push is in flight, so
 * batches reach Loki in the order they were drained.
 *
 * Failed pushes are reported on the diagnostics channel and dropped. There
 * is no retry and no cap on the buffer while the endpoint is slow.
 */

import { EventEmitter } from 'node:events';
import type { ConnectionOptions } from 'node:tls';
import {
	createStderrDiagnostics,
	type Diagnostics,
	type LabelSet,
	LabelStore,
	type ManagedSyncer,
	sanitizeLabels,
} from '@shiplog/sdk';
import { BatchBuffer } from './batch-buffer.js';
import { type LokiEntry, nowNanos } from './push.js';
import { LokiTransport, type SendOutcome } from './transport.js';

export const DEFAULT_ADDR = 'localhost:3100';
export const DEFAULT_PATH = '/loki/api/v1/push';
export const DEFAULT_MAX_BATCH_WAIT_MS = 3000;
export const DEFAULT_MAX_BATCH_SIZE = 1000;
export const DEFAULT_STOP_TIMEOUT_MS = 10_000;

/** Identity label set on every stream; user labels cannot replace it. */
export const RESERVED_LABEL_NAME = 'shiplog';
export const RESERVED_LABEL_VALUE = 'v1';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface LokiSinkOptions {
	/** host[:port] of the Loki server (default: localhost:3100) */
	addr?: string;
	/** Push path (default: /loki/api/v1/push) */
	path?: string;
	/** Basic auth, sent only when both username and password are set */
	username?: string;
	password?: string;
	/** Bearer token, used when basic auth is not configured */
	bearerToken?: string;
	/** TLS client options; switches the scheme to https */
	tls?: ConnectionOptions;
	/** Static labels for every stream. Invalid names are dropped. */
	labels?: Record<string, string>;
	/** Flush at least this often (default: 3000). Non-positive values use the default. */
	maxBatchWaitMs?: number;
	/** Flush once this many lines are buffered (default: 1000). Non-positive values use the default. */
	maxBatchSize?: number;
	/** Bound on the final push during stop() (default: 10000) */
	stopTimeoutMs?: number;
	/** Where delivery failures are reported (default: stderr) */
	diagnostics?: Diagnostics;
	/** Clock in nanoseconds since the epoch */
	now?: () => bigint;
}

// ─── Events ───────────────────────────────────────────────────────────────────

export type FlushReason = 'size' | 'timer' | 'stop';

export interface FlushEvent {
	reason: FlushReason;
	/** Entries drained; 0 for an empty timer tick */
	count: number;
}

export interface SendEvent {
	count: number;
	outcome: SendOutcome;
}

/** Events emitted by LokiSink */
export interface LokiSinkEvents {
	flush: [FlushEvent];
	send: [SendEvent];
}

export interface LokiSinkStats {
	/** Lines accepted into the buffer */
	written: number;
	/** Lines refused because the sink had already drained for shutdown */
	rejected: number;
	/** Pushes attempted */
	batches: number;
	/** Pushes acknowledged with 204 */
	delivered: number;
	/** Pushes rejected or failed in transport */
	failed: number;
	/** Lines lost with failed pushes */
	dropped: number;
}

type SinkState = 'idle' | 'running' | 'stopping' | 'stopped';

type WakeReason = 'size' | 'timer' | 'stop';

function positiveOr(value: number | undefined, fallback: number): number {
	return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

function byteLength(payload: string | Uint8Array): number {
	return typeof payload === 'string' ? Buffer.byteLength(payload) : payload.byteLength;
}

// ─── LokiSink ─────────────────────────────────────────────────────────────────

export class LokiSink extends EventEmitter<LokiSinkEvents> implements ManagedSyncer {
	readonly maxBatchSize: number;
	readonly maxBatchWaitMs: number;
	readonly stopTimeoutMs: number;
	private readonly buffer = new BatchBuffer<LokiEntry>();
	private readonly labelStore: LabelStore;
	private readonly transport: LokiTransport;
	private readonly diagnostics: Diagnostics;
	private readonly now: () => bigint;
	private readonly counters: LokiSinkStats = {
		written: 0,
		rejected: 0,
		batches: 0,
		delivered: 0,
		failed: 0,
		dropped: 0,
	};
	private state: SinkState = 'idle';
	/** Set in the same tick as the final drain; later writes are rejected */
	private drained = false;
	private loop: Promise<void> | null = null;
	private stopping: Promise<void> | null = null;
	/** Aborts every push once the stop bound is reached */
	private readonly sends = new AbortController();
	private waiter: ((reason: WakeReason) => void) | null = null;
	private pendingWake: WakeReason | null = null;

	constructor(options: LokiSinkOptions = {}) {
		super();
		this.maxBatchSize = positiveOr(options.maxBatchSize, DEFAULT_MAX_BATCH_SIZE);
		this.maxBatchWaitMs = positiveOr(options.maxBatchWaitMs, DEFAULT_MAX_BATCH_WAIT_MS);
		this.stopTimeoutMs = positiveOr(options.stopTimeoutMs, DEFAULT_STOP_TIMEOUT_MS);
		this.diagnostics = options.diagnostics ?? createStderrDiagnostics();
		this.now = options.now ?? nowNanos;

		this.labelStore = new LabelStore(options.labels);
		// Applied last so configured labels cannot replace it
		this.labelStore.set(RESERVED_LABEL_NAME, RESERVED_LABEL_VALUE);

		this.transport = new LokiTransport({
			addr: options.addr || DEFAULT_ADDR,
			path: options.path || DEFAULT_PATH,
			username: options.username,
			password: options.password,
			bearerToken: options.bearerToken,
			tls: options.tls,
		});
	}

	/** Scheme and address, e.g. `https://loki:3100` */
	get address(): string {
		return this.transport.address;
	}

	get url(): string {
		return this.transport.url;
	}

	get authHeader(): string | undefined {
		return this.transport.authHeader;
	}

	// ─── Write syncer ─────────────────────────────────────────────────────

	/**
	 * Buffer one log line. Never blocks on the network and never reports
	 * delivery problems; always returns the payload's byte length.
	 */
	write(payload: string | Uint8Array): number {
		return this.enqueue(payload, undefined);
	}

	/** Buffer one log line with entry-scoped labels. Invalid labels are dropped. */
	writeEntry(payload: string | Uint8Array, labels: Record<string, string>): number {
		const entryLabels = sanitizeLabels(labels);
		delete entryLabels[RESERVED_LABEL_NAME];
		return this.enqueue(payload, Object.keys(entryLabels).length > 0 ? entryLabels : undefined);
	}

	/** No-op: the background loop decides when to flush. */
	sync(): void {}

	private enqueue(payload: string | Uint8Array, labels: LabelSet | undefined): number {
		const size = byteLength(payload);

		if (this.drained) {
			this.counters.rejected++;
			this.diagnostics.warn('loki sink already stopped, log line rejected', { bytes: size });
			return size;
		}

		const line = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');
		this.buffer.append({ timestamp: this.now(), line, labels });
		this.counters.written++;

		if (this.buffer.length >= this.maxBatchSize) {
			this.wake('size');
		}
		return size;
	}

	// ─── Labels ───────────────────────────────────────────────────────────

	/** Add or replace a sink label. Returns false for invalid or reserved names. */
	addLabel(key: string, value: string): boolean {
		if (key === RESERVED_LABEL_NAME) return false;
		return this.labelStore.set(key, value);
	}

	removeLabel(key: string): void {
		if (key === RESERVED_LABEL_NAME) return;
		this.labelStore.delete(key);
	}

	labels(): LabelSet {
		return this.labelStore.snapshot();
	}

	stats(): LokiSinkStats {
		return { ...this.counters };
	}

	/** Lines waiting for the next flush */
	get pending(): number {
		return this.buffer.length;
	}

	// ─── Lifecycle ────────────────────────────────────────────────────────

	/**
	 * Start the background flush loop. Call once; a second call would run two
	 * loops over the same buffer.
	 */
	start(): void {
		this.state = 'running';
		this.loop = this.run();
	}

	/**
	 * Stop the loop after one final drain-and-send, then close the HTTP pool.
	 * A push still in flight and the final push are aborted when `signal`
	 * fires or after `stopTimeoutMs`, whichever comes first.
	 * Later calls return the same promise.
	 */
	stop(signal?: AbortSignal): Promise<void> {
		if (!this.stopping) {
			this.stopping = this.shutdown(signal);
		}
		return this.stopping;
	}

	private async shutdown(signal?: AbortSignal): Promise<void> {
		const timeout = AbortSignal.timeout(this.stopTimeoutMs);
		const bound = signal ? AbortSignal.any([signal, timeout]) : timeout;
		if (bound.aborted) {
			this.sends.abort(bound.reason);
		} else {
			bound.addEventListener('abort', () => this.sends.abort(bound.reason), { once: true });
		}

		if (this.loop) {
			this.state = 'stopping';
			this.wake('stop');
			await this.loop;
		} else {
			await this.finalFlush();
		}

		this.state = 'stopped';
		await this.transport.close();
	}

	private async run(): Promise<void> {
		for (;;) {
			const reason = await this.nextWakeup();
			if (reason === 'stop') break;
			await this.flush(reason);
		}
		await this.finalFlush();
	}

	private finalFlush(): Promise<void> {
		this.drained = true;
		return this.flush('stop');
	}

	private nextWakeup(): Promise<WakeReason> {
		if (this.state === 'stopping') return Promise.resolve('stop');

		const pending = this.pendingWake;
		if (pending) {
			this.pendingWake = null;
			return Promise.resolve(pending);
		}

		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				this.waiter = null;
				resolve('timer');
			}, this.maxBatchWaitMs);
			timer.unref();

			this.waiter = (reason) => {
				clearTimeout(timer);
				this.waiter = null;
				resolve(reason);
			};
		});
	}

	private wake(reason: 'size' | 'stop'): void {
		if (this.waiter) {
			this.waiter(reason);
			return;
		}
		// The loop is mid-send (or not started): remember the wakeup
		if (reason === 'stop' || this.pendingWake === null) {
			this.pendingWake = reason;
		}
	}

	private async flush(reason: FlushReason): Promise<void> {
		const entries = this.buffer.drainAll();
		this.notify('flush', () => this.emit('flush', { reason, count: entries.length }));
		if (entries.length === 0) return;

		this.counters.batches++;
		const outcome = await this.transport.send(entries, this.labelStore.snapshot(), this.sends.signal);

		if (outcome.status === 'delivered') {
			this.counters.delivered++;
		} else {
			this.counters.failed++;
			this.counters.dropped += entries.length;
			this.diagnostics.error(
				outcome.status === 'rejected' ? 'loki push rejected' : 'loki push failed',
				{
					url: this.transport.url,
					entries: entries.length,
					...(outcome.status === 'rejected' ? { status: outcome.statusCode } : {}),
					error: outcome.error.message,
				},
			);
		}

		this.notify('send', () => this.emit('send', { count: entries.length, outcome }));
	}

	/** A throwing listener is reported and must not stop the loop. */
	private notify(event: keyof LokiSinkEvents, emit: () => boolean): void {
		try {
			emit();
		} catch (err) {
			this.diagnostics.error('loki sink listener failed', {
				event,
				error: err instanceof Error ? err.message : String(err),
			});
		}
	}
}

/**
 * Create a Loki sink. Call `start()` before relying on timed flushes.
 */
export function createLokiSink(options?: LokiSinkOptions): LokiSink {
	return new LokiSink(options);
}
