import { createFetchRecorder, type FetchRecorder, RecordingDiagnostics } from '@shiplog/sdk/testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
	createLokiSink,
	DEFAULT_MAX_BATCH_SIZE,
	DEFAULT_MAX_BATCH_WAIT_MS,
	DEFAULT_STOP_TIMEOUT_MS,
	type FlushEvent,
	type LokiSink,
	type LokiSinkOptions,
	type SendEvent,
} from '../loki-sink.js';
import type { PushRequest } from '../push.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const sinks: LokiSink[] = [];
let recorder: FetchRecorder;
let diagnostics: RecordingDiagnostics;

function counterClock(): () => bigint {
	let tick = 0n;
	return () => ++tick;
}

function makeSink(options: LokiSinkOptions = {}): LokiSink {
	const sink = createLokiSink({ diagnostics, now: counterClock(), ...options });
	sinks.push(sink);
	return sink;
}

function pushedLines(): string[] {
	return recorder
		.bodies()
		.flatMap((body) => (body as PushRequest).streams.flatMap((s) => s.values.map(([, line]) => line)));
}

beforeEach(() => {
	recorder = createFetchRecorder();
	vi.stubGlobal('fetch', recorder.fetch);
	diagnostics = new RecordingDiagnostics();
});

afterEach(async () => {
	for (const sink of sinks) {
		await sink.stop();
	}
	sinks.length = 0;
	vi.unstubAllGlobals();
});

// ─── Construction ─────────────────────────────────────────────────────────────

describe('createLokiSink', () => {
	it('applies defaults', () => {
		const sink = makeSink();
		expect(sink.address).toBe('http://localhost:3100');
		expect(sink.url).toBe('http://localhost:3100/loki/api/v1/push');
		expect(sink.maxBatchSize).toBe(DEFAULT_MAX_BATCH_SIZE);
		expect(sink.maxBatchWaitMs).toBe(DEFAULT_MAX_BATCH_WAIT_MS);
		expect(sink.stopTimeoutMs).toBe(DEFAULT_STOP_TIMEOUT_MS);
		expect(sink.authHeader).toBeUndefined();
	});

	it('replaces non-positive batch settings with defaults', () => {
		const sink = makeSink({ maxBatchSize: 0, maxBatchWaitMs: -5, stopTimeoutMs: 0 });
		expect(sink.maxBatchSize).toBe(1000);
		expect(sink.maxBatchWaitMs).toBe(3000);
		expect(sink.stopTimeoutMs).toBe(10_000);
	});

	it('uses https when TLS is configured', () => {
		expect(makeSink({ addr: 'ut-addr', tls: {} }).address).toBe('https://ut-addr');
		expect(makeSink({ addr: 'ut-addr' }).address).toBe('http://ut-addr');
	});

	it('builds the basic auth header from username and password', () => {
		const sink = makeSink({ username: 'ut-name', password: 'ut-pass' });
		expect(sink.authHeader).toBe(`Basic ${Buffer.from('ut-name:ut-pass').toString('base64')}`);
	});

	it('uses a custom push path', () => {
		expect(makeSink({ addr: 'ut-addr', path: '/ut-path' }).url).toBe('http://ut-addr/ut-path');
	});
});

// ─── Labels ───────────────────────────────────────────────────────────────────

describe('labels', () => {
	it('keeps valid configured labels and always carries the identity label', () => {
		const sink = makeSink({ labels: { app: 'api', 'bad-name': 'x', empty: '', shiplog: 'override' } });
		expect(sink.labels()).toEqual({ app: 'api', shiplog: 'v1' });
	});

	it('adds and removes labels at runtime', () => {
		const sink = makeSink();
		expect(sink.addLabel('env', 'prod')).toBe(true);
		expect(sink.addLabel('ut-key', 'x')).toBe(false);
		expect(sink.labels()).toEqual({ env: 'prod', shiplog: 'v1' });

		sink.removeLabel('env');
		expect(sink.labels()).toEqual({ shiplog: 'v1' });
	});

	it('refuses to change the identity label', () => {
		const sink = makeSink();
		expect(sink.addLabel('shiplog', 'v2')).toBe(false);
		sink.removeLabel('shiplog');
		expect(sink.labels()).toEqual({ shiplog: 'v1' });
	});

	it('sends a label added after construction with the next batch', async () => {
		const sink = makeSink();
		sink.addLabel('region', 'eu');
		sink.write('line');
		await sink.stop();

		expect(recorder.bodies()).toEqual([
			{ streams: [{ stream: { region: 'eu', shiplog: 'v1' }, values: [['1', 'line']] }] },
		]);
	});

	it('sends entry labels as a separate stream', async () => {
		const sink = makeSink({ labels: { app: 'api' } });
		sink.write('plain');
		sink.writeEntry('tagged', { level: 'error', shiplog: 'v9', 'bad-name': 'x' });
		await sink.stop();

		expect(recorder.bodies()).toEqual([
			{
				streams: [
					{ stream: { app: 'api', shiplog: 'v1' }, values: [['1', 'plain']] },
					{ stream: { app: 'api', shiplog: 'v1', level: 'error' }, values: [['2', 'tagged']] },
				],
			},
		]);
	});
});

// ─── Writing ──────────────────────────────────────────────────────────────────

describe('write', () => {
	it('returns the byte length and buffers without sending', () => {
		const sink = makeSink();
		expect(sink.write('héllo')).toBe(6);
		expect(sink.write(new Uint8Array([1, 2, 3]))).toBe(3);
		expect(sink.pending).toBe(2);
		expect(recorder.requests).toHaveLength(0);
	});

	it('decodes byte payloads as UTF-8', async () => {
		const sink = makeSink();
		sink.write(Buffer.from('{"msg":"bytes"}\n'));
		await sink.stop();
		expect(pushedLines()).toEqual(['{"msg":"bytes"}\n']);
	});

	it('sync is a no-op', () => {
		const sink = makeSink();
		sink.write('x');
		sink.sync();
		expect(sink.pending).toBe(1);
		expect(recorder.requests).toHaveLength(0);
	});

	it('rejects writes after stop and reports them', async () => {
		const sink = makeSink();
		await sink.stop();

		expect(sink.write('late')).toBe(4);
		expect(sink.pending).toBe(0);
		expect(sink.stats().rejected).toBe(1);
		expect(diagnostics.at('warn')).toEqual([
			{ level: 'warn', message: 'loki sink already stopped, log line rejected', fields: { bytes: 4 } },
		]);
	});
});

// ─── Flushing ─────────────────────────────────────────────────────────────────

describe('flush loop', () => {
	it('flushes once the batch size is reached', async () => {
		const sink = makeSink({ maxBatchSize: 10, maxBatchWaitMs: 60_000 });
		const flushes: FlushEvent[] = [];
		sink.on('flush', (event: FlushEvent) => flushes.push(event));
		sink.start();

		for (let i = 0; i < 10; i++) {
			sink.write(`line-${i}`);
		}

		await vi.waitFor(() => expect(recorder.requests).toHaveLength(1));
		expect(flushes).toEqual([{ reason: 'size', count: 10 }]);
		expect(pushedLines()).toEqual(Array.from({ length: 10 }, (_, i) => `line-${i}`));
	});

	it('flushes on the timer when the batch stays small', async () => {
		const sink = makeSink({ maxBatchSize: 100, maxBatchWaitMs: 50 });
		const flushes: FlushEvent[] = [];
		sink.on('flush', (event: FlushEvent) => flushes.push(event));
		sink.start();
		sink.write('only');

		await vi.waitFor(() => expect(flushes.length).toBeGreaterThanOrEqual(2), { timeout: 2000 });
		expect(flushes[0]).toEqual({ reason: 'timer', count: 1 });
		expect(flushes[1]).toEqual({ reason: 'timer', count: 0 });
		expect(recorder.requests).toHaveLength(1);
		expect(pushedLines()).toEqual(['only']);
	});

	it('sends everything buffered in one final request on stop', async () => {
		const sink = makeSink({ maxBatchSize: 100, maxBatchWaitMs: 60_000 });
		const flushes: FlushEvent[] = [];
		sink.on('flush', (event: FlushEvent) => flushes.push(event));
		sink.start();

		for (let i = 0; i < 5; i++) {
			sink.write(`line-${i}`);
		}
		await sink.stop();

		expect(recorder.requests).toHaveLength(1);
		expect(flushes).toEqual([{ reason: 'stop', count: 5 }]);
		expect(pushedLines()).toEqual(['line-0', 'line-1', 'line-2', 'line-3', 'line-4']);
		expect(sink.stats()).toEqual({
			written: 5,
			rejected: 0,
			batches: 1,
			delivered: 1,
			failed: 0,
			dropped: 0,
		});
	});

	it('sends nothing on stop when the buffer is empty', async () => {
		const sink = makeSink();
		sink.start();
		await sink.stop();
		expect(recorder.requests).toHaveLength(0);
	});

	it('flushes on stop even if the loop was never started', async () => {
		const sink = makeSink();
		sink.write('a');
		sink.write('b');
		await sink.stop();
		expect(pushedLines()).toEqual(['a', 'b']);
	});

	it('returns the same promise from repeated stop calls', async () => {
		const sink = makeSink();
		sink.start();
		sink.write('a');
		const first = sink.stop();
		expect(sink.stop()).toBe(first);
		await first;
		expect(recorder.requests).toHaveLength(1);
	});

	it('keeps batches in order while a send is in flight', async () => {
		let release = (): void => {};
		const gate = new Promise<void>((resolve) => {
			release = () => resolve();
		});
		recorder = createFetchRecorder(async () => {
			await gate;
			return new Response(null, { status: 204 });
		});
		vi.stubGlobal('fetch', recorder.fetch);

		const sink = makeSink({ maxBatchSize: 2, maxBatchWaitMs: 60_000 });
		sink.start();
		sink.write('a');
		sink.write('b');
		await vi.waitFor(() => expect(recorder.requests).toHaveLength(1));

		sink.write('c');
		sink.write('d');
		sink.write('e');
		expect(recorder.requests).toHaveLength(1);

		release();
		await sink.stop();

		expect(pushedLines()).toEqual(['a', 'b', 'c', 'd', 'e']);
		expect(recorder.requests).toHaveLength(2);
	});
});

// ─── Delivery failures ────────────────────────────────────────────────────────

describe('delivery failures', () => {
	it('reports a rejected push and drops the batch', async () => {
		recorder = createFetchRecorder(() => new Response('ingester unavailable', { status: 500 }));
		vi.stubGlobal('fetch', recorder.fetch);
		const sink = makeSink();
		const sends: SendEvent[] = [];
		sink.on('send', (event: SendEvent) => sends.push(event));

		sink.write('x');
		await sink.stop();

		expect(diagnostics.at('error')).toEqual([
			{
				level: 'error',
				message: 'loki push rejected',
				fields: {
					url: 'http://localhost:3100/loki/api/v1/push',
					entries: 1,
					status: 500,
					error: 'Loki push rejected with status 500: ingester unavailable',
				},
			},
		]);
		expect(sends).toHaveLength(1);
		expect(sends[0]?.outcome.status).toBe('rejected');
		expect(sink.stats()).toMatchObject({ batches: 1, delivered: 0, failed: 1, dropped: 1 });
	});

	it('reports a transport failure', async () => {
		vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED')));
		const sink = makeSink();

		sink.write('x');
		sink.write('y');
		await sink.stop();

		expect(diagnostics.at('error')).toEqual([
			{
				level: 'error',
				message: 'loki push failed',
				fields: {
					url: 'http://localhost:3100/loki/api/v1/push',
					entries: 2,
					error: 'connect ECONNREFUSED',
				},
			},
		]);
		expect(sink.stats().dropped).toBe(2);
	});

	it('keeps running after a failed push', async () => {
		let calls = 0;
		recorder = createFetchRecorder(() => {
			calls++;
			return new Response(null, { status: calls === 1 ? 503 : 204 });
		});
		vi.stubGlobal('fetch', recorder.fetch);
		const sink = makeSink({ maxBatchSize: 1, maxBatchWaitMs: 60_000 });
		sink.start();

		sink.write('first');
		await vi.waitFor(() => expect(recorder.requests).toHaveLength(1));
		sink.write('second');
		await vi.waitFor(() =>
			expect(sink.stats()).toMatchObject({ batches: 2, delivered: 1, failed: 1, dropped: 1 }),
		);
		expect(pushedLines()).toEqual(['first', 'second']);
	});

	it('aborts a hanging final push after the stop timeout', async () => {
		recorder = createFetchRecorder(
			(request) =>
				new Promise<Response>((_, reject) => {
					request.signal?.addEventListener('abort', () => reject(new Error('push aborted')));
				}),
		);
		vi.stubGlobal('fetch', recorder.fetch);
		const sink = makeSink({ stopTimeoutMs: 50 });
		sink.start();
		sink.write('x');

		await sink.stop();

		expect(diagnostics.at('error')).toHaveLength(1);
		expect(diagnostics.at('error')[0]?.message).toBe('loki push failed');
		expect(diagnostics.at('error')[0]?.fields?.error).toBe('push aborted');
	});

	it('aborts the final push with a caller signal', async () => {
		recorder = createFetchRecorder(
			(request) =>
				new Promise<Response>((_, reject) => {
					request.signal?.addEventListener('abort', () => reject(new Error('push aborted')));
				}),
		);
		vi.stubGlobal('fetch', recorder.fetch);
		const sink = makeSink({ stopTimeoutMs: 60_000 });
		sink.write('x');

		const controller = new AbortController();
		const stopped = sink.stop(controller.signal);
		controller.abort();
		await stopped;

		expect(sink.stats().failed).toBe(1);
	});
});

// ─── Shutdown bounds ──────────────────────────────────────────────────────────

function hangingRecorder(): FetchRecorder {
	return createFetchRecorder(
		(request) =>
			new Promise<Response>((_, reject) => {
				if (request.signal?.aborted) {
					reject(new Error('push aborted'));
					return;
				}
				request.signal?.addEventListener('abort', () => reject(new Error('push aborted')));
			}),
	);
}

describe('stop bounds', () => {
	it('aborts a size-triggered push that is still in flight', async () => {
		recorder = hangingRecorder();
		vi.stubGlobal('fetch', recorder.fetch);
		const sink = makeSink({ maxBatchSize: 1, stopTimeoutMs: 50 });
		sink.start();
		sink.write('x');
		await vi.waitFor(() => expect(recorder.requests).toHaveLength(1));

		await sink.stop();

		expect(recorder.requests).toHaveLength(1);
		expect(sink.stats()).toMatchObject({ batches: 1, delivered: 0, failed: 1, dropped: 1 });
		expect(diagnostics.at('error').map((m) => m.message)).toEqual(['loki push failed']);
	});

	it('keeps the stop timeout when the caller signal never fires', async () => {
		recorder = hangingRecorder();
		vi.stubGlobal('fetch', recorder.fetch);
		const sink = makeSink({ stopTimeoutMs: 50 });
		sink.write('x');

		await sink.stop(new AbortController().signal);

		expect(sink.stats()).toMatchObject({ batches: 1, failed: 1, dropped: 1 });
	});
});

// ─── Event listeners ──────────────────────────────────────────────────────────

describe('event listeners', () => {
	it('reports a throwing listener and keeps flushing', async () => {
		const sink = makeSink({ maxBatchSize: 1 });
		let calls = 0;
		sink.on('flush', () => {
			calls++;
			if (calls === 1) throw new Error('listener bug');
		});
		sink.start();

		sink.write('a');
		await vi.waitFor(() => expect(recorder.requests).toHaveLength(1));
		sink.write('b');
		await vi.waitFor(() => expect(recorder.requests).toHaveLength(2));
		await sink.stop();

		expect(pushedLines()).toEqual(['a', 'b']);
		expect(diagnostics.messages).toEqual([
			{
				level: 'error',
				message: 'loki sink listener failed',
				fields: { event: 'flush', error: 'listener bug' },
			},
		]);
	});

	it('reports a throwing send listener without losing the stop', async () => {
		const sink = makeSink();
		sink.on('send', () => {
			throw new Error('listener bug');
		});
		sink.write('a');

		await sink.stop();

		expect(sink.stats()).toMatchObject({ batches: 1, delivered: 1 });
		expect(diagnostics.at('error')).toHaveLength(1);
		expect(diagnostics.at('error')[0]?.fields).toEqual({ event: 'send', error: 'listener bug' });
	});
});
