/**
 * Test harness for shiplog sink and logger authors.
 *
 * Provides recording implementations of the SDK contracts and a fetch
 * stand-in that records push requests, for testing in isolation.
 */

import type { DiagnosticLevel, Diagnostics } from './diagnostics.js';
import type { ManagedSyncer } from './types.js';

// ─── Recording Diagnostics ────────────────────────────────────────────────────

export interface RecordedDiagnostic {
	level: DiagnosticLevel;
	message: string;
	fields?: Record<string, unknown>;
}

/**
 * Diagnostics channel that keeps every message for assertion.
 */
export class RecordingDiagnostics implements Diagnostics {
	readonly messages: RecordedDiagnostic[] = [];

	warn(message: string, fields?: Record<string, unknown>): void {
		this.messages.push({ level: 'warn', message, fields });
	}

	error(message: string, fields?: Record<string, unknown>): void {
		this.messages.push({ level: 'error', message, fields });
	}

	/** Messages at one level */
	at(level: DiagnosticLevel): RecordedDiagnostic[] {
		return this.messages.filter((m) => m.level === level);
	}
}

// ─── Memory Syncer ────────────────────────────────────────────────────────────

/**
 * In-memory write syncer with a lifecycle.
 * Records every payload as a string.
 */
export class MemorySyncer implements ManagedSyncer {
	readonly lines: string[] = [];
	started = false;
	stopped = false;
	syncCount = 0;

	write(payload: string | Uint8Array): number {
		const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');
		this.lines.push(text);
		return Buffer.byteLength(text);
	}

	sync(): void {
		this.syncCount++;
	}

	start(): void {
		this.started = true;
	}

	async stop(): Promise<void> {
		this.stopped = true;
	}
}

// ─── Fetch Recorder ───────────────────────────────────────────────────────────

export interface RecordedRequest {
	url: string;
	method: string;
	/** Header names are lower-cased */
	headers: Record<string, string>;
	body: string;
	signal?: AbortSignal;
}

export type FetchResponder = (request: RecordedRequest) => Response | Promise<Response>;

export interface FetchRecorder {
	fetch: typeof globalThis.fetch;
	requests: RecordedRequest[];
	/** Parsed JSON bodies, in request order */
	bodies(): unknown[];
}

/**
 * A fetch stand-in that records every request and answers with `respond`
 * (default: `204 No Content`, the Loki push success status).
 *
 * ```ts
 * const recorder = createFetchRecorder();
 * vi.stubGlobal('fetch', recorder.fetch);
 * ```
 */
export function createFetchRecorder(respond?: FetchResponder): FetchRecorder {
	const requests: RecordedRequest[] = [];
	const responder: FetchResponder = respond ?? (() => new Response(null, { status: 204 }));

	const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
		const headers: Record<string, string> = {};
		new Headers(init?.headers).forEach((value, key) => {
			headers[key] = value;
		});
		const request: RecordedRequest = {
			url: typeof input === 'string' ? input : input instanceof URL ? input.href : input.url,
			method: init?.method ?? 'GET',
			headers,
			body: typeof init?.body === 'string' ? init.body : '',
			signal: init?.signal ?? undefined,
		};
		requests.push(request);
		return responder(request);
	};

	return {
		fetch: fetchImpl,
		requests,
		bodies: () => requests.map((r) => JSON.parse(r.body) as unknown),
	};
}
