/**
 * Loki transport: serializes a batch and POSTs it to the push endpoint.
 *
 * One request per batch, no retry. The outcome is returned, never thrown.
 */

import type { ConnectionOptions } from 'node:tls';
import {
	closeHttpAgent,
	createFetchWithKeepAlive,
	createHttpAgent,
	type HttpAgent,
	type LabelSet,
} from '@shiplog/sdk';
import { buildPushRequest, type LokiEntry } from './push.js';

/** The push API acknowledges an accepted batch with 204 No Content. */
export const PUSH_SUCCESS_STATUS = 204;

export interface LokiTransportOptions {
	/** host[:port], with or without an http(s):// prefix */
	addr: string;
	path: string;
	username?: string;
	password?: string;
	bearerToken?: string;
	/** Presence switches the scheme to https */
	tls?: ConnectionOptions;
}

export type SendOutcome =
	| { status: 'delivered'; statusCode: number }
	| { status: 'rejected'; statusCode: number; error: Error }
	| { status: 'error'; error: Error };

/** `https://<addr>` when TLS is configured, `http://<addr>` otherwise. */
export function resolveAddress(addr: string, secure: boolean): string {
	const bare = addr.replace(/^https?:\/\//i, '');
	return `${secure ? 'https' : 'http'}://${bare}`;
}

/** `Basic base64(user:pass)`, only when both parts are non-empty. */
export function basicAuthHeader(username?: string, password?: string): string | undefined {
	if (!username || !password) return undefined;
	return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

function authorizationFor(options: LokiTransportOptions): string | undefined {
	const basic = basicAuthHeader(options.username, options.password);
	if (basic) return basic;
	return options.bearerToken ? `Bearer ${options.bearerToken}` : undefined;
}

async function readDetail(response: Response): Promise<string> {
	const text = await response.text().catch(() => '');
	return text.trim().slice(0, 200);
}

export class LokiTransport {
	readonly address: string;
	readonly url: string;
	readonly authHeader?: string;
	private readonly agent: HttpAgent;
	private readonly fetch: typeof globalThis.fetch;
	private closed = false;

	constructor(options: LokiTransportOptions) {
		this.address = resolveAddress(options.addr, options.tls !== undefined);
		this.url = `${this.address}${options.path}`;
		this.authHeader = authorizationFor(options);
		this.agent = createHttpAgent({ connections: 1, tls: options.tls });
		this.fetch = createFetchWithKeepAlive(this.agent);
	}

	/**
	 * Push one batch. `labels` is a snapshot of the sink labels; entry labels
	 * override it per entry.
	 */
	async send(entries: readonly LokiEntry[], labels: LabelSet, signal?: AbortSignal): Promise<SendOutcome> {
		const headers: Record<string, string> = {
			'Content-Type': 'application/json',
		};

		if (this.authHeader) {
			headers.Authorization = this.authHeader;
		}

		try {
			const response = await this.fetch(this.url, {
				method: 'POST',
				headers,
				body: JSON.stringify(buildPushRequest(entries, labels)),
				signal,
			});

			if (response.status === PUSH_SUCCESS_STATUS) {
				return { status: 'delivered', statusCode: response.status };
			}

			const detail = await readDetail(response);
			return {
				status: 'rejected',
				statusCode: response.status,
				error: new Error(
					`Loki push rejected with status ${response.status}${detail ? `: ${detail}` : ''}`,
				),
			};
		} catch (err) {
			return {
				status: 'error',
				error: err instanceof Error ? err : new Error(String(err)),
			};
		}
	}

	/** Release pooled connections. Later calls are no-ops. */
	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await closeHttpAgent(this.agent);
	}
}
