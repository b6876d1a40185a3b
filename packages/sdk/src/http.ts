/**
 * HTTP connection management for shiplog sinks.
 *
 * Provides keep-alive connection pooling via undici Agent.
 * Each sink creates its own agent when it is constructed and
 * closes it when it stops.
 */

import type { ConnectionOptions } from 'node:tls';
import { Agent, type Dispatcher } from 'undici';

/**
 * Opaque handle for an HTTP connection pool agent.
 * Sinks store this and pass it to closeHttpAgent() on shutdown.
 */
export type HttpAgent = Dispatcher;

/** Options for creating an HTTP agent with connection pooling */
export interface HttpAgentOptions {
	/** Max connections per origin (default: 10) */
	connections?: number;
	/** Keep-alive timeout in milliseconds (default: 30000) */
	keepAliveTimeout?: number;
	/** Max keep-alive timeout in milliseconds (default: 60000) */
	keepAliveMaxTimeout?: number;
	/** Number of pipelined requests per connection (default: 1, i.e. no pipelining) */
	pipelining?: number;
	/** TLS client options applied to every connection the agent opens */
	tls?: ConnectionOptions;
}

/** Default keep-alive agent options */
const DEFAULTS: Required<Omit<HttpAgentOptions, 'tls'>> = {
	connections: 10,
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	pipelining: 1,
};

/**
 * Create an undici Agent with keep-alive connection pooling.
 *
 * Usage:
 * ```ts
 * const agent = createHttpAgent({ tls: { ca } });
 * const response = await fetch(url, { dispatcher: agent });
 * // On shutdown:
 * await closeHttpAgent(agent);
 * ```
 */
export function createHttpAgent(options?: HttpAgentOptions): HttpAgent {
	const opts = { ...DEFAULTS, ...options };
	return new Agent({
		keepAliveTimeout: opts.keepAliveTimeout,
		keepAliveMaxTimeout: opts.keepAliveMaxTimeout,
		pipelining: opts.pipelining,
		connections: opts.connections,
		connect: opts.tls,
	});
}

/**
 * Create a fetch function that uses the given agent as its dispatcher.
 *
 * The global `fetch` is looked up on every call, so a stubbed global in tests
 * still sees the request.
 */
export function createFetchWithKeepAlive(agent: HttpAgent): typeof globalThis.fetch {
	return ((input: string | URL | Request, init?: RequestInit) => {
		return globalThis.fetch(input, {
			...init,
			dispatcher: agent,
		} as unknown as RequestInit);
	}) as typeof globalThis.fetch;
}

/**
 * Gracefully close an HTTP agent, draining active connections.
 */
export async function closeHttpAgent(agent: HttpAgent): Promise<void> {
	await agent.close();
}
