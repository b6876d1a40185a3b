/**
 * Sink registration: what a sink package exports.
 *
 * The logger initializer looks sinks up by id: an output path equal to a
 * registered id (`"loki"`) is served by that sink, configured from the
 * matching `sinks.<id>` block.
 */

import type { Diagnostics } from './diagnostics.js';
import type { ManagedSyncer } from './types.js';
import type { ConfigValidationError } from './validation.js';

/** What a sink receives from the initializer besides its own config block. */
export interface SinkContext {
	diagnostics: Diagnostics;
}

export interface SinkRegistration {
	/** Unique sink ID, also the output path that selects it */
	id: string;
	/** Check a declarative config block; empty array when valid */
	validate(config: Record<string, unknown>): ConfigValidationError[];
	/** Build a sink from a validated config block */
	create(config: Record<string, unknown>, context: SinkContext): ManagedSyncer;
}
