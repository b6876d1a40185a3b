/**
 * Error types for logger initialization.
 */

import type { ConfigValidationError } from '@shiplog/sdk';

export class ShiplogError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'ShiplogError';
	}
}

/** Empty, unparsable, invalid or missing configuration. */
export class ConfigError extends ShiplogError {
	/** Field-level problems when the document parsed but did not validate */
	readonly errors: ConfigValidationError[];

	constructor(
		message: string,
		options?: { cause?: unknown; errors?: ConfigValidationError[] },
	) {
		super(message, options);
		this.name = 'ConfigError';
		this.errors = options?.errors ?? [];
	}
}
