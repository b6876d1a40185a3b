/**
 * Diagnostics channel: where shiplog reports its own problems.
 *
 * Sinks never raise delivery failures to the code that wrote the log line;
 * they report them here instead. The default channel writes to
 * process.stderr so stdout stays clean for the host's own output.
 */

export type DiagnosticLevel = 'warn' | 'error';

export interface Diagnostics {
	warn(message: string, fields?: Record<string, unknown>): void;
	error(message: string, fields?: Record<string, unknown>): void;
}

function jsonReplacer(_key: string, value: unknown): unknown {
	if (typeof value === 'bigint') return value.toString();
	if (value instanceof Error) return { name: value.name, message: value.message };
	return value;
}

function stringifyFields(fields: Record<string, unknown>): string {
	try {
		return JSON.stringify(fields, jsonReplacer);
	} catch (err) {
		return JSON.stringify({ unserializable_fields: String(err) });
	}
}

/**
 * One diagnostic line, e.g. `[shiplog] WARN loki push rejected {"status":400}`.
 */
export function formatDiagnostic(
	level: DiagnosticLevel,
	message: string,
	fields?: Record<string, unknown>,
): string {
	const suffix = fields && Object.keys(fields).length > 0 ? ` ${stringifyFields(fields)}` : '';
	return `[shiplog] ${level.toUpperCase()} ${message}${suffix}`;
}

export function createStderrDiagnostics(stream: NodeJS.WritableStream = process.stderr): Diagnostics {
	const emit = (level: DiagnosticLevel, message: string, fields?: Record<string, unknown>): void => {
		try {
			stream.write(`${formatDiagnostic(level, message, fields)}\n`);
		} catch {
			// Diagnostics must not throw
		}
	};
	return {
		warn(message, fields) {
			emit('warn', message, fields);
		},
		error(message, fields) {
			emit('error', message, fields);
		},
	};
}
