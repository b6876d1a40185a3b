/**
 * Field checks for declarative configuration.
 *
 * Validators collect every problem instead of stopping at the first one, so
 * `shiplog validate` can report a whole file at once.
 */

import { parseDuration } from './types.js';

/** Validation error from config checking. */
export interface ConfigValidationError {
	field: string;
	message: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function fieldPath(prefix: string, key: string): string {
	return prefix ? `${prefix}.${key}` : key;
}

export function checkOptionalString(
	config: Record<string, unknown>,
	key: string,
	prefix: string,
	errors: ConfigValidationError[],
): void {
	const value = config[key];
	if (value !== undefined && typeof value !== 'string') {
		errors.push({ field: fieldPath(prefix, key), message: 'must be a string' });
	}
}

export function checkOptionalBoolean(
	config: Record<string, unknown>,
	key: string,
	prefix: string,
	errors: ConfigValidationError[],
): void {
	const value = config[key];
	if (value !== undefined && typeof value !== 'boolean') {
		errors.push({ field: fieldPath(prefix, key), message: 'must be a boolean' });
	}
}

export function checkOptionalInteger(
	config: Record<string, unknown>,
	key: string,
	prefix: string,
	errors: ConfigValidationError[],
): void {
	const value = config[key];
	if (value === undefined) return;
	if (typeof value !== 'number' || !Number.isInteger(value)) {
		errors.push({ field: fieldPath(prefix, key), message: 'must be an integer' });
	}
}

export function checkOptionalEnum(
	config: Record<string, unknown>,
	key: string,
	allowed: readonly string[],
	prefix: string,
	errors: ConfigValidationError[],
): void {
	const value = config[key];
	if (value === undefined) return;
	if (typeof value !== 'string' || !allowed.includes(value)) {
		errors.push({
			field: fieldPath(prefix, key),
			message: `must be one of: ${allowed.join(', ')}`,
		});
	}
}

/** A duration string (`"3s"`) or a number of milliseconds. */
export function checkOptionalDuration(
	config: Record<string, unknown>,
	key: string,
	prefix: string,
	errors: ConfigValidationError[],
): void {
	const value = config[key];
	if (value === undefined || typeof value === 'number') return;
	if (typeof value !== 'string') {
		errors.push({ field: fieldPath(prefix, key), message: 'must be a duration or a number' });
		return;
	}
	try {
		parseDuration(value);
	} catch (err) {
		errors.push({
			field: fieldPath(prefix, key),
			message: err instanceof Error ? err.message : String(err),
		});
	}
}

export function checkOptionalStringList(
	config: Record<string, unknown>,
	key: string,
	prefix: string,
	errors: ConfigValidationError[],
): void {
	const value = config[key];
	if (value === undefined) return;
	if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
		errors.push({ field: fieldPath(prefix, key), message: 'must be a list of strings' });
	}
}

export function checkOptionalStringMap(
	config: Record<string, unknown>,
	key: string,
	prefix: string,
	errors: ConfigValidationError[],
): void {
	const value = config[key];
	if (value === undefined) return;
	if (!isRecord(value) || Object.values(value).some((item) => typeof item !== 'string')) {
		errors.push({ field: fieldPath(prefix, key), message: 'must be a map of strings' });
	}
}

/** Render errors as `field: message` lines. */
export function formatValidationErrors(errors: ConfigValidationError[]): string {
	return errors.map((e) => `${e.field}: ${e.message}`).join('; ');
}
