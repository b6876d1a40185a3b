/**
 * Label names and the shared label store.
 *
 * Label names follow the Loki/Prometheus rule: first character in
 * `[A-Za-z_:]`, the rest in `[A-Za-z0-9_:]`.
 */

import type { LabelSet } from './types.js';

const LABEL_NAME = /^[A-Za-z_:][A-Za-z0-9_:]*$/;

export function isValidLabelName(name: string): boolean {
	return LABEL_NAME.test(name);
}

/**
 * Copy the valid pairs of `input`, dropping invalid names and empty values.
 */
export function sanitizeLabels(input: Record<string, string> | undefined): LabelSet {
	const result: LabelSet = {};
	if (!input) return result;
	for (const [key, value] of Object.entries(input)) {
		if (isValidLabelName(key) && value.length > 0) {
			result[key] = value;
		}
	}
	return result;
}

/**
 * Mutable label set shared by every batch a sink sends.
 *
 * Every operation is synchronous and does no I/O, so no caller can observe a
 * half-applied change. Readers that outlive the call take a `snapshot()`.
 */
export class LabelStore {
	private readonly labels = new Map<string, string>();

	constructor(initial?: Record<string, string>) {
		if (initial) {
			for (const [key, value] of Object.entries(initial)) {
				this.set(key, value);
			}
		}
	}

	/** Insert or overwrite. Returns false (and stores nothing) for an invalid pair. */
	set(key: string, value: string): boolean {
		if (value.length === 0 || !isValidLabelName(key)) return false;
		this.labels.set(key, value);
		return true;
	}

	/** Value for `key`, or `''` when absent. */
	get(key: string): string {
		return this.labels.get(key) ?? '';
	}

	delete(key: string): void {
		this.labels.delete(key);
	}

	/** Independent copy, safe to hold while the store keeps changing. */
	snapshot(): LabelSet {
		return Object.fromEntries(this.labels);
	}

	get size(): number {
		return this.labels.size;
	}
}
