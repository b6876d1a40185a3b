/**
 * Named level and time encoders.
 *
 * A config stores the encoder name only; these tables map each name to the
 * pino option that implements it.
 */

import type { EncoderConfig } from './config.js';

export const LEVEL_ENCODER_NAMES = ['capital', 'lowercase', 'number'] as const;
export type LevelEncoderName = (typeof LEVEL_ENCODER_NAMES)[number];

export const TIME_ENCODER_NAMES = ['iso8601', 'millis', 'seconds', 'nanos'] as const;
export type TimeEncoderName = (typeof TIME_ENCODER_NAMES)[number];

/** Level label and number → the JSON value written under the level key */
export const LEVEL_ENCODERS: Record<LevelEncoderName, (label: string, number: number) => string | number> = {
	capital: (label) => label.toUpperCase(),
	lowercase: (label) => label,
	number: (_label, number) => number,
};

/** Clock reading → the raw JSON text written under the time key */
export const TIME_ENCODERS: Record<TimeEncoderName, (now: Date) => string> = {
	iso8601: (now) => JSON.stringify(now.toISOString()),
	millis: (now) => String(now.getTime()),
	seconds: (now) => String(now.getTime() / 1000),
	nanos: (now) => (BigInt(now.getTime()) * 1_000_000n).toString(),
};

/**
 * pino `formatters.level`. An empty level key drops the field.
 */
export function levelFormatter(config: EncoderConfig): (label: string, number: number) => Record<string, unknown> {
	const encode = LEVEL_ENCODERS[config.levelEncoder];
	const key = config.levelKey;
	return (label, number) => (key ? { [key]: encode(label, number) } : {});
}

/**
 * pino `timestamp` option. An empty time key disables timestamps.
 */
export function timestampFor(config: EncoderConfig, clock: () => Date = () => new Date()): false | (() => string) {
	const key = config.timeKey;
	if (!key) return false;
	const encode = TIME_ENCODERS[config.timeEncoder];
	const prefix = `,${JSON.stringify(key)}:`;
	return () => `${prefix}${encode(clock())}`;
}
