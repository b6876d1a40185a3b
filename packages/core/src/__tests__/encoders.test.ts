import { describe, expect, it } from 'vitest';
import { DEFAULT_ENCODER_CONFIG, type EncoderConfig } from '../config.js';
import { LEVEL_ENCODERS, levelFormatter, TIME_ENCODERS, timestampFor } from '../encoders.js';

const NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678));

function encoder(overrides: Partial<EncoderConfig>): EncoderConfig {
	return { ...DEFAULT_ENCODER_CONFIG, ...overrides };
}

describe('LEVEL_ENCODERS', () => {
	it('encodes capital, lowercase and numeric levels', () => {
		expect(LEVEL_ENCODERS.capital('info', 30)).toBe('INFO');
		expect(LEVEL_ENCODERS.lowercase('info', 30)).toBe('info');
		expect(LEVEL_ENCODERS.number('info', 30)).toBe(30);
	});
});

describe('TIME_ENCODERS', () => {
	it('renders each time format as JSON text', () => {
		expect(TIME_ENCODERS.iso8601(NOW)).toBe('"2024-01-02T03:04:05.678Z"');
		expect(TIME_ENCODERS.millis(NOW)).toBe('1704164645678');
		expect(TIME_ENCODERS.seconds(NOW)).toBe('1704164645.678');
		expect(TIME_ENCODERS.nanos(NOW)).toBe('1704164645678000000');
	});
});

describe('levelFormatter', () => {
	it('writes the encoded level under the configured key', () => {
		const format = levelFormatter(encoder({ levelKey: 'severity', levelEncoder: 'capital' }));
		expect(format('warn', 40)).toEqual({ severity: 'WARN' });
	});

	it('drops the level when the key is empty', () => {
		expect(levelFormatter(encoder({ levelKey: '' }))('warn', 40)).toEqual({});
	});
});

describe('timestampFor', () => {
	it('builds the pino timestamp fragment', () => {
		const timestamp = timestampFor(encoder({ timeKey: 'ts', timeEncoder: 'iso8601' }), () => NOW);
		expect(timestamp).not.toBe(false);
		if (timestamp === false) return;
		expect(timestamp()).toBe(',"ts":"2024-01-02T03:04:05.678Z"');
	});

	it('uses epoch milliseconds by default', () => {
		const timestamp = timestampFor(DEFAULT_ENCODER_CONFIG, () => NOW);
		if (timestamp === false) throw new Error('expected a timestamp function');
		expect(timestamp()).toBe(',"time":1704164645678');
	});

	it('disables timestamps when the key is empty', () => {
		expect(timestampFor(encoder({ timeKey: '' }))).toBe(false);
	});
});
