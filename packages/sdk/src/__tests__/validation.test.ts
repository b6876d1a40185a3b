import { describe, expect, it } from 'vitest';
import {
	type ConfigValidationError,
	checkOptionalBoolean,
	checkOptionalDuration,
	checkOptionalEnum,
	checkOptionalInteger,
	checkOptionalString,
	checkOptionalStringList,
	checkOptionalStringMap,
	formatValidationErrors,
	isRecord,
} from '../validation.js';

function collect(run: (errors: ConfigValidationError[]) => void): ConfigValidationError[] {
	const errors: ConfigValidationError[] = [];
	run(errors);
	return errors;
}

describe('isRecord', () => {
	it('accepts plain objects only', () => {
		expect(isRecord({})).toBe(true);
		expect(isRecord([])).toBe(false);
		expect(isRecord(null)).toBe(false);
		expect(isRecord('x')).toBe(false);
	});
});

describe('field checks', () => {
	it('skips absent fields', () => {
		const errors = collect((e) => {
			checkOptionalString({}, 'a', '', e);
			checkOptionalBoolean({}, 'a', '', e);
			checkOptionalInteger({}, 'a', '', e);
			checkOptionalEnum({}, 'a', ['x'], '', e);
			checkOptionalDuration({}, 'a', '', e);
			checkOptionalStringList({}, 'a', '', e);
			checkOptionalStringMap({}, 'a', '', e);
		});
		expect(errors).toEqual([]);
	});

	it('reports wrong types with the dotted field path', () => {
		const errors = collect((e) => {
			checkOptionalString({ addr: 1 }, 'addr', 'sinks.loki', e);
			checkOptionalBoolean({ compress: 'yes' }, 'compress', 'rotation', e);
			checkOptionalInteger({ maxSize: 1.5 }, 'maxSize', 'rotation', e);
		});
		expect(errors).toEqual([
			{ field: 'sinks.loki.addr', message: 'must be a string' },
			{ field: 'rotation.compress', message: 'must be a boolean' },
			{ field: 'rotation.maxSize', message: 'must be an integer' },
		]);
	});

	it('checks enums', () => {
		const errors = collect((e) => checkOptionalEnum({ encoding: 'xml' }, 'encoding', ['json', 'console'], '', e));
		expect(errors).toEqual([{ field: 'encoding', message: 'must be one of: json, console' }]);
	});

	it('accepts numbers and duration strings', () => {
		const errors = collect((e) => {
			checkOptionalDuration({ wait: 3000 }, 'wait', '', e);
			checkOptionalDuration({ wait: '3s' }, 'wait', '', e);
		});
		expect(errors).toEqual([]);
	});

	it('reports malformed durations', () => {
		const errors = collect((e) => checkOptionalDuration({ wait: '3 seconds' }, 'wait', '', e));
		expect(errors).toEqual([{ field: 'wait', message: 'Invalid duration format: "3 seconds"' }]);
	});

	it('checks string lists and maps', () => {
		const errors = collect((e) => {
			checkOptionalStringList({ outputPaths: ['stdout', 3] }, 'outputPaths', '', e);
			checkOptionalStringMap({ labels: { a: 1 } }, 'labels', 'sinks.loki', e);
		});
		expect(errors).toEqual([
			{ field: 'outputPaths', message: 'must be a list of strings' },
			{ field: 'sinks.loki.labels', message: 'must be a map of strings' },
		]);
	});
});

describe('formatValidationErrors', () => {
	it('joins field and message pairs', () => {
		expect(
			formatValidationErrors([
				{ field: 'a', message: 'bad' },
				{ field: 'b.c', message: 'worse' },
			]),
		).toBe('a: bad; b.c: worse');
	});
});
