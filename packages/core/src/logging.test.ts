import { afterEach, describe, expect, test } from 'vitest';
import { formatMessage, parseLogLevel, setLogColors } from './logging.js';
import { LogLevel } from './types.js';

afterEach(() => {
	setLogColors(true);
});

describe('formatMessage', () => {
	test('plain output has no escape codes', () => {
		setLogColors(false);
		expect(formatMessage(LogLevel.WARN, 'navigator', 'Blocked hop')).toMatch(
			/^\d{2}:\d{2}:\d{2}\.\d{3} WARN  \[navigator\] Blocked hop$/,
		);
	});

	test('colored output wraps the level and name', () => {
		setLogColors(true);
		expect(formatMessage(LogLevel.ERROR, 'controller', 'boom')).toContain('\x1b[31mERROR\x1b[0m \x1b[1m[controller]\x1b[0m boom');
	});
});

describe('parseLogLevel', () => {
	test.each([
		['debug', LogLevel.DEBUG],
		['WARNING', LogLevel.WARN],
		['error', LogLevel.ERROR],
		['loud', undefined],
		[undefined, undefined],
	])('%s', (value, expected) => {
		expect(parseLogLevel(value)).toBe(expected);
	});
});
