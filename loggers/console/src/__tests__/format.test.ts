import type { LogEntry } from '@cadence/sdk';
import { describe, expect, it } from 'vitest';
import { entryLevel, formatCompact, formatVerbose, shouldLog } from '../format.js';

function makeEntry(overrides: Partial<LogEntry> = {}): LogEntry {
	return {
		timestamp: '2024-01-15T10:30:45.123Z',
		phase: 'lifecycle.error',
		context: 'client',
		unit: 'Camera',
		error: '[Camera] init failed: no viewport',
		...overrides,
	};
}

/** Drop the local-time prefix (HH:MM:SS.mmm + space) */
function withoutTime(line: string): string {
	return line.slice(13);
}

describe('formatCompact', () => {
	it('prints the phase and every present field', () => {
		const line = formatCompact(makeEntry(), false);

		expect(line).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} /);
		expect(withoutTime(line)).toBe(
			'⛔ lifecycle.error ctx=client unit=Camera err=[Camera] init failed: no viewport',
		);
	});

	it('prints signal, dependency, result and duration', () => {
		const line = formatCompact(
			{
				timestamp: '2024-01-15T10:30:45.123Z',
				phase: 'lifecycle.init',
				unit: 'Input',
				result: 'initialized',
				duration_ms: 4,
			},
			false,
		);
		const signal = formatCompact(
			{
				timestamp: '2024-01-15T10:30:45.123Z',
				phase: 'resolve.missing_dependency',
				unit: 'Hud',
				dependency: 'Ui',
			},
			false,
		);

		expect(withoutTime(line)).toBe('✓ lifecycle.init unit=Input result=initialized 4ms');
		expect(withoutTime(signal)).toBe('⚠ resolve.missing_dependency unit=Hud dep=Ui');
	});

	it('colors the phase and the error', () => {
		const line = formatCompact(makeEntry(), true);

		expect(line).toContain('\x1b[31mlifecycle.error\x1b[0m');
		expect(line).toContain('\x1b[31merr=[Camera] init failed: no viewport\x1b[0m');
	});

	it('keeps an unparseable timestamp as-is', () => {
		const line = formatCompact(makeEntry({ timestamp: 'not-a-date' }), false);

		expect(line.startsWith('not-a-date ⛔')).toBe(true);
	});
});

describe('formatVerbose', () => {
	it('adds a metadata block', () => {
		const entry = makeEntry({ metadata: { count: 2 } });

		const text = formatVerbose(entry, false);

		expect(text).toBe(`${formatCompact(entry, false)}\n  metadata: {\n  "count": 2\n}`);
	});

	it('is the compact line when there is no metadata', () => {
		const entry = makeEntry();

		expect(formatVerbose(entry, false)).toBe(formatCompact(entry, false));
	});
});

describe('shouldLog', () => {
	it('filters by phase severity', () => {
		expect(shouldLog(makeEntry({ phase: 'unit.loaded' }), 'info')).toBe(false);
		expect(shouldLog(makeEntry({ phase: 'unit.loaded' }), 'debug')).toBe(true);
		expect(shouldLog(makeEntry({ phase: 'resolve.circular' }), 'warn')).toBe(true);
		expect(shouldLog(makeEntry({ phase: 'runtime.start' }), 'error')).toBe(false);
	});

	it('uses the level a controller logged at', () => {
		const entry = makeEntry({ phase: 'lifecycle.log', metadata: { level: 'error' } });

		expect(entryLevel(entry)).toBe(3);
		expect(shouldLog(entry, 'warn')).toBe(true);
		expect(shouldLog(makeEntry({ phase: 'lifecycle.log', metadata: { level: 'debug' } }), 'info')).toBe(
			false,
		);
	});

	it('treats an unknown configured level as info', () => {
		expect(shouldLog(makeEntry({ phase: 'runtime.start' }), 'loud')).toBe(true);
		expect(shouldLog(makeEntry({ phase: 'signal.connect' }), 'loud')).toBe(false);
	});
});
