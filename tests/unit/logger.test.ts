import { describe, expect, it } from 'vitest';
import { createLogger, formatLogLine, readLogLevel } from '../../src/lib/logger';

describe('readLogLevel', () => {
    it('accepts known levels', () => {
        expect(readLogLevel('debug')).toBe('debug');
        expect(readLogLevel('error')).toBe('error');
    });

    it('falls back to info', () => {
        expect(readLogLevel(undefined)).toBe('info');
        expect(readLogLevel('verbose')).toBe('info');
    });
});

describe('createLogger', () => {
    it('builds a logger at the requested level', () => {
        const logger = createLogger('warn');

        expect(logger).toHaveProperty('level', 'warn');
    });
});

describe('formatLogLine', () => {
    const timestamp = '2026-03-01T06:30:00.000Z';

    it('writes timestamp, upper-cased level and message', () => {
        expect(formatLogLine({ timestamp, level: 'warn', message: 'Invalid coordinates for station S1' })).toBe(
            '2026-03-01T06:30:00.000Z - WARN - Invalid coordinates for station S1'
        );
    });

    it('appends metadata as JSON', () => {
        expect(formatLogLine({ timestamp, level: 'error', message: 'Failed to fetch E5 prices', status: 500 })).toBe(
            '2026-03-01T06:30:00.000Z - ERROR - Failed to fetch E5 prices {"status":500}'
        );
    });

    it('puts a stack on its own line', () => {
        expect(formatLogLine({ timestamp, level: 'error', message: 'Unexpected error: boom', stack: 'Error: boom\n    at run' })).toBe(
            '2026-03-01T06:30:00.000Z - ERROR - Unexpected error: boom\nError: boom\n    at run'
        );
    });
});
