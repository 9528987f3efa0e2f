import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from './logger';

describe('createLogger', () => {
    it('uses the requested level', () => {
        const logger = createLogger('debug');

        expect(logger.level).toBe('debug');
        expect(logger.isLevelEnabled('debug')).toBe(true);
        expect(logger.isLevelEnabled('trace')).toBe(false);
    });

    it('defaults to warn', () => {
        const logger = createLogger();

        expect(logger.level).toBe('warn');
        expect(logger.isLevelEnabled('info')).toBe(false);
        expect(logger.isLevelEnabled('error')).toBe(true);
    });
});

describe('silentLogger', () => {
    it('accepts log calls without writing', () => {
        expect(() => silentLogger.error({ err: new Error('boom') }, 'ignored')).not.toThrow();
    });
});
