import { describe, it, expect } from 'vitest';
import { createChildLogger, createFilteredLogger } from '../../../src/lib/logger';
import { createRecordingLogger } from '../../mocks/observability';

describe('Logger', () => {
    describe('createFilteredLogger', () => {
        it('should drop entries below the level', () => {
            const { logger, entries } = createRecordingLogger();
            const filtered = createFilteredLogger(logger, 'warn');

            filtered.debug('debug');
            filtered.info('info');
            filtered.warn('warn', { a: 1 });
            filtered.error('error');

            expect(entries).toEqual([
                { level: 'warn', message: 'warn', meta: { a: 1 } },
                { level: 'error', message: 'error', meta: undefined },
            ]);
        });

        it('should drop everything when silent', () => {
            const { logger, entries } = createRecordingLogger();
            const filtered = createFilteredLogger(logger, 'silent');

            filtered.error('error');

            expect(entries).toEqual([]);
        });
    });

    describe('createChildLogger', () => {
        it('should merge bindings into every entry', () => {
            const { logger, entries } = createRecordingLogger();
            const child = createChildLogger(logger, { graph: 'demo' });

            child.info('started');
            child.debug('step', { step: 1 });

            expect(entries).toEqual([
                { level: 'info', message: 'started', meta: { graph: 'demo' } },
                { level: 'debug', message: 'step', meta: { graph: 'demo', step: 1 } },
            ]);
        });

        it('should let entry fields override bindings', () => {
            const { logger, entries } = createRecordingLogger();

            createChildLogger(logger, { graph: 'demo' }).warn('renamed', { graph: 'other' });

            expect(entries[0].meta).toEqual({ graph: 'other' });
        });
    });
});
