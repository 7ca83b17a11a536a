/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel, type LogLevel } from './logger';

describe('logger', () => {
    let initial: LogLevel;

    beforeEach(() => {
        initial = getLogLevel();
    });

    afterEach(() => {
        setLogLevel(initial);
        vi.restoreAllMocks();
    });

    it('prefixes messages and passes extra arguments through', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        setLogLevel('debug');
        createLogger('Test').warn('missing bone', { bone: 'Hips' });
        expect(warn).toHaveBeenCalledWith('[Test] missing bone', { bone: 'Hips' });
    });

    it('drops messages below the threshold', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        setLogLevel('warn');

        const logger = createLogger('Test');
        logger.debug('hidden');
        logger.warn('shown');

        expect(debug).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('silences everything at "silent"', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        setLogLevel('silent');
        createLogger('Test').error('boom');
        expect(error).not.toHaveBeenCalled();
    });

    it('child() extends the prefix', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
        setLogLevel('info');
        const child = createLogger('Retarget').child('Hand');
        expect(child.prefix).toBe('Retarget:Hand');
        child.info('palm solved');
        expect(info).toHaveBeenCalledWith('[Retarget:Hand] palm solved');
    });
});
