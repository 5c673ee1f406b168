import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../logger';

function lastJson(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
    const call = spy.mock.calls[spy.mock.calls.length - 1];
    const line = call[0];
    if (typeof line !== 'string') throw new Error('expected a string log line');
    return JSON.parse(line);
}

describe('createLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('drops entries below the threshold', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const log = createLogger({ level: 'warn', format: 'json', service: 'test' });

        log.info('hidden');
        log.warn('shown');

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('writes one JSON object per entry', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const log = createLogger({ level: 'info', format: 'json', service: 'test' });

        log.info('Processing', { image: 'scan.png' });

        const entry = lastJson(info);
        expect(entry.level).toBe('info');
        expect(entry.message).toBe('Processing');
        expect(entry.service).toBe('test');
        expect(entry.context).toEqual({ image: 'scan.png' });
        expect(typeof entry.timestamp).toBe('string');
    });

    it('merges child context and leaves out undefined values', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const log = createLogger({ level: 'info', format: 'json', service: 'test' }).child({ component: 'pipeline' });

        log.warn('Odd extension', { image: 'scan.bmp', extra: undefined });

        expect(lastJson(warn).context).toEqual({ component: 'pipeline', image: 'scan.bmp' });
    });

    it('omits the context key when there is none', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        createLogger({ level: 'info', format: 'json', service: 'test' }).info('plain');

        expect('context' in lastJson(info)).toBe(false);
    });

    it('serialises errors without a stack above debug level', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        createLogger({ level: 'info', format: 'json', service: 'test' }).error('boom', new TypeError('bad'));

        expect(lastJson(error).error).toEqual({ name: 'TypeError', message: 'bad' });
    });

    it('includes the stack at debug level', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const err = new Error('bad');
        createLogger({ level: 'debug', format: 'json', service: 'test' }).error('boom', err);

        expect(lastJson(error).error).toEqual({ name: 'Error', message: 'bad', stack: err.stack });
    });

    it('wraps non-Error values', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        createLogger({ level: 'info', format: 'json', service: 'test' }).error('boom', 42);

        expect(lastJson(error).error).toEqual({ name: 'Error', message: '42' });
    });

    it('prints level and message in pretty mode', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        createLogger({ level: 'info', format: 'pretty', service: 'test' }).warn('Timeout reached', { timeoutMs: 10 });

        const line = String(warn.mock.calls[0][0]);
        expect(line).toContain('WARN ');
        expect(line).toContain('Timeout reached');
        expect(line).toContain('=10');
    });
});
