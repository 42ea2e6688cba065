import { describe, it, expect } from 'vitest';
import { optionsFromEnv, resolveOptions } from '../src/config';
import { ConfigError } from '../src/errors';

describe('CLIENT OPTIONS', () => {

    it('should default to localhost:11211 without a timeout', () => {
        expect(resolveOptions()).toEqual({ host: 'localhost', port: 11211 });
    });

    it('should keep explicit values', () => {
        expect(resolveOptions({ host: 'cache.internal', port: 11311, timeoutMs: 250 }))
            .toEqual({ host: 'cache.internal', port: 11311, timeoutMs: 250 });
    });

    it('should read and coerce environment variables', () => {
        const options = optionsFromEnv({
            MEMWIRE_HOST: '10.0.0.5',
            MEMWIRE_PORT: '22122',
            MEMWIRE_TIMEOUT_MS: '1500',
        });

        expect(options).toEqual({ host: '10.0.0.5', port: 22122, timeoutMs: 1500 });
    });

    it('should fall back to defaults for unset variables', () => {
        expect(optionsFromEnv({})).toEqual({ host: 'localhost', port: 11211 });
    });

    it('should list every invalid field', () => {
        try {
            optionsFromEnv({ MEMWIRE_HOST: '', MEMWIRE_PORT: 'eleven', MEMWIRE_TIMEOUT_MS: '-3' });
            expect.unreachable('optionsFromEnv should have thrown');
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigError);
            const issues = err instanceof ConfigError ? err.issues : [];
            expect(issues).toHaveLength(3);
            expect(issues[0]).toBe('host: host is required');
            expect(issues[1]).toMatch(/^port: /);
            expect(issues[2]).toMatch(/^timeoutMs: /);
        }
    });

    it('should reject a port out of range', () => {
        expect(() => resolveOptions({ port: 0 })).toThrow(ConfigError);
    });
});
