import { describe, it, expect, beforeEach } from 'vitest';
import { MemwireClient } from '../src/client';
import { StreamConnection } from '../src/connection';
import { ConnectionClosedError, ConfigError, NotConnectedError } from '../src/errors';
import { FakeCacheServer } from './utils/fake-server';
import { ScriptedStream } from './utils/scripted-stream';

const OP_GETKQ = 0x0d;
const OP_NOOP = 0x0a;

describe('MEMWIRE CLIENT', () => {
    let server: FakeCacheServer;
    let client: MemwireClient;

    beforeEach(() => {
        server = new FakeCacheServer();
        client = new MemwireClient(new StreamConnection(server.connect()));
    });

    it('should read back what it stored', async () => {
        expect(await client.set('greeting', 'hello')).toBe(true);
        expect(await client.get('greeting')).toBe('hello');
    });

    it('should pass the expiration through to the server', async () => {
        await client.set('session', 'abc', 300);

        expect(server.expirations.get('session')).toBe(300);
    });

    it('should round-trip multi-byte text', async () => {
        await client.set('clé', 'ünïcødé ✓');

        expect(await client.get('clé')).toBe('ünïcødé ✓');
    });

    it('should return null for a key that was never set', async () => {
        expect(await client.get('nope')).toBeNull();
    });

    it('should hide a key once it is deleted', async () => {
        await client.set('k', 'v');

        expect(await client.delete('k')).toBe(true);
        expect(await client.get('k')).toBeNull();
        expect(await client.delete('k')).toBe(false);
    });

    it('should fetch several keys in one burst', async () => {
        await client.set('a', '1');
        await client.set('c', '3');
        server.received.length = 0;

        const result = await client.getMulti(['a', 'b', 'c', 'a']);

        expect(result).toEqual(new Map([['a', '1'], ['b', null], ['c', '3']]));
        expect(server.received).toEqual([OP_GETKQ, OP_GETKQ, OP_GETKQ, OP_GETKQ, OP_NOOP]);
    });

    it('should answer an empty multi-get with an empty map', async () => {
        const result = await client.getMulti([]);

        expect(result.size).toBe(0);
        expect(server.received).toEqual([OP_NOOP]);
    });

    it('should keep the connection usable after a multi-get', async () => {
        await client.set('x', 'y');
        await client.getMulti(['x', 'missing']);

        expect(await client.get('x')).toBe('y');
    });

    it('should distinguish a miss from a failure in lookup', async () => {
        await client.set('k', 'v');

        expect(await client.lookup('k')).toEqual({ kind: 'found', value: 'v' });
        expect(await client.lookup('other')).toEqual({ kind: 'missing' });
    });

    it('should treat a reply with a bad magic byte as absent', async () => {
        await client.set('k', 'v');
        server.corruptNextMagic = 0x80;

        expect(await client.get('k')).toBeNull();
    });

    it('should treat a set with a bad magic reply as failed', async () => {
        server.corruptNextMagic = 0x00;

        expect(await client.set('k', 'v')).toBe(false);
    });

    it('should run concurrent calls one exchange at a time', async () => {
        const [stored, value, missing] = await Promise.all([
            client.set('k', 'v'),
            client.get('k'),
            client.get('absent'),
        ]);

        expect(stored).toBe(true);
        expect(value).toBe('v');
        expect(missing).toBeNull();
    });

    it('should reject with a transport error when the server hangs up', async () => {
        server.silent = true;
        const pending = client.get('k');
        server.hangUp();

        await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
    });

    it('should keep serving queued calls after one of them rejects', async () => {
        const stream = new ScriptedStream();
        const scripted = new MemwireClient(stream);

        const first = scripted.get('a');
        const second = scripted.delete('b');

        await expect(first).rejects.toBeInstanceOf(ConnectionClosedError);
        await expect(second).rejects.toBeInstanceOf(ConnectionClosedError);
        expect(stream.flushes).toHaveLength(2);
    });

    it('should refuse calls after close', async () => {
        client.close();

        expect(client.connected).toBe(false);
        await expect(client.get('k')).rejects.toBeInstanceOf(NotConnectedError);
    });

    it('should close the stream when the client closes', () => {
        const stream = new ScriptedStream();
        new MemwireClient(stream).close();

        expect(stream.closed).toBe(true);
    });

    it('should validate options before opening a socket', async () => {
        await expect(MemwireClient.connect({ port: 70000 })).rejects.toBeInstanceOf(ConfigError);
    });
});
