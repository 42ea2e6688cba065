import { logger as root } from './utils/logger';
import { resolveOptions } from './config';
import type { ClientOptionsInput } from './config';
import { StreamConnection } from './connection';
import type { ByteStream } from './connection';
import { NotConnectedError } from './errors';
import { perform, Exchange } from './exchange';
import type { LookupResult } from './protocol';

const logger = root.child('client');

/**
 * MEMWIRE CLIENT: The public-facing entrypoint.
 *
 * Owns one connection. Calls made while another is in flight wait for it,
 * because responses carry no request id and can only be matched in order.
 */
export class MemwireClient {
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(private readonly stream: ByteStream) { }

  static async connect(options: ClientOptionsInput = {}): Promise<MemwireClient> {
    const resolved = resolveOptions(options);
    logger.info(`Connecting to ${resolved.host}:${resolved.port}`);
    const stream = await StreamConnection.connect(resolved);
    return new MemwireClient(stream);
  }

  /** Connects, runs `fn` and closes the connection however `fn` ends. */
  static async withClient<T>(options: ClientOptionsInput, fn: (client: MemwireClient) => Promise<T>): Promise<T> {
    const client = await MemwireClient.connect(options);
    try {
      return await fn(client);
    } finally {
      client.close();
    }
  }

  public get connected(): boolean {
    return !this.closed;
  }

  /**
   * Stores `value` under `key`. An `expireSeconds` of 0 never expires.
   * Resolves false when the server does not confirm the write.
   */
  set(key: string, value: string, expireSeconds = 0): Promise<boolean> {
    return this.run(() =>
      perform(this.stream, { kind: 'set', key, value: Buffer.from(value, 'utf8'), expireSeconds })
    );
  }

  /** Resolves null when the key is missing or the reply was unusable. */
  async get(key: string): Promise<string | null> {
    const value = await this.run(() => perform(this.stream, { kind: 'get', key }));
    return value === null ? null : value.toString('utf8');
  }

  /** Like `get`, but tells a missing key apart from a failed exchange. */
  async lookup(key: string): Promise<LookupResult<string>> {
    const outcome = await this.run(() => Exchange.lookup(this.stream, key));
    return outcome.kind === 'found'
      ? { kind: 'found', value: outcome.value.toString('utf8') }
      : outcome;
  }

  /** Every requested key is present in the result, null when not found. */
  async getMulti(keys: readonly string[]): Promise<Map<string, string | null>> {
    const values = await this.run(() => perform(this.stream, { kind: 'getMulti', keys }));
    const result = new Map<string, string | null>();
    for (const [key, value] of values) {
      result.set(key, value === null ? null : value.toString('utf8'));
    }
    return result;
  }

  delete(key: string): Promise<boolean> {
    return this.run(() => perform(this.stream, { kind: 'delete', key }));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stream.close();
  }

  private run<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(new NotConnectedError());

    const result = this.queue.then(() => {
      if (this.closed) throw new NotConnectedError();
      return task();
    });
    this.queue = result.then(() => undefined, () => undefined);
    return result;
  }
}
