import * as net from 'net';
import type { Duplex } from 'stream';
import { logger as root } from './utils/logger';
import type { ClientOptions } from './config';
import { ConnectionClosedError, RequestTimeoutError, TransportError } from './errors';

/**
 * The byte-level contract the exchange runs on.
 * Writes are buffered until `flush`; `readExact` resolves with exactly `size`
 * bytes or rejects, it never hands back a short read.
 */
export interface ByteStream {
  write(bytes: Buffer): void;
  flush(): Promise<void>;
  readExact(size: number): Promise<Buffer>;
  close(): void;
}

const logger = root.child('conn');

interface PendingRead {
  size: number;
  resolve: (bytes: Buffer) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout | null;
}

export class StreamConnection implements ByteStream {
  private outgoing: Buffer[] = [];
  private chunks: Buffer[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private failure: Error | null = null;

  constructor(private readonly duplex: Duplex, private readonly timeoutMs?: number) {
    this.setupListeners();
  }

  static connect(options: ClientOptions): Promise<StreamConnection> {
    const { host, port, timeoutMs } = options;

    return new Promise((res, rej) => {
      const socket = net.createConnection({ host, port });
      socket.setNoDelay(true);

      const onError = (err: Error) => {
        rej(new TransportError(`Failed to connect to ${host}:${port}: ${err.message}`, err));
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        logger.info(`Connected to ${host}:${port}`);
        res(new StreamConnection(socket, timeoutMs));
      });
    });
  }

  private setupListeners() {
    this.duplex.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      this.drain();
    });

    this.duplex.on('end', () => this.fail(new ConnectionClosedError()));
    this.duplex.on('close', () => this.fail(new ConnectionClosedError()));
    this.duplex.on('error', (err: Error) => {
      logger.error("Socket error", err);
      this.fail(new TransportError(err.message, err));
    });
  }

  write(bytes: Buffer): void {
    this.outgoing.push(bytes);
  }

  flush(): Promise<void> {
    const data = this.outgoing.length === 1 ? this.outgoing[0] : Buffer.concat(this.outgoing);
    this.outgoing = [];

    if (this.failure) return Promise.reject(this.failure);
    if (data.length === 0) return Promise.resolve();

    logger.debug(() => `-> SOCKET WRITE (${data.length} bytes) ${data.toString('hex')}`);

    return new Promise((res, rej) => {
      this.duplex.write(data, (err) => {
        if (err) rej(new TransportError(err.message, err));
        else res();
      });
    });
  }

  readExact(size: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new TransportError("A read is already in progress on this connection"));
    }
    // Bytes that arrived before the peer hung up are still served
    if (this.buffered >= size) return Promise.resolve(this.take(size));
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      const timeoutMs = this.timeoutMs;
      const timer = timeoutMs === undefined ? null : setTimeout(() => {
        this.fail(new RequestTimeoutError(timeoutMs));
        this.duplex.destroy();
      }, timeoutMs);

      this.pending = { size, resolve, reject, timer };
    });
  }

  close(): void {
    this.fail(new ConnectionClosedError());
    this.duplex.destroy();
  }

  private drain() {
    const read = this.pending;
    if (!read || this.buffered < read.size) return;

    this.pending = null;
    if (read.timer) clearTimeout(read.timer);
    read.resolve(this.take(read.size));
  }

  private take(size: number): Buffer {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
    const rest = all.subarray(size);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered -= size;
    return all.subarray(0, size);
  }

  private fail(err: Error) {
    if (this.failure) return;
    this.failure = err;
    this.outgoing = [];

    const read = this.pending;
    if (read) {
      this.pending = null;
      if (read.timer) clearTimeout(read.timer);
      read.reject(err);
    }
  }
}
