import { describeStatus } from './protocol';

export class MemwireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MemwireError';
  }
}

/** The underlying stream failed. The connection is unusable afterwards. */
export class TransportError extends MemwireError {
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'TransportError';
    if (cause) this.cause = cause;
  }
}

export class ConnectionClosedError extends TransportError {
  constructor() {
    super("Connection closed");
    this.name = 'ConnectionClosedError';
  }
}

export class RequestTimeoutError extends TransportError {
  constructor(timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class NotConnectedError extends MemwireError {
  constructor() {
    super("Client not connected");
    this.name = 'NotConnectedError';
  }
}

/**
 * A response frame could not be decoded. `frameConsumed` is true when the
 * whole frame was read off the stream anyway, so the next frame starts right
 * after it; false when only the header could be trusted to be read.
 */
export class FramingError extends MemwireError {
  constructor(message: string, public readonly frameConsumed = false) {
    super(message);
    this.name = 'FramingError';
  }
}

export class ProtocolMismatchError extends MemwireError {
  constructor(public readonly expected: number, public readonly received: number) {
    super(`Expected opcode 0x${hex(expected)}, received 0x${hex(received)}`);
    this.name = 'ProtocolMismatchError';
  }
}

export class ResponseStatusError extends MemwireError {
  constructor(public readonly status: number) {
    super(`Server answered ${describeStatus(status)}`);
    this.name = 'ResponseStatusError';
  }
}

/** Thrown while encoding when a field exceeds what the header can carry. */
export class InvalidFrameError extends MemwireError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFrameError';
  }
}

export class ConfigError extends MemwireError {
  constructor(public readonly issues: string[]) {
    super(`Invalid client options:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

function hex(value: number): string {
  return value.toString(16).padStart(2, '0');
}
