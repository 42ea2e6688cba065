export { MemwireClient } from './client';
export { StreamConnection } from './connection';
export type { ByteStream } from './connection';
export { FrameCodec } from './codec';
export { Exchange, perform } from './exchange';
export type { CommandResult } from './exchange';
export { clientOptionsSchema, resolveOptions, optionsFromEnv } from './config';
export type { ClientOptions, ClientOptionsInput } from './config';
export { Magic, Opcode, ResponseStatus, HEADER_SIZE, SET_FLAGS } from './protocol';
export type {
  Command,
  FrameHeader,
  ResponseFrame,
  LookupResult,
} from './protocol';
export {
  MemwireError,
  TransportError,
  ConnectionClosedError,
  RequestTimeoutError,
  NotConnectedError,
  FramingError,
  ProtocolMismatchError,
  ResponseStatusError,
  InvalidFrameError,
  ConfigError,
} from './errors';
