import type { MemwireError } from './errors';

/** @internal */
export const HEADER_SIZE = 24;

/** @internal */
export const MAX_KEY_LENGTH = 0xFFFF;

/** @internal */
export const MAX_EXTRAS_LENGTH = 0xFF;

/** @internal */
export const MAX_BODY_LENGTH = 0xFFFFFFFF;

/** Flags word sent in the extras of every SET. */
export const SET_FLAGS = 0xDEADBEEF;

export enum Magic {
  REQUEST = 0x80,
  RESPONSE = 0x81,
}

export enum Opcode {
  GET = 0x00,
  SET = 0x01,
  DELETE = 0x04,
  GETQ = 0x09,
  NOOP = 0x0A,
  GETK = 0x0C,
  GETKQ = 0x0D,
}

const OPCODES: ReadonlySet<number> = new Set<number>([
  Opcode.GET,
  Opcode.SET,
  Opcode.DELETE,
  Opcode.GETQ,
  Opcode.NOOP,
  Opcode.GETK,
  Opcode.GETKQ,
]);

export function isOpcode(value: number): value is Opcode {
  return OPCODES.has(value);
}

/** Status codes the server may answer with. Anything but SUCCESS is a failure. */
export enum ResponseStatus {
  SUCCESS = 0x0000,
  KEY_NOT_FOUND = 0x0001,
  KEY_EXISTS = 0x0002,
  TOO_LARGE = 0x0003,
  INVALID_ARGS = 0x0004,
  ITEM_NOT_STORED = 0x0005,
  NON_NUMERIC_VALUE = 0x0006,
  UNKNOWN_COMMAND = 0x0081,
  OUT_OF_MEMORY = 0x0082,
}

export function describeStatus(status: number): string {
  const name = ResponseStatus[status];
  const hex = `0x${status.toString(16).padStart(4, '0')}`;
  return name ? `${name} (${hex})` : hex;
}

/**
 * Every field of the 24-byte header, request or response.
 * For responses bytes 6-7 carry the status instead of the vbucket id.
 */
export interface FrameHeader {
  magic: number;
  opcode: number;
  keyLength: number;
  extrasLength: number;
  dataType: number;
  status: number;
  totalBodyLength: number;
  opaque: number;
  cas: bigint;
}

export interface ResponseFrame {
  status: number;
  opcode: Opcode;
  keyLength: number;
  extrasLength: number;
  /** Key followed by value; extras are already stripped. */
  body: Buffer;
}

export interface GetCommand {
  kind: 'get';
  key: string;
}

export interface SetCommand {
  kind: 'set';
  key: string;
  value: Buffer;
  expireSeconds: number;
}

export interface DeleteCommand {
  kind: 'delete';
  key: string;
}

export interface GetMultiCommand {
  kind: 'getMulti';
  keys: readonly string[];
}

export type Command = GetCommand | SetCommand | DeleteCommand | GetMultiCommand;

export type LookupResult<T = Buffer> =
  | { kind: 'found'; value: T }
  | { kind: 'missing' }
  | { kind: 'error'; error: MemwireError };
