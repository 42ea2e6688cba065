import { FrameCodec } from './codec';
import type { ByteStream } from './connection';
import { FramingError, MemwireError, ProtocolMismatchError, ResponseStatusError } from './errors';
import { Opcode, ResponseStatus, describeStatus } from './protocol';
import type {
  Command,
  DeleteCommand,
  GetCommand,
  GetMultiCommand,
  LookupResult,
  ResponseFrame,
  SetCommand,
} from './protocol';
import { logger as root } from './utils/logger';

const logger = root.child('exchange');

export type CommandResult = Buffer | null | boolean | Map<string, Buffer | null>;

/**
 * Reads one response. A framing error means there is no usable response; it
 * is handed back instead of thrown so callers fall back to their negative
 * result. Transport errors still propagate.
 */
async function readReply(stream: ByteStream): Promise<ResponseFrame | FramingError> {
  try {
    return await FrameCodec.decodeResponse(stream);
  } catch (err) {
    if (err instanceof FramingError) {
      logger.warn(`<- FRAMING ERROR (${err.message})`);
      return err;
    }
    throw err;
  }
}

function classify(reply: ResponseFrame | FramingError, expected: Opcode): LookupResult {
  if (reply instanceof FramingError) return { kind: 'error', error: reply };
  if (reply.opcode !== expected) {
    logger.warn(`<- MISMATCH expected ${Opcode[expected]}, received ${Opcode[reply.opcode]}`);
    return { kind: 'error', error: new ProtocolMismatchError(expected, reply.opcode) };
  }
  if (reply.status === ResponseStatus.KEY_NOT_FOUND) return { kind: 'missing' };
  if (reply.status !== ResponseStatus.SUCCESS) {
    logger.debug(`<- ${Opcode[expected]} ${describeStatus(reply.status)}`);
    return { kind: 'error', error: new ResponseStatusError(reply.status) };
  }
  return { kind: 'found', value: reply.body };
}

async function roundTrip(stream: ByteStream, frame: Buffer, expected: Opcode): Promise<LookupResult> {
  stream.write(frame);
  await stream.flush();
  return classify(await readReply(stream), expected);
}

function lookup(stream: ByteStream, key: string): Promise<LookupResult> {
  return roundTrip(stream, FrameCodec.encodeRequest(Opcode.GET, Buffer.from(key, 'utf8')), Opcode.GET);
}

export const Exchange = {
  set: async (stream: ByteStream, key: string, value: Buffer, expireSeconds = 0): Promise<boolean> => {
    const frame = FrameCodec.encodeRequest(Opcode.SET, Buffer.from(key, 'utf8'), value, FrameCodec.setExtras(expireSeconds));
    const outcome = await roundTrip(stream, frame, Opcode.SET);
    return outcome.kind === 'found';
  },

  lookup,

  get: async (stream: ByteStream, key: string): Promise<Buffer | null> => {
    const outcome = await lookup(stream, key);
    return outcome.kind === 'found' ? outcome.value : null;
  },

  delete: async (stream: ByteStream, key: string): Promise<boolean> => {
    const frame = FrameCodec.encodeRequest(Opcode.DELETE, Buffer.from(key, 'utf8'));
    const outcome = await roundTrip(stream, frame, Opcode.DELETE);
    return outcome.kind === 'found';
  },

  /**
   * Pipelines one GETKQ per key and a trailing NOOP. The server stays silent
   * on misses, so the NOOP echo is the only end-of-burst marker.
   */
  getMulti: async (stream: ByteStream, keys: readonly string[]): Promise<Map<string, Buffer | null>> => {
    const result = new Map<string, Buffer | null>();
    for (const key of keys) result.set(key, null);

    // Encode the whole burst first so a bad key cannot leave half of it queued
    const frames = keys.map((key) => FrameCodec.encodeRequest(Opcode.GETKQ, Buffer.from(key, 'utf8')));
    frames.push(FrameCodec.encodeRequest(Opcode.NOOP, Buffer.alloc(0)));
    for (const frame of frames) stream.write(frame);
    await stream.flush();

    while (true) {
      const reply = await readReply(stream);
      if (reply instanceof FramingError) {
        // Lengths past a bad header cannot be trusted, so there is no next frame to find
        if (!reply.frameConsumed) return result;
        continue;
      }

      switch (reply.opcode) {
        case Opcode.NOOP:
          return result;
        case Opcode.GETKQ: {
          if (reply.status !== ResponseStatus.SUCCESS) break;
          const key = reply.body.subarray(0, reply.keyLength).toString('utf8');
          if (result.has(key)) {
            result.set(key, reply.body.subarray(reply.keyLength));
          } else {
            logger.warn(`<- GETKQ for unrequested key "${key}"`);
          }
          break;
        }
        default:
          logger.warn(`<- MISMATCH unexpected ${Opcode[reply.opcode]} during multi-get`);
      }
    }
  },
};

export function perform(stream: ByteStream, command: GetCommand): Promise<Buffer | null>;
export function perform(stream: ByteStream, command: SetCommand | DeleteCommand): Promise<boolean>;
export function perform(stream: ByteStream, command: GetMultiCommand): Promise<Map<string, Buffer | null>>;
export function perform(stream: ByteStream, command: Command): Promise<CommandResult>;
export function perform(stream: ByteStream, command: Command): Promise<CommandResult> {
  switch (command.kind) {
    case 'get': return Exchange.get(stream, command.key);
    case 'set': return Exchange.set(stream, command.key, command.value, command.expireSeconds);
    case 'delete': return Exchange.delete(stream, command.key);
    case 'getMulti': return Exchange.getMulti(stream, command.keys);
    default: {
      const unknown: never = command;
      throw new MemwireError(`Unknown command ${JSON.stringify(unknown)}`);
    }
  }
}
