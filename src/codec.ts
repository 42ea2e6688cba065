import {
  HEADER_SIZE,
  Magic,
  MAX_BODY_LENGTH,
  MAX_EXTRAS_LENGTH,
  MAX_KEY_LENGTH,
  Opcode,
  SET_FLAGS,
  isOpcode,
} from './protocol';
import type { FrameHeader, ResponseFrame } from './protocol';
import type { ByteStream } from './connection';
import { FramingError, InvalidFrameError } from './errors';
import { logger as root } from './utils/logger';

const logger = root.child('codec');

const EMPTY = Buffer.alloc(0);

/** @internal */
export class Cursor {
  constructor(public buf: Buffer, public offset = 0) { }

  readU8(): number { return this.buf.readUInt8(this.offset++); }
  readU16(): number { const v = this.buf.readUInt16BE(this.offset); this.offset += 2; return v; }
  readU32(): number { const v = this.buf.readUInt32BE(this.offset); this.offset += 4; return v; }
  readU64(): bigint { const v = this.buf.readBigUInt64BE(this.offset); this.offset += 8; return v; }
}

export class FrameCodec {
  // --- ENCODERS (Data -> Buffer) ---

  static encodeHeader(header: FrameHeader): Buffer {
    const b = Buffer.alloc(HEADER_SIZE);
    b.writeUInt8(header.magic, 0);
    b.writeUInt8(header.opcode, 1);
    b.writeUInt16BE(header.keyLength, 2);
    b.writeUInt8(header.extrasLength, 4);
    b.writeUInt8(header.dataType, 5);
    // vbucket id on requests, status on responses
    b.writeUInt16BE(header.status, 6);
    b.writeUInt32BE(header.totalBodyLength, 8);
    b.writeUInt32BE(header.opaque, 12);
    b.writeBigUInt64BE(header.cas, 16);
    return b;
  }

  /** Extras of a SET: fixed flags word, then the expiration in seconds. */
  static setExtras(expireSeconds: number): Buffer {
    if (!Number.isInteger(expireSeconds) || expireSeconds < 0 || expireSeconds > 0xFFFFFFFF) {
      throw new InvalidFrameError(`Expiration must be an integer in 0..4294967295, got ${expireSeconds}`);
    }
    const b = Buffer.allocUnsafe(8);
    b.writeUInt32BE(SET_FLAGS, 0);
    b.writeUInt32BE(expireSeconds, 4);
    return b;
  }

  /**
   * Builds a complete request frame: header, then extras, key and value.
   * Opaque, data type, vbucket and CAS are always zero.
   */
  static encodeRequest(opcode: Opcode, key: Buffer, value: Buffer = EMPTY, extras: Buffer = EMPTY): Buffer {
    if (key.length > MAX_KEY_LENGTH) {
      throw new InvalidFrameError(`Key is ${key.length} bytes, the limit is ${MAX_KEY_LENGTH}`);
    }
    if (extras.length > MAX_EXTRAS_LENGTH) {
      throw new InvalidFrameError(`Extras are ${extras.length} bytes, the limit is ${MAX_EXTRAS_LENGTH}`);
    }
    const totalBodyLength = extras.length + key.length + value.length;
    if (totalBodyLength > MAX_BODY_LENGTH) {
      throw new InvalidFrameError(`Body is ${totalBodyLength} bytes, the limit is ${MAX_BODY_LENGTH}`);
    }

    const header = FrameCodec.encodeHeader({
      magic: Magic.REQUEST,
      opcode,
      keyLength: key.length,
      extrasLength: extras.length,
      dataType: 0,
      status: 0,
      totalBodyLength,
      opaque: 0,
      cas: 0n,
    });
    return Buffer.concat([header, extras, key, value], HEADER_SIZE + totalBodyLength);
  }

  // --- DECODERS (Buffer -> Data) ---

  static decodeHeader(buf: Buffer): FrameHeader {
    const cursor = new Cursor(buf);
    return {
      magic: cursor.readU8(),
      opcode: cursor.readU8(),
      keyLength: cursor.readU16(),
      extrasLength: cursor.readU8(),
      dataType: cursor.readU8(),
      status: cursor.readU16(),
      totalBodyLength: cursor.readU32(),
      opaque: cursor.readU32(),
      cas: cursor.readU64(),
    };
  }

  /**
   * Reads one response frame off the stream.
   *
   * A bad magic byte or an extras length past the body only consumes the
   * header, since the lengths that follow cannot be trusted. Every other
   * failure is raised after the whole frame has been read, which keeps the
   * stream aligned on the next frame.
   *
   * The status is the low byte of the 16-bit slot at bytes 6-7; byte 6 is
   * ignored.
   */
  static async decodeResponse(stream: ByteStream): Promise<ResponseFrame> {
    const header = FrameCodec.decodeHeader(await stream.readExact(HEADER_SIZE));

    if (header.magic !== Magic.RESPONSE) {
      throw new FramingError(`Unexpected magic 0x${header.magic.toString(16).padStart(2, '0')}`);
    }
    if (header.extrasLength > header.totalBodyLength) {
      throw new FramingError(
        `Extras length ${header.extrasLength} exceeds total body length ${header.totalBodyLength}`
      );
    }

    const bodyLength = header.totalBodyLength - header.extrasLength;
    logger.debug(() =>
      `<- FRAME op=0x${header.opcode.toString(16).padStart(2, '0')} status=${header.status & 0xFF} ` +
      `total=${header.totalBodyLength} extras=${header.extrasLength} body=${bodyLength}`
    );

    await stream.readExact(header.extrasLength);
    const body = await stream.readExact(bodyLength);

    const opcode = header.opcode;
    if (!isOpcode(opcode)) {
      throw new FramingError(`Unknown opcode 0x${opcode.toString(16).padStart(2, '0')}`, true);
    }
    if (header.keyLength > body.length) {
      throw new FramingError(`Key length ${header.keyLength} exceeds body length ${body.length}`, true);
    }

    return {
      status: header.status & 0xFF,
      opcode,
      keyLength: header.keyLength,
      extrasLength: header.extrasLength,
      body,
    };
  }
}
