import { SceneWebSocketError, SceneWebSocketErrors, SceneWebSocketErrorType } from "./errors";

export const TextOpcode = 0x1;
export const BinaryOpcode = 0x2;
export const CloseOpcode = 0x8;
export const PingOpcode = 0x9;
export const PongOpcode = 0xa;

export const DEFAULT_MAX_PAYLOAD_LENGTH = 100_000_000;

// Control frame payloads are limited to 125 bytes
const MAX_CONTROL_PAYLOAD = 125;

// FIN + close, two byte payload holding status 1000
export const NORMAL_CLOSE_FRAME = Uint8Array.of(0x88, 0x02, 0x03, 0xe8);

export type SceneWebSocketFrameKind = "message" | "closing" | "ping";

export type SceneWebSocketFrame = {
  kind: SceneWebSocketFrameKind;
  payload: Uint8Array;
  fin: boolean;
};

export function encodeFrameHeader(length: number, fin: boolean, opcode: number): Uint8Array {
  const firstByte = (fin ? 0x80 : 0x00) | (opcode & 0x0f);
  if (length <= 125) {
    return Uint8Array.of(firstByte, length);
  }
  if (length <= 0xffff) {
    const header = Buffer.alloc(4);
    header[0] = firstByte;
    header[1] = 126;
    header.writeUInt16BE(length, 2);
    return header;
  }
  const header = Buffer.alloc(10);
  header[0] = firstByte;
  header[1] = 127;
  header.writeBigUInt64BE(BigInt(length), 2);
  return header;
}

/**
 * Splits a payload into binary frames of at most `chunkLimit` bytes. FIN is set on the final
 * chunk only, and only when `lastMessage` is true.
 */
export function encodeFrames(
  payload: Uint8Array,
  chunkLimit: number,
  lastMessage = true,
): Array<Uint8Array> {
  if (!Number.isInteger(chunkLimit) || chunkLimit < 1) {
    throw new RangeError(`Chunk limit must be a positive integer, got ${chunkLimit}`);
  }
  if (payload.length === 0) {
    return [encodeFrameHeader(0, lastMessage, BinaryOpcode)];
  }
  const frames: Array<Uint8Array> = [];
  for (let offset = 0; offset < payload.length; offset += chunkLimit) {
    const end = Math.min(offset + chunkLimit, payload.length);
    const chunk = payload.subarray(offset, end);
    const header = encodeFrameHeader(chunk.length, lastMessage && end === payload.length, BinaryOpcode);
    frames.push(Buffer.concat([header, chunk]));
  }
  return frames;
}

export function encodeControlFrame(opcode: number, payload: Uint8Array): Uint8Array {
  const body = payload.subarray(0, MAX_CONTROL_PAYLOAD);
  return Buffer.concat([encodeFrameHeader(body.length, true, opcode), body]);
}

export function applyMask(payload: Uint8Array, key: Uint8Array): Uint8Array {
  const result = new Uint8Array(payload.length);
  for (let i = 0; i < payload.length; i++) {
    result[i] = payload[i] ^ key[i % 4];
  }
  return result;
}

/**
 * Incremental frame parser. Bytes are pushed as they arrive; `nextFrame` returns a complete
 * frame, null when more bytes are needed, or the error that ended the stream. Pong frames are
 * consumed without being returned.
 */
export class FrameDecoder {
  private chunks: Array<Buffer> = [];
  private available = 0;
  private failure: SceneWebSocketError | null = null;

  constructor(private maxPayloadLength: number = DEFAULT_MAX_PAYLOAD_LENGTH) {}

  public get bufferedLength(): number {
    return this.available;
  }

  public push(bytes: Uint8Array): void {
    if (this.failure !== null || bytes.length === 0) {
      return;
    }
    this.chunks.push(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length));
    this.available += bytes.length;
  }

  public nextFrame(): SceneWebSocketFrame | SceneWebSocketError | null {
    for (;;) {
      if (this.failure !== null) {
        return this.failure;
      }
      if (this.available < 2) {
        return null;
      }
      const head = this.coalesce(Math.min(this.available, 14));
      const fin = (head[0] & 0x80) !== 0;
      const opcode = head[0] & 0x0f;
      const masked = (head[1] & 0x80) !== 0;
      let length = head[1] & 0x7f;
      let offset = 2;

      if (length === 126) {
        if (this.available < 4) {
          return null;
        }
        length = head.readUInt16BE(2);
        offset = 4;
      } else if (length === 127) {
        if (this.available < 10) {
          return null;
        }
        const declared = head.readBigUInt64BE(2);
        if (declared > BigInt(this.maxPayloadLength)) {
          return this.fail(
            SceneWebSocketErrors.FRAME_TOO_LARGE_ERROR_TYPE,
            `Payload is ${declared} bytes`,
          );
        }
        length = Number(declared);
        offset = 10;
      }
      if (length > this.maxPayloadLength) {
        return this.fail(SceneWebSocketErrors.FRAME_TOO_LARGE_ERROR_TYPE, `Payload is ${length} bytes`);
      }

      const maskOffset = offset;
      if (masked) {
        offset += 4;
      }
      if (this.available < offset + length) {
        return null;
      }

      const frameBytes = this.take(offset + length);
      const body = frameBytes.subarray(offset);
      const payload = masked
        ? applyMask(body, frameBytes.subarray(maskOffset, maskOffset + 4))
        : new Uint8Array(body.buffer, body.byteOffset, body.length);

      switch (opcode) {
        case TextOpcode:
        case BinaryOpcode:
          return { kind: "message", payload, fin };
        case CloseOpcode:
          return { kind: "closing", payload, fin };
        case PingOpcode:
          return { kind: "ping", payload, fin };
        case PongOpcode:
          continue;
        default:
          return this.fail(SceneWebSocketErrors.UNKNOWN_OPCODE_ERROR_TYPE, `Unknown opcode: ${opcode}`);
      }
    }
  }

  private fail(errorType: SceneWebSocketErrorType, message: string): SceneWebSocketError {
    this.failure = new SceneWebSocketError(errorType, message);
    this.chunks = [];
    this.available = 0;
    return this.failure;
  }

  // Makes the first buffered chunk at least `length` bytes long
  private coalesce(length: number): Buffer {
    const first = this.chunks[0];
    if (first.length >= length) {
      return first;
    }
    let count = 0;
    let total = 0;
    while (total < length) {
      total += this.chunks[count].length;
      count++;
    }
    const merged = Buffer.concat(this.chunks.slice(0, count), total);
    this.chunks.splice(0, count, merged);
    return merged;
  }

  private take(length: number): Buffer {
    const first = this.coalesce(length);
    if (first.length === length) {
      this.chunks.shift();
    } else {
      this.chunks[0] = first.subarray(length);
    }
    this.available -= length;
    return first.subarray(0, length);
  }
}
