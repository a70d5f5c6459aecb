import { TypedEventEmitter } from "./typedEmitter";
import { DEFAULT_MAX_FRAME_LENGTH, EVENT_END_TAG } from "./constants";
import { CotWireError } from "./errors";

interface FramerEvents {
  message: Buffer;
  error: CotWireError;
}

export interface CotFramerOptions {
  maxFrameLength?: number;
}

export type TakProtocolVariant = "mesh" | "stream";

/** Lead byte of every protocol-1 frame. */
export const TAK_MAGIC = 0xbf;
const MESH_VERSION = 0x01;
const END_TAG = Buffer.from(EVENT_END_TAG, "utf8");
const MAX_VARINT_BYTES = 5;

const isWhitespace = (byte: number): boolean =>
  byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;

export const encodeVarint = (value: number): Buffer => {
  const bytes: number[] = [];
  let remaining = value >>> 0;
  while (remaining >= 0x80) {
    bytes.push((remaining & 0x7f) | 0x80);
    remaining >>>= 7;
  }
  bytes.push(remaining);
  return Buffer.from(bytes);
};

/**
 * Reads a base-128 varint at `offset`. Returns undefined while the buffer
 * does not yet hold the whole varint.
 */
export const decodeVarint = (
  buffer: Buffer,
  offset: number,
): { value: number; bytes: number } | undefined => {
  let value = 0;
  for (let i = 0; i < MAX_VARINT_BYTES; i += 1) {
    const byte = buffer[offset + i];
    if (byte === undefined) return undefined;
    value += (byte & 0x7f) * 2 ** (7 * i);
    if ((byte & 0x80) === 0) return { value, bytes: i + 1 };
  }
  throw new CotWireError("E_CHANNEL_IO", "Malformed protocol-1 length varint");
};

/** Prepends the protocol-1 header for the given variant. */
export const wrapTakPayload = (
  payload: Buffer,
  variant: TakProtocolVariant,
): Buffer =>
  variant === "mesh"
    ? Buffer.concat([Buffer.from([TAK_MAGIC, MESH_VERSION, TAK_MAGIC]), payload])
    : Buffer.concat([
        Buffer.from([TAK_MAGIC]),
        encodeVarint(payload.length),
        payload,
      ]);

/**
 * Strips the protocol-1 header. Returns undefined when the frame does not
 * start with a well-formed header for `variant`.
 */
export const unwrapTakPayload = (
  frame: Buffer,
  variant: TakProtocolVariant,
): Buffer | undefined => {
  if (frame[0] !== TAK_MAGIC) return undefined;
  if (variant === "mesh") {
    if (frame[2] !== TAK_MAGIC) return undefined;
    return frame.subarray(3);
  }
  const length = decodeVarint(frame, 1);
  if (!length) return undefined;
  const start = 1 + length.bytes;
  if (frame.length < start + length.value) return undefined;
  return frame.subarray(start, start + length.value);
};

/**
 * Splits a byte stream into event frames. XML events end at `</event>`;
 * protocol-1 stream frames are `0xbf`, varint length, payload. Which one is
 * in use is decided per frame from its first non-whitespace byte.
 */
export class CotFramer extends TypedEventEmitter<FramerEvents> {
  private readonly maxFrameLength: number;
  private buffer: Buffer = Buffer.alloc(0);
  private scanFrom = 0;

  constructor(options?: CotFramerOptions) {
    super();
    this.maxFrameLength = options?.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH;
  }

  push(chunk: Buffer): void {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    while (this.buffer.length > 0) {
      this.skipWhitespace();
      if (this.buffer.length === 0) return;

      const frame =
        this.buffer[0] === TAK_MAGIC ? this.takeBinaryFrame() : this.takeXmlFrame();
      if (!frame) return;
      this.emit("message", frame);
    }
  }

  /** Bytes held while waiting for the rest of a frame. */
  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.scanFrom = 0;
  }

  private skipWhitespace(): void {
    let start = 0;
    while (start < this.buffer.length && isWhitespace(this.buffer[start] ?? 0)) {
      start += 1;
    }
    if (start > 0) {
      this.buffer = this.buffer.subarray(start);
      this.scanFrom = Math.max(0, this.scanFrom - start);
    }
  }

  private takeXmlFrame(): Buffer | undefined {
    const searchFrom = Math.max(0, this.scanFrom - (END_TAG.length - 1));
    const end = this.buffer.indexOf(END_TAG, searchFrom);
    if (end < 0) {
      this.scanFrom = this.buffer.length;
      if (this.buffer.length > this.maxFrameLength) {
        this.discard(
          `No ${EVENT_END_TAG} within ${this.maxFrameLength} bytes; dropped ${this.buffer.length} bytes`,
        );
      }
      return undefined;
    }
    const stop = end + END_TAG.length;
    const frame = this.buffer.subarray(0, stop);
    this.buffer = this.buffer.subarray(stop);
    this.scanFrom = 0;
    return frame;
  }

  private takeBinaryFrame(): Buffer | undefined {
    let length: { value: number; bytes: number } | undefined;
    try {
      length = decodeVarint(this.buffer, 1);
    } catch (err) {
      this.discard(err instanceof Error ? err.message : String(err));
      return undefined;
    }
    if (!length) return undefined;
    if (length.value > this.maxFrameLength) {
      this.discard(
        `Protocol-1 frame length ${length.value} exceeds limit ${this.maxFrameLength}`,
      );
      return undefined;
    }
    const stop = 1 + length.bytes + length.value;
    if (this.buffer.length < stop) return undefined;
    const frame = this.buffer.subarray(0, stop);
    this.buffer = this.buffer.subarray(stop);
    this.scanFrom = 0;
    return frame;
  }

  private discard(message: string): void {
    this.reset();
    if (this.hasListeners("error")) {
      this.emit("error", new CotWireError("E_FRAME_TOO_LONG", message));
    }
  }
}
