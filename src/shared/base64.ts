import { Buffer } from "buffer";
import { DataUriError } from "./errors";
import { MESSAGES } from "./messages";

const STAGING_SIZE = 1024;
// Multiple of 3 so every block but the last encodes without padding
const ENCODE_BLOCK_SIZE = 3 * STAGING_SIZE;

/**
 * Append-only text buffer; chunks are joined once on toString()
 */
export class TextBuffer {
  private chunks: string[] = [];
  private size = 0;

  append(text: string): this {
    if (text) {
      this.chunks.push(text);
      this.size += text.length;
    }
    return this;
  }

  get length(): number {
    return this.size;
  }

  toString(): string {
    if (this.chunks.length > 1) {
      this.chunks = [this.chunks.join("")];
    }
    return this.chunks[0] ?? "";
  }
}

/**
 * Byte sink that appends each byte to a TextBuffer as the char with the same code.
 * Bytes are expected to be base64 alphabet chars already; nothing is validated here.
 */
export class Base64Appender {
  // allocated on the first writeSlice, writeByte never needs it
  private staging: Uint8Array | undefined;

  constructor(private readonly dest: TextBuffer) {}

  writeByte(byte: number): void {
    this.dest.append(String.fromCharCode(byte & 0xff));
  }

  writeSlice(bytes: Uint8Array, offset = 0, length = bytes.length - offset): void {
    const staging = (this.staging ??= new Uint8Array(STAGING_SIZE));
    let position = offset;
    let remaining = length;
    while (remaining > 0) {
      const n = Math.min(staging.length, remaining);
      staging.set(bytes.subarray(position, position + n));
      this.dest.append(String.fromCharCode(...staging.subarray(0, n)));
      position += n;
      remaining -= n;
    }
  }
}

/**
 * Incremental standard base64 encoder (with padding) writing into a Base64Appender.
 * Up to two bytes are carried between writes so chunk boundaries never add padding.
 */
export class Base64Encoder {
  private readonly carry = new Uint8Array(2);
  private carryLength = 0;
  private ended = false;

  constructor(private readonly out: Base64Appender) {}

  write(chunk: Uint8Array): void {
    if (this.ended) {
      throw new DataUriError(MESSAGES.encoderClosed(), "IO_FAILURE");
    }

    let offset = 0;
    if (this.carryLength > 0) {
      const needed = Math.min(3 - this.carryLength, chunk.length);
      if (this.carryLength + needed < 3) {
        this.carry.set(chunk.subarray(0, needed), this.carryLength);
        this.carryLength += needed;
        return;
      }
      this.emit(Buffer.concat([this.carry.subarray(0, this.carryLength), chunk.subarray(0, needed)]));
      this.carryLength = 0;
      offset = needed;
    }

    const whole = offset + Math.floor((chunk.length - offset) / 3) * 3;
    for (let start = offset; start < whole; start += ENCODE_BLOCK_SIZE) {
      this.emit(chunk.subarray(start, Math.min(start + ENCODE_BLOCK_SIZE, whole)));
    }

    this.carry.set(chunk.subarray(whole));
    this.carryLength = chunk.length - whole;
  }

  /**
   * Flush the carried bytes with padding. Further writes fail.
   */
  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (this.carryLength > 0) {
      this.emit(this.carry.subarray(0, this.carryLength));
      this.carryLength = 0;
    }
  }

  private emit(bytes: Uint8Array): void {
    const encoded = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
    this.out.writeSlice(Buffer.from(encoded, "latin1"));
  }
}

/**
 * Base64-encode a sequence of chunks into the given buffer without joining the chunks first
 */
export function encodeBase64Into(dest: TextBuffer, chunks: Iterable<Uint8Array>): TextBuffer {
  const encoder = new Base64Encoder(new Base64Appender(dest));
  for (const chunk of chunks) {
    encoder.write(chunk);
  }
  encoder.end();
  return dest;
}

const BASE64_BODY = /^[A-Za-z0-9+/]*/;
// ASCII whitespace only; other Unicode spaces are illegal characters
const WHITESPACE = /[ \t\n\x0B\f\r]+/g;

/**
 * Strict standard base64 decoding. ASCII whitespace anywhere is ignored, padding is optional
 * but must be correct when present.
 */
export function decodeBase64(text: string): Buffer {
  const stripped = text.replace(WHITESPACE, "");
  const body = BASE64_BODY.exec(stripped)?.[0] ?? "";
  const padding = stripped.slice(body.length);

  const invalid = padding.search(/[^=]/);
  if (invalid !== -1) {
    const index = body.length + invalid;
    throw new DataUriError(
      MESSAGES.invalidBase64(`illegal character "${stripped[index]}" at index ${index}`),
      "INVALID_BASE64",
    );
  }
  if (body.length % 4 === 1) {
    throw new DataUriError(MESSAGES.invalidBase64("input ends with a single dangling character"), "INVALID_BASE64");
  }
  if (padding.length > 0 && (padding.length > 2 || (body.length + padding.length) % 4 !== 0)) {
    throw new DataUriError(MESSAGES.invalidBase64("incorrect padding"), "INVALID_BASE64");
  }

  return Buffer.from(body, "base64");
}

/**
 * Estimate the decoded byte-size of base64 data without allocating buffers
 */
export function estimateBase64Size(base64Data: string): number {
  const sanitized = base64Data.replace(WHITESPACE, "");
  const padding = sanitized.endsWith("==") ? 2 : sanitized.endsWith("=") ? 1 : 0;
  return Math.max(0, Math.floor((sanitized.length * 3) / 4) - padding);
}
