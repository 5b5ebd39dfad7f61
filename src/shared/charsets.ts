import { Buffer } from "buffer";
import * as iconv from "iconv-lite";
import { DataUriError } from "./errors";
import { DEFAULT_CHARSET, MediaType } from "./media-type";
import { MESSAGES } from "./messages";

/**
 * Text codec for one named charset
 */
export interface Charset {
  name: string;
  encode(text: string): Buffer;
  decode(bytes: Uint8Array): string;
}

/**
 * Whether iconv-lite knows the charset; names and aliases are matched ignoring case and punctuation
 */
export function isSupportedCharset(name: string): boolean {
  const trimmed = name.trim();
  return trimmed !== "" && iconv.encodingExists(trimmed);
}

/**
 * Look up a charset by name or alias.
 * Unmappable chars encode as '?' and undecodable bytes as U+FFFD.
 */
export function getCharset(name: string): Charset {
  if (!isSupportedCharset(name)) {
    throw new DataUriError(MESSAGES.unsupportedCharset(name), "UNSUPPORTED_CHARSET");
  }
  const encoding = name.trim();
  return {
    name: encoding,
    encode: (text) => iconv.encode(text, encoding),
    decode: (bytes) => iconv.decode(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength), encoding),
  };
}

/**
 * Charset of a media type, falling back to US-ASCII when there is no media type or no charset parameter
 */
export function resolveCharset(mediaType: MediaType | undefined): Charset {
  return getCharset(mediaType?.getCharset() ?? DEFAULT_CHARSET);
}
