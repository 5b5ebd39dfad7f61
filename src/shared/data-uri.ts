import { Buffer } from "buffer";
import { Readable } from "node:stream";
import { decodeBase64, encodeBase64Into, TextBuffer } from "./base64";
import { resolveCharset } from "./charsets";
import { DataUriError } from "./errors";
import { formDecode, formEncode } from "./form-encoding";
import { MediaType } from "./media-type";
import { MESSAGES } from "./messages";

export const PROTOCOL = "data";
export const BASE64_POSTFIX = ";base64";

/**
 * Decoded data: URI body
 */
export interface DataUriBody {
  readonly mediaType: MediaType;
  readonly content: Buffer;
}

/**
 * Decode the scheme-stripped body of a data: URI found at uri[start, end):
 * `[<mediatype>][;base64],<data>`
 */
export function decodeDataUriBody(uri: string, start = 0, end = uri.length): DataUriBody {
  const indexOfComma = uri.indexOf(",", start);
  if (indexOfComma === -1 || indexOfComma >= end) {
    throw new DataUriError(MESSAGES.missingComma(uri), "MISSING_COMMA");
  }

  const base64Data = isBase64Data(uri, start, indexOfComma);
  const mediaTypeEnd = base64Data ? indexOfComma - BASE64_POSTFIX.length : indexOfComma;
  const mediaType = start === mediaTypeEnd ? MediaType.DEFAULT : MediaType.parse(uri, start, mediaTypeEnd);

  const payload = uri.slice(indexOfComma + 1, end);
  if (base64Data) {
    return Object.freeze({ mediaType, content: decodeBase64(payload) });
  }

  const charset = resolveCharset(mediaType);
  return Object.freeze({ mediaType, content: charset.encode(formDecode(payload, charset)) });
}

/**
 * Encode content as a data: URI body (without the `data:` prefix).
 * Without base64 the bytes are read as text in the media type's charset (US-ASCII if absent)
 * and form-encoded.
 */
export function encodeDataUriBody(mediaType: MediaType | undefined, content: Uint8Array, useBase64: boolean): string {
  const body = new TextBuffer();
  if (mediaType) {
    body.append(mediaType.toString());
  }
  if (useBase64) {
    body.append(`${BASE64_POSTFIX},`);
    return encodeBase64Into(body, [content]).toString();
  }

  const charset = resolveCharset(mediaType);
  return body.append(",").append(formEncode(charset.decode(content), charset)).toString();
}

/**
 * Encode content as a complete data: URI
 */
export function formatDataUri(mediaType: MediaType | undefined, content: Uint8Array, useBase64: boolean): string {
  return `${PROTOCOL}:${encodeDataUriBody(mediaType, content, useBase64)}`;
}

/**
 * Parse a complete data: URI. The fragment, if any, is not part of the data.
 */
export function parseDataUri(uri: string): DataUriResource {
  const scheme = getScheme(uri);
  if (scheme?.toLowerCase() !== PROTOCOL) {
    throw new DataUriError(MESSAGES.invalidProtocol(PROTOCOL, scheme), "INVALID_PROTOCOL");
  }

  const start = PROTOCOL.length + 1;
  const indexOfHash = uri.indexOf("#", start);
  const end = indexOfHash === -1 ? uri.length : indexOfHash;

  const { mediaType, content } = decodeDataUriBody(uri, start, end);
  return new DataUriResource(uri, uri.slice(start, end), mediaType, content);
}

/**
 * Throws the same errors as parseDataUri, discarding the content
 */
export function validateDataUri(uri: string): void {
  parseDataUri(uri);
}

/**
 * Scheme of an absolute URI, or undefined if the text does not start with one
 */
export function getScheme(uri: string): string | undefined {
  return /^([A-Za-z][A-Za-z0-9+.\-]*):/.exec(uri)?.[1];
}

function isBase64Data(uri: string, start: number, indexOfComma: number): boolean {
  const postfixStart = indexOfComma - BASE64_POSTFIX.length;
  return postfixStart >= start && uri.startsWith(BASE64_POSTFIX, postfixStart);
}

/**
 * A decoded data: URI, exposing its content the way a URL connection would
 */
export class DataUriResource {
  constructor(
    readonly url: string,
    readonly path: string,
    readonly mediaType: MediaType,
    private readonly content: Buffer,
  ) {}

  /**
   * The media type, `text/plain;charset=US-ASCII` when the URI has none
   */
  get contentType(): string {
    return this.mediaType.toString();
  }

  get contentEncoding(): string | undefined {
    return this.mediaType.getCharset();
  }

  get contentLength(): number {
    return this.content.length;
  }

  getContent(): Buffer {
    return Buffer.from(this.content);
  }

  /**
   * A new stream over the decoded bytes on every call
   */
  openStream(): Readable {
    return Readable.from([this.getContent()], { objectMode: false });
  }
}
