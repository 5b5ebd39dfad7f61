import { Buffer } from "buffer";
import { Base64Appender, Base64Encoder, TextBuffer } from "./base64";
import { BASE64_POSTFIX, DataUriResource, encodeDataUriBody, parseDataUri, PROTOCOL } from "./data-uri";
import { DataUriError, isDataUriError } from "./errors";
import { MediaType } from "./media-type";
import { MESSAGES } from "./messages";

type Source<T> = Iterable<T> | AsyncIterable<T>;

/**
 * Already-encoded data part, in one piece or as chunks (e.g. a Readable with an encoding set)
 */
export type TextSource = string | Source<string>;

/**
 * Raw bytes, in one piece or as chunks (e.g. a Readable without an encoding)
 */
export type ByteSource = Uint8Array | Source<Uint8Array>;

/**
 * Common part of the data: URI builders
 */
export abstract class DataUriBuilder {
  /**
   * Parse the media type to use. Its parameters can be changed on the returned builder.
   */
  withMediaType(mediaType: string): MediaTypeBuilder {
    return new MediaTypeBuilder(this, MediaType.parse(mediaType));
  }

  /**
   * Build a data: URI without a media type
   */
  build(): Promise<string> {
    return this.buildWithMediaType(undefined);
  }

  abstract buildWithMediaType(mediaType: MediaType | undefined): Promise<string>;
}

/**
 * Builds data: URIs whose data part is given as text. The text is used verbatim,
 * so it must already be URI-encoded.
 */
export class TextDataUriBuilder extends DataUriBuilder {
  constructor(private readonly data: TextSource) {
    super();
  }

  async buildWithMediaType(mediaType: MediaType | undefined): Promise<string> {
    const uri = new TextBuffer().append(`${PROTOCOL}:`);
    if (mediaType) {
      uri.append(mediaType.toString());
    }
    uri.append(",");
    await drain(typeof this.data === "string" ? [this.data] : this.data, (chunk) => {
      uri.append(chunk);
    });
    return uri.toString();
  }
}

/**
 * Builds data: URIs from raw bytes, base64-encoded unless told otherwise
 */
export class BytesDataUriBuilder extends DataUriBuilder {
  private base64Data = true;

  constructor(private readonly data: ByteSource) {
    super();
  }

  withBase64Data(base64Data: boolean): this {
    this.base64Data = base64Data;
    return this;
  }

  async buildWithMediaType(mediaType: MediaType | undefined): Promise<string> {
    const chunks = this.data instanceof Uint8Array ? [this.data] : this.data;

    if (!this.base64Data) {
      const collected: Uint8Array[] = [];
      await drain(chunks, (chunk) => {
        collected.push(requireBytes(chunk));
      });
      return `${PROTOCOL}:${encodeDataUriBody(mediaType, Buffer.concat(collected), false)}`;
    }

    const uri = new TextBuffer().append(`${PROTOCOL}:`);
    if (mediaType) {
      uri.append(mediaType.toString());
    }
    uri.append(`${BASE64_POSTFIX},`);
    const encoder = new Base64Encoder(new Base64Appender(uri));
    await drain(chunks, (chunk) => {
      encoder.write(requireBytes(chunk));
    });
    encoder.end();
    return uri.toString();
  }
}

/**
 * Edits the media type of a builder; the result is validated when build() is called
 */
export class MediaTypeBuilder {
  private readonly mimeType: string;
  private readonly parameters: Map<string, string>;

  constructor(
    private readonly parent: DataUriBuilder,
    mediaType: MediaType,
  ) {
    this.mimeType = mediaType.mimeType;
    this.parameters = new Map(mediaType.parameters);
  }

  /**
   * Set a media type parameter, or remove it with null
   */
  withMediaTypeParameter(name: string, value: string | null): this {
    if (value === null) {
      this.parameters.delete(name);
    } else {
      this.parameters.set(name, value);
    }
    return this;
  }

  withCharset(charset: string): this {
    return this.withMediaTypeParameter("charset", charset);
  }

  build(): Promise<string> {
    return this.parent.buildWithMediaType(MediaType.create(this.mimeType, this.parameters));
  }
}

/**
 * Read a source to its end, handing every chunk to onChunk.
 * Any failure while reading is wrapped once as IO_FAILURE; leaving early closes the source.
 */
async function drain<T>(source: Source<T>, onChunk: (chunk: T) => void): Promise<void> {
  try {
    for await (const chunk of source) {
      onChunk(chunk);
    }
  } catch (error) {
    if (isDataUriError(error)) {
      throw error;
    }
    throw new DataUriError(
      MESSAGES.ioFailure(error instanceof Error ? error.message : String(error)),
      "IO_FAILURE",
      { cause: error },
    );
  }
}

// A Readable with an encoding set yields strings
function requireBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  throw new TypeError(`Expected a byte chunk but read a ${typeof chunk}`);
}

function builder(data: string): TextDataUriBuilder;
function builder(data: ByteSource): BytesDataUriBuilder;
function builder(data: string | ByteSource): TextDataUriBuilder | BytesDataUriBuilder {
  return typeof data === "string" ? new TextDataUriBuilder(data) : new BytesDataUriBuilder(data);
}

/**
 * Entry points for building and reading data: URIs
 */
export const DataUris = {
  create(uri: string): DataUriResource {
    return parseDataUri(uri);
  },
  builder,
  textBuilder(data: TextSource): TextDataUriBuilder {
    return new TextDataUriBuilder(data);
  },
  bytesBuilder(data: ByteSource): BytesDataUriBuilder {
    return new BytesDataUriBuilder(data);
  },
};
