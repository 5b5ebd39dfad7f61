import { DataUriResource, formatDataUri, getScheme, parseDataUri, PROTOCOL } from "./data-uri";
import { DataUriError } from "./errors";
import type { MediaType } from "./media-type";
import { MESSAGES } from "./messages";

/**
 * Decode/encode pair serving one URI scheme
 */
export interface SchemeHandler {
  decode(uri: string): DataUriResource;
  encode(mediaType: MediaType | undefined, content: Uint8Array, useBase64: boolean): string;
}

export const dataSchemeHandler: SchemeHandler = {
  decode: parseDataUri,
  encode: formatDataUri,
};

/**
 * Lookup table from scheme to handler, owned by whoever creates it
 */
export class SchemeRegistry {
  private readonly handlers = new Map<string, SchemeHandler>();

  register(scheme: string, handler: SchemeHandler): this {
    this.handlers.set(scheme.toLowerCase(), handler);
    return this;
  }

  unregister(scheme: string): boolean {
    return this.handlers.delete(scheme.toLowerCase());
  }

  has(scheme: string): boolean {
    return this.handlers.has(scheme.toLowerCase());
  }

  schemes(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Handler for the scheme of an absolute URI
   */
  resolve(uri: string): SchemeHandler {
    const scheme = getScheme(uri);
    if (scheme === undefined) {
      throw new DataUriError(MESSAGES.invalidProtocol(this.schemes().join("|"), undefined), "INVALID_PROTOCOL");
    }
    const handler = this.handlers.get(scheme.toLowerCase());
    if (!handler) {
      throw new DataUriError(MESSAGES.unknownScheme(scheme), "INVALID_PROTOCOL");
    }
    return handler;
  }

  decode(uri: string): DataUriResource {
    return this.resolve(uri).decode(uri);
  }
}

export function createDefaultRegistry(): SchemeRegistry {
  return new SchemeRegistry().register(PROTOCOL, dataSchemeHandler);
}
