/**
 * Error message templates, kept in one place so tests can assert on the exact text
 */
export const MESSAGES = {
  invalidProtocol: (expected: string, actual: string | undefined) =>
    actual === undefined
      ? `Invalid protocol: expected "${expected}" but the URI has no scheme`
      : `Invalid protocol: expected "${expected}" but got "${actual}"`,
  invalidMimeType: (mimeType: string) => `Invalid MIME type: "${mimeType}"`,
  missingComma: (uri: string) => `Missing comma in data URI: "${truncate(uri)}"`,
  invalidBase64: (detail: string) => `Invalid base64 data: ${detail}`,
  unsupportedCharset: (charset: string) => charset,
  incompleteEscape: (index: number) => `Incomplete trailing escape (%) pattern at index ${index}`,
  illegalEscape: (index: number, escape: string) =>
    `Illegal hex characters in escape (%) pattern at index ${index}: "${escape}"`,
  ioFailure: (detail: string) => `I/O error while reading data: ${detail}`,
  encoderClosed: () => "Cannot write to a base64 encoder after end()",
  unknownScheme: (scheme: string) => `No handler registered for scheme "${scheme}"`,
};

const MAX_URI_IN_MESSAGE = 200;

function truncate(value: string): string {
  return value.length > MAX_URI_IN_MESSAGE ? `${value.slice(0, MAX_URI_IN_MESSAGE)}...` : value;
}
