import { DataUriError } from "./errors";
import { MESSAGES } from "./messages";

export const DEFAULT_MIME_TYPE = "text/plain";
export const DEFAULT_CHARSET = "US-ASCII";

// Any visible ASCII char except the MIME tspecials ()<>@,;:\"/[]?=
const TOKEN = "[!#$%&'*+\\-.0-9A-Z^_`a-z{|}~]";
const MIME_TYPE_PATTERN = new RegExp(`^${TOKEN}+/${TOKEN}+$`);

export type ParameterInput =
  | ReadonlyMap<string, string | null | undefined>
  | Iterable<readonly [string, string | null | undefined]>
  | Readonly<Record<string, string | null | undefined>>;

/**
 * Parameter value scanner states
 */
enum ValueState {
  Plain,
  Quoted,
  EscapedPlain,
  EscapedQuoted,
}

/**
 * Immutable MIME media type with ordered parameters, as used in data: URIs
 *
 * Parameter names keep their original case for display; lookups such as
 * {@link MediaType.getCharset} ignore case.
 */
export class MediaType {
  static readonly DEFAULT: MediaType = new MediaType(
    DEFAULT_MIME_TYPE,
    new Map([["charset", DEFAULT_CHARSET]]),
  );

  readonly mimeType: string;
  readonly parameters: ReadonlyMap<string, string>;
  readonly canonicalForm: string;

  private readonly lookup: ReadonlyMap<string, string>;

  private constructor(mimeType: string, parameters: Map<string, string>) {
    this.mimeType = mimeType;
    this.parameters = parameters;
    const lookup = new Map<string, string>();
    for (const [name, value] of parameters) {
      lookup.set(name.toLowerCase(), value);
    }
    this.lookup = lookup;
    this.canonicalForm = formatMediaType(mimeType, parameters);
    Object.freeze(this);
  }

  /**
   * Create a media type from a MIME type and parameters.
   * Only the MIME type is validated; parameter names and values are taken as given.
   * A null or undefined parameter value is stored as an empty string.
   */
  static create(mimeType: string, parameters: ParameterInput = []): MediaType {
    validateMimeType(mimeType);
    return new MediaType(mimeType, copyParameters(parameters));
  }

  /**
   * Parse `type/subtype;name=value;...` from text[start, end)
   */
  static parse(text: string, start = 0, end = text.length): MediaType {
    const type = text.slice(start, end);
    const index = type.indexOf(";");
    if (index === -1) {
      validateMimeType(type);
      return new MediaType(type, new Map());
    }

    const mimeType = type.slice(0, index).trim();
    validateMimeType(mimeType);
    return new MediaType(mimeType, parseParameters(type.slice(index + 1).trim()));
  }

  get charset(): string | undefined {
    return this.getCharset();
  }

  getCharset(): string | undefined {
    return this.getParameter("charset");
  }

  /**
   * Case-insensitive parameter lookup
   */
  getParameter(name: string): string | undefined {
    return this.lookup.get(name.toLowerCase());
  }

  /**
   * Returns a copy with the parameter set, or removed when value is null
   */
  withParameter(name: string, value: string | null): MediaType {
    const parameters = new Map(this.parameters);
    if (value === null) {
      parameters.delete(name);
    } else {
      parameters.set(name, value);
    }
    return MediaType.create(this.mimeType, parameters);
  }

  withCharset(charset: string): MediaType {
    return this.withParameter("charset", charset);
  }

  equals(other: MediaType): boolean {
    if (this.mimeType !== other.mimeType || this.parameters.size !== other.parameters.size) {
      return false;
    }
    const otherEntries = [...other.parameters];
    return [...this.parameters].every(
      ([name, value], i) => otherEntries[i][0] === name && otherEntries[i][1] === value,
    );
  }

  toJSON(): { mimeType: string; parameters: Record<string, string> } {
    return { mimeType: this.mimeType, parameters: Object.fromEntries(this.parameters) };
  }

  toString(): string {
    return this.canonicalForm;
  }
}

export function isValidMimeType(mimeType: string): boolean {
  return MIME_TYPE_PATTERN.test(mimeType);
}

function validateMimeType(mimeType: string): void {
  if (!isValidMimeType(mimeType)) {
    throw new DataUriError(MESSAGES.invalidMimeType(mimeType), "INVALID_MIME_TYPE");
  }
}

function copyParameters(parameters: ParameterInput): Map<string, string> {
  const entries = isIterable(parameters) ? parameters : Object.entries(parameters);
  const copy = new Map<string, string>();
  for (const [name, value] of entries) {
    copy.set(name, value ?? "");
  }
  return copy;
}

function isIterable(value: unknown): value is Iterable<readonly [string, string | null | undefined]> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}

/**
 * Serialize a media type. Values containing ';' are quoted, '"' and '\' are escaped.
 */
function formatMediaType(mimeType: string, parameters: ReadonlyMap<string, string>): string {
  let result = mimeType;
  for (const [name, value] of parameters) {
    const quote = value.includes(";") ? '"' : "";
    result += `;${name}=${quote}${value.replace(/["\\]/g, "\\$&")}${quote}`;
  }
  return result;
}

function parseParameters(paramString: string): Map<string, string> {
  const parameters = new Map<string, string>();
  let start = 0;
  while (start < paramString.length) {
    start = parseNextParameter(paramString, start, parameters);
  }
  return parameters;
}

function parseNextParameter(paramString: string, start: number, parameters: Map<string, string>): number {
  let end = getNameEnd(paramString, start);
  const name = paramString.slice(start, end).trim();
  if (paramString[end] === "=") {
    end++;
  }

  let state = ValueState.Plain;
  let value = "";
  for (let i = end; i < paramString.length; i++) {
    const c = paramString[i];

    if (state === ValueState.EscapedPlain || state === ValueState.EscapedQuoted) {
      state = state === ValueState.EscapedQuoted ? ValueState.Quoted : ValueState.Plain;
      if (c === '"' || c === "\\") {
        value += c;
        continue;
      }
      // a backslash that escapes nothing is kept as is
      value += "\\";
    }

    switch (c) {
      case '"':
        state = state === ValueState.Quoted ? ValueState.Plain : ValueState.Quoted;
        break;
      case "\\":
        state = state === ValueState.Quoted ? ValueState.EscapedQuoted : ValueState.EscapedPlain;
        break;
      case ";":
        if (state === ValueState.Plain) {
          parameters.set(name, value.trim());
          return i + 1;
        }
        value += c;
        break;
      default:
        value += c;
    }
  }
  if (state === ValueState.EscapedPlain || state === ValueState.EscapedQuoted) {
    value += "\\";
  }
  parameters.set(name, value.trim());
  return paramString.length;
}

function getNameEnd(paramString: string, start: number): number {
  const indexOfEquals = paramString.indexOf("=", start);
  const indexOfSemicolon = paramString.indexOf(";", start);
  if (indexOfEquals === -1 && indexOfSemicolon === -1) {
    return paramString.length;
  }
  if (indexOfEquals === -1) {
    return indexOfSemicolon;
  }
  if (indexOfSemicolon === -1) {
    return indexOfEquals;
  }
  return Math.min(indexOfEquals, indexOfSemicolon);
}
