import { Buffer } from "buffer";
import type { Charset } from "./charsets";
import { DataUriError } from "./errors";
import { MESSAGES } from "./messages";

const UNRESERVED = /[A-Za-z0-9.\-*_]/;
const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;

/**
 * Decode application/x-www-form-urlencoded text.
 * '+' becomes a space and each run of %XX escapes is decoded as bytes in the given charset.
 */
export function formDecode(text: string, charset: Charset): string {
  let result = "";
  let i = 0;
  while (i < text.length) {
    const c = text[i];
    if (c === "+") {
      result += " ";
      i++;
    } else if (c === "%") {
      const bytes: number[] = [];
      while (i < text.length && text[i] === "%") {
        if (i + 2 >= text.length) {
          throw new DataUriError(MESSAGES.incompleteEscape(i), "INVALID_PERCENT_ENCODING");
        }
        const hex = text.slice(i + 1, i + 3);
        if (!HEX_PAIR.test(hex)) {
          throw new DataUriError(MESSAGES.illegalEscape(i, hex), "INVALID_PERCENT_ENCODING");
        }
        bytes.push(parseInt(hex, 16));
        i += 3;
      }
      result += charset.decode(Buffer.from(bytes));
    } else {
      result += c;
      i++;
    }
  }
  return result;
}

/**
 * Encode text as application/x-www-form-urlencoded.
 * Unreserved chars pass through, a space becomes '+', everything else is %XX-escaped per charset byte.
 */
export function formEncode(text: string, charset: Charset): string {
  let result = "";
  let pending = "";
  const flush = () => {
    if (!pending) {
      return;
    }
    for (const byte of charset.encode(pending)) {
      result += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
    pending = "";
  };

  for (const c of text) {
    if (UNRESERVED.test(c)) {
      flush();
      result += c;
    } else if (c === " ") {
      flush();
      result += "+";
    } else {
      pending += c;
    }
  }
  flush();
  return result;
}
