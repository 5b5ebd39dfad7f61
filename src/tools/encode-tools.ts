import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { Buffer } from "buffer";
import { z } from "zod";
import { decodeBase64, estimateBase64Size } from "../shared/base64";
import { resolveCharset } from "../shared/charsets";
import { CONFIG, Config, maxInputSizeBytes } from "../shared/config";
import { formatDataUri } from "../shared/data-uri";
import { MediaType } from "../shared/media-type";
import { errorResult, textResult } from "../shared/tool-results";

export type InputEncoding = "text" | "base64";

export interface EncodeParams {
  data: string;
  inputEncoding?: InputEncoding;
  mediaType?: string;
  charset?: string;
  base64?: boolean;
}

/**
 * Build a data: URI from text or base64 input.
 * Text input is turned into bytes with the media type's charset (US-ASCII when none is set).
 */
export async function encodeDataUri(
  { data, inputEncoding = "text", mediaType, charset, base64 }: EncodeParams,
  config: Config = CONFIG,
): Promise<CallToolResult> {
  const limit = maxInputSizeBytes(config);
  const inputSize = inputEncoding === "base64" ? estimateBase64Size(data) : Buffer.byteLength(data, "utf8");
  if (inputSize > limit) {
    return {
      ...textResult(`Error: input is ${inputSize} bytes, exceeds the limit of ${limit} bytes`),
      isError: true,
    };
  }

  try {
    let parsed = mediaType ? MediaType.parse(mediaType) : undefined;
    if (charset) {
      parsed = (parsed ?? MediaType.DEFAULT).withCharset(charset);
    }

    const bytes = inputEncoding === "base64" ? decodeBase64(data) : resolveCharset(parsed).encode(data);
    return textResult(formatDataUri(parsed, bytes, base64 ?? config.defaultBase64));
  } catch (error) {
    return errorResult("encodeDataUri", error);
  }
}

export function registerEncodeTools(server: McpServer, config: Config = CONFIG) {
  server.tool(
    "encodeDataUri",
    [
      "Encodes content as an RFC 2397 data: URI.",
      "Text input is converted to bytes using the charset of the media type (US-ASCII if none is given); base64 input is used as raw bytes.",
      "The data part is base64-encoded by default; set base64 to false for a form-encoded (percent-escaped, space as +) data part.",
      "Without a media type the URI carries none and readers assume text/plain;charset=US-ASCII."
    ].join("\n"),
    {
      data: z.string().describe("The content, as text or base64 depending on inputEncoding"),
      inputEncoding: z.enum(["text", "base64"]).optional().describe("How data is given (default: text)"),
      mediaType: z.string().optional().describe("Media type with optional parameters, e.g. text/html;charset=UTF-8"),
      charset: z.string().optional().describe("Charset parameter to set on the media type"),
      base64: z.boolean().optional().describe(`Base64-encode the data part (default: ${config.defaultBase64})`)
    },
    async (params) => encodeDataUri(params, config)
  );
}
