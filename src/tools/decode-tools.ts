import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { CONFIG, Config, maxInputSizeBytes } from "../shared/config";
import { resolveCharset } from "../shared/charsets";
import { DataUriResource, parseDataUri } from "../shared/data-uri";
import { isDataUriError } from "../shared/errors";
import { MediaType } from "../shared/media-type";
import { errorResult, formatParameters, formatSummary, summarize, textResult } from "../shared/tool-results";
import { ContentBlock } from "../shared/types";

export type ContentFormat = "auto" | "text" | "base64" | "none";

/**
 * Render the decoded bytes as a content block.
 * "auto" picks an image block for image/*, text for text/* or an explicit charset, base64 otherwise.
 */
export function renderContent(resource: DataUriResource, format: ContentFormat): ContentBlock | undefined {
  const { mediaType } = resource;
  const content = resource.getContent();

  let effective = format;
  if (format === "auto") {
    if (mediaType.mimeType.startsWith("image/")) {
      return { type: "image" as const, mimeType: mediaType.mimeType, data: content.toString("base64") };
    }
    effective = mediaType.mimeType.startsWith("text/") || mediaType.getCharset() !== undefined ? "text" : "base64";
  }

  switch (effective) {
    case "none":
      return undefined;
    case "text":
      try {
        return { type: "text" as const, text: resolveCharset(mediaType).decode(content) };
      } catch (error) {
        if (!isDataUriError(error, "UNSUPPORTED_CHARSET") || format === "text") {
          throw error;
        }
        // base64 payloads never had their charset checked; show the raw bytes instead
        return { type: "text" as const, text: `base64: ${content.toString("base64")}` };
      }
    default:
      return { type: "text" as const, text: `base64: ${content.toString("base64")}` };
  }
}

export async function decodeDataUri(
  { uri, format = "auto" }: { uri: string; format?: ContentFormat },
  config: Config = CONFIG,
): Promise<CallToolResult> {
  const limit = maxInputSizeBytes(config);
  if (uri.length > limit) {
    return {
      ...textResult(`Error: data URI is ${uri.length} characters long, exceeds the limit of ${limit}`),
      isError: true,
    };
  }

  try {
    const resource = parseDataUri(uri);
    const blocks: ContentBlock[] = [{ type: "text" as const, text: formatSummary(summarize(resource)).join("\n") }];
    const content = renderContent(resource, format);
    if (content) {
      blocks.push(content);
    }
    return { content: blocks };
  } catch (error) {
    return errorResult("decodeDataUri", error);
  }
}

export async function inspectMediaType({ mediaType }: { mediaType: string }): Promise<CallToolResult> {
  try {
    const parsed = MediaType.parse(mediaType);
    return textResult(
      `mimeType: ${parsed.mimeType}`,
      `parameters: ${formatParameters(parsed)}`,
      `charset: ${parsed.getCharset() ?? "(none)"}`,
      `canonicalForm: ${parsed.canonicalForm}`,
    );
  } catch (error) {
    return errorResult("inspectMediaType", error);
  }
}

export async function validateDataUri({ uri }: { uri: string }): Promise<CallToolResult> {
  try {
    const resource = parseDataUri(uri);
    return textResult(`Valid data URI: ${resource.contentType}, ${resource.contentLength} bytes`);
  } catch (error) {
    return errorResult("validateDataUri", error);
  }
}

export function registerDecodeTools(server: McpServer, config: Config = CONFIG) {
  server.tool(
    "decodeDataUri",
    [
      "Decodes an RFC 2397 data: URI into its media type and content.",
      "Reports the content type, MIME type, parameters, charset and content length.",
      "Content is returned as an image for image/* types, as text for text/* types or when a charset is given, and as base64 otherwise.",
      "Use format to force text, base64 or no content at all."
    ].join("\n"),
    {
      uri: z.string().describe("The complete data: URI, e.g. data:text/plain;charset=UTF-8,hello+world"),
      format: z
        .enum(["auto", "text", "base64", "none"])
        .optional()
        .describe("How to return the decoded content (default: auto)")
    },
    {
      readOnlyHint: true
    },
    async ({ uri, format }) => decodeDataUri({ uri, format }, config)
  );

  server.tool(
    "inspectMediaType",
    [
      "Parses a media type such as application/json;charset=UTF-8.",
      "Returns the MIME type, the parameters in order, the charset (looked up case-insensitively) and the canonical form."
    ].join("\n"),
    {
      mediaType: z.string().describe("Media type with optional parameters")
    },
    {
      readOnlyHint: true
    },
    async ({ mediaType }) => inspectMediaType({ mediaType })
  );

  server.tool(
    "validateDataUri",
    "Checks that a data: URI can be decoded and reports why not if it cannot.",
    {
      uri: z.string().describe("The complete data: URI")
    },
    {
      readOnlyHint: true
    },
    async ({ uri }) => validateDataUri({ uri })
  );
}
