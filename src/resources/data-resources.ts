import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { isSupportedCharset, resolveCharset } from "../shared/charsets";
import { describeError } from "../shared/errors";
import { createDefaultRegistry, SchemeRegistry } from "../shared/scheme-registry";

export const DATA_URI_RESOURCE_TEMPLATE = "datauri://decode/{uri}";

/**
 * Resource URI under which the given data: URI can be read
 */
export function toResourceUri(dataUri: string): string {
  return `datauri://decode/${encodeURIComponent(dataUri)}`;
}

/**
 * Decode the data: URI carried by a datauri://decode/ resource URI.
 * Textual content (text/* or an explicit, known charset) is returned as text, everything else as a blob.
 */
export function readDataUriResource(
  resourceUri: string,
  encodedUri: string | string[],
  registry: SchemeRegistry = createDefaultRegistry(),
): ReadResourceResult {
  try {
    const dataUri = decodeURIComponent(Array.isArray(encodedUri) ? encodedUri.join("") : encodedUri);
    const resource = registry.decode(dataUri);
    const { mediaType } = resource;
    const charset = mediaType.getCharset();
    const textual = charset === undefined ? mediaType.mimeType.startsWith("text/") : isSupportedCharset(charset);

    if (textual) {
      return {
        contents: [{
          uri: resourceUri,
          mimeType: resource.contentType,
          text: resolveCharset(mediaType).decode(resource.getContent()),
        }]
      };
    }
    return {
      contents: [{
        uri: resourceUri,
        mimeType: resource.contentType,
        blob: resource.getContent().toString("base64"),
      }]
    };
  } catch (error) {
    console.error("Error reading data URI resource:", describeError(error));
    return {
      contents: [{
        uri: resourceUri,
        text: `Error reading data URI: ${describeError(error)}`,
      }]
    };
  }
}

/**
 * Register the datauri://decode/{uri} resource template
 */
export function registerDataResources(server: McpServer, registry: SchemeRegistry = createDefaultRegistry()) {
  const template = new ResourceTemplate(DATA_URI_RESOURCE_TEMPLATE, { list: undefined });

  server.registerResource(
    "data-uri",
    template,
    {
      title: "Decoded data: URI",
      description: "Content of a data: URI; the {uri} variable is the percent-encoded data: URI",
    },
    async (uri: URL, variables) => readDataUriResource(uri.toString(), variables.uri, registry)
  );
}
