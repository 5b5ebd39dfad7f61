import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "./errors";
import type { DataUriResource } from "./data-uri";
import type { MediaType } from "./media-type";
import type { DecodedSummary } from "./types";

export function textResult(...lines: string[]): CallToolResult {
  return {
    content: [{ type: "text" as const, text: lines.join("\n") }],
  };
}

/**
 * Log a failed tool call and turn it into an error result
 */
export function errorResult(toolName: string, error: unknown): CallToolResult {
  const message = describeError(error);
  console.error(`Error in ${toolName}: ${message}`);
  return {
    content: [{ type: "text" as const, text: `Error: ${message}` }],
    isError: true,
  };
}

export function summarize(resource: DataUriResource): DecodedSummary {
  return {
    contentType: resource.contentType,
    mimeType: resource.mediaType.mimeType,
    parameters: Object.fromEntries(resource.mediaType.parameters),
    charset: resource.contentEncoding,
    contentLength: resource.contentLength,
  };
}

export function formatParameters(mediaType: MediaType): string {
  return formatParameterEntries([...mediaType.parameters]);
}

function formatParameterEntries(entries: [string, string][]): string {
  if (entries.length === 0) {
    return "(none)";
  }
  return entries.map(([name, value]) => `${name}=${JSON.stringify(value)}`).join(", ");
}

export function formatSummary(summary: DecodedSummary): string[] {
  return [
    `contentType: ${summary.contentType}`,
    `mimeType: ${summary.mimeType}`,
    `parameters: ${formatParameterEntries(Object.entries(summary.parameters))}`,
    `charset: ${summary.charset ?? "(none)"}`,
    `contentLength: ${summary.contentLength} bytes`,
  ];
}
