import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

// Define ContentBlock type alias for clarity
export type ContentBlock = CallToolResult['content'][number];

/**
 * Summary of a decoded data: URI as reported by the tools
 */
export interface DecodedSummary {
  contentType: string;
  mimeType: string;
  parameters: Record<string, string>;
  charset: string | undefined;
  contentLength: number;
}
