import type { ToolResult } from '@toolbelt/runtime';

export type ToolTextResponse = {
  content: [{ type: "text"; text: string }];
  isError?: true;
};

export function toolTextResponse(text: string): ToolTextResponse {
  return {
    content: [{ type: "text", text }],
  };
}

export function toolErrorResponse(message: string): ToolTextResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}

/** Success carries the output; failure the `Error: ...` text. Metadata stays behind. */
export function toolResultResponse(result: ToolResult): ToolTextResponse {
  return result.success
    ? toolTextResponse(result.output ?? "")
    : toolErrorResponse(result.error ?? "Unknown error");
}
