import { ZodError } from "zod";

/**
 * Build tool responses: full JSON in content (the model reads it as text).
 */
export function toolResponse(data: Record<string, unknown>, isError?: boolean) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data) }],
    ...(isError ? { isError: true } : {}),
  };
}

export type ToolResult = ReturnType<typeof toolResponse>;

/**
 * Classifies an error and returns a user-friendly message.
 * Tells the caller whether to retry, fix their input, or report a bug.
 */
export function classifyError(err: unknown): { message: string; retryable: boolean } {
  if (err instanceof ZodError) {
    return { message: err.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; "), retryable: false };
  }
  if (!(err instanceof Error)) {
    return { message: "An unexpected error occurred. Please try again.", retryable: true };
  }

  const msg = err.message.toLowerCase();

  // Transient errors
  if (msg.includes("timeout") || msg.includes("timed out")) {
    return { message: "The operation timed out. Please try again.", retryable: true };
  }
  if (msg.includes("connection") || msg.includes("econnrefused") || msg.includes("enotfound")) {
    return { message: "Connection error. Please try again in a moment.", retryable: true };
  }

  // Validation errors
  if (msg.includes("invalid") || msg.includes("must be") || msg.includes("required")) {
    return { message: err.message, retryable: false };
  }

  return { message: "Something went wrong. Please try again.", retryable: true };
}

/**
 * Wraps a tool handler with try/catch error handling.
 * Unexpected errors come back as a structured error response instead of
 * propagating to the MCP framework.
 */
export function safeHandler<T>(
  toolName: string,
  handler: (params: T) => Promise<ToolResult>
): (params: T) => Promise<ToolResult> {
  return async (params: T) => {
    try {
      return await handler(params);
    } catch (err) {
      console.error(`[${toolName}] Unhandled error:`, err instanceof Error ? err.stack : err);
      const { message, retryable } = classifyError(err);
      return toolResponse({ error: message, retryable }, true);
    }
  };
}
