import { z } from "zod";

import { SupervisorError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";

/**
 * Structured payload returned by tool handlers when an error occurs. The MCP
 * transport expects the `content` array to contain textual JSON so downstream
 * clients can parse the code, hint and optional details.
 */
export interface ToolErrorResponse {
  [key: string]: unknown;
  isError: true;
  content: Array<{ type: "text"; text: string }>;
}

/** Normalised representation of a thrown error. */
export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/** Fallback codes applied to errors outside the supervisor taxonomy. */
export const TOOL_ERROR_CODES = {
  invalidInput: "E-INVALID-INPUT",
  unexpected: "E-SUPERVISOR-UNEXPECTED",
} as const;

/**
 * Maps an arbitrary error to its code and hint. Supervisor errors keep their
 * own; zod failures and type errors raised by input checks become
 * invalid-input errors.
 */
export function normaliseToolError(error: unknown): NormalisedToolError {
  if (error instanceof SupervisorError) {
    return { code: error.code, message: error.message, hint: error.hint, details: error.details };
  }
  if (error instanceof z.ZodError) {
    return {
      code: TOOL_ERROR_CODES.invalidInput,
      message: "invalid tool input",
      hint: "invalid_input",
      details: { issues: error.issues },
    };
  }
  if (error instanceof TypeError) {
    return { code: TOOL_ERROR_CODES.invalidInput, message: error.message, hint: "invalid_input" };
  }
  return {
    code: TOOL_ERROR_CODES.unexpected,
    message: error instanceof Error ? error.message : String(error),
  };
}

/** Logs the failure and wraps it into an `isError` tool response. */
export function toolError(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
): ToolErrorResponse {
  const normalised = normaliseToolError(error);
  logger.error(`${toolName}_failed`, {
    ...context,
    message: normalised.message,
    code: normalised.code,
    details: normalised.details,
  });

  const payload: Record<string, unknown> = {
    ok: false,
    error: normalised.code,
    tool: toolName,
    message: normalised.message,
  };
  if (normalised.hint) {
    payload.hint = normalised.hint;
  }
  if (normalised.details !== undefined) {
    payload.details = normalised.details;
  }
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
}
