import type { ToolError } from './tool-errors.js';

/**
 * A model-issued request to run one tool. `arguments` is either the parsed
 * object or the raw JSON text the model produced.
 */
export interface ToolCallRequest {
  id: string;
  toolName: string;
  arguments: Record<string, unknown> | string;
}

export interface ToolCallSuccess {
  callId: string;
  toolName: string;
  success: true;
  output: string;
}

export interface ToolCallFailure {
  callId: string;
  toolName: string;
  success: false;
  error: ToolError;
}

/**
 * Outcome of one tool call, matched to its request by `callId`
 */
export type ToolCallResult = ToolCallSuccess | ToolCallFailure;

export type ParsedArguments =
  | { ok: true; args: Record<string, unknown> }
  | { ok: false; message: string };

/**
 * Normalizes request arguments to an object, parsing raw JSON text if needed
 */
export function parseArguments(raw: ToolCallRequest['arguments']): ParsedArguments {
  if (typeof raw !== 'string') {
    return { ok: true, args: raw };
  }
  if (raw.trim() === '') {
    return { ok: true, args: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      message: `Arguments are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { ok: false, message: 'Arguments must be a JSON object' };
  }
  return { ok: true, args: Object.fromEntries(Object.entries(parsed)) };
}

/**
 * Text shown to the model for a tool result
 */
export function renderToolResult(result: ToolCallResult): string {
  if (result.success) {
    return result.output;
  }
  return `Error (${result.error.kind}): ${result.error.message}`;
}
