/**
 * Per-call failure kinds. These never abort a batch or the loop; they are
 * returned to the model as the result of the call that failed.
 */
export type ToolErrorKind = 'unknown_tool' | 'invalid_arguments' | 'execution_failed' | 'cancelled';

/**
 * Structured tool error carried by a failed ToolCallResult
 */
export interface ToolError {
  toolName: string;
  kind: ToolErrorKind;
  message: string;
  details?: unknown;
}

/**
 * Thrown from inside a tool to report a failure with a specific kind.
 * Anything else a tool throws is reported as `execution_failed`.
 */
export class ToolFailure extends Error {
  readonly kind: ToolErrorKind;
  readonly details?: unknown;

  constructor(kind: ToolErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'ToolFailure';
    this.kind = kind;
    this.details = details;
  }
}
