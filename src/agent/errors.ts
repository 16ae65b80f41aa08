import type { Message } from './messages.js';

/**
 * Loop-level failure kinds. Unlike tool errors these end the invocation.
 */
export type OrchestrationErrorKind = 'model_request_failed' | 'cancelled' | 'round_limit_exceeded';

/**
 * Phase the loop was in when it failed
 */
export type OrchestrationPhase = 'model' | 'tools';

export interface OrchestrationErrorInit {
  kind: OrchestrationErrorKind;
  phase: OrchestrationPhase;
  message: string;
  runId: string;
  toolRounds: number;
  conversation: readonly Message[];
  details?: unknown;
  cause?: unknown;
}

/**
 * Thrown by OrchestrationLoop.run when the invocation fails.
 *
 * `conversation` holds everything appended before the failure. Every tool
 * call in it has a matching result; a tool-call turn the loop refused to
 * execute is reported in `details` rather than appended.
 */
export class OrchestrationError extends Error {
  readonly kind: OrchestrationErrorKind;
  readonly phase: OrchestrationPhase;
  readonly runId: string;
  readonly toolRounds: number;
  readonly conversation: readonly Message[];
  readonly details?: unknown;

  constructor(init: OrchestrationErrorInit) {
    super(init.message, init.cause !== undefined ? { cause: init.cause } : undefined);
    this.name = 'OrchestrationError';
    this.kind = init.kind;
    this.phase = init.phase;
    this.runId = init.runId;
    this.toolRounds = init.toolRounds;
    this.conversation = init.conversation;
    this.details = init.details;
  }
}

export function isOrchestrationError(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError;
}
