import type { ToolCallRequest, ToolCallResult } from '../tools/tool-call.js';
import type { OrchestrationError } from './errors.js';
import type { AssistantMessage } from './messages.js';
import type { RunResult } from './orchestration-loop.js';

/**
 * Notifications emitted at each phase transition of a run. Observers see
 * them; they never influence the control path.
 */
export interface RunStartedEvent {
  type: 'run_started';
  runId: string;
  messageCount: number;
  toolCount: number;
}

export interface ModelQueriedEvent {
  type: 'model_queried';
  runId: string;
  round: number;
  messageCount: number;
}

export interface ModelRespondedEvent {
  type: 'model_responded';
  runId: string;
  message: AssistantMessage;
}

export interface ToolBatchDispatchedEvent {
  type: 'tool_batch_dispatched';
  runId: string;
  round: number;
  requests: ToolCallRequest[];
}

export interface ToolBatchCompletedEvent {
  type: 'tool_batch_completed';
  runId: string;
  round: number;
  results: ToolCallResult[];
}

export interface RunCompletedEvent {
  type: 'run_completed';
  runId: string;
  result: RunResult;
}

export interface RunFailedEvent {
  type: 'run_failed';
  runId: string;
  error: OrchestrationError;
}

export type LoopEvent =
  | RunStartedEvent
  | ModelQueriedEvent
  | ModelRespondedEvent
  | ToolBatchDispatchedEvent
  | ToolBatchCompletedEvent
  | RunCompletedEvent
  | RunFailedEvent;

/**
 * A listener may be async; a rejection is logged like a synchronous throw
 */
export type LoopEventListener = (event: LoopEvent) => void | Promise<void>;
