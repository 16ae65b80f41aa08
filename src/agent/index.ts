/**
 * Agent - Conversation model, model client contract and the orchestration loop
 */

export {
  OrchestrationLoop,
  type OrchestratorConfig,
  type RunParams,
  type RunResult,
  type LoopState,
} from './orchestration-loop.js';

export {
  OrchestrationError,
  isOrchestrationError,
  type OrchestrationErrorKind,
  type OrchestrationPhase,
  type OrchestrationErrorInit,
} from './errors.js';

export type {
  LoopEvent,
  LoopEventListener,
  RunStartedEvent,
  ModelQueriedEvent,
  ModelRespondedEvent,
  ToolBatchDispatchedEvent,
  ToolBatchCompletedEvent,
  RunCompletedEvent,
  RunFailedEvent,
} from './events.js';

export {
  systemMessage,
  userMessage,
  assistantMessage,
  toolCallMessage,
  toolResultMessage,
  pendingToolCalls,
  isToolCallTurn,
  type Message,
  type SystemMessage,
  type UserMessage,
  type AssistantMessage,
  type ToolResultMessage,
} from './messages.js';

export {
  AssistantMessageSchema,
  validateModelResponse,
  type ModelClient,
  type ResponseValidationResult,
} from './model-client.js';

export { ScriptedModelClient, type ScriptStep, type RecordedRequest } from './scripted-model-client.js';
