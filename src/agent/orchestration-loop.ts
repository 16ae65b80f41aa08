import { randomUUID } from 'node:crypto';
import { cancellationReason, deriveSignal, raceAbort } from '../cancellation/cancellation.js';
import { Logger } from '../logging/logger.js';
import type { ToolCallRequest, ToolCallResult } from '../tools/tool-call.js';
import type { ToolExecutor } from '../tools/tool-executor.js';
import type { ToolSchema } from '../tools/tool.js';
import {
  OrchestrationError,
  type OrchestrationErrorKind,
  type OrchestrationPhase,
} from './errors.js';
import type { LoopEvent, LoopEventListener } from './events.js';
import {
  pendingToolCalls,
  toolResultMessage,
  type AssistantMessage,
  type Message,
  type SystemMessage,
} from './messages.js';
import { validateModelResponse, type ModelClient } from './model-client.js';

export interface OrchestratorConfig {
  /** Maximum number of tool rounds per run; unbounded when unset */
  maxToolRounds?: number;
  /** Whole-run timeout, applied as a cancellation derived from the caller's signal */
  timeoutMs?: number;
}

/**
 * Parameters for one invocation of the loop
 */
export interface RunParams {
  input: Message | Message[];
  systemMessages?: SystemMessage[];
  /** Schema set published to the model for this run */
  tools: readonly ToolSchema[];
  signal?: AbortSignal;
  /** Overrides the configured maxToolRounds for this run */
  maxToolRounds?: number;
  /** Overrides the configured timeoutMs for this run */
  timeoutMs?: number;
}

export interface RunResult {
  runId: string;
  finalMessage: AssistantMessage;
  /** System prefix, input and every appended turn, in order */
  conversation: Message[];
  toolRounds: number;
}

/**
 * States of one run
 */
export type LoopState =
  | { status: 'awaiting_model' }
  | { status: 'awaiting_tools'; requests: ToolCallRequest[] }
  | { status: 'done'; finalMessage: AssistantMessage }
  | { status: 'failed'; error: OrchestrationError };

/**
 * Per-run state. Owned by a single run and never shared.
 */
interface RunContext {
  runId: string;
  logger: Logger;
  signal: AbortSignal;
  tools: readonly ToolSchema[];
  conversation: Message[];
  toolRounds: number;
  maxToolRounds?: number;
}

function assertPositiveInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * OrchestrationLoop - Alternates model queries and tool execution until the
 * model gives a final answer
 *
 * Each run is strictly sequential: a model query, then (if the model asked
 * for tools) one batch through the executor, then the next query. Tool
 * failures go back to the model as error results. Model failures,
 * cancellation and the round limit end the run with an OrchestrationError.
 */
export class OrchestrationLoop {
  private modelClient: ModelClient;
  private executor: ToolExecutor;
  private config: OrchestratorConfig;
  private logger: Logger;
  private listeners: Set<LoopEventListener> = new Set();

  constructor(
    modelClient: ModelClient,
    executor: ToolExecutor,
    config: OrchestratorConfig = {},
    logger?: Logger,
  ) {
    assertPositiveInteger('maxToolRounds', config.maxToolRounds);
    assertPositiveInteger('timeoutMs', config.timeoutMs);
    this.modelClient = modelClient;
    this.executor = executor;
    this.config = { ...config };
    this.logger = (logger ?? Logger.silent()).child({ component: 'orchestration-loop' });
  }

  getConfig(): OrchestratorConfig {
    return { ...this.config };
  }

  /**
   * Registers an observer for loop events. Returns a function that removes it.
   */
  subscribe(listener: LoopEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Runs the loop to completion.
   * @throws OrchestrationError when the model fails, the run is cancelled or
   * the round limit is reached
   */
  async run(params: RunParams): Promise<RunResult> {
    const maxToolRounds = params.maxToolRounds ?? this.config.maxToolRounds;
    const timeoutMs = params.timeoutMs ?? this.config.timeoutMs;
    assertPositiveInteger('maxToolRounds', maxToolRounds);
    assertPositiveInteger('timeoutMs', timeoutMs);

    const runId = randomUUID();
    const derived = deriveSignal(params.signal, timeoutMs);
    const input = Array.isArray(params.input) ? params.input : [params.input];
    const ctx: RunContext = {
      runId,
      logger: this.logger.child({ runId }),
      signal: derived.signal,
      tools: params.tools,
      conversation: [...(params.systemMessages ?? []), ...input],
      toolRounds: 0,
      maxToolRounds,
    };

    await ctx.logger.info('Starting orchestration run', {
      messageCount: ctx.conversation.length,
      toolCount: ctx.tools.length,
      maxToolRounds,
      timeoutMs,
    });
    await this.emit(ctx, {
      type: 'run_started',
      runId,
      messageCount: ctx.conversation.length,
      toolCount: ctx.tools.length,
    });

    let state: LoopState = { status: 'awaiting_model' };
    try {
      while (true) {
        switch (state.status) {
          case 'awaiting_model':
            state = await this.queryModel(ctx);
            break;

          case 'awaiting_tools':
            state = await this.dispatchTools(ctx, state.requests);
            break;

          case 'done': {
            const result: RunResult = {
              runId,
              finalMessage: state.finalMessage,
              conversation: [...ctx.conversation],
              toolRounds: ctx.toolRounds,
            };
            await ctx.logger.info('Orchestration run completed', {
              toolRounds: ctx.toolRounds,
              messageCount: ctx.conversation.length,
            });
            await this.emit(ctx, { type: 'run_completed', runId, result });
            return result;
          }

          case 'failed':
            await ctx.logger.error('Orchestration run failed', state.error, {
              kind: state.error.kind,
              phase: state.error.phase,
              toolRounds: ctx.toolRounds,
            });
            await this.emit(ctx, { type: 'run_failed', runId, error: state.error });
            throw state.error;
        }
      }
    } finally {
      derived.dispose();
    }
  }

  /**
   * awaiting_model: one model query, validated, then decide what comes next
   */
  private async queryModel(ctx: RunContext): Promise<LoopState> {
    if (ctx.signal.aborted) {
      return this.cancelled(ctx, 'model');
    }

    await ctx.logger.debug('Querying model', { round: ctx.toolRounds, messageCount: ctx.conversation.length });
    await this.emit(ctx, {
      type: 'model_queried',
      runId: ctx.runId,
      round: ctx.toolRounds,
      messageCount: ctx.conversation.length,
    });

    let response: unknown;
    try {
      response = await raceAbort(
        this.modelClient.complete([...ctx.conversation], ctx.tools, ctx.signal),
        ctx.signal,
      );
    } catch (error) {
      if (ctx.signal.aborted) {
        return this.cancelled(ctx, 'model');
      }
      return this.failed(ctx, 'model_request_failed', 'model', `Model request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const validation = validateModelResponse(response);
    if (!validation.success) {
      return this.failed(
        ctx,
        'model_request_failed',
        'model',
        `Model returned a malformed response: ${validation.errors.join('; ')}`,
        { details: { errors: validation.errors } },
      );
    }

    const message = validation.message;
    await this.emit(ctx, { type: 'model_responded', runId: ctx.runId, message: structuredClone(message) });

    const requests = pendingToolCalls(message);
    if (requests.length === 0) {
      ctx.conversation.push(message);
      return { status: 'done', finalMessage: message };
    }

    if (ctx.maxToolRounds !== undefined && ctx.toolRounds >= ctx.maxToolRounds) {
      return this.failed(
        ctx,
        'round_limit_exceeded',
        'model',
        `Tool round limit of ${ctx.maxToolRounds} exceeded`,
        { details: { maxToolRounds: ctx.maxToolRounds, rejectedMessage: message } },
      );
    }

    await ctx.logger.debug('Model requested tool calls', {
      callIds: requests.map(r => r.id),
      toolNames: requests.map(r => r.toolName),
    });
    ctx.conversation.push(message);
    return { status: 'awaiting_tools', requests };
  }

  /**
   * awaiting_tools: run the whole batch, append one result per request in
   * request order, then go back to the model
   */
  private async dispatchTools(ctx: RunContext, requests: ToolCallRequest[]): Promise<LoopState> {
    const round = ctx.toolRounds + 1;
    await this.emit(ctx, {
      type: 'tool_batch_dispatched',
      runId: ctx.runId,
      round,
      requests: structuredClone(requests),
    });

    let results: ToolCallResult[];
    try {
      results = await this.executor.execute(requests, ctx.signal);
    } catch (error) {
      await ctx.logger.error('Tool executor rejected the batch', error, { round });
      results = requests.map(request => this.syntheticFailure(ctx, request, `Tool executor failed: ${describeError(error)}`));
    }

    const byId = new Map(results.map(result => [result.callId, result]));
    const ordered: ToolCallResult[] = [];
    for (const request of requests) {
      const result = byId.get(request.id);
      if (result) {
        ordered.push(result);
      } else {
        await ctx.logger.warn('Tool executor returned no result for a call', {
          callId: request.id,
          toolName: request.toolName,
        });
        ordered.push(this.syntheticFailure(ctx, request, 'Tool executor returned no result for this call'));
      }
    }

    for (const result of ordered) {
      ctx.conversation.push(toolResultMessage(result));
    }
    ctx.toolRounds = round;

    await ctx.logger.debug('Tool batch completed', {
      round,
      failed: ordered.filter(r => !r.success).length,
      total: ordered.length,
    });
    await this.emit(ctx, {
      type: 'tool_batch_completed',
      runId: ctx.runId,
      round,
      results: structuredClone(ordered),
    });

    if (ctx.signal.aborted) {
      return this.cancelled(ctx, 'tools');
    }
    return { status: 'awaiting_model' };
  }

  private syntheticFailure(ctx: RunContext, request: ToolCallRequest, message: string): ToolCallResult {
    if (ctx.signal.aborted) {
      const reason = cancellationReason(ctx.signal);
      return {
        callId: request.id,
        toolName: request.toolName,
        success: false,
        error: { toolName: request.toolName, kind: 'cancelled', message: reason.message, details: { reason: reason.reason } },
      };
    }
    return {
      callId: request.id,
      toolName: request.toolName,
      success: false,
      error: { toolName: request.toolName, kind: 'execution_failed', message },
    };
  }

  private cancelled(ctx: RunContext, phase: OrchestrationPhase): LoopState {
    const reason = cancellationReason(ctx.signal);
    return this.failed(ctx, 'cancelled', phase, reason.message, { details: { reason: reason.reason }, cause: reason });
  }

  private failed(
    ctx: RunContext,
    kind: OrchestrationErrorKind,
    phase: OrchestrationPhase,
    message: string,
    extra: { details?: unknown; cause?: unknown } = {},
  ): LoopState {
    return {
      status: 'failed',
      error: new OrchestrationError({
        kind,
        phase,
        message,
        runId: ctx.runId,
        toolRounds: ctx.toolRounds,
        conversation: [...ctx.conversation],
        details: extra.details,
        cause: extra.cause,
      }),
    };
  }

  /**
   * Delivers an event to every listener in subscription order. A throwing
   * listener is logged and skipped; an async one is not awaited, and its
   * rejection is logged when it arrives.
   */
  private async emit(ctx: RunContext, event: LoopEvent): Promise<void> {
    for (const listener of Array.from(this.listeners)) {
      try {
        const returned = listener(event);
        if (returned instanceof Promise) {
          returned.catch((error: unknown) =>
            ctx.logger.error('Loop event listener threw', error, { eventType: event.type }),
          );
        }
      } catch (error) {
        await ctx.logger.error('Loop event listener threw', error, { eventType: event.type });
      }
    }
  }
}
