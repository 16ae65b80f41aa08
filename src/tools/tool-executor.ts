import { CancelledError, cancellationReason, deriveSignal, raceAbort } from '../cancellation/cancellation.js';
import { Logger } from '../logging/logger.js';
import { parseArguments, type ToolCallRequest, type ToolCallResult } from './tool-call.js';
import { ToolFailure, type ToolError, type ToolErrorKind } from './tool-errors.js';
import type { ToolRegistry } from './tool-registry.js';

/**
 * Executes one batch of tool calls. Must produce exactly one result per
 * request, matched by id, and must never call the model.
 */
export interface ToolExecutor {
  execute(requests: readonly ToolCallRequest[], signal: AbortSignal): Promise<ToolCallResult[]>;
}

export interface ToolExecutorConfig {
  /** Per-call timeout, applied as a cancellation derived from the batch signal */
  toolTimeoutMs?: number;
}

/**
 * RegistryToolExecutor - Runs every call of a batch concurrently against a registry
 *
 * Failures stay local to their request: an unknown tool, bad arguments, a
 * throwing tool or a cancelled call each become an error result while the
 * rest of the batch carries on. Results come back in request order.
 */
export class RegistryToolExecutor implements ToolExecutor {
  private registry: ToolRegistry;
  private config: ToolExecutorConfig;
  private logger: Logger;

  constructor(registry: ToolRegistry, config: ToolExecutorConfig = {}, logger?: Logger) {
    this.registry = registry;
    this.config = { ...config };
    this.logger = (logger ?? Logger.silent()).child({ component: 'tool-executor' });
  }

  getConfig(): ToolExecutorConfig {
    return { ...this.config };
  }

  async execute(requests: readonly ToolCallRequest[], signal: AbortSignal): Promise<ToolCallResult[]> {
    await this.logger.debug('Executing tool batch', {
      callIds: requests.map(r => r.id),
      toolNames: requests.map(r => r.toolName),
    });

    return Promise.all(requests.map(request => this.executeOne(request, signal)));
  }

  /**
   * Runs a single call. Never rejects.
   */
  private async executeOne(request: ToolCallRequest, batchSignal: AbortSignal): Promise<ToolCallResult> {
    const tool = this.registry.get(request.toolName);
    if (!tool) {
      return this.fail(request, 'unknown_tool', `Tool '${request.toolName}' is not registered`);
    }

    const parsed = parseArguments(request.arguments);
    if (!parsed.ok) {
      return this.fail(request, 'invalid_arguments', parsed.message);
    }

    const derived = deriveSignal(batchSignal, this.config.toolTimeoutMs);
    try {
      if (derived.signal.aborted) {
        throw cancellationReason(derived.signal);
      }
      const value = await raceAbort(tool.run(parsed.args, derived.signal), derived.signal);
      return {
        callId: request.id,
        toolName: request.toolName,
        success: true,
        output: tool.returnValueAsString(value),
      };
    } catch (error) {
      const { kind, message, details } = this.classify(error, derived.signal);
      return this.fail(request, kind, message, details);
    } finally {
      derived.dispose();
    }
  }

  private classify(error: unknown, signal: AbortSignal): Omit<ToolError, 'toolName'> {
    if (error instanceof ToolFailure) {
      return { kind: error.kind, message: error.message, details: error.details };
    }
    if (error instanceof CancelledError) {
      return { kind: 'cancelled', message: error.message, details: { reason: error.reason } };
    }
    if (signal.aborted) {
      const reason = cancellationReason(signal);
      return { kind: 'cancelled', message: reason.message, details: { reason: reason.reason } };
    }
    return {
      kind: 'execution_failed',
      message: error instanceof Error ? error.message : String(error),
      details: error instanceof Error ? { stack: error.stack } : undefined,
    };
  }

  private async fail(
    request: ToolCallRequest,
    kind: ToolErrorKind,
    message: string,
    details?: unknown,
  ): Promise<ToolCallResult> {
    const error: ToolError = { toolName: request.toolName, kind, message };
    if (details !== undefined) {
      error.details = details;
    }

    await this.logger.warn('Tool execution failed', {
      callId: request.id,
      toolName: request.toolName,
      kind,
      message,
    });

    return { callId: request.id, toolName: request.toolName, success: false, error };
  }
}
