import { cancellationReason } from '../cancellation/cancellation.js';
import type { ToolSchema } from '../tools/tool.js';
import type { AssistantMessage, Message } from './messages.js';
import type { ModelClient } from './model-client.js';

/**
 * One scripted model turn: a fixed reply, or a function of the conversation
 * the model is being shown
 */
export type ScriptStep =
  | AssistantMessage
  | ((messages: readonly Message[], tools: readonly ToolSchema[], signal: AbortSignal) => AssistantMessage | Promise<AssistantMessage>);

/**
 * A request the scripted model received
 */
export interface RecordedRequest {
  messages: Message[];
  tools: ToolSchema[];
}

/**
 * ScriptedModelClient - Replays a fixed sequence of assistant turns
 *
 * Used to drive the loop without a real model: in tests, and by the CLI to
 * replay a recorded exchange. Throws once the script runs out.
 */
export class ScriptedModelClient implements ModelClient {
  private steps: ScriptStep[];
  private position = 0;
  private recorded: RecordedRequest[] = [];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  /**
   * Requests received so far, each with a snapshot of the conversation
   */
  get calls(): readonly RecordedRequest[] {
    return this.recorded;
  }

  get remaining(): number {
    return this.steps.length - this.position;
  }

  async complete(
    messages: readonly Message[],
    tools: readonly ToolSchema[],
    signal: AbortSignal,
  ): Promise<AssistantMessage> {
    if (signal.aborted) {
      throw cancellationReason(signal);
    }

    this.recorded.push({ messages: [...messages], tools: [...tools] });

    const step = this.steps[this.position];
    if (step === undefined) {
      throw new Error(`Scripted model has no response left (received ${this.recorded.length} requests)`);
    }
    this.position++;

    return typeof step === 'function' ? step(messages, tools, signal) : step;
  }
}
