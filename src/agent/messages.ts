import type { ToolCallRequest, ToolCallResult } from '../tools/tool-call.js';

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
  /** Who produced the message, e.g. `user` or the name of another agent */
  source: string;
}

/**
 * A model turn. With a non-empty `toolCalls` it is a tool-call turn and the
 * loop will execute those calls; otherwise it is a final answer.
 */
export interface AssistantMessage {
  role: 'assistant';
  content: string;
  toolCalls?: ToolCallRequest[];
  source?: string;
}

export interface ToolResultMessage {
  role: 'tool';
  result: ToolCallResult;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolResultMessage;

export function systemMessage(content: string): SystemMessage {
  return { role: 'system', content };
}

export function userMessage(content: string, source = 'user'): UserMessage {
  return { role: 'user', content, source };
}

export function assistantMessage(content: string): AssistantMessage {
  return { role: 'assistant', content };
}

export function toolCallMessage(toolCalls: ToolCallRequest[], content = ''): AssistantMessage {
  return { role: 'assistant', content, toolCalls };
}

export function toolResultMessage(result: ToolCallResult): ToolResultMessage {
  return { role: 'tool', result };
}

/**
 * Tool calls requested by an assistant turn; empty for a final answer
 */
export function pendingToolCalls(message: AssistantMessage): ToolCallRequest[] {
  return message.toolCalls ?? [];
}

export function isToolCallTurn(message: Message): message is AssistantMessage & { toolCalls: ToolCallRequest[] } {
  return message.role === 'assistant' && (message.toolCalls?.length ?? 0) > 0;
}
