import { z } from 'zod';
import type { ToolSchema } from '../tools/tool.js';
import type { AssistantMessage, Message } from './messages.js';

/**
 * The language model behind the loop. Given the conversation so far and the
 * tools on offer, returns either a final answer or a set of tool calls.
 * Retry policy, if any, belongs to the implementation.
 */
export interface ModelClient {
  complete(
    messages: readonly Message[],
    tools: readonly ToolSchema[],
    signal: AbortSignal,
  ): Promise<AssistantMessage>;
}

const ToolCallRequestSchema = z.object({
  id: z.string().min(1, 'tool call id must not be empty'),
  toolName: z.string().min(1, 'tool name must not be empty'),
  arguments: z.union([z.string(), z.record(z.unknown())]),
});

/**
 * Shape every model response must have before the loop will act on it
 */
export const AssistantMessageSchema = z
  .object({
    role: z.literal('assistant'),
    content: z.string(),
    toolCalls: z.array(ToolCallRequestSchema).optional(),
    source: z.string().optional(),
  })
  .superRefine((message, ctx) => {
    const seen = new Set<string>();
    message.toolCalls?.forEach((call, index) => {
      if (seen.has(call.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['toolCalls', index, 'id'],
          message: `duplicate tool call id '${call.id}'`,
        });
      }
      seen.add(call.id);
    });
  });

export type ResponseValidationResult =
  | { success: true; message: AssistantMessage }
  | { success: false; errors: string[] };

/**
 * Checks a model response against {@link AssistantMessageSchema}
 */
export function validateModelResponse(response: unknown): ResponseValidationResult {
  const result = AssistantMessageSchema.safeParse(response);
  if (result.success) {
    return { success: true, message: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}
