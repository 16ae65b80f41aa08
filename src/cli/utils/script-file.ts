import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import type { AssistantMessage } from '../../agent/messages.js';
import { AssistantMessageSchema } from '../../agent/model-client.js';

const ScriptedResponseSchema = z
  .object({
    content: z.string().default(''),
    toolCalls: z
      .array(
        z.object({
          id: z.string().min(1, 'tool call id must not be empty'),
          toolName: z.string().min(1, 'tool name must not be empty'),
          arguments: z.union([z.string(), z.record(z.unknown())]).default({}),
        }),
      )
      .optional(),
  })
  .transform((response): AssistantMessage => ({ role: 'assistant', ...response }))
  .pipe(AssistantMessageSchema);

/**
 * A recorded exchange for `toolloop run`: the system prompt, the user's
 * input and the model turns to replay, in order
 */
export const ScriptFileSchema = z.object({
  system: z.array(z.string()).default([]),
  input: z.string().min(1, 'input must not be empty'),
  responses: z.array(ScriptedResponseSchema).min(1, 'script needs at least one response'),
});

export type ScriptFile = z.output<typeof ScriptFileSchema>;

export type ScriptLoadResult =
  | { success: true; script: ScriptFile }
  | { success: false; errors: string[] };

/**
 * Validates already-parsed script content
 */
export function parseScript(content: unknown): ScriptLoadResult {
  const result = ScriptFileSchema.safeParse(content);
  if (result.success) {
    return { success: true, script: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}

/**
 * Reads and validates a script file
 */
export async function loadScript(path: string): Promise<ScriptLoadResult> {
  let content: unknown;
  try {
    content = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    return {
      success: false,
      errors: [`Failed to read script ${path}: ${error instanceof Error ? error.message : String(error)}`],
    };
  }
  return parseScript(content);
}
