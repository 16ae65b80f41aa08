/**
 * Transcript rendering for terminal output, and JSON-lines serialization for
 * saved runs
 */

import { writeFile } from 'node:fs/promises';
import type { Message } from '../../agent/messages.js';
import { renderToolResult } from '../../tools/tool-call.js';

// ANSI escape codes for terminal formatting
const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const MAGENTA = '\x1b[35m';
const RED = '\x1b[31m';
const GRAY = '\x1b[90m';

export interface TranscriptFormatOptions {
  /** Emit ANSI colors (default true) */
  color?: boolean;
}

function painter(options: TranscriptFormatOptions): (code: string, text: string) => string {
  const color = options.color ?? true;
  return (code, text) => (color ? `${code}${text}${RESET}` : text);
}

/**
 * Formats one message as one or more lines
 */
export function formatMessage(message: Message, options: TranscriptFormatOptions = {}): string {
  const paint = painter(options);

  switch (message.role) {
    case 'system':
      return `${paint(GRAY, '[system]')} ${message.content}`;

    case 'user': {
      const label = message.source === 'user' ? '[user]' : `[user:${message.source}]`;
      return `${paint(BOLD, label)} ${message.content}`;
    }

    case 'assistant': {
      const header = message.content
        ? `${paint(CYAN, '[assistant]')} ${message.content}`
        : paint(CYAN, '[assistant]');
      const calls = (message.toolCalls ?? []).map((call) => {
        const args = typeof call.arguments === 'string' ? call.arguments : JSON.stringify(call.arguments);
        return `  -> ${paint(MAGENTA, call.toolName)}(${args}) ${paint(GRAY, `[${call.id}]`)}`;
      });
      return [header, ...calls].join('\n');
    }

    case 'tool': {
      const { result } = message;
      const label = `[tool ${result.toolName} ${result.callId}]`;
      return `${paint(result.success ? GREEN : RED, label)} ${renderToolResult(result)}`;
    }
  }
}

/**
 * Formats a whole conversation, one message after another
 */
export function formatTranscript(messages: readonly Message[], options: TranscriptFormatOptions = {}): string {
  return messages.map((message) => formatMessage(message, options)).join('\n');
}

/**
 * One JSON object per message, each tagged with the run it belongs to
 */
export function serializeTranscript(runId: string, messages: readonly Message[]): string {
  return messages.map((message) => JSON.stringify({ runId, ...message })).join('\n') + '\n';
}

export async function saveTranscript(path: string, runId: string, messages: readonly Message[]): Promise<void> {
  await writeFile(path, serializeTranscript(runId, messages), { mode: 0o600 });
}
