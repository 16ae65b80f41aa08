import { sleep } from '../cancellation/cancellation.js';
import { defineTool, type Tool } from './tool.js';
import { ToolFailure } from './tool-errors.js';
import { ToolRegistry } from './tool-registry.js';

/**
 * Returns its input text
 */
export const ECHO_TOOL = defineTool<string>(
  {
    name: 'echo',
    description: 'Return the given text unchanged',
    parameters: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to return' },
      },
      required: ['text'],
      additionalProperties: false,
    },
  },
  async (args) => String(args.text),
);

export const ADD_NUMBERS_TOOL = defineTool<number>(
  {
    name: 'add_numbers',
    description: 'Add a list of numbers and return the sum',
    parameters: {
      type: 'object',
      properties: {
        numbers: {
          type: 'array',
          description: 'Numbers to add',
          items: { type: 'number' },
        },
      },
      required: ['numbers'],
      additionalProperties: false,
    },
  },
  async (args) => {
    const numbers = Array.isArray(args.numbers) ? args.numbers : [];
    return numbers.reduce((sum: number, n: unknown) => sum + (typeof n === 'number' ? n : 0), 0);
  },
);

export const CURRENT_TIME_TOOL = defineTool<Date>(
  {
    name: 'current_time',
    description: 'Return the current time as an ISO 8601 string',
    parameters: { type: 'object', properties: {}, additionalProperties: false },
  },
  async () => new Date(),
  { render: (date) => date.toISOString() },
);

/**
 * Waits for `ms` milliseconds. Observes cancellation.
 */
export const SLEEP_TOOL = defineTool<string>(
  {
    name: 'sleep',
    description: 'Wait for the given number of milliseconds (at most 60000)',
    parameters: {
      type: 'object',
      properties: {
        ms: { type: 'integer', description: 'Milliseconds to wait' },
      },
      required: ['ms'],
      additionalProperties: false,
    },
  },
  async (args, signal) => {
    const ms = typeof args.ms === 'number' ? args.ms : 0;
    if (ms < 0 || ms > 60000) {
      throw new ToolFailure('invalid_arguments', `Parameter 'ms' must be between 0 and 60000, got ${ms}`);
    }
    await sleep(ms, signal);
    return `Slept for ${ms}ms`;
  },
);

export const BUILTIN_TOOLS: readonly Tool[] = [ECHO_TOOL, ADD_NUMBERS_TOOL, CURRENT_TIME_TOOL, SLEEP_TOOL];

/**
 * Registry preloaded with the built-in tools
 */
export function createBuiltinRegistry(): ToolRegistry {
  return new ToolRegistry(BUILTIN_TOOLS);
}
