import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { OrchestrationLoop, ScriptedModelClient, assistantMessage, toolCallMessage, userMessage } from '../../src/agent/index.js';
import { sleep } from '../../src/cancellation/cancellation.js';
import {
  defineTool,
  RegistryToolExecutor,
  ToolRegistry,
  type ToolCallRequest,
  type ToolErrorKind,
} from '../../src/tools/index.js';

/**
 * Property-based tests for batch execution: one result per request, in
 * request order, whatever the tools do and however long they take
 */

const DELAYED = defineTool<number>(
  {
    name: 'delayed',
    description: 'Resolves with its delay after waiting that long',
    parameters: {
      type: 'object',
      properties: { ms: { type: 'integer' } },
      required: ['ms'],
    },
  },
  async (args, signal) => {
    const ms = Number(args.ms);
    await sleep(ms, signal);
    return ms;
  },
);

const FAILING = defineTool(
  { name: 'failing', description: 'Always throws', parameters: { type: 'object', properties: {} } },
  async () => {
    throw new Error('tool broke');
  },
);

type CallKind = 'ok' | 'unknown' | 'invalid' | 'throws';

const EXPECTED_ERROR: Record<Exclude<CallKind, 'ok'>, ToolErrorKind> = {
  unknown: 'unknown_tool',
  invalid: 'invalid_arguments',
  throws: 'execution_failed',
};

const callArb = fc.record({
  kind: fc.constantFrom<CallKind>('ok', 'unknown', 'invalid', 'throws'),
  delay: fc.integer({ min: 0, max: 15 }),
});

const batchArb = fc.array(callArb, { minLength: 1, maxLength: 8 });

function toRequests(batch: { kind: CallKind; delay: number }[]): ToolCallRequest[] {
  return batch.map(({ kind, delay }, i) => {
    const id = `call_${i}`;
    switch (kind) {
      case 'ok':
        return { id, toolName: 'delayed', arguments: { ms: delay } };
      case 'unknown':
        return { id, toolName: 'not_registered', arguments: {} };
      case 'invalid':
        return { id, toolName: 'delayed', arguments: { ms: 'soon' } };
      case 'throws':
        return { id, toolName: 'failing', arguments: {} };
    }
  });
}

describe('Tool result properties', () => {
  const registry = new ToolRegistry([DELAYED, FAILING]);
  const executor = new RegistryToolExecutor(registry);

  it('executor returns exactly one result per request, in request order', async () => {
    await fc.assert(
      fc.asyncProperty(batchArb, async (batch) => {
        const requests = toRequests(batch);
        const results = await executor.execute(requests, new AbortController().signal);

        expect(results.map(r => r.callId)).toEqual(requests.map(r => r.id));
        batch.forEach(({ kind, delay }, i) => {
          const result = results[i];
          if (kind === 'ok') {
            expect(result).toEqual({ callId: `call_${i}`, toolName: 'delayed', success: true, output: String(delay) });
          } else {
            expect(result?.success).toBe(false);
            expect(result?.success === false && result.error.kind).toBe(EXPECTED_ERROR[kind]);
          }
        });
      }),
      { numRuns: 40 },
    );
  });

  it('loop appends one tool message per request in request order before querying again', async () => {
    await fc.assert(
      fc.asyncProperty(batchArb, async (batch) => {
        const requests = toRequests(batch);
        const model = new ScriptedModelClient([toolCallMessage(requests), assistantMessage('done')]);
        const loop = new OrchestrationLoop(model, executor);

        const result = await loop.run({ input: userMessage('go'), tools: registry.schemas() });

        const secondQuery = model.calls[1]?.messages ?? [];
        const toolMessages = secondQuery.filter(m => m.role === 'tool');
        expect(toolMessages).toHaveLength(requests.length);
        expect(toolMessages.map(m => (m.role === 'tool' ? m.result.callId : ''))).toEqual(requests.map(r => r.id));
        expect(result.conversation).toHaveLength(2 + requests.length + 1);
        expect(result.toolRounds).toBe(1);
      }),
      { numRuns: 30 },
    );
  });

  it('a cancelled batch still yields one result per request', async () => {
    await fc.assert(
      fc.asyncProperty(batchArb, async (batch) => {
        const requests = toRequests(batch);
        const controller = new AbortController();
        controller.abort();

        const results = await executor.execute(requests, controller.signal);

        expect(results.map(r => r.callId)).toEqual(requests.map(r => r.id));
        batch.forEach(({ kind }, i) => {
          const result = results[i];
          // Lookup happens before the signal is checked; argument validation after
          const expected: ToolErrorKind = kind === 'unknown' ? 'unknown_tool' : 'cancelled';
          expect(result?.success === false && result.error.kind).toBe(expected);
        });
      }),
      { numRuns: 40 },
    );
  });
});
