import { describe, it, expect, beforeEach } from 'vitest';
import { sleep } from '../cancellation/cancellation.js';
import { RegistryToolExecutor } from './tool-executor.js';
import { ToolRegistry } from './tool-registry.js';
import { defineTool, type Tool } from './tool.js';
import { ToolFailure } from './tool-errors.js';
import type { ToolCallRequest, ToolCallResult } from './tool-call.js';

function delayedEcho(name: string, started: string[], finished: string[]): Tool {
  return defineTool(
    {
      name,
      description: 'Echo after a delay',
      parameters: {
        type: 'object',
        properties: { text: { type: 'string' }, delayMs: { type: 'integer' } },
        required: ['text'],
      },
    },
    async (args, signal) => {
      const text = String(args.text);
      started.push(text);
      await sleep(typeof args.delayMs === 'number' ? args.delayMs : 0, signal);
      finished.push(text);
      return text;
    },
  );
}

/** Never settles and never looks at its signal */
const STUCK_TOOL = defineTool(
  { name: 'stuck', description: 'Hangs', parameters: { type: 'object', properties: {} } },
  () => new Promise<string>(() => undefined),
);

const THROWING_TOOL = defineTool(
  { name: 'explode', description: 'Throws', parameters: { type: 'object', properties: {} } },
  async () => {
    throw new Error('Handler failed');
  },
);

const FAILURE_TOOL = defineTool(
  { name: 'refuse', description: 'Reports a typed failure', parameters: { type: 'object', properties: {} } },
  async () => {
    throw new ToolFailure('invalid_arguments', 'Date must not be in the future', { field: 'date' });
  },
);

const BAD_RENDER_TOOL = defineTool(
  { name: 'bad_render', description: 'Cannot render', parameters: { type: 'object', properties: {} } },
  async () => 1,
  {
    render: () => {
      throw new Error('cannot render');
    },
  },
);

function errorKinds(results: ToolCallResult[]): Array<string | undefined> {
  return results.map(r => (r.success ? undefined : r.error.kind));
}

describe('RegistryToolExecutor', () => {
  let started: string[];
  let finished: string[];
  let registry: ToolRegistry;
  let executor: RegistryToolExecutor;

  beforeEach(() => {
    started = [];
    finished = [];
    registry = new ToolRegistry([
      delayedEcho('echo', started, finished),
      STUCK_TOOL,
      THROWING_TOOL,
      FAILURE_TOOL,
      BAD_RENDER_TOOL,
    ]);
    executor = new RegistryToolExecutor(registry);
  });

  it('should return an empty list for an empty batch', async () => {
    await expect(executor.execute([], new AbortController().signal)).resolves.toEqual([]);
  });

  it('should execute a tool and return its rendered output', async () => {
    const results = await executor.execute(
      [{ id: 'call-1', toolName: 'echo', arguments: { text: 'hello' } }],
      new AbortController().signal,
    );

    expect(results).toEqual([{ callId: 'call-1', toolName: 'echo', success: true, output: 'hello' }]);
  });

  it('should parse raw JSON arguments', async () => {
    const results = await executor.execute(
      [{ id: 'call-1', toolName: 'echo', arguments: '{"text":"from json"}' }],
      new AbortController().signal,
    );

    expect(results[0]).toEqual({ callId: 'call-1', toolName: 'echo', success: true, output: 'from json' });
  });

  it('should report an unknown tool without running anything', async () => {
    const results = await executor.execute(
      [{ id: 'call-1', toolName: 'missing', arguments: {} }],
      new AbortController().signal,
    );

    expect(results).toEqual([
      {
        callId: 'call-1',
        toolName: 'missing',
        success: false,
        error: { toolName: 'missing', kind: 'unknown_tool', message: "Tool 'missing' is not registered" },
      },
    ]);
  });

  it('should report schema violations as invalid_arguments', async () => {
    const [result] = await executor.execute(
      [{ id: 'call-1', toolName: 'echo', arguments: { text: 5 } }],
      new AbortController().signal,
    );

    expect(result).toEqual({
      callId: 'call-1',
      toolName: 'echo',
      success: false,
      error: {
        toolName: 'echo',
        kind: 'invalid_arguments',
        message: "Parameter validation failed: Parameter 'text' must be of type 'string', got 'number'",
        details: ["Parameter 'text' must be of type 'string', got 'number'"],
      },
    });
    expect(started).toEqual([]);
  });

  it('should report malformed JSON arguments as invalid_arguments', async () => {
    const [result] = await executor.execute(
      [{ id: 'call-1', toolName: 'echo', arguments: '{"text": ' }],
      new AbortController().signal,
    );

    expect(result?.success).toBe(false);
    expect(result && !result.success ? result.error.kind : undefined).toBe('invalid_arguments');
  });

  it('should report a throwing tool as execution_failed', async () => {
    const [result] = await executor.execute(
      [{ id: 'call-1', toolName: 'explode', arguments: {} }],
      new AbortController().signal,
    );

    expect(result).toMatchObject({
      success: false,
      error: { toolName: 'explode', kind: 'execution_failed', message: 'Handler failed' },
    });
  });

  it('should keep the kind of a ToolFailure', async () => {
    const [result] = await executor.execute(
      [{ id: 'call-1', toolName: 'refuse', arguments: {} }],
      new AbortController().signal,
    );

    expect(result).toEqual({
      callId: 'call-1',
      toolName: 'refuse',
      success: false,
      error: {
        toolName: 'refuse',
        kind: 'invalid_arguments',
        message: 'Date must not be in the future',
        details: { field: 'date' },
      },
    });
  });

  it('should report a rendering failure as execution_failed', async () => {
    const [result] = await executor.execute(
      [{ id: 'call-1', toolName: 'bad_render', arguments: {} }],
      new AbortController().signal,
    );

    expect(result).toMatchObject({ success: false, error: { kind: 'execution_failed', message: 'cannot render' } });
  });

  it('should isolate failures within a batch', async () => {
    const requests: ToolCallRequest[] = [
      { id: 'a', toolName: 'echo', arguments: { wrong: true } },
      { id: 'b', toolName: 'missing', arguments: {} },
      { id: 'c', toolName: 'echo', arguments: { text: 'fine' } },
      { id: 'd', toolName: 'explode', arguments: {} },
    ];

    const results = await executor.execute(requests, new AbortController().signal);

    expect(results.map(r => r.callId)).toEqual(['a', 'b', 'c', 'd']);
    expect(errorKinds(results)).toEqual(['invalid_arguments', 'unknown_tool', undefined, 'execution_failed']);
    expect(results[2]).toEqual({ callId: 'c', toolName: 'echo', success: true, output: 'fine' });
  });

  it('should run calls concurrently and return them in request order', async () => {
    const requests: ToolCallRequest[] = [
      { id: 'slow', toolName: 'echo', arguments: { text: 'slow', delayMs: 60 } },
      { id: 'fast', toolName: 'echo', arguments: { text: 'fast', delayMs: 5 } },
    ];

    const results = await executor.execute(requests, new AbortController().signal);

    expect(started).toEqual(['slow', 'fast']);
    expect(finished).toEqual(['fast', 'slow']);
    expect(results.map(r => r.callId)).toEqual(['slow', 'fast']);
  });

  it('should cancel every unresolved call when the batch signal aborts', async () => {
    const controller = new AbortController();
    const requests: ToolCallRequest[] = [
      { id: 'quick', toolName: 'echo', arguments: { text: 'quick' } },
      { id: 'hang', toolName: 'stuck', arguments: {} },
      { id: 'long', toolName: 'echo', arguments: { text: 'long', delayMs: 10000 } },
    ];

    const pending = executor.execute(requests, controller.signal);
    await sleep(20);
    controller.abort();
    const results = await pending;

    expect(errorKinds(results)).toEqual([undefined, 'cancelled', 'cancelled']);
    expect(results[1]).toEqual({
      callId: 'hang',
      toolName: 'stuck',
      success: false,
      error: {
        toolName: 'stuck',
        kind: 'cancelled',
        message: 'Operation was cancelled',
        details: { reason: 'aborted' },
      },
    });
  });

  it('should not start tools when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const results = await executor.execute(
      [{ id: 'x', toolName: 'echo', arguments: { text: 'never' } }],
      controller.signal,
    );

    expect(errorKinds(results)).toEqual(['cancelled']);
    expect(started).toEqual([]);
  });

  it('should apply the per-call timeout as a cancellation', async () => {
    const timed = new RegistryToolExecutor(registry, { toolTimeoutMs: 20 });

    const results = await timed.execute(
      [
        { id: 'hang', toolName: 'stuck', arguments: {} },
        { id: 'ok', toolName: 'echo', arguments: { text: 'ok' } },
      ],
      new AbortController().signal,
    );

    expect(results[0]).toMatchObject({
      success: false,
      error: { kind: 'cancelled', message: 'Timed out after 20ms', details: { reason: 'timeout' } },
    });
    expect(results[1]).toMatchObject({ success: true, output: 'ok' });
    expect(timed.getConfig()).toEqual({ toolTimeoutMs: 20 });
  });
});
