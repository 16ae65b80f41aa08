import { describe, it, expect } from 'vitest';
import { ScriptedModelClient } from './scripted-model-client.js';
import { assistantMessage, userMessage, type Message } from './messages.js';
import { CancelledError } from '../cancellation/cancellation.js';

describe('ScriptedModelClient', () => {
  const signal = new AbortController().signal;

  it('should replay steps in order', async () => {
    const model = new ScriptedModelClient([assistantMessage('one'), assistantMessage('two')]);

    await expect(model.complete([], [], signal)).resolves.toEqual(assistantMessage('one'));
    await expect(model.complete([], [], signal)).resolves.toEqual(assistantMessage('two'));
    expect(model.remaining).toBe(0);
  });

  it('should call function steps with the conversation', async () => {
    const model = new ScriptedModelClient([
      (messages) => assistantMessage(`saw ${messages.length} messages`),
    ]);

    await expect(model.complete([userMessage('a'), userMessage('b')], [], signal)).resolves.toEqual(
      assistantMessage('saw 2 messages'),
    );
  });

  it('should record a snapshot of each request', async () => {
    const model = new ScriptedModelClient([assistantMessage('ok')]);
    const conversation: Message[] = [userMessage('hi')];

    await model.complete(conversation, [], signal);
    conversation.push(userMessage('later'));

    expect(model.calls).toEqual([{ messages: [userMessage('hi')], tools: [] }]);
  });

  it('should throw when the script is exhausted', async () => {
    const model = new ScriptedModelClient([]);

    await expect(model.complete([], [], signal)).rejects.toThrow(
      'Scripted model has no response left (received 1 requests)',
    );
  });

  it('should refuse to answer on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const model = new ScriptedModelClient([assistantMessage('never')]);

    await expect(model.complete([], [], controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(model.remaining).toBe(1);
  });
});
