import { describe, it, expect } from 'vitest';
import { CancelledError, cancellationReason, deriveSignal, raceAbort, sleep } from './cancellation.js';

describe('cancellation', () => {
  describe('cancellationReason', () => {
    it('should return an existing CancelledError unchanged', () => {
      const controller = new AbortController();
      const reason = new CancelledError('timeout', 'too slow');
      controller.abort(reason);

      expect(cancellationReason(controller.signal)).toBe(reason);
    });

    it('should wrap a plain Error reason and keep its message', () => {
      const controller = new AbortController();
      controller.abort(new Error('user pressed stop'));

      const reason = cancellationReason(controller.signal);
      expect(reason).toBeInstanceOf(CancelledError);
      expect(reason.reason).toBe('aborted');
      expect(reason.message).toBe('user pressed stop');
    });

    it('should use the default message for a bare abort', () => {
      const controller = new AbortController();
      controller.abort();

      expect(cancellationReason(controller.signal).message).toBe('Operation was cancelled');
    });
  });

  describe('deriveSignal', () => {
    it('should abort when the parent aborts', () => {
      const parent = new AbortController();
      const derived = deriveSignal(parent.signal);

      expect(derived.signal.aborted).toBe(false);
      parent.abort();
      expect(derived.signal.aborted).toBe(true);
      expect(cancellationReason(derived.signal).reason).toBe('aborted');
      derived.dispose();
    });

    it('should start aborted when the parent is already aborted', () => {
      const parent = new AbortController();
      parent.abort();

      const derived = deriveSignal(parent.signal, 1000);
      expect(derived.signal.aborted).toBe(true);
      derived.dispose();
    });

    it('should abort with a timeout reason after timeoutMs', async () => {
      const derived = deriveSignal(undefined, 10);

      await sleep(40);

      expect(derived.signal.aborted).toBe(true);
      const reason = cancellationReason(derived.signal);
      expect(reason.reason).toBe('timeout');
      expect(reason.message).toBe('Timed out after 10ms');
    });

    it('should not fire the timeout after dispose', async () => {
      const derived = deriveSignal(undefined, 10);
      derived.dispose();

      await sleep(40);

      expect(derived.signal.aborted).toBe(false);
    });

    it('should stop following the parent after dispose', () => {
      const parent = new AbortController();
      const derived = deriveSignal(parent.signal);
      derived.dispose();

      parent.abort();
      expect(derived.signal.aborted).toBe(false);
    });
  });

  describe('raceAbort', () => {
    it('should resolve with the promise value when not aborted', async () => {
      const controller = new AbortController();
      await expect(raceAbort(Promise.resolve(42), controller.signal)).resolves.toBe(42);
    });

    it('should pass through the promise rejection', async () => {
      const controller = new AbortController();
      await expect(raceAbort(Promise.reject(new Error('boom')), controller.signal)).rejects.toThrow('boom');
    });

    it('should reject as soon as the signal aborts, even if the promise never settles', async () => {
      const controller = new AbortController();
      const pending = raceAbort(new Promise<never>(() => undefined), controller.signal);

      controller.abort(new CancelledError('aborted', 'stop'));

      await expect(pending).rejects.toThrow('stop');
    });

    it('should reject immediately for an already-aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toBeInstanceOf(CancelledError);
    });
  });

  describe('sleep', () => {
    it('should reject with the cancellation reason when aborted', async () => {
      const controller = new AbortController();
      const pending = sleep(10000, controller.signal);

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });
  });
});
