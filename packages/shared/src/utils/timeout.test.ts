import { describe, it, expect } from 'vitest';
import { withTimeout } from './timeout.js';
import { ModalityTimeoutError } from './errors.js';

describe('withTimeout', () => {
  it('should resolve with the operation result when it finishes in time', async () => {
    const result = await withTimeout('fast', 1000, () => Promise.resolve(42));
    expect(result).toBe(42);
  });

  it('should propagate the operation error unchanged', async () => {
    const failure = new Error('model crashed');
    await expect(withTimeout('failing', 1000, () => Promise.reject(failure))).rejects.toBe(failure);
  });

  it('should reject with ModalityTimeoutError and abort the signal when time runs out', async () => {
    let seenSignal: AbortSignal | undefined;

    const pending = withTimeout('slow', 20, (signal) => {
      seenSignal = signal;
      return new Promise<never>(() => undefined);
    });

    await expect(pending).rejects.toThrow(ModalityTimeoutError);
    await expect(pending).rejects.toThrow('slow timed out after 20ms');
    expect(seenSignal?.aborted).toBe(true);
    expect(seenSignal?.reason).toBeInstanceOf(ModalityTimeoutError);
  });
});
