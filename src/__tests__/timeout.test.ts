import { describe, it, expect, vi } from 'vitest';
import { isTimeoutError, withTimeout } from '../http/timeout.js';
import { AppError } from '../errors/AppError.js';

function abortAwareOperation(signal: AbortSignal): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const timeoutId = setTimeout(() => resolve('too late'), 200);
    signal.addEventListener('abort', () => {
      clearTimeout(timeoutId);
      const error = new Error('Aborted');
      error.name = 'AbortError';
      reject(error);
    });
  });
}

describe('withTimeout', () => {
  it('resolves when the function completes in time', async () => {
    await expect(withTimeout(async () => 'success', 1000, 'test operation')).resolves.toBe('success');
  });

  it('passes a live AbortSignal to the function', async () => {
    let receivedSignal: AbortSignal | undefined;

    await withTimeout(async (signal) => {
      receivedSignal = signal;
      return 'done';
    }, 1000, 'test operation');

    expect(receivedSignal?.aborted).toBe(false);
  });

  it('throws a TIMEOUT AppError carrying the label and limit', async () => {
    await expect(withTimeout(abortAwareOperation, 50, 'add_to_cart')).rejects.toMatchObject({
      category: 'TIMEOUT',
      code: 'TIMEOUT_REQUEST',
      httpStatus: 504,
      details: { operation: 'add_to_cart', timeoutMs: 50 },
    });
  });

  it('times out operations that ignore the signal', async () => {
    const error = await withTimeout(() => new Promise<string>(() => {}), 20, 'stuck').catch((e: unknown) => e);

    expect(isTimeoutError(error)).toBe(true);
  });

  it('re-throws other errors as they are', async () => {
    await expect(withTimeout(async () => {
      throw new Error('Custom error');
    }, 1000, 'failing operation')).rejects.toThrow('Custom error');
  });

  it('clears the timer once the function settles', async () => {
    const clearTimeoutSpy = vi.spyOn(global, 'clearTimeout');

    await withTimeout(async () => 'success', 1000, 'test operation');

    expect(clearTimeoutSpy).toHaveBeenCalled();
    clearTimeoutSpy.mockRestore();
  });
});

describe('isTimeoutError', () => {
  it('recognises timeout AppErrors only', () => {
    expect(isTimeoutError(AppError.timeout('x', 1))).toBe(true);
    expect(isTimeoutError(AppError.openaiTimeout())).toBe(true);
    expect(isTimeoutError(AppError.database('down'))).toBe(false);
    expect(isTimeoutError(new Error('timeout'))).toBe(false);
  });
});
