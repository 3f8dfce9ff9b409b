import { describe, expect, it } from 'vitest';
import { sleep, waitUntil, withTimeout } from '../src/utils/wait';

describe('waitUntil', () => {
  it('resolves with the first truthy value', async () => {
    let calls = 0;
    const result = await waitUntil(() => (++calls >= 3 ? 'ready' : undefined), { timeoutMs: 1000, intervalMs: 1 });

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value).toBe('ready');
    expect(calls).toBe(3);
  });

  it('treats predicate errors as not ready and times out', async () => {
    const result = await waitUntil(
      () => {
        throw new Error('not attached');
      },
      { timeoutMs: 20, intervalMs: 5 },
    );

    expect(result).toMatchObject({ ok: false, reason: 'timeout' });
  });

  it('reports an abort', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);
    const result = await waitUntil(() => false, { timeoutMs: 1000, intervalMs: 50, signal: controller.signal });

    expect(result).toMatchObject({ ok: false, reason: 'aborted' });
  });
});

describe('sleep', () => {
  it('resolves false on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await sleep(1000, controller.signal)).toBe(false);
    expect(await sleep(0)).toBe(true);
  });
});

describe('withTimeout', () => {
  it('rejects with the timeout error and aborts the operation', async () => {
    let aborted = false;
    const operation = (signal: AbortSignal) =>
      new Promise<string>((resolve) => {
        signal.addEventListener('abort', () => {
          aborted = true;
        });
        setTimeout(() => resolve('late'), 200);
      });

    await expect(withTimeout(operation, 10, () => new Error('too slow'))).rejects.toThrow('too slow');
    expect(aborted).toBe(true);
  });

  it('returns the value when the operation is quick', async () => {
    await expect(withTimeout(async () => 'fast', 100, () => new Error('too slow'))).resolves.toBe('fast');
  });
});
