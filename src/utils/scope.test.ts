import { describe, it, expect, vi } from 'vitest';
import { runScoped, whenAborted } from './scope.js';

describe('runScoped', () => {
  it('aborts siblings when the first task finishes', async () => {
    const sibling = vi.fn(async (signal: AbortSignal) => {
      await whenAborted(signal);
    });

    await runScoped([async () => undefined, sibling]);

    expect(sibling).toHaveBeenCalledOnce();
    expect(sibling.mock.calls[0][0].aborted).toBe(true);
  });

  it('rethrows the first failure after the siblings settle', async () => {
    let siblingSettled = false;

    await expect(
      runScoped([
        async () => {
          throw new Error('copy failed');
        },
        async (signal) => {
          await whenAborted(signal);
          siblingSettled = true;
        },
      ]),
    ).rejects.toThrow('copy failed');

    expect(siblingSettled).toBe(true);
  });

  it('returns cleanly when the parent aborts', async () => {
    const parent = new AbortController();
    const running = runScoped([(signal) => whenAborted(signal)], parent.signal);
    parent.abort();

    await expect(running).resolves.toBeUndefined();
  });

  it('does not start tasks under an already aborted parent', async () => {
    const parent = new AbortController();
    parent.abort();
    const task = vi.fn(async () => undefined);

    await runScoped([task], parent.signal);

    expect(task).not.toHaveBeenCalled();
  });
});
