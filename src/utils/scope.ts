export type ScopedTask = (signal: AbortSignal) => Promise<void>;

/** Resolves once the signal aborts. */
export function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}

/**
 * Runs sibling tasks under one abort scope.
 *
 * The first task to settle (or the parent aborting) ends the scope: the
 * other tasks are aborted and awaited before returning, and the first
 * task's rejection, if any, is rethrown.
 */
export async function runScoped(tasks: ScopedTask[], parent?: AbortSignal): Promise<void> {
  if (parent?.aborted) {
    return;
  }

  const scope = new AbortController();
  const onParentAbort = () => scope.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const running = tasks.map((task) => task(scope.signal));

  try {
    await Promise.race([...running, whenAborted(scope.signal)]);
  } finally {
    scope.abort();
    parent?.removeEventListener('abort', onParentAbort);
    await Promise.allSettled(running);
  }
}
