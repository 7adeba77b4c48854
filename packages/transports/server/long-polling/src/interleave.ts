/**
 * Join primitives for running two operations as one.
 */

const invoke = <T>(operation: () => Promise<T>): Promise<T> => {
  try {
    return operation();
  } catch (err) {
    return Promise.reject(err);
  }
};

/**
 * Resolves once both promises settled.
 *
 * Rejects with the first error in time, but only after the other promise has
 * settled too.
 */
export async function whenBoth<TFirst, TSecond>(
  first: Promise<TFirst>,
  second: Promise<TSecond>
): Promise<[Awaited<TFirst>, Awaited<TSecond>]> {
  const failures: unknown[] = [];
  const record = (err: unknown): never => {
    failures.push(err);
    throw err;
  };

  const [a, b] = await Promise.allSettled([first.catch(record), second.catch(record)]);
  if (a.status === "rejected" || b.status === "rejected") {
    throw failures[0];
  }
  return [a.value, b.value];
}

/**
 * Start `first`, let it start `second` at the point of its choosing, and
 * complete when both are done.
 *
 * `first` gets a hook that starts `second`; it must call the hook before it
 * first yields. If it never does (e.g. it failed before reaching that point),
 * `second` is not run. Calling the hook more than once has no effect.
 *
 * @returns the value of `first`
 */
export async function interleave<T>(first: (startSecond: () => void) => Promise<T>, second: () => Promise<void>): Promise<T> {
  let secondTask: Promise<void> | undefined;
  const startSecond = (): void => {
    secondTask ??= invoke(second);
  };

  const firstTask = invoke(() => first(startSecond));
  const [value] = await whenBoth(firstTask, secondTask ?? Promise.resolve());
  return value;
}
