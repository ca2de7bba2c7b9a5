export type Clock = () => number;

export const monotonic: Clock = () => performance.now();

/**
 * Run `work` and measure how long it takes to settle, in milliseconds.
 * A rejection propagates unchanged.
 */
export async function timeQuery<T>(
  work: () => Promise<T>,
  now: Clock = monotonic,
): Promise<[T, number]> {
  const start = now();
  const result = await work();
  return [result, Math.round(now() - start)];
}
