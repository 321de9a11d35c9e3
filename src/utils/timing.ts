export type SleepFn = (ms: number) => Promise<void>;

/** Millisecond wall clock, injectable for tests. */
export type NowFn = () => number;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
