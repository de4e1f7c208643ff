/**
 * Bounded polling with a fixed or growing interval.
 * The sleep function is injected so callers (and tests) control time.
 */

export type SleepFn = (ms: number) => Promise<void>;

export const realSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PollPolicy {
  maxAttempts: number;
  intervalMs: number;
  /** 1 keeps the interval fixed */
  backoffMultiplier?: number;
  maxDelay?: number;
  sleep?: SleepFn;
}

export interface PollOutcome<T> {
  converged: boolean;
  attempts: number;
  last: T;
}

/**
 * Delay before the next probe: intervalMs * (multiplier ^ attempt), capped at maxDelay
 */
export function calculatePollDelay(attempt: number, policy: PollPolicy): number {
  const multiplier = policy.backoffMultiplier ?? 1;
  const delay = policy.intervalMs * Math.pow(multiplier, attempt);
  return Math.floor(policy.maxDelay !== undefined ? Math.min(delay, policy.maxDelay) : delay);
}

/**
 * Probe until `isDone` accepts the result or the attempt budget runs out.
 * Exhaustion is reported through `converged: false`, never thrown; errors
 * raised by the probe or by `isDone` propagate unchanged.
 */
export async function pollUntil<T>(
  probe: () => Promise<T>,
  isDone: (value: T) => boolean,
  policy: PollPolicy
): Promise<PollOutcome<T>> {
  const sleep = policy.sleep ?? realSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let last = await probe();
  let attempts = 1;

  while (!isDone(last)) {
    if (attempts >= maxAttempts) {
      return { converged: false, attempts, last };
    }
    await sleep(calculatePollDelay(attempts - 1, policy));
    last = await probe();
    attempts++;
  }

  return { converged: true, attempts, last };
}
