import type { LedgerCheckSource } from '../types/campaign.js';
import { logThought } from '../utils/logger.js';
import { sleep, type NowFn, type SleepFn } from '../utils/timing.js';

const DEFAULT_INTERVAL_MS = 1_000;

export interface VerificationPollerOptions {
  ledger: LedgerCheckSource;
  intervalMs?: number;
  sleep?: SleepFn;
  now?: NowFn;
}

/**
 * Polls the delivery ledger for one recipient at a time until the latest
 * outbound message is confirmed or the deadline passes.
 */
export class VerificationPoller {
  readonly #ledger: LedgerCheckSource;
  readonly #intervalMs: number;
  readonly #sleep: SleepFn;
  readonly #now: NowFn;

  constructor(options: VerificationPollerOptions) {
    this.#ledger = options.ledger;
    this.#intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.#sleep = options.sleep ?? sleep;
    this.#now = options.now ?? Date.now;
  }

  /**
   * Resolves true once delivered, false when still undelivered at the deadline.
   * The deadline is measured from the call, so it includes the initial wait.
   */
  async pollUntilDelivered(identity: string, initialWaitMs: number, deadlineMs: number): Promise<boolean> {
    const start = this.#now();
    await this.#sleep(Math.max(0, initialWaitMs));

    let checks = 0;
    for (;;) {
      const result = await this.#ledger.snapshotAndCheck(identity);
      checks += 1;

      if (!result.undelivered) {
        logThought(`[VerificationPoller] ${identity} delivered after ${checks} check(s).`);
        return true;
      }

      const elapsed = this.#now() - start;
      if (elapsed >= deadlineMs) {
        logThought(
          `[VerificationPoller] ${identity} still undelivered after ${checks} check(s) (${elapsed}ms).`,
          { found: result.found, detail: result.detail },
        );
        return false;
      }

      await this.#sleep(this.#intervalMs);
    }
  }
}
