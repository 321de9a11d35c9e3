import type { RunConfig } from '../config/run-config.js';
import type { MessageDispatcher } from '../services/dispatch.js';
import { normalizePhone, renderMessage } from '../services/identity-normalizer.js';
import type {
  Channel,
  DispatchOutcome,
  RecipientRow,
  RecipientState,
  RunRecord,
  RunRecordInput,
  RunSummary,
} from '../types/campaign.js';
import { logThought } from '../utils/logger.js';
import { sleep, type SleepFn } from '../utils/timing.js';

export interface CampaignSettings {
  template: string;
  trackLink: boolean;
  linkFieldName: string;
  dryRun: boolean;
  verify: boolean;
  verifyWaitMs: number;
  verifyTimeoutMs: number;
  delayMs: number;
  /** 0 processes every row. */
  limit: number;
}

export interface DeliveryVerifier {
  pollUntilDelivered(identity: string, initialWaitMs: number, deadlineMs: number): Promise<boolean>;
}

export interface RunRecordSink {
  readonly runId: string;
  readonly logPath: string;
  append(input: RunRecordInput): Promise<RunRecord>;
}

export interface CampaignRunnerOptions {
  settings: CampaignSettings;
  dispatcher: MessageDispatcher;
  runLog: RunRecordSink;
  verifier?: DeliveryVerifier;
  sleep?: SleepFn;
  print?: (line: string) => void;
}

type FallbackContext = 'after_primary_error' | 'after_undelivered';

const FALLBACK_LABELS: Record<FallbackContext, { ok: string; fail: string }> = {
  after_primary_error: { ok: 'SMS AFTER PRIMARY ERROR', fail: 'SMS FAIL AFTER PRIMARY ERROR' },
  after_undelivered: { ok: 'SMS RETRY OK', fail: 'SMS RETRY FAIL' },
};

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function toCampaignSettings(config: RunConfig): CampaignSettings {
  return {
    template: config.message,
    trackLink: config.trackLink,
    linkFieldName: config.linkFieldName,
    dryRun: config.dryRun,
    verify: config.verify,
    verifyWaitMs: secondsToMs(config.verifyWaitSeconds),
    verifyTimeoutMs: secondsToMs(config.verifyTimeoutSeconds),
    delayMs: secondsToMs(config.delaySeconds),
    limit: config.limit,
  };
}

export function createEmptySummary(runId: string, logPath: string, total: number): RunSummary {
  return {
    runId,
    total,
    processed: 0,
    sent: 0,
    failed: 0,
    primaryFailed: 0,
    smsSent: 0,
    smsFailed: 0,
    delivered: 0,
    logPath,
  };
}

/**
 * Drives each recipient through send → verify → fallback.
 *
 * Recipients are handled strictly one after another: verification looks at
 * "the most recent outbound message" for an identity, which is only well
 * defined while no other send is in flight.
 */
export class CampaignRunner {
  readonly #settings: CampaignSettings;
  readonly #dispatcher: MessageDispatcher;
  readonly #runLog: RunRecordSink;
  readonly #verifier: DeliveryVerifier | null;
  readonly #sleep: SleepFn;
  readonly #print: (line: string) => void;

  constructor(options: CampaignRunnerOptions) {
    if (options.settings.verify && !options.settings.dryRun && !options.verifier) {
      throw new Error('CampaignRunner: verification is enabled but no verifier was provided.');
    }
    this.#settings = options.settings;
    this.#dispatcher = options.dispatcher;
    this.#runLog = options.runLog;
    this.#verifier = options.verifier ?? null;
    this.#sleep = options.sleep ?? sleep;
    this.#print = options.print ?? ((line) => console.log(line));
  }

  async run(rows: readonly RecipientRow[]): Promise<RunSummary> {
    const summary = createEmptySummary(this.#runLog.runId, this.#runLog.logPath, rows.length);
    logThought(`[CampaignRunner] Run ${summary.runId} starting with ${rows.length} row(s).`, {
      dryRun: this.#settings.dryRun,
      verify: this.#settings.verify,
      limit: this.#settings.limit,
    });

    for (const row of rows) {
      if (this.#settings.limit > 0 && summary.processed >= this.#settings.limit) {
        break;
      }

      try {
        await this.processRecipient(row, summary);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.#print(`[ERROR] ${row.rawPhone}: ${message}`);
        logThought(`[CampaignRunner] Recipient ${row.rawPhone} aborted: ${message}`);
      }
    }

    logThought(`[CampaignRunner] Run ${summary.runId} finished.`, { ...summary });
    return summary;
  }

  /** Run one recipient to a terminal state, updating `summary` in place. */
  async processRecipient(row: RecipientRow, summary: RunSummary): Promise<RecipientState> {
    summary.processed += 1;

    const identity = normalizePhone(row.rawPhone);
    if (!identity) {
      summary.failed += 1;
      const info = `Unusable phone: ${JSON.stringify(row.rawPhone)}`;
      this.#print(`[SKIP] ${info}`);
      await this.#record({ phone: '', firstName: row.firstName, status: 'failed', info, message: '' });
      return 'normalize_failed';
    }

    const firstName = row.firstName.trim();
    const message = renderMessage(this.#settings.template, firstName, identity, {
      trackLink: this.#settings.trackLink,
      linkFieldName: this.#settings.linkFieldName,
    });
    const base = { phone: identity, firstName, message };

    try {
      return await this.#sendThroughChannels(identity, message, base, summary);
    } finally {
      await this.#sleep(this.#settings.delayMs);
    }
  }

  // ── Private ───────────────────────────────────────────────────────────────

  async #sendThroughChannels(
    identity: string,
    message: string,
    base: Pick<RunRecordInput, 'phone' | 'firstName' | 'message'>,
    summary: RunSummary,
  ): Promise<RecipientState> {
    const primary = await this.#dispatch('primary', identity, message);
    if (!primary.success) {
      summary.primaryFailed += 1;
      this.#print(`[PRIMARY FAIL] ${identity}: ${primary.info}`);
      await this.#record({ ...base, status: 'failed', info: `primary:${primary.info}` });
      return this.#sendFallback(identity, message, base, summary, 'after_primary_error');
    }

    summary.sent += 1;
    this.#print(`[PRIMARY SENT] ${identity} (${primary.info})`);
    await this.#record({ ...base, status: 'sent', info: primary.info });

    if (this.#verifier && this.#settings.verify && !this.#settings.dryRun) {
      const delivered = await this.#verify(this.#verifier, identity);
      if (!delivered) {
        this.#print(`[UNDELIVERED → SMS] ${identity}`);
        return this.#sendFallback(identity, message, base, summary, 'after_undelivered');
      }
      this.#print(`[DELIVERED OK] ${identity}`);
    }
    summary.delivered += 1;
    return 'delivered';
  }

  // Run-log failures are reported and never interrupt a recipient.
  async #record(input: RunRecordInput): Promise<void> {
    try {
      await this.#runLog.append(input);
    } catch (error) {
      const info = error instanceof Error ? error.message : String(error);
      this.#print(`[LOG ERROR] ${input.phone || '(no phone)'} ${input.status}: ${info}`);
      logThought(`[CampaignRunner] Run log write to ${this.#runLog.logPath} failed: ${info}`, {
        status: input.status,
      });
    }
  }

  async #sendFallback(
    identity: string,
    message: string,
    base: Pick<RunRecordInput, 'phone' | 'firstName' | 'message'>,
    summary: RunSummary,
    context: FallbackContext,
  ): Promise<RecipientState> {
    const labels = FALLBACK_LABELS[context];
    const fallback = await this.#dispatch('fallback', identity, message);

    if (fallback.success) {
      summary.smsSent += 1;
      this.#print(`[${labels.ok}] ${identity} (${fallback.info})`);
      await this.#record({ ...base, status: 'sms_sent', info: fallback.info });
      return 'fallback_sent';
    }

    summary.smsFailed += 1;
    this.#print(`[${labels.fail}] ${identity}: ${fallback.info}`);
    await this.#record({ ...base, status: 'sms_failed', info: fallback.info });
    return 'fallback_failed';
  }

  async #dispatch(channel: Channel, identity: string, message: string): Promise<DispatchOutcome> {
    try {
      return await this.#dispatcher.dispatch(channel, identity, message);
    } catch (error) {
      const info = error instanceof Error ? error.message : String(error);
      logThought(`[CampaignRunner] ${channel} dispatch to ${identity} threw: ${info}`);
      return { success: false, info };
    }
  }

  async #verify(verifier: DeliveryVerifier, identity: string): Promise<boolean> {
    try {
      return await verifier.pollUntilDelivered(
        identity,
        this.#settings.verifyWaitMs,
        this.#settings.verifyTimeoutMs,
      );
    } catch (error) {
      const info = error instanceof Error ? error.message : String(error);
      logThought(`[CampaignRunner] Verification for ${identity} failed, treating as undelivered: ${info}`);
      return false;
    }
  }
}
