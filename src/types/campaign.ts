/** Outbound route. `primary` is the rich channel, `fallback` the plain one. */
export type Channel = 'primary' | 'fallback';

export interface DispatchOutcome {
  readonly success: boolean;
  /** Free-text diagnostic. Never parsed for semantics. */
  readonly info: string;
}

/** Fixed vocabulary written to the run log. */
export type RunStatus = 'failed' | 'sent' | 'sms_sent' | 'sms_failed';

export const RUN_LOG_COLUMNS = [
  'timestamp',
  'phone',
  'first_name',
  'status',
  'info',
  'run_id',
  'message',
] as const;

export interface RunRecord {
  readonly timestamp: string;
  readonly phone: string;
  readonly firstName: string;
  readonly status: RunStatus;
  readonly info: string;
  readonly runId: string;
  readonly message: string;
}

export type RunRecordInput = Omit<RunRecord, 'timestamp' | 'runId'>;

/** Terminal state reached by one recipient. */
export type RecipientState =
  | 'normalize_failed'
  | 'delivered'
  | 'fallback_sent'
  | 'fallback_failed';

export interface RecipientRow {
  readonly rawPhone: string;
  readonly firstName: string;
}

export interface LedgerCheck {
  readonly found: boolean;
  readonly undelivered: boolean;
  readonly detail?: string;
}

/** Anything that can answer one point-in-time delivery check. */
export interface LedgerCheckSource {
  snapshotAndCheck(identity: string): Promise<LedgerCheck>;
}

export interface RunSummary {
  runId: string;
  total: number;
  processed: number;
  sent: number;
  /** Recipients whose phone could not be normalized. */
  failed: number;
  primaryFailed: number;
  smsSent: number;
  smsFailed: number;
  delivered: number;
  logPath: string;
}
