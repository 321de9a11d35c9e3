import { stringify } from 'csv-stringify/sync';
import { randomBytes } from 'node:crypto';
import { appendFile, mkdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { RUN_LOG_COLUMNS, type RunRecord, type RunRecordInput } from '../types/campaign.js';

export interface RunLogWriterOptions {
  logPath: string;
  runId: string;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time to the second, without offset: `2026-10-19T18:11:05`. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Run identifier: local start time plus a short random suffix. */
export function createRunId(now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${stamp}-${randomBytes(3).toString('hex')}`;
}

async function currentSize(filePath: string): Promise<number> {
  try {
    return (await stat(filePath)).size;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return 0;
    }
    throw error;
  }
}

/**
 * Append-only CSV log of per-recipient outcomes. Each append opens the file
 * afresh, so no handle is held across the waits between recipients and the
 * file can be tailed during a run.
 */
export class RunLogWriter {
  readonly logPath: string;
  readonly runId: string;
  readonly #now: () => Date;

  constructor(options: RunLogWriterOptions) {
    this.logPath = options.logPath;
    this.runId = options.runId;
    this.#now = options.now ?? (() => new Date());
  }

  async append(input: RunRecordInput): Promise<RunRecord> {
    const record: RunRecord = Object.freeze({
      timestamp: formatLocalTimestamp(this.#now()),
      runId: this.runId,
      ...input,
    });

    const rows: string[][] = [];
    if ((await currentSize(this.logPath)) === 0) {
      rows.push([...RUN_LOG_COLUMNS]);
    }
    rows.push([
      record.timestamp,
      record.phone,
      record.firstName,
      record.status,
      record.info,
      record.runId,
      record.message,
    ]);

    await mkdir(path.dirname(path.resolve(this.logPath)), { recursive: true });
    await appendFile(this.logPath, stringify(rows), 'utf8');
    return record;
  }
}
