import Database from 'better-sqlite3';
import { copyFile, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { LedgerCheck, LedgerCheckSource } from '../types/campaign.js';
import { logThought } from '../utils/logger.js';
import { digitsOnly } from './identity-normalizer.js';

const SNAPSHOT_FILE = 'ledger-snapshot.db';
const WAL_SUFFIX = '-wal';

/** Which optional delivery columns the `message` table exposes. */
export interface DeliveryColumnProbe {
  hasDeliveredFlag: boolean;
  hasDeliveredAt: boolean;
}

export interface OutgoingMessageRow {
  rowId: number | bigint;
  isDelivered: number | bigint | null;
  dateDelivered: number | bigint | null;
}

export interface DeliveryLedgerReaderOptions {
  ledgerPath: string;
  /** Directory that receives the per-check snapshot directories. */
  tempRoot?: string;
  openDatabase?: (filePath: string) => Database.Database;
}

interface LedgerSnapshot {
  dir: string;
  filePath: string;
}

type SqlInteger = number | bigint;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isSqlInteger(value: unknown): value is SqlInteger {
  return typeof value === 'number' || typeof value === 'bigint';
}

function isZero(value: SqlInteger): boolean {
  return typeof value === 'bigint' ? value === 0n : value === 0;
}

function readNullableInteger(value: unknown): SqlInteger | null {
  return isSqlInteger(value) ? value : null;
}

/**
 * Decide whether the latest outgoing message is still undelivered.
 *
 * A present-and-false flag or a present-and-empty timestamp means undelivered.
 * With neither column available the state is unknown and also reported as
 * undelivered, as is a missing message row.
 */
export function evaluateDeliveryRow(
  row: OutgoingMessageRow | null,
  probe: DeliveryColumnProbe,
): boolean {
  if (row === null) {
    return true;
  }
  if (!probe.hasDeliveredFlag && !probe.hasDeliveredAt) {
    return true;
  }

  const undeliveredByFlag =
    probe.hasDeliveredFlag && row.isDelivered !== null && isZero(row.isDelivered);
  const undeliveredByDate =
    probe.hasDeliveredAt && (row.dateDelivered === null || isZero(row.dateDelivered));
  return undeliveredByFlag || undeliveredByDate;
}

export function probeDeliveryColumns(db: Database.Database): DeliveryColumnProbe {
  const columns = new Set<string>();
  const entries: unknown = db.pragma('table_info(message)');
  if (Array.isArray(entries)) {
    for (const entry of entries) {
      if (isRecord(entry) && typeof entry.name === 'string') {
        columns.add(entry.name);
      }
    }
  }
  return {
    hasDeliveredFlag: columns.has('is_delivered'),
    hasDeliveredAt: columns.has('date_delivered'),
  };
}

/**
 * Most recently inserted handle whose digits end with the identity's digits.
 * Suffix matching tolerates differing prefixes but can collide on short numbers;
 * ties go to the highest ROWID.
 */
export function findHandleForIdentity(
  db: Database.Database,
  identity: string,
): { rowId: number; address: string } | null {
  const wanted = digitsOnly(identity);
  if (wanted.length === 0) {
    return null;
  }

  const statement = db.prepare('SELECT ROWID AS rowId, id AS address FROM handle ORDER BY ROWID DESC');
  for (const row of statement.iterate()) {
    if (!isRecord(row) || typeof row.rowId !== 'number' || typeof row.address !== 'string') {
      continue;
    }
    if (digitsOnly(row.address).endsWith(wanted)) {
      return { rowId: row.rowId, address: row.address };
    }
  }
  return null;
}

export function latestOutgoingForHandle(
  db: Database.Database,
  handleRowId: number,
  probe: DeliveryColumnProbe,
): OutgoingMessageRow | null {
  const flagColumn = probe.hasDeliveredFlag ? 'm.is_delivered' : 'NULL';
  const dateColumn = probe.hasDeliveredAt ? 'm.date_delivered' : 'NULL';
  const statement = db
    .prepare(
      `SELECT m.ROWID AS rowId, ${flagColumn} AS isDelivered, ${dateColumn} AS dateDelivered
         FROM message m
        WHERE m.is_from_me = 1 AND m.handle_id = ?
        ORDER BY m.date DESC
        LIMIT 1`,
    )
    .safeIntegers(true);

  const row: unknown = statement.get(handleRowId);
  if (!isRecord(row) || !isSqlInteger(row.rowId)) {
    return null;
  }
  return {
    rowId: row.rowId,
    isDelivered: readNullableInteger(row.isDelivered),
    dateDelivered: readNullableInteger(row.dateDelivered),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Answers "has the latest outbound message to this identity been delivered?"
 * against a private copy of the Messages database. The live file is written
 * by another process, so every check copies it first and deletes the copy
 * before returning.
 */
export class DeliveryLedgerReader implements LedgerCheckSource {
  readonly #ledgerPath: string;
  readonly #tempRoot: string;
  readonly #openDatabase: (filePath: string) => Database.Database;

  constructor(options: DeliveryLedgerReaderOptions) {
    this.#ledgerPath = options.ledgerPath;
    this.#tempRoot = options.tempRoot ?? tmpdir();
    this.#openDatabase =
      options.openDatabase ?? ((filePath) => new Database(filePath, { fileMustExist: true }));
  }

  async snapshotAndCheck(identity: string): Promise<LedgerCheck> {
    let snapshot: LedgerSnapshot | null = null;
    try {
      snapshot = await this.#takeSnapshot();
      return this.#checkSnapshot(snapshot.filePath, identity);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logThought(`[DeliveryLedger] Check for ${identity} failed, treating as undelivered: ${detail}`);
      return { found: false, undelivered: true, detail };
    } finally {
      if (snapshot) {
        await rm(snapshot.dir, { recursive: true, force: true });
      }
    }
  }

  #checkSnapshot(filePath: string, identity: string): LedgerCheck {
    const db = this.#openDatabase(filePath);
    try {
      const handle = findHandleForIdentity(db, identity);
      if (!handle) {
        return { found: false, undelivered: true, detail: 'no matching handle' };
      }

      const probe = probeDeliveryColumns(db);
      const row = latestOutgoingForHandle(db, handle.rowId, probe);
      const undelivered = evaluateDeliveryRow(row, probe);
      if (row === null) {
        return { found: true, undelivered, detail: 'no outgoing message' };
      }
      if (!probe.hasDeliveredFlag && !probe.hasDeliveredAt) {
        return { found: true, undelivered, detail: 'no delivery columns' };
      }
      return { found: true, undelivered };
    } finally {
      db.close();
    }
  }

  async #takeSnapshot(): Promise<LedgerSnapshot> {
    const dir = await mkdtemp(path.join(this.#tempRoot, 'relay-ledger-'));
    const filePath = path.join(dir, SNAPSHOT_FILE);
    try {
      await copyFile(this.#ledgerPath, filePath);
      await this.#copyWalIfPresent(filePath);
      return { dir, filePath };
    } catch (error) {
      await rm(dir, { recursive: true, force: true });
      throw error;
    }
  }

  // Recent writes may still sit in the write-ahead log next to the main file.
  async #copyWalIfPresent(snapshotPath: string): Promise<void> {
    try {
      await copyFile(`${this.#ledgerPath}${WAL_SUFFIX}`, `${snapshotPath}${WAL_SUFFIX}`);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }
}
