/**
 * Run configuration for a single campaign.
 *
 * Command-line flags are parsed with `node:util` and validated with zod.
 * Filesystem prerequisites are checked separately by `validateRunConfig`
 * so parsing stays free of side effects.
 */

import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { DEFAULT_LINK_FIELD } from '../services/identity-normalizer.js';

// ── Public types ──────────────────────────────────────────────────────────────

export interface ConfigIssue {
  /** Flag or positional the issue belongs to. */
  key: string;
  message: string;
  /** Actionable hint for the operator. */
  remediation: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  issues: ConfigIssue[];
}

export class RunConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(issues.map((issue) => issue.message).join(' '));
    this.name = 'RunConfigError';
    this.issues = issues;
  }
}

export const DEFAULT_PRIMARY_SCRIPT = 'scripts/send_imessage.applescript';
export const DEFAULT_FALLBACK_SCRIPT = 'scripts/send_sms_only.applescript';
export const DEFAULT_LOG_FILE = 'send_log.csv';
export const DEFAULT_LEDGER_PATH = path.join('~', 'Library', 'Messages', 'chat.db');
/** Longest accepted delay or wait; timers cannot schedule much past 24 days. */
export const MAX_WAIT_SECONDS = 86_400;

const WaitSeconds = z.coerce.number().finite().nonnegative().max(MAX_WAIT_SECONDS);

const RunConfigSchema = z.object({
  csvPath: z.string().min(1, 'A CSV path is required.'),
  message: z.string().min(1, '--message must not be empty.'),
  primaryScript: z.string().min(1),
  fallbackScript: z.string().min(1),
  delaySeconds: WaitSeconds,
  dryRun: z.boolean(),
  limit: z.coerce.number().int().nonnegative(),
  logFile: z.string().min(1),
  trackLink: z.boolean(),
  linkFieldName: z.string().min(1),
  verify: z.boolean(),
  verifyWaitSeconds: WaitSeconds,
  verifyTimeoutSeconds: WaitSeconds,
  ledgerPath: z.string().min(1),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

const FLAG_NAMES: Record<keyof RunConfig, string> = {
  csvPath: 'csv_path',
  message: '--message',
  primaryScript: '--primary-script',
  fallbackScript: '--fallback-script',
  delaySeconds: '--delay',
  dryRun: '--dry-run',
  limit: '--limit',
  logFile: '--log-file',
  trackLink: '--track-link',
  linkFieldName: '--link-field-name',
  verify: '--verify',
  verifyWaitSeconds: '--verify-wait',
  verifyTimeoutSeconds: '--verify-timeout',
  ledgerPath: '--db',
};

// ── Internal helpers ─────────────────────────────────────────────────────────

export function expandHome(target: string): string {
  if (target === '~') {
    return os.homedir();
  }
  if (target.startsWith('~/') || target.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), target.slice(2));
  }
  return target;
}

function isFlagName(key: string | number | undefined): key is keyof RunConfig {
  return typeof key === 'string' && key in FLAG_NAMES;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        message: { type: 'string' },
        'primary-script': { type: 'string' },
        'fallback-script': { type: 'string' },
        delay: { type: 'string' },
        'dry-run': { type: 'boolean' },
        limit: { type: 'string' },
        'log-file': { type: 'string' },
        'track-link': { type: 'boolean' },
        'link-field-name': { type: 'string' },
        verify: { type: 'boolean' },
        'verify-wait': { type: 'string' },
        'verify-timeout': { type: 'string' },
        db: { type: 'string' },
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RunConfigError([
      {
        key: 'argv',
        message,
        remediation: "Run with --help to see the supported options.",
      },
    ]);
  }
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Parse command-line arguments into a validated `RunConfig`.
 * Durations are in seconds, as typed on the command line.
 */
export function parseRunArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): RunConfig {
  const { values, positionals } = readArgs(argv);
  const issues: ConfigIssue[] = [];

  if (positionals.length > 1) {
    issues.push({
      key: 'csv_path',
      message: `Expected one CSV path, got ${positionals.length}: ${positionals.join(', ')}.`,
      remediation: 'Quote paths that contain spaces.',
    });
  }
  if (values.message === undefined) {
    issues.push({
      key: '--message',
      message: '--message is required.',
      remediation: 'Pass a template such as --message "Hi {first_name}, ...".',
    });
  }

  const ledgerPath = values.db ?? env.RELAY_LEDGER_DB ?? DEFAULT_LEDGER_PATH;
  const candidate = {
    csvPath: positionals[0] ?? '',
    message: values.message ?? '',
    primaryScript: values['primary-script'] ?? DEFAULT_PRIMARY_SCRIPT,
    fallbackScript: values['fallback-script'] ?? DEFAULT_FALLBACK_SCRIPT,
    delaySeconds: values.delay ?? 2.5,
    dryRun: values['dry-run'] ?? false,
    limit: values.limit ?? 0,
    logFile: values['log-file'] ?? DEFAULT_LOG_FILE,
    trackLink: values['track-link'] ?? false,
    linkFieldName: values['link-field-name'] ?? DEFAULT_LINK_FIELD,
    verify: values.verify ?? false,
    verifyWaitSeconds: values['verify-wait'] ?? 2,
    verifyTimeoutSeconds: values['verify-timeout'] ?? 8,
    ledgerPath: expandHome(ledgerPath),
  };

  const parsed = RunConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path[0];
      const key = isFlagName(field) ? FLAG_NAMES[field] : String(field);
      if (issues.some((existing) => existing.key === key)) {
        continue;
      }
      issues.push({
        key,
        message: `${key}: ${issue.message}`,
        remediation: `Check the value passed to ${key}.`,
      });
    }
  }

  if (issues.length > 0 || !parsed.success) {
    throw new RunConfigError(issues);
  }
  return parsed.data;
}

/**
 * Check the files a run needs before any recipient is processed.
 * Channel scripts are only required outside dry-run mode; the ledger only
 * when verification is enabled.
 */
export function validateRunConfig(
  config: RunConfig,
  fileExists: (target: string) => boolean = existsSync,
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];

  if (!fileExists(config.csvPath)) {
    issues.push({
      key: 'csv_path',
      message: `CSV not found at ${config.csvPath}`,
      remediation: 'Pass the path to a CSV with a phone column.',
    });
  }

  if (!config.dryRun) {
    if (!fileExists(config.primaryScript)) {
      issues.push({
        key: '--primary-script',
        message: `Primary AppleScript not found at ${config.primaryScript}`,
        remediation: 'Point --primary-script at the iMessage sender script, or use --dry-run.',
      });
    }
    if (!fileExists(config.fallbackScript)) {
      issues.push({
        key: '--fallback-script',
        message: `SMS AppleScript not found at ${config.fallbackScript}`,
        remediation: 'Point --fallback-script at the SMS-only sender script, or use --dry-run.',
      });
    }
  }

  if (config.verify && !fileExists(config.ledgerPath)) {
    issues.push({
      key: '--db',
      message: `Messages DB not found at ${config.ledgerPath}.`,
      remediation: 'Grant Full Disk Access to the terminal, or pass --db to a readable copy.',
    });
  }

  return { ok: issues.length === 0, issues };
}
