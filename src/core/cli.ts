import {
  parseRunArgs,
  RunConfigError,
  validateRunConfig,
  type ConfigIssue,
  type RunConfig,
} from '../config/run-config.js';
import { DeliveryLedgerReader } from '../services/delivery-ledger.js';
import { DryRunDispatcher, ScriptDispatcher, type MessageDispatcher } from '../services/dispatch.js';
import { loadRecipientTable, RecipientSourceError } from '../services/recipient-source.js';
import { createRunId, RunLogWriter } from '../services/run-log.js';
import { VerificationPoller } from '../services/verification-poller.js';
import type { RecipientRow, RunSummary } from '../types/campaign.js';
import type { SleepFn } from '../utils/timing.js';
import { CampaignRunner, toCampaignSettings, type DeliveryVerifier } from './campaign-runner.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: relay-send <csv_path> --message "<template>" [options]

Sends each CSV row a message over iMessage, verifies delivery in the local
Messages database and falls back to SMS when the send fails or stays unconfirmed.
The CSV needs a 'phone' column; an optional 'first_name' column fills {first_name}.

Options:
  --message <text>            Message template (supports {first_name})
  --primary-script <path>     AppleScript for the iMessage-first send
                              (default: scripts/send_imessage.applescript)
  --fallback-script <path>    AppleScript for the SMS-only send
                              (default: scripts/send_sms_only.applescript)
  --delay <seconds>           Delay between rows (default: 2.5)
  --dry-run                   No sends; just print and log
  --limit <n>                 Only the first N rows (default: 0, all rows)
  --log-file <path>           Output log CSV (default: send_log.csv)
  --track-link                Add ?cid=<digits> to the first link in the message
  --link-field-name <name>    Query parameter used for link tracking (default: cid)
  --verify                    Poll the Messages DB after each iMessage send and
                              fall back to SMS when still undelivered at the deadline
  --verify-wait <seconds>     Wait before the first check (default: 2)
  --verify-timeout <seconds>  Max wait before falling back to SMS (default: 8)
  --db <path>                 Messages DB (default: ~/Library/Messages/chat.db,
                              or RELAY_LEDGER_DB)
  --help, -h                  Show this help message

Examples:
  relay-send contacts.csv --message "Hi {first_name}, see https://example.com" --dry-run
  relay-send contacts.csv --message "Hi {first_name}" --verify --verify-timeout 10 --limit 5
`.trim();

export interface CliDependencies {
  sleep?: SleepFn;
  createDispatcher?: (config: RunConfig) => MessageDispatcher;
  createVerifier?: (config: RunConfig) => DeliveryVerifier;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

function reportIssues(issues: ConfigIssue[]): void {
  for (const issue of issues) {
    console.error(`ERROR: ${issue.message}`);
    console.error(`  hint: ${issue.remediation}`);
  }
}

function defaultDispatcher(config: RunConfig): MessageDispatcher {
  if (config.dryRun) {
    return new DryRunDispatcher();
  }
  return new ScriptDispatcher({
    scripts: { primary: config.primaryScript, fallback: config.fallbackScript },
  });
}

function defaultVerifier(config: RunConfig): DeliveryVerifier {
  return new VerificationPoller({
    ledger: new DeliveryLedgerReader({ ledgerPath: config.ledgerPath }),
  });
}

export function formatSummary(summary: RunSummary): string {
  return (
    `Done. Processed: ${summary.processed}/${summary.total}. ` +
    `Primary-sent: ${summary.sent}, Primary-failed: ${summary.primaryFailed}, ` +
    `SMS-sent: ${summary.smsSent}, SMS-failed: ${summary.smsFailed}`
  );
}

/**
 * Run a campaign from command-line arguments.
 * Resolves to the process exit code; startup problems never reach a recipient.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let config: RunConfig;
  try {
    config = parseRunArgs(argv);
  } catch (error) {
    if (error instanceof RunConfigError) {
      reportIssues(error.issues);
      return 1;
    }
    throw error;
  }

  const validation = validateRunConfig(config);
  if (!validation.ok) {
    reportIssues(validation.issues);
    return 1;
  }

  let rows: RecipientRow[];
  try {
    ({ rows } = await loadRecipientTable(config.csvPath));
  } catch (error) {
    if (error instanceof RecipientSourceError) {
      console.error(`ERROR: ${error.message}`);
      return 1;
    }
    throw error;
  }
  console.log(`Loaded ${rows.length} rows from ${config.csvPath}`);

  const runLog = new RunLogWriter({ logPath: config.logFile, runId: createRunId() });
  const needsVerifier = config.verify && !config.dryRun;
  const runner = new CampaignRunner({
    settings: toCampaignSettings(config),
    dispatcher: (deps.createDispatcher ?? defaultDispatcher)(config),
    verifier: needsVerifier ? (deps.createVerifier ?? defaultVerifier)(config) : undefined,
    runLog,
    sleep: deps.sleep,
  });

  const summary = await runner.run(rows);
  console.log(formatSummary(summary));
  console.log(`Log at: ${summary.logPath}`);
  return 0;
}
