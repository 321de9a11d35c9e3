import path from 'node:path';
import pino, { type Logger } from 'pino';

const DEFAULT_LOG_FILE = 'logs/relay-send.log';
const DEFAULT_LOG_LEVEL = 'info';
const PHONE_LIKE_PATTERN = /\+?\d{8,}/g;
const VISIBLE_DIGITS = 4;

let logger: Logger | null = null;

function resolveLevel(): string {
  const configured = process.env.RELAY_LOG_LEVEL?.trim().toLowerCase();
  if (!configured) {
    return DEFAULT_LOG_LEVEL;
  }
  if (configured === 'silent' || configured in pino.levels.values) {
    return configured;
  }
  return DEFAULT_LOG_LEVEL;
}

/**
 * Operational logger, created on first use so `.env` values loaded by the
 * entry point are honoured. `silent` opens no file at all.
 */
function getLogger(): Logger {
  if (logger) {
    return logger;
  }

  const level = resolveLevel();
  if (level === 'silent') {
    logger = pino({ level });
    return logger;
  }

  const dest = path.resolve(process.env.RELAY_LOG_FILE?.trim() || DEFAULT_LOG_FILE);
  logger = pino(
    { level, base: { service: 'relay-send' } },
    pino.destination({ dest, mkdir: true, sync: true }),
  );
  return logger;
}

/**
 * Mask phone-like digit runs, keeping the last four digits for correlation.
 * The run log CSV is written unmasked; this only applies to the operational log.
 */
export function scrubSensitiveText(text: string): string {
  return text.replace(PHONE_LIKE_PATTERN, (match) => {
    const hidden = match.slice(0, -VISIBLE_DIGITS).replace(/\d/g, '*');
    return `${hidden}${match.slice(-VISIBLE_DIGITS)}`;
  });
}

export function logThought(message: string, fields: Record<string, unknown> = {}): void {
  getLogger().info(fields, scrubSensitiveText(message));
}

export function logSystemCommand(command: string, output: string, exitCode: number): void {
  const entry = {
    command: scrubSensitiveText(command),
    output: scrubSensitiveText(output),
    exitCode,
  };
  if (exitCode === 0) {
    getLogger().info(entry, 'external command completed');
  } else {
    getLogger().warn(entry, 'external command failed');
  }
}
