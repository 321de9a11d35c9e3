import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Channel, DispatchOutcome } from '../types/campaign.js';
import { logSystemCommand } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_OUTPUT_LENGTH = 2_000;
const OSASCRIPT = 'osascript';

/**
 * Opaque "attempt send via channel" capability. Implementations never throw;
 * every fault is reported as an unsuccessful outcome.
 */
export interface MessageDispatcher {
  dispatch(channel: Channel, identity: string, text: string): Promise<DispatchOutcome>;
}

export interface ProgramRunOptions {
  timeout: number;
  maxBuffer: number;
}

export type ProgramRunner = (
  executable: string,
  args: readonly string[],
  options: ProgramRunOptions,
) => Promise<{ stdout: string; stderr: string }>;

export interface ScriptDispatcherOptions {
  scripts: Record<Channel, string>;
  timeoutMs?: number;
  runProgram?: ProgramRunner;
}

interface ExecFailure {
  message: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

const defaultRunProgram: ProgramRunner = async (executable, args, options) => {
  const { stdout, stderr } = await execFileAsync(executable, [...args], {
    timeout: options.timeout,
    maxBuffer: options.maxBuffer,
    windowsHide: true,
  });
  return { stdout, stderr };
};

function outcome(success: boolean, info: string): DispatchOutcome {
  return Object.freeze({ success, info });
}

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) {
    return output;
  }
  return `${output.slice(0, MAX_OUTPUT_LENGTH)}...[truncated]`;
}

function readExecFailure(error: unknown): ExecFailure {
  if (!(error instanceof Error)) {
    return { message: String(error), stdout: '', stderr: '', exitCode: null, timedOut: false };
  }

  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  const exitCode = 'code' in error && typeof error.code === 'number' ? error.code : null;
  const timedOut = 'killed' in error && error.killed === true;
  return { message: error.message, stdout, stderr, exitCode, timedOut };
}

/** Sends by running one AppleScript per channel through `osascript`. */
export class ScriptDispatcher implements MessageDispatcher {
  readonly #scripts: Record<Channel, string>;
  readonly #timeoutMs: number;
  readonly #runProgram: ProgramRunner;

  constructor(options: ScriptDispatcherOptions) {
    this.#scripts = options.scripts;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.#runProgram = options.runProgram ?? defaultRunProgram;
  }

  async dispatch(channel: Channel, identity: string, text: string): Promise<DispatchOutcome> {
    const script = this.#scripts[channel];
    const commandPreview = `${OSASCRIPT} ${script} ${identity}`;

    try {
      const { stdout } = await this.#runProgram(OSASCRIPT, [script, identity, text], {
        timeout: this.#timeoutMs,
        maxBuffer: 1024 * 1024,
      });
      const info = truncateOutput(stdout.trim()) || 'sent';
      logSystemCommand(commandPreview, info, 0);
      return outcome(true, info);
    } catch (error: unknown) {
      const failure = readExecFailure(error);

      if (failure.timedOut) {
        const info = `osascript timed out after ${this.#timeoutMs}ms`;
        logSystemCommand(commandPreview, info, 124);
        return outcome(false, info);
      }

      if (failure.exitCode === null) {
        logSystemCommand(commandPreview, failure.message, 1);
        return outcome(false, failure.message);
      }

      const detail = failure.stderr.trim() || failure.stdout.trim() || 'osascript failed';
      const info = `osascript error: ${truncateOutput(detail)}`;
      logSystemCommand(commandPreview, info, failure.exitCode);
      return outcome(false, info);
    }
  }
}

export interface DryRunDispatcherOptions {
  print?: (line: string) => void;
}

/** Performs no external action and always reports success. */
export class DryRunDispatcher implements MessageDispatcher {
  readonly #print: (line: string) => void;

  constructor(options: DryRunDispatcherOptions = {}) {
    this.#print = options.print ?? ((line) => console.log(line));
  }

  async dispatch(_channel: Channel, identity: string, text: string): Promise<DispatchOutcome> {
    this.#print(`[DRY RUN] Would send to ${identity}: ${text}`);
    return outcome(true, 'dry-run');
  }
}
