import { spawn, type ChildProcess } from 'child_process';
import os from 'os';

import { ConversionFailedError, LaunchFailedError } from '../errors';
import type { FileArtifact } from './artifactStore';
import { parseCommandLine } from './commandBuilder';
import { pdfLooksValid } from './pdfValidator';

/** On Linux a process stopped by the watchdog's SIGTERM exits with 128 + 15. */
export const TIMEOUT_EXIT_CODE = 143;

const KILL_GRACE_MS = 5000;
/** How long stderr may stay open once the renderer itself has exited. */
const STDIO_DRAIN_MS = 200;
const STDERR_LIMIT = 8 * 1024;

export interface ExecutionOutcome {
  /** `null` when the process never started. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  launchError?: LaunchFailedError;
  stderr: string;
}

export interface ExecuteOptions {
  timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fired. Defaults to 5s. */
  killGraceMs?: number;
}

function signalExitCode(signal: NodeJS.Signals): number | null {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : null;
}

function killTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (process.platform !== 'win32' && child.pid !== undefined) {
    try {
      // the child leads its own process group, so wrappers such as xvfb-run go down with their children
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Unable to signal process group ${child.pid}: ${message}`);
    }
  }
  child.kill(signal);
}

/**
 * Runs a command line to completion, or kills it once `timeoutMs` elapses.
 * Resolves in every case; the exit code is reported, not judged.
 *
 * The call settles when the renderer exits, even if a process it started
 * still holds stderr open.
 */
export function executeWithWatchdog(commandLine: string, options: ExecuteOptions): Promise<ExecutionOutcome> {
  let argv: string[];
  try {
    argv = parseCommandLine(commandLine);
  } catch (error) {
    return Promise.resolve({
      exitCode: null,
      signal: null,
      timedOut: false,
      launchError: new LaunchFailedError(`Unable to parse the command line [${commandLine}].`, { cause: error }),
      stderr: ''
    });
  }

  const [executable, ...args] = argv;
  if (!executable) {
    return Promise.resolve({
      exitCode: null,
      signal: null,
      timedOut: false,
      launchError: new LaunchFailedError('The command line is empty.'),
      stderr: ''
    });
  }

  return new Promise<ExecutionOutcome>((resolve) => {
    let child: ChildProcess;
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let watchdog: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;
    let drainTimer: NodeJS.Timeout | undefined;

    const finish = (outcome: Omit<ExecutionOutcome, 'timedOut' | 'stderr'>): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(watchdog);
      clearTimeout(killTimer);
      clearTimeout(drainTimer);
      resolve({ ...outcome, timedOut, stderr });
    };

    try {
      child = spawn(executable, args, {
        stdio: ['ignore', 'ignore', 'pipe'],
        windowsHide: true,
        detached: process.platform !== 'win32'
      });
    } catch (error) {
      finish({
        exitCode: null,
        signal: null,
        launchError: new LaunchFailedError(`Failed to launch "${executable}".`, { cause: error })
      });
      return;
    }

    child.stderr?.on('data', (data: Buffer) => {
      stderr = (stderr + data.toString()).slice(-STDERR_LIMIT);
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (child.pid !== undefined) {
        // the process is running (a failed kill, for instance): wait for it to close
        console.error(`Error from "${executable}" (pid ${child.pid}): ${error.message}`);
        return;
      }

      const message = error.code === 'ENOENT'
        ? `Executable "${executable}" not found.`
        : `Failed to launch "${executable}": ${error.message}`;
      finish({ exitCode: null, signal: null, launchError: new LaunchFailedError(message, { cause: error }) });
    });

    const toOutcome = (code: number | null, signal: NodeJS.Signals | null) => ({
      exitCode: code ?? (signal ? signalExitCode(signal) : null),
      signal
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      finish(toOutcome(code, signal));
    });

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      drainTimer = setTimeout(() => {
        child.stderr?.destroy();
        finish(toOutcome(code, signal));
      }, STDIO_DRAIN_MS);
    });

    watchdog = setTimeout(() => {
      timedOut = true;
      console.error(`"${executable}" did not complete within ${options.timeoutMs}ms, terminating it.`);
      killTree(child, 'SIGTERM');
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          killTree(child, 'SIGKILL');
        }
      }, options.killGraceMs ?? KILL_GRACE_MS);
    }, options.timeoutMs);
  });
}

export type PdfInspector = (filePath: string) => Promise<boolean>;

export interface RunAndVerifyOptions extends ExecuteOptions {
  inspect?: PdfInspector;
}

export function buildFailureMessage(commandLine: string, exitCode: number | null, timedOut: boolean, timeoutMs: number): string {
  let message = `Failed to execute the command line [${commandLine}]. No valid PDF generated. Exit code: ${exitCode ?? 'none'}`;
  if (exitCode === TIMEOUT_EXIT_CODE || timedOut) {
    message += ` (timeout reached, the timeout was ${timeoutMs}ms)`;
  }
  return message;
}

/**
 * Runs the command line, then checks the PDF it was supposed to write. The
 * PDF alone decides: a valid file is returned whatever the exit code, a launch
 * failure or a timeout; an invalid one raises a {@link ConversionFailedError}.
 */
export async function runAndVerify(commandLine: string, output: FileArtifact, options: RunAndVerifyOptions): Promise<FileArtifact> {
  const inspect = options.inspect ?? pdfLooksValid;

  console.log(`Executing: ${commandLine}`);
  const outcome = await executeWithWatchdog(commandLine, options);

  if (await inspect(output.path)) {
    if (outcome.exitCode !== 0) {
      console.log(`"${commandLine}" exited with ${outcome.exitCode ?? 'no code'} but produced a valid PDF.`);
    }
    return output;
  }

  if (outcome.stderr.trim()) {
    console.error(`Renderer stderr: ${outcome.stderr.trim()}`);
  }

  throw new ConversionFailedError(buildFailureMessage(commandLine, outcome.exitCode, outcome.timedOut, options.timeoutMs), {
    commandLine,
    exitCode: outcome.exitCode,
    timedOut: outcome.timedOut,
    timeoutMs: options.timeoutMs,
    cause: outcome.launchError
  });
}
