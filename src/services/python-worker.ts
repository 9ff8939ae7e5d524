/**
 * One-shot JSON worker bridge
 *
 * Spawns a worker script through python-shell, writes one JSON request line
 * to its stdin, and reads its stdout line by line until the process exits.
 * The last stdout line that parses as JSON is the response; anything the
 * worker's libraries print before it is ignored.
 *
 * CRITICAL: workers own their stdout as the protocol channel. Diagnostics go
 * to stderr, which is captured (capped) for error reports.
 *
 * @module services/python-worker
 */

import { existsSync } from 'fs';
import path from 'path';
import { PythonShell, Options as PythonShellOptions } from 'python-shell';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** SIGTERM -> SIGKILL escalation delay */
const SIGKILL_GRACE_MS = 5_000;

/** Max stderr kept per invocation (tail) */
const MAX_STDERR_LENGTH = 10_240;

export type WorkerFailureKind = 'TIMEOUT' | 'WORKER_FAILURE' | 'ABORTED';

/**
 * Raised for any invocation that did not end with exit code 0 and a JSON
 * response line. Callers map it onto their own error type.
 */
export class WorkerProcessError extends Error {
  constructor(
    message: string,
    public readonly kind: WorkerFailureKind,
    public readonly stderrTail: string,
    public readonly exitCode: number | null = null,
    public readonly signal: string | null = null
  ) {
    super(message);
    this.name = 'WorkerProcessError';
    Error.captureStackTrace?.(this, WorkerProcessError);
  }
}

export interface WorkerInvocation {
  scriptPath: string;

  /** Interpreter; python-shell's platform default when omitted */
  pythonPath?: string;

  /** Interpreter flags placed before the script (default ['-u']) */
  pythonOptions?: string[];

  args?: string[];

  /** Request line written to stdin */
  request: string;

  /** Hard wall-clock limit for the whole invocation */
  timeoutMs: number;

  /** Tag for log lines, e.g. 'Extraction' */
  label: string;

  /** Kills the worker outright when aborted */
  signal?: AbortSignal;
}

export interface WorkerOutput {
  /** Parsed last JSON line of stdout */
  payload: unknown;
  stderr: string;
}

/**
 * Locate a bundled worker under python/ at the package root, whether this
 * module runs from src/services or from dist/src/services.
 */
export function resolveWorkerScript(fileName: string): string {
  const candidates = [
    path.resolve(__dirname, '../../python', fileName),
    path.resolve(__dirname, '../../../python', fileName),
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}

function tail(text: string, max: number = 2_000): string {
  return text.length > max ? text.slice(text.length - max) : text;
}

function parseLastJsonLine(lines: string[]): { found: true; value: unknown } | { found: false } {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line) continue;
    try {
      return { found: true, value: JSON.parse(line) };
    } catch {
      // not JSON; libraries sometimes print banners to stdout
      continue;
    }
  }
  return { found: false };
}

export function runJsonWorker(invocation: WorkerInvocation): Promise<WorkerOutput> {
  const { label, signal } = invocation;

  if (signal?.aborted) {
    return Promise.reject(
      new WorkerProcessError(`${label} worker was not started: run cancelled`, 'ABORTED', '')
    );
  }

  return new Promise((resolve, reject) => {
    let settled = false;
    let timedOut = false;
    let stderr = '';
    const outputLines: string[] = [];

    const options: PythonShellOptions = {
      mode: 'text',
      pythonPath: invocation.pythonPath,
      pythonOptions: invocation.pythonOptions ?? ['-u'],
      args: invocation.args ?? [],
    };

    const shell = new PythonShell(invocation.scriptPath, options);
    let sigkillTimer: ReturnType<typeof setTimeout> | null = null;

    const settle = (fn: () => void): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      if (sigkillTimer) {
        clearTimeout(sigkillTimer);
        sigkillTimer = null;
      }
      if (settled) return;
      settled = true;
      fn();
    };

    const timeoutError = (): WorkerProcessError =>
      new WorkerProcessError(
        `${label} worker exceeded ${String(invocation.timeoutMs)}ms and was terminated`,
        'TIMEOUT',
        tail(stderr)
      );

    const timer = setTimeout(() => {
      if (settled) return;
      timedOut = true;
      try {
        shell.kill();
      } catch (error) {
        console.error(
          `[${label}] Failed to kill worker on timeout:`,
          error instanceof Error ? error.message : String(error)
        );
      }
      sigkillTimer = setTimeout(() => {
        if (settled) return;
        console.error(
          `[${label}] Worker did not exit after SIGTERM, sending SIGKILL (pid: ${String(shell.childProcess?.pid)})`
        );
        try {
          shell.childProcess?.kill('SIGKILL');
        } catch (error) {
          console.error(
            `[${label}] Failed to SIGKILL worker (may already be gone):`,
            error instanceof Error ? error.message : String(error)
          );
        }
        settle(() => reject(timeoutError()));
      }, SIGKILL_GRACE_MS);
    }, invocation.timeoutMs);

    const onAbort = (): void => {
      if (settled) return;
      try {
        shell.childProcess?.kill('SIGKILL');
      } catch (error) {
        console.error(
          `[${label}] Failed to kill worker on cancellation:`,
          error instanceof Error ? error.message : String(error)
        );
      }
      settle(() =>
        reject(new WorkerProcessError(`${label} worker was cancelled and terminated`, 'ABORTED', tail(stderr)))
      );
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    shell.on('message', (line: string) => {
      outputLines.push(line);
    });

    shell.on('stderr', (line: string) => {
      stderr += line + '\n';
      if (stderr.length > MAX_STDERR_LENGTH) {
        stderr = stderr.slice(stderr.length - MAX_STDERR_LENGTH);
      }
    });

    // A worker that exits before reading its request breaks the pipe
    shell.stdin?.on('error', (error: Error) => {
      console.error(`[${label}] Worker stdin closed early: ${error.message}`);
    });

    shell.on('pythonError', (error: Error) => {
      console.error(`[${label}] Worker raised: ${error.message}`);
    });

    shell.on('error', (error: Error) => {
      console.error(`[${label}] Worker process error: ${error.message}`);
    });

    shell.send(invocation.request);
    shell.end((err, exitCode, exitSignal) => {
      settle(() => {
        if (timedOut) {
          reject(timeoutError());
          return;
        }

        if (err || exitCode !== 0) {
          const reason = exitSignal
            ? `terminated by ${exitSignal}`
            : `exited with code ${String(exitCode)}`;
          if (stderr) console.error(`[${label}] Worker stderr:`, tail(stderr, 1_000));
          reject(
            new WorkerProcessError(
              `${label} worker ${reason}${err ? `: ${err.message.split('\n')[0]}` : ''}`,
              'WORKER_FAILURE',
              tail(stderr),
              exitCode,
              exitSignal
            )
          );
          return;
        }

        const parsed = parseLastJsonLine(outputLines);
        if (!parsed.found) {
          const raw = outputLines.join('\n');
          console.error(`[${label}] No JSON response in worker output:`, raw.substring(0, 500));
          reject(
            new WorkerProcessError(
              `${label} worker produced no JSON response` +
                (raw.trim() ? ` (output began: ${JSON.stringify(raw.substring(0, 80))})` : ''),
              'WORKER_FAILURE',
              tail(stderr),
              exitCode,
              exitSignal
            )
          );
          return;
        }

        resolve({ payload: parsed.value, stderr });
      });
    });
  });
}
