import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';

export interface RunnerOptions {
  /** Processes allowed to run at once; further calls wait their turn. */
  maxConcurrency: number;
  /** Time between SIGTERM and SIGKILL when a process group is terminated. */
  killGraceMs: number;
  /** stdout cap; exceeding it terminates the process. */
  maxOutputBytes: number;
  logger: Logger;
}

export interface RunRequest {
  executable: string;
  args: string[];
  /** Written to stdin, which is then closed. */
  input?: string;
  /** Wall-clock budget for the whole call, including any wait for a free slot. */
  timeoutMs: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

interface RunOutput {
  stdout: string;
  stderr: string;
  durationMs: number;
  pid?: number;
}

export type RunResult =
  | (RunOutput & { status: 'exited'; exitCode: number | null; exitSignal: NodeJS.Signals | null })
  | (RunOutput & { status: 'timed_out' | 'cancelled' | 'overflow' })
  | (RunOutput & { status: 'spawn_failed'; error: string });

type Termination = 'timed_out' | 'cancelled' | 'overflow';
type SlotOutcome = 'acquired' | 'timed_out' | 'cancelled';

/**
 * Owns every external process the service starts: spawn, stdin delivery,
 * output capture, deadline, cancellation and a concurrency bound.
 *
 * Each child leads its own process group so termination reaches anything it
 * spawned. `run` settles only after the child has exited; stragglers left in
 * the group are killed at that point.
 */
export class ProcessRunner {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly options: RunnerOptions) {}

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  async run(request: RunRequest): Promise<RunResult> {
    const started = Date.now();
    const deadline = started + request.timeoutMs;
    const empty = () => ({ stdout: '', stderr: '', durationMs: Date.now() - started });

    if (request.signal?.aborted) return { status: 'cancelled', ...empty() };

    const slot = await this.acquire(deadline, request.signal);
    if (slot !== 'acquired') return { status: slot, ...empty() };

    try {
      return await this.spawnOnce(request, started, deadline);
    } finally {
      this.release();
    }
  }

  private acquire(deadline: number, signal?: AbortSignal): Promise<SlotOutcome> {
    if (this.active < this.options.maxConcurrency) {
      this.active += 1;
      return Promise.resolve('acquired');
    }

    return new Promise<SlotOutcome>((resolve) => {
      const leave = (outcome: SlotOutcome) => {
        const at = this.waiting.indexOf(grant);
        if (at >= 0) this.waiting.splice(at, 1);
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };
      const grant = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.active += 1;
        resolve('acquired');
      };
      const onAbort = () => leave('cancelled');
      const timer = setTimeout(() => leave('timed_out'), Math.max(0, deadline - Date.now()));

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiting.push(grant);
    });
  }

  private release() {
    this.active -= 1;
    const next = this.waiting.shift();
    if (next) next();
  }

  private spawnOnce(request: RunRequest, started: number, deadline: number): Promise<RunResult> {
    const { logger, killGraceMs, maxOutputBytes } = this.options;

    return new Promise<RunResult>((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let stdoutBytes = 0;
      let stderrBytes = 0;
      let termination: Termination | null = null;
      let killTimer: NodeJS.Timeout | undefined;
      let settled = false;

      let child: ChildProcessWithoutNullStreams;
      try {
        child = spawn(request.executable, request.args, {
          cwd: request.cwd,
          env: request.env ?? process.env,
          detached: process.platform !== 'win32',
          windowsHide: true,
        });
      } catch (err) {
        resolve({ status: 'spawn_failed', error: errorMessage(err), stdout: '', stderr: '', durationMs: Date.now() - started });
        return;
      }

      const output = (): RunOutput => ({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        durationMs: Date.now() - started,
        pid: child.pid,
      });

      const settle = (result: RunResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadlineTimer);
        clearTimeout(killTimer);
        request.signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      const terminate = (reason: Termination) => {
        if (termination) return;
        termination = reason;
        logger.warn({ executable: request.executable, pid: child.pid, reason }, 'Terminating process group');
        this.signalGroup(child, 'SIGTERM');
        killTimer = setTimeout(() => this.signalGroup(child, 'SIGKILL'), killGraceMs);
      };

      const deadlineTimer = setTimeout(() => terminate('timed_out'), Math.max(0, deadline - Date.now()));
      const onAbort = () => terminate('cancelled');
      request.signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutBytes += chunk.length;
        if (stdoutBytes > maxOutputBytes) {
          terminate('overflow');
          return;
        }
        stdout.push(chunk);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        // stderr is diagnostics only; keep the head and drop the rest
        if (stderrBytes < maxOutputBytes) stderr.push(chunk);
        stderrBytes += chunk.length;
      });
      child.stdin.on('error', (err) => {
        // the tool may exit without reading its input; the exit status tells the story
        logger.debug({ err, executable: request.executable }, 'stdin closed before the prompt was written');
      });

      child.on('error', (err) => {
        if (child.pid === undefined) {
          settle({ status: 'spawn_failed', error: err.message, ...output() });
          return;
        }
        logger.warn({ err, pid: child.pid }, 'Child process error');
      });

      child.on('close', (exitCode, exitSignal) => {
        if (child.pid !== undefined) this.signalGroup(child, 'SIGKILL');
        if (termination) {
          settle({ status: termination, ...output() });
        } else {
          settle({ status: 'exited', exitCode, exitSignal, ...output() });
        }
      });

      if (request.input !== undefined) {
        child.stdin.end(request.input);
      } else {
        child.stdin.end();
      }
    });
  }

  private signalGroup(child: ChildProcessWithoutNullStreams, signal: NodeJS.Signals) {
    const pid = child.pid;
    if (pid === undefined) return;
    try {
      if (process.platform === 'win32') {
        child.kill(signal);
      } else {
        process.kill(-pid, signal);
      }
    } catch (err) {
      // ESRCH: the group is already gone
      if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) {
        this.options.logger.warn({ err, pid, signal }, 'Failed to signal process group');
      }
    }
  }
}
