import { fork, type ChildProcess } from 'child_process';
import path from 'path';
import { fileURLToPath } from 'url';
import PQueue from 'p-queue';
import { TimeoutExceededError, errorMessage } from '../errors.js';
import type { Outcome, TaskRunner } from '../types.js';
import { elapsedSince } from '../utils.js';
import { errorOutcome, successOutcome, timeoutOutcome } from './outcomes.js';
import { workerMessageSchema, type WorkerResult } from './protocol.js';

export interface ChildProcessRunnerOptions {
  destinationRoot: string;
  // Module forked per URL; defaults to the bundled conversion worker
  workerPath?: string;
  // Passed to the worker for its page requests
  userAgent?: string;
}

export interface RunnerStatus {
  activePid: number | null;
  queued: number;
  running: number;
  isShuttingDown: boolean;
}

/**
 * Resolves the conversion worker next to this module: the `.ts` source under
 * tsx/vitest, the compiled `.js` once built.
 */
function defaultWorkerPath(): string {
  const __filename = fileURLToPath(import.meta.url);
  const extension = path.extname(__filename);
  return path.resolve(path.dirname(__filename), `conversionWorker${extension}`);
}

/**
 * Runs each conversion in a forked child process and hard-kills it when the
 * deadline elapses. At most one child is alive at any time.
 */
export class ChildProcessRunner implements TaskRunner {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly workerPath: string;
  private readonly execArgv: string[];
  private active: ChildProcess | null = null;
  private isShuttingDown = false;

  constructor(private readonly options: ChildProcessRunnerOptions) {
    this.workerPath = options.workerPath ?? defaultWorkerPath();
    // Development: use tsx to run TypeScript directly
    this.execArgv = this.workerPath.endsWith('.ts') ? ['--import', 'tsx'] : [];
  }

  /**
   * Convert one URL in isolation. Always resolves with an outcome, and only
   * after the child process has exited.
   */
  run(url: string, deadlineMs: number): Promise<Outcome> {
    return this.queue.add(
      () =>
        this.isShuttingDown
          ? Promise.resolve(errorOutcome(url, null, 'Runner is shutting down'))
          : this.runIsolated(url, deadlineMs),
      { throwOnTimeout: true },
    );
  }

  private runIsolated(url: string, deadlineMs: number): Promise<Outcome> {
    const startedAt = process.hrtime.bigint();

    return new Promise<Outcome>((resolve) => {
      let result: WorkerResult | null = null;
      let timedOut = false;
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (outcome: Outcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.active = null;
        resolve(outcome);
      };

      let child: ChildProcess;
      try {
        child = fork(this.workerPath, this.workerArgs(url), {
          execArgv: this.execArgv,
          stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
        });
      } catch (error) {
        settle(
          errorOutcome(
            url,
            null,
            `Failed to start conversion worker: ${errorMessage(error)}`,
          ),
        );
        return;
      }
      this.active = child;

      timer = setTimeout(() => {
        // A result that arrived before the deadline still counts
        timedOut = result === null;
        const { message } = new TimeoutExceededError(deadlineMs);
        console.warn(
          `[Worker ${child.pid}] ${message} for URL: ${url}; killing worker`,
        );
        child.kill('SIGKILL');
      }, deadlineMs);

      child.on('message', (raw: unknown) => {
        const parsed = workerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          console.warn(
            `[Worker ${child.pid}] Ignoring malformed IPC message`,
            raw,
          );
          return;
        }

        const message = parsed.data;
        if (process.env.IPC_LOG === '1') {
          console.log(`[IPC ${child.pid}] ${message.type}:`, message);
        }

        if (message.type !== 'started' && result === null) {
          result = message;
        }
      });

      child.on('error', (error) => {
        // No pid means the process never spawned and no 'exit' will follow
        if (child.pid === undefined) {
          settle(
            errorOutcome(
              url,
              null,
              `Failed to start conversion worker: ${error.message}`,
            ),
          );
          return;
        }
        console.error(`[Worker ${child.pid}] Process error for ${url}:`, error);
      });

      child.once('exit', (code, signal) => {
        if (timedOut) {
          settle(timeoutOutcome(url, deadlineMs));
        } else if (result?.type === 'done') {
          settle(successOutcome(url, result.elapsedSeconds));
        } else if (result?.type === 'error') {
          settle(errorOutcome(url, result.elapsedSeconds, result.error));
        } else {
          const reason = signal ? `signal ${signal}` : `code ${code}`;
          settle(
            errorOutcome(
              url,
              elapsedSince(startedAt),
              `Conversion worker exited with ${reason} ` +
                'before reporting a result',
            ),
          );
        }
      });
    });
  }

  private workerArgs(url: string): string[] {
    const { destinationRoot, userAgent } = this.options;
    return userAgent
      ? [url, destinationRoot, userAgent]
      : [url, destinationRoot];
  }

  getStatus(): RunnerStatus {
    return {
      activePid: this.active?.pid ?? null,
      queued: this.queue.size,
      running: this.queue.pending,
      isShuttingDown: this.isShuttingDown,
    };
  }

  /**
   * Kill the active worker and resolve every queued run without starting it.
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    if (this.active) {
      console.log(`Force terminating conversion worker ${this.active.pid}`);
      this.active.kill('SIGKILL');
    }

    await this.queue.onIdle();
  }
}
