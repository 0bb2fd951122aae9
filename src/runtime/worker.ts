import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { sleep, withRetry, type RetryPolicy } from "./retry.js";

export type LoopTask = (signal: AbortSignal) => Promise<void>;

export type WorkerStats = {
  name: string;
  running: boolean;
  iterations: number;
  failures: number;
  lastRunAt: number | null;
  lastError: string | null;
};

/**
 * A background loop with its own cancellation signal. Errors never leave
 * the loop: transient ones are retried with backoff, the rest are logged
 * and the loop waits for its next tick.
 */
export class LoopWorker {
  private readonly controller = new AbortController();
  private done: Promise<void> | null = null;
  private stats: WorkerStats;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    private readonly task: LoopTask,
    private readonly retry: RetryPolicy
  ) {
    this.stats = {
      name,
      running: false,
      iterations: 0,
      failures: 0,
      lastRunAt: null,
      lastError: null,
    };
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  start(): Promise<void> {
    if (!this.done) this.done = this.run();
    return this.done;
  }

  private async run() {
    const signal = this.controller.signal;
    this.stats.running = true;
    log.info(`[LOOP] ${this.name} started`, { intervalMs: this.intervalMs });
    while (!signal.aborted) {
      this.stats.lastRunAt = Date.now();
      try {
        await withRetry(this.name, () => this.task(signal), this.retry, signal);
      } catch (err) {
        this.stats.failures += 1;
        this.stats.lastError = errorMessage(err);
        log.error(`[LOOP] ${this.name} iteration failed`, err);
      }
      this.stats.iterations += 1;
      await sleep(this.intervalMs, signal);
    }
    this.stats.running = false;
    log.info(`[LOOP] ${this.name} stopped`);
  }

  /** Ask the loop to exit at its next iteration boundary. */
  stop() {
    this.controller.abort();
  }

  /** Resolves once the loop has exited (immediately if never started). */
  join(): Promise<void> {
    return this.done ?? Promise.resolve();
  }

  getStats(): WorkerStats {
    return { ...this.stats };
  }
}

/** Owns the workers; starts them together and joins them on shutdown. */
export class Orchestrator {
  private readonly workers: LoopWorker[] = [];

  add(worker: LoopWorker): this {
    this.workers.push(worker);
    return this;
  }

  start() {
    for (const w of this.workers) {
      w.start().catch((err: unknown) => log.error(`[LOOP] ${w.name} crashed`, err));
    }
  }

  /**
   * Signal every worker, then wait up to `timeoutMs` for them to exit.
   * @returns names of workers that had not exited in time
   */
  async stop(timeoutMs: number): Promise<string[]> {
    for (const w of this.workers) w.stop();
    const pending = new Set(this.workers.map((w) => w.name));
    const joins = this.workers.map((w) => w.join().then(() => pending.delete(w.name)));
    const timer = new AbortController();
    await Promise.race([Promise.allSettled(joins), sleep(timeoutMs, timer.signal)]);
    timer.abort();
    if (pending.size) log.warn("[LOOP] workers still running after shutdown timeout", [...pending]);
    return [...pending];
  }

  stats(): WorkerStats[] {
    return this.workers.map((w) => w.getStats());
  }
}
