/**
 * Rate-Limited Queue
 * - Token bucket (rate + burst) with single scheduler tick
 * - Monotonic timing via performance.now()
 * - Bounded concurrency (fixed fan-out, joined by processAll)
 * - Optional tiny jitter to avoid herds
 * - In-memory only; no backpressure, no pause/resume/abort
 * - Guards onResult so callback errors don't poison the loop
 */

import {getLogger} from './LoggerContext'

export interface QueueOptions {
  burst?: number;       // max tokens, default = rate
  concurrency?: number; // parallel tasks, default 1
  jitterMs?: number;    // 0..jitterMs added to wakeups, default 0
  minTickMs?: number;   // minimum tick delay, default 1
  rate?: number;        // tokens per second, default 40
}

type Task<T> = () => Promise<T>;

export class RateLimitedQueue<T> {
  private readonly burst: number;
  private readonly concurrency: number;
  private readonly jitterMs: number;
  private lastRefill: number; // performance.now()
  private readonly minTickMs: number;
  private processing = false;
  private queue: Task<T>[] = [];
  private readonly rate: number;
  private timer: null | ReturnType<typeof setTimeout> = null;
  private tokens: number;

  constructor(opts: QueueOptions = {}) {
    this.rate = opts.rate ?? 40;
    this.burst = opts.burst ?? this.rate;
    this.concurrency = Math.max(1, opts.concurrency ?? 1);
    this.jitterMs = Math.max(0, opts.jitterMs ?? 0);
    this.minTickMs = Math.max(0, opts.minTickMs ?? 1);

    this.tokens = this.burst;
    this.lastRefill = performance.now();
  }

  clear(): void {
    if (this.processing) throw new Error("Cannot clear while processing");
    this.queue = [];
    this.clearTimer();
    this.tokens = this.burst;
    this.lastRefill = performance.now();
  }

  /**
   * Add a task to the queue.
   * (No backpressure: always accepts.)
   */
  enqueue(task: Task<T>): void {
    this.queue.push(task);
  }

  /**
   * Process all queued tasks, returning results in enqueue order.
   * A failed task yields null in its slot.
   * Optional onResult receives (resultOrNull, index, total). It is guarded.
   */
  async processAll(
    onResult?: (result: null | T, index: number, total: number) => Promise<void> | void
  ): Promise<(null | T)[]> {
    if (this.processing) throw new Error("Already processing");

    const tasks = this.queue;
    this.queue = [];
    const total = tasks.length;
    const results: (null | T)[] = new Array<null | T>(total).fill(null);
    if (total === 0) return results;

    this.processing = true;
    let issued = 0;   // tasks taken from the batch
    let finished = 0; // tasks completed
    let running = 0;

    return new Promise<(null | T)[]>((resolve) => {
      const runOne = async (index: number, task: Task<T>) => {
        running++;
        let value: null | T = null;
        try {
          value = await task();
        } catch (err) {
          getLogger()?.error("[RateLimitedQueue] task failed", err, { index });
        }
        results[index] = value;

        if (onResult) {
          try {
            await onResult(value, index, total);
          } catch (err) {
            getLogger()?.error("[RateLimitedQueue] onResult callback failed", err, { index });
          }
        }

        running--;
        finished++;
        if (finished === total) {
          this.processing = false;
          this.clearTimer();
          resolve(results);
          return;
        }
        // a slot opened up
        scheduleNext();
      };

      const tick = () => {
        this.timer = null;
        this.refill();

        // Launch as many as tokens & concurrency allow
        while (running < this.concurrency && this.tokens >= 1 && issued < total) {
          this.tokens -= 1;
          const index = issued;
          issued++;
          void runOne(index, tasks[index]);
        }

        if (issued < total) scheduleNext();
      };

      const scheduleNext = () => {
        if (this.timer !== null || issued >= total || running >= this.concurrency) return;
        this.timer = setTimeout(tick, this.nextWakeMs());
      };

      scheduleNext();
    });
  }

  size(): number {
    return this.queue.length;
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Precise next wake time based on token availability
   */
  private nextWakeMs(): number {
    this.refill();
    if (this.tokens >= 1) return this.minTickMs;
    const deficit = 1 - this.tokens;              // tokens needed to reach a whole token
    const wait = (deficit * 1000) / this.rate;    // ms until then at current fill
    const jitter = this.jitterMs ? Math.random() * this.jitterMs : 0;
    return Math.max(this.minTickMs, wait + jitter);
  }

  private refill(): void {
    const now = performance.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.burst, this.tokens + (elapsed * this.rate) / 1000);
      this.lastRefill = now;
    }
  }
}
