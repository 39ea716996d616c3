import log from "@apify/log";
import { QueueBackpressureError, QueueClosedError, QueueTimeoutError } from "./errors";

export interface RequestQueueConfig {
  concurrency: number;
  maxSize?: number;
  /** Per-task budget; unset means tasks rely on their own cancellation. */
  taskTimeoutMs?: number;
  name?: string;
}

export interface RequestQueueStats {
  accepting: boolean;
  queued: number;
  inflight: number;
  completed: number;
  failed: number;
}

interface QueueTask {
  execute: () => Promise<void>;
  fail: (error: unknown) => void;
}

const withTimeout = async <T>(task: Promise<T>, timeoutMs: number | undefined): Promise<T> => {
  if (timeoutMs === undefined) return task;

  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => {
      reject(new QueueTimeoutError({ timeout_ms: timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export class AsyncRequestQueue {
  private readonly config: RequestQueueConfig;
  private readonly pending: QueueTask[] = [];
  private inflight = 0;
  private accepting = true;
  private completed = 0;
  private failed = 0;
  private drainResolvers: Array<() => void> = [];

  public constructor(config: RequestQueueConfig) {
    this.config = { ...config, concurrency: Math.max(1, config.concurrency) };
  }

  public getStats(): RequestQueueStats {
    return {
      accepting: this.accepting,
      queued: this.pending.length,
      inflight: this.inflight,
      completed: this.completed,
      failed: this.failed,
    };
  }

  public pause(): void {
    this.accepting = false;
  }

  public async enqueue<T>(run: () => Promise<T>): Promise<T> {
    if (!this.accepting) {
      throw new QueueClosedError({ ...this.getStats() });
    }
    if (this.config.maxSize !== undefined && this.pending.length >= this.config.maxSize) {
      throw new QueueBackpressureError({ ...this.getStats(), max_size: this.config.maxSize });
    }

    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        execute: async () => {
          resolve(await withTimeout(run(), this.config.taskTimeoutMs));
        },
        fail: reject,
      });
      this.pump();
    });
  }

  public async drain(timeoutMs: number): Promise<void> {
    if (this.pending.length === 0 && this.inflight === 0) return;

    await withTimeout(
      new Promise<void>((resolve) => {
        this.drainResolvers.push(resolve);
      }),
      timeoutMs,
    );
  }

  private pump(): void {
    while (this.inflight < this.config.concurrency && this.pending.length > 0) {
      const task = this.pending.shift();
      if (!task) return;

      this.inflight += 1;
      void this.runTask(task);
    }
  }

  private async runTask(task: QueueTask): Promise<void> {
    try {
      await task.execute();
      this.completed += 1;
    } catch (error) {
      this.failed += 1;
      task.fail(error);
    } finally {
      this.inflight -= 1;
      this.pump();
      this.resolveDrainIfIdle();
    }
  }

  private resolveDrainIfIdle(): void {
    if (this.pending.length > 0 || this.inflight > 0) return;
    if (this.drainResolvers.length === 0) return;

    const resolvers = [...this.drainResolvers];
    this.drainResolvers = [];
    for (const resolve of resolvers) resolve();
    log.info("Request queue drained.", { queue: this.config.name ?? "default" });
  }
}
