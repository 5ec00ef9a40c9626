import { Queue, QueueEvents } from "bullmq";
import IORedis from "ioredis";
import type { MergeJobData, MergeResult, QueueStats } from "../types";
import { QueueFullError } from "./errors";

export const QUEUE_NAME = "reels-merge-queue";

export type MergeProcessor = (data: MergeJobData) => Promise<MergeResult>;

export interface MergeQueue {
  /** Resolves once the job has finished; rejects with QueueFullError when saturated. */
  submit(data: MergeJobData): Promise<MergeResult>;
  stats(): Promise<QueueStats>;
  close(): Promise<void>;
}

export interface QueueLimits {
  concurrency: number;
  maxWaiting: number;
}

interface Pending {
  data: MergeJobData;
  resolve: (result: MergeResult) => void;
  reject: (error: unknown) => void;
}

// In-process admission control: `concurrency` running, `maxWaiting` queued FIFO.
export class LocalMergeQueue implements MergeQueue {
  private active = 0;
  private closed = false;
  private readonly waiting: Pending[] = [];

  constructor(
    private readonly processor: MergeProcessor,
    private readonly limits: QueueLimits,
  ) {}

  submit(data: MergeJobData): Promise<MergeResult> {
    if (this.closed) return Promise.reject(new Error("Merge queue is closed"));

    return new Promise<MergeResult>((resolve, reject) => {
      const pending = { data, resolve, reject };
      if (this.active < this.limits.concurrency) {
        this.run(pending);
      } else if (this.waiting.length < this.limits.maxWaiting) {
        this.waiting.push(pending);
      } else {
        reject(new QueueFullError(this.limits.maxWaiting));
      }
    });
  }

  async stats(): Promise<QueueStats> {
    return {
      active: this.active,
      waiting: this.waiting.length,
      concurrency: this.limits.concurrency,
      maxWaiting: this.limits.maxWaiting,
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const pending of this.waiting.splice(0)) {
      pending.reject(new Error("Merge queue is closed"));
    }
  }

  private run(pending: Pending) {
    this.active += 1;
    void this.processor(pending.data)
      .then(pending.resolve, pending.reject)
      .finally(() => {
        this.active -= 1;
        const next = this.waiting.shift();
        if (next) this.run(next);
      });
  }
}

export const createRedisConnection = (redisUrl: string) =>
  new IORedis(redisUrl, {
    maxRetriesPerRequest: null,
  });

/**
 * BullMQ-backed queue. The HTTP request stays open until the worker
 * (see worker.ts) reports the job as completed or failed.
 */
export class BullMergeQueue implements MergeQueue {
  private readonly queue: Queue<MergeJobData, MergeResult>;
  private readonly events: QueueEvents;

  constructor(
    connection: IORedis,
    private readonly limits: QueueLimits,
  ) {
    this.queue = new Queue<MergeJobData, MergeResult>(QUEUE_NAME, { connection });
    this.events = new QueueEvents(QUEUE_NAME, { connection: connection.duplicate() });
  }

  async submit(data: MergeJobData): Promise<MergeResult> {
    const waiting = await this.queue.getWaitingCount();
    if (waiting >= this.limits.maxWaiting) {
      throw new QueueFullError(this.limits.maxWaiting);
    }

    const job = await this.queue.add("merge", data, {
      attempts: 1,
      removeOnComplete: { age: 3600 },
      removeOnFail: { age: 3600 },
    });
    return job.waitUntilFinished(this.events);
  }

  async stats(): Promise<QueueStats> {
    const counts = await this.queue.getJobCounts("active", "waiting");
    return {
      active: counts.active ?? 0,
      waiting: counts.waiting ?? 0,
      concurrency: this.limits.concurrency,
      maxWaiting: this.limits.maxWaiting,
    };
  }

  async close(): Promise<void> {
    await this.events.close();
    await this.queue.close();
  }
}
