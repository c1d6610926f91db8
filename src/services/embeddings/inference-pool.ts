// src/services/embeddings/inference-pool.ts: bounded queue in front of model inference
//
// Request paths submit work here: at most `concurrency` batches run at once,
// the queue is capped, and every batch starts on a fresh macrotask so the
// submitting request yields the event loop first. Batches still run on the
// event-loop thread. That suits network backends (OpenAI), which await I/O;
// the hashed backend's synchronous CPU work is not moved off the thread.

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { InferenceQueueFullError } from '@/utils/errors';

/** Settles its own caller's promise; never rejects. */
type QueuedTask = () => Promise<void>;

export interface InferencePoolOptions {
  concurrency: number;
  /** Pending (not yet running) tasks allowed before new work is rejected. */
  queueLimit: number;
}

export class InferencePool {
  private readonly queue: QueuedTask[] = [];
  private active = 0;

  constructor(private readonly options: InferencePoolOptions) {
    if (options.concurrency < 1) throw new Error('InferencePool concurrency must be >= 1');
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.queue.length >= this.options.queueLimit) {
      return Promise.reject(new InferenceQueueFullError(this.options.queueLimit));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          await yieldToEventLoop();
          resolve(await task());
        } catch (err) {
          reject(err);
        }
      });
      this.drain();
    });
  }

  getStatus(): { active: number; queued: number } {
    return { active: this.active, queued: this.queue.length };
  }

  private drain(): void {
    while (this.active < this.options.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;
      this.active++;
      void this.execute(next);
    }
  }

  private async execute(task: QueuedTask): Promise<void> {
    try {
      await task();
    } finally {
      this.active--;
      this.drain();
    }
  }
}
