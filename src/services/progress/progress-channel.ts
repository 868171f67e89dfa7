/**
 * Progress reporting
 *
 * The pipeline reports through a ProgressSink callback. ProgressChannel adapts
 * a sink into a bounded async queue that a consumer drains with `for await`;
 * when the consumer falls behind, the oldest events are dropped.
 */

export type ProgressStage = 'style-guide' | 'document';

export type ProgressPhase = 'reading' | 'processing' | 'indexing' | 'correcting';

export interface ProgressUpdate {
  phase: ProgressPhase;
  current: number;
  total: number;
  message: string;
}

export interface ProgressEvent extends ProgressUpdate {
  stage: ProgressStage;
}

export type ProgressSink = (stage: ProgressStage, update: ProgressUpdate) => void;

export const DEFAULT_PROGRESS_CAPACITY = 100;

export class ProgressChannel implements AsyncIterable<ProgressEvent> {
  private readonly queue: ProgressEvent[] = [];
  private readonly waiters: Array<() => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly capacity = DEFAULT_PROGRESS_CAPACITY) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue an event. Returns false once the channel is closed.
   */
  push(event: ProgressEvent): boolean {
    if (this.closed) return false;

    this.queue.push(event);
    while (this.queue.length > Math.max(1, this.capacity)) {
      this.queue.shift();
      this.droppedCount++;
    }

    this.wake();
    return true;
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  asSink(): ProgressSink {
    return (stage, update) => {
      this.push({ stage, ...update });
    };
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ProgressEvent, void, undefined> {
    while (true) {
      const next = this.queue.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.closed) return;

      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  private wake(): void {
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }
}
