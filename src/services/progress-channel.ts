import type { ProgressSink } from '../types';

export interface ProgressEvent {
  studentName: string;
  statusLabel: string;
  studentIndex: number;
  success?: boolean;
  timestamp: Date;
}

/**
 * Queue of progress events. The pipeline pushes through onProgress,
 * consumers read with for-await at their own pace until close() is called.
 */
export class ProgressChannel implements ProgressSink, AsyncIterable<ProgressEvent> {
  private readonly queue: ProgressEvent[] = [];
  private readonly waiters: Array<(result: IteratorResult<ProgressEvent>) => void> = [];
  private closed = false;

  onProgress(studentName: string, statusLabel: string, studentIndex: number, success?: boolean): void {
    if (this.closed) {
      return;
    }
    const event: ProgressEvent = { studentName, statusLabel, studentIndex, success, timestamp: new Date() };
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
    } else {
      this.queue.push(event);
    }
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    return {
      next: () => {
        const event = this.queue.shift();
        if (event) {
          return Promise.resolve({ value: event, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise(resolve => this.waiters.push(resolve));
      }
    };
  }
}
