import {pipe} from "it-pipe";
import {pushable} from "it-pushable";
import {PrestakeError} from "@prestake/utils";

export enum QueueErrorCode {
  QUEUE_ABORTED = "QUEUE_ERROR_QUEUE_ABORTED",
  QUEUE_THROTTLED = "QUEUE_ERROR_QUEUE_THROTTLED",
}

export type QueueErrorCodeType = {code: QueueErrorCode.QUEUE_ABORTED} | {code: QueueErrorCode.QUEUE_THROTTLED};

export class QueueError extends PrestakeError<QueueErrorCodeType> {
  constructor(type: QueueErrorCodeType) {
    super(type);
  }
}

type JobQueueItem = {
  /** Runs the job and settles its caller's promise */
  run: () => Promise<void>;
  reject: (reason?: unknown) => void;
};

export type JobQueueOpts = {
  queueSize: number;
  signal: AbortSignal;
  /**
   * Called when a job resolves or rejects.
   * Returns the total milliseconds elapsed from job start to done
   */
  onJobDone?: (data: {ms: number}) => void;
};

/**
 * Runs jobs one at a time in arrival order. A job starts only after the previous one settled,
 * so a job observes every state change made by the jobs enqueued before it.
 */
export class JobQueue {
  private currentSize = 0;
  private readonly queue = pushable<JobQueueItem>({objectMode: true});
  private readonly opts: JobQueueOpts;

  constructor(opts: JobQueueOpts) {
    this.opts = opts;
    // Jobs already pushed are still drained, and rejected as aborted
    opts.signal.addEventListener("abort", () => this.queue.end(), {once: true});
    void pipe(this.queue, async (source) => {
      for await (const job of source) {
        await this.processJob(job);
      }
    });
  }

  enqueueJob<R>(job: () => Promise<R>): Promise<R> {
    if (this.opts.signal.aborted) {
      return Promise.reject(new QueueError({code: QueueErrorCode.QUEUE_ABORTED}));
    }
    if (this.currentSize + 1 > this.opts.queueSize) {
      return Promise.reject(new QueueError({code: QueueErrorCode.QUEUE_THROTTLED}));
    }
    return new Promise<R>((resolve, reject) => {
      const run = async (): Promise<void> => {
        try {
          resolve(await job());
        } catch (e) {
          reject(e);
        }
      };
      this.queue.push({run, reject});
      this.currentSize++;
    });
  }

  private async processJob({run, reject}: JobQueueItem): Promise<void> {
    if (this.opts.signal.aborted) {
      reject(new QueueError({code: QueueErrorCode.QUEUE_ABORTED}));
    } else {
      const start = Date.now();
      try {
        await run();
      } finally {
        this.opts.onJobDone?.({ms: Date.now() - start});
      }
    }
    this.currentSize--;
  }
}
