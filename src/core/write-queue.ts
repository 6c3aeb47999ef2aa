import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("write-queue");

/**
 * Serializes async work so that each task starts only after the previous one
 * settles. Each caller still receives its own task's result or rejection.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(work);
    this.pending++;
    this.tail = result.then(
      () => {
        this.pending--;
      },
      (err: unknown) => {
        this.pending--;
        log.debug({ err }, "Queued write failed, continuing chain");
      },
    );
    return result;
  }

  /** Number of tasks queued or running */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}
