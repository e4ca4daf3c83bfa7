import { describeError, type Logger } from "./logger.js";

/**
 * Tracks fire-and-forget work (mention verification, subscription
 * handshakes, publish fan-out) so callers can respond right away while
 * shutdown and tests can still wait for everything to settle.
 */
export class BackgroundTasks {
  private pending = new Set<Promise<void>>();

  constructor(private readonly logger: Logger) {}

  run(label: string, task: () => Promise<unknown>): void {
    const promise = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error(`${label} failed: ${describeError(error)}`);
        }
      )
      .finally(() => {
        this.pending.delete(promise);
      });

    this.pending.add(promise);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Wait until no task is pending, including tasks started by other tasks.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
