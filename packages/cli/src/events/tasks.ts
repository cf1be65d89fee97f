import { describeError, toAppError } from '../errors';
import type { Logger } from '../logging';
import type { AppEvent } from './event';

/**
 * Tracks background tasks and hands their results (or their failure, as an
 * error event) to `deliver`.
 */
export class TaskRunner {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly deliver: (event: AppEvent) => void,
    private readonly logger: Logger,
  ) {}

  spawn(label: string, task: () => Promise<AppEvent[]>): void {
    const run = (async () => {
      try {
        const events = await task();
        for (const event of events) {
          this.deliver(event);
        }
      } catch (error) {
        this.logger.error(`Task ${label} failed: ${describeError(error)}`);
        this.deliver(toAppError(error, label));
      }
    })();

    this.pending.add(run);
    void run.finally(() => this.pending.delete(run));
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Resolves once every task, including ones spawned meanwhile, has settled.
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
