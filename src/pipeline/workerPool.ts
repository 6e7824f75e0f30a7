import { errorMessage, type Logger } from "../observability";

export type UnitOutcome<T, O> = { item: T; ok: true; value: O } | { item: T; ok: false; error: string };

export interface WorkerPoolOptions<T, R> {
  concurrency: number;
  /** Creates the resource a worker owns for its whole life. Resources are never shared. */
  createResource: (workerIndex: number) => R;
  releaseResource: (resource: R) => Promise<void>;
  logger: Logger;
  /** Pause after each unit, per worker. */
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  describeItem?: (item: T) => string;
}

export interface PoolSummary {
  dispatched: number;
  succeeded: number;
  failed: number;
  stopped: boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isAsyncIterable<T>(items: Iterable<T> | AsyncIterable<T>): items is AsyncIterable<T> {
  return Symbol.asyncIterator in items;
}

async function* fromIterable<T>(items: Iterable<T>): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

/**
 * Bounded pool over a possibly unbounded stream of items. Each of the `concurrency` workers
 * pulls the next item only after it has processed and reported the previous one, so at most
 * `concurrency` items are in flight. A failing item becomes an `ok: false` outcome.
 */
export class WorkerPool<T, R> {
  private readonly options: WorkerPoolOptions<T, R>;
  private readonly sleep: (ms: number) => Promise<void>;
  private stopRequested = false;

  constructor(options: WorkerPoolOptions<T, R>) {
    this.options = options;
    this.sleep = options.sleep ?? sleep;
  }

  /** Cooperative stop: items already in flight finish, nothing new is dispatched. */
  stop(): void {
    this.stopRequested = true;
  }

  get isStopped(): boolean {
    return this.stopRequested;
  }

  async run<O>(
    items: Iterable<T> | AsyncIterable<T>,
    handle: (item: T, resource: R) => Promise<O>,
    onOutcome: (outcome: UnitOutcome<T, O>) => Promise<void> | void,
  ): Promise<PoolSummary> {
    const { logger } = this.options;
    const source = isAsyncIterable(items) ? items : fromIterable(items);
    const iterator = source[Symbol.asyncIterator]();
    const describe = this.options.describeItem ?? ((item: T) => String(item));
    const summary: PoolSummary = { dispatched: 0, succeeded: 0, failed: 0, stopped: false };
    let exhausted = false;
    let abandoned = false;

    const worker = async (workerIndex: number): Promise<void> => {
      const resource = this.options.createResource(workerIndex);
      try {
        while (!this.stopRequested && !exhausted) {
          const next = await iterator.next();
          if (next.done) {
            exhausted = true;
            break;
          }
          if (this.stopRequested) {
            abandoned = true;
            break;
          }

          const item = next.value;
          summary.dispatched += 1;

          let outcome: UnitOutcome<T, O>;
          try {
            outcome = { item, ok: true, value: await handle(item, resource) };
            summary.succeeded += 1;
          } catch (error) {
            outcome = { item, ok: false, error: errorMessage(error) };
            summary.failed += 1;
          }

          try {
            await onOutcome(outcome);
          } catch (error) {
            logger.error("worker_outcome_handler_failed", { workerIndex, item: describe(item), error: errorMessage(error) });
          }

          if (this.options.delayMs && this.options.delayMs > 0 && !this.stopRequested) {
            await this.sleep(this.options.delayMs);
          }
        }
      } finally {
        await this.options.releaseResource(resource).catch((error: unknown) => {
          logger.warn("worker_resource_release_failed", { workerIndex, error: errorMessage(error) });
        });
      }
    };

    const concurrency = Math.max(1, this.options.concurrency);
    await Promise.all(Array.from({ length: concurrency }, (_, index) => worker(index)));

    // An item pulled after stop was never handled, even if the source ran dry meanwhile.
    summary.stopped = this.stopRequested && (!exhausted || abandoned);
    if (summary.stopped && iterator.return) {
      await iterator.return();
    }
    return summary;
  }
}
