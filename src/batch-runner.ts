import { setTimeout as sleep } from 'timers/promises';
import { BatchCancelledError, BatchTimeoutError } from './errors.js';

export interface BatchSettings {
  batchSize: number;
  /** Batches in flight at once */
  concurrency?: number;
  /** Pause between waves of concurrent batches */
  delayMs?: number;
  /** Per-call timeout; 0 disables it */
  timeoutMs?: number;
  retries?: number;
  /** First retry delay, doubled on each further attempt */
  backoffMs?: number;
}

export interface BatchOptions<T, R> extends BatchSettings {
  signal?: AbortSignal;
  label?: string;
  /** Converts a failed item into a result so that nothing is dropped */
  onFailure: (item: T, error: Error) => R;
}

/** `signal` is aborted when the attempt times out; workers pass it on to their I/O */
export type BatchWorker<T, R> = (batch: T[], batchIndex: number, signal: AbortSignal) => Promise<R[]>;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs one attempt under a timeout. On timeout the attempt's signal is
 * aborted and the call is awaited until it settles, so an abandoned call
 * still counts against the concurrency cap.
 */
async function withTimeout<R>(run: (signal: AbortSignal) => Promise<R>, timeoutMs: number): Promise<R> {
  const controller = new AbortController();
  const work = run(controller.signal);
  if (timeoutMs <= 0) return work;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new BatchTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } catch (error) {
    if (controller.signal.aborted) {
      await work.then(
        () => undefined,
        () => undefined,
      );
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batchSize = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

/**
 * Runs `worker` over fixed-size batches, at most `concurrency` at a time,
 * pausing `delayMs` between waves. A batch that times out or throws is
 * retried with exponential backoff and then converted item by item through
 * `onFailure`. A timed-out attempt is aborted and awaited before its retry.
 * Cancellation is checked between waves; items of batches never started
 * resolve to `BatchCancelledError`. Results are aligned with `items`.
 */
export async function runInBatches<T, R>(
  items: readonly T[],
  worker: BatchWorker<T, R>,
  options: BatchOptions<T, R>,
): Promise<R[]> {
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const delayMs = options.delayMs ?? 0;
  const timeoutMs = options.timeoutMs ?? 0;
  const retries = Math.max(0, options.retries ?? 0);
  const backoffMs = options.backoffMs ?? 1000;
  const label = options.label ?? 'BATCH';

  const batchSize = Math.max(1, Math.floor(options.batchSize));
  const batches = chunk(items, batchSize);
  const results: R[] = new Array<R>(items.length);

  const fail = (offset: number, batch: T[], error: Error): void => {
    batch.forEach((item, i) => {
      results[offset + i] = options.onFailure(item, error);
    });
  };

  const runBatch = async (batch: T[], index: number): Promise<void> => {
    const offset = index * batchSize;
    const tag = `[${label} ${index + 1}/${batches.length}]`;

    for (let attempt = 0; ; attempt++) {
      const startTime = Date.now();
      try {
        const output = await withTimeout(signal => worker(batch, index, signal), timeoutMs);
        if (output.length !== batch.length) {
          throw new Error(`worker returned ${output.length} results for ${batch.length} items`);
        }
        output.forEach((result, i) => {
          results[offset + i] = result;
        });
        console.log(`${tag} ${batch.length} items in ${Date.now() - startTime}ms`);
        return;
      } catch (error) {
        const err = toError(error);
        if (attempt < retries && !options.signal?.aborted) {
          const wait = backoffMs * 2 ** attempt;
          console.warn(`${tag} attempt ${attempt + 1} failed: ${err.message}; retrying in ${wait}ms`);
          await sleep(wait);
          continue;
        }
        console.error(`${tag} failed after ${attempt + 1} attempt(s): ${err.message}`);
        fail(offset, batch, err);
        return;
      }
    }
  };

  for (let start = 0; start < batches.length; start += concurrency) {
    if (start > 0 && delayMs > 0 && !options.signal?.aborted) {
      await sleep(delayMs);
    }

    if (options.signal?.aborted) {
      console.warn(`[${label}] cancelled with ${batches.length - start} batch(es) not started`);
      for (let index = start; index < batches.length; index++) {
        const batch = batches[index] ?? [];
        fail(index * batchSize, batch, new BatchCancelledError());
      }
      break;
    }

    const wave = batches.slice(start, start + concurrency);
    await Promise.all(wave.map((batch, i) => runBatch(batch, start + i)));
  }

  return results;
}
