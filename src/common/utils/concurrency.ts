type ErrorLogger = {
  error: (message: string, trace?: string) => void;
};

const toError = (reason: unknown): Error =>
  reason instanceof Error ? reason : new Error(`Non-Error thrown: ${String(reason)}`);

/**
 * Runs `processFn` over `items` with at most `concurrency` calls in flight.
 * Results come back in input order, settled like Promise.allSettled.
 */
export async function processInBatchesSettled<T, R>(
  items: T[],
  processFn: (item: T, index: number) => Promise<R>,
  concurrency: number,
): Promise<PromiseSettledResult<R>[]> {
  const limit = Math.floor(concurrency);
  if (!Number.isFinite(limit) || limit < 1) {
    throw new RangeError(`Concurrency must be at least 1. Received: ${concurrency}`);
  }

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let cursor = 0;

  const worker = async () => {
    for (let index = cursor++; index < items.length; index = cursor++) {
      try {
        results[index] = { status: 'fulfilled', value: await processFn(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}

/**
 * Folds the rejections of a settled batch into one logged AggregateError,
 * or returns null when every item succeeded.
 */
export function logFailedResults<T>(
  results: PromiseSettledResult<T>[],
  operation: string,
  logger: ErrorLogger,
): AggregateError | null {
  const errors = results
    .filter((result): result is PromiseRejectedResult => result.status === 'rejected')
    .map((result) => toError(result.reason));

  if (errors.length === 0) {
    return null;
  }

  const failure = new AggregateError(
    errors,
    `Batch operation '${operation}' had ${errors.length} failures out of ${results.length} items`,
  );
  logger.error(failure.message, failure.stack);
  return failure;
}
