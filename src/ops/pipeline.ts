/**
 * Pipeline driver.
 *
 * Opens the operator chain against the source schema, pushes every source
 * row through the head consumer and returns the result of closing it.
 *
 * Execution flow:
 * 1. Open all operators (fail fast: no row is read if this throws)
 * 2. Push rows until the source is exhausted or a limit is reached
 * 3. Close the chain and return the terminal consumer's result
 */

import { getLogger } from '../core/logging';
import { InvalidOperationError, isLimitReached } from '../errors';
import type { RowStream } from '../io/source';
import type { StreamConsumer } from './consumer';
import type { StreamOperator } from './operator';
import { closeAfterFailure } from './stream';

/**
 * Open the first operator against the source schema; it opens the rest.
 */
export function openPipeline(source: RowStream, operators: readonly StreamOperator[]): StreamConsumer {
  const [first, ...rest] = operators;
  if (!first) {
    throw new InvalidOperationError('run', 'needs at least one operator');
  }
  return first.open(source, source.columns, [], rest);
}

/**
 * Run operators over a source and return the terminal result.
 *
 * A limit signal ends the iteration normally. Any other error still closes
 * the chain, so files opened by writers are released, and is then rethrown.
 */
export function runPipeline(source: RowStream, operators: readonly StreamOperator[]): unknown {
  const logger = getLogger();
  const consumer = openPipeline(source, operators);
  const start = performance.now();
  let rows = 0;

  logger.debug('pipeline started', { operators: operators.map((op) => op.name) });

  try {
    for (const [rowId, row] of source.rows()) {
      rows++;
      consumer.consume(rowId, row);
    }
  } catch (error) {
    if (!isLimitReached(error)) {
      closeAfterFailure(consumer, error);
      throw error;
    }
    logger.debug('pipeline stopped by limit', { limit: error.limit, rows });
  }

  const result = consumer.close();
  logger.debug('pipeline finished', {
    rows,
    durationMs: Math.round(performance.now() - start),
  });
  return result;
}
