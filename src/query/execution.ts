import { Logger } from '@nestjs/common';
import { QueryExecutionError } from '../common/errors';
import { truncateForLog } from '../common/logging.utils';
import { ExecutionStatus, QueryExecutor } from '../database/types';
import type { WireObject } from '../wire/types';

/**
 * Run a query whose reply must carry data
 */
export async function executeForData(executor: QueryExecutor, query: string, logger: Logger): Promise<WireObject> {
  logger.debug(`Query: ${truncateForLog(query)}`);
  const outcome = await executor.execute(query);
  switch (outcome.status) {
    case ExecutionStatus.Data:
      return outcome.data;
    case ExecutionStatus.Failed:
      logger.error(`Query failed: ${truncateForLog(query)}: ${outcome.message}`);
      throw new QueryExecutionError(query, outcome.message);
    case ExecutionStatus.Done:
      logger.error(`Query returned no data: ${truncateForLog(query)}`);
      throw new QueryExecutionError(query, 'no data returned');
  }
}

/**
 * Run a statement; only a failure reply is an error
 */
export async function executeStatement(executor: QueryExecutor, query: string, logger: Logger): Promise<void> {
  logger.debug(`Statement: ${truncateForLog(query)}`);
  const outcome = await executor.execute(query);
  if (outcome.status === ExecutionStatus.Failed) {
    logger.error(`Statement failed: ${truncateForLog(query)}: ${outcome.message}`);
    throw new QueryExecutionError(query, outcome.message);
  }
}
