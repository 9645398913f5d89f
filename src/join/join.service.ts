import { Injectable, Logger } from '@nestjs/common';
import { errorMessage, JoinFailureError, JoinStage } from '../common/errors';
import { truncateForLog } from '../common/logging.utils';
import { ExecutionStatus, QueryExecutor } from '../database/types';
import { rowCount, WireObject, WireType } from '../wire/types';
import {
  adjustedName,
  asofAdjustQuery,
  asofJoinQuery,
  dataColumnsQuery,
  deleteQuery,
  keyedJoinQuery,
  stageQuery,
  stagingName,
  unionJoinQuery,
  windowBoundsQuery,
  windowJoinQuery,
  windowName,
  windowAdjustQuery,
} from './join-query';
import { AsofJoinRequest, JoinKind, JoinRequest, JoinResult, WindowJoinRequest } from './types';

/**
 * Globals created for one join call, deleted in reverse order when it ends
 */
class StagingScope {
  private readonly created: string[] = [];

  constructor(
    private readonly executor: QueryExecutor,
    private readonly logger: Logger,
  ) {}

  /**
   * Run an assignment and track the name it defines
   */
  async create(name: string, query: string, stage: JoinStage): Promise<void> {
    await this.run(query, stage);
    this.created.push(name);
  }

  async run(query: string, stage: JoinStage): Promise<void> {
    await this.query(query, stage);
  }

  async query(query: string, stage: JoinStage): Promise<WireObject | undefined> {
    this.logger.debug(`${stage}: ${truncateForLog(query)}`);
    const outcome = await this.executor.execute(query);
    switch (outcome.status) {
      case ExecutionStatus.Failed:
        throw new JoinFailureError(stage, `${outcome.message} (${truncateForLog(query)})`);
      case ExecutionStatus.Data:
        return outcome.data;
      case ExecutionStatus.Done:
        return undefined;
    }
  }

  /**
   * Best effort; failures are logged and never replace the join's own outcome
   */
  async cleanup(): Promise<void> {
    for (const name of this.created.splice(0).reverse()) {
      try {
        const outcome = await this.executor.execute(deleteQuery(name));
        if (outcome.status === ExecutionStatus.Failed) {
          this.logger.warn(`Failed to delete staging object ${name}: ${outcome.message}`);
        }
      } catch (error) {
        this.logger.warn(`Failed to delete staging object ${name}: ${errorMessage(error)}`);
      }
    }
  }
}

/**
 * JoinService combines two global tables into a named result
 * Every call stages unkeyed copies, runs the join, fetches the result and removes what it staged
 */
@Injectable()
export class JoinService {
  private readonly logger = new Logger(JoinService.name);

  async innerJoin(executor: QueryExecutor, request: JoinRequest): Promise<JoinResult> {
    return this.run(executor, JoinKind.Inner, request, async (scope, left, right) => {
      await scope.run(keyedJoinQuery('ij', request.resultName, left, right, joinColumns(request)), JoinStage.Execute);
    });
  }

  async leftJoin(executor: QueryExecutor, request: JoinRequest): Promise<JoinResult> {
    return this.run(executor, JoinKind.Left, request, async (scope, left, right) => {
      await scope.run(keyedJoinQuery('lj', request.resultName, left, right, joinColumns(request)), JoinStage.Execute);
    });
  }

  /**
   * Left join with the operands swapped: every right row is kept
   */
  async rightJoin(executor: QueryExecutor, request: JoinRequest): Promise<JoinResult> {
    return this.run(executor, JoinKind.Right, request, async (scope, left, right) => {
      await scope.run(keyedJoinQuery('lj', request.resultName, right, left, joinColumns(request)), JoinStage.Execute);
    });
  }

  /**
   * One result row per left row, matched to the latest right row at or before its time
   */
  async asofJoin(executor: QueryExecutor, request: AsofJoinRequest): Promise<JoinResult> {
    this.validateTimeColumns(JoinKind.Asof, request);
    return this.run(executor, JoinKind.Asof, request, async (scope, left, right) => {
      const adjusted = adjustedName(right);
      await scope.create(adjusted, asofAdjustQuery(right, request.leftTime, request.rightTime), JoinStage.Execute);
      await scope.run(
        asofJoinQuery(request.resultName, left, adjusted, request.leftTime, joinColumns(request)),
        JoinStage.Execute,
      );
    });
  }

  /**
   * Last value of every right column within a symmetric window around each left time
   */
  async windowJoin(executor: QueryExecutor, request: WindowJoinRequest): Promise<JoinResult> {
    this.validateTimeColumns(JoinKind.Window, request);
    const columns = joinColumns(request);
    if (columns.length === 0) {
      throw this.invalid('window join needs at least one join column');
    }
    if (!Number.isFinite(request.windowSeconds) || request.windowSeconds <= 0) {
      throw this.invalid(`window size must be a positive number of seconds, got ${request.windowSeconds}`);
    }

    return this.run(executor, JoinKind.Window, request, async (scope, left, right) => {
      const { resultName, leftTime, rightTime, windowSeconds } = request;
      const adjusted = adjustedName(right);
      await scope.create(adjusted, windowAdjustQuery(right, leftTime, rightTime, columns), JoinStage.Execute);
      await scope.create(windowName(resultName), windowBoundsQuery(resultName, left, leftTime, windowSeconds), JoinStage.Execute);

      const excluded = [...new Set([...columns, leftTime, rightTime])];
      const names = await scope.query(dataColumnsQuery(adjusted, excluded), JoinStage.Execute);
      if (names?.kind !== 'vector' || names.type !== WireType.Symbol) {
        throw new JoinFailureError(JoinStage.Execute, `expected the right table's column names from ${adjusted}`);
      }
      const dataColumns = names.values.map(String);
      await scope.run(windowJoinQuery(resultName, left, adjusted, leftTime, columns, dataColumns), JoinStage.Execute);
    });
  }

  /**
   * Rows of the right table appended after the left, missing columns filled with nulls
   */
  async unionJoin(executor: QueryExecutor, request: JoinRequest): Promise<JoinResult> {
    return this.run(executor, JoinKind.Union, request, async (scope, left, right) => {
      await scope.run(unionJoinQuery(request.resultName, left, right), JoinStage.Execute);
    });
  }

  private async run(
    executor: QueryExecutor,
    kind: JoinKind,
    request: JoinRequest,
    execute: (scope: StagingScope, left: string, right: string) => Promise<void>,
  ): Promise<JoinResult> {
    if (!request.left || !request.right || !request.resultName) {
      throw this.invalid(`${kind} join needs a left table, a right table and a result name`);
    }

    const scope = new StagingScope(executor, this.logger);
    try {
      const left = stagingName(request.left);
      const right = stagingName(request.right);
      await scope.create(left, stageQuery(request.left), JoinStage.Stage);
      await scope.create(right, stageQuery(request.right), JoinStage.Stage);

      await execute(scope, left, right);

      const table = await scope.query(request.resultName, JoinStage.Fetch);
      if (table?.kind !== 'table') {
        const got = table ? `wire type ${table.type}` : 'no data';
        throw new JoinFailureError(JoinStage.Fetch, `expected a table for ${request.resultName}, got ${got}`);
      }

      this.logger.log(
        `${kind} join of ${request.left} and ${request.right} stored ${rowCount(table)} rows in ${request.resultName}`,
      );
      return { name: request.resultName, table };
    } catch (error) {
      this.logger.error(`${kind} join into ${request.resultName} failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      await scope.cleanup();
    }
  }

  private validateTimeColumns(kind: JoinKind, request: AsofJoinRequest): void {
    if (!request.leftTime || !request.rightTime) {
      throw this.invalid(`${kind} join needs a left and a right time column`);
    }
  }

  private invalid(message: string): JoinFailureError {
    this.logger.error(message);
    return new JoinFailureError(JoinStage.Validate, message);
  }
}

function joinColumns(request: JoinRequest): readonly string[] {
  return request.joinColumns ?? [];
}
