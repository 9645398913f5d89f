import { Injectable, Logger } from '@nestjs/common';
import { OutOfBoundsError, SchemaMismatchError } from '../common/errors';
import { ColumnMeta, SelectionResult } from '../common/types';
import { QueryExecutor } from '../database/types';
import { parseConditions } from './condition-parser';
import { executeForData } from './execution';
import { MetadataService } from './metadata.service';
import { ConditionQueryBuilder, ilocQuery } from './query-builder';
import { shapeGrid, shapeTable } from './result-shaper';
import { TableService } from './table.service';

function checkBounds(axis: 'row' | 'column', indices: readonly number[], limit: number): void {
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= limit) {
      throw new OutOfBoundsError(axis, index, limit);
    }
  }
}

/**
 * SelectionService answers positional (iloc) and conditional (loc) selections
 * Inputs are validated before the selection query is sent
 */
@Injectable()
export class SelectionService {
  private readonly logger = new Logger(SelectionService.name);

  constructor(
    private readonly metadataService: MetadataService,
    private readonly tableService: TableService,
  ) {}

  /**
   * Select rows and columns by position; an empty list selects all of that axis
   */
  async iloc(
    executor: QueryExecutor,
    table: string,
    rows: readonly number[] = [],
    cols: readonly number[] = [],
  ): Promise<SelectionResult> {
    const metadata = await this.requireMetadata(executor, table);
    const rowCount = await this.tableService.count(executor, table);
    checkBounds('row', rows, rowCount);
    checkBounds('column', cols, metadata.length);

    const data = await executeForData(executor, ilocQuery(table, rows, cols), this.logger);
    return shapeGrid(data, { singleRow: rows.length === 1, singleColumn: cols.length === 1 });
  }

  /**
   * Select rows matching every comma-separated condition, applied left to right
   */
  async loc(executor: QueryExecutor, table: string, conditionText: string): Promise<SelectionResult> {
    const conditions = parseConditions(conditionText);
    const metadata = await this.requireMetadata(executor, table);
    const query = new ConditionQueryBuilder(metadata).buildQuery(table, conditions);

    const data = await executeForData(executor, query, this.logger);
    return shapeTable(data);
  }

  private async requireMetadata(executor: QueryExecutor, table: string): Promise<ColumnMeta[]> {
    const metadata = await this.metadataService.getMetadata(executor, table);
    if (metadata.length === 0) {
      this.logger.error(`No schema available for ${table}`);
      throw new SchemaMismatchError(`No schema available for table ${table}`);
    }
    return metadata;
  }
}
