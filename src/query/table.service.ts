import { Injectable, Logger } from '@nestjs/common';
import { SchemaMismatchError } from '../common/errors';
import { Row, ValueType } from '../common/types';
import { QueryExecutor } from '../database/types';
import { executeForData, executeStatement } from './execution';
import { countQuery, makeTableQuery } from './query-builder';
import { convert } from './value-converter';

/**
 * TableService counts rows and creates tables from host values
 */
@Injectable()
export class TableService {
  private readonly logger = new Logger(TableService.name);

  async count(executor: QueryExecutor, table: string): Promise<number> {
    const data = await executeForData(executor, countQuery(table), this.logger);
    const value = data.kind === 'atom' ? convert(data) : undefined;
    if (value?.type === ValueType.Long) {
      return Number(value.value);
    }
    if (value?.type === ValueType.Int) {
      return value.value;
    }
    throw new SchemaMismatchError(`Expected an integer row count for ${table}, got wire type ${data.type}`);
  }

  /**
   * Define a global table; a single row becomes one-element columns
   */
  async makeTable(executor: QueryExecutor, name: string, columns: readonly string[], rows: readonly Row[]): Promise<void> {
    const query = makeTableQuery(name, columns, rows);
    await executeStatement(executor, query, this.logger);
    this.logger.log(`Created table ${name} with ${rows.length} rows and ${columns.length} columns`);
  }
}
