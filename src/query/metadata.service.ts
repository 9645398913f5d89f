import { Injectable, Logger } from '@nestjs/common';
import { descriptorFor, descriptorForTag } from '../common/type-map';
import { ColumnMeta } from '../common/types';
import { ExecutionStatus, QueryExecutor } from '../database/types';
import { unkey, WireObject, WireType } from '../wire/types';
import { metadataQuery } from './query-builder';

/**
 * Column metadata with a readable type name
 */
export interface ColumnDescription extends ColumnMeta {
  typeName: string;
}

const GENERAL_LIST = 0;

/**
 * MetadataService reads a table's schema from the engine
 * Any malformed answer yields an empty schema rather than a partial one
 */
@Injectable()
export class MetadataService {
  private readonly logger = new Logger(MetadataService.name);

  async getMetadata(executor: QueryExecutor, table: string): Promise<ColumnMeta[]> {
    const query = metadataQuery(table);
    this.logger.debug(`Query: ${query}`);
    const outcome = await executor.execute(query);

    if (outcome.status !== ExecutionStatus.Data) {
      const reason = outcome.status === ExecutionStatus.Failed ? outcome.message : 'no data returned';
      this.logger.warn(`Metadata query for ${table} failed: ${reason}`);
      return [];
    }
    return this.readSchema(table, outcome.data);
  }

  /**
   * Metadata with type names, logged one column per line
   */
  async describe(executor: QueryExecutor, table: string): Promise<ColumnDescription[]> {
    const columns = (await this.getMetadata(executor, table)).map(column => ({
      ...column,
      typeName: descriptorFor(column.typeCode)?.name ?? 'list',
    }));
    this.logger.log(`Table ${table} has ${columns.length} columns`);
    for (const column of columns) {
      this.logger.log(`  ${column.name}: ${column.typeName}`);
    }
    return columns;
  }

  private readSchema(table: string, data: WireObject): ColumnMeta[] {
    const schema = unkey(data);
    if (!schema) {
      this.logger.warn(`Metadata for ${table} is not a table (wire type ${data.type})`);
      return [];
    }

    const names = schema.data[schema.columns.indexOf('c')];
    const tags = schema.data[schema.columns.indexOf('t')];
    if (
      names?.kind !== 'vector' ||
      names.type !== WireType.Symbol ||
      tags?.kind !== 'vector' ||
      tags.type !== WireType.Char ||
      names.values.length !== tags.values.length
    ) {
      this.logger.warn(`Metadata for ${table} lacks symbol column c or char column t`);
      return [];
    }

    return names.values.map((name, index) => ({
      name: String(name),
      typeCode: this.typeCodeOf(String(tags.values[index])),
    }));
  }

  /**
   * Blank and upper-case tags are general or nested lists
   */
  private typeCodeOf(tag: string): number {
    if (tag === ' ' || tag !== tag.toLowerCase()) {
      return GENERAL_LIST;
    }
    const descriptor = descriptorForTag(tag);
    if (!descriptor) {
      this.logger.warn(`Unknown type tag '${tag}', treating column as a general list`);
      return GENERAL_LIST;
    }
    return descriptor.code;
  }
}
