import { SchemaMismatchError } from '../common/errors';
import { descriptorFor, descriptorForValue, literal } from '../common/type-map';
import { ColumnMeta, isNull, Row, Value } from '../common/types';
import type { ComparisonOperator, Condition, Expr } from './condition-parser';

/**
 * Engine spelling of each comparison operator
 */
export const OPERATOR_MAP: Readonly<Record<ComparisonOperator, string>> = {
  '>': '>',
  '<': '<',
  '>=': '>=',
  '<=': '<=',
  '=': '=',
  '==': '=',
  '!=': '<>',
  like: 'like',
  '~': '~',
};

export function metadataQuery(table: string): string {
  return `select c, t from meta \`${table}`;
}

export function countQuery(table: string): string {
  return `count ${table}`;
}

/**
 * One index is sent as an atom, several as a list, none as the fallback expression
 */
export function indexList(indices: readonly number[], whenEmpty: string): string {
  if (indices.length === 0) {
    return whenEmpty;
  }
  return `(${indices.join(';')})`;
}

/**
 * Positional selection on the unkeyed table, columns looked up by name
 */
export function ilocQuery(table: string, rows: readonly number[], cols: readonly number[]): string {
  const rowIndices = indexList(rows, `til count ${table}`);
  const columnIndices = indexList(cols, `til count cols ${table}`);
  return `(0!${table})[${rowIndices};(cols ${table})[${columnIndices}]]`;
}

/**
 * Renders parsed conditions into a chain of nested selects
 * Needs the table's metadata to decide when a bare word is a symbol literal
 */
export class ConditionQueryBuilder {
  private readonly columnTypes: Map<string, number>;

  constructor(metadata: readonly ColumnMeta[]) {
    this.columnTypes = new Map(metadata.map(column => [column.name, column.typeCode]));
  }

  /**
   * Each condition filters the result of the one before it
   */
  buildQuery(table: string, conditions: readonly Condition[]): string {
    return conditions.reduce((previous, condition) => this.renderStep(previous, condition), table);
  }

  renderStep(previous: string, condition: Condition): string {
    return `(0!select from (${previous}) where ${this.renderCondition(condition)})`;
  }

  renderCondition(condition: Condition): string {
    const left = this.renderExpr(condition.left);
    const right = this.renderRightHand(condition);
    return `${left} ${OPERATOR_MAP[condition.operator]} ${right}`;
  }

  renderExpr(expr: Expr): string {
    switch (expr.kind) {
      case 'identifier':
        return expr.name;
      case 'number':
      case 'string':
      case 'symbol':
        return expr.text;
      case 'call':
        return `${expr.name}(${this.renderExpr(expr.argument)})`;
      case 'paren':
        // Binary expressions already carry their own parentheses
        return expr.inner.kind === 'binary' ? this.renderExpr(expr.inner) : `(${this.renderExpr(expr.inner)})`;
      case 'binary': {
        // The engine evaluates right to left, so every operation is bracketed
        const operator = expr.operator === '/' ? '%' : expr.operator;
        return `(${this.renderExpr(expr.left)} ${operator} ${this.renderExpr(expr.right)})`;
      }
    }
  }

  /**
   * A bare word or unsigned number compared against a bare column is quoted by the column's type
   */
  private renderRightHand(condition: Condition): string {
    const { left, right } = condition;
    const bare =
      right.kind === 'identifier' ? right.name : right.kind === 'number' && !right.text.startsWith('-') ? right.text : undefined;
    if (left.kind === 'identifier' && bare !== undefined) {
      const typeCode = this.columnTypes.get(left.name);
      const descriptor = typeCode === undefined ? undefined : descriptorFor(typeCode);
      if (descriptor) {
        return descriptor.quoteBareWord(bare);
      }
    }
    return this.renderExpr(right);
  }
}

function columnLiteral(values: readonly Value[]): string[] {
  const typed = values.find(value => !isNull(value));
  const descriptor = typed ? descriptorForValue(typed) : undefined;
  return values.map(value => (isNull(value) && descriptor ? descriptor.literal(value) : literal(value)));
}

/**
 * Table definition from rows of values; nulls take the type of the first typed value in their column
 */
export function makeTableQuery(name: string, columns: readonly string[], rows: readonly Row[]): string {
  if (columns.length === 0 || rows.length === 0) {
    throw new SchemaMismatchError('Cannot make a table without columns and rows');
  }
  rows.forEach((row, index) => {
    if (row.length !== columns.length) {
      throw new SchemaMismatchError(`Row ${index} has ${row.length} values, expected ${columns.length}`);
    }
  });

  const definitions = columns.map((column, c) => {
    const literals = columnLiteral(rows.map(row => row[c]));
    const values = literals.length === 1 ? `enlist ${literals[0]}` : `(${literals.join(';')})`;
    return `${column}:${values}`;
  });
  return `${name}:([] ${definitions.join('; ')})`;
}
