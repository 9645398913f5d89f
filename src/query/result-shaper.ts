import { Logger } from '@nestjs/common';
import { SchemaMismatchError, UnsupportedTypeError } from '../common/errors';
import { NULL_VALUE, rowResult, SelectionResult, Table, tableResult, Value, valueResult } from '../common/types';
import { unkey, WireObject, wireLength } from '../wire/types';
import { convert } from './value-converter';

const logger = new Logger('ResultShaper');

/**
 * Which index lists of a selection were sent as single atoms
 * Decides how the response nests rows and columns
 */
export interface GridLayout {
  singleRow: boolean;
  singleColumn: boolean;
}

function cell(wire: WireObject, index: number): Value {
  try {
    return convert(wire, index);
  } catch (error) {
    if (error instanceof UnsupportedTypeError) {
      logger.warn(`${error.message}, substituting null`);
      return NULL_VALUE;
    }
    throw error;
  }
}

function elements(wire: WireObject): Value[] {
  return Array.from({ length: wireLength(wire) }, (_, index) => cell(wire, index));
}

function shape(grid: Table): SelectionResult {
  const rows = grid.length;
  const columns = rows > 0 ? grid[0].length : 0;
  if (rows === 1 && columns === 1) {
    return valueResult(grid[0][0]);
  }
  if (rows === 1) {
    return rowResult(grid[0]);
  }
  if (columns === 1) {
    return rowResult(grid.map(row => row[0]));
  }
  return tableResult(grid);
}

function tableRows(wire: WireObject): Table {
  const table = unkey(wire);
  if (!table) {
    throw new SchemaMismatchError(`Expected a table, got wire type ${wire.type}`);
  }
  const columns = table.data.map(elements);
  const count = wireLength(table);
  const rows: Table = [];
  for (let r = 0; r < count; r++) {
    rows.push(columns.map(column => column[r] ?? NULL_VALUE));
  }
  return rows;
}

/**
 * Table response: no rows is an empty table, one row a Row
 */
export function shapeTable(wire: WireObject): SelectionResult {
  const rows = tableRows(wire);
  return rows.length === 1 ? rowResult(rows[0]) : tableResult(rows);
}

export function shapeList(wire: WireObject): SelectionResult {
  switch (wire.kind) {
    case 'table':
    case 'dict':
      return shapeTable(wire);
    case 'atom':
    case 'null':
      return valueResult(cell(wire, 0));
    case 'vector':
      return rowResult(elements(wire));
    case 'list': {
      const first = wire.items[0];
      if (first && (first.kind === 'list' || first.kind === 'vector')) {
        return tableResult(wire.items.map(elements));
      }
      return rowResult(elements(wire));
    }
    default:
      throw new SchemaMismatchError(`Cannot shape wire type ${wire.type}`);
  }
}

/**
 * Response to a positional selection, read according to the layout it was built with
 */
export function shapeGrid(wire: WireObject, layout: GridLayout): SelectionResult {
  if (wire.kind === 'table' || wire.kind === 'dict') {
    return shape(tableRows(wire));
  }

  let grid: Table;
  if (layout.singleRow && layout.singleColumn) {
    grid = [[cell(wire, 0)]];
  } else if (layout.singleRow) {
    grid = [elements(wire)];
  } else if (layout.singleColumn) {
    grid = elements(wire).map(value => [value]);
  } else if (wire.kind === 'list') {
    grid = wire.items.map(elements);
  } else {
    throw new SchemaMismatchError(`Expected a list of rows, got wire type ${wire.type}`);
  }
  return shape(grid);
}
