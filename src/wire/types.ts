/**
 * Engine wire object model
 * Atoms carry the negated type code, vectors the positive code
 */
export const WireType = {
  List: 0,
  Boolean: 1,
  Guid: 2,
  Byte: 4,
  Short: 5,
  Int: 6,
  Long: 7,
  Real: 8,
  Float: 9,
  Char: 10,
  Symbol: 11,
  Timestamp: 12,
  Month: 13,
  Date: 14,
  DateTime: 15,
  Timespan: 16,
  Minute: 17,
  Second: 18,
  Time: 19,
  Table: 98,
  Dict: 99,
  Unary: 101,
  SortedDict: 127,
  Error: -128,
} as const;

/**
 * Raw element as it sits on the wire, before null detection
 * 64-bit integer types decode to bigint, symbols and chars to strings
 */
export type WireScalar = boolean | number | bigint | string;

export interface WireAtom {
  kind: 'atom';
  type: number; // negative
  value: WireScalar;
}

export interface WireVector {
  kind: 'vector';
  type: number; // positive
  attribute: number;
  values: readonly WireScalar[];
}

export interface WireList {
  kind: 'list';
  type: typeof WireType.List;
  items: readonly WireObject[];
}

export interface WireDict {
  kind: 'dict';
  type: typeof WireType.Dict | typeof WireType.SortedDict;
  keys: WireObject;
  values: WireObject;
}

export interface WireTable {
  kind: 'table';
  type: typeof WireType.Table;
  columns: readonly string[];
  data: readonly WireObject[];
}

/** Generic null, the identity returned by assignments */
export interface WireNull {
  kind: 'null';
  type: typeof WireType.Unary;
}

export interface WireError {
  kind: 'error';
  type: typeof WireType.Error;
  message: string;
}

export type WireObject = WireAtom | WireVector | WireList | WireDict | WireTable | WireNull | WireError;

export function wireLength(object: WireObject): number {
  switch (object.kind) {
    case 'vector':
      return object.values.length;
    case 'list':
      return object.items.length;
    case 'table':
      return object.data.length > 0 ? wireLength(object.data[0]) : 0;
    case 'dict':
      return wireLength(object.keys);
    default:
      return 1;
  }
}

/**
 * Number of rows in a table, or in a keyed table's key part
 */
export function rowCount(object: WireObject): number {
  if (object.kind === 'table') {
    return wireLength(object);
  }
  if (object.kind === 'dict' && object.keys.kind === 'table') {
    return wireLength(object.keys);
  }
  throw new TypeError(`Expected a table, got wire type ${object.type}`);
}

/**
 * Flatten a keyed table (dict of key table to value table) into one table
 * Key columns come first
 */
export function unkey(object: WireObject): WireTable | undefined {
  if (object.kind === 'table') {
    return object;
  }
  if (object.kind === 'dict' && object.keys.kind === 'table' && object.values.kind === 'table') {
    return {
      kind: 'table',
      type: WireType.Table,
      columns: [...object.keys.columns, ...object.values.columns],
      data: [...object.keys.data, ...object.values.data],
    };
  }
  return undefined;
}
