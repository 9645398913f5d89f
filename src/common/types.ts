/**
 * Host-side value model for data decoded from the engine
 * Every result handed back to callers is built from these types
 */

/**
 * One case per domain type the engine stores
 * Temporal cases hold an offset from the 2000-01-01 epoch in a case-specific unit
 */
export enum ValueType {
  Null = 'null',
  Boolean = 'boolean',
  Byte = 'byte',
  Short = 'short',
  Int = 'int',
  Long = 'long',
  Real = 'real',
  Float = 'float',
  Char = 'char',
  Symbol = 'symbol',
  Timestamp = 'timestamp', // nanoseconds since epoch
  Month = 'month',         // months since 2000.01
  Date = 'date',           // days since epoch
  DateTime = 'datetime',   // fractional days since epoch
  Timespan = 'timespan',   // nanoseconds
  Minute = 'minute',       // minutes since midnight
  Second = 'second',       // seconds since midnight
  Time = 'time',           // milliseconds since midnight
}

export interface NullValue { type: ValueType.Null }
export interface BooleanValue { type: ValueType.Boolean; value: boolean }
export interface ByteValue { type: ValueType.Byte; value: number }
export interface ShortValue { type: ValueType.Short; value: number }
export interface IntValue { type: ValueType.Int; value: number }
export interface LongValue { type: ValueType.Long; value: bigint }
export interface RealValue { type: ValueType.Real; value: number }
export interface FloatValue { type: ValueType.Float; value: number }
export interface CharValue { type: ValueType.Char; value: string }
export interface SymbolValue { type: ValueType.Symbol; value: string }
export interface TimestampValue { type: ValueType.Timestamp; value: bigint }
export interface MonthValue { type: ValueType.Month; value: number }
export interface DateValue { type: ValueType.Date; value: number }
export interface DateTimeValue { type: ValueType.DateTime; value: number }
export interface TimespanValue { type: ValueType.Timespan; value: bigint }
export interface MinuteValue { type: ValueType.Minute; value: number }
export interface SecondValue { type: ValueType.Second; value: number }
export interface TimeValue { type: ValueType.Time; value: number }

export type Value =
  | NullValue
  | BooleanValue
  | ByteValue
  | ShortValue
  | IntValue
  | LongValue
  | RealValue
  | FloatValue
  | CharValue
  | SymbolValue
  | TimestampValue
  | MonthValue
  | DateValue
  | DateTimeValue
  | TimespanValue
  | MinuteValue
  | SecondValue
  | TimeValue;

/** Every non-null case */
export type ScalarValue = Exclude<Value, NullValue>;

export const NULL_VALUE: NullValue = Object.freeze({ type: ValueType.Null });

/** One value per column, in schema order */
export type Row = Value[];

/** Rows of identical length */
export type Table = Row[];

export enum ResultShape {
  Value = 'value',
  Row = 'row',
  Table = 'table',
}

/**
 * Tri-state result of a selection
 */
export type SelectionResult =
  | { shape: ResultShape.Value; value: Value }
  | { shape: ResultShape.Row; row: Row }
  | { shape: ResultShape.Table; rows: Table };

/**
 * Column name and wire type code, in physical column order
 * A type code of 0 marks a general (mixed or nested) column
 */
export interface ColumnMeta {
  name: string;
  typeCode: number;
}

export function isNull(value: Value): value is NullValue {
  return value.type === ValueType.Null;
}

export function valueResult(value: Value): SelectionResult {
  return { shape: ResultShape.Value, value };
}

export function rowResult(row: Row): SelectionResult {
  return { shape: ResultShape.Row, row };
}

export function tableResult(rows: Table): SelectionResult {
  return { shape: ResultShape.Table, rows };
}
