import { Logger } from '@nestjs/common';
import { WireFormatError } from './errors';
import {
  civilToDays,
  daysToCivil,
  formatCivil,
  formatClock,
  formatClockNanos,
  monthsToCivil,
  MS_PER_DAY,
  NS_PER_DAY,
  pad,
  parseClock,
  parseClockNanos,
  splitNanos,
} from './temporal';
import {
  BooleanValue,
  ByteValue,
  CharValue,
  DateTimeValue,
  DateValue,
  FloatValue,
  IntValue,
  LongValue,
  MinuteValue,
  MonthValue,
  NULL_VALUE,
  RealValue,
  ScalarValue,
  SecondValue,
  ShortValue,
  SymbolValue,
  TimespanValue,
  TimestampValue,
  TimeValue,
  Value,
  ValueType,
} from './types';
import type { WireScalar } from '../wire/types';

const logger = new Logger('TypeRegistry');

/**
 * Everything the library knows about one engine type
 * Built once at load time and never mutated
 */
export interface TypeDescriptor {
  readonly code: number;
  readonly name: string;
  readonly tag: string;
  readonly type: ScalarValue['type'];
  /** Text a Null of this type formats to */
  readonly nullText: string;
  validate(text: string): boolean;
  /** Empty text parses to Null; text the validator rejects throws */
  parse(text: string): Value;
  format(value: Value): string;
  /** Engine source text for a value of this type */
  literal(value: Value): string;
  /** Whether a raw wire element is this type's null sentinel */
  isNullRaw(raw: WireScalar): boolean;
  fromWire(raw: WireScalar): Value;
  /** Right-hand literal rule for condition text */
  quoteBareWord(word: string): string;
}

interface DescriptorSpec<V extends ScalarValue> {
  code: number;
  name: string;
  tag: string;
  type: V['type'];
  nullText?: string;
  nullLiteral: string;
  validate(text: string): boolean;
  parse(text: string): V['value'];
  format(value: V['value']): string;
  literal?(value: V['value']): string;
  isNullRaw(raw: WireScalar): boolean;
  fromWire(raw: WireScalar): V['value'];
  wrap(value: V['value']): V;
  unwrap(value: Value): V['value'] | undefined;
  quoteBareWord?(word: string): string;
}

function define<V extends ScalarValue>(spec: DescriptorSpec<V>): TypeDescriptor {
  const unwrapOrThrow = (value: Value): V['value'] => {
    const inner = spec.unwrap(value);
    if (inner === undefined) {
      throw new TypeError(`Cannot format ${value.type} value as ${spec.name}`);
    }
    return inner;
  };
  const literal = spec.literal ?? spec.format;

  return Object.freeze({
    code: spec.code,
    name: spec.name,
    tag: spec.tag,
    type: spec.type,
    nullText: spec.nullText ?? 'NULL',
    validate: spec.validate,
    parse(text: string): Value {
      if (text === '') {
        return NULL_VALUE;
      }
      if (!spec.validate(text)) {
        throw new TypeError(`Invalid ${spec.name} value: '${text}'`);
      }
      return spec.wrap(spec.parse(text));
    },
    format(value: Value): string {
      return value.type === ValueType.Null ? (spec.nullText ?? 'NULL') : spec.format(unwrapOrThrow(value));
    },
    literal(value: Value): string {
      return value.type === ValueType.Null ? spec.nullLiteral : literal(unwrapOrThrow(value));
    },
    isNullRaw: spec.isNullRaw,
    fromWire(raw: WireScalar): Value {
      return spec.isNullRaw(raw) ? NULL_VALUE : spec.wrap(spec.fromWire(raw));
    },
    quoteBareWord: spec.quoteBareWord ?? ((word: string) => word),
  });
}

// Null sentinels
const SHORT_NULL = -32768;
const INT_NULL = -2147483648;
const LONG_NULL = -9223372036854775808n;
const LONG_MAX = 9223372036854775807n;

function rawNumber(raw: WireScalar, name: string): number {
  if (typeof raw !== 'number') {
    throw new WireFormatError(`Expected a numeric ${name} element, got ${typeof raw}`);
  }
  return raw;
}

function rawBigInt(raw: WireScalar, name: string): bigint {
  if (typeof raw !== 'bigint') {
    throw new WireFormatError(`Expected a 64-bit ${name} element, got ${typeof raw}`);
  }
  return raw;
}

function rawString(raw: WireScalar, name: string): string {
  if (typeof raw !== 'string') {
    throw new WireFormatError(`Expected a text ${name} element, got ${typeof raw}`);
  }
  return raw;
}

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_TEXT = /^-?0w$/;
const TRUE_WORDS = new Set(['true', '1', 't', 'yes', 'y']);
const BOOLEAN_WORDS = new Set([...TRUE_WORDS, 'false', '0', 'f', 'no', 'n']);

function integerInRange(text: string, bound: number): boolean {
  if (!INTEGER.test(text)) {
    return false;
  }
  const value = Number(text);
  return value >= -bound && value <= bound;
}

function floatLiteral(value: number, suffix: 'e' | 'f'): string {
  const infinity = suffix === 'e' ? '0we' : '0w';
  if (value === Infinity) {
    return infinity;
  }
  if (value === -Infinity) {
    return `-${infinity}`;
  }
  return `${String(value).replace('e+', 'e')}${suffix}`;
}

function isDecimal(text: string): boolean {
  return DECIMAL.test(text) || INFINITY_TEXT.test(text);
}

function parseDecimal(text: string): number {
  if (INFINITY_TEXT.test(text)) {
    return text.startsWith('-') ? -Infinity : Infinity;
  }
  return parseFloat(text);
}

// Infinities use the engine's 0w spelling so the text parses back
function formatDecimal(value: number): string {
  if (value === Infinity) {
    return '0w';
  }
  return value === -Infinity ? '-0w' : String(value);
}

function isNumberNull(raw: WireScalar): boolean {
  return typeof raw === 'number' && Number.isNaN(raw);
}

function isCivilDate(year: string, month: string, day: string): boolean {
  const [y, m, d] = [Number(year), Number(month), Number(day)];
  if (year.length !== 4 || m < 1 || m > 12 || d < 1 || d > 31) {
    return false;
  }
  const civil = daysToCivil(civilToDays(y, m, d));
  return civil.year === y && civil.month === m && civil.day === d;
}

const DATE_TEXT = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_TEXT = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}:[0-5]\d:[0-5]\d(\.\d+)?)$/;
const TIMESTAMP_TEXT = /^(\d{4})\.(\d{2})\.(\d{2})D(\d{2}:[0-5]\d:[0-5]\d(\.\d{1,9})?)$/;
const TIMESPAN_TEXT = /^(-?)(\d+)D(\d{2}:[0-5]\d:[0-5]\d(\.\d{1,9})?)$/;
const MONTH_TEXT = /^(\d{4})\.(\d{2})m$/;

function splitDate(text: string): [number, number, number] {
  const [year, month, day] = text.split(/[-.]/).map(Number);
  return [year, month, day];
}

function datePart(match: RegExpExecArray): number {
  return civilToDays(Number(match[1]), Number(match[2]), Number(match[3]));
}

function formatDateTime(value: number, dateSeparator: string): string {
  const totalMs = Math.round(value * MS_PER_DAY);
  const days = Math.floor(totalMs / MS_PER_DAY);
  return `${formatCivil(days, dateSeparator)}T${formatClock(totalMs - days * MS_PER_DAY, 'millis')}`;
}

function formatTimestamp(value: bigint): string {
  const { days, nanosOfDay } = splitNanos(value);
  return `${formatCivil(days, '.')}D${formatClockNanos(nanosOfDay)}`;
}

function formatTimespan(value: bigint): string {
  const sign = value < 0n ? '-' : '';
  const abs = value < 0n ? -value : value;
  return `${sign}${abs / NS_PER_DAY}D${formatClockNanos(abs % NS_PER_DAY)}`;
}

function escapeText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

const DESCRIPTORS: readonly TypeDescriptor[] = Object.freeze([
  define<BooleanValue>({
    code: 1,
    name: 'boolean',
    tag: 'b',
    type: ValueType.Boolean,
    nullLiteral: '0b',
    validate: text => BOOLEAN_WORDS.has(text.trim().toLowerCase()),
    parse: text => TRUE_WORDS.has(text.trim().toLowerCase()),
    format: value => (value ? 'true' : 'false'),
    literal: value => (value ? '1b' : '0b'),
    isNullRaw: () => false,
    fromWire: raw => {
      if (typeof raw !== 'boolean') {
        throw new WireFormatError(`Expected a boolean element, got ${typeof raw}`);
      }
      return raw;
    },
    wrap: value => ({ type: ValueType.Boolean, value }),
    unwrap: v => (v.type === ValueType.Boolean ? v.value : undefined),
  }),
  define<ByteValue>({
    code: 4,
    name: 'byte',
    tag: 'x',
    type: ValueType.Byte,
    nullLiteral: '0x00',
    validate: text => /^0x[0-9a-fA-F]{2}$/.test(text),
    parse: text => parseInt(text.slice(2), 16),
    format: value => `0x${value.toString(16).padStart(2, '0')}`,
    isNullRaw: () => false,
    fromWire: raw => rawNumber(raw, 'byte'),
    wrap: value => ({ type: ValueType.Byte, value }),
    unwrap: v => (v.type === ValueType.Byte ? v.value : undefined),
  }),
  define<ShortValue>({
    code: 5,
    name: 'short',
    tag: 'h',
    type: ValueType.Short,
    nullLiteral: '0Nh',
    validate: text => integerInRange(text, 32767),
    parse: text => parseInt(text, 10),
    format: value => String(value),
    literal: value => `${value}h`,
    isNullRaw: raw => raw === SHORT_NULL,
    fromWire: raw => rawNumber(raw, 'short'),
    wrap: value => ({ type: ValueType.Short, value }),
    unwrap: v => (v.type === ValueType.Short ? v.value : undefined),
  }),
  define<IntValue>({
    code: 6,
    name: 'int',
    tag: 'i',
    type: ValueType.Int,
    nullLiteral: '0Ni',
    validate: text => integerInRange(text, 2147483647),
    parse: text => parseInt(text, 10),
    format: value => String(value),
    literal: value => `${value}i`,
    isNullRaw: raw => raw === INT_NULL,
    fromWire: raw => rawNumber(raw, 'int'),
    wrap: value => ({ type: ValueType.Int, value }),
    unwrap: v => (v.type === ValueType.Int ? v.value : undefined),
  }),
  define<LongValue>({
    code: 7,
    name: 'long',
    tag: 'j',
    type: ValueType.Long,
    nullLiteral: '0Nj',
    validate: text => {
      if (!INTEGER.test(text)) {
        return false;
      }
      const value = BigInt(text);
      return value >= -LONG_MAX && value <= LONG_MAX;
    },
    parse: text => BigInt(text),
    format: value => value.toString(),
    literal: value => `${value}j`,
    isNullRaw: raw => raw === LONG_NULL,
    fromWire: raw => rawBigInt(raw, 'long'),
    wrap: value => ({ type: ValueType.Long, value }),
    unwrap: v => (v.type === ValueType.Long ? v.value : undefined),
  }),
  define<RealValue>({
    code: 8,
    name: 'real',
    tag: 'e',
    type: ValueType.Real,
    nullLiteral: '0Ne',
    validate: isDecimal,
    parse: text => Math.fround(parseDecimal(text)),
    format: formatDecimal,
    literal: value => floatLiteral(value, 'e'),
    isNullRaw: isNumberNull,
    fromWire: raw => rawNumber(raw, 'real'),
    wrap: value => ({ type: ValueType.Real, value }),
    unwrap: v => (v.type === ValueType.Real ? v.value : undefined),
  }),
  define<FloatValue>({
    code: 9,
    name: 'float',
    tag: 'f',
    type: ValueType.Float,
    nullLiteral: '0n',
    validate: isDecimal,
    parse: parseDecimal,
    format: formatDecimal,
    literal: value => floatLiteral(value, 'f'),
    isNullRaw: isNumberNull,
    fromWire: raw => rawNumber(raw, 'float'),
    wrap: value => ({ type: ValueType.Float, value }),
    unwrap: v => (v.type === ValueType.Float ? v.value : undefined),
  }),
  define<CharValue>({
    code: 10,
    name: 'char',
    tag: 'c',
    type: ValueType.Char,
    nullText: '',
    nullLiteral: '" "',
    validate: text => [...text].length === 1,
    parse: text => text,
    format: value => value,
    literal: value => `"${escapeText(value)}"`,
    isNullRaw: raw => raw === ' ',
    fromWire: raw => rawString(raw, 'char'),
    wrap: value => ({ type: ValueType.Char, value }),
    unwrap: v => (v.type === ValueType.Char ? v.value : undefined),
  }),
  define<SymbolValue>({
    code: 11,
    name: 'symbol',
    tag: 's',
    type: ValueType.Symbol,
    nullText: '',
    nullLiteral: '`',
    validate: () => true,
    parse: text => text,
    format: value => value,
    literal: value => (/^[A-Za-z0-9_.]*$/.test(value) ? `\`${value}` : `\`$"${escapeText(value)}"`),
    isNullRaw: raw => raw === '',
    fromWire: raw => rawString(raw, 'symbol'),
    wrap: value => ({ type: ValueType.Symbol, value }),
    unwrap: v => (v.type === ValueType.Symbol ? v.value : undefined),
    quoteBareWord: word => `\`${word}`,
  }),
  define<TimestampValue>({
    code: 12,
    name: 'timestamp',
    tag: 'p',
    type: ValueType.Timestamp,
    nullLiteral: '0Np',
    validate: text => {
      const match = TIMESTAMP_TEXT.exec(text);
      return match !== null && isCivilDate(match[1], match[2], match[3]);
    },
    parse: text => {
      const [date, clock] = text.split('D');
      const [year, month, day] = splitDate(date);
      return BigInt(civilToDays(year, month, day)) * NS_PER_DAY + parseClockNanos(clock);
    },
    format: formatTimestamp,
    isNullRaw: raw => raw === LONG_NULL,
    fromWire: raw => rawBigInt(raw, 'timestamp'),
    wrap: value => ({ type: ValueType.Timestamp, value }),
    unwrap: v => (v.type === ValueType.Timestamp ? v.value : undefined),
  }),
  define<MonthValue>({
    code: 13,
    name: 'month',
    tag: 'm',
    type: ValueType.Month,
    nullLiteral: '0Nm',
    validate: text => {
      const match = MONTH_TEXT.exec(text);
      return match !== null && isCivilDate(match[1], match[2], '01');
    },
    parse: text => {
      const [year, month] = text.slice(0, -1).split('.').map(Number);
      return (year - 2000) * 12 + (month - 1);
    },
    format: value => {
      const { year, month } = monthsToCivil(value);
      return `${pad(year, 4)}.${pad(month, 2)}m`;
    },
    isNullRaw: raw => raw === INT_NULL,
    fromWire: raw => rawNumber(raw, 'month'),
    wrap: value => ({ type: ValueType.Month, value }),
    unwrap: v => (v.type === ValueType.Month ? v.value : undefined),
  }),
  define<DateValue>({
    code: 14,
    name: 'date',
    tag: 'd',
    type: ValueType.Date,
    nullLiteral: '0Nd',
    validate: text => {
      const match = DATE_TEXT.exec(text);
      return match !== null && isCivilDate(match[1], match[2], match[3]);
    },
    parse: text => {
      const [year, month, day] = splitDate(text);
      return civilToDays(year, month, day);
    },
    format: value => formatCivil(value, '-'),
    literal: value => formatCivil(value, '.'),
    isNullRaw: raw => raw === INT_NULL,
    fromWire: raw => rawNumber(raw, 'date'),
    wrap: value => ({ type: ValueType.Date, value }),
    unwrap: v => (v.type === ValueType.Date ? v.value : undefined),
  }),
  define<DateTimeValue>({
    code: 15,
    name: 'datetime',
    tag: 'z',
    type: ValueType.DateTime,
    nullLiteral: '0Nz',
    validate: text => {
      const match = DATETIME_TEXT.exec(text);
      return match !== null && isCivilDate(match[1], match[2], match[3]);
    },
    parse: text => {
      const match = DATETIME_TEXT.exec(text);
      if (match === null) {
        throw new TypeError(`Invalid datetime value: '${text}'`);
      }
      return datePart(match) + parseClock(match[4]) / MS_PER_DAY;
    },
    format: value => formatDateTime(value, '-'),
    literal: value => formatDateTime(value, '.'),
    isNullRaw: isNumberNull,
    fromWire: raw => rawNumber(raw, 'datetime'),
    wrap: value => ({ type: ValueType.DateTime, value }),
    unwrap: v => (v.type === ValueType.DateTime ? v.value : undefined),
  }),
  define<TimespanValue>({
    code: 16,
    name: 'timespan',
    tag: 'n',
    type: ValueType.Timespan,
    nullLiteral: '0Nn',
    validate: text => TIMESPAN_TEXT.test(text),
    parse: text => {
      const match = TIMESPAN_TEXT.exec(text);
      if (match === null) {
        throw new TypeError(`Invalid timespan value: '${text}'`);
      }
      const magnitude = BigInt(match[2]) * NS_PER_DAY + parseClockNanos(match[3]);
      return match[1] === '-' ? -magnitude : magnitude;
    },
    format: formatTimespan,
    isNullRaw: raw => raw === LONG_NULL,
    fromWire: raw => rawBigInt(raw, 'timespan'),
    wrap: value => ({ type: ValueType.Timespan, value }),
    unwrap: v => (v.type === ValueType.Timespan ? v.value : undefined),
  }),
  define<MinuteValue>({
    code: 17,
    name: 'minute',
    tag: 'u',
    type: ValueType.Minute,
    nullLiteral: '0Nu',
    validate: text => /^\d{2}:[0-5]\d$/.test(text),
    parse: text => parseClock(text) / 60_000,
    format: value => formatClock(value * 60_000, 'minute'),
    isNullRaw: raw => raw === INT_NULL,
    fromWire: raw => rawNumber(raw, 'minute'),
    wrap: value => ({ type: ValueType.Minute, value }),
    unwrap: v => (v.type === ValueType.Minute ? v.value : undefined),
  }),
  define<SecondValue>({
    code: 18,
    name: 'second',
    tag: 'v',
    type: ValueType.Second,
    nullLiteral: '0Nv',
    validate: text => /^\d{2}:[0-5]\d:[0-5]\d$/.test(text),
    parse: text => parseClock(text) / 1000,
    format: value => formatClock(value * 1000, 'second'),
    isNullRaw: raw => raw === INT_NULL,
    fromWire: raw => rawNumber(raw, 'second'),
    wrap: value => ({ type: ValueType.Second, value }),
    unwrap: v => (v.type === ValueType.Second ? v.value : undefined),
  }),
  define<TimeValue>({
    code: 19,
    name: 'time',
    tag: 't',
    type: ValueType.Time,
    nullLiteral: '0Nt',
    validate: text => /^\d{2}:[0-5]\d:[0-5]\d(\.\d+)?$/.test(text),
    parse: parseClock,
    format: value => formatClock(value, 'millis'),
    isNullRaw: raw => raw === INT_NULL,
    fromWire: raw => rawNumber(raw, 'time'),
    wrap: value => ({ type: ValueType.Time, value }),
    unwrap: v => (v.type === ValueType.Time ? v.value : undefined),
  }),
]);

const BY_CODE = new Map(DESCRIPTORS.map(descriptor => [descriptor.code, descriptor]));
const BY_TAG = new Map(DESCRIPTORS.map(descriptor => [descriptor.tag, descriptor]));
const BY_TYPE = new Map<ValueType, TypeDescriptor>(DESCRIPTORS.map(descriptor => [descriptor.type, descriptor]));

/** Order in which inference tries each tag */
const INFERENCE_ORDER = ['b', 'i', 'j', 'f', 'd', 'z', 't', 'p', 'm', 'n', 'u', 'v', 's'] as const;

export function registeredTypes(): readonly TypeDescriptor[] {
  return DESCRIPTORS;
}

/**
 * Descriptor for an atom (negative) or vector (positive) code
 */
export function descriptorFor(code: number): TypeDescriptor | undefined {
  return BY_CODE.get(Math.abs(code));
}

export function descriptorForTag(tag: string): TypeDescriptor | undefined {
  return BY_TAG.get(tag);
}

export function descriptorForValue(value: Value): TypeDescriptor | undefined {
  return BY_TYPE.get(value.type);
}

/**
 * First type in inference order whose validator accepts every non-empty sample
 */
export function inferType(samples: readonly string[]): TypeDescriptor {
  const present = samples.filter(sample => sample !== '');
  if (present.length === 0) {
    return symbolDescriptor();
  }
  for (const tag of INFERENCE_ORDER) {
    const descriptor = BY_TAG.get(tag);
    if (descriptor && present.every(sample => descriptor.validate(sample))) {
      return descriptor;
    }
  }
  return symbolDescriptor();
}

function symbolDescriptor(): TypeDescriptor {
  const descriptor = BY_TAG.get('s');
  if (!descriptor) {
    throw new Error('Symbol type is not registered');
  }
  return descriptor;
}

export function formatValue(value: Value): string {
  const descriptor = BY_TYPE.get(value.type);
  return descriptor ? descriptor.format(value) : 'NULL';
}

/**
 * Null check for a raw element of any code
 * Codes without a descriptor count as null
 */
export function isNullRaw(code: number, raw: WireScalar): boolean {
  const descriptor = descriptorFor(code);
  if (!descriptor) {
    logger.warn(`No descriptor for wire type ${code}, treating element as null`);
    return true;
  }
  return descriptor.isNullRaw(raw);
}

/**
 * Engine source text for a value; a Null without a column type is the generic null
 */
export function literal(value: Value): string {
  const descriptor = BY_TYPE.get(value.type);
  return descriptor ? descriptor.literal(value) : '(::)';
}
