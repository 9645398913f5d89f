import {
  descriptorFor,
  descriptorForTag,
  formatValue,
  inferType,
  isNullRaw,
  literal,
  registeredTypes,
  TypeDescriptor,
} from './type-map';
import { NULL_VALUE, Value, ValueType } from './types';
import { WireFormatError } from './errors';

function descriptor(tag: string): TypeDescriptor {
  const found = descriptorForTag(tag);
  if (!found) {
    throw new Error(`No descriptor for tag ${tag}`);
  }
  return found;
}

describe('type-map', () => {
  describe('registry', () => {
    it('should map codes, tags and names one to one', () => {
      const types = registeredTypes();
      expect(new Set(types.map(t => t.code)).size).toBe(types.length);
      expect(new Set(types.map(t => t.tag)).size).toBe(types.length);
      expect(new Set(types.map(t => t.name)).size).toBe(types.length);
      expect(types.map(t => t.tag).join('')).toBe('bxhijefcspmdznuvt');
    });

    it('should resolve atom and vector codes to the same descriptor', () => {
      expect(descriptorFor(-7)).toBe(descriptorFor(7));
      expect(descriptorFor(7)?.name).toBe('long');
      expect(descriptorFor(11)?.type).toBe(ValueType.Symbol);
    });

    it('should return undefined for unregistered codes', () => {
      expect(descriptorFor(2)).toBeUndefined();
      expect(descriptorFor(0)).toBeUndefined();
      expect(descriptorFor(98)).toBeUndefined();
      expect(descriptorForTag('g')).toBeUndefined();
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(registeredTypes())).toBe(true);
      expect(Object.isFrozen(descriptor('j'))).toBe(true);
    });
  });

  describe('parse and format', () => {
    const cases: Array<[string, string, Value]> = [
      ['b', 'true', { type: ValueType.Boolean, value: true }],
      ['x', '0x1f', { type: ValueType.Byte, value: 31 }],
      ['h', '-12', { type: ValueType.Short, value: -12 }],
      ['i', '42', { type: ValueType.Int, value: 42 }],
      ['j', '9007199254740993', { type: ValueType.Long, value: 9007199254740993n }],
      ['f', '2.5', { type: ValueType.Float, value: 2.5 }],
      ['f', '0w', { type: ValueType.Float, value: Infinity }],
      ['f', '-0w', { type: ValueType.Float, value: -Infinity }],
      ['e', '-0w', { type: ValueType.Real, value: -Infinity }],
      ['c', 'a', { type: ValueType.Char, value: 'a' }],
      ['s', 'AAPL', { type: ValueType.Symbol, value: 'AAPL' }],
      ['p', '2000.01.02D00:00:01.000000001', { type: ValueType.Timestamp, value: 86401000000001n }],
      ['m', '2024.03m', { type: ValueType.Month, value: 290 }],
      ['d', '2024-01-15', { type: ValueType.Date, value: 8780 }],
      ['n', '-1D00:00:00.000000000', { type: ValueType.Timespan, value: -86400000000000n }],
      ['u', '09:30', { type: ValueType.Minute, value: 570 }],
      ['v', '09:30:15', { type: ValueType.Second, value: 34215 }],
      ['t', '09:30:15.500', { type: ValueType.Time, value: 34215500 }],
    ];

    it.each(cases)('should round trip %s text %s', (tag, text, expected) => {
      const type = descriptor(tag);
      expect(type.validate(text)).toBe(true);
      const parsed = type.parse(text);
      expect(parsed).toEqual(expected);
      expect(type.format(parsed)).toBe(text);
    });

    it('should parse datetime with either separator and format with milliseconds', () => {
      const datetime = descriptor('z');
      expect(datetime.parse('2000-01-02T12:00:00')).toEqual({ type: ValueType.DateTime, value: 1.5 });
      expect(datetime.parse('2000-01-02 12:00:00')).toEqual({ type: ValueType.DateTime, value: 1.5 });
      expect(datetime.format({ type: ValueType.DateTime, value: 1.5 })).toBe('2000-01-02T12:00:00.000');
    });

    it('should keep real values at single precision', () => {
      const real = descriptor('e');
      const parsed = real.parse('0.1');
      expect(parsed).toEqual({ type: ValueType.Real, value: Math.fround(0.1) });
      expect(real.parse(real.format(parsed))).toEqual(parsed);
    });

    it('should accept the extra boolean spellings', () => {
      const bool = descriptor('b');
      expect(bool.parse('YES')).toEqual({ type: ValueType.Boolean, value: true });
      expect(bool.parse('n')).toEqual({ type: ValueType.Boolean, value: false });
      expect(bool.parse(' 0 ')).toEqual({ type: ValueType.Boolean, value: false });
    });

    it('should parse empty text as null for every type', () => {
      for (const type of registeredTypes()) {
        expect(type.parse('')).toBe(NULL_VALUE);
      }
    });

    it('should format null as empty text for symbol and char and NULL otherwise', () => {
      expect(descriptor('s').format(NULL_VALUE)).toBe('');
      expect(descriptor('c').format(NULL_VALUE)).toBe('');
      expect(descriptor('i').format(NULL_VALUE)).toBe('NULL');
      expect(descriptor('p').format(NULL_VALUE)).toBe('NULL');
    });

    it('should reject text the validator refuses', () => {
      expect(() => descriptor('i').parse('3000000000')).toThrow("Invalid int value: '3000000000'");
      expect(() => descriptor('d').parse('2024-13-01')).toThrow(TypeError);
      expect(() => descriptor('c').parse('ab')).toThrow(TypeError);
    });

    it('should reject days past the end of the month', () => {
      expect(descriptor('d').validate('2024-02-29')).toBe(true);
      expect(descriptor('d').validate('2024-02-31')).toBe(false);
      expect(descriptor('d').validate('2023-02-29')).toBe(false);
      expect(descriptor('p').validate('2024.04.31D00:00:00')).toBe(false);
      expect(descriptor('z').validate('2024-06-31T00:00:00')).toBe(false);
      expect(() => descriptor('d').parse('2024-02-31')).toThrow("Invalid date value: '2024-02-31'");
      expect(inferType(['2024-01-15', '2024-02-31'])).toBe(descriptor('s'));
    });

    it('should refuse to format a value of another type', () => {
      expect(() => descriptor('i').format({ type: ValueType.Symbol, value: 'x' })).toThrow(
        'Cannot format symbol value as int',
      );
    });
  });

  describe('inferType', () => {
    const cases: Array<[string[], string]> = [
      [['1', '0'], 'boolean'],
      [['12', '-7'], 'int'],
      [['12', '3000000000'], 'long'],
      [['1.5', '2', '1e5'], 'float'],
      [['2024-01-15', ''], 'date'],
      [['2024-01-15 09:30:00'], 'datetime'],
      [['09:30:00.000'], 'time'],
      [['09:30:00'], 'time'],
      [['2024.01.15D09:30:00.000000000'], 'timestamp'],
      [['2024.01m'], 'month'],
      [['0D00:00:01.000000000'], 'timespan'],
      [['09:30'], 'minute'],
      [['AAPL', '12'], 'symbol'],
      [[''], 'symbol'],
      [[], 'symbol'],
    ];

    it.each(cases)('should infer %j as %s', (samples, name) => {
      expect(inferType(samples).name).toBe(name);
    });
  });

  describe('wire elements', () => {
    it('should detect null sentinels on raw elements', () => {
      expect(descriptor('i').isNullRaw(-2147483648)).toBe(true);
      expect(descriptor('h').isNullRaw(-32768)).toBe(true);
      expect(descriptor('j').isNullRaw(-9223372036854775808n)).toBe(true);
      expect(descriptor('f').isNullRaw(NaN)).toBe(true);
      expect(descriptor('z').isNullRaw(NaN)).toBe(true);
      expect(descriptor('c').isNullRaw(' ')).toBe(true);
      expect(descriptor('s').isNullRaw('')).toBe(true);
      expect(descriptor('b').isNullRaw(false)).toBe(false);
      expect(descriptor('x').isNullRaw(0)).toBe(false);
      expect(descriptor('i').isNullRaw(0)).toBe(false);
    });

    it('should convert raw elements to values', () => {
      expect(descriptor('j').fromWire(5n)).toEqual({ type: ValueType.Long, value: 5n });
      expect(descriptor('d').fromWire(-2147483648)).toBe(NULL_VALUE);
      expect(descriptor('s').fromWire('GOOG')).toEqual({ type: ValueType.Symbol, value: 'GOOG' });
    });

    it('should reject raw elements of the wrong host type', () => {
      expect(() => descriptor('j').fromWire(5)).toThrow(WireFormatError);
      expect(() => descriptor('s').fromWire(5)).toThrow(WireFormatError);
    });

    it('should treat elements of unregistered codes as null', () => {
      expect(isNullRaw(2, 'whatever')).toBe(true);
      expect(isNullRaw(6, 0)).toBe(false);
    });
  });

  describe('literal', () => {
    it('should render values as engine source text', () => {
      expect(literal({ type: ValueType.Symbol, value: 'AAPL' })).toBe('`AAPL');
      expect(literal({ type: ValueType.Symbol, value: 'a b' })).toBe('`$"a b"');
      expect(literal({ type: ValueType.Int, value: 42 })).toBe('42i');
      expect(literal({ type: ValueType.Long, value: 7n })).toBe('7j');
      expect(literal({ type: ValueType.Float, value: 2.5 })).toBe('2.5f');
      expect(literal({ type: ValueType.Float, value: -Infinity })).toBe('-0w');
      expect(literal({ type: ValueType.Boolean, value: true })).toBe('1b');
      expect(literal({ type: ValueType.Date, value: 8780 })).toBe('2024.01.15');
      expect(literal({ type: ValueType.DateTime, value: 1.5 })).toBe('2000.01.02T12:00:00.000');
      expect(literal({ type: ValueType.Char, value: '"' })).toBe('"\\""');
    });

    it('should render typed nulls through the column descriptor', () => {
      expect(descriptor('j').literal(NULL_VALUE)).toBe('0Nj');
      expect(descriptor('s').literal(NULL_VALUE)).toBe('`');
      expect(literal(NULL_VALUE)).toBe('(::)');
    });

    it('should quote bare words only for symbols', () => {
      expect(descriptor('s').quoteBareWord('GOOG')).toBe('`GOOG');
      expect(descriptor('f').quoteBareWord('price')).toBe('price');
    });
  });

  describe('formatValue', () => {
    it('should format through the value descriptor and fall back to NULL', () => {
      expect(formatValue({ type: ValueType.Time, value: 1 })).toBe('00:00:00.001');
      expect(formatValue(NULL_VALUE)).toBe('NULL');
    });
  });
});
