import { parseCondition, parseConditions, splitConditions } from './condition-parser';
import { InvalidConditionError } from '../common/errors';

describe('condition-parser', () => {
  describe('splitConditions', () => {
    it('should split on commas and drop blank segments', () => {
      expect(splitConditions(' price>25 , ,ticker=AAPL,')).toEqual(['price>25', 'ticker=AAPL']);
    });
  });

  describe('parseCondition', () => {
    it('should parse a simple comparison', () => {
      expect(parseCondition('price>25')).toEqual({
        text: 'price>25',
        left: { kind: 'identifier', name: 'price' },
        operator: '>',
        right: { kind: 'number', text: '25' },
      });
    });

    it('should prefer two-character operators', () => {
      expect(parseCondition('a>=1').operator).toBe('>=');
      expect(parseCondition('a==1').operator).toBe('==');
      expect(parseCondition('a!=1').operator).toBe('!=');
      expect(parseCondition('name like "G*"').operator).toBe('like');
    });

    it('should give multiplication precedence over addition', () => {
      expect(parseCondition('a+b*2>1').left).toEqual({
        kind: 'binary',
        operator: '+',
        left: { kind: 'identifier', name: 'a' },
        right: {
          kind: 'binary',
          operator: '*',
          left: { kind: 'identifier', name: 'b' },
          right: { kind: 'number', text: '2' },
        },
      });
    });

    it('should read a minus as a sign only where an operand is expected', () => {
      expect(parseCondition('a>-5').right).toEqual({ kind: 'number', text: '-5' });
      expect(parseCondition('a-5>0').left).toEqual({
        kind: 'binary',
        operator: '-',
        left: { kind: 'identifier', name: 'a' },
        right: { kind: 'number', text: '5' },
      });
    });

    it('should parse calls, parentheses, strings and symbols', () => {
      expect(parseCondition('abs(x)<(y)')).toEqual({
        text: 'abs(x)<(y)',
        left: { kind: 'call', name: 'abs', argument: { kind: 'identifier', name: 'x' } },
        operator: '<',
        right: { kind: 'paren', inner: { kind: 'identifier', name: 'y' } },
      });
      expect(parseCondition('sym=`GOOG').right).toEqual({ kind: 'symbol', text: '`GOOG' });
      expect(parseCondition('name="a b"').right).toEqual({ kind: 'string', text: '"a b"' });
    });

    it('should report where a condition goes wrong', () => {
      expect(() => parseCondition('price')).toThrow(
        "Invalid condition 'price': expected a comparison operator at end of input",
      );
      expect(() => parseCondition('price>')).toThrow(
        "Invalid condition 'price>': expected a column, number, string or parenthesised expression at end of input",
      );
      expect(() => parseCondition('a>1 b')).toThrow("Invalid condition 'a>1 b': unexpected trailing input at position 4");
      expect(() => parseCondition('(a>1')).toThrow("Invalid condition '(a>1': expected ')' at position 2");
      expect(() => parseCondition('a>1;')).toThrow("Invalid condition 'a>1;': unexpected character ';' at position 3");
      expect(() => parseCondition('a>>1')).toThrow(InvalidConditionError);
    });
  });

  describe('parseConditions', () => {
    it('should parse every segment in order', () => {
      expect(parseConditions('price>25,ticker=AAPL').map(c => c.text)).toEqual(['price>25', 'ticker=AAPL']);
    });

    it('should reject text without any condition', () => {
      expect(() => parseConditions(' , ')).toThrow("Invalid condition ' , ': no condition given");
    });

    it('should fail on commas inside a call', () => {
      expect(() => parseConditions('f(a, b) > 1')).toThrow(InvalidConditionError);
    });
  });
});
