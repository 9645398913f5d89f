import { InvalidConditionError } from '../common/errors';

/**
 * Condition grammar
 *
 *   condition := expr op expr
 *   expr      := product (('+' | '-') product)*
 *   product   := term (('*' | '/') term)*
 *   term      := ident | ident '(' expr ')' | number | string | symbol | '(' expr ')'
 *   op        := '>=' | '<=' | '==' | '!=' | '>' | '<' | '=' | '~' | 'like'
 */
export type ComparisonOperator = '>' | '<' | '>=' | '<=' | '=' | '==' | '!=' | '~' | 'like';
export type ArithmeticOperator = '+' | '-' | '*' | '/';

export type Expr =
  | { kind: 'identifier'; name: string }
  | { kind: 'number'; text: string }
  | { kind: 'string'; text: string }
  | { kind: 'symbol'; text: string }
  | { kind: 'call'; name: string; argument: Expr }
  | { kind: 'paren'; inner: Expr }
  | { kind: 'binary'; operator: ArithmeticOperator; left: Expr; right: Expr };

export interface Condition {
  text: string;
  left: Expr;
  operator: ComparisonOperator;
  right: Expr;
}

type Token =
  | { kind: 'identifier'; text: string; position: number }
  | { kind: 'number'; text: string; position: number }
  | { kind: 'string'; text: string; position: number }
  | { kind: 'symbol'; text: string; position: number }
  | { kind: 'comparison'; text: ComparisonOperator; position: number }
  | { kind: 'arithmetic'; text: ArithmeticOperator; position: number }
  | { kind: 'open'; text: '('; position: number }
  | { kind: 'close'; text: ')'; position: number };

const COMPARISONS: readonly ComparisonOperator[] = ['>=', '<=', '==', '!=', '>', '<', '=', '~'];
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_.]*/;
const NUMBER = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/;
const STRING = /^"(\\.|[^"\\])*"/;
const SYMBOL = /^`[A-Za-z0-9_.:]*/;

function isArithmetic(char: string): char is ArithmeticOperator {
  return char === '+' || char === '-' || char === '*' || char === '/';
}

function tokenize(condition: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < condition.length) {
    const rest = condition.slice(position);
    const char = rest[0];

    if (/\s/.test(char)) {
      position++;
      continue;
    }

    const comparison = COMPARISONS.find(op => rest.startsWith(op));
    if (comparison) {
      tokens.push({ kind: 'comparison', text: comparison, position });
      position += comparison.length;
      continue;
    }

    const identifier = IDENTIFIER.exec(rest);
    if (identifier) {
      const text = identifier[0];
      tokens.push(text === 'like' ? { kind: 'comparison', text, position } : { kind: 'identifier', text, position });
      position += text.length;
      continue;
    }

    // A minus directly before a digit is part of the number when no operand precedes it
    const previous = tokens[tokens.length - 1];
    const operandExpected = !previous || previous.kind === 'comparison' || previous.kind === 'arithmetic' || previous.kind === 'open';
    const number = NUMBER.exec(char === '-' && operandExpected ? rest.slice(1) : rest);
    if (number && (char !== '-' || operandExpected)) {
      const text = char === '-' ? `-${number[0]}` : number[0];
      tokens.push({ kind: 'number', text, position });
      position += text.length;
      continue;
    }

    const string = STRING.exec(rest);
    if (string) {
      tokens.push({ kind: 'string', text: string[0], position });
      position += string[0].length;
      continue;
    }

    const symbol = SYMBOL.exec(rest);
    if (symbol) {
      tokens.push({ kind: 'symbol', text: symbol[0], position });
      position += symbol[0].length;
      continue;
    }

    if (isArithmetic(char)) {
      tokens.push({ kind: 'arithmetic', text: char, position });
    } else if (char === '(') {
      tokens.push({ kind: 'open', text: char, position });
    } else if (char === ')') {
      tokens.push({ kind: 'close', text: char, position });
    } else {
      throw new InvalidConditionError(condition, `unexpected character '${char}' at position ${position}`);
    }
    position++;
  }

  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly condition: string,
    private readonly tokens: Token[],
  ) {}

  parse(): Condition {
    const left = this.expression();
    const operator = this.next();
    if (!operator || operator.kind !== 'comparison') {
      throw this.error(operator, 'expected a comparison operator');
    }
    const right = this.expression();
    const trailing = this.peek();
    if (trailing) {
      throw this.error(trailing, 'unexpected trailing input');
    }
    return { text: this.condition, left, operator: operator.text, right };
  }

  private expression(): Expr {
    let left = this.product();
    let token = this.peek();
    while (token?.kind === 'arithmetic' && (token.text === '+' || token.text === '-')) {
      this.index++;
      left = { kind: 'binary', operator: token.text, left, right: this.product() };
      token = this.peek();
    }
    return left;
  }

  private product(): Expr {
    let left = this.term();
    let token = this.peek();
    while (token?.kind === 'arithmetic' && (token.text === '*' || token.text === '/')) {
      this.index++;
      left = { kind: 'binary', operator: token.text, left, right: this.term() };
      token = this.peek();
    }
    return left;
  }

  private term(): Expr {
    const token = this.next();
    if (!token) {
      throw this.error(token, 'expected a column, number, string or parenthesised expression');
    }
    switch (token.kind) {
      case 'number':
        return { kind: 'number', text: token.text };
      case 'string':
        return { kind: 'string', text: token.text };
      case 'symbol':
        return { kind: 'symbol', text: token.text };
      case 'identifier':
        if (this.peek()?.kind === 'open') {
          this.index++;
          const argument = this.expression();
          this.expectClose();
          return { kind: 'call', name: token.text, argument };
        }
        return { kind: 'identifier', name: token.text };
      case 'open': {
        const inner = this.expression();
        this.expectClose();
        return { kind: 'paren', inner };
      }
      default:
        throw this.error(token, 'expected a column, number, string or parenthesised expression');
    }
  }

  private expectClose(): void {
    const token = this.next();
    if (token?.kind !== 'close') {
      throw this.error(token, "expected ')'");
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    return this.tokens[this.index++];
  }

  private error(token: Token | undefined, reason: string): InvalidConditionError {
    const where = token ? ` at position ${token.position}` : ' at end of input';
    return new InvalidConditionError(this.condition, `${reason}${where}`);
  }
}

/**
 * Split on every comma, trim, and drop empty segments
 * Commas inside parentheses are not protected
 */
export function splitConditions(text: string): string[] {
  return text
    .split(',')
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);
}

export function parseCondition(condition: string): Condition {
  return new Parser(condition, tokenize(condition)).parse();
}

/**
 * Parse every condition up front so a malformed one fails before anything is sent
 */
export function parseConditions(text: string): Condition[] {
  const segments = splitConditions(text);
  if (segments.length === 0) {
    throw new InvalidConditionError(text, 'no condition given');
  }
  return segments.map(parseCondition);
}
