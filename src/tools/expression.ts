// Allow-listed arithmetic expression interpreter for the calculate tool
//
// Grammar:
//   expr    := term (('+' | '-') term)*
//   term    := unary (('*' | '/' | '//' | '%') unary)*
//   unary   := ('+' | '-') unary | power
//   power   := primary ('**' unary)?
//   primary := NUMBER | NAME | NAME '(' args ')' | '(' expr ')'
//
// Only the constants and functions below are reachable; nothing is ever
// handed to a host-language evaluator.

export const MAX_EXPRESSION_LENGTH = 500;

export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

type Operator = '+' | '-' | '*' | '/' | '//' | '%' | '**';

type Token =
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'name'; name: string; pos: number }
  | { kind: 'op'; op: Operator; pos: number }
  | { kind: 'lparen'; pos: number }
  | { kind: 'rparen'; pos: number }
  | { kind: 'comma'; pos: number };

interface MathFunction {
  minArgs: number;
  maxArgs: number;
  apply: (...args: number[]) => number;
}

const CONSTANTS: Record<string, number> = {
  pi: Math.PI,
  e: Math.E,
  tau: 2 * Math.PI,
  inf: Infinity,
};

const MAX_FACTORIAL = 170;

function positiveOnly(fn: (x: number) => number): (x: number) => number {
  return (x) => {
    if (x <= 0) throw new ExpressionError('math domain error');
    return fn(x);
  };
}

function factorial(n: number): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new ExpressionError('factorial() only accepts non-negative integers');
  }
  if (n > MAX_FACTORIAL) throw new ExpressionError('math range error');
  let result = 1;
  for (let i = 2; i <= n; i++) result *= i;
  return result;
}

const FUNCTIONS: Record<string, MathFunction> = {
  sqrt: { minArgs: 1, maxArgs: 1, apply: (x) => Math.sqrt(x) },
  pow: { minArgs: 2, maxArgs: 2, apply: (x, y) => power(x, y) },
  exp: { minArgs: 1, maxArgs: 1, apply: (x) => Math.exp(x) },
  log: {
    minArgs: 1,
    maxArgs: 2,
    apply: (x, base) => {
      const ln = positiveOnly(Math.log);
      if (base === undefined) return ln(x);
      const lnBase = ln(base);
      if (lnBase === 0) throw new ExpressionError('division by zero');
      return ln(x) / lnBase;
    },
  },
  log10: { minArgs: 1, maxArgs: 1, apply: positiveOnly(Math.log10) },
  log2: { minArgs: 1, maxArgs: 1, apply: positiveOnly(Math.log2) },
  sin: { minArgs: 1, maxArgs: 1, apply: (x) => Math.sin(x) },
  cos: { minArgs: 1, maxArgs: 1, apply: (x) => Math.cos(x) },
  tan: { minArgs: 1, maxArgs: 1, apply: (x) => Math.tan(x) },
  asin: { minArgs: 1, maxArgs: 1, apply: (x) => Math.asin(x) },
  acos: { minArgs: 1, maxArgs: 1, apply: (x) => Math.acos(x) },
  atan: { minArgs: 1, maxArgs: 1, apply: (x) => Math.atan(x) },
  atan2: { minArgs: 2, maxArgs: 2, apply: (y, x) => Math.atan2(y, x) },
  sinh: { minArgs: 1, maxArgs: 1, apply: (x) => Math.sinh(x) },
  cosh: { minArgs: 1, maxArgs: 1, apply: (x) => Math.cosh(x) },
  tanh: { minArgs: 1, maxArgs: 1, apply: (x) => Math.tanh(x) },
  floor: { minArgs: 1, maxArgs: 1, apply: (x) => Math.floor(x) },
  ceil: { minArgs: 1, maxArgs: 1, apply: (x) => Math.ceil(x) },
  trunc: { minArgs: 1, maxArgs: 1, apply: (x) => Math.trunc(x) },
  fabs: { minArgs: 1, maxArgs: 1, apply: (x) => Math.abs(x) },
  factorial: { minArgs: 1, maxArgs: 1, apply: factorial },
  hypot: { minArgs: 1, maxArgs: 16, apply: (...xs) => Math.hypot(...xs) },
  degrees: { minArgs: 1, maxArgs: 1, apply: (x) => (x * 180) / Math.PI },
  radians: { minArgs: 1, maxArgs: 1, apply: (x) => (x * Math.PI) / 180 },
};

export const ALLOWED_FUNCTIONS: readonly string[] = Object.keys(FUNCTIONS);
export const ALLOWED_CONSTANTS: readonly string[] = Object.keys(CONSTANTS);

const SINGLE_CHAR_OPERATORS = new Map<string, Operator>([
  ['+', '+'],
  ['-', '-'],
  ['*', '*'],
  ['/', '/'],
  ['%', '%'],
]);

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    const rest = source.slice(pos);

    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ kind: 'number', value: Number(number[0]), pos });
      pos += number[0].length;
      continue;
    }

    const name = NAME_PATTERN.exec(rest);
    if (name) {
      tokens.push({ kind: 'name', name: name[0], pos });
      pos += name[0].length;
      continue;
    }

    if (rest.startsWith('**') || rest.startsWith('//')) {
      tokens.push({ kind: 'op', op: rest.slice(0, 2) === '**' ? '**' : '//', pos });
      pos += 2;
      continue;
    }

    const operator = SINGLE_CHAR_OPERATORS.get(ch);
    if (operator) {
      tokens.push({ kind: 'op', op: operator, pos });
      pos++;
      continue;
    }

    switch (ch) {
      case '(':
        tokens.push({ kind: 'lparen', pos });
        break;
      case ')':
        tokens.push({ kind: 'rparen', pos });
        break;
      case ',':
        tokens.push({ kind: 'comma', pos });
        break;
      default:
        throw new ExpressionError(`unexpected character '${ch}' at position ${pos}`);
    }
    pos++;
  }

  return tokens;
}

function power(base: number, exponent: number): number {
  if (base === 0 && exponent < 0) {
    throw new ExpressionError('division by zero');
  }
  return Math.pow(base, exponent);
}

function applyOperator(op: Operator, left: number, right: number): number {
  switch (op) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      if (right === 0) throw new ExpressionError('division by zero');
      return left / right;
    case '//':
      if (right === 0) throw new ExpressionError('division by zero');
      if (Number.isFinite(left) && !Number.isFinite(right)) {
        return left === 0 || Math.sign(left) === Math.sign(right) ? 0 : -1;
      }
      return Math.floor(left / right);
    case '%':
      if (right === 0) throw new ExpressionError('division by zero');
      // sign follows the divisor; an infinite divisor leaves same-signed values as they are
      if (Number.isFinite(left) && !Number.isFinite(right)) {
        return left === 0 || Math.sign(left) === Math.sign(right) ? left : right;
      }
      return ((left % right) + right) % right;
    case '**':
      return power(left, right);
  }
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) throw new ExpressionError('empty expression');
    const value = this.expression();
    const extra = this.peek();
    if (extra) throw new ExpressionError(`unexpected token at position ${extra.pos}`);
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (!token) throw new ExpressionError('unexpected end of expression');
    this.index++;
    return token;
  }

  private matchOp(...ops: Operator[]): Operator | null {
    const token = this.peek();
    if (token?.kind === 'op' && ops.includes(token.op)) {
      this.index++;
      return token.op;
    }
    return null;
  }

  private expression(): number {
    let value = this.term();
    let op = this.matchOp('+', '-');
    while (op) {
      value = applyOperator(op, value, this.term());
      op = this.matchOp('+', '-');
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    let op = this.matchOp('*', '/', '//', '%');
    while (op) {
      value = applyOperator(op, value, this.unary());
      op = this.matchOp('*', '/', '//', '%');
    }
    return value;
  }

  private unary(): number {
    const op = this.matchOp('+', '-');
    if (op === '-') return -this.unary();
    if (op === '+') return this.unary();
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.matchOp('**')) {
      return power(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.next();

    switch (token.kind) {
      case 'number':
        return token.value;
      case 'lparen': {
        const value = this.expression();
        this.expect('rparen');
        return value;
      }
      case 'name':
        if (this.peek()?.kind === 'lparen') {
          this.index++;
          return this.call(token.name, this.arguments());
        }
        if (Object.prototype.hasOwnProperty.call(CONSTANTS, token.name)) {
          return CONSTANTS[token.name];
        }
        throw new ExpressionError(`name '${token.name}' is not defined`);
      default:
        throw new ExpressionError(`unexpected token at position ${token.pos}`);
    }
  }

  private arguments(): number[] {
    const args: number[] = [];
    if (this.peek()?.kind === 'rparen') {
      this.index++;
      return args;
    }
    args.push(this.expression());
    while (this.peek()?.kind === 'comma') {
      this.index++;
      args.push(this.expression());
    }
    this.expect('rparen');
    return args;
  }

  private expect(kind: 'rparen'): void {
    const token = this.next();
    if (token.kind !== kind) {
      throw new ExpressionError(`expected ')' at position ${token.pos}`);
    }
  }

  private call(name: string, args: number[]): number {
    if (!Object.prototype.hasOwnProperty.call(FUNCTIONS, name)) {
      throw new ExpressionError(`function '${name}' is not allowed`);
    }
    const fn = FUNCTIONS[name];
    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      const expected = fn.minArgs === fn.maxArgs ? `${fn.minArgs}` : `${fn.minArgs}-${fn.maxArgs}`;
      throw new ExpressionError(`${name}() takes ${expected} argument(s), got ${args.length}`);
    }
    return fn.apply(...args);
  }
}

/**
 * Evaluate an arithmetic expression. Throws ExpressionError on anything
 * outside the grammar or on a math error.
 */
export function evaluateExpression(expression: string): number {
  if (expression.length > MAX_EXPRESSION_LENGTH) {
    throw new ExpressionError(`expression longer than ${MAX_EXPRESSION_LENGTH} characters`);
  }
  const value = new Parser(tokenize(expression)).parse();
  if (Number.isNaN(value)) throw new ExpressionError('math domain error');
  return value;
}

export function formatNumber(value: number): string {
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return String(value);
}
