/**
 * Restricted arithmetic evaluator for parameter values proposed by the tutor model.
 *
 * Grammar (after `^` has been rewritten to `**`):
 *   expression := term (('+' | '-') term)*
 *   term       := unary (('*' | '/') unary | implicit)*
 *   unary      := ('+' | '-') unary | power
 *   power      := primary ('**' unary)?
 *   primary    := number | 'π' | '(' expression ')'
 *
 * `implicit` is a multiplication with no operator when a π or an opening
 * parenthesis directly follows a value (`2π`, `3(1 + 2)`). Names, calls and
 * every other character are rejected by the tokenizer.
 */

export type ExpressionToken =
  | { kind: 'number'; value: number; position: number }
  | { kind: 'pi'; position: number }
  | { kind: 'operator'; value: '+' | '-' | '*' | '/' | '**'; position: number }
  | { kind: 'paren'; value: '(' | ')'; position: number };

export class ExpressionError extends Error {
  constructor(message: string, public readonly position?: number) {
    super(message);
    this.name = 'ExpressionError';
  }
}

const MAX_EXPRESSION_LENGTH = 256;
const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?/i;

export function tokenizeExpression(source: string): ExpressionToken[] {
  const tokens: ExpressionToken[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (/[\d.]/.test(ch)) {
      const match = source.slice(i).match(NUMBER_PATTERN);
      if (!match) {
        throw new ExpressionError(`Malformed number at position ${i}`, i);
      }
      tokens.push({ kind: 'number', value: Number(match[0]), position: i });
      i += match[0].length;
      continue;
    }

    if (ch === 'π') {
      tokens.push({ kind: 'pi', position: i });
      i++;
      continue;
    }

    if (ch === '*' && source[i + 1] === '*') {
      tokens.push({ kind: 'operator', value: '**', position: i });
      i += 2;
      continue;
    }

    if (ch === '+' || ch === '-' || ch === '*' || ch === '/') {
      tokens.push({ kind: 'operator', value: ch, position: i });
      i++;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ kind: 'paren', value: ch, position: i });
      i++;
      continue;
    }

    throw new ExpressionError(`Unexpected character '${ch}' at position ${i}`, i);
  }

  return tokens;
}

class ExpressionReader {
  private index = 0;

  constructor(private readonly tokens: ExpressionToken[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ExpressionError('Empty expression');
    }
    const value = this.expression();
    const leftover = this.peek();
    if (leftover) {
      throw new ExpressionError(`Unexpected token at position ${leftover.position}`, leftover.position);
    }
    return value;
  }

  private peek(): ExpressionToken | undefined {
    return this.tokens[this.index];
  }

  private isOperator(value: string): boolean {
    const token = this.peek();
    return token?.kind === 'operator' && token.value === value;
  }

  private startsImplicitProduct(): boolean {
    const token = this.peek();
    return token?.kind === 'pi' || (token?.kind === 'paren' && token.value === '(');
  }

  private expression(): number {
    let value = this.term();
    while (this.isOperator('+') || this.isOperator('-')) {
      const add = this.isOperator('+');
      this.index++;
      const right = this.term();
      value = add ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (;;) {
      if (this.isOperator('*')) {
        this.index++;
        value *= this.unary();
      } else if (this.isOperator('/')) {
        const position = this.peek()?.position;
        this.index++;
        const divisor = this.unary();
        if (divisor === 0) {
          throw new ExpressionError('Division by zero', position);
        }
        value /= divisor;
      } else if (this.startsImplicitProduct()) {
        value *= this.power();
      } else {
        return value;
      }
    }
  }

  private unary(): number {
    if (this.isOperator('-')) {
      this.index++;
      return -this.unary();
    }
    if (this.isOperator('+')) {
      this.index++;
      return this.unary();
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.isOperator('**')) {
      this.index++;
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const token = this.peek();
    if (!token) {
      throw new ExpressionError('Unexpected end of expression');
    }

    if (token.kind === 'number') {
      this.index++;
      return token.value;
    }

    if (token.kind === 'pi') {
      this.index++;
      return Math.PI;
    }

    if (token.kind === 'paren' && token.value === '(') {
      this.index++;
      const value = this.expression();
      const closing = this.peek();
      if (closing?.kind !== 'paren' || closing.value !== ')') {
        throw new ExpressionError(`Missing closing parenthesis for position ${token.position}`, token.position);
      }
      this.index++;
      return value;
    }

    throw new ExpressionError(`Unexpected token at position ${token.position}`, token.position);
  }
}

/**
 * Evaluates an arithmetic expression such as `2*π`, `3^2 + 4^2` or `(10 - 2) / 4`.
 * Throws `ExpressionError` for anything outside the grammar or a non-finite result.
 */
export function evaluateExpression(input: string): number {
  if (input.length > MAX_EXPRESSION_LENGTH) {
    throw new ExpressionError(`Expression longer than ${MAX_EXPRESSION_LENGTH} characters`);
  }

  const source = input.toLowerCase().replace(/\^/g, '**');
  const value = new ExpressionReader(tokenizeExpression(source)).parse();

  if (!Number.isFinite(value)) {
    throw new ExpressionError('Expression did not evaluate to a finite number');
  }
  return value;
}
