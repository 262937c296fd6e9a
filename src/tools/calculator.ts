/**
 * Arithmetic expression evaluation for the calculator tool.
 *
 * Grammar (`^` is right-associative and binds tighter than unary minus):
 *
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/' | '%') unary)*
 *   unary   := ('+' | '-') unary | power
 *   power   := primary ('^' unary)?
 *   primary := number | '(' expr ')'
 */

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'op'; value: '+' | '-' | '*' | '/' | '%' | '^' | '(' | ')' };

const OPERATORS = new Set(['+', '-', '*', '/', '%', '^', '(', ')']);

function isOperator(char: string): char is Extract<Token, { kind: 'op' }>['value'] {
  return OPERATORS.has(char);
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const char = expression[i];

    if (char === ' ' || char === '\t') {
      i++;
      continue;
    }

    if (isOperator(char)) {
      tokens.push({ kind: 'op', value: char });
      i++;
      continue;
    }

    if ((char >= '0' && char <= '9') || char === '.') {
      let end = i;
      while (end < expression.length && /[0-9.]/.test(expression[end])) {
        end++;
      }
      const literal = expression.slice(i, end);
      const value = Number(literal);
      if (Number.isNaN(value)) {
        throw new Error(`Invalid number: ${literal}`);
      }
      tokens.push({ kind: 'number', value });
      i = end;
      continue;
    }

    throw new Error(`Invalid character in expression: ${char}`);
  }

  return tokens;
}

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new Error('Empty expression');
    }
    const value = this.expression();
    if (this.position < this.tokens.length) {
      throw new Error('Unexpected token after expression');
    }
    return value;
  }

  private peekOp(): string | undefined {
    const token = this.tokens[this.position];
    return token?.kind === 'op' ? token.value : undefined;
  }

  private expression(): number {
    let value = this.term();
    for (let op = this.peekOp(); op === '+' || op === '-'; op = this.peekOp()) {
      this.position++;
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peekOp(); op === '*' || op === '/' || op === '%'; op = this.peekOp()) {
      this.position++;
      const right = this.unary();
      if ((op === '/' || op === '%') && right === 0) {
        throw new Error('Division by zero');
      }
      value = op === '*' ? value * right : op === '/' ? value / right : value % right;
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp();
    if (op === '-' || op === '+') {
      this.position++;
      const operand = this.unary();
      return op === '-' ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peekOp() === '^') {
      this.position++;
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.tokens[this.position];
    if (!token) {
      throw new Error('Unexpected end of expression');
    }

    if (token.kind === 'number') {
      this.position++;
      return token.value;
    }

    if (token.value === '(') {
      this.position++;
      const value = this.expression();
      if (this.peekOp() !== ')') {
        throw new Error('Missing closing parenthesis');
      }
      this.position++;
      return value;
    }

    throw new Error(`Unexpected token: ${token.value}`);
  }
}

/**
 * Evaluate an arithmetic expression.
 *
 * @throws Error for malformed expressions and division by zero
 */
export function evaluateExpression(expression: string): number {
  return new Parser(tokenize(expression)).parse();
}

export function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}
