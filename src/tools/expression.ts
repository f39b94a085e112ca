// ============================================
// Arithmetic expressions — tokenizer and recursive-descent evaluator
// ============================================
//
// Grammar:
//   expression := term (("+" | "-") term)*
//   term       := unary (("*" | "/" | "%") unary)*
//   unary      := ("-" | "+") unary | power
//   power      := primary ("^" unary)?
//   primary    := number | constant | call | "(" expression ")"
//   call       := identifier "(" (expression ("," expression)*)? ")"
// Only the names below are recognised; nothing is ever evaluated as code.
// ============================================

type Token =
  | { kind: "number"; value: number; pos: number }
  | { kind: "ident"; value: string; pos: number }
  | { kind: "op"; value: string; pos: number }
  | { kind: "end"; pos: number };

export class ExpressionError extends Error {
  constructor(
    message: string,
    public readonly position: number,
  ) {
    super(message);
    this.name = "ExpressionError";
  }
}

const CONSTANTS = new Map<string, number>([
  ["pi", Math.PI],
  ["e", Math.E],
]);

interface FunctionSpec {
  arity: number | "variadic";
  apply: (...args: number[]) => number;
}

const FUNCTIONS = new Map<string, FunctionSpec>([
  ["sqrt", { arity: 1, apply: Math.sqrt }],
  ["abs", { arity: 1, apply: Math.abs }],
  ["sin", { arity: 1, apply: Math.sin }],
  ["cos", { arity: 1, apply: Math.cos }],
  ["tan", { arity: 1, apply: Math.tan }],
  ["log", { arity: 1, apply: Math.log }],
  ["log10", { arity: 1, apply: Math.log10 }],
  ["exp", { arity: 1, apply: Math.exp }],
  ["floor", { arity: 1, apply: Math.floor }],
  ["ceil", { arity: 1, apply: Math.ceil }],
  ["round", { arity: 1, apply: Math.round }],
  ["pow", { arity: 2, apply: Math.pow }],
  ["min", { arity: "variadic", apply: Math.min }],
  ["max", { arity: "variadic", apply: Math.max }],
]);

const OPERATORS = new Set(["+", "-", "*", "/", "%", "^", "(", ")", ","]);

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (/[0-9.]/.test(ch)) {
      const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(source.slice(i));
      if (!match) throw new ExpressionError(`Invalid number at position ${i}`, i);
      tokens.push({ kind: "number", value: Number(match[0]), pos: i });
      i += match[0].length;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
      const name = match ? match[0] : ch;
      tokens.push({ kind: "ident", value: name.toLowerCase(), pos: i });
      i += name.length;
      continue;
    }

    if (OPERATORS.has(ch)) {
      tokens.push({ kind: "op", value: ch, pos: i });
      i++;
      continue;
    }

    throw new ExpressionError(`Invalid character in expression: ${ch}`, i);
  }

  tokens.push({ kind: "end", pos: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    const value = this.expression();
    const token = this.peek();
    if (token.kind !== "end") {
      throw new ExpressionError(`Unexpected token at position ${token.pos}`, token.pos);
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    while (this.isOp("+") || this.isOp("-")) {
      const op = this.advance();
      const rhs = this.term();
      value = op.kind === "op" && op.value === "+" ? value + rhs : value - rhs;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    while (this.isOp("*") || this.isOp("/") || this.isOp("%")) {
      const op = this.advance();
      const rhs = this.unary();
      if (op.kind === "op" && op.value === "*") {
        value *= rhs;
      } else if (rhs === 0) {
        throw new ExpressionError("Division by zero", op.pos);
      } else {
        value = op.kind === "op" && op.value === "/" ? value / rhs : value % rhs;
      }
    }
    return value;
  }

  private unary(): number {
    if (this.isOp("-")) {
      this.advance();
      return -this.unary();
    }
    if (this.isOp("+")) {
      this.advance();
      return this.unary();
    }
    return this.power();
  }

  // Right-associative: 2^3^2 = 2^9
  private power(): number {
    const base = this.primary();
    if (this.isOp("^")) {
      this.advance();
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.advance();

    if (token.kind === "number") return token.value;

    if (token.kind === "op" && token.value === "(") {
      const value = this.expression();
      this.expect(")");
      return value;
    }

    if (token.kind === "ident") {
      if (this.isOp("(")) return this.call(token.value, token.pos);
      const constant = CONSTANTS.get(token.value);
      if (constant === undefined) {
        throw new ExpressionError(`Unknown name: ${token.value}`, token.pos);
      }
      return constant;
    }

    if (token.kind === "end") {
      throw new ExpressionError("Unexpected end of expression", token.pos);
    }
    throw new ExpressionError(`Unexpected token at position ${token.pos}`, token.pos);
  }

  private call(name: string, pos: number): number {
    const fn = FUNCTIONS.get(name);
    if (!fn) throw new ExpressionError(`Unknown function: ${name}`, pos);

    this.expect("(");
    const args: number[] = [];
    if (!this.isOp(")")) {
      args.push(this.expression());
      while (this.isOp(",")) {
        this.advance();
        args.push(this.expression());
      }
    }
    this.expect(")");

    if (fn.arity === "variadic" ? args.length === 0 : args.length !== fn.arity) {
      throw new ExpressionError(`Wrong number of arguments for ${name}`, pos);
    }
    return fn.apply(...args);
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.kind !== "end") this.index++;
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.kind === "op" && token.value === value;
  }

  private expect(value: string): void {
    const token = this.advance();
    if (token.kind !== "op" || token.value !== value) {
      throw new ExpressionError(`Expected "${value}" at position ${token.pos}`, token.pos);
    }
  }
}

export function evaluate(source: string): number {
  const result = new Parser(tokenize(source)).parse();
  if (!Number.isFinite(result)) {
    throw new ExpressionError("Result is not a finite number", 0);
  }
  return result;
}

/** Render a result without binary floating-point noise (0.1+0.2 → 0.3). */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(12)));
}
