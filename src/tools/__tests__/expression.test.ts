import { describe, it, expect } from "vitest";
import { ExpressionError, evaluate, formatNumber, tokenize } from "../expression.js";

describe("evaluate", () => {
  it.each([
    ["2+2", 4],
    ["2 + 3 * 4", 14],
    ["(2 + 3) * 4", 20],
    ["10 - 4 - 3", 3],
    ["7 % 3", 1],
    ["-3 + 5", 2],
    ["--3", 3],
    ["2^10", 1024],
    ["2^3^2", 512],
    ["-2^2", -4],
    ["2^-1", 0.5],
    ["sqrt(144)", 12],
    ["2^10 + sqrt(144)", 1036],
    ["pow(2, 8)", 256],
    ["max(3, 9, 4)", 9],
    ["min(3, -9)", -9],
    ["abs(-7.5)", 7.5],
    ["floor(2.7) + ceil(2.1) + round(2.5)", 8],
    ["exp(0)", 1],
    ["1.5e2", 150],
    [".5 * 4", 2],
    ["SQRT(16)", 4],
  ])("%s = %s", (source, expected) => {
    expect(evaluate(source)).toBe(expected);
  });

  it("knows pi and e", () => {
    expect(evaluate("pi")).toBe(Math.PI);
    expect(evaluate("e")).toBe(Math.E);
    expect(evaluate("sin(pi/2)")).toBe(1);
  });

  it.each([
    ["1/0", "Division by zero"],
    ["5 % 0", "Division by zero"],
    ["2 +", "Unexpected end of expression"],
    ["(1 + 2", 'Expected ")" at position 6'],
    ["1 2", "Unexpected token at position 2"],
    ["foo(1)", "Unknown function: foo"],
    ["x + 1", "Unknown name: x"],
    ["pow(2)", "Wrong number of arguments for pow"],
    ["max()", "Wrong number of arguments for max"],
    ["sqrt(-1)", "Result is not a finite number"],
    ["2 & 3", "Invalid character in expression: &"],
  ])("rejects %s", (source, message) => {
    expect(() => evaluate(source)).toThrow(ExpressionError);
    expect(() => evaluate(source)).toThrow(message);
  });

  it("never evaluates names as code", () => {
    expect(() => evaluate("constructor")).toThrow("Unknown name: constructor");
    expect(() => evaluate("process.exit(1)")).toThrow(ExpressionError);
    expect(() => evaluate("__proto__")).toThrow(ExpressionError);
  });
});

describe("tokenize", () => {
  it("splits numbers, names and operators with their positions", () => {
    expect(tokenize("sqrt(16)+1")).toEqual([
      { kind: "ident", value: "sqrt", pos: 0 },
      { kind: "op", value: "(", pos: 4 },
      { kind: "number", value: 16, pos: 5 },
      { kind: "op", value: ")", pos: 7 },
      { kind: "op", value: "+", pos: 8 },
      { kind: "number", value: 1, pos: 9 },
      { kind: "end", pos: 10 },
    ]);
  });
});

describe("formatNumber", () => {
  it("prints integers without a fraction", () => {
    expect(formatNumber(4)).toBe("4");
    expect(formatNumber(-12)).toBe("-12");
  });

  it("hides binary floating-point noise", () => {
    expect(formatNumber(0.1 + 0.2)).toBe("0.3");
    expect(formatNumber(1 / 3)).toBe("0.333333333333");
  });
});
