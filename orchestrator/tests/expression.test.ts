import { describe, expect, it } from "vitest";
import { compileExpression, truthy } from "../src/script/expression";
import { ConfigurationError, ExpressionError } from "../src/runtime/errors";
import { Variables } from "../src/types/script";

const variables: Variables = {
  count: 3,
  name: "emu",
  found: { x: 12, y: 40, confidence: 0.98 },
  items: ["a", "b"],
  empty: "",
};

function evaluate(source: string, scope: Variables = variables) {
  return compileExpression(source).evaluate(scope);
}

describe("expressions", () => {
  it("follows arithmetic precedence", () => {
    expect(evaluate("1 + 2 * 3")).toBe(7);
    expect(evaluate("(1 + 2) * 3")).toBe(9);
    expect(evaluate("-count + 10 % 4")).toBe(-1);
  });

  it("reads variables, members and indexes", () => {
    expect(evaluate("count >= 3 and name == 'emu'")).toBe(true);
    expect(evaluate("found.x + found.y")).toBe(52);
    expect(evaluate('variables["count"]')).toBe(3);
    expect(evaluate("items[1]")).toBe("b");
    expect(evaluate("items.length")).toBe(2);
  });

  it("treats unknown names as null", () => {
    expect(evaluate("missing")).toBeNull();
    expect(evaluate("missing == null")).toBe(true);
    expect(evaluate("missing.x")).toBeNull();
  });

  it("supports word and symbol logic operators", () => {
    expect(evaluate("not empty && count > 1")).toBe(true);
    expect(evaluate("!(count > 1) || false")).toBe(false);
  });

  it("concatenates when either side is a string", () => {
    expect(evaluate("name + '-' + count")).toBe("emu-3");
  });

  it("raises ExpressionError on type mismatch and division by zero", () => {
    expect(() => evaluate("count / 0")).toThrow(ExpressionError);
    expect(() => evaluate("count % 0")).toThrow("Modulo by zero");
    expect(() => evaluate("name < 3")).toThrow("Cannot compare string < number");
    expect(() => evaluate("name * 2")).toThrow("Operator '*' needs numbers, got string");
  });

  it("reports syntax errors with their position", () => {
    try {
      compileExpression("count == == 2");
      throw new Error("expected a syntax error");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual(["at 9: unexpected '=='"]);
      }
    }
    expect(() => compileExpression("'open")).toThrow(ConfigurationError);
    expect(() => compileExpression("count @ 2")).toThrow(ConfigurationError);
  });

  it("treats false, null, 0 and empty string as false", () => {
    expect([false, null, 0, ""].map(truthy)).toEqual([false, false, false, false]);
    expect([true, 1, "x", []].map(truthy)).toEqual([true, true, true, true]);
  });
});
