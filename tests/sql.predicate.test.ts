import { expect, test, describe } from "vitest";
import {
  compilePredicate,
  evaluatePredicate,
  PredicateError,
  RowKeyError,
  UnsupportedOperatorError,
} from "../lib/sql";

describe("WHERE predicate compiler", () => {
  test("Operators: every supported operator compiles", () => {
    expect(compilePredicate("age = 30").operator).toBe("=");
    expect(compilePredicate("age != 30").operator).toBe("!=");
    expect(compilePredicate("age < 30").operator).toBe("<");
    expect(compilePredicate("age <= 30").operator).toBe("<=");
    expect(compilePredicate("age > 30").operator).toBe(">");
    expect(compilePredicate("age >= 30").operator).toBe(">=");
  });

  test("Whitespace around the operator is optional", () => {
    expect(compilePredicate("age>=30")).toEqual({
      column: "age",
      operator: ">=",
      literal: "30",
      text: "age>=30",
    });
  });

  test("Literal is the trimmed remainder with quotes kept", () => {
    expect(compilePredicate("  name =  'Bob Smith'  ")).toEqual({
      column: "name",
      operator: "=",
      literal: "'Bob Smith'",
      text: "name =  'Bob Smith'",
    });
  });

  test("Missing column or operator is rejected", () => {
    expect(() => compilePredicate("= 3")).toThrow("Unsupported WHERE condition: = 3");
    expect(() => compilePredicate("age 30")).toThrow(PredicateError);
  });

  test("Missing value is rejected", () => {
    expect(() => compilePredicate("age =")).toThrow("Missing value in WHERE condition: age =");
  });

  test("Unsupported operator names the offending token", () => {
    for (const [clause, token] of [
      ["a == 1", "=="],
      ["a => 1", "=>"],
      ["a ! 1", "!"],
    ]) {
      try {
        compilePredicate(clause);
        throw new Error("Should have thrown error");
      } catch (error) {
        expect(error).toBeInstanceOf(UnsupportedOperatorError);
        expect(error).toBeInstanceOf(PredicateError);
        if (error instanceof UnsupportedOperatorError) {
          expect(error.operator).toBe(token);
          expect(error.message).toBe(`Unsupported operator in WHERE condition: ${token}`);
        }
      }
    }
  });
});

describe("WHERE predicate evaluation", () => {
  test("Comparisons are on text, not numbers", () => {
    const row = { age: "9" };

    expect(evaluatePredicate(compilePredicate("age < 10"), row)).toBe(false);
    expect(evaluatePredicate(compilePredicate("age > 10"), row)).toBe(true);
    expect(evaluatePredicate(compilePredicate("age >= 9"), row)).toBe(true);
    expect(evaluatePredicate(compilePredicate("age <= 09"), row)).toBe(false);
  });

  test("Equality compares the stored text exactly", () => {
    const quoted = compilePredicate("name = 'Bob'");

    expect(evaluatePredicate(quoted, { name: "'Bob'" })).toBe(true);
    expect(evaluatePredicate(quoted, { name: "Bob" })).toBe(false);
    expect(evaluatePredicate(compilePredicate("name != 'Bob'"), { name: "Bob" })).toBe(true);
  });

  test("Column missing from the row fails the lookup", () => {
    const predicate = compilePredicate("age > 1");

    expect(() => evaluatePredicate(predicate, { id: "1" })).toThrow(RowKeyError);
    expect(() => evaluatePredicate(predicate, { id: "1" })).toThrow(
      "Column 'age' not found in row",
    );
  });
});
