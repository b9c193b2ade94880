import { describe, it, expect } from "@jest/globals";
import { coerce, CoercionOutcome } from "../src/lib/coercion";
import { t } from "../src/lib/descriptors";
import { matches } from "../src/lib/matcher";
import { ParseError, TypeMismatchError } from "../src/lib/errors";
import { RetryMode } from "../src/lib/types";
import { isPlainObject } from "../src/lib/utils";

function valueOf(outcome: CoercionOutcome): unknown {
  if (outcome.status !== "coerced") {
    throw new Error(`expected a coerced value, got ${outcome.error.message}`);
  }
  return outcome.value;
}

function entriesOf(outcome: CoercionOutcome): Record<string, unknown> {
  const value = valueOf(outcome);
  if (!isPlainObject(value)) {
    throw new Error(`expected an object, got ${String(value)}`);
  }
  return value;
}

function errorOf(outcome: CoercionOutcome): ParseError | TypeMismatchError {
  if (outcome.status !== "failed") {
    throw new Error("expected coercion to fail");
  }
  return outcome.error;
}

describe("coerce", () => {
  describe("booleans", () => {
    it("should accept true/false tokens in any case under every mode", () => {
      const modes: RetryMode[] = ["chill", "eager", "aggressive"];
      for (const mode of modes) {
        expect(valueOf(coerce("TRUE", t.boolean(), mode))).toBe(true);
        expect(valueOf(coerce(" false\n", t.boolean(), mode))).toBe(false);
      }
    });

    it("should accept yes/no only from eager mode on", () => {
      expect(errorOf(coerce("yes", t.boolean(), "chill"))).toBeInstanceOf(ParseError);
      expect(valueOf(coerce("yes", t.boolean(), "eager"))).toBe(true);
      expect(valueOf(coerce("No", t.boolean(), "aggressive"))).toBe(false);
    });

    it("should accept short tokens and 0/1 only under aggressive mode", () => {
      expect(errorOf(coerce("y", t.boolean(), "eager"))).toBeInstanceOf(ParseError);
      expect(valueOf(coerce("y", t.boolean(), "aggressive"))).toBe(true);
      expect(valueOf(coerce("f", t.boolean(), "aggressive"))).toBe(false);
      expect(errorOf(coerce("[1]", t.array(t.boolean()), "eager"))).toBeInstanceOf(TypeMismatchError);
      expect(valueOf(coerce("[1, 0]", t.array(t.boolean()), "aggressive"))).toEqual([true, false]);
    });

    it("should treat bare 1 and 0 as numbers outside aggressive mode", () => {
      const error = errorOf(coerce("1", t.boolean(), "chill"));
      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error.message).toBe("$: expected boolean (got number)");
    });
  });

  describe("primitives", () => {
    it("should keep exact native types under chill mode", () => {
      expect(valueOf(coerce("42", t.integer()))).toBe(42);
      expect(valueOf(coerce("2.5", t.number()))).toBe(2.5);
      expect(valueOf(coerce('"text"', t.string()))).toBe("text");
    });

    it("should reject a fractional value for an integer", () => {
      expect(errorOf(coerce("2.5", t.integer()))).toBeInstanceOf(TypeMismatchError);
    });

    it("should convert numeric strings from eager mode on", () => {
      expect(errorOf(coerce('"7"', t.number(), "chill"))).toBeInstanceOf(TypeMismatchError);
      expect(valueOf(coerce('"7"', t.number(), "eager"))).toBe(7);
      expect(valueOf(coerce('" -1.5e2 "', t.number(), "aggressive"))).toBe(-150);
      expect(errorOf(coerce('"7.5"', t.integer(), "eager"))).toBeInstanceOf(TypeMismatchError);
      expect(errorOf(coerce('"seven"', t.number(), "aggressive"))).toBeInstanceOf(TypeMismatchError);
    });

    it("should stringify numbers and booleans only under aggressive mode", () => {
      expect(errorOf(coerce("[3]", t.array(t.string()), "eager"))).toBeInstanceOf(TypeMismatchError);
      expect(valueOf(coerce("[3, true]", t.array(t.string()), "aggressive"))).toEqual(["3", "true"]);
    });

    it("should accept unquoted text for a top-level string", () => {
      expect(valueOf(coerce("Paris", t.string()))).toBe("Paris");
    });

    it("should keep bare numbers and literals as text for a top-level string under every mode", () => {
      const modes: RetryMode[] = ["chill", "eager", "aggressive"];
      for (const mode of modes) {
        expect(valueOf(coerce("5551234", t.string(), mode))).toBe("5551234");
        expect(valueOf(coerce(" true\n", t.string(), mode))).toBe("true");
        expect(valueOf(coerce("null", t.string(), mode))).toBe("null");
        expect(valueOf(coerce('{"a": 1}', t.string(), mode))).toBe('{"a": 1}');
      }
    });

    it("should report unparseable text as a ParseError carrying the raw text", () => {
      const error = errorOf(coerce("not json", t.number()));
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError && error.rawText).toBe("not json");
    });

    it("should strip a markdown code fence", () => {
      expect(valueOf(coerce("```json\n[1, 2]\n```", t.array(t.integer())))).toEqual([1, 2]);
    });
  });

  describe("containers", () => {
    it("should fail a string element under chill mode and convert it under eager mode", () => {
      const error = errorOf(coerce('[1, "2", 3]', t.array(t.integer()), "chill"));
      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error.message).toBe("$[1]: expected integer (got string)");

      expect(valueOf(coerce('[1, "2", 3]', t.array(t.integer()), "eager"))).toEqual([1, 2, 3]);
    });

    it("should collapse duplicates into a Set", () => {
      const value = valueOf(coerce('["a", "b", "a"]', t.set(t.string())));
      expect(value).toBeInstanceOf(Set);
      expect(value).toEqual(new Set(["a", "b"]));
    });

    it("should coerce tuples positionally and enforce arity", () => {
      const pair = t.tuple(t.string(), t.integer());
      expect(valueOf(coerce('["a", 1]', pair))).toEqual(["a", 1]);

      const error = errorOf(coerce('["a", 1, 2]', pair));
      expect(error.message).toBe("$: expected tuple of 2 (got 3 element(s))");
      expect(errorOf(coerce('[1, "a"]', pair)).message).toBe("$[0]: expected string (got number)");
    });

    it("should coerce mapping values and keep keys", () => {
      expect(valueOf(coerce('{"a": "1", "b": 2}', t.mapping(t.number()), "eager"))).toEqual({ a: 1, b: 2 });
      expect(errorOf(coerce("[1]", t.mapping(t.number()))).message).toBe("$: expected object (got array)");
    });

    it("should keep a __proto__ key as an ordinary mapping entry", () => {
      const value = entriesOf(coerce('{"__proto__": 5, "a": 1}', t.mapping(t.number())));
      expect(Object.keys(value)).toEqual(["__proto__", "a"]);
      expect(Object.getOwnPropertyDescriptor(value, "__proto__")?.value).toBe(5);
      expect(matches(value, t.mapping(t.number()))).toBe(true);

      const nested = t.mapping(t.record("Item", { n: t.integer() }));
      const records = entriesOf(coerce('{"__proto__": {"n": 1}}', nested));
      expect(Object.keys(records)).toEqual(["__proto__"]);
      expect(matches(records, nested)).toBe(true);
    });

    it("should reject a __proto__ entry of the wrong type", () => {
      expect(errorOf(coerce('{"__proto__": "x"}', t.mapping(t.number()))).message).toBe(
        '$["__proto__"]: expected number (got string)'
      );
    });

    it("should decode JSON-encoded containers only under aggressive mode", () => {
      const raw = JSON.stringify({ items: "[1, 2]" });
      const shape = t.record("Bag", { items: t.array(t.integer()) });

      expect(errorOf(coerce(raw, shape, "eager")).message).toBe("$.items: expected array (got string)");
      expect(valueOf(coerce(raw, shape, "aggressive"))).toEqual({ items: [1, 2] });
    });
  });

  describe("records", () => {
    const Point = t.record("Point", { x: t.integer(), y: t.integer(), label: t.optional(t.string()) });

    it("should build a plain object from the declared fields and ignore extras", () => {
      expect(valueOf(coerce('{"x": 1, "y": 2, "z": 3}', Point))).toEqual({ x: 1, y: 2 });
    });

    it("should keep an optional field when present", () => {
      expect(valueOf(coerce('{"x": 1, "y": 2, "label": "origin"}', Point))).toEqual({ x: 1, y: 2, label: "origin" });
    });

    it("should fail when a required field is missing", () => {
      const error = errorOf(coerce('{"x": 1}', Point));
      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error.message).toBe("$.y: expected required field of Point (missing)");
    });

    it("should use the record's constructor", () => {
      class Temperature {
        constructor(readonly celsius: number) {}
      }
      const shape = t.record<Temperature>("Temperature", { celsius: t.number() }, (values) => {
        const celsius = values.celsius;
        if (typeof celsius !== "number") {
          throw new Error("celsius must be a number");
        }
        return new Temperature(celsius);
      });

      const value = valueOf(coerce('{"celsius": 21.5}', shape));
      expect(value).toBeInstanceOf(Temperature);
      expect(value).toEqual(new Temperature(21.5));
    });

    it("should report a throwing constructor as a mismatch", () => {
      const shape = t.record("Positive", { n: t.number() }, () => {
        throw new Error("must be positive");
      });

      expect(errorOf(coerce('{"n": -1}', shape)).message).toBe(
        "$: expected Positive (construction failed: must be positive)"
      );
    });
  });

  it("should be deterministic for the same input", () => {
    const shape = t.array(t.mapping(t.integer()));
    const raw = '[{"a": "1"}, {"b": 2}]';
    expect(coerce(raw, shape, "eager")).toEqual(coerce(raw, shape, "eager"));
  });
});
