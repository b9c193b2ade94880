import { describe, it, expect } from "@jest/globals";
import { t } from "../src/lib/descriptors";
import {
  buildFreeformPrompt,
  buildFunctionPrompt,
  buildStatementPrompt,
  describeShape,
  renderArguments,
  renderSignature,
  RESPONSE_PREAMBLE,
} from "../src/lib/prompts";
import { FunctionRequest } from "../src/lib/types";

describe("Prompt Builder", () => {
  describe("describeShape", () => {
    it("should describe nested shapes", () => {
      const Point = t.record("Point", { x: t.integer(), y: t.integer(), label: t.optional(t.string()) });
      expect(describeShape(t.array(Point))).toBe('array of {"x": integer, "y": integer, "label"?: string}');
      expect(describeShape(t.set(t.string()))).toBe("array of unique string");
      expect(describeShape(t.tuple(t.boolean(), t.number()))).toBe("[boolean, number]");
      expect(describeShape(t.mapping(t.array(t.number()), t.integer()))).toBe(
        "object with integer keys and array of number values"
      );
    });
  });

  describe("buildStatementPrompt", () => {
    it("should embed the preamble and the statement verbatim", () => {
      const prompt = buildStatementPrompt("4 is an even number");
      expect(prompt.split("\n")).toEqual([
        "Evaluate the statement below and respond with either true or false.",
        RESPONSE_PREAMBLE,
        "Statement: 4 is an even number",
      ]);
    });
  });

  describe("buildFreeformPrompt", () => {
    it("should pass the text through when no return type is given", () => {
      expect(buildFreeformPrompt("  Name a colour\n")).toBe("  Name a colour\n");
    });

    it("should append the preamble and return shape for a typed prompt", () => {
      expect(buildFreeformPrompt("Name a prime above 90", t.integer()).split("\n")).toEqual([
        "Name a prime above 90",
        RESPONSE_PREAMBLE,
        "Expected return shape: integer",
      ]);
    });
  });

  describe("buildFunctionPrompt", () => {
    const request: FunctionRequest = {
      kind: "function",
      name: "midpoint",
      signature: [{ name: "a", type: t.tuple(t.integer(), t.integer()) }, { name: "rest", rest: true }],
      docstring: "Integer midpoint of two points",
      arguments: [
        { name: "a", value: [0, 0] },
        { name: "rest", value: [{ y: 4, x: 2 }] },
      ],
      returns: t.tuple(t.integer(), t.integer()),
    };

    it("should render signature, docstring, arguments and return shape", () => {
      const lines = buildFunctionPrompt(request).split("\n");
      expect(lines.slice(1)).toEqual([
        RESPONSE_PREAMBLE,
        "Function signature: midpoint(a: [integer, integer], ...rest) -> [integer, integer]",
        "Docstring:",
        "Integer midpoint of two points",
        "Arguments:",
        "- a = [0,0]",
        '- rest = [{"x":2,"y":4}]',
        "Expected return shape: [integer, integer]",
      ]);
    });

    it("should be identical for identical requests", () => {
      expect(buildFunctionPrompt(request)).toBe(buildFunctionPrompt({ ...request }));
    });

    it("should mark absent docstrings and arguments", () => {
      const prompt = buildFunctionPrompt({ ...request, docstring: "", arguments: [] });
      expect(prompt).toContain("Docstring: (none)");
      expect(prompt).toContain("Arguments:\n(none)");
    });
  });

  describe("renderArguments", () => {
    it("should render sets as arrays and undefined explicitly", () => {
      expect(renderArguments([
        { name: "tags", value: new Set(["b", "a"]) },
        { name: "missing", value: undefined },
      ])).toBe('- tags = ["b","a"]\n- missing = undefined');
    });
  });

  describe("renderSignature", () => {
    it("should omit types that are not known", () => {
      expect(renderSignature("greet", [{ name: "name" }], t.string())).toBe("greet(name) -> string");
    });
  });
});
