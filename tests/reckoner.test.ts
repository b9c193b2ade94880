import { describe, it, expect, jest } from "@jest/globals";
import { Reckoner } from "../src";
import { AttemptLog } from "../src/lib/audit";
import { t } from "../src/lib/descriptors";
import {
  InputContractError,
  ProviderError,
  RetriesExhaustedError,
  UnsupportedClientError,
  UnsupportedTypeError,
} from "../src/lib/errors";
import { Logger } from "../src/lib/logger";
import { describeFunction } from "../src/lib/signature";
import { FakeClient, fakeRegistry, Reply } from "./fixtures/fake-provider";

type Point = { x: number; y: number };

const Point = t.record<Point>("Point", { x: t.integer(), y: t.integer() });

function setup(replies: Reply[], numTries = 1, mode: "chill" | "eager" | "aggressive" = "chill") {
  const client = new FakeClient(replies);
  const auditLog = new AttemptLog();
  const logger = new Logger("debug", false);
  const reckon = new Reckoner(client, "fake-model", { numTries, mode }, { registry: fakeRegistry(), auditLog, logger });
  return { client, auditLog, logger, reckon };
}

function locate(label: string): Point {
  return { x: label.length, y: 0 };
}

describe("Reckoner", () => {
  describe("construction", () => {
    it("should reject a client no provider recognizes before any call", () => {
      const send = jest.fn();
      const client = { responses: { create: send } };

      expect(() => new Reckoner(client, "gpt-test")).toThrow(UnsupportedClientError);
      expect(send).not.toHaveBeenCalled();
    });

    it("should list the supported providers in the error", () => {
      expect(() => new Reckoner({}, "gpt-test")).toThrow(
        "Client is not recognized by any provider (supported: openai, gemini)"
      );
    });

    it("should reject invalid retry configuration", () => {
      const client = new FakeClient(["true"]);
      expect(() => new Reckoner(client, "m", { numTries: 0 }, { registry: fakeRegistry() })).toThrow(InputContractError);
      expect(() => new Reckoner(client, "m", { numTries: 1.5 }, { registry: fakeRegistry() })).toThrow(
        InputContractError
      );
    });

    it("should reject an empty model or a non-positive timeout", () => {
      const client = new FakeClient(["true"]);
      expect(() => new Reckoner(client, " ", {}, { registry: fakeRegistry() })).toThrow(InputContractError);
      expect(() => new Reckoner(client, "m", { timeoutMs: 0 }, { registry: fakeRegistry() })).toThrow(
        InputContractError
      );
    });

    it("should freeze the resolved retry configuration", () => {
      const { reckon } = setup(["true"], 3, "eager");
      expect(reckon.config).toEqual({ numTries: 3, mode: "eager", backoffBaseMs: 0, backoffMaxMs: 8000 });
      expect(Object.isFrozen(reckon.config)).toBe(true);
      expect(reckon.adapter.name).toBe("fake");
    });
  });

  describe("statements", () => {
    it("should evaluate a statement the backend calls true", async () => {
      const { client, reckon } = setup(["true"]);

      await expect(reckon.evaluate("4 is an even number")).resolves.toBe(true);
      expect(client.prompts).toHaveLength(1);
      expect(client.prompts[0]).toContain("Statement: 4 is an even number");
    });

    it("should accept a capitalized false token", async () => {
      const { reckon } = setup(["False"]);
      await expect(reckon.evaluate("5 is an even number")).resolves.toBe(false);
    });

    it("should only accept yes/no from eager mode on", async () => {
      const chill = setup(["yes"]);
      await expect(chill.reckon.evaluate("the sky is blue")).rejects.toBeInstanceOf(RetriesExhaustedError);

      const eager = setup(["Yes"], 1, "eager");
      await expect(eager.reckon.evaluate("the sky is blue")).resolves.toBe(true);
    });

    it("should reject an empty statement", async () => {
      const { client, reckon } = setup(["true"]);
      await expect(reckon.evaluate("   ")).rejects.toBeInstanceOf(InputContractError);
      expect(client.prompts).toHaveLength(0);
    });

    it("should retry a provider failure within the budget", async () => {
      const { client, reckon, auditLog } = setup([new ProviderError("fake", "unavailable", { status: 503 }), "true"], 2);

      await expect(reckon.evaluate("water is wet")).resolves.toBe(true);
      expect(client.prompts).toHaveLength(2);
      expect(auditLog.getAttempts("water is wet").map((a) => a.errorKind)).toEqual(["provider", undefined]);
    });
  });

  describe("wrapped functions", () => {
    it("should coerce a structured record result", async () => {
      const { reckon } = setup(['{"x": 1, "y": 1}']);
      const wrapped = reckon.evaluate(locate, { returns: Point });

      await expect(wrapped("origin")).resolves.toEqual({ x: 1, y: 1 });
    });

    it("should only convert numeric strings in a sequence under eager mode", async () => {
      const digits = (text: string): number[] => [text.length];

      const chill = setup(['[1, "2", 3]']);
      await expect(chill.reckon.evaluate(digits, { returns: t.array(t.integer()) })("123")).rejects.toBeInstanceOf(
        RetriesExhaustedError
      );

      const eager = setup(['[1, "2", 3]'], 1, "eager");
      await expect(eager.reckon.evaluate(digits, { returns: t.array(t.integer()) })("123")).resolves.toEqual([1, 2, 3]);
    });

    it("should retry a response missing a required field", async () => {
      const { client, reckon, auditLog } = setup(['{"x": 1}', '{"x": 1, "y": 1}'], 2);
      const wrapped = reckon.evaluate(locate, { returns: Point });

      await expect(wrapped("origin")).resolves.toEqual({ x: 1, y: 1 });
      expect(client.prompts).toHaveLength(2);

      const attempts = auditLog.getAttempts("locate");
      expect(attempts).toHaveLength(2);
      expect(attempts[0]).toMatchObject({ attempt: 1, valid: false, errorKind: "type_mismatch", rawText: '{"x": 1}' });
      expect(attempts[1]).toMatchObject({ attempt: 2, valid: true });
    });

    it("should give up after exactly numTries attempts", async () => {
      const { client, reckon, auditLog } = setup(['{"x": 1}'], 2);
      const wrapped = reckon.evaluate(locate, { returns: Point });

      await expect(wrapped("origin")).rejects.toMatchObject({
        name: "RetriesExhaustedError",
        attempts: 2,
        cause: { path: "$.y" },
      });
      expect(client.prompts).toHaveLength(2);
      expect(auditLog.getAttempts("locate")).toHaveLength(2);
    });

    it("should log each failed attempt with its context", async () => {
      const { reckon, logger } = setup(['{"x": 1}', '{"x": 1, "y": 1}'], 2);
      await reckon.evaluate(locate, { returns: Point })("origin");

      const warnings = logger.getEntries().filter((entry) => entry.level === "warn");
      expect(warnings).toHaveLength(1);
      expect(warnings[0].message).toBe("Attempt failed");
      expect(warnings[0].context).toEqual({ request: "locate", attempt: 1, phase: "retry", component: "fake" });
    });

    it("should render parameter names and arguments into the prompt", async () => {
      const { client, reckon } = setup(["5"]);
      const add = describeFunction((a: number, b: number): number => a + b, {
        name: "add",
        docstring: "Add two numbers",
        returns: "Integer",
      });

      await expect(reckon.evaluate(add)(2, 3)).resolves.toBe(5);
      expect(client.prompts[0]).toContain("Function signature: add(a, b) -> integer");
      expect(client.prompts[0]).toContain("Docstring:\nAdd two numbers");
      expect(client.prompts[0]).toContain("Arguments:\n- a = 2\n- b = 3");
    });

    it("should prefer an explicit signature over a registered one", async () => {
      const { client, reckon } = setup(['"hi"']);
      const greet = describeFunction((name: string): string => name, { returns: "number" });

      await expect(reckon.evaluate(greet, { name: "greet", returns: "string" })("Ada")).resolves.toBe("hi");
      expect(client.prompts[0]).toContain("Expected return shape: string");
    });

    it("should use a comment opening the function body as the docstring", async () => {
      const { client, reckon } = setup(['"HELLO!"']);
      function shout(text: string): string {
        /** Upper-case the text and add an exclamation mark */
        return text;
      }

      await expect(reckon.evaluate(shout, { returns: "string" })("hello")).resolves.toBe("HELLO!");
      expect(client.prompts[0]).toContain("Docstring:\nUpper-case the text and add an exclamation mark");
      expect(client.prompts[0]).toContain("Function signature: shout(text) -> string");
    });

    it("should fail with UnsupportedTypeError when no return type is known", async () => {
      const { client, reckon } = setup(["1"]);
      const wrapped = reckon.evaluate((value: number) => value);

      await expect(wrapped(1)).rejects.toBeInstanceOf(UnsupportedTypeError);
      expect(client.prompts).toHaveLength(0);
    });

    it("should resolve the return type once per wrapper", async () => {
      const { reckon } = setup(['{"x": 2, "y": 3}']);
      class Cell {
        x = 0;
        y = 0;
        static describe = jest.fn(() => [
          { name: "x", type: "Integer" },
          { name: "y", type: "Integer" },
        ]);
      }
      const wrapped = reckon.evaluate((row: number): Cell => new Cell(), { returns: Cell });

      const first = await wrapped(1);
      const second = await wrapped(2);

      expect(first).toBeInstanceOf(Cell);
      expect(second).toMatchObject({ x: 2, y: 3 });
      expect(Cell.describe).toHaveBeenCalledTimes(1);
    });
  });

  describe("free-form prompts", () => {
    it("should return the model's text unchanged without a return type", async () => {
      const reply = '```json\n"Blue"\n```';
      const { client, reckon } = setup([reply]);

      await expect(reckon.prompt("Name a colour")).resolves.toBe(reply);
      expect(client.prompts).toEqual(["Name a colour"]);
    });

    it("should coerce and retry a typed prompt", async () => {
      const { client, reckon, auditLog } = setup(["ninety-seven", "97"], 2);

      await expect(reckon.prompt("Name a prime above 90", t.integer())).resolves.toBe(97);
      expect(client.prompts).toHaveLength(2);
      expect(client.prompts[0].split("\n")[0]).toBe("Name a prime above 90");
      expect(client.prompts[0]).toContain("Expected return shape: integer");
      expect(auditLog.getAttempts("Name a prime above 90").map((a) => a.errorKind)).toEqual(["parse", undefined]);
    });

    it("should resolve a named return type", async () => {
      const { reckon } = setup(['{"x": 3, "y": 4}']);
      await expect(reckon.prompt("Pick a point", Point)).resolves.toEqual({ x: 3, y: 4 });
    });

    it("should reject an empty prompt", async () => {
      const { client, reckon } = setup(["unused"]);
      await expect(reckon.prompt(" \n")).rejects.toBeInstanceOf(InputContractError);
      expect(client.prompts).toHaveLength(0);
    });
  });

  describe("input contract", () => {
    it("should reject inputs that are neither strings nor functions", () => {
      const { reckon } = setup(["true"]);
      const evaluate = (input: unknown): unknown => Reflect.apply(reckon.evaluate, reckon, [input]);

      expect(() => evaluate(42)).toThrow(InputContractError);
    });
  });
});
