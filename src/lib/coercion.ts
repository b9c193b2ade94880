/**
 * Coercion Engine
 * Turns the raw text of one model response into a value of the declared shape.
 *
 * Leniency by mode:
 *   chill       exact JSON types; booleans accept true/false in any case
 *   eager       + yes/no, numeric strings for number/integer
 *   aggressive  + t/f/y/n/1/0 and 0/1 for booleans, numbers and booleans as strings,
 *                 JSON-encoded strings where an array or object is expected
 *
 * A top-level string takes the response text as-is in every mode.
 */

import { ParseError, TypeMismatchError } from "./errors";
import { Descriptor, RecordDescriptor, RetryMode, TypeDescriptor } from "./types";
import { describeValue, isPlainObject, stripCodeFence } from "./utils";

export type CoercionOutcome =
  | { readonly status: "coerced"; readonly value: unknown }
  | { readonly status: "failed"; readonly error: ParseError | TypeMismatchError };

type Step = { ok: true; value: unknown } | { ok: false; error: TypeMismatchError };

const BOOLEAN_TOKENS: Record<RetryMode, ReadonlyMap<string, boolean>> = {
  chill: new Map([
    ["true", true],
    ["false", false],
  ]),
  eager: new Map([
    ["true", true],
    ["false", false],
    ["yes", true],
    ["no", false],
  ]),
  aggressive: new Map([
    ["true", true],
    ["false", false],
    ["yes", true],
    ["no", false],
    ["t", true],
    ["f", false],
    ["y", true],
    ["n", false],
    ["1", true],
    ["0", false],
  ]),
};

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function ok(value: unknown): Step {
  return { ok: true, value };
}

function mismatch(path: string, expected: string, value: unknown): Step {
  return { ok: false, error: new TypeMismatchError(path, expected, value, `got ${describeValue(value)}`) };
}

export function coerce<T>(rawText: string, descriptor: Descriptor<T>, mode: RetryMode = "chill"): CoercionOutcome {
  const text = stripCodeFence(rawText);

  if (descriptor.kind === "boolean") {
    const token = BOOLEAN_TOKENS[mode].get(text.toLowerCase());
    if (token !== undefined) {
      return { status: "coerced", value: token };
    }
  }

  const topLevelString = descriptor.kind === "primitive" && descriptor.primitive === "string";

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    if (topLevelString) {
      return { status: "coerced", value: text };
    }
    const reason = error instanceof Error ? error.message : String(error);
    return { status: "failed", error: new ParseError(rawText, `Response is not valid JSON: ${reason}`) };
  }

  // A bare top-level answer such as 5551234 is the text itself
  if (topLevelString) {
    return { status: "coerced", value: typeof parsed === "string" ? parsed : text };
  }

  const step = coerceValue(parsed, descriptor, mode, "$");
  return step.ok ? { status: "coerced", value: step.value } : { status: "failed", error: step.error };
}

/**
 * Coerce an already-parsed JSON value
 */
export function coerceValue(value: unknown, descriptor: TypeDescriptor, mode: RetryMode, path: string): Step {
  switch (descriptor.kind) {
    case "boolean":
      return coerceBoolean(value, mode, path);
    case "primitive":
      return coercePrimitive(value, descriptor.primitive, mode, path);
    case "sequence":
      return coerceElements(value, mode, path, "array", () => descriptor.element);
    case "set": {
      const step = coerceElements(value, mode, path, "array (set)", () => descriptor.element);
      return step.ok && Array.isArray(step.value) ? ok(new Set(step.value)) : step;
    }
    case "tuple": {
      const arity = descriptor.elements.length;
      const source = unwrapEncoded(value, mode);
      if (Array.isArray(source) && source.length !== arity) {
        return {
          ok: false,
          error: new TypeMismatchError(path, `tuple of ${arity}`, value, `got ${source.length} element(s)`),
        };
      }
      return coerceElements(value, mode, path, `tuple of ${arity}`, (index) => descriptor.elements[index]);
    }
    case "mapping":
      return coerceMapping(value, descriptor.value, mode, path);
    case "record":
      return coerceRecord(value, descriptor, mode, path);
    default:
      return exhaustive(descriptor);
  }
}

function exhaustive(descriptor: never): never {
  throw new Error(`Unhandled descriptor ${JSON.stringify(descriptor)}`);
}

function coerceBoolean(value: unknown, mode: RetryMode, path: string): Step {
  if (typeof value === "boolean") {
    return ok(value);
  }
  if (typeof value === "string") {
    const token = BOOLEAN_TOKENS[mode].get(value.trim().toLowerCase());
    if (token !== undefined) {
      return ok(token);
    }
  }
  if (mode === "aggressive" && (value === 0 || value === 1)) {
    return ok(value === 1);
  }
  return mismatch(path, "boolean", value);
}

function coercePrimitive(value: unknown, kind: "string" | "number" | "integer", mode: RetryMode, path: string): Step {
  if (kind === "string") {
    if (typeof value === "string") {
      return ok(value);
    }
    if (mode === "aggressive" && (typeof value === "number" || typeof value === "boolean")) {
      return ok(String(value));
    }
    return mismatch(path, "string", value);
  }

  let candidate = value;
  if (mode !== "chill" && typeof value === "string" && NUMERIC_TEXT.test(value.trim())) {
    candidate = Number(value.trim());
  }

  if (typeof candidate !== "number" || !Number.isFinite(candidate)) {
    return mismatch(path, kind, value);
  }
  if (kind === "integer" && !Number.isInteger(candidate)) {
    return mismatch(path, "integer", value);
  }
  return ok(candidate);
}

/**
 * Under aggressive mode a container may arrive JSON-encoded inside a string
 */
function unwrapEncoded(value: unknown, mode: RetryMode): unknown {
  if (mode !== "aggressive" || typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  if (!trimmed.startsWith("[") && !trimmed.startsWith("{")) {
    return value;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return value;
  }
}

function coerceElements(
  value: unknown,
  mode: RetryMode,
  path: string,
  expected: string,
  elementAt: (index: number) => TypeDescriptor
): Step {
  const source = unwrapEncoded(value, mode);
  if (!Array.isArray(source)) {
    return mismatch(path, expected, value);
  }

  const result: unknown[] = [];
  for (let index = 0; index < source.length; index += 1) {
    const step = coerceValue(source[index], elementAt(index), mode, `${path}[${index}]`);
    if (!step.ok) {
      return step;
    }
    result.push(step.value);
  }
  return ok(result);
}

/**
 * Prototype-free target, so a "__proto__" key from JSON stays an own entry
 */
function emptyEntries(): Record<string, unknown> {
  const entries: Record<string, unknown> = Object.create(null);
  return entries;
}

function coerceMapping(value: unknown, valueDescriptor: TypeDescriptor, mode: RetryMode, path: string): Step {
  const source = unwrapEncoded(value, mode);
  if (!isPlainObject(source)) {
    return mismatch(path, "object", value);
  }

  const result = emptyEntries();
  for (const [key, entry] of Object.entries(source)) {
    const step = coerceValue(entry, valueDescriptor, mode, `${path}[${JSON.stringify(key)}]`);
    if (!step.ok) {
      return step;
    }
    result[key] = step.value;
  }
  return ok(result);
}

function coerceRecord(value: unknown, descriptor: RecordDescriptor, mode: RetryMode, path: string): Step {
  const source = unwrapEncoded(value, mode);
  if (!isPlainObject(source)) {
    return mismatch(path, `object (${descriptor.name})`, value);
  }

  const fields = emptyEntries();
  for (const field of descriptor.fields) {
    const fieldPath = `${path}.${field.name}`;
    if (!Object.prototype.hasOwnProperty.call(source, field.name) || source[field.name] === undefined) {
      if (field.required) {
        return {
          ok: false,
          error: new TypeMismatchError(fieldPath, `required field of ${descriptor.name}`, source, "missing"),
        };
      }
      continue;
    }
    const step = coerceValue(source[field.name], field.type, mode, fieldPath);
    if (!step.ok) {
      return step;
    }
    fields[field.name] = step.value;
  }

  if (!descriptor.construct) {
    return ok(fields);
  }
  try {
    return ok(descriptor.construct(fields));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new TypeMismatchError(path, descriptor.name, fields, `construction failed: ${reason}`) };
  }
}
