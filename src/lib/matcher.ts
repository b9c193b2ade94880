/**
 * Match Validator
 * Structural re-check of a coerced value. Shares no code with the coercion
 * engine so that a coercion bug cannot vouch for itself.
 */

import { Descriptor, PrimitiveKind, RecordDescriptor, TypeDescriptor } from "./types";
import { isPlainObject } from "./utils";

export type MatchResult = { ok: true } | { ok: false; path: string; expected: string };

const PASS: MatchResult = { ok: true };

export function matches<T>(value: unknown, descriptor: Descriptor<T>): value is T {
  return explainMismatch(value, descriptor).ok;
}

/**
 * Like matches(), but reports where the first mismatch is
 */
export function explainMismatch(value: unknown, descriptor: TypeDescriptor, path: string = "$"): MatchResult {
  const fail = (expected: string): MatchResult => ({ ok: false, path, expected });

  switch (descriptor.kind) {
    case "boolean":
      return typeof value === "boolean" ? PASS : fail("boolean");

    case "primitive":
      return isPrimitive(value, descriptor.primitive) ? PASS : fail(descriptor.primitive);

    case "sequence":
      return Array.isArray(value) ? everyItem(value, descriptor.element, path) : fail("array");

    case "set":
      return value instanceof Set ? everyItem(Array.from(value), descriptor.element, path) : fail("Set");

    case "tuple": {
      if (!Array.isArray(value) || value.length !== descriptor.elements.length) {
        return fail(`tuple of ${descriptor.elements.length}`);
      }
      for (let index = 0; index < value.length; index += 1) {
        const result = explainMismatch(value[index], descriptor.elements[index], `${path}[${index}]`);
        if (!result.ok) return result;
      }
      return PASS;
    }

    case "mapping": {
      if (!isPlainObject(value)) {
        return fail("object");
      }
      for (const [key, entry] of Object.entries(value)) {
        if (!isKeyText(key, descriptor.key.primitive)) {
          return { ok: false, path: `${path}[${JSON.stringify(key)}]`, expected: `${descriptor.key.primitive} key` };
        }
        const result = explainMismatch(entry, descriptor.value, `${path}[${JSON.stringify(key)}]`);
        if (!result.ok) return result;
      }
      return PASS;
    }

    case "record":
      return matchRecord(value, descriptor, path);

    default:
      return unreachable(descriptor);
  }
}

function unreachable(descriptor: never): never {
  throw new Error(`Unhandled descriptor ${JSON.stringify(descriptor)}`);
}

function isPrimitive(value: unknown, kind: PrimitiveKind): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
  }
}

function isKeyText(key: string, kind: PrimitiveKind): boolean {
  if (kind === "string") return true;
  const numeric = Number(key);
  return key.trim() !== "" && isPrimitive(numeric, kind);
}

function everyItem(items: unknown[], element: TypeDescriptor, path: string): MatchResult {
  for (let index = 0; index < items.length; index += 1) {
    const result = explainMismatch(items[index], element, `${path}[${index}]`);
    if (!result.ok) return result;
  }
  return PASS;
}

function matchRecord(value: unknown, descriptor: RecordDescriptor, path: string): MatchResult {
  const shapeOk = descriptor.target ? value instanceof descriptor.target : isPlainObject(value);
  if (!shapeOk || typeof value !== "object" || value === null) {
    return { ok: false, path, expected: descriptor.name };
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  for (const field of descriptor.fields) {
    const present = fields.has(field.name) && fields.get(field.name) !== undefined;
    if (!present) {
      if (field.required) {
        return { ok: false, path: `${path}.${field.name}`, expected: `required field of ${descriptor.name}` };
      }
      continue;
    }
    const result = explainMismatch(fields.get(field.name), field.type, `${path}.${field.name}`);
    if (!result.ok) return result;
  }
  return PASS;
}
