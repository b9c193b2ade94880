/**
 * Descriptor builders
 *
 * const Point = t.record<Point>("Point", { x: t.integer(), y: t.integer(), label: t.optional(t.string()) });
 * const Points = t.array(Point);
 */

import {
  BooleanDescriptor,
  Descriptor,
  MappingDescriptor,
  PrimitiveDescriptor,
  PrimitiveKind,
  RecordConstructor,
  RecordDescriptor,
  RecordField,
  SequenceDescriptor,
  SetDescriptor,
  TupleDescriptor,
  TypeDescriptor,
} from "./types";

export type OptionalField<D extends TypeDescriptor = TypeDescriptor> = {
  readonly optional: true;
  readonly type: D;
};

export type FieldInput = TypeDescriptor | OptionalField;

function primitive(kind: PrimitiveKind): PrimitiveDescriptor {
  return Object.freeze({ kind: "primitive", primitive: kind });
}

const STRING = primitive("string");
const NUMBER = primitive("number");
const INTEGER = primitive("integer");
const BOOLEAN: BooleanDescriptor = Object.freeze({ kind: "boolean" });

export function isOptionalField(input: FieldInput): input is OptionalField {
  return "optional" in input && input.optional === true;
}

export function sequenceOf(element: TypeDescriptor): SequenceDescriptor {
  return Object.freeze({ kind: "sequence", element });
}

export function setOf(element: TypeDescriptor): SetDescriptor {
  return Object.freeze({ kind: "set", element });
}

export function tupleOf(elements: readonly TypeDescriptor[]): TupleDescriptor {
  return Object.freeze({ kind: "tuple", elements: Object.freeze([...elements]) });
}

export function mappingOf(key: PrimitiveDescriptor, value: TypeDescriptor): MappingDescriptor {
  return Object.freeze({ kind: "mapping", key, value });
}

export function recordOf(
  name: string,
  fields: readonly RecordField[],
  options: { target?: RecordConstructor; construct?: (values: Record<string, unknown>) => unknown } = {}
): RecordDescriptor {
  const descriptor: RecordDescriptor = {
    kind: "record",
    name,
    fields: Object.freeze(fields.map((field) => Object.freeze({ ...field }))),
    ...(options.target ? { target: options.target } : {}),
    ...(options.construct ? { construct: options.construct } : {}),
  };
  return Object.freeze(descriptor);
}

export const t = {
  string: (): Descriptor<string> => STRING,
  number: (): Descriptor<number> => NUMBER,
  integer: (): Descriptor<number> => INTEGER,
  boolean: (): Descriptor<boolean> => BOOLEAN,

  array<T>(element: Descriptor<T>): Descriptor<T[]> {
    return sequenceOf(element);
  },

  set<T>(element: Descriptor<T>): Descriptor<Set<T>> {
    return setOf(element);
  },

  tuple<T extends unknown[]>(...elements: { [K in keyof T]: Descriptor<T[K]> }): Descriptor<T> {
    return tupleOf(elements);
  },

  /**
   * Key-value mapping. Keys stay strings as they arrive in JSON; a number or
   * integer key descriptor only constrains what the key text looks like.
   */
  mapping<V>(value: Descriptor<V>, key: Descriptor<string> | Descriptor<number> = STRING): Descriptor<Record<string, V>> {
    if (key.kind !== "primitive") {
      throw new TypeError("Mapping keys must be primitive descriptors");
    }
    return mappingOf(key, value);
  },

  optional<D extends TypeDescriptor>(type: D): OptionalField<D> {
    return Object.freeze({ optional: true, type });
  },

  /**
   * Plain-object record. Field order follows the order of `fields`.
   */
  record<T extends object = Record<string, unknown>>(
    name: string,
    fields: Record<string, FieldInput>,
    construct?: (values: Record<string, unknown>) => T
  ): Descriptor<T> {
    const list: RecordField[] = Object.entries(fields).map(([fieldName, input]) =>
      isOptionalField(input)
        ? { name: fieldName, type: input.type, required: false }
        : { name: fieldName, type: input, required: true }
    );
    return recordOf(name, list, construct ? { construct } : {});
  },
};
