/**
 * Type Descriptor Resolver
 * Classifies anything the caller hands us as a return or field type into a
 * TypeDescriptor. Failures are configuration errors and are never retried.
 */

import { UnsupportedTypeError } from "./errors";
import { recordOf, t } from "./descriptors";
import { resolveTypeText } from "./type-text";
import {
  DescribableClass,
  Descriptor,
  RecordConstructor,
  RecordDescriptor,
  RecordField,
  RecordFieldSpec,
  TypeDescriptor,
  TypeLike,
} from "./types";

type Registration = {
  fields: readonly RecordFieldSpec[];
  construct?: (values: Record<string, unknown>) => unknown;
};

/**
 * Registration step for record types that cannot carry a static describe():
 * classes from other libraries, or interface names referenced from type text.
 */
export class RecordRegistry {
  private byClass = new WeakMap<RecordConstructor, Registration>();
  private byName = new Map<string, Registration>();

  register(
    target: RecordConstructor | string,
    fields: readonly RecordFieldSpec[],
    construct?: (values: Record<string, unknown>) => unknown
  ): void {
    const registration: Registration = { fields: [...fields], construct };
    if (typeof target === "string") {
      this.byName.set(target, registration);
    } else {
      this.byClass.set(target, registration);
    }
  }

  forClass(target: RecordConstructor): Registration | undefined {
    return this.byClass.get(target);
  }

  forName(name: string): Registration | undefined {
    return this.byName.get(name);
  }

  has(target: RecordConstructor | string): boolean {
    return typeof target === "string" ? this.byName.has(target) : this.byClass.has(target);
  }
}

export const defaultRecords = new RecordRegistry();

export function registerRecord(
  target: RecordConstructor | string,
  fields: readonly RecordFieldSpec[],
  construct?: (values: Record<string, unknown>) => unknown
): void {
  defaultRecords.register(target, fields, construct);
}

export function isDescribable(value: unknown): value is DescribableClass {
  return typeof value === "function" && "describe" in value && typeof value.describe === "function";
}

function typeLabel(type: unknown): string {
  if (typeof type === "string") return type;
  if (typeof type === "function") return type.name || "anonymous class";
  if (typeof type === "object" && type !== null && "kind" in type) return `descriptor(${String(type.kind)})`;
  return String(type);
}

export class TypeResolver {
  private readonly visiting = new Set<unknown>();

  constructor(private readonly records: RecordRegistry = defaultRecords) {}

  resolve(type: TypeLike): TypeDescriptor {
    if (typeof type === "string") {
      return resolveTypeText(type, (name) => this.resolveRegistered(name));
    }
    if (type === String) return t.string();
    if (type === Number) return t.number();
    if (type === Boolean) return t.boolean();
    if (typeof type === "function") {
      return this.resolveClass(type);
    }
    return this.validate(type, typeLabel(type));
  }

  /**
   * Descriptor for a record registered under `name`, if any
   */
  resolveRegistered(name: string): TypeDescriptor | undefined {
    const registration = this.records.forName(name);
    if (!registration) {
      return undefined;
    }
    return this.guarded(name, () => recordOf(name, this.resolveFields(name, registration.fields), registration));
  }

  private resolveClass(target: RecordConstructor): RecordDescriptor {
    const name = typeLabel(target);
    return this.guarded(target, () => {
      const registration = this.records.forClass(target);
      if (registration) {
        return recordOf(name, this.resolveFields(name, registration.fields), {
          target,
          construct: registration.construct ?? ((values) => populate(target, values)),
        });
      }
      if (isDescribable(target)) {
        const specs: unknown = target.describe();
        if (!Array.isArray(specs)) {
          throw new UnsupportedTypeError(name, "describe() must return a field list");
        }
        const fromFields = target.fromFields;
        return recordOf(name, this.resolveFields(name, specs), {
          target,
          construct: fromFields ? (values) => fromFields.call(target, values) : (values) => populate(target, values),
        });
      }
      throw new UnsupportedTypeError(name, "class is neither describable nor registered");
    });
  }

  private resolveFields(recordName: string, specs: readonly unknown[]): RecordField[] {
    const seen = new Set<string>();
    return specs.map((spec) => {
      if (!isFieldSpec(spec)) {
        throw new UnsupportedTypeError(recordName, "field specs need a name and a type");
      }
      if (seen.has(spec.name)) {
        throw new UnsupportedTypeError(recordName, `duplicate field ${spec.name}`);
      }
      seen.add(spec.name);
      return { name: spec.name, type: this.resolve(spec.type), required: spec.required ?? true };
    });
  }

  private guarded<T>(key: unknown, build: () => T): T {
    if (this.visiting.has(key)) {
      throw new UnsupportedTypeError(typeLabel(key), "recursive types are not supported");
    }
    this.visiting.add(key);
    try {
      return build();
    } finally {
      this.visiting.delete(key);
    }
  }

  /**
   * Descriptors supplied directly may come from untyped code; check every node
   */
  private validate(descriptor: TypeDescriptor, label: string): TypeDescriptor {
    switch (descriptor.kind) {
      case "primitive":
        if (!["string", "number", "integer"].includes(descriptor.primitive)) {
          throw new UnsupportedTypeError(label, `unknown primitive ${String(descriptor.primitive)}`);
        }
        return descriptor;
      case "boolean":
        return descriptor;
      case "sequence":
      case "set":
        this.validate(descriptor.element, label);
        return descriptor;
      case "tuple":
        descriptor.elements.forEach((element) => this.validate(element, label));
        return descriptor;
      case "mapping":
        if (descriptor.key.kind !== "primitive") {
          throw new UnsupportedTypeError(label, "mapping keys must be primitive");
        }
        this.validate(descriptor.value, label);
        return descriptor;
      case "record":
        descriptor.fields.forEach((field) => this.validate(field.type, `${label}.${field.name}`));
        return descriptor;
      default:
        return unsupported(descriptor, label);
    }
  }
}

function unsupported(descriptor: never, label: string): never {
  throw new UnsupportedTypeError(label, `unknown descriptor kind ${typeLabel(descriptor)}`);
}

function isFieldSpec(value: unknown): value is RecordFieldSpec {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "type" in value &&
    value.type !== undefined
  );
}

/**
 * Instance of `target` carrying `values`, without running its constructor
 */
function populate(target: RecordConstructor, values: Record<string, unknown>): object {
  const instance: object = Object.create(target.prototype);
  return Object.assign(instance, values);
}

export function resolve(type: TypeLike, records: RecordRegistry = defaultRecords): TypeDescriptor {
  return new TypeResolver(records).resolve(type);
}

/**
 * Typed descriptor for a describable or registered class
 */
export function descriptorFor<T extends object>(
  target: abstract new (...args: never[]) => T,
  records: RecordRegistry = defaultRecords
): Descriptor<T> {
  return new TypeResolver(records).resolve(target);
}
