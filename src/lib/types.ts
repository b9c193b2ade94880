/**
 * Shared type definitions for reckon
 */

export type PrimitiveKind = "string" | "number" | "integer";

export type RetryMode = "chill" | "eager" | "aggressive";

export const RETRY_MODES: readonly RetryMode[] = ["chill", "eager", "aggressive"];

export type PrimitiveDescriptor = {
  readonly kind: "primitive";
  readonly primitive: PrimitiveKind;
};

export type BooleanDescriptor = {
  readonly kind: "boolean";
};

export type SequenceDescriptor = {
  readonly kind: "sequence";
  readonly element: TypeDescriptor;
};

export type SetDescriptor = {
  readonly kind: "set";
  readonly element: TypeDescriptor;
};

export type TupleDescriptor = {
  readonly kind: "tuple";
  readonly elements: readonly TypeDescriptor[];
};

export type MappingDescriptor = {
  readonly kind: "mapping";
  readonly key: PrimitiveDescriptor;
  readonly value: TypeDescriptor;
};

export type RecordField = {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly required: boolean;
};

export type RecordConstructor = abstract new (...args: never[]) => object;

export type RecordDescriptor = {
  readonly kind: "record";
  readonly name: string;
  readonly fields: readonly RecordField[];
  /** Class whose instances the record produces; absent for plain-object records */
  readonly target?: RecordConstructor;
  readonly construct?: (values: Record<string, unknown>) => unknown;
};

export type TypeDescriptor =
  | PrimitiveDescriptor
  | BooleanDescriptor
  | SequenceDescriptor
  | SetDescriptor
  | TupleDescriptor
  | MappingDescriptor
  | RecordDescriptor;

/**
 * Phantom carrier for the TypeScript type a descriptor produces.
 * The property is never set at runtime.
 */
export type Typed<T> = { readonly __value?: T };

export type Descriptor<T> = TypeDescriptor & Typed<T>;

export type Infer<D> = D extends Typed<infer T> ? T : unknown;

/**
 * Field specification accepted by describable classes and registrations
 */
export type RecordFieldSpec = {
  name: string;
  type: TypeLike;
  required?: boolean;
};

/**
 * The describable capability: any class exposing an ordered, named, typed
 * field list can be used as a structured record type.
 */
export interface Describable<T extends object = object> {
  describe(): readonly RecordFieldSpec[];
  fromFields?(values: Record<string, unknown>): T;
}

export type DescribableClass<T extends object = object> = (abstract new (...args: never[]) => T) &
  Describable<T>;

export type TypeLike =
  | TypeDescriptor
  | StringConstructor
  | NumberConstructor
  | BooleanConstructor
  | RecordConstructor
  | string;

export type RetryConfig = {
  readonly numTries: number;
  readonly mode: RetryMode;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs: number;
};

export type ParameterSpec = {
  readonly name: string;
  readonly type?: TypeDescriptor;
  readonly rest?: boolean;
};

export type ArgumentBinding = {
  readonly name: string;
  readonly value: unknown;
};

export type StatementRequest = {
  readonly kind: "statement";
  readonly text: string;
};

export type FunctionRequest = {
  readonly kind: "function";
  readonly name: string;
  readonly signature: readonly ParameterSpec[];
  readonly docstring: string;
  readonly arguments: readonly ArgumentBinding[];
  readonly returns: TypeDescriptor;
};

export type EvaluationRequest = StatementRequest | FunctionRequest;
