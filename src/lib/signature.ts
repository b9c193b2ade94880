/**
 * Function signatures for wrapped functions
 *
 * Types are erased at runtime, so the declared return type of a wrapped
 * function comes from one of:
 *   - an explicit signature passed to evaluate()
 *   - a signature registered with describeFunction()
 *   - a TypeScript declaration read with signatureFromSource()
 * Parameter names and a leading body comment are recovered from the
 * function's own source text when the signature does not list them.
 */

import { readFileSync } from "fs";
import {
  ArrowFunction,
  FunctionDeclaration,
  FunctionExpression,
  MethodDeclaration,
  Node,
  ParameterDeclaration,
  SourceFile,
} from "ts-morph";
import { InputContractError, UnsupportedTypeError } from "./errors";
import { defaultRecords, RecordRegistry, TypeResolver } from "./resolver";
import { TypeNodeResolver, withScratchFile } from "./type-text";
import { ArgumentBinding, ParameterSpec, TypeDescriptor, TypeLike } from "./types";

export type ParameterInput = string | { name: string; type?: TypeLike; rest?: boolean };

export interface SignatureInput {
  name?: string;
  docstring?: string;
  params?: readonly ParameterInput[];
  returns?: TypeLike;
}

export interface ResolvedSignature {
  readonly name: string;
  readonly docstring: string;
  readonly params: readonly ParameterSpec[];
  readonly returns: TypeDescriptor;
}

type AnyFunction = (...args: never[]) => unknown;

type FunctionLike = ArrowFunction | FunctionExpression | MethodDeclaration | FunctionDeclaration;

const registered = new WeakMap<object, SignatureInput>();

/**
 * Attach a signature to `fn` for later evaluate() calls. Returns `fn`.
 */
export function describeFunction<F extends AnyFunction>(fn: F, signature: SignatureInput): F {
  registered.set(fn, { ...signature });
  return fn;
}

export function registeredSignature(fn: object): SignatureInput | undefined {
  return registered.get(fn);
}

function isFunctionLike(node: Node): node is FunctionLike {
  return (
    Node.isArrowFunction(node) ||
    Node.isFunctionExpression(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isFunctionDeclaration(node)
  );
}

function parameterSpec(param: ParameterDeclaration, index: number, type?: TypeDescriptor): ParameterSpec {
  const nameNode = param.getNameNode();
  const name = Node.isIdentifier(nameNode) ? nameNode.getText() : `arg${index}`;
  return {
    name,
    ...(type ? { type } : {}),
    ...(param.isRestParameter() ? { rest: true } : {}),
  };
}

/**
 * Text of a comment opening the function body, without comment markers
 */
function leadingBodyComment(node: FunctionLike): string | undefined {
  const body = node.getBody();
  if (!body || !Node.isBlock(body)) {
    return undefined;
  }
  const match = /^\{\s*(?:\/\*+([\s\S]*?)\*\/|((?:\/\/[^\n]*(?:\n\s*|$))+))/.exec(body.getText());
  if (!match) {
    return undefined;
  }
  const raw = match[1] ?? match[2] ?? "";
  const lines = raw
    .split("\n")
    .map((line) => line.replace(/^\s*(\*|\/\/)?\s?/, "").trimEnd())
    .filter((line, index, all) => line !== "" || (index > 0 && index < all.length - 1));
  const text = lines.join("\n").trim();
  return text === "" ? undefined : text;
}

export interface FunctionSourceInfo {
  params: ParameterSpec[];
  docstring?: string;
}

/**
 * Parameter names and leading body comment of a runtime function
 */
export function inspectFunction(fn: object): FunctionSourceInfo {
  const source = Function.prototype.toString.call(fn);
  if (/\{\s*\[native code\]\s*\}\s*$/.test(source)) {
    return { params: [] };
  }

  // Methods only parse inside an object literal
  const wrappers = [`const __fn = (${source});`, `const __obj = { ${source} };`];
  for (const text of wrappers) {
    const info = withScratchFile(text, (file) => {
      const node = file.getFirstDescendant(isFunctionLike);
      if (!node || !isFunctionLike(node)) {
        return undefined;
      }
      return {
        params: node.getParameters().map((param, index) => parameterSpec(param, index)),
        docstring: leadingBodyComment(node),
      };
    });
    if (info) {
      return info;
    }
  }
  return { params: [] };
}

export function parameterNames(fn: AnyFunction): string[] {
  return inspectFunction(fn).params.map((param) => param.name);
}

function findDeclaration(file: SourceFile, name: string): { node: FunctionLike; docs: string[] } | undefined {
  const declaration = file.getFunction(name);
  if (declaration) {
    return { node: declaration, docs: declaration.getJsDocs().map((doc) => doc.getDescription()) };
  }

  const variable = file.getVariableDeclaration(name);
  const initializer = variable?.getInitializer();
  if (variable && initializer && isFunctionLike(initializer)) {
    const docs = variable.getVariableStatement()?.getJsDocs() ?? [];
    return { node: initializer, docs: docs.map((doc) => doc.getDescription()) };
  }
  return undefined;
}

/**
 * Read the declaration of `functionName` from TypeScript source text.
 * Interfaces and type aliases declared in the same text are visible to the
 * parameter and return types.
 */
export function signatureFromSourceText(
  text: string,
  functionName: string,
  records: RecordRegistry = defaultRecords
): SignatureInput {
  const resolver = new TypeResolver(records);
  const signature = withScratchFile(text, (file) => {
    const found = findDeclaration(file, functionName);
    if (!found) {
      throw new InputContractError(`No function named "${functionName}" in source`);
    }

    const types = new TypeNodeResolver(file, (name) => resolver.resolveRegistered(name));
    const returnNode = found.node.getReturnTypeNode();
    if (!returnNode) {
      throw new UnsupportedTypeError(functionName, "declaration has no return type annotation");
    }

    const params = found.node.getParameters().map((param, index) => {
      const typeNode = param.getTypeNode();
      return parameterSpec(param, index, typeNode ? types.resolve(typeNode) : undefined);
    });

    const result: SignatureInput = {
      name: functionName,
      docstring: found.docs.map((doc) => doc.trim()).filter(Boolean).join("\n"),
      params,
      returns: types.resolve(returnNode),
    };
    return result;
  });

  if (!signature) {
    throw new InputContractError(`Source for "${functionName}" has syntax errors`);
  }
  return signature;
}

export function signatureFromSource(
  path: string,
  functionName: string,
  records: RecordRegistry = defaultRecords
): SignatureInput {
  return signatureFromSourceText(readFileSync(path, "utf8"), functionName, records);
}

function normalizeParam(input: ParameterInput, resolver: TypeResolver): ParameterSpec {
  if (typeof input === "string") {
    return { name: input };
  }
  return {
    name: input.name,
    ...(input.type !== undefined ? { type: resolver.resolve(input.type) } : {}),
    ...(input.rest ? { rest: true } : {}),
  };
}

/**
 * Merge a declared signature with what the function's source reveals
 */
export function resolveSignature<A extends unknown[], R>(
  fn: (...args: A) => R,
  explicit: SignatureInput | undefined,
  resolver: TypeResolver
): ResolvedSignature {
  const declared = explicit ?? registeredSignature(fn);
  const name = declared?.name ?? (fn.name || "anonymous");

  if (declared?.returns === undefined) {
    throw new UnsupportedTypeError(
      name,
      "no return type declared; pass a signature, call describeFunction() or use signatureFromSource()"
    );
  }

  const returns = resolver.resolve(declared.returns);
  const inspected = declared.params && declared.docstring !== undefined ? undefined : inspectFunction(fn);
  const params = declared.params
    ? declared.params.map((param) => normalizeParam(param, resolver))
    : (inspected?.params ?? []);

  return Object.freeze({
    name,
    docstring: declared.docstring ?? inspected?.docstring ?? "",
    params: Object.freeze(params),
    returns,
  });
}

/**
 * Pair call arguments with parameter names. A rest parameter collects the
 * remaining arguments; surplus arguments are named by position.
 */
export function bindArguments(params: readonly ParameterSpec[], args: readonly unknown[]): ArgumentBinding[] {
  const bindings: ArgumentBinding[] = [];
  for (let index = 0; index < params.length; index += 1) {
    const param = params[index];
    if (param.rest) {
      bindings.push({ name: param.name, value: args.slice(index) });
      return bindings;
    }
    if (index < args.length) {
      bindings.push({ name: param.name, value: args[index] });
    }
  }
  for (let index = params.length; index < args.length; index += 1) {
    bindings.push({ name: `arg${index}`, value: args[index] });
  }
  return bindings;
}
