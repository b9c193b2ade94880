/**
 * Prompt Builder
 * Renders the statement and function-call prompts. Pure: the same request always
 * renders to the same text.
 */

import { ArgumentBinding, FunctionRequest, ParameterSpec, TypeDescriptor } from "./types";
import { stableStringify } from "./utils";

export const RESPONSE_PREAMBLE = "Return only the value, with no explanation, commentary, or extra text.";

export const STATEMENT_INSTRUCTION = "Evaluate the statement below and respond with either true or false.";

export const FUNCTION_INSTRUCTION = [
  "You will be given a function signature, a docstring describing what the function is intended to do,",
  "the concrete arguments passed to the function, and the shape of the declared return value.",
  "Interpret the docstring, use the arguments to work out what the function would logically return,",
  "and make sure the value strictly matches the declared return shape in both structure and data type.",
  "Serialize arrays, objects, numbers and booleans as JSON.",
].join(" ");

/**
 * Human-readable shape of a descriptor, e.g. `array of {"x": integer, "y": integer}`
 */
export function describeShape(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case "boolean":
      return "boolean";
    case "primitive":
      return descriptor.primitive;
    case "sequence":
      return `array of ${describeShape(descriptor.element)}`;
    case "set":
      return `array of unique ${describeShape(descriptor.element)}`;
    case "tuple":
      return `[${descriptor.elements.map(describeShape).join(", ")}]`;
    case "mapping":
      return `object with ${descriptor.key.primitive} keys and ${describeShape(descriptor.value)} values`;
    case "record": {
      const fields = descriptor.fields.map(
        (field) => `"${field.name}"${field.required ? "" : "?"}: ${describeShape(field.type)}`
      );
      return `{${fields.join(", ")}}`;
    }
  }
}

/**
 * e.g. `addNumbers(a: integer, b: integer) -> integer`
 */
export function renderSignature(name: string, params: readonly ParameterSpec[], returns: TypeDescriptor): string {
  const rendered = params.map((param) => {
    const prefix = param.rest ? "..." : "";
    return param.type ? `${prefix}${param.name}: ${describeShape(param.type)}` : `${prefix}${param.name}`;
  });
  return `${name}(${rendered.join(", ")}) -> ${describeShape(returns)}`;
}

export function renderArguments(args: readonly ArgumentBinding[]): string {
  if (args.length === 0) {
    return "(none)";
  }
  return args.map((arg) => `- ${arg.name} = ${renderValue(arg.value)}`).join("\n");
}

export function renderValue(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }
  return stableStringify(value);
}

export function buildStatementPrompt(statement: string): string {
  return [STATEMENT_INSTRUCTION, RESPONSE_PREAMBLE, `Statement: ${statement}`].join("\n");
}

/**
 * A caller-written prompt. Without a return shape the text goes out as given.
 */
export function buildFreeformPrompt(text: string, returns?: TypeDescriptor): string {
  if (!returns) {
    return text;
  }
  return [text, RESPONSE_PREAMBLE, `Expected return shape: ${describeShape(returns)}`].join("\n");
}

export function buildFunctionPrompt(request: FunctionRequest): string {
  const sections: string[] = [
    FUNCTION_INSTRUCTION,
    RESPONSE_PREAMBLE,
    `Function signature: ${renderSignature(request.name, request.signature, request.returns)}`,
    request.docstring ? `Docstring:\n${request.docstring}` : "Docstring: (none)",
    `Arguments:\n${renderArguments(request.arguments)}`,
    `Expected return shape: ${describeShape(request.returns)}`,
  ];

  return sections.join("\n");
}
