/**
 * TypeScript type expressions -> TypeDescriptor
 * Parses type text (or type nodes from a source file) with ts-morph and walks the
 * syntax tree. Types are resolved syntactically, so only declarations in the same
 * source file and registered record names are visible to references.
 */

import { InterfaceDeclaration, Node, Project, SourceFile, SyntaxKind, TypeLiteralNode, TypeNode } from "ts-morph";
import { UnsupportedTypeError } from "./errors";
import { mappingOf, recordOf, sequenceOf, setOf, tupleOf } from "./descriptors";
import { RecordField, TypeDescriptor } from "./types";

export type NamedRecordLookup = (name: string) => TypeDescriptor | undefined;

const PRIMITIVE_KEYWORDS: ReadonlyMap<SyntaxKind, TypeDescriptor> = new Map<SyntaxKind, TypeDescriptor>([
  [SyntaxKind.StringKeyword, Object.freeze({ kind: "primitive", primitive: "string" })],
  [SyntaxKind.NumberKeyword, Object.freeze({ kind: "primitive", primitive: "number" })],
  [SyntaxKind.BooleanKeyword, Object.freeze({ kind: "boolean" })],
]);

let scratch: Project | undefined;
let scratchCount = 0;

/**
 * In-memory project used for parsing snippets; never touches the file system
 */
export function scratchProject(): Project {
  if (!scratch) {
    scratch = new Project({ useInMemoryFileSystem: true, compilerOptions: { strict: true } });
  }
  return scratch;
}

/**
 * Parse `text` into a throwaway source file, run `use`, then drop the file.
 * Returns undefined when the text has syntax errors.
 */
export function withScratchFile<T>(text: string, use: (file: SourceFile) => T): T | undefined {
  const project = scratchProject();
  scratchCount += 1;
  const file = project.createSourceFile(`__scratch_${scratchCount}.ts`, text, { overwrite: true });
  try {
    if (project.getProgram().getSyntacticDiagnostics(file).length > 0) {
      return undefined;
    }
    return use(file);
  } finally {
    project.removeSourceFile(file);
  }
}

export function resolveTypeText(typeText: string, lookup: NamedRecordLookup = () => undefined): TypeDescriptor {
  const resolved = withScratchFile(`type __Target = ${typeText};`, (file) => {
    const typeNode = file.getTypeAlias("__Target")?.getTypeNode();
    if (!typeNode) {
      throw new UnsupportedTypeError(typeText, "not a type expression");
    }
    return new TypeNodeResolver(file, lookup).resolve(typeNode);
  });
  if (!resolved) {
    throw new UnsupportedTypeError(typeText, "not a valid type expression");
  }
  return resolved;
}

/**
 * Walks type nodes, resolving references against declarations in `scope`
 */
export class TypeNodeResolver {
  private readonly visiting = new Set<string>();

  constructor(
    private readonly scope: SourceFile,
    private readonly lookup: NamedRecordLookup
  ) {}

  resolve(node: TypeNode): TypeDescriptor {
    const keyword = PRIMITIVE_KEYWORDS.get(node.getKind());
    if (keyword) {
      return keyword;
    }

    if (Node.isParenthesizedTypeNode(node)) {
      return this.resolve(node.getTypeNode());
    }

    if (Node.isTypeOperatorTypeNode(node) && node.getOperator() === SyntaxKind.ReadonlyKeyword) {
      return this.resolve(node.getTypeNode());
    }

    if (Node.isArrayTypeNode(node)) {
      return sequenceOf(this.resolve(node.getElementTypeNode()));
    }

    if (Node.isTupleTypeNode(node)) {
      return tupleOf(node.getElements().map((element) => this.resolveTupleElement(element)));
    }

    if (Node.isTypeLiteral(node)) {
      return this.resolveMembers("anonymous", node, node.getText());
    }

    if (Node.isTypeReference(node)) {
      return this.resolveReference(node.getTypeName().getText(), node.getTypeArguments(), node.getText());
    }

    throw new UnsupportedTypeError(node.getText(), `${node.getKindName()} has no descriptor`);
  }

  private resolveTupleElement(element: TypeNode): TypeDescriptor {
    if (Node.isNamedTupleMember(element)) {
      if (element.compilerNode.questionToken || element.compilerNode.dotDotDotToken) {
        throw new UnsupportedTypeError(element.getText(), "tuples must have a fixed arity");
      }
      return this.resolve(element.getTypeNode());
    }
    if (element.getKind() === SyntaxKind.OptionalType || element.getKind() === SyntaxKind.RestType) {
      throw new UnsupportedTypeError(element.getText(), "tuples must have a fixed arity");
    }
    return this.resolve(element);
  }

  private resolveReference(name: string, args: TypeNode[], text: string): TypeDescriptor {
    const arity = (expected: number): void => {
      if (args.length !== expected) {
        throw new UnsupportedTypeError(text, `${name} takes ${expected} type argument(s)`);
      }
    };

    switch (name) {
      case "Array":
      case "ReadonlyArray":
        arity(1);
        return sequenceOf(this.resolve(args[0]));
      case "Set":
      case "ReadonlySet":
        arity(1);
        return setOf(this.resolve(args[0]));
      case "Record":
        arity(2);
        return this.resolveMapping(args[0], args[1], text);
      case "Promise":
        arity(1);
        return this.resolve(args[0]);
      case "Integer":
        arity(0);
        return Object.freeze({ kind: "primitive", primitive: "integer" });
    }

    if (args.length > 0) {
      throw new UnsupportedTypeError(text, "generic declarations are not supported");
    }
    if (this.visiting.has(name)) {
      throw new UnsupportedTypeError(text, "recursive types are not supported");
    }

    this.visiting.add(name);
    try {
      const iface = this.scope.getInterface(name);
      if (iface) {
        if (iface.getTypeParameters().length > 0 || iface.getExtends().length > 0) {
          throw new UnsupportedTypeError(text, "interfaces with type parameters or heritage are not supported");
        }
        return this.resolveMembers(name, iface, text);
      }

      const alias = this.scope.getTypeAlias(name);
      const aliased = alias?.getTypeNode();
      if (alias && aliased) {
        if (alias.getTypeParameters().length > 0) {
          throw new UnsupportedTypeError(text, "generic declarations are not supported");
        }
        const resolved = this.resolve(aliased);
        return resolved.kind === "record" && resolved.name === "anonymous"
          ? recordOf(name, resolved.fields)
          : resolved;
      }
    } finally {
      this.visiting.delete(name);
    }

    const registered = this.lookup(name);
    if (registered) {
      return registered;
    }
    throw new UnsupportedTypeError(text, `cannot find a declaration or registered record named ${name}`);
  }

  private resolveMapping(keyNode: TypeNode, valueNode: TypeNode, text: string): TypeDescriptor {
    const key = this.resolve(keyNode);
    if (key.kind !== "primitive") {
      throw new UnsupportedTypeError(text, "mapping keys must be string or number");
    }
    return mappingOf(key, this.resolve(valueNode));
  }

  /**
   * Type literals and interfaces: either only property signatures (a record)
   * or a single index signature (a mapping)
   */
  private resolveMembers(name: string, node: TypeLiteralNode | InterfaceDeclaration, text: string): TypeDescriptor {
    const fields: RecordField[] = [];
    let mapping: TypeDescriptor | undefined;

    for (const member of node.getMembers()) {
      if (Node.isIndexSignatureDeclaration(member)) {
        const valueNode = member.getReturnTypeNode();
        if (mapping || !valueNode) {
          throw new UnsupportedTypeError(text, "only one typed index signature is supported");
        }
        mapping = this.resolveMapping(member.getKeyTypeNode(), valueNode, text);
        continue;
      }
      if (Node.isPropertySignature(member)) {
        const typeNode = member.getTypeNode();
        if (!typeNode) {
          throw new UnsupportedTypeError(text, `property ${member.getName()} has no type annotation`);
        }
        fields.push({
          name: member.getName().replace(/^["']|["']$/g, ""),
          type: this.resolve(typeNode),
          required: !member.hasQuestionToken(),
        });
        continue;
      }
      if (Node.isMethodSignature(member) || Node.isCallSignatureDeclaration(member)) {
        throw new UnsupportedTypeError(text, "records cannot declare methods");
      }
    }

    if (mapping) {
      if (fields.length > 0) {
        throw new UnsupportedTypeError(text, "mix of properties and index signature");
      }
      return mapping;
    }
    return recordOf(name, fields);
  }
}
