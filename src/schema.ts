import { describeKind } from "./domain";
import type { KindDescriptor, ScalarKind } from "./domain";
import { camelCase } from "./format";

/**
 * Enum type with its named numbers, in declaration order.
 */
export interface EnumSpec {
  name: string;
  values: ReadonlyArray<readonly [symbol: string, number: number]>;
}

export type ScalarFieldType =
  | { readonly kind: "scalar"; readonly scalar: Exclude<ScalarKind, "enum"> }
  | { readonly kind: "enum"; readonly enumType: EnumSpec };

export type FieldType = ScalarFieldType | { readonly kind: "message"; readonly message: MessageSpec };

/**
 * implicit: zero value omitted on encode, absent decodes to zero.
 * explicit: emitted whenever set, absent decodes to undefined (proto3
 * `optional`, oneof members).
 * repeated: zero or more occurrences.
 */
export type Cardinality = "implicit" | "explicit" | "repeated";

export interface FieldSpec {
  /** Schema name, used by the oracle's text grammar */
  name: string;
  /** Property name in emitted code */
  property: string;
  number: number;
  type: FieldType;
  cardinality: Cardinality;
  packed: boolean;
  oneof?: string;
}

export interface MessageSpec {
  /** Fully-qualified message type name */
  name: string;
  /** Type name in emitted code */
  tsName: string;
  /** Schema file, relative to the schema directory */
  schemaFile: string;
  /** Fields in canonical emission order */
  fields: FieldSpec[];
}

interface FieldOptions {
  cardinality?: Cardinality;
  packed?: boolean;
  oneof?: string;
}

export function field(name: string, number: number, type: FieldType, options: FieldOptions = {}): FieldSpec {
  return {
    name,
    property: camelCase(name),
    number,
    type,
    cardinality: options.cardinality ?? "implicit",
    packed: options.packed ?? false,
    oneof: options.oneof,
  };
}

export function scalar(kind: Exclude<ScalarKind, "enum">): FieldType {
  return { kind: "scalar", scalar: kind };
}

export function enumOf(enumType: EnumSpec): FieldType {
  return { kind: "enum", enumType };
}

export function messageOf(message: MessageSpec): FieldType {
  return { kind: "message", message };
}

export function message(name: string, tsName: string, schemaFile: string, fields: FieldSpec[]): MessageSpec {
  return {
    name,
    tsName,
    schemaFile,
    fields: [...fields].sort((a, b) => a.number - b.number),
  };
}

/**
 * Scalar kind carried by a non-message field.
 */
export function scalarKindOf(type: FieldType): ScalarKind | undefined {
  switch (type.kind) {
    case "scalar":
      return type.scalar;
    case "enum":
      return "enum";
    case "message":
      return undefined;
  }
}

export function scalarDescriptor(type: ScalarFieldType): KindDescriptor {
  return describeKind(type.kind === "enum" ? "enum" : type.scalar);
}

/**
 * Whether a repeated field of this type may be packed.
 */
export function isPackable(type: FieldType): boolean {
  const kind = scalarKindOf(type);
  return kind !== undefined && kind !== "string" && kind !== "bytes";
}

/**
 * Nested message types reachable from a message, dependencies first,
 * each once.
 */
export function messageClosure(root: MessageSpec): MessageSpec[] {
  const ordered: MessageSpec[] = [];
  const seen = new Set<MessageSpec>();
  const visit = (spec: MessageSpec): void => {
    if (seen.has(spec)) {
      return;
    }
    seen.add(spec);
    for (const f of spec.fields) {
      if (f.type.kind === "message") {
        visit(f.type.message);
      }
    }
    ordered.push(spec);
  };
  visit(root);
  return ordered;
}

export function enumNumber(enumType: EnumSpec, symbol: string): number | undefined {
  return enumType.values.find(([name]) => name === symbol)?.[1];
}
