import type { MessageFixture } from "../canonical";
import type { KindDescriptor, ScalarValue } from "../domain";
import { UnsupportedFieldKindError } from "../errors";
import { toBase64, tsArrayLiteral } from "../format";
import { isMessageValue } from "../message";
import type { FieldValue, MessageValue } from "../message";
import { isPackable, messageClosure, scalarDescriptor } from "../schema";
import type { FieldSpec, MessageSpec } from "../schema";
import { WireType } from "../types";
import { Writer } from "../writer";
import { readExpression, wireTypeName, writeStatement } from "./scalar";
import { SourceBuilder, artifactHeader, writeBase64Helpers, writeImports } from "./source";

/**
 * Number of leading fixtures the unknown-field and last-occurrence tests
 * are derived from.
 */
const DERIVED_FIXTURES = 6;

export interface DerivedFixture {
  bytes: Uint8Array;
  /** Index of the fixture the bytes extend */
  index: number;
}

export interface LastWinsFixtures {
  field: FieldSpec;
  descriptor: KindDescriptor;
  value: ScalarValue;
  fixtures: DerivedFixture[];
}

export interface MessageTable {
  tier: string;
  message: MessageSpec;
  fixtures: MessageFixture[];
}

function concat(head: Uint8Array, tail: Uint8Array): Uint8Array {
  const out = new Uint8Array(head.length + tail.length);
  out.set(head, 0);
  out.set(tail, head.length);
  return out;
}

/**
 * Fixtures with one field of every wire type appended, numbered just past
 * the message's highest field number.
 */
export function unknownFieldFixtures(message: MessageSpec, fixtures: MessageFixture[]): DerivedFixture[] {
  const base = Math.max(...message.fields.map((f) => f.number));
  const suffix = new Writer();
  suffix.writeTag(base + 1, WireType.Varint);
  suffix.writeVarint(150);
  suffix.writeTag(base + 2, WireType.Fixed64);
  suffix.writeFixed64(0x0102030405060708n);
  suffix.writeTag(base + 3, WireType.Bytes);
  suffix.writeLengthPrefixedBytes(new Uint8Array([0x01, 0x02, 0x03]));
  suffix.writeTag(base + 4, WireType.Fixed32);
  suffix.writeFixed32(7);
  const tail = suffix.bytes();
  return fixtures.slice(0, DERIVED_FIXTURES).map((fixture, index) => ({ bytes: concat(fixture.bytes, tail), index }));
}

/**
 * Fixtures with a second occurrence of the first singular scalar field
 * appended. The value is the first non-default one found among the
 * fixtures; undefined when the message has no such field or value.
 */
export function lastWinsFixtures(message: MessageSpec, fixtures: MessageFixture[]): LastWinsFixtures | undefined {
  const field = message.fields.find((f) => f.cardinality !== "repeated" && f.type.kind !== "message");
  if (field === undefined || field.type.kind === "message") {
    return undefined;
  }
  const descriptor = scalarDescriptor(field.type);
  const candidate = fixtures
    .map((fixture) => fixture.expected[field.property])
    .find((value) => value !== undefined && descriptor.is(value) && !descriptor.isDefault(value));
  if (candidate === undefined || !descriptor.is(candidate)) {
    return undefined;
  }
  const suffix = new Writer();
  suffix.writeTag(field.number, descriptor.wireType);
  descriptor.writeValue(suffix, candidate);
  const tail = suffix.bytes();
  return {
    field,
    descriptor,
    value: candidate,
    fixtures: fixtures.slice(0, DERIVED_FIXTURES).map((fixture, index) => ({ bytes: concat(fixture.bytes, tail), index })),
  };
}

function elementType(spec: FieldSpec): string {
  return spec.type.kind === "message" ? spec.type.message.tsName : scalarDescriptor(spec.type).tsType;
}

function propertyType(spec: FieldSpec): string {
  const element = elementType(spec);
  if (spec.cardinality === "repeated") {
    return `${element}[]`;
  }
  return spec.cardinality === "explicit" || spec.type.kind === "message" ? `${element} | undefined` : element;
}

function initialLiteral(spec: FieldSpec): string {
  if (spec.cardinality === "repeated") {
    return "[]";
  }
  if (spec.cardinality === "explicit" || spec.type.kind === "message") {
    return "undefined";
  }
  const descriptor = scalarDescriptor(spec.type);
  return descriptor.literal(descriptor.zero);
}

function elementLiteral(owner: MessageSpec, spec: FieldSpec, value: FieldValue): string {
  if (value === undefined) {
    return "undefined";
  }
  const type = spec.type;
  if (type.kind === "message") {
    if (!isMessageValue(value)) {
      throw new UnsupportedFieldKindError("message", { operation: "emit.literal", field: `${owner.name}.${spec.name}` });
    }
    return renderMessageLiteral(type.message, value);
  }
  const descriptor = scalarDescriptor(type);
  if (!descriptor.is(value)) {
    throw new UnsupportedFieldKindError(descriptor.kind, {
      operation: "emit.literal",
      field: `${owner.name}.${spec.name}`,
      details: { value: String(value) },
    });
  }
  return descriptor.literal(value);
}

/**
 * A message value as a TypeScript object literal, every property listed.
 */
export function renderMessageLiteral(spec: MessageSpec, value: MessageValue): string {
  const parts = spec.fields.map((f) => {
    const current = value[f.property];
    const literal =
      f.cardinality === "repeated" && Array.isArray(current)
        ? tsArrayLiteral(current.map((element) => elementLiteral(spec, f, element)))
        : elementLiteral(spec, f, current);
    return `${f.property}: ${literal}`;
  });
  return `{ ${parts.join(", ")} }`;
}

function writeInterface(out: SourceBuilder, spec: MessageSpec): void {
  out.block(`interface ${spec.tsName} {`, () => {
    for (const f of spec.fields) {
      out.line(`${f.property}: ${propertyType(f)};`);
    }
  });
}

function writeDecoder(out: SourceBuilder, spec: MessageSpec): void {
  out.block(`function decode${spec.tsName}(reader: Reader): ${spec.tsName} {`, () => {
    out.block(`const message: ${spec.tsName} = {`, () => {
      for (const f of spec.fields) {
        out.line(`${f.property}: ${initialLiteral(f)},`);
      }
    }, "};");
    out.block("while (reader.hasMore) {", () => {
      out.line("const tag = reader.readTag();");
      out.block("switch (tag.fieldNumber) {", () => {
        for (const f of spec.fields) {
          out.block(`case ${f.number}: {`, () => writeFieldDecode(out, f));
        }
        out.line("default:");
        out.line("  reader.skipField(tag.wireType);");
      });
    });
    out.line("return message;");
  });
}

function writeFieldDecode(out: SourceBuilder, spec: FieldSpec): void {
  const target = `message.${spec.property}`;
  const type = spec.type;
  if (type.kind === "message") {
    out.line(`expectWireType(tag.wireType, WireType.Bytes, ${spec.number});`);
    const read = `decode${type.message.tsName}(reader.subReader(reader.readVarint()))`;
    out.line(spec.cardinality === "repeated" ? `${target}.push(${read});` : `${target} = ${read};`);
    out.line("break;");
    return;
  }

  const descriptor = scalarDescriptor(type);
  const read = descriptor.kind === "bytes" ? `${readExpression(descriptor)}.slice()` : readExpression(descriptor);
  if (spec.cardinality === "repeated" && isPackable(type)) {
    out.block("if (tag.wireType === WireType.Bytes) {", () => {
      out.line(`${target}.push(...reader.readPacked((packed) => ${readExpression(descriptor, "packed")}));`);
    }, "} else {");
    out.indented(() => {
      out.line(`expectWireType(tag.wireType, ${wireTypeName(descriptor.wireType)}, ${spec.number});`);
      out.line(`${target}.push(${read});`);
    });
    out.line("}");
    out.line("break;");
    return;
  }
  out.line(`expectWireType(tag.wireType, ${wireTypeName(descriptor.wireType)}, ${spec.number});`);
  out.line(spec.cardinality === "repeated" ? `${target}.push(${read});` : `${target} = ${read};`);
  out.line("break;");
}

function writeEncoder(out: SourceBuilder, spec: MessageSpec): void {
  out.block(`function encode${spec.tsName}(writer: Writer, message: ${spec.tsName}): void {`, () => {
    for (const f of spec.fields) {
      writeFieldEncode(out, f);
    }
  });
}

function writeFieldEncode(out: SourceBuilder, spec: FieldSpec): void {
  const source = `message.${spec.property}`;
  const type = spec.type;

  if (type.kind === "message") {
    const encodeNested = (value: string): void => {
      out.line("const nested = new Writer();");
      out.line(`encode${type.message.tsName}(nested, ${value});`);
      out.line(`writer.writeTag(${spec.number}, WireType.Bytes);`);
      out.line("writer.writeLengthPrefixedBytes(nested.bytes());");
    };
    if (spec.cardinality === "repeated") {
      out.block(`for (const element of ${source}) {`, () => encodeNested("element"));
    } else {
      out.block(`if (${source} !== undefined) {`, () => encodeNested(source));
    }
    return;
  }

  const descriptor = scalarDescriptor(type);
  const tag = `writer.writeTag(${spec.number}, ${wireTypeName(descriptor.wireType)});`;
  if (spec.cardinality === "repeated" && spec.packed) {
    out.block(`if (${source}.length > 0) {`, () => {
      out.line("const packed = new Writer();");
      out.block(`for (const element of ${source}) {`, () => {
        out.line(writeStatement(descriptor, "element", "packed"));
      });
      out.line(`writer.writeTag(${spec.number}, WireType.Bytes);`);
      out.line("writer.writeLengthPrefixedBytes(packed.bytes());");
    });
    return;
  }
  if (spec.cardinality === "repeated") {
    out.block(`for (const element of ${source}) {`, () => {
      out.line(tag);
      out.line(writeStatement(descriptor, "element"));
    });
    return;
  }
  const condition = spec.cardinality === "explicit" ? `${source} !== undefined` : descriptor.presentExpr(source);
  out.block(`if (${condition}) {`, () => {
    out.line(tag);
    out.line(writeStatement(descriptor, source));
  });
}

function writeDerivedTable(out: SourceBuilder, name: string, fixtures: DerivedFixture[]): void {
  out.block(`const ${name}: Array<[string, number]> = [`, () => {
    for (const fixture of fixtures) {
      out.line(`[${JSON.stringify(toBase64(fixture.bytes))}, ${fixture.index}],`);
    }
  }, "];");
}

/**
 * Render a composite tier: per message type an interface, a decoder and
 * an encoder, then the fixture table and its assertions.
 */
export function renderMessageArtifact(table: MessageTable, codecModule: string): string {
  const { tier, message, fixtures } = table;
  const closure = messageClosure(message);
  const root = message.tsName;
  const out = new SourceBuilder();
  for (const line of artifactHeader(tier)) {
    out.line(line);
  }

  const imports = ["Reader", "WireType", "Writer"];
  if (closure.some((spec) => spec.fields.some((f) => f.type.kind === "enum"))) {
    imports.push("Enum");
  }
  writeImports(out, codecModule, imports);
  out.line();
  writeBase64Helpers(out);
  out.line();
  out.block("function expectWireType(actual: WireType, expected: WireType, fieldNumber: number): void {", () => {
    out.block("if (actual !== expected) {", () => {
      out.line("throw new Error(`field ${fieldNumber}: wire type ${actual}, expected ${expected}`);");
    });
  });

  for (const spec of closure) {
    out.line();
    writeInterface(out, spec);
    out.line();
    writeDecoder(out, spec);
    out.line();
    writeEncoder(out, spec);
  }

  out.line();
  out.block(`function decode(b64: string): ${root} {`, () => {
    out.line(`return decode${root}(new Reader(fromBase64(b64)));`);
  });
  out.line();
  out.block(`function encode(message: ${root}): string {`, () => {
    out.line("const writer = new Writer();");
    out.line(`encode${root}(writer, message);`);
    out.line("return toBase64(writer.bytes());");
  });
  out.line();

  out.block(`const cases: Array<{ label: string; b64: string; expected: ${root} }> = [`, () => {
    for (const fixture of fixtures) {
      out.line(
        `{ label: ${JSON.stringify(fixture.label)}, b64: ${JSON.stringify(toBase64(fixture.bytes))}, expected: ${renderMessageLiteral(message, fixture.expected)} },`
      );
    }
  }, "];");
  out.line();
  writeDerivedTable(out, "unknownFieldCases", unknownFieldFixtures(message, fixtures));

  const lastWins = lastWinsFixtures(message, fixtures);
  if (lastWins !== undefined) {
    out.line();
    writeDerivedTable(out, "lastWinsCases", lastWins.fixtures);
    out.line();
    out.line(`const lastWinsValue = ${lastWins.descriptor.literal(lastWins.value)};`);
  }
  out.line();

  out.block(`describe(${JSON.stringify(message.name)}, () => {`, () => {
    out.block('it("decodes every fixture", () => {', () => {
      out.block("for (const { label, b64, expected } of cases) {", () => {
        out.line("expect(decode(b64), label).toEqual(expected);");
      });
    }, "});");
    out.line();
    out.block('it("re-encodes every fixture to its bytes", () => {', () => {
      out.block("for (const { label, b64, expected } of cases) {", () => {
        out.line("expect(encode(expected), label).toBe(b64);");
      });
    }, "});");
    out.line();
    out.block('it("skips fields outside the schema", () => {', () => {
      out.block("for (const [b64, index] of unknownFieldCases) {", () => {
        out.line("expect(decode(b64), cases[index].label).toEqual(cases[index].expected);");
      });
    }, "});");
    if (lastWins !== undefined) {
      const property = lastWins.field.property;
      out.line();
      out.block(`it("keeps the last occurrence of ${lastWins.field.name}", () => {`, () => {
        out.block("for (const [b64, index] of lastWinsCases) {", () => {
          out.line(`expect(decode(b64), cases[index].label).toEqual({ ...cases[index].expected, ${property}: lastWinsValue });`);
        });
      }, "});");
    }
  }, "});");
  return out.toString();
}
