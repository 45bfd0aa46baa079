import type { ScalarFixture } from "../canonical";
import { describeKind } from "../domain";
import type { KindDescriptor, ScalarKind } from "../domain";
import { pascalCase, toBase64 } from "../format";
import { WireType } from "../types";
import { SourceBuilder, artifactHeader, writeBase64Helpers, writeImports } from "./source";

export interface ScalarTable {
  kind: ScalarKind;
  fixtures: ScalarFixture[];
}

function isFloatKind(kind: ScalarKind): kind is "float" | "double" {
  return kind === "float" || kind === "double";
}

/**
 * Expression reading one value of a kind from `reader`.
 */
export function readExpression(descriptor: KindDescriptor, reader = "reader"): string {
  return `${reader}.${descriptor.read}()${descriptor.unwrap ?? ""}`;
}

/**
 * Statement writing `value` of a kind to `writer`.
 */
export function writeStatement(descriptor: KindDescriptor, value: string, writer = "writer"): string {
  const argument = descriptor.wrap ? `new ${descriptor.wrap}(${value})` : value;
  return `${writer}.${descriptor.write}(${argument});`;
}

export function wireTypeName(wireType: WireType): string {
  return `WireType.${WireType[wireType]}`;
}

function bitsLiteral(bits: number | bigint): string {
  return typeof bits === "bigint" ? `0x${bits.toString(16)}n` : `0x${bits.toString(16)}`;
}

function writeFloatHelpers(out: SourceBuilder, kinds: ScalarKind[]): void {
  if (kinds.includes("float")) {
    out.line();
    out.block("function float32Bits(value: number): number {", () => {
      out.line("const view = new DataView(new ArrayBuffer(4));");
      out.line("view.setFloat32(0, value, true);");
      out.line("return view.getUint32(0, true);");
    });
    out.line();
    out.block("function float32FromBits(bits: number): number {", () => {
      out.line("const view = new DataView(new ArrayBuffer(4));");
      out.line("view.setUint32(0, bits, true);");
      out.line("return view.getFloat32(0, true);");
    });
  }
  if (kinds.includes("double")) {
    out.line();
    out.block("function float64Bits(value: number): bigint {", () => {
      out.line("const view = new DataView(new ArrayBuffer(8));");
      out.line("view.setFloat64(0, value, true);");
      out.line("return view.getBigUint64(0, true);");
    });
    out.line();
    out.block("function float64FromBits(bits: bigint): number {", () => {
      out.line("const view = new DataView(new ArrayBuffer(8));");
      out.line("view.setBigUint64(0, bits, true);");
      out.line("return view.getFloat64(0, true);");
    });
  }
}

function writeKind(out: SourceBuilder, table: ScalarTable): void {
  const { kind, fixtures } = table;
  const descriptor = describeKind(kind);
  const name = pascalCase(kind);
  const float = isFloatKind(kind);
  const valueType = float ? (kind === "float" ? "number" : "bigint") : descriptor.tsType;
  const toBits = kind === "float" ? "float32Bits" : "float64Bits";
  const fromBits = kind === "float" ? "float32FromBits" : "float64FromBits";

  out.line();
  out.block(`function decode${name}(b64: string): ${valueType} {`, () => {
    out.line("const reader = new Reader(fromBase64(b64));");
    out.line("const tag = reader.readTag();");
    out.line("expect(tag.fieldNumber).toBe(1);");
    out.line(`expect(tag.wireType).toBe(${wireTypeName(descriptor.wireType)});`);
    out.line(`return ${float ? `${toBits}(${readExpression(descriptor)})` : readExpression(descriptor)};`);
  });
  out.line();
  out.block(`function encode${name}(value: ${valueType}): string {`, () => {
    out.line("const writer = new Writer();");
    out.line(`writer.writeTag(1, ${wireTypeName(descriptor.wireType)});`);
    out.line(writeStatement(descriptor, float ? `${fromBits}(value)` : "value"));
    out.line("return toBase64(writer.bytes());");
  });
  out.line();

  const matcher = kind === "bytes" ? "toEqual" : "toBe";
  out.block(`describe("${kind}", () => {`, () => {
    out.block(`const cases: Array<[string, ${valueType}]> = [`, () => {
      for (const fixture of fixtures) {
        const literal =
          float && fixture.bits !== undefined ? bitsLiteral(fixture.bits) : descriptor.literal(fixture.expected);
        out.line(`[${JSON.stringify(toBase64(fixture.bytes))}, ${literal}],`);
      }
    }, "];");
    out.line();
    out.block('it("decodes every fixture", () => {', () => {
      out.block("for (const [b64, expected] of cases) {", () => {
        out.line(`expect(decode${name}(b64), b64).${matcher}(expected);`);
      });
    }, "});");
    out.line();
    out.block('it("re-encodes every value to its fixture", () => {', () => {
      out.block("for (const [b64, value] of cases) {", () => {
        out.line(`expect(encode${name}(value)).toBe(b64);`);
      });
    }, "});");
  }, "});");
}

/**
 * Render the simple tier: one decode and encode routine and one fixture
 * table per scalar kind.
 */
export function renderScalarArtifact(tables: ScalarTable[], codecModule: string): string {
  const out = new SourceBuilder();
  for (const line of artifactHeader("simple")) {
    out.line(line);
  }
  const kinds = tables.map((t) => t.kind);
  const imports = ["Reader", "WireType", "Writer"];
  if (kinds.some((kind) => describeKind(kind).wrap !== undefined)) {
    imports.push("Enum");
  }
  writeImports(out, codecModule, imports);
  out.line();
  writeBase64Helpers(out);
  writeFloatHelpers(out, kinds);
  for (const table of tables) {
    writeKind(out, table);
  }
  return out.toString();
}
