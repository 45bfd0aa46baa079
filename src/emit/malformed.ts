import type { MalformedAction, MalformedCase } from "../corpus/malformed";
import { toBase64 } from "../format";
import { wireTypeName } from "./scalar";
import { SourceBuilder, artifactHeader, writeBase64Helpers, writeImports } from "./source";

const ACTION_CALLS: Record<MalformedAction, string> = {
  "read-tag": "reader.readTag()",
  "read-int32": "reader.readInt32()",
  "read-fixed32": "reader.readFixed32()",
  "read-string": "reader.readString()",
  "skip-field": "reader.skipField(tag.wireType)",
};

/**
 * Render the malformed tier: one test per case asserting the failure
 * classification the reader reports.
 */
export function renderMalformedArtifact(cases: readonly MalformedCase[], codecModule: string): string {
  const out = new SourceBuilder();
  for (const line of artifactHeader("malformed")) {
    out.line(line);
  }
  writeImports(out, codecModule, ["DecodeError", "Reader", "WireType"]);
  out.line();
  writeBase64Helpers(out, false);
  out.line();
  out.block("function failureOf(action: () => unknown): string {", () => {
    out.block("try {", () => {
      out.line("action();");
    }, "} catch (err) {");
    out.indented(() => {
      out.block("if (err instanceof DecodeError) {", () => {
        out.line("return err.reason;");
      });
      out.line("throw err;");
    });
    out.line("}");
    out.line('return "ok";');
  });
  out.line();

  out.block('describe("malformed input", () => {', () => {
    cases.forEach((c, i) => {
      if (i > 0) {
        out.line();
      }
      out.block(`it(${JSON.stringify(c.name)}, () => {`, () => {
        out.line(`const reader = new Reader(fromBase64(${JSON.stringify(toBase64(c.bytes))}));`);
        if (c.tag !== undefined) {
          out.line("const tag = reader.readTag();");
          out.line(`expect(tag.fieldNumber).toBe(${c.tag.fieldNumber});`);
          out.line(`expect(tag.wireType).toBe(${wireTypeName(c.tag.wireType)});`);
        }
        out.line(`expect(failureOf(() => ${ACTION_CALLS[c.action]})).toBe(${JSON.stringify(c.reason)});`);
      }, "});");
    });
  }, "});");
  return out.toString();
}
