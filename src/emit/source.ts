const INDENT = "  ";

/**
 * Line-oriented builder for emitted TypeScript. Blank lines carry no
 * indentation.
 */
export class SourceBuilder {
  private readonly lines: string[] = [];
  private depth = 0;

  line(text = ""): this {
    this.lines.push(text === "" ? "" : INDENT.repeat(this.depth) + text);
    return this;
  }

  /**
   * Write `header`, then `body` one level deeper, then `footer`.
   */
  block(header: string, body: () => void, footer = "}"): this {
    this.line(header);
    this.indented(body);
    return this.line(footer);
  }

  /**
   * Write `body` one level deeper, without header or footer.
   */
  indented(body: () => void): this {
    this.depth++;
    body();
    this.depth--;
    return this;
  }

  toString(): string {
    return `${this.lines.join("\n")}\n`;
  }
}

/**
 * Header every artifact starts with.
 */
export function artifactHeader(tier: string): string[] {
  return [
    "// Code generated by wirevec. DO NOT EDIT.",
    `// Tier: ${tier}. Regenerate with \`wirevec generate --tier ${tier}\`.`,
    "",
  ];
}

/**
 * Base64 helpers shared by the artifacts. Only tiers that re-encode need
 * `toBase64`.
 */
export function writeBase64Helpers(out: SourceBuilder, withEncoder = true): void {
  out.block("function fromBase64(b64: string): Uint8Array {", () => {
    out.line('return new Uint8Array(Buffer.from(b64, "base64"));');
  });
  if (!withEncoder) {
    return;
  }
  out.line();
  out.block("function toBase64(bytes: Uint8Array): string {", () => {
    out.line('return Buffer.from(bytes).toString("base64");');
  });
}

/**
 * Import lines for Vitest and the codec module.
 */
export function writeImports(out: SourceBuilder, codecModule: string, names: Iterable<string>): void {
  const sorted = [...new Set(names)].sort();
  out.line('import { describe, expect, it } from "vitest";');
  out.line(`import { ${sorted.join(", ")} } from ${JSON.stringify(codecModule)};`);
}
