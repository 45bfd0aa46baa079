/**
 * Literal formatting for the two grammars the generator writes: the oracle's
 * text format and TypeScript source.
 */

const textEncoder = new TextEncoder();

/**
 * Normalize a number's scientific notation: `1e+21` becomes `1e21` and
 * `1e-09` becomes `1e-9`. Text without an exponent is returned unchanged.
 */
export function normalizeExponent(text: string): string {
  const match = /^(.*?)[eE]([+-]?)(\d+)$/.exec(text);
  if (!match) {
    return text;
  }
  const [, head, sign, digits] = match;
  const exponent = digits.replace(/^0+/, "") || "0";
  return `${head}e${sign === "-" ? "-" : ""}${exponent}`;
}

/**
 * Shortest decimal text that reads back to the same double.
 */
function finiteDecimal(value: number): string {
  if (Object.is(value, -0)) {
    return "-0";
  }
  return normalizeExponent(String(value));
}

/**
 * Float in the oracle's text grammar. NaN and the infinities use the
 * reserved tokens `nan`, `inf` and `-inf`.
 */
export function floatText(value: number): string {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (value === Number.POSITIVE_INFINITY) {
    return "inf";
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return "-inf";
  }
  return finiteDecimal(value);
}

/**
 * Float as a TypeScript expression.
 */
export function floatLiteral(value: number): string {
  if (Number.isNaN(value)) {
    return "Number.NaN";
  }
  if (value === Number.POSITIVE_INFINITY) {
    return "Number.POSITIVE_INFINITY";
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return "Number.NEGATIVE_INFINITY";
  }
  return finiteDecimal(value);
}

/**
 * Parse a float token as written in corpus data files.
 */
export function parseFloatToken(token: string): number {
  switch (token) {
    case "nan":
      return Number.NaN;
    case "inf":
      return Number.POSITIVE_INFINITY;
    case "-inf":
      return Number.NEGATIVE_INFINITY;
    default:
      return Number(token);
  }
}

function hexByte(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, hexByte).join("");
}

/**
 * Decode lowercase or uppercase hex into bytes. The caller validates the
 * input's shape.
 */
export function fromHex(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

const TEXT_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/**
 * Quoted string in the oracle's text grammar. Characters outside printable
 * ASCII are written as `\xNN` escapes of their UTF-8 bytes.
 */
export function textStringLiteral(value: string): string {
  let out = '"';
  for (const char of value) {
    const escape = TEXT_ESCAPES[char];
    if (escape !== undefined) {
      out += escape;
      continue;
    }
    const code = char.codePointAt(0) ?? 0;
    if (code >= 0x20 && code < 0x7f) {
      out += char;
    } else {
      for (const byte of textEncoder.encode(char)) {
        out += `\\x${hexByte(byte)}`;
      }
    }
  }
  return `${out}"`;
}

/**
 * Quoted byte string in the oracle's text grammar: one `\xNN` per byte.
 */
export function textBytesLiteral(value: Uint8Array): string {
  return `"${Array.from(value, (byte) => `\\x${hexByte(byte)}`).join("")}"`;
}

/**
 * String as a TypeScript literal.
 */
export function tsStringLiteral(value: string): string {
  return JSON.stringify(value);
}

/**
 * Bytes as a TypeScript expression.
 */
export function tsBytesLiteral(value: Uint8Array): string {
  if (value.length === 0) {
    return "new Uint8Array(0)";
  }
  return `new Uint8Array([${Array.from(value, (byte) => `0x${hexByte(byte)}`).join(", ")}])`;
}

export function tsBigIntLiteral(value: bigint): string {
  return `${value}n`;
}

/**
 * Array of rendered elements as a TypeScript literal.
 */
export function tsArrayLiteral(items: Iterable<string>): string {
  return `[${Array.from(items).join(", ")}]`;
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

export function fromBase64(b64: string): Uint8Array {
  return new Uint8Array(Buffer.from(b64, "base64"));
}

/**
 * `packed_values` to `packedValues`.
 */
export function camelCase(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * `sfixed32` to `Sfixed32`, `packed_values` to `PackedValues`.
 */
export function pascalCase(name: string): string {
  const camel = camelCase(name);
  return camel.charAt(0).toUpperCase() + camel.slice(1);
}
