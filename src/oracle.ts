import { spawnSync } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { OracleInvocationError, SchemaNotFoundError, UnsupportedFieldKindError } from "./errors";
import type { Logger } from "./logger";
import type { CaseValue, CompositeCase } from "./message";
import { isCompositeCase } from "./message";
import { enumNumber, scalarDescriptor } from "./schema";
import type { FieldSpec, MessageSpec } from "./schema";

/**
 * One encode request: a message in the oracle's text grammar.
 */
export interface OracleRequest {
  /** Schema file, relative to the schema directory */
  schemaFile: string;
  /** Fully-qualified message type */
  messageType: string;
  text: string;
  /** Case label, for diagnostics */
  label: string;
}

/**
 * Source of ground-truth bytes.
 */
export interface Oracle {
  encode(request: OracleRequest): Uint8Array;
}

export interface CommandResult {
  status: number | null;
  stdout: Uint8Array;
  stderr: string;
  error?: Error;
}

/**
 * Runs a command to completion with `input` on stdin.
 */
export type CommandRunner = (command: string, args: string[], input: string) => CommandResult;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const spawnRunner: CommandRunner = (command, args, input) => {
  const result = spawnSync(command, args, { input, maxBuffer: MAX_OUTPUT_BYTES });
  return {
    status: result.status,
    stdout: result.stdout ? new Uint8Array(result.stdout) : new Uint8Array(0),
    stderr: result.stderr ? result.stderr.toString("utf8") : "",
    error: result.error,
  };
};

export interface ProtocOracleOptions {
  protoc: string;
  schemaDir: string;
  includeDirs: string[];
  logger: Logger;
  runner?: CommandRunner;
}

/**
 * Oracle backed by `protoc --encode`. Calls block until protoc exits; there
 * is no retry.
 */
export class ProtocOracle implements Oracle {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly options: ProtocOracleOptions) {
    this.runner = options.runner ?? spawnRunner;
    this.logger = options.logger.child({ component: "oracle" });
  }

  encode(request: OracleRequest): Uint8Array {
    const { protoc, schemaDir, includeDirs } = this.options;
    const schemaPath = path.join(schemaDir, request.schemaFile);
    const context = { operation: "oracle.encode", field: request.label };
    if (!fs.existsSync(schemaPath)) {
      throw new SchemaNotFoundError(schemaPath, context);
    }

    const args = [
      `--proto_path=${schemaDir}`,
      ...includeDirs.map((dir) => `--proto_path=${dir}`),
      `--encode=${request.messageType}`,
      schemaPath,
    ];
    this.logger.debug({ label: request.label, messageType: request.messageType }, "invoking protoc");
    const result = this.runner(protoc, args, request.text);

    if (result.error) {
      throw new OracleInvocationError(`failed to run ${protoc}: ${result.error.message}`, context);
    }
    if (result.status !== 0) {
      throw new OracleInvocationError(`${protoc} exited with status ${String(result.status)}`, {
        ...context,
        details: { stderr: result.stderr, text: request.text },
      });
    }
    if (result.stderr.length > 0) {
      throw new OracleInvocationError(`${protoc} wrote to stderr: ${result.stderr.trim()}`, {
        ...context,
        details: { text: request.text },
      });
    }
    return result.stdout;
  }
}

const INDENT = "  ";

function elementLines(owner: MessageSpec, spec: FieldSpec, value: CaseValue, indent: string): string[] {
  const type = spec.type;
  if (type.kind === "message") {
    if (!isCompositeCase(value)) {
      throw new UnsupportedFieldKindError("message", { operation: "oracle.render", field: `${owner.name}.${spec.name}` });
    }
    return [`${indent}${spec.name} {`, ...messageLines(type.message, value, indent + INDENT), `${indent}}`];
  }
  if (type.kind === "enum" && typeof value === "string") {
    return [`${indent}${spec.name}: ${value}`];
  }
  const descriptor = scalarDescriptor(type);
  if (!descriptor.is(value)) {
    throw new UnsupportedFieldKindError(descriptor.kind, {
      operation: "oracle.render",
      field: `${owner.name}.${spec.name}`,
      details: { value: String(value) },
    });
  }
  return [`${indent}${spec.name}: ${descriptor.text(value)}`];
}

/**
 * An implicit scalar holding its zero value, which protoc leaves off the wire.
 */
function isOmittedDefault(spec: FieldSpec, value: CaseValue): boolean {
  const type = spec.type;
  if (spec.cardinality !== "implicit" || type.kind === "message") {
    return false;
  }
  if (type.kind === "enum" && typeof value === "string") {
    return enumNumber(type.enumType, value) === 0;
  }
  const descriptor = scalarDescriptor(type);
  return descriptor.is(value) && descriptor.isDefault(value);
}

function messageLines(spec: MessageSpec, value: CompositeCase, indent: string): string[] {
  const lines: string[] = [];
  for (const f of spec.fields) {
    const current = value[f.name] ?? null;
    if (current === null || isOmittedDefault(f, current)) {
      continue;
    }
    const elements = f.cardinality === "repeated" && Array.isArray(current) ? current : [current];
    for (const element of elements) {
      lines.push(...elementLines(spec, f, element, indent));
    }
  }
  return lines;
}

/**
 * Render a case in the oracle's text grammar: one `name: value` line per set
 * scalar and per repeated element, nested messages as indented blocks.
 * Absent fields and implicit fields at their zero value are skipped;
 * explicit fields and oneof members are written even at zero.
 */
export function renderTextproto(spec: MessageSpec, value: CompositeCase): string {
  const lines = messageLines(spec, value, "");
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}
