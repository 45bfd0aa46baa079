/**
 * wirevec - golden test vectors for the protobuf wire format
 *
 * Exports the reference codec the generated tests run against, and the
 * generator pipeline behind the `wirevec` command.
 *
 * @example
 * ```typescript
 * import { Writer, Reader, WireType } from 'wirevec';
 *
 * const writer = new Writer();
 * writer.writeTag(1, WireType.Varint);
 * writer.writeInt32(150);
 * const data = writer.bytes(); // 08 96 01
 *
 * const reader = new Reader(data);
 * const { fieldNumber } = reader.readTag();
 * reader.readInt32(); // 150
 * ```
 */

// Core types
export {
  WireType,
  MinInt32,
  MaxInt32,
  MaxUint32,
  MinInt64,
  MaxInt64,
  MaxUint64,
  MaxFieldNumber,
  SInt32,
  SInt64,
  Enum,
  isWireType,
  encodeTag,
  splitTag,
  zigzagEncode,
  zigzagEncode64,
  zigzagDecode,
  zigzagDecode64,
} from "./types";
export type { FieldTag } from "./types";

// Errors
export {
  CodecError,
  EncodeError,
  DecodeError,
  BufferUnderflowError,
  UnknownWireTypeError,
  InvalidStringError,
  GeneratorErrorCode,
  GeneratorError,
  SchemaNotFoundError,
  OracleInvocationError,
  MalformedOracleOutputError,
  UnsupportedFieldKindError,
  NonCanonicalEncodingError,
  CorpusError,
  ArtifactStaleError,
  ConfigError,
} from "./errors";
export type { DecodeFailure, ErrorContext } from "./errors";

// Writer
export { Writer } from "./writer";

// Reader
export { Reader } from "./reader";

// Generator
export { loadConfig } from "./config";
export type { GeneratorConfig, ConfigOverrides } from "./config";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export { ProtocOracle, renderTextproto, spawnRunner } from "./oracle";
export type { Oracle, OracleRequest, CommandRunner, CommandResult } from "./oracle";
export { generate, renderTier, renderCorpusText } from "./pipeline";
export type { TierResult, RenderedTier, CorpusEntry } from "./pipeline";
export { TIERS, isTier } from "./emit/artifact";
export type { Tier, Artifact, ArtifactStatus } from "./emit/artifact";

/**
 * Library version.
 */
export const VERSION = "0.3.0";

