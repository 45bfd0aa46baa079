import type { ScalarKind } from "./domain";
import { enumOf, field, message, messageOf, scalar } from "./schema";
import type { EnumSpec, MessageSpec } from "./schema";

/**
 * Descriptors of the message types in proto/*.proto. They must agree with the
 * schema files; the canonicalization layer fails the run when the oracle's
 * bytes disagree with them.
 */

export const SIMPLE_ENUM: EnumSpec = {
  name: "codec.simple.SimpleEnum",
  values: [
    ["SIMPLE_ENUM_ZERO", 0],
    ["SIMPLE_ENUM_ONE", 1],
    ["SIMPLE_ENUM_TWO", 2],
    ["SIMPLE_ENUM_MAX", 2147483647],
  ],
};

const SIMPLE_MESSAGE_NAMES: Record<ScalarKind, string> = {
  int32: "Int32Value",
  int64: "Int64Value",
  uint32: "UInt32Value",
  uint64: "UInt64Value",
  sint32: "SInt32Value",
  sint64: "SInt64Value",
  bool: "BoolValue",
  enum: "EnumValue",
  fixed32: "Fixed32Value",
  fixed64: "Fixed64Value",
  sfixed32: "SFixed32Value",
  sfixed64: "SFixed64Value",
  float: "FloatValue",
  double: "DoubleValue",
  bytes: "BytesValue",
  string: "StringValue",
};

/**
 * Single-field wrapper message of the simple tier: `optional <kind> value = 1`.
 */
export function simpleMessage(kind: ScalarKind): MessageSpec {
  const tsName = SIMPLE_MESSAGE_NAMES[kind];
  const type = kind === "enum" ? enumOf(SIMPLE_ENUM) : scalar(kind);
  return message(`codec.simple.${tsName}`, tsName, "simple.proto", [
    field("value", 1, type, { cardinality: "explicit" }),
  ]);
}

export const STATUS: EnumSpec = {
  name: "codec.middle.Status",
  values: [
    ["STATUS_UNSPECIFIED", 0],
    ["STATUS_OK", 1],
    ["STATUS_FAIL", 2],
  ],
};

export const NESTED = message("codec.middle.Nested", "Nested", "middle.proto", [
  field("count", 1, scalar("int64")),
  field("flag", 2, scalar("bool")),
  field("note", 3, scalar("string")),
]);

export const MIDDLE = message("codec.middle.Middle", "Middle", "middle.proto", [
  field("id", 1, scalar("int32")),
  field("values", 2, scalar("int32"), { cardinality: "repeated" }),
  field("packed_values", 3, scalar("sint32"), { cardinality: "repeated", packed: true }),
  field("label", 4, scalar("string")),
  field("data", 5, scalar("bytes")),
  field("nested", 6, messageOf(NESTED), { cardinality: "explicit" }),
  field("status", 7, enumOf(STATUS)),
  field("tags", 8, scalar("string"), { cardinality: "repeated" }),
]);

export const ITEM = message("codec.difficult.Item", "Item", "difficult.proto", [
  field("name", 1, scalar("string")),
  field("raw", 2, scalar("bytes")),
  field("code", 3, scalar("fixed64")),
]);

export const COUNT = message("codec.difficult.Count", "Count", "difficult.proto", [
  field("key", 1, scalar("string")),
  field("value", 2, scalar("int32"), { cardinality: "explicit" }),
]);

export const DIFFICULT = message("codec.difficult.Difficult", "Difficult", "difficult.proto", [
  field("big", 1, scalar("uint64")),
  field("zigzag", 2, scalar("sint32")),
  field("ratio", 3, scalar("double")),
  field("scores", 4, scalar("double"), { cardinality: "repeated", packed: true }),
  field("items", 5, messageOf(ITEM), { cardinality: "repeated" }),
  field("counts", 6, messageOf(COUNT), { cardinality: "repeated" }),
  field("text", 7, scalar("string"), { cardinality: "explicit", oneof: "choice" }),
  field("number", 8, scalar("int32"), { cardinality: "explicit", oneof: "choice" }),
  field("payload", 9, scalar("bytes")),
]);
