import type { DecodeFailure } from "../errors";
import { WireType } from "../types";

/**
 * The reader call expected to fail on a malformed input. Every action except
 * `read-tag` first reads a well-formed tag.
 */
export type MalformedAction = "read-tag" | "read-int32" | "read-fixed32" | "read-string" | "skip-field";

export interface MalformedCase {
  name: string;
  bytes: Uint8Array;
  action: MalformedAction;
  /** Tag read before the failing call, for actions other than `read-tag`. */
  tag?: { fieldNumber: number; wireType: WireType };
  reason: DecodeFailure;
}

const overlongVarint = [0x08, ...new Array<number>(10).fill(0xff), 0x01];

export const MALFORMED_CASES: readonly MalformedCase[] = [
  {
    name: "unknown wire type 6",
    bytes: new Uint8Array([0x0e]),
    action: "read-tag",
    reason: "unknown-wire-type",
  },
  {
    name: "unknown wire type 7",
    bytes: new Uint8Array([0x0f]),
    action: "read-tag",
    reason: "unknown-wire-type",
  },
  {
    name: "truncated string",
    bytes: new Uint8Array([0x0a, 0x02, 0x61]),
    action: "read-string",
    tag: { fieldNumber: 1, wireType: WireType.Bytes },
    reason: "truncated-stream",
  },
  {
    name: "invalid utf-8 string",
    bytes: new Uint8Array([0x0a, 0x01, 0xc2]),
    action: "read-string",
    tag: { fieldNumber: 1, wireType: WireType.Bytes },
    reason: "invalid-encoding",
  },
  {
    name: "truncated varint",
    bytes: new Uint8Array([0x08, 0x80]),
    action: "read-int32",
    tag: { fieldNumber: 1, wireType: WireType.Varint },
    reason: "truncated-stream",
  },
  {
    name: "overlong varint",
    bytes: new Uint8Array(overlongVarint),
    action: "read-int32",
    tag: { fieldNumber: 1, wireType: WireType.Varint },
    reason: "malformed-varint",
  },
  {
    name: "truncated fixed32",
    bytes: new Uint8Array([0x0d, 0x01, 0x02]),
    action: "read-fixed32",
    tag: { fieldNumber: 1, wireType: WireType.Fixed32 },
    reason: "truncated-stream",
  },
  {
    name: "length prefix past end",
    bytes: new Uint8Array([0x12, 0x05, 0x61]),
    action: "skip-field",
    tag: { fieldNumber: 2, wireType: WireType.Bytes },
    reason: "truncated-stream",
  },
];
