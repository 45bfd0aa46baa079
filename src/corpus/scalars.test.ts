import { describe, it, expect } from 'vitest';
import { SCALAR_KINDS, describeKind } from '../domain';
import type { ScalarKind, ScalarValue } from '../domain';
import { CorpusError } from '../errors';
import { Reader } from '../reader';
import { MaxInt32, MaxUint64, MinInt32 } from '../types';
import { Writer } from '../writer';
import { boundaryValues, buildScalarCorpus } from './scalars';

function encoded(kind: ScalarKind, value: ScalarValue): Uint8Array {
  const writer = new Writer();
  describeKind(kind).writeValue(writer, value);
  return writer.bytes();
}

/**
 * Neighbouring boundary values one apart, in list order.
 */
function thresholdPairs(values: ScalarValue[]): [ScalarValue, ScalarValue][] {
  const pairs: [ScalarValue, ScalarValue][] = [];
  for (let i = 0; i + 1 < values.length; i++) {
    const a = values[i];
    const b = values[i + 1];
    if (typeof a === 'bigint' && typeof b === 'bigint' && (b - a === 1n || a - b === 1n)) {
      pairs.push([a, b]);
    } else if (typeof a === 'number' && typeof b === 'number' && Math.abs(b - a) === 1) {
      pairs.push([a, b]);
    }
  }
  return pairs;
}

function emptyData(): Record<string, unknown[]> {
  const data: Record<string, unknown[]> = {};
  for (const kind of SCALAR_KINDS) {
    data[kind] = [];
  }
  return data;
}

function issuesOf(action: () => unknown): unknown {
  try {
    action();
  } catch (err) {
    if (err instanceof CorpusError) {
      return err.details?.issues;
    }
    throw err;
  }
  return undefined;
}

describe('boundaryValues', () => {
  it('covers each varint length change of int32', () => {
    expect(boundaryValues('int32')).toEqual([
      127, 128, 16383, 16384, 2097151, 2097152, 268435455, 268435456, MinInt32, MaxInt32,
    ]);
  });

  it('covers zigzag length changes on both sides', () => {
    const values = boundaryValues('sint32');
    expect(values.slice(0, 4)).toEqual([63, 64, -64, -65]);
    expect(values).toHaveLength(18);
  });

  it('reaches the top of uint64', () => {
    const values = boundaryValues('uint64');
    expect(values).toHaveLength(20);
    expect(values[values.length - 1]).toBe(MaxUint64);
  });

  it('adds the non-finite floats', () => {
    const [nan, inf, negInf] = boundaryValues('double');
    expect(nan).toBeNaN();
    expect(inf).toBe(Number.POSITIVE_INFINITY);
    expect(negInf).toBe(Number.NEGATIVE_INFINITY);
  });

  it('adds nothing for kinds without numeric bounds', () => {
    expect(boundaryValues('string')).toEqual([]);
    expect(boundaryValues('enum')).toEqual([]);
  });
});

const THRESHOLD_PAIRS: [ScalarKind, number][] = [
  ['int32', 4],
  ['int64', 8],
  ['uint32', 4],
  ['uint64', 9],
  ['sint32', 8],
  ['sint64', 18],
];

describe('varint boundary continuity', () => {
  it.each(THRESHOLD_PAIRS)('%s gains one byte at each threshold', (kind, count) => {
    const descriptor = describeKind(kind);
    const pairs = thresholdPairs(boundaryValues(kind));
    expect(pairs).toHaveLength(count);
    for (const [below, at] of pairs) {
      const short = encoded(kind, below);
      const long = encoded(kind, at);
      expect(long.length).toBe(short.length + 1);
      const readBelow = descriptor.readValue(new Reader(short));
      const readAt = descriptor.readValue(new Reader(long));
      expect(descriptor.equals(readBelow, below)).toBe(true);
      expect(descriptor.equals(readAt, at)).toBe(true);
      expect(descriptor.equals(readBelow, readAt)).toBe(false);
    }
  });
});

describe('buildScalarCorpus', () => {
  it('builds one corpus per kind from the data file', () => {
    const corpora = buildScalarCorpus();
    expect(corpora.map((c) => c.kind)).toEqual([...SCALAR_KINDS]);
    expect(corpora[0].inputs[0]).toEqual({ kind: 'int32', label: 'int32[0]', value: 0, text: '0' });
  });

  it('keeps enum symbols as oracle text', () => {
    const enums = buildScalarCorpus().find((c) => c.kind === 'enum');
    expect(enums?.inputs.map((input) => input.text)).toEqual([
      'SIMPLE_ENUM_ZERO',
      'SIMPLE_ENUM_ONE',
      'SIMPLE_ENUM_TWO',
      'SIMPLE_ENUM_MAX',
    ]);
    expect(enums?.inputs[3].value).toBe(2147483647);
  });

  it('appends boundary values after the authored ones', () => {
    const corpora = buildScalarCorpus({ ...emptyData(), int32: [5, 128] });
    const int32 = corpora[0].inputs.map((input) => input.value);
    expect(int32.slice(0, 3)).toEqual([5, 128, 127]);
    expect(int32).toHaveLength(11);
  });

  it('rounds float values to single precision', () => {
    const corpora = buildScalarCorpus({ ...emptyData(), float: ['0.1'] });
    const float = corpora.find((c) => c.kind === 'float');
    expect(float?.inputs[0]).toEqual({
      kind: 'float',
      label: 'float[0]',
      value: Math.fround(0.1),
      text: '0.10000000149011612',
    });
    expect(float?.inputs[1].text).toBe('nan');
  });

  it('gives bool no boundary values', () => {
    const corpora = buildScalarCorpus(emptyData());
    expect(corpora.find((c) => c.kind === 'bool')?.inputs).toEqual([]);
  });

  it('reports out-of-range values with their path', () => {
    expect(issuesOf(() => buildScalarCorpus({ ...emptyData(), int32: [2147483648] }))).toEqual([
      'int32.0: value out of range for int32',
    ]);
  });

  it('reports unknown enum symbols', () => {
    expect(issuesOf(() => buildScalarCorpus({ ...emptyData(), enum: ['SIMPLE_ENUM_NINE'] }))).toEqual([
      'enum.0: unknown codec.simple.SimpleEnum symbol SIMPLE_ENUM_NINE',
    ]);
  });

  it('rejects keys that are not kinds', () => {
    expect(() => buildScalarCorpus({ ...emptyData(), int128: [] })).toThrow(CorpusError);
  });
});
