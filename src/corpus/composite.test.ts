import { describe, it, expect } from 'vitest';
import { CorpusError } from '../errors';
import { normalizeCase } from '../message';
import { MIDDLE } from '../messages';
import {
  DIFFICULT_CORPUS,
  MIDDLE_CORPUS,
  buildCompositeCorpus,
  isAllDefault,
  selectSynthetic,
} from './composite';

describe('selectSynthetic', () => {
  const selectors = [
    ['a', 1],
    ['b', 3],
  ] as const;
  const pools = {
    a: [{ a: 1 }, { a: 2 }],
    b: [{ b: 10 }, { b: 20 }, { b: 30 }, { b: 40 }],
  };

  it('steps through each pool by its multiplier', () => {
    expect(selectSynthetic(selectors, pools, 1)).toEqual({ a: 2, b: 40 });
    expect(selectSynthetic(selectors, pools, 2)).toEqual({ a: 1, b: 30 });
  });

  it('rejects an empty pool', () => {
    expect(() => selectSynthetic(selectors, { a: [], b: pools.b }, 0)).toThrow(CorpusError);
  });
});

describe('isAllDefault', () => {
  it('holds for a message with nothing set', () => {
    expect(isAllDefault(MIDDLE, normalizeCase(MIDDLE, {}))).toBe(true);
    expect(isAllDefault(MIDDLE, normalizeCase(MIDDLE, { id: 0, status: 'STATUS_UNSPECIFIED' }))).toBe(true);
  });

  it('fails once a message field is present, even if empty', () => {
    expect(isAllDefault(MIDDLE, normalizeCase(MIDDLE, { nested: {} }))).toBe(false);
  });

  it('fails for a non-empty repeated field', () => {
    expect(isAllDefault(MIDDLE, normalizeCase(MIDDLE, { tags: [''] }))).toBe(false);
  });
});

describe('buildCompositeCorpus', () => {
  it('lists the seeds before the synthetic cases', () => {
    const corpus = buildCompositeCorpus(MIDDLE_CORPUS);
    expect(corpus.cases).toHaveLength(86);
    expect(corpus.cases[0].label).toBe('seed[0]');
    expect(corpus.cases[6].label).toBe('synthetic[0]');
    expect(corpus.cases[85].label).toBe('synthetic[79]');
  });

  it('combines pool entries for a synthetic case', () => {
    const { value } = buildCompositeCorpus(MIDDLE_CORPUS).cases[7];
    expect(value.id).toBe(1);
    expect(value.values).toEqual([-1, -2]);
    expect(value.packed_values).toEqual([123456]);
    expect(value.label).toBe('path\\\\slash');
    expect(value.data).toEqual(new Uint8Array([1, 2]));
    expect(value.status).toBe('STATUS_UNSPECIFIED');
    expect(value.tags).toEqual(['edge']);
  });

  it('reads the difficult corpus', () => {
    const corpus = buildCompositeCorpus(DIFFICULT_CORPUS);
    expect(corpus.cases).toHaveLength(76);
    expect(corpus.message.name).toBe('codec.difficult.Difficult');
  });

  it('sets oneof members together from a group pool', () => {
    const corpus = buildCompositeCorpus(
      { ...DIFFICULT_CORPUS, total: 1 },
      {
        seeds: [{}],
        pools: {
          big: ['5'],
          zigzag: [-1],
          ratio: [1.5],
          scores: [[]],
          items: [[]],
          counts: [[]],
          choice: [{ number: 7 }],
          payload: ['ab'],
        },
      }
    );
    expect(corpus.cases[1].value).toEqual({
      big: 5n,
      zigzag: -1,
      ratio: 1.5,
      scores: [],
      items: [],
      counts: [],
      text: null,
      number: 7,
      payload: new Uint8Array([0xab]),
    });
  });

  it('requires an all-default case', () => {
    const pools = Object.fromEntries(MIDDLE_CORPUS.selectors.map(([name]) => [name, []]));
    const build = () => buildCompositeCorpus({ ...MIDDLE_CORPUS, total: 0 }, { seeds: [{ id: 1 }], pools });
    expect(build).toThrow(CorpusError);
    expect(build).toThrow(/corpus has no all-default case/);
  });

  it('rejects a pool that names no field', () => {
    expect(() => buildCompositeCorpus({ ...MIDDLE_CORPUS, selectors: [['bogus', 1]] }, { seeds: [], pools: {} })).toThrow(
      /pool bogus names neither a field nor a oneof group/
    );
  });

  it('rejects unknown fields in a seed', () => {
    const pools = Object.fromEntries(MIDDLE_CORPUS.selectors.map(([name]) => [name, []]));
    expect(() => buildCompositeCorpus({ ...MIDDLE_CORPUS, total: 0 }, { seeds: [{ colour: 1 }], pools })).toThrow(
      CorpusError
    );
  });
});
