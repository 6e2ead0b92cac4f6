import { describe, it, expect } from 'vitest';
import {
  formatPath,
  isPlainObject,
  pathKey,
  pathsEqual,
  segment,
  walk,
} from '../../src/lib/walker/index.js';
import { describeType } from '../../src/lib/unifier/index.js';
import { InvalidRecordError } from '../../src/utils/errors.js';

function observed(record: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  for (const { path, type } of walk(record)) {
    out[formatPath(path)] = describeType(type);
  }
  return out;
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('walk', () => {
  it('rejects roots that are not JSON objects', () => {
    expect(() => walk([1, 2])).toThrow(InvalidRecordError);
    expect(() => walk(null)).toThrow('Record must be a JSON object, got null');
    expect(() => walk('Patient')).toThrow('Record must be a JSON object, got string');
    expect(() => walk(new Date(0))).toThrow('Record must be a JSON object, got Date');
  });

  it('reports the root path on a rejected record', () => {
    expect(thrown(() => walk(42))).toMatchObject({ code: 'INVALID_RECORD', path: '$' });
  });

  it('classifies scalar leaves', () => {
    expect(walk({ b: true, i: 3, f: 2.5, s: '3', n: null })).toEqual([
      { path: [{ key: 'b', listDepth: 0 }], type: { kind: 'boolean' } },
      { path: [{ key: 'i', listDepth: 0 }], type: { kind: 'integer' } },
      { path: [{ key: 'f', listDepth: 0 }], type: { kind: 'float' } },
      { path: [{ key: 's', listDepth: 0 }], type: { kind: 'string' } },
      { path: [{ key: 'n', listDepth: 0 }], type: { kind: 'null' } },
    ]);
  });

  it('skips keys whose value is undefined', () => {
    expect(observed({ a: undefined, b: 1 })).toEqual({ b: 'integer' });
  });

  it('observes a nested object shallowly and then its children', () => {
    expect(walk({ code: { text: 'x' } })).toEqual([
      { path: [{ key: 'code', listDepth: 0 }], type: { kind: 'struct', fields: new Map() } },
      {
        path: [
          { key: 'code', listDepth: 0 },
          { key: 'text', listDepth: 0 },
        ],
        type: { kind: 'string' },
      },
    ]);
  });

  it('observes sequences through their merged element type', () => {
    expect(observed({ tags: ['a', 'b'], values: [1, 2.5], empty: [] })).toEqual({
      'tags[]': 'string',
      'values[]': 'float',
      'empty[]': 'null',
    });
  });

  it('counts nested sequence levels on the segment', () => {
    const [observation] = walk({ matrix: [[1, 2], [3]] });

    expect(observation.path).toEqual([{ key: 'matrix', listDepth: 2 }]);
    expect(observation.type).toEqual({ kind: 'integer' });
  });

  it('merges the fields of every object in a sequence in first-seen order', () => {
    const record = { extension: [{ url: 'a' }, { url: 'b', valueInteger: 1 }] };

    expect(walk(record).map((o) => formatPath(o.path))).toEqual([
      'extension[]',
      'extension[].url',
      'extension[].valueInteger',
    ]);
  });

  it('unifies repeated paths inside one record', () => {
    expect(observed({ a: [{ x: 1 }, { x: 'one' }] })).toEqual({
      'a[]': 'struct<{}>',
      'a[].x': 'string',
    });
  });

  it('reaches deeply nested extension values', () => {
    const record = {
      resourceType: 'Patient',
      extension: [
        {
          url: 'http://example.org/race',
          extension: [{ url: 'ombCategory', valueCoding: { system: 'urn:oid:1.2.3', code: 'x' } }],
        },
      ],
    };

    expect(observed(record)).toEqual({
      resourceType: 'string',
      'extension[]': 'struct<{}>',
      'extension[].url': 'string',
      'extension[].extension[]': 'struct<{}>',
      'extension[].extension[].url': 'string',
      'extension[].extension[].valueCoding': 'struct<{}>',
      'extension[].extension[].valueCoding.system': 'string',
      'extension[].extension[].valueCoding.code': 'string',
    });
  });

  it('rejects values that have no JSON counterpart', () => {
    expect(thrown(() => walk({ a: { b: new Date(0) } }))).toMatchObject({
      message: 'Unsupported Date value at a.b',
      path: 'a.b',
    });
    expect(thrown(() => walk({ a: [() => 1] }))).toMatchObject({
      message: 'Unsupported function value at a[]',
      path: 'a[]',
    });
    expect(() => walk({ a: Number.NaN })).toThrow('Non-finite number at a');
  });

  it('accepts objects without a prototype', () => {
    const record: Record<string, unknown> = Object.create(null);
    record.id = 'p1';

    expect(observed(record)).toEqual({ id: 'string' });
  });

  it('is deterministic', () => {
    const record = { id: 'x', name: [{ given: ['a'], family: 'b' }], active: true };
    expect(walk(record)).toEqual(walk(record));
  });
});

describe('isPlainObject', () => {
  it('accepts plain objects only', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject(new Map())).toBe(false);
  });
});

describe('field paths', () => {
  it('formats one [] per list level', () => {
    expect(formatPath([segment('a', 2), segment('b')])).toBe('a[][].b');
  });

  it('keys paths unambiguously', () => {
    expect(pathKey([segment('a.b')])).not.toBe(pathKey([segment('a'), segment('b')]));
    expect(pathKey([segment('a', 1)])).not.toBe(pathKey([segment('a')]));
  });

  it('compares paths by key and depth', () => {
    expect(pathsEqual([segment('a', 1)], [segment('a', 1)])).toBe(true);
    expect(pathsEqual([segment('a', 1)], [segment('a')])).toBe(false);
    expect(pathsEqual([segment('a')], [segment('a'), segment('b')])).toBe(false);
  });
});
