import { describe, it, expect } from 'vitest';
import {
  FilterCompileError,
  FilterError,
  FilterParseError,
  FilterRuntimeError,
  EXIT_CODES,
} from '../src/errors.js';
import { applyFilter, createFilterEngine, parseFilter } from '../src/filter/index.js';

const ITEMS = [
  { id: 'ITEM0001', name: 'sunset', star: 4, tags: ['sky'] },
  { id: 'ITEM0002', name: 'mountain', star: 2, tags: [] },
];

describe('filter paths', () => {
  it('passes the input through with identity', () => {
    expect(applyFilter(null, '.')).toEqual([null]);
    expect(applyFilter({ a: 1 }, '')).toEqual([{ a: 1 }]);
  });

  it('reads fields in every spelling', () => {
    const input = { name: 'x', 'odd key': 2 };
    expect(applyFilter(input, '.name')).toEqual(['x']);
    expect(applyFilter(input, '."odd key"')).toEqual([2]);
    expect(applyFilter(input, '.["name"]')).toEqual(['x']);
    expect(applyFilter(input, '.missing')).toEqual([null]);
  });

  it('indexes and slices arrays and strings', () => {
    const input = [1, 2, 3, 4];
    expect(applyFilter(input, '.[0]')).toEqual([1]);
    expect(applyFilter(input, '.[-1]')).toEqual([4]);
    expect(applyFilter(input, '.[1:3]')).toEqual([[2, 3]]);
    expect(applyFilter(input, '.[2:]')).toEqual([[3, 4]]);
    expect(applyFilter(input, '.[:1]')).toEqual([[1]]);
    expect(applyFilter('hello', '.[1:3]')).toEqual(['el']);
    expect(applyFilter(input, '.[10]')).toEqual([null]);
  });

  it('iterates arrays and object values', () => {
    expect(applyFilter({ a: 1, b: 2 }, '.[]')).toEqual([1, 2]);
    expect(applyFilter([{ id: 'a' }, { id: 'b' }], '.[].id')).toEqual(['a', 'b']);
  });

  it('walks every value with recursive descent', () => {
    expect(applyFilter({ a: [1] }, '[..]')).toEqual([[{ a: [1] }, [1], 1]]);
  });

  it('suppresses runtime errors with ?', () => {
    expect(applyFilter(5, '.a?')).toEqual([]);
    expect(applyFilter([1, { a: 'x' }], '[.[] | .a?]')).toEqual([['x']]);
  });
});

describe('filter expressions', () => {
  it('selects and collects', () => {
    expect(applyFilter(ITEMS, '[.[] | select(.star >= 3)]')).toEqual([[ITEMS[0]]]);
  });

  it('builds objects with shorthand and renamed keys', () => {
    expect(applyFilter(ITEMS, '[.[] | {id, upper: .name}]')).toEqual([
      [
        { id: 'ITEM0001', upper: 'sunset' },
        { id: 'ITEM0002', upper: 'mountain' },
      ],
    ]);
  });

  it('builds objects with computed keys and multiple outputs', () => {
    expect(applyFilter({ k: 'x', v: 1 }, '{(.k): .v}')).toEqual([{ x: 1 }]);
    expect(applyFilter(null, '{a: (1, 2)}')).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('binds comma tighter than pipe', () => {
    expect(applyFilter(null, '1, 2 | . * 10')).toEqual([10, 20]);
  });

  it('falls back with //', () => {
    expect(applyFilter({}, '.missing // "default"')).toEqual(['default']);
    expect(applyFilter({ a: false }, '.a // 1')).toEqual([1]);
    expect(applyFilter(5, '.a // "swallowed"')).toEqual(['swallowed']);
  });

  it('evaluates arithmetic and negation', () => {
    expect(applyFilter({ a: 1, b: 2 }, '.a + .b')).toEqual([3]);
    expect(applyFilter(null, '10 % 3')).toEqual([1]);
    expect(applyFilter({ a: 3 }, '-(.a)')).toEqual([-3]);
    expect(applyFilter(null, '"ab" + "cd"')).toEqual(['abcd']);
  });

  it('orders values across types', () => {
    expect(applyFilter(null, '[null < false, false < true, true < 0, 0 < "a", "a" < [], [] < {}]')).toEqual([
      [true, true, true, true, true, true],
    ]);
  });

  it('short-circuits and / or', () => {
    expect(applyFilter(null, 'true and false')).toEqual([false]);
    expect(applyFilter(null, 'null or 1')).toEqual([true]);
  });

  it('chooses a branch with if / elif / else', () => {
    const filter = 'if . > 2 then "big" elif . == 2 then "two" else "small" end';
    expect(applyFilter(3, filter)).toEqual(['big']);
    expect(applyFilter(2, filter)).toEqual(['two']);
    expect(applyFilter(1, filter)).toEqual(['small']);
  });
});

describe('filter builtins', () => {
  it('reports keys and length', () => {
    expect(applyFilter({ b: 1, a: 2 }, 'keys')).toEqual([['a', 'b']]);
    expect(applyFilter({ b: 1, a: 2 }, 'keys_unsorted')).toEqual([['b', 'a']]);
    expect(applyFilter([1, 2, 3], 'length')).toEqual([3]);
    expect(applyFilter({ a: 1 }, 'length')).toEqual([1]);
    expect(applyFilter(null, 'length')).toEqual([0]);
  });

  it('maps, adds and sorts', () => {
    expect(applyFilter([1, 2], 'map(. + 1)')).toEqual([[2, 3]]);
    expect(applyFilter([1, 2, 3], 'add')).toEqual([6]);
    expect(applyFilter(['a', 'b'], 'add')).toEqual(['ab']);
    expect(applyFilter([3, 'a', null, true, 1], 'sort')).toEqual([[null, true, 1, 3, 'a']]);
    expect(applyFilter(ITEMS, 'sort_by(.star) | map(.id)')).toEqual([['ITEM0002', 'ITEM0001']]);
    expect(applyFilter([2, 1, 2], 'unique')).toEqual([[1, 2]]);
    expect(applyFilter([1, 2, 3], 'reverse')).toEqual([[3, 2, 1]]);
  });

  it('picks first, last, min and max', () => {
    expect(applyFilter([1, 2, 3], 'first')).toEqual([1]);
    expect(applyFilter([1, 2, 3], 'last')).toEqual([3]);
    expect(applyFilter([1, 2, 3], 'first(.[])')).toEqual([1]);
    expect(applyFilter([3, 1, 2], 'min')).toEqual([1]);
    expect(applyFilter([3, 1, 2], 'max')).toEqual([3]);
  });

  it('converts between objects and entries', () => {
    expect(applyFilter({ a: 1 }, 'to_entries')).toEqual([[{ key: 'a', value: 1 }]]);
    expect(applyFilter([{ key: 'a', value: 1 }], 'from_entries')).toEqual([{ a: 1 }]);
  });

  it('handles strings', () => {
    expect(applyFilter(['a', 'b'], 'join(", ")')).toEqual(['a, b']);
    expect(applyFilter('a,b', 'split(",")')).toEqual([['a', 'b']]);
    expect(applyFilter('MiXed', 'ascii_downcase')).toEqual(['mixed']);
    expect(applyFilter('MiXed', 'ascii_upcase')).toEqual(['MIXED']);
    expect(applyFilter('foobar', 'startswith("foo")')).toEqual([true]);
    expect(applyFilter('foobar', 'endswith("bar")')).toEqual([true]);
    expect(applyFilter('foobar', 'contains("oba")')).toEqual([true]);
    expect(applyFilter('42', 'tonumber')).toEqual([42]);
    expect(applyFilter([1, 'a'], '.[] | tostring')).toEqual(['1', 'a']);
  });

  it('rewrites entries and values', () => {
    expect(applyFilter({ a: 1, b: 2 }, 'with_entries({key, value: (.value + 10)})')).toEqual([{ a: 11, b: 12 }]);
    expect(applyFilter({ a: 1, b: 2 }, 'with_entries(select(.value > 1))')).toEqual([{ b: 2 }]);
    expect(applyFilter({ a: 1, b: 2 }, 'map_values(. * 2)')).toEqual([{ a: 2, b: 4 }]);
    expect(applyFilter([1, 2, 3], 'map_values(select(. != 2))')).toEqual([[1, 3]]);
  });

  it('limits the number of outputs', () => {
    expect(applyFilter([1, 2, 3], '[limit(2; .[])]')).toEqual([[1, 2]]);
    expect(applyFilter([1, 2, 3], '[limit(0; .[])]')).toEqual([[]]);
    expect(applyFilter([1], '[limit(5; .[])]')).toEqual([[1]]);
  });

  it('trims prefixes and suffixes', () => {
    expect(applyFilter('image.png', 'rtrimstr(".png")')).toEqual(['image']);
    expect(applyFilter('image.png', 'ltrimstr("img")')).toEqual(['image.png']);
    expect(applyFilter('#sky', 'ltrimstr("#")')).toEqual(['sky']);
    expect(applyFilter(5, 'ltrimstr("#")')).toEqual([5]);
  });

  it('matches regular expressions', () => {
    expect(applyFilter('Sunset.PNG', 'test("png$")')).toEqual([false]);
    expect(applyFilter('Sunset.PNG', 'test("png$"; "i")')).toEqual([true]);
    expect(applyFilter(['sky', 'sea', 'land'], '[.[] | select(test("^s"))]')).toEqual([['sky', 'sea']]);
    expect(() => applyFilter('x', 'test("(")')).toThrow(FilterRuntimeError);
    expect(() => applyFilter('x', 'test("x"; "q")')).toThrow('jq runtime error: q is not a valid modifier string');
  });

  it('tests types and membership', () => {
    expect(applyFilter([null, 1, 'a', [], {}, true], 'map(type)')).toEqual([
      ['null', 'number', 'string', 'array', 'object', 'boolean'],
    ]);
    expect(applyFilter({ a: 1 }, 'has("a")')).toEqual([true]);
    expect(applyFilter([null, 1], '.[] | values')).toEqual([1]);
    expect(applyFilter(null, 'empty')).toEqual([]);
    expect(applyFilter(true, 'not')).toEqual([false]);
  });
});

describe('filter errors', () => {
  it('reports parse errors with their position', () => {
    expect(() => applyFilter([], '.[invalid')).toThrow(FilterParseError);
    expect(() => applyFilter([], '.[invalid')).toThrow(
      "jq parse error: expected ']', found end of input at position 9",
    );
  });

  it('rejects string interpolation and chained comparisons', () => {
    expect(() => parseFilter('"\\(.x)"')).toThrow('string interpolation is not supported');
    expect(() => parseFilter('1 == 1 == 1')).toThrow('comparison operators cannot be chained');
  });

  it('reports unknown functions at compile time', () => {
    const engine = createFilterEngine();
    expect(() => engine.compile('nosuch(1)')).toThrow(FilterCompileError);
    expect(() => engine.compile('nosuch(1)')).toThrow('jq compile error: nosuch/1 is not defined');
  });

  it('reports evaluation failures as runtime errors', () => {
    expect(() => applyFilter(5, '.a')).toThrow(FilterRuntimeError);
    expect(() => applyFilter(5, '.a')).toThrow('jq runtime error: Cannot index number with "a"');
    expect(() => applyFilter(null, '.[]')).toThrow('jq runtime error: Cannot iterate over null');
  });

  it('maps every filter failure to the usage exit code', () => {
    try {
      applyFilter(null, 'nosuch');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FilterError);
      expect(err).toHaveProperty('exitCode', EXIT_CODES.USAGE);
    }
  });

  it('compiles once and runs against many inputs', () => {
    const compiled = createFilterEngine().compile('.a');
    expect(compiled.run({ a: 1 })).toEqual([1]);
    expect(compiled.run({ a: 2 })).toEqual([2]);
  });
});
