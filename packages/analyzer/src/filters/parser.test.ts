import { FilterSyntaxError } from '../errors';
import { describeFilter, intSetHas, parseFilter } from './parser';

const syntaxError = (expression: string): FilterSyntaxError => {
  try {
    parseFilter(expression);
  } catch (error) {
    if (error instanceof FilterSyntaxError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected "${expression}" to be rejected`);
};

describe('parseFilter', () => {
  test('reads package, function and negated size atoms joined by &&', () => {
    expect(parseFilter('"@MyPkg" && :iterate && !32')).toEqual({
      kind: 'and',
      operands: [
        { kind: 'package', label: '@MyPkg' },
        { kind: 'function', name: 'iterate' },
        { kind: 'not', operand: { kind: 'sizes', sizes: { kind: 'values', values: [32] } } },
      ],
    });
  });

  test('&& binds tighter than ||', () => {
    expect(parseFilter('A || B && C')).toEqual({
      kind: 'or',
      operands: [
        { kind: 'type', name: 'A' },
        { kind: 'and', operands: [{ kind: 'type', name: 'B' }, { kind: 'type', name: 'C' }] },
      ],
    });
  });

  test('parentheses group sub-expressions', () => {
    expect(parseFilter('!("@Dep" || :helper)')).toEqual({
      kind: 'not',
      operand: {
        kind: 'or',
        operands: [
          { kind: 'package', label: '@Dep' },
          { kind: 'function', name: 'helper' },
        ],
      },
    });
  });

  test('types take an optional size range', () => {
    expect(parseFilter('Float64Array:8:16')).toEqual({
      kind: 'type',
      name: 'Float64Array',
      sizes: { kind: 'range', from: 8, to: 16 },
    });
  });

  test('file names take a line set', () => {
    expect(parseFilter('"file.ts":[3, 5]')).toEqual({
      kind: 'file',
      name: 'file.ts',
      lines: { kind: 'values', values: [3, 5] },
    });
  });

  test('regular expressions keep their escapes and flags', () => {
    expect(parseFilter('/src\\/util/i:10')).toEqual({
      kind: 'pattern',
      source: 'src\\/util',
      flags: 'i',
      lines: { kind: 'values', values: [10] },
    });
  });

  test('quoted function names and the all-frames marker', () => {
    expect(parseFilter(':"my fn"')).toEqual({ kind: 'function', name: 'my fn' });
    expect(parseFilter('*')).toEqual({ kind: 'all' });
  });

  test('reports where the expression went wrong', () => {
    const error = syntaxError('"@MyPkg" &&');
    expect(error.column).toBe(11);
    expect(error.message).toBe('Unexpected end of filter at column 12 of filter: "@MyPkg" &&');

    expect(syntaxError('(Int').message).toBe("Expected ')' but found end of input at column 5 of filter: (Int");
    expect(syntaxError('Int Float').message).toBe("Unexpected 'Float' at column 5 of filter: Int Float");
    expect(syntaxError(':iterate:3').message).toBe(
      'A function filter cannot take a size or line set at column 9 of filter: :iterate:3',
    );
  });

  test('rejects empty ranges, bad characters, unterminated literals and invalid patterns', () => {
    expect(syntaxError('10:5').message).toBe('Empty range 10:5 at column 1 of filter: 10:5');
    expect(syntaxError('#').message).toBe("Unexpected character '#' at column 1 of filter: #");
    expect(syntaxError('"unterminated').column).toBe(0);
    expect(syntaxError('Int || /abc').message).toBe(
      'Unterminated regular expression at column 8 of filter: Int || /abc',
    );
    expect(syntaxError('/[/').message).toMatch(/^Invalid regular expression: /);
  });
});

describe('describeFilter', () => {
  test.each([
    ['"@MyPkg"&&:iterate&&!32', '"@MyPkg" && :iterate && !32'],
    ['A || B && C', 'A || B && C'],
    ['(A || B) && C', '(A || B) && C'],
    ['!(A && B)', '!(A && B)'],
    ['Vec:[8,16]', 'Vec:[8, 16]'],
    ['Vec:8:16', 'Vec:8:16'],
    ["'file.ts':3", '"file.ts":3'],
    [':"my fn"', ':"my fn"'],
    ['*', '*'],
  ])('%s reads back as %s', (expression, expected) => {
    expect(describeFilter(parseFilter(expression))).toBe(expected);
  });

  test('the normalized form parses to the same expression', () => {
    const node = parseFilter('("@Dep":1:9 || /x+/g) && !Uint8Array:[4,8]');
    expect(parseFilter(describeFilter(node))).toEqual(node);
  });
});

describe('intSetHas', () => {
  test('ranges are inclusive and value sets are exact', () => {
    const range = { kind: 'range', from: 10, to: 20 } as const;
    expect([9, 10, 20, 21].map((value) => intSetHas(range, value))).toEqual([false, true, true, false]);
    expect(intSetHas({ kind: 'values', values: [8, 16] }, 16)).toBe(true);
    expect(intSetHas({ kind: 'values', values: [8, 16] }, 12)).toBe(false);
  });
});
