import {describe, expect, test} from 'vitest';
import {LinearBucket} from './bucket.ts';
import {Category, formatNumber, parseNumber} from './category.ts';
import {ParseError} from './errors.ts';
import {Histogram} from './histogram.ts';
import {splitNvp} from './nvp.ts';

const LINES = [
  'pause=10 type=scavenge',
  'pause=20 type=mark',
  'pause=5 type=scavenge',
];

function feed(category: Category, lines: readonly string[]) {
  for (const line of lines) {
    category.processEntry(splitNvp(line));
  }
}

describe('Category', () => {
  test('summarizes values with a histogram', () => {
    const category = new Category(
      'pause',
      new Histogram(new LinearBucket(5), true),
    );
    feed(category, LINES);
    expect(category.values).toEqual([10, 20, 5]);
    expect(category.render()).toBe(
      [
        'pause',
        '  len: 3',
        '  min: 5.0',
        '  max: 20.0',
        '  avg: 11.666666666666666',
        '  [0,5[: 0',
        '  [5,10[: 1',
        '  [10,15[: 1',
        '  [15,20[: 0',
        '  [20,25[: 1',
      ].join('\n'),
    );
  });

  test('a key that never appears renders only its length', () => {
    const category = new Category(
      'missing_key',
      new Histogram(new LinearBucket(5), true),
    );
    feed(category, LINES);
    expect(category.count).toBe(0);
    expect(category.render()).toBe('missing_key\n  len: 0');
  });

  test('without a histogram only statistics are rendered', () => {
    const category = new Category('pause');
    feed(category, LINES);
    expect(category.render()).toBe(
      'pause\n  len: 3\n  min: 5.0\n  max: 20.0\n  avg: 11.666666666666666',
    );
    expect(category.render()).not.toMatch(/\[/);
  });

  test('fractional values', () => {
    const category = new Category('mark');
    feed(category, ['mark=1.5', 'mark=2.25', 'other=9']);
    expect(category.render()).toBe(
      'mark\n  len: 2\n  min: 1.5\n  max: 2.25\n  avg: 1.875',
    );
  });

  test('histogram total equals the number of values', () => {
    const histogram = new Histogram(new LinearBucket(2), false);
    const category = new Category('v', histogram);
    feed(category, ['v=1', 'v=3', 'x=1', 'v=3.5', '', 'v=100']);
    expect(category.count).toBe(4);
    expect(histogram.totalCount()).toBe(category.count);
  });

  test('a non-numeric value throws and records nothing', () => {
    const histogram = new Histogram(new LinearBucket(5), true);
    const category = new Category('pause', histogram);
    category.processEntry(splitNvp('pause=12'));
    expect(() => category.processEntry(splitNvp('pause=fast'))).toThrow(
      new ParseError('pause', 'fast'),
    );
    expect(category.values).toEqual([12]);
    expect(histogram.totalCount()).toBe(1);
  });

  test('a value beyond the histogram range throws and records nothing', () => {
    const histogram = new Histogram(new LinearBucket(0.5), false);
    const category = new Category('pause', histogram);
    category.processEntry(splitNvp('pause=1'));
    expect(() => category.processEntry(splitNvp('pause=1e308'))).toThrow(
      'Value of "pause" is out of histogram range: "1e308"',
    );
    expect(category.values).toEqual([1]);
    expect(histogram.totalCount()).toBe(1);
  });

  test('without a histogram any finite value is recorded', () => {
    const category = new Category('pause');
    category.processEntry(splitNvp('pause=1e308'));
    expect(category.render()).toBe(
      'pause\n  len: 1\n  min: 1e+308\n  max: 1e+308\n  avg: 1e+308',
    );
  });
});

describe('parseNumber', () => {
  test.each<[string, number]>([
    ['10', 10],
    ['-3', -3],
    ['+4', 4],
    ['1.5', 1.5],
    ['.5', 0.5],
    ['2.', 2],
    ['1e3', 1000],
    ['2.5E-1', 0.25],
  ])('%s', (text, expected) => {
    expect(parseNumber('k', text)).toBe(expected);
  });

  test.each([[''], ['abc'], ['0x10'], ['inf'], ['nan'], ['1e999'], ['1-2']])(
    'rejects %j',
    text => {
      expect(() => parseNumber('k', text)).toThrow(ParseError);
    },
  );

  test('error names the key and the text', () => {
    expect(() => parseNumber('pause', 'x')).toThrow(
      'Value of "pause" is not a number: "x"',
    );
  });
});

describe('formatNumber', () => {
  test.each<[number, string]>([
    [5, '5.0'],
    [0, '0.0'],
    [-20, '-20.0'],
    [0.1, '0.1'],
    [35 / 3, '11.666666666666666'],
    [1e15, '1000000000000000.0'],
    [1e16, '1e+16'],
    [-1.5e17, '-1.5e+17'],
    [1e21, '1e+21'],
    [1e-4, '0.0001'],
    [0.00001, '1e-05'],
    [2.5e-7, '2.5e-07'],
    [1e-100, '1e-100'],
  ])('%s', (value, expected) => {
    expect(formatNumber(value)).toBe(expected);
  });
});
