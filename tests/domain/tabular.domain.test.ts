import { parseLenientJson, replaceNonFiniteTokens } from '../../src/dispatch/application/lenientJson';
import { rowsToColumns, toCell } from '../../src/dispatch/application/tabular';

describe('rowsToColumns', () => {
  it('keeps first-seen column order and pads missing cells with null', () => {
    expect(
      rowsToColumns([
        { date: '2024-05-26T13:01:00', speed: 290 },
        { date: '2024-05-26T13:01:01', rpm: 11000 },
      ]),
    ).toEqual({
      date: ['2024-05-26T13:01:00', '2024-05-26T13:01:01'],
      speed: [290, null],
      rpm: [null, 11000],
    });
  });

  it('gives an empty table for an empty array', () => {
    expect(rowsToColumns([])).toEqual({});
  });

  it('returns null for anything but an array of records', () => {
    expect(rowsToColumns({ rows: [] })).toBeNull();
    expect(rowsToColumns([1, 2])).toBeNull();
    expect(rowsToColumns([{ a: 1 }, null])).toBeNull();
  });
});

describe('toCell', () => {
  it('maps non-finite numbers and undefined to null', () => {
    expect(toCell(Number.NaN)).toBeNull();
    expect(toCell(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toCell(undefined)).toBeNull();
    expect(toCell(0)).toBe(0);
    expect(toCell('NaN')).toBe('NaN');
  });
});

describe('parseLenientJson', () => {
  it('parses standard JSON untouched', () => {
    expect(parseLenientJson('{"a":[1,"Infinity"]}')).toEqual({ a: [1, 'Infinity'] });
  });

  it('replaces bare non-finite tokens outside strings only', () => {
    expect(replaceNonFiniteTokens('[NaN,"NaN",-Infinity,"a\\"NaN"]')).toBe(
      '[null,"NaN",null,"a\\"NaN"]',
    );
  });

  it('still fails on malformed input', () => {
    expect(() => parseLenientJson('{"a": NaN')).toThrow(SyntaxError);
    expect(() => parseLenientJson('not json')).toThrow(SyntaxError);
  });
});
