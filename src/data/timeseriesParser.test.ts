import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseTimeSeriesCsv } from './timeseriesParser';
import { InvalidTableError } from '../errors';

describe('parseTimeSeriesCsv', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses header and rows with numeric conversion', () => {
    const text = 'Stock,yr,bbmsy.m,ffmsy.m\r\ncod,2000,1.5,0.5\r\n\r\nhake,2001,NA,\r\n';

    expect(parseTimeSeriesCsv(text)).toEqual({
      columns: ['Stock', 'yr', 'bbmsy.m', 'ffmsy.m'],
      rows: [
        ['cod', 2000, 1.5, 0.5],
        ['hake', 2001, null, null]
      ]
    });
  });

  it('handles quoted fields containing delimiters and quotes', () => {
    const text = 'stock,year,note\n"Cod, north",2000,"say ""hi"""\n';

    expect(parseTimeSeriesCsv(text).rows).toEqual([['Cod, north', 2000, 'say "hi"']]);
  });

  it('keeps stock ids in the first column as text', () => {
    const text = 'stock,year,bbmsy.m\n007,2000,1.5\n7,2000,0.5\n12345678901234567891,2000,1\n1e3,2000,2\n';

    expect(parseTimeSeriesCsv(text).rows).toEqual([
      ['007', 2000, 1.5],
      ['7', 2000, 0.5],
      ['12345678901234567891', 2000, 1],
      ['1e3', 2000, 2]
    ]);
  });

  it('supports other delimiters', () => {
    expect(parseTimeSeriesCsv('stock;year\ncod;1999', ';').rows).toEqual([['cod', 1999]]);
  });

  it('returns no rows for a header-only file', () => {
    expect(parseTimeSeriesCsv('stock,year\n')).toEqual({ columns: ['stock', 'year'], rows: [] });
  });

  it('reports the line with the wrong field count', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => parseTimeSeriesCsv('stock,year\ncod,2000\ncod\n')).toThrow(
      'Failed to parse time series file: line 3: expected 2 fields, got 1'
    );
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('fails on an empty file', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => parseTimeSeriesCsv('  \n')).toThrow(InvalidTableError);
  });

  it('fails on an unterminated quote', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => parseTimeSeriesCsv('stock,year\n"cod,2000\n')).toThrow(
      'Failed to parse time series file: line 2: unterminated quoted field'
    );
  });
});
