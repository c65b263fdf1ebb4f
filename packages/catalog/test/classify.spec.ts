/* packages/catalog/test/classify.spec.ts */
import { describe, it, expect } from 'vitest';
import { classify, parseDate, parseNumber } from '../src';

describe('classify', () => {
  it('treats cost-like names as numeric regardless of content', () => {
    for (const name of ['Cost', 'Total Amount', 'Fuel Charge', 'Unit PRICE']) {
      expect(classify(name, ['n/a', 'pending', ''])).toBe('numeric');
    }
  });

  it('treats ref/tracking/awb names as identifiers even when values are numeric', () => {
    expect(classify('RefNo', ['100234', '100235'])).toBe('identifier');
    expect(classify('Tracking #', ['1Z999'])).toBe('identifier');
    expect(classify('AWB', [123456789])).toBe('identifier');
  });

  it('detects dates from a majority of the sample', () => {
    expect(classify('ShipDate', ['2025-01-05', '2025-02-10', ''])).toBe('date');
    expect(classify('Booked', ['05/01/2025', '12/31/2025', 'unknown'])).toBe('date');
    expect(classify('Delivered', [new Date(2025, 0, 2), new Date(2025, 0, 3)])).toBe('date');
  });

  it('falls back to numeric when values parse as numbers', () => {
    expect(classify('Weight', ['12.5', '1,200', '7'])).toBe('numeric');
    // bare years are numbers, not dates
    expect(classify('Weight', ['2025', '2024'])).toBe('numeric');
  });

  it('defaults to text', () => {
    expect(classify('Status', ['Delivered', 'Pending'])).toBe('text');
    expect(classify('Notes', ['2025-01-01', 'hello', 'world'])).toBe('text');
    expect(classify('Status', [])).toBe('text');
    expect(classify('Status', [null, undefined, '  '])).toBe('text');
  });
});

describe('parseDate', () => {
  it('parses ISO dates as local midnight', () => {
    expect(parseDate('2025-03-15')).toEqual(new Date(2025, 2, 15));
    expect(parseDate('2025-03-15 08:30')).toEqual(new Date(2025, 2, 15, 8, 30));
  });

  it('reads numeric dates month-first unless the first part exceeds 12', () => {
    expect(parseDate('03/04/2025')).toEqual(new Date(2025, 2, 4));
    expect(parseDate('31/12/2025')).toEqual(new Date(2025, 11, 31));
    expect(parseDate('1.2.25')).toEqual(new Date(2025, 0, 2));
  });

  it('parses month names with a year', () => {
    expect(parseDate('5 Jan 2025')).toEqual(new Date(2025, 0, 5));
    expect(parseDate('January 5, 2025')).toEqual(new Date(2025, 0, 5));
    expect(parseDate('Sept 2024')).toEqual(new Date(2024, 8, 1));
  });

  it('rejects impossible dates and bare numbers', () => {
    expect(parseDate('02/30/2025')).toBeNull();
    expect(parseDate('42')).toBeNull();
    expect(parseDate(45000)).toBeNull();
    expect(parseDate('Mayfair Road')).toBeNull();
  });
});

describe('parseNumber', () => {
  it('accepts separators, signs and a currency symbol', () => {
    expect(parseNumber('1,250.50')).toBe(1250.5);
    expect(parseNumber('$99')).toBe(99);
    expect(parseNumber('-3')).toBe(-3);
    expect(parseNumber(7)).toBe(7);
  });

  it('rejects text, blanks and unsafe integers', () => {
    expect(parseNumber('abc')).toBeNull();
    expect(parseNumber('')).toBeNull();
    expect(parseNumber('12345678901234567890')).toBeNull();
    expect(parseNumber(Number.NaN)).toBeNull();
  });
});
