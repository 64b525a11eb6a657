import {
  cleanDateText,
  compareCalendarDates,
  formatCalendarDate,
  parseLenientDate,
} from '../src/parsers/date-parser';
import { DateFormatError } from '../src/utils/error-handler';

const REFERENCE = new Date(2026, 0, 15);
const SEP_2 = { year: 2025, month: 9, day: 2 };

describe('parseLenientDate', () => {
  it.each([
    ['2025-09-02'],
    ['02-09-2025'],
    ['02-Sep-2025'],
    ['02-Sep-25'],
    ['02/09/2025'],
  ])('parses %s in the first pass', (text) => {
    expect(parseLenientDate(text, REFERENCE)).toEqual(SEP_2);
  });

  it.each([
    ['15-Mar-80', { year: 2080, month: 3, day: 15 }],
    ['01-Jan-00', { year: 2000, month: 1, day: 1 }],
    ['31-Dec-99', { year: 2099, month: 12, day: 31 }],
  ])('reads two-digit year %s in the 2000s', (text, expected) => {
    expect(parseLenientDate(text, new Date(2025, 9, 19))).toEqual(expected);
  });

  it('matches month abbreviations regardless of case', () => {
    expect(parseLenientDate('02-SEP-2025', REFERENCE)).toEqual(SEP_2);
    expect(parseLenientDate('02-sep-2025', REFERENCE)).toEqual(SEP_2);
  });

  it('retries with dots and spaces turned into dashes', () => {
    expect(parseLenientDate('02.Sep.2025', REFERENCE)).toEqual(SEP_2);
    expect(parseLenientDate('02 Sep 2025', REFERENCE)).toEqual(SEP_2);
    expect(parseLenientDate('02.09.2025', REFERENCE)).toEqual(SEP_2);
  });

  it('round-trips dd-MM-yyyy output', () => {
    const date = { year: 2024, month: 3, day: 5 };
    const text = formatCalendarDate(date, 'dd-MM-yyyy');
    expect(text).toBe('05-03-2024');
    expect(parseLenientDate(text, REFERENCE)).toEqual(date);
  });

  it('requires two-digit day and month fields', () => {
    expect(() => parseLenientDate('2-9-2025', REFERENCE)).toThrow(DateFormatError);
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseLenientDate('31-02-2025', REFERENCE)).toThrow(DateFormatError);
  });

  it('reports the original text when nothing matches', () => {
    try {
      parseLenientDate('next monday', REFERENCE);
      throw new Error('expected a DateFormatError');
    } catch (error) {
      expect(error).toBeInstanceOf(DateFormatError);
      if (error instanceof DateFormatError) {
        expect(error.input).toBe('next monday');
        expect(error.code).toBe('DATE_FORMAT_ERROR');
        expect(error.message).toBe("Text 'next monday' could not be parsed as a supported date format");
      }
    }
  });
});

describe('cleanDateText', () => {
  it('replaces dots, whitespace and other punctuation with dashes', () => {
    expect(cleanDateText('02.Sep  2025!')).toBe('02-Sep-2025-');
  });

  it('leaves ISO dates unchanged', () => {
    expect(cleanDateText('2024-01-10')).toBe('2024-01-10');
  });
});

describe('calendar date helpers', () => {
  it('orders dates by year, month and day', () => {
    expect(compareCalendarDates({ year: 2024, month: 1, day: 10 }, { year: 2024, month: 1, day: 5 })).toBeGreaterThan(0);
    expect(compareCalendarDates({ year: 2023, month: 12, day: 31 }, { year: 2024, month: 1, day: 1 })).toBeLessThan(0);
    expect(compareCalendarDates(SEP_2, { ...SEP_2 })).toBe(0);
  });

  it('formats ISO by default', () => {
    expect(formatCalendarDate({ year: 2024, month: 1, day: 9 })).toBe('2024-01-09');
  });
});
