import { describe, it, expect } from 'vitest';
import { formatRfc5322Date, formatShortDate, parseRfc5322Date } from '../../src/mime/date.js';
import { MailParseError } from '../../src/types/errors.js';

describe('RFC 5322 dates', () => {

  describe('parseRfc5322Date', () => {
    it.each([
      ['Tue, 01 Jul 2025 10:15:00 +0200', '2025-07-01T08:15:00.000Z'],
      ['1 Jul 25 10:15 GMT', '2025-07-01T10:15:00.000Z'],
      ['Mon, 30 Jun 2025 23:30:00 -0700 (PDT)', '2025-07-01T06:30:00.000Z'],
      ['Wed, 2 Jul 2025 09:00:00 EST', '2025-07-02T14:00:00.000Z'],
      ['Thu, 3 Jul 1997 12:00:00 +0000', '1997-07-03T12:00:00.000Z'],
      ['3 Jul 97 12:00:00 +0000', '1997-07-03T12:00:00.000Z'],
      ['Tuesday, 1 Jul 2025 10:15:00 +0200', '2025-07-01T08:15:00.000Z'],
    ])('should parse %s', (value, iso) => {
      expect(parseRfc5322Date(value).toISOString()).toBe(iso);
    });

    it('should reject a missing date', () => {
      expect(() => parseRfc5322Date(undefined)).toThrow(MailParseError);
      expect(() => parseRfc5322Date('   ')).toThrow('Message has no Date header');
    });

    it('should reject text that is not a date', () => {
      expect(() => parseRfc5322Date('next tuesday')).toThrow(MailParseError);
    });

    it('should reject days the month does not have', () => {
      expect(() => parseRfc5322Date('31 Feb 2025 10:00:00 +0000')).toThrow('Invalid day of month');
    });

    it('should reject unknown month names', () => {
      expect(() => parseRfc5322Date('1 Foo 2025 10:00:00 +0000')).toThrow('Invalid date');
    });
  });

  describe('formatRfc5322Date', () => {
    it('should produce a value that parses back to the same second', () => {
      const date = new Date(Date.UTC(2025, 6, 1, 8, 15, 30));
      expect(parseRfc5322Date(formatRfc5322Date(date)).getTime()).toBe(date.getTime());
    });

    it('should match the header layout', () => {
      expect(formatRfc5322Date(new Date())).toMatch(
        /^(Sun|Mon|Tue|Wed|Thu|Fri|Sat), \d{2} [A-Z][a-z]{2} \d{4} \d{2}:\d{2}:\d{2} [+-]\d{4}$/
      );
    });
  });

  describe('formatShortDate', () => {
    it('should format M/D/YY in UTC without padding month or day', () => {
      expect(formatShortDate(new Date(Date.UTC(2005, 0, 9)))).toBe('1/9/05');
      expect(formatShortDate(new Date(Date.UTC(2025, 11, 31, 23, 59)))).toBe('12/31/25');
    });
  });
});
