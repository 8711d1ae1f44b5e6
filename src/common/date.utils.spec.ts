import { parseIsoInstant } from './date.utils';

describe('parseIsoInstant', () => {
  it('should parse a UTC instant', () => {
    expect(parseIsoInstant('2025-06-20T10:00:00Z')?.toISOString()).toBe(
      '2025-06-20T10:00:00.000Z',
    );
  });

  it('should apply the offset', () => {
    expect(parseIsoInstant('2025-06-20T12:00:00+02:00')?.toISOString()).toBe(
      '2025-06-20T10:00:00.000Z',
    );
  });

  it('should accept fractional seconds and surrounding whitespace', () => {
    expect(parseIsoInstant(' 2025-06-20T10:00:00.250Z ')?.toISOString()).toBe(
      '2025-06-20T10:00:00.250Z',
    );
  });

  it('should accept Feb 29 in a leap year', () => {
    expect(parseIsoInstant('2024-02-29T00:00:00Z')?.toISOString()).toBe(
      '2024-02-29T00:00:00.000Z',
    );
  });

  it('should apply the leap-year rule to years below 100', () => {
    expect(parseIsoInstant('0000-02-29T00:00:00Z')?.toISOString()).toBe(
      '0000-02-29T00:00:00.000Z',
    );
  });

  it.each([
    ['Feb 29 in a century year', '1900-02-29T00:00:00Z'],
    ['no designator', '2025-06-20T10:00:00'],
    ['date only', '2025-06-20'],
    ['space separator', '2025-06-20 10:00:00Z'],
    ['Feb 30', '2025-02-30T00:00:00Z'],
    ['Feb 29 outside a leap year', '2025-02-29T00:00:00Z'],
    ['month 13', '2025-13-01T00:00:00Z'],
    ['hour 24', '2025-06-20T24:00:00Z'],
    ['free text', 'yesterday'],
    ['empty', ''],
  ])('should reject %s', (_label, value) => {
    expect(parseIsoInstant(value)).toBeNull();
  });
});
