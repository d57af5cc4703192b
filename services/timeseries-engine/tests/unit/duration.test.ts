import { describe, it, expect } from 'vitest';
import { formatDuration, parseDuration } from '../../src/utils/duration.js';

describe('parseDuration', () => {
  it('parses interval strings', () => {
    expect(parseDuration('7 days')).toBe(604_800_000);
    expect(parseDuration('1 hour')).toBe(3_600_000);
    expect(parseDuration('5m')).toBe(300_000);
    expect(parseDuration('90s')).toBe(90_000);
    expect(parseDuration('10 mins')).toBe(600_000);
    expect(parseDuration('2 weeks')).toBe(1_209_600_000);
    expect(parseDuration('1 year')).toBe(31_536_000_000);
    expect(parseDuration('5ms')).toBe(5);
  });

  it('takes plain millisecond counts', () => {
    expect(parseDuration(1500)).toBe(1500);
    expect(parseDuration('250')).toBe(250);
  });

  it('rejects garbage', () => {
    expect(() => parseDuration('abc')).toThrow('invalid duration');
    expect(() => parseDuration('5 fortnights')).toThrow('unknown duration unit');
    expect(() => parseDuration(-1)).toThrow('invalid duration');
  });
});

describe('formatDuration', () => {
  it('uses the largest whole unit', () => {
    expect(formatDuration(604_800_000)).toBe('7d');
    expect(formatDuration(3_600_000)).toBe('1h');
    expect(formatDuration(90_000)).toBe('90s');
    expect(formatDuration(1500)).toBe('1500ms');
  });
});
