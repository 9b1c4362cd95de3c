import { describe, it, expect } from 'vitest';
import {
  parseDuration,
  formatDuration,
  roundTo,
  toGigabytes,
  formatBytes,
  formatCpu,
  formatTimedelta,
} from '../utils/parser.js';

describe('parseDuration', () => {
  it('should return the number directly when given a number', () => {
    expect(parseDuration(5000)).toBe(5000);
    expect(parseDuration(0)).toBe(0);
  });

  it('should parse seconds and minutes', () => {
    expect(parseDuration('30s')).toBe(30000);
    expect(parseDuration('5m')).toBe(300000);
    expect(parseDuration('30m')).toBe(1800000);
  });

  it('should parse hours and milliseconds', () => {
    expect(parseDuration('1h')).toBe(3600000);
    expect(parseDuration('100ms')).toBe(100);
  });

  it('should throw on invalid duration string', () => {
    expect(() => parseDuration('invalid')).toThrow('Invalid duration string: "invalid"');
  });

  it('should throw on empty string', () => {
    expect(() => parseDuration('')).toThrow();
  });
});

describe('formatDuration', () => {
  it('should pick the largest fitting unit', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(5000)).toBe('5s');
    expect(formatDuration(300000)).toBe('5m');
    expect(formatDuration(7200000)).toBe('2h');
    expect(formatDuration(172800000)).toBe('2d');
  });
});

describe('roundTo', () => {
  it('should round to two decimals by default', () => {
    expect(roundTo(1.23456)).toBe(1.23);
    expect(roundTo(1.235)).toBe(1.24);
  });

  it('should accept a custom precision', () => {
    expect(roundTo(1.23456, 3)).toBe(1.235);
    expect(roundTo(7.6, 0)).toBe(8);
  });
});

describe('toGigabytes', () => {
  it('should convert bytes to GiB with two decimals', () => {
    expect(toGigabytes(1073741824)).toBe(1);
    expect(toGigabytes(1610612736)).toBe(1.5);
    expect(toGigabytes(0)).toBe(0);
  });

  it('should round small values', () => {
    // 10 MiB = 0.009765625 GiB
    expect(toGigabytes(10 * 1024 * 1024)).toBe(0.01);
  });
});

describe('formatBytes', () => {
  it('should format zero bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
  });

  it('should format kilobytes and gigabytes', () => {
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1073741824)).toBe('1 GB');
  });
});

describe('formatCpu', () => {
  it('should format with one decimal', () => {
    expect(formatCpu(0)).toBe('0.0%');
    expect(formatCpu(42.345)).toBe('42.3%');
  });
});

describe('formatTimedelta', () => {
  it('should format under a minute', () => {
    expect(formatTimedelta(0)).toBe('0:00:00');
    expect(formatTimedelta(59)).toBe('0:00:59');
  });

  it('should format hours, minutes and seconds', () => {
    expect(formatTimedelta(3723)).toBe('1:02:03');
    expect(formatTimedelta(86399)).toBe('23:59:59');
  });

  it('should prefix days', () => {
    expect(formatTimedelta(86400)).toBe('1 day, 0:00:00');
    expect(formatTimedelta(3 * 86400 + 4 * 3600 + 5 * 60 + 6)).toBe('3 days, 4:05:06');
  });

  it('should drop fractional seconds', () => {
    expect(formatTimedelta(61.9)).toBe('0:01:01');
  });

  it('should clamp negative input to zero', () => {
    expect(formatTimedelta(-5)).toBe('0:00:00');
  });
});
