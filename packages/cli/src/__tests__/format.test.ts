import { describe, it, expect, vi } from 'vitest';

// Mock chalk to return plain text so we can test string content
vi.mock('chalk', () => {
  const handler: ProxyHandler<object> = {
    get(_target, prop) {
      if (prop === 'default') return chainable;
      return chainable;
    },
    apply(_target, _thisArg, args) {
      return String(args[0]);
    },
  };

  const chainable: unknown = new Proxy(function () {} as object, handler);

  return { default: chainable };
});

// Import after mocks
import {
  formatGb,
  formatPercentDisplay,
  formatRate,
  formatTimestamp,
  formatUsage,
} from '../utils/format.js';

describe('formatPercentDisplay', () => {
  it('should format with one decimal and a percent sign', () => {
    expect(formatPercentDisplay(12.34)).toBe('12.3%');
    expect(formatPercentDisplay(0)).toBe('0.0%');
    expect(formatPercentDisplay(100)).toBe('100.0%');
  });
});

describe('formatGb', () => {
  it('should show whole gigabytes without decimals', () => {
    expect(formatGb(8)).toBe('8 GB');
  });

  it('should keep up to two decimals', () => {
    expect(formatGb(1.5)).toBe('1.5 GB');
  });

  it('should switch to a smaller unit below one gigabyte', () => {
    expect(formatGb(0.5)).toBe('512 MB');
  });

  it('should format zero', () => {
    expect(formatGb(0)).toBe('0 B');
  });
});

describe('formatRate', () => {
  it('should use kbit/s below 1024', () => {
    expect(formatRate(8)).toBe('8.00 kbit/s');
  });

  it('should use Mbit/s from 1024 up', () => {
    expect(formatRate(1024)).toBe('1.00 Mbit/s');
    expect(formatRate(2560)).toBe('2.50 Mbit/s');
  });
});

describe('formatTimestamp', () => {
  it('should render the timestamp in local time', () => {
    const local = new Date(2026, 0, 2, 3, 4, 5);

    expect(formatTimestamp(local.toISOString())).toBe('2026-01-02 03:04:05');
  });

  it('should return unparseable input unchanged', () => {
    expect(formatTimestamp('not a date')).toBe('not a date');
  });
});

describe('formatUsage', () => {
  it('should combine used, total and percentage', () => {
    expect(formatUsage(2, 8, 25)).toBe('2 GB / 8 GB (25.0%)');
  });
});
