import { describe, it, expect } from 'vitest';
import {
  SENTINEL_VERSION,
  SENTINEL_ENDPOINTS,
  RESERVED_PORT_RANGES,
  PORT_RANGE_MIN,
  PORT_RANGE_MAX,
  PORT_FALLBACK_MIN,
  PORT_FALLBACK_MAX,
  CREDENTIAL_ALPHABET,
  CREDENTIAL_LENGTH,
} from '../constants.js';

describe('constants', () => {
  it('should use a semver version', () => {
    expect(SENTINEL_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('should list every agent endpoint once', () => {
    expect(new Set(SENTINEL_ENDPOINTS).size).toBe(SENTINEL_ENDPOINTS.length);
    expect([...SENTINEL_ENDPOINTS].sort()).toEqual(['/health', '/info', '/metrics', '/reboot', '/update']);
  });

  it('should keep reserved ranges well-formed', () => {
    for (const [start, end] of RESERVED_PORT_RANGES) {
      expect(start).toBeLessThanOrEqual(end);
    }
  });

  it('should keep the fallback range inside the search range and outside reserved ranges', () => {
    expect(PORT_FALLBACK_MIN).toBeGreaterThanOrEqual(PORT_RANGE_MIN);
    expect(PORT_FALLBACK_MAX).toBeLessThanOrEqual(PORT_RANGE_MAX);
    for (const [start, end] of RESERVED_PORT_RANGES) {
      expect(end < PORT_FALLBACK_MIN || start > PORT_FALLBACK_MAX).toBe(true);
    }
  });

  it('should generate credentials from letters and digits only', () => {
    expect(CREDENTIAL_ALPHABET).toMatch(/^[A-Za-z0-9]{62}$/);
    expect(CREDENTIAL_LENGTH).toBe(8);
  });
});
