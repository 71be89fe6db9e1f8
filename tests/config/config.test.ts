/**
 * @fileoverview Tests for environment configuration parsing.
 * @module tests/config/config.test
 */
import { describe, expect, it } from 'vitest';

import { parseConfig } from '@/config/index.js';
import { ErrorCode } from '@/types-global/errors.js';

describe('parseConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(parseConfig({})).toEqual({
      environment: 'development',
      logLevel: 'info',
      systemhcMinProbability: 0.99,
      includeIedbQualitative: true,
    });
  });

  it('reads every supported variable', () => {
    expect(
      parseConfig({
        NODE_ENV: 'production',
        LOG_LEVEL: 'debug',
        SYSTEMHC_MIN_PROBABILITY: '0.9',
        IEDB_INCLUDE_QUALITATIVE: 'false',
      }),
    ).toEqual({
      environment: 'production',
      logLevel: 'debug',
      systemhcMinProbability: 0.9,
      includeIedbQualitative: false,
    });
  });

  it('accepts 1 and 0 as boolean flags', () => {
    expect(parseConfig({ IEDB_INCLUDE_QUALITATIVE: '0' })).toMatchObject({
      includeIedbQualitative: false,
    });
    expect(parseConfig({ IEDB_INCLUDE_QUALITATIVE: '1' })).toMatchObject({
      includeIedbQualitative: true,
    });
  });

  it('rejects out-of-range values with a configuration error', () => {
    expect(() => parseConfig({ SYSTEMHC_MIN_PROBABILITY: '2' })).toThrow(
      expect.objectContaining({
        code: ErrorCode.ConfigurationError,
        message:
          'Invalid environment configuration (SYSTEMHC_MIN_PROBABILITY: Number must be less than or equal to 1)',
      }),
    );
  });
});
