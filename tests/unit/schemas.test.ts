/**
 * Unit Tests for option schemas
 */

import { describe, it, expect } from 'vitest';
import {
  parseVirtualCacheOptions,
  parseWorkerChannelOptions,
} from '../../src/validation/schemas.js';
import { ConfigValidationError } from '../../src/core/errors.js';

function validationErrorsOf(fn: () => unknown): readonly string[] | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error.validationErrors;
    }
    throw error;
  }
  throw new Error('expected a ConfigValidationError');
}

describe('option schemas', () => {
  describe('parseWorkerChannelOptions', () => {
    it('should accept an empty object', () => {
      expect(parseWorkerChannelOptions({})).toEqual({});
    });

    it('should trim the name and drop unknown keys', () => {
      expect(parseWorkerChannelOptions({ name: '  orders  ', store: {}, pollIntervalMs: 5 })).toEqual({
        name: 'orders',
        pollIntervalMs: 5,
      });
    });

    it('should reject a zero poll interval', () => {
      expect(validationErrorsOf(() => parseWorkerChannelOptions({ pollIntervalMs: 0 }))).toEqual([
        'pollIntervalMs: pollIntervalMs must be at least 1',
      ]);
    });

    it('should report every invalid field', () => {
      const errors = validationErrorsOf(() =>
        parseWorkerChannelOptions({ name: ' ', shutdownTimeoutMs: -1, statsHistory: 1.5 })
      );

      expect(errors).toHaveLength(3);
      expect(errors).toContain('name: name cannot be empty');
      expect(errors).toContain('shutdownTimeoutMs: duration must be non-negative');
    });

    it('should use a descriptive message', () => {
      expect(() => parseWorkerChannelOptions({ statsHistory: 0 })).toThrow(
        'Invalid worker channel options'
      );
    });
  });

  describe('parseVirtualCacheOptions', () => {
    it('should accept a full set of valid options', () => {
      const options = {
        name: 'customers',
        category: 'lists',
        mergeLimit: 0,
        batchSize: 10,
        prefetchBatches: 0,
        dispatchDelayMs: 0,
        errorRetryCooldownMs: 1000,
        autoCount: false,
      };

      expect(parseVirtualCacheOptions(options)).toEqual(options);
    });

    it('should reject a batch size of zero', () => {
      expect(validationErrorsOf(() => parseVirtualCacheOptions({ batchSize: 0 }))).toEqual([
        'batchSize: batchSize must be at least 1',
      ]);
    });

    it('should reject a delay above five minutes', () => {
      expect(validationErrorsOf(() => parseVirtualCacheOptions({ dispatchDelayMs: 300001 }))).toEqual([
        'dispatchDelayMs: duration cannot exceed 5 minutes (300000ms)',
      ]);
    });

    it('should reject a non-boolean autoCount', () => {
      expect(() => parseVirtualCacheOptions({ autoCount: 'yes' })).toThrow(ConfigValidationError);
    });
  });
});
