/**
 * Service Configuration Loading Tests
 *
 * @see shared/config/src/service-config.ts
 */

import { describe, it, expect } from '@jest/globals';
import {
  loadServiceConfig,
  readRawServiceConfig,
  describeAccountStore,
  ConfigValidationError,
} from '../../src';

describe('loadServiceConfig', () => {
  describe('defaults', () => {
    it('should apply documented defaults for an empty environment', () => {
      const config = loadServiceConfig({});

      expect(config.rateLimits.gate).toEqual({ requestsPerMinute: 240, burstSize: 10 });
      expect(config.rateLimits.bybit).toEqual({ requestsPerMinute: 120, burstSize: 10 });
      expect(config.rateLimits.default).toEqual({ requestsPerMinute: 30, burstSize: 5 });
      expect(config.retry).toEqual({
        maxAttempts: 3,
        initialDelayMs: 1000,
        maxDelayMs: 60000,
        exponentialBase: 2,
      });
      expect(config.accountPool).toEqual({
        maxAdsPerAccount: 4,
        allocationPolicy: 'most-free-slots',
        store: { kind: 'file', path: 'data/accounts.json' },
      });
      expect(config.transactionCache).toEqual({ ttlMs: 300000, completedStatus: 5 });
      expect(config.worker.concurrency).toBe(5);
    });

    it('should treat blank values as unset', () => {
      const config = loadServiceConfig({ RATE_LIMIT_GATE_RPM: '   ' });
      expect(config.rateLimits.gate.requestsPerMinute).toBe(240);
    });
  });

  describe('overrides', () => {
    it('should read numeric overrides', () => {
      const config = loadServiceConfig({
        RATE_LIMIT_GATE_RPM: '600',
        RATE_LIMIT_BURST_SIZE: '3',
        RETRY_MAX_ATTEMPTS: '7',
        RETRY_EXPONENTIAL_BASE: '1.5',
        MAX_ADS_PER_ACCOUNT: '2',
        WORKER_CONCURRENCY: '12',
      });

      expect(config.rateLimits.gate).toEqual({ requestsPerMinute: 600, burstSize: 3 });
      expect(config.rateLimits.bybit.burstSize).toBe(3);
      expect(config.retry.maxAttempts).toBe(7);
      expect(config.retry.exponentialBase).toBe(1.5);
      expect(config.accountPool.maxAdsPerAccount).toBe(2);
      expect(config.worker.concurrency).toBe(12);
    });

    it('should build a redis store from REDIS_URL and ACCOUNT_STORE_KEY', () => {
      const config = loadServiceConfig({
        ACCOUNT_STORE: 'redis',
        REDIS_URL: 'redis://cache:6380',
        ACCOUNT_STORE_KEY: 'test:accounts',
      });

      expect(config.accountPool.store).toEqual({
        kind: 'redis',
        url: 'redis://cache:6380',
        key: 'test:accounts',
      });
      expect(describeAccountStore(config.accountPool.store)).toBe('redis:test:accounts');
    });

    it('should accept the lowest-id allocation policy', () => {
      const config = loadServiceConfig({ ACCOUNT_ALLOCATION_POLICY: 'lowest-id' });
      expect(config.accountPool.allocationPolicy).toBe('lowest-id');
    });
  });

  describe('validation', () => {
    it('should reject a non-numeric rate limit', () => {
      expect(() => loadServiceConfig({ RATE_LIMIT_GATE_RPM: 'fast' })).toThrow(ConfigValidationError);
    });

    it('should name every failing path', () => {
      let caught: unknown;
      try {
        loadServiceConfig({ RATE_LIMIT_GATE_RPM: '0', RETRY_MAX_ATTEMPTS: '-1' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      if (caught instanceof ConfigValidationError) {
        const paths = caught.issues.map((issue) => issue.path);
        expect(paths).toContain('rateLimits.gate.requestsPerMinute');
        expect(paths).toContain('retry.maxAttempts');
        expect(caught.message).toContain('Config validation failed for service config:');
      }
    });

    it('should reject maxDelayMs below initialDelayMs', () => {
      expect(() =>
        loadServiceConfig({ RETRY_INITIAL_DELAY_MS: '5000', RETRY_MAX_DELAY_MS: '100' })
      ).toThrow('retry.maxDelayMs');
    });

    it('should reject an unknown store kind', () => {
      expect(() => loadServiceConfig({ ACCOUNT_STORE: 'sqlite' })).toThrow(ConfigValidationError);
    });

    it('should reject an unknown allocation policy', () => {
      expect(() => loadServiceConfig({ ACCOUNT_ALLOCATION_POLICY: 'random' })).toThrow(
        'accountPool.allocationPolicy'
      );
    });
  });

  describe('readRawServiceConfig', () => {
    it('should keep malformed numbers as NaN for the schema to reject', () => {
      const raw = readRawServiceConfig({ WORKER_CONCURRENCY: 'many' });
      expect(raw.worker).toEqual({ concurrency: NaN });
    });
  });
});
