/**
 * @file SamplingPolicy Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { SamplingPolicy } from '../../../src/application/sampling';
import { ConfigurationException } from '../../../src/domain/exceptions';

describe('SamplingPolicy', () => {
  it('should keep everything by default', () => {
    const policy = new SamplingPolicy();

    expect(policy.shouldSample({ route: '/users', status: 200 })).toEqual({
      sampled: true,
      reason: 'rate',
      rate: 1,
    });
  });

  it('should drop everything at rate 0 except server errors', () => {
    const policy = new SamplingPolicy({ sampleRate: 0 });

    expect(policy.shouldSample({ route: '/users', status: 200 }).sampled).toBe(false);
    expect(policy.shouldSample({ route: '/users', status: 503 })).toEqual({
      sampled: true,
      reason: 'error',
      rate: 1,
    });
  });

  it('should apply the rate to 5xx responses when alwaysSampleErrors is off', () => {
    const policy = new SamplingPolicy({ sampleRate: 0, alwaysSampleErrors: false });
    expect(policy.shouldSample({ route: '/users', status: 500 }).sampled).toBe(false);
  });

  it('should exclude routes by prefix and by pattern', () => {
    const policy = new SamplingPolicy({ excludeRoutes: ['/health', /\.png$/] });

    expect(policy.shouldSample({ route: '/healthz' }).reason).toBe('excluded');
    expect(policy.shouldSample({ route: '/static/logo.png' }).sampled).toBe(false);
    expect(policy.shouldSample({ route: '/api/health' }).sampled).toBe(true);
  });

  it('should use the first matching route override', () => {
    const policy = new SamplingPolicy({
      sampleRate: 0,
      routeOverrides: [
        { match: '/checkout', rate: 1 },
        { match: /^\/check/, rate: 0 },
      ],
    });

    expect(policy.shouldSample({ route: '/checkout/pay' })).toEqual({
      sampled: true,
      reason: 'override',
      rate: 1,
    });
    expect(policy.shouldSample({ route: '/checkin' })).toEqual({
      sampled: false,
      reason: 'override',
      rate: 0,
    });
  });

  it('should make repeatable decisions with a seed', () => {
    const decisions = (seed: number): boolean[] => {
      const policy = new SamplingPolicy({ sampleRate: 0.5, seed });
      return Array.from({ length: 50 }, () => policy.shouldSample({ route: '/x' }).sampled);
    };

    expect(decisions(7)).toEqual(decisions(7));
  });

  it('should keep roughly the configured fraction', () => {
    const policy = new SamplingPolicy({ sampleRate: 0.25, seed: 1234 });
    let kept = 0;
    for (let i = 0; i < 10_000; i++) {
      if (policy.shouldSample({ route: '/x' }).sampled) kept++;
    }

    expect(kept).toBeGreaterThan(2200);
    expect(kept).toBeLessThan(2800);
  });

  it('should reject a rate outside [0, 1]', () => {
    expect(() => new SamplingPolicy({ sampleRate: 1.5 })).toThrow(ConfigurationException);
  });
});
