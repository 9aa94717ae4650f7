/**
 * @file LatencyHistogram Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  LatencyHistogram,
  bucketIndex,
  bucketValue,
} from '../../../src/application/stats';

describe('LatencyHistogram', () => {
  describe('bucket layout', () => {
    it('should keep values below 128 exact', () => {
      expect(bucketIndex(0)).toBe(0);
      expect(bucketIndex(127)).toBe(127);
      expect(bucketValue(127)).toBe(127);
    });

    it('should split each power-of-two range into 64 sub-buckets', () => {
      expect(bucketIndex(128)).toBe(128);
      expect(bucketIndex(129)).toBe(128);
      expect(bucketIndex(255)).toBe(191);
      expect(bucketIndex(256)).toBe(192);
      expect(bucketValue(128)).toBe(129);
      expect(bucketValue(191)).toBe(255);
      expect(bucketValue(192)).toBe(258);
    });

    it('should report values within 1/128 of the recorded value', () => {
      const samples = [128, 1000, 65_535, 65_536, 1_234_567, 2 ** 40, 987_654_321_012];
      for (const value of samples) {
        const reported = bucketValue(bucketIndex(value));
        expect(Math.abs(reported - value) / value).toBeLessThanOrEqual(1 / 128);
      }
    });
  });

  describe('percentiles', () => {
    it('should use nearest rank over 1..100', () => {
      const histogram = new LatencyHistogram();
      for (let ns = 1; ns <= 100; ns++) histogram.record(ns);

      expect(histogram.percentiles([0.5, 0.9, 0.95, 0.99, 1])).toEqual([50, 90, 95, 99, 100]);
      expect(histogram.percentile(0)).toBe(1);
      expect(histogram.count).toBe(100);
    });

    it('should clamp reported values to the recorded range', () => {
      const histogram = new LatencyHistogram();
      histogram.record(1_000_000);

      expect(histogram.percentile(0.5)).toBe(1_000_000);
      expect(histogram.min).toBe(1_000_000);
      expect(histogram.max).toBe(1_000_000);
    });

    it('should return zeros when empty', () => {
      const histogram = new LatencyHistogram();
      expect(histogram.percentiles([0.5, 0.99])).toEqual([0, 0]);
      expect(histogram.min).toBe(0);
      expect(histogram.max).toBe(0);
    });

    it('should combine histograms on merge', () => {
      const low = new LatencyHistogram();
      const high = new LatencyHistogram();
      [1, 2, 3].forEach((v) => low.record(v));
      [10, 20].forEach((v) => high.record(v));

      low.merge(high);

      expect(low.count).toBe(5);
      expect(low.percentile(0.5)).toBe(3);
      expect(low.max).toBe(20);
    });

    it('should count negative values as zero', () => {
      const histogram = new LatencyHistogram();
      histogram.record(-5);
      expect(histogram.percentile(1)).toBe(0);
    });
  });
});
