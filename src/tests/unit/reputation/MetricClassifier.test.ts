import {
  classify,
  classifyValue,
  getLatestSample,
  getReputationStatus,
} from '../../../services/reputation/MetricClassifier';
import type { ReputationSeries, ReputationThresholds } from '../../../types/MonitorTypes';

const thresholds: ReputationThresholds = {
  bounce_rate: { warning: 5, critical: 8 },
  complaint_rate: { warning: 0.01, critical: 0.04 },
};

function series(id: ReputationSeries['id'], label: string, samples: Array<[string, number]>): ReputationSeries {
  return {
    id,
    label,
    timestamps: samples.map(([ts]) => new Date(ts)),
    values: samples.map(([, value]) => value),
  };
}

describe('MetricClassifier', () => {
  describe('classifyValue', () => {
    it('should treat both boundaries as inclusive', () => {
      expect(classifyValue(8, 5, 8)).toBe('CRITICAL');
      expect(classifyValue(5, 5, 8)).toBe('WARNING');
      expect(classifyValue(4.99, 5, 8)).toBe('OK');
    });

    it('should check critical before warning when thresholds are equal', () => {
      expect(classifyValue(5, 5, 5)).toBe('CRITICAL');
    });
  });

  describe('getLatestSample', () => {
    it('should pick the most recent sample regardless of order', () => {
      const latest = getLatestSample(
        series('bounce_rate', 'Bounce Rate', [
          ['2026-01-01T00:15:00Z', 2],
          ['2026-01-01T00:30:00Z', 3],
          ['2026-01-01T00:00:00Z', 9],
        ])
      );

      expect(latest).toEqual({ label: 'Bounce Rate', value: 3, timestamp: '2026-01-01T00:30:00.000Z' });
    });

    it('should keep the first sample on timestamp ties', () => {
      const latest = getLatestSample(
        series('bounce_rate', 'Bounce Rate', [
          ['2026-01-01T00:30:00Z', 1],
          ['2026-01-01T00:30:00Z', 7],
        ])
      );

      expect(latest?.value).toBe(1);
    });

    it('should return null for an empty series', () => {
      expect(getLatestSample(series('complaint_rate', 'Complaint Rate', []))).toBeNull();
    });
  });

  describe('classify', () => {
    it('should bucket each series by its latest sample', () => {
      const verdict = classify(
        [
          series('bounce_rate', 'Bounce Rate', [['2026-01-01T00:30:00Z', 9]]),
          series('complaint_rate', 'Complaint Rate', [['2026-01-01T00:30:00Z', 0.02]]),
        ],
        thresholds
      );

      expect(verdict.critical).toEqual([
        { label: 'Bounce Rate', value: 9, threshold: 8, timestamp: '2026-01-01T00:30:00.000Z' },
      ]);
      expect(verdict.warning).toEqual([
        { label: 'Complaint Rate', value: 0.02, threshold: 0.01, timestamp: '2026-01-01T00:30:00.000Z' },
      ]);
      expect(verdict.ok).toEqual([]);
      expect(getReputationStatus(verdict)).toBe('CRITICAL');
    });

    it('should report the warning threshold for OK points', () => {
      const verdict = classify([series('bounce_rate', 'Bounce Rate', [['2026-01-01T00:30:00Z', 3]])], thresholds);

      expect(verdict.ok).toEqual([
        { label: 'Bounce Rate', value: 3, threshold: 5, timestamp: '2026-01-01T00:30:00.000Z' },
      ]);
      expect(getReputationStatus(verdict)).toBe('OK');
    });

    it('should leave series without samples out of every bucket', () => {
      const verdict = classify([series('bounce_rate', 'Bounce Rate', [])], thresholds);

      expect(verdict).toEqual({ critical: [], warning: [], ok: [] });
      expect(getReputationStatus(verdict)).toBeNull();
    });

    it('should produce frozen points', () => {
      const verdict = classify([series('bounce_rate', 'Bounce Rate', [['2026-01-01T00:30:00Z', 6]])], thresholds);

      expect(Object.isFrozen(verdict.warning[0])).toBe(true);
    });
  });
});
