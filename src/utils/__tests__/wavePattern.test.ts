import type { PivotPoint } from '@/types/shared';
import { WavePattern } from '@/utils/wavePattern';

const toPoints = (prices: number[]): PivotPoint[] => prices.map((price, index) => ({ index, price }));

describe('WavePattern', () => {
  describe('impulse', () => {
    it('accepts a rising impulse that follows every rule', () => {
      const pattern = new WavePattern('impulse', toPoints([100, 130, 110, 160, 140, 200]));

      expect(pattern.isValid).toBe(true);
      expect(pattern.getRuleViolations()).toEqual([]);
    });

    it('rejects wave 2 retracing to the start of wave 1', () => {
      const pattern = new WavePattern('impulse', toPoints([100, 120, 100, 160, 140, 200]));

      expect(pattern.isValid).toBe(false);
      expect(pattern.getRuleViolations()).toEqual(['wave2-retrace']);
    });

    it('rejects a wave 3 no longer than waves 1 and 5', () => {
      const pattern = new WavePattern('impulse', toPoints([100, 115, 110, 125, 120, 130]));

      expect(pattern.isValid).toBe(false);
      expect(pattern.getRuleViolations()).toEqual(['wave3-longer']);
    });

    it('rejects wave 4 falling below the start of wave 1', () => {
      const pattern = new WavePattern('impulse', toPoints([100, 140, 130, 150, 90, 100]));

      expect(pattern.isValid).toBe(false);
      expect(pattern.getRuleViolations()).toEqual(['wave4-overlap']);
    });

    it('needs six points', () => {
      const pattern = new WavePattern('impulse', toPoints([100, 130, 110, 160, 140]));

      expect(pattern.isValid).toBe(false);
      expect(pattern.getRuleViolations()).toEqual([]);
      expect(pattern.getNextTarget()).toBeNull();
    });

    it('projects a 38.2% to 61.8% retracement of the whole move', () => {
      const target = new WavePattern('impulse', toPoints([100, 130, 110, 160, 140, 200])).getNextTarget();

      expect(target).not.toBeNull();
      expect(target?.[0]).toBeCloseTo(161.8, 10);
      expect(target?.[1]).toBeCloseTo(138.2, 10);
    });

    it('uses only the first six points for validation', () => {
      const pattern = new WavePattern('impulse', toPoints([100, 130, 110, 160, 140, 200, 170]));

      expect(pattern.isValid).toBe(true);
      expect(pattern.getNextTarget()?.[0]).toBeCloseTo(143.26, 10);
    });

    it('returns no target when invalid', () => {
      expect(new WavePattern('impulse', toPoints([100, 120, 90, 160, 140, 200])).getNextTarget()).toBeNull();
    });
  });

  describe('corrective', () => {
    it('is valid with four points and invalid with three', () => {
      expect(new WavePattern('corrective', toPoints([100, 80, 90, 70])).isValid).toBe(true);
      expect(new WavePattern('corrective', toPoints([100, 80, 90])).isValid).toBe(false);
    });

    it('projects an upward continuation after a falling correction', () => {
      const target = new WavePattern('corrective', toPoints([100, 80, 90, 70])).getNextTarget();

      expect(target?.[0]).toBe(100);
      expect(target?.[1]).toBeCloseTo(118.54, 10);
    });

    it('projects a downward continuation after a rising correction', () => {
      const target = new WavePattern('corrective', toPoints([50, 60, 55, 65])).getNextTarget();

      expect(target?.[0]).toBe(50);
      expect(target?.[1]).toBeCloseTo(40.73, 10);
    });

    it('reports no rule violations', () => {
      expect(new WavePattern('corrective', toPoints([100, 120, 90, 160])).getRuleViolations()).toEqual([]);
    });
  });

  it('validates diagonal patterns by length only', () => {
    expect(new WavePattern('diagonal', toPoints([1, 2, 3, 4, 5, 6])).isValid).toBe(true);
    expect(new WavePattern('diagonal', toPoints([1, 2, 3, 4, 5])).isValid).toBe(false);
    expect(new WavePattern('diagonal', toPoints([1, 2, 3, 4, 5, 6])).getNextTarget()).toBeNull();
  });

  it('treats motive patterns as always valid', () => {
    expect(new WavePattern('motive', []).isValid).toBe(true);
  });

  it('keeps its own copy of the points', () => {
    const points = toPoints([100, 80, 90, 70]);
    const pattern = new WavePattern('corrective', points);
    points.pop();

    expect(pattern.points).toHaveLength(4);
  });
});
