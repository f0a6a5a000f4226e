/**
 * WAVE PATTERN VALIDATION
 *
 * A wave pattern is a run of pivot points labelled with a kind. Validity is
 * decided once, when the pattern is built, from the Elliott Wave rules below:
 *
 * - Wave 2 never retraces beyond the start of Wave 1
 * - Wave 3 is longer than Wave 1 or Wave 5
 * - Wave 3 is never the shortest of Waves 1, 3 and 5
 * - Wave 4 does not enter Wave 1's price territory
 *
 * Corrective and diagonal patterns are only checked for length.
 */

import type { PivotPoint, TargetRange, WaveKind, WavePatternLike } from '@/types/shared';
import { FIBONACCI_RATIOS } from '@/utils/fibonacci';

export type ImpulseRule = 'wave2-retrace' | 'wave3-longer' | 'wave3-not-shortest' | 'wave4-overlap';

export const IMPULSE_RULES: Record<ImpulseRule, string> = {
  'wave2-retrace': 'Wave 2 must not retrace beyond the start of Wave 1',
  'wave3-longer': 'Wave 3 must be longer than Wave 1 or Wave 5',
  'wave3-not-shortest': 'Wave 3 must not be the shortest of Waves 1, 3 and 5',
  'wave4-overlap': 'Wave 4 must not enter the price territory of Wave 1'
};

// Minimum number of points for each pattern kind
export const MIN_POINTS: Record<WaveKind, number> = {
  impulse: 6,
  corrective: 4,
  diagonal: 6,
  motive: 0
};

/**
 * Check the impulse rules against the first six points, stopping at the first
 * violation to mirror the validity decision.
 */
const findImpulseViolation = (prices: readonly number[]): ImpulseRule | null => {
  const [p0, , p2, , p4, p5] = prices;

  if (p2 <= p0) {
    return 'wave2-retrace';
  }

  const wave1Length = Math.abs(p2 - p0);
  const wave3Length = Math.abs(p4 - p2);
  const wave5Length = Math.abs(p5 - p4);

  if (!(wave3Length > wave1Length || wave3Length > wave5Length)) {
    return 'wave3-longer';
  }

  if (wave3Length < Math.min(wave1Length, wave5Length)) {
    return 'wave3-not-shortest';
  }

  // Only the monotone up/down case is checked
  const rising = p0 < p2 && p4 < p2;
  const falling = p0 > p2 && p4 > p2;
  if (rising || falling) {
    if ((p0 < p2 && p4 < p0) || (p0 > p2 && p4 > p0)) {
      return 'wave4-overlap';
    }
  }

  return null;
};

export class WavePattern implements WavePatternLike {
  readonly points: readonly PivotPoint[];
  readonly isValid: boolean;

  constructor(readonly kind: WaveKind, points: readonly PivotPoint[]) {
    this.points = [...points];
    this.isValid = this.validate();
  }

  /**
   * Names of the impulse rules this pattern breaks (empty for other kinds,
   * or when there are too few points to evaluate them)
   */
  getRuleViolations(): ImpulseRule[] {
    if (this.kind !== 'impulse' || this.points.length < MIN_POINTS.impulse) {
      return [];
    }
    const violation = findImpulseViolation(this.prices());
    return violation ? [violation] : [];
  }

  /**
   * Project the next price range from this pattern.
   * After an impulse a correction of 38.2%-61.8% of the move is expected;
   * after a correction a continuation of 100%-161.8% of it.
   */
  getNextTarget(): TargetRange | null {
    if (!this.isValid) {
      return null;
    }

    const prices = this.prices();
    const first = prices[0];
    const last = prices[prices.length - 1];
    const waveLength = Math.abs(last - first);

    if (this.kind === 'impulse' && prices.length >= 5) {
      const direction = last > first ? 1 : -1;
      return [
        last - direction * FIBONACCI_RATIOS.correctionNear * waveLength,
        last - direction * FIBONACCI_RATIOS.correctionFar * waveLength
      ];
    }

    if (this.kind === 'corrective' && prices.length >= 3) {
      // Continue opposite to the correction
      const direction = last < first ? 1 : -1;
      return [
        last + direction * FIBONACCI_RATIOS.continuationNear * waveLength,
        last + direction * FIBONACCI_RATIOS.continuationFar * waveLength
      ];
    }

    return null;
  }

  private prices(): number[] {
    return this.points.map(point => point.price);
  }

  private validate(): boolean {
    if (this.points.length < MIN_POINTS[this.kind]) {
      return false;
    }

    switch (this.kind) {
      case 'impulse':
        return findImpulseViolation(this.prices()) === null;
      case 'corrective':
      case 'diagonal':
      case 'motive':
        return true;
    }
  }
}
