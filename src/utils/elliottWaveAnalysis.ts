/**
 * ELLIOTT WAVE ANALYSIS
 *
 * Elliott Wave Theory analyzes market cycles through recurring wave patterns:
 * five waves in the direction of the main trend (1-5) followed by a three-wave
 * correction (A-B-C).
 *
 * The analyzer owns a price series and:
 * 1. Finds pivot points with a zigzag filter (local extrema as fallback)
 * 2. Scans every window of pivots for impulse and corrective patterns
 * 3. Classifies the most recent stretch of prices as the current wave
 * 4. Turns the current wave into a directional prediction
 */

import type {
  CurrentWave,
  PivotPoint,
  Prediction,
  PriceField,
  PriceObservation,
  PriceSeries,
  WaveKind,
  WaveRecords
} from '@/types/shared';
import { InsufficientDataError } from '@/lib/errors';
import { type Logger, silentLogger } from '@/lib/logger';
import { localExtrema, zigzag } from '@/utils/pivots';
import { MIN_POINTS, WavePattern } from '@/utils/wavePattern';

export const DEFAULT_ZIGZAG_THRESHOLD = 0.03;
export const DEFAULT_WINDOW_SIZE = 10;
export const DEFAULT_LOOK_BACK = 30;

// Zigzag threshold used when classifying the current wave
const CURRENT_WAVE_THRESHOLD = 0.03;

// Below this many zigzag pivots the local extrema are used instead
const MIN_ZIGZAG_PIVOTS = 5;

// Fixed confidence per prediction label
export const PREDICTION_CONFIDENCE = {
  'correction-expected': 0.7,
  'trend-continuation-expected': 0.6,
  undetermined: 0
} as const;

export interface WaveAnalyzerOptions {
  logger?: Logger;
}

const emptyWaveRecords = (): WaveRecords => ({
  impulse: [],
  corrective: [],
  motive: [],
  diagonal: []
});

export class WaveAnalyzer {
  private readonly prices: number[];
  private readonly logger: Logger;

  constructor(
    series: PriceSeries,
    readonly priceField: PriceField = 'close',
    options: WaveAnalyzerOptions = {}
  ) {
    if (series.length === 0) {
      throw new InsufficientDataError('Cannot analyze an empty price series', 0, 1);
    }

    this.prices = series.map(observation => observation[priceField]);
    this.logger = options.logger ?? silentLogger;
  }

  get length(): number {
    return this.prices.length;
  }

  /**
   * Extend the analyzed series by one observation.
   * Every query afterwards answers as a fresh analyzer over the extended series would.
   */
  append(observation: PriceObservation): void {
    this.prices.push(observation[this.priceField]);
  }

  /**
   * Identify every impulse and corrective pattern in the series
   *
   * @param zigzagThreshold - Minimum reversal for the zigzag filter (0.03 = 3%)
   * @param windowSize - Neighbourhood for the local extrema fallback
   * @returns Valid patterns grouped by kind, each numbered within its kind
   */
  analyze(zigzagThreshold: number = DEFAULT_ZIGZAG_THRESHOLD, windowSize: number = DEFAULT_WINDOW_SIZE): WaveRecords {
    let pivots = zigzag(this.prices, zigzagThreshold);
    this.logger.debug(`Found ${pivots.length} pivots with ${(zigzagThreshold * 100).toFixed(1)}% threshold`);

    if (pivots.length < MIN_ZIGZAG_PIVOTS) {
      pivots = localExtrema(this.prices, windowSize);
      this.logger.debug(`Too few zigzag pivots, using ${pivots.length} local extrema (window ${windowSize})`);
    }

    const waves = emptyWaveRecords();
    const impulseSize = MIN_POINTS.impulse;
    const correctiveSize = MIN_POINTS.corrective;

    // Exhaustive, overlapping scan: every start offset gets a chance
    for (let i = 0; i + correctiveSize <= pivots.length; i++) {
      if (i + impulseSize <= pivots.length) {
        this.record(waves, 'impulse', pivots.slice(i, i + impulseSize));
      }
      this.record(waves, 'corrective', pivots.slice(i, i + correctiveSize));
    }

    this.logger.debug(`Identified ${waves.impulse.length} impulse and ${waves.corrective.length} corrective patterns`);
    return waves;
  }

  /**
   * Classify the last `lookBack` prices as an impulse or corrective wave
   *
   * @returns The first structure that validates, or null when none does
   */
  findCurrentWave(lookBack: number = DEFAULT_LOOK_BACK): CurrentWave | null {
    const windowLength = Math.min(Math.max(lookBack, 0), this.prices.length);
    const offset = this.prices.length - windowLength;
    const recent = this.prices.slice(offset);

    const indices = zigzag(recent, CURRENT_WAVE_THRESHOLD).map(index => offset + index);
    if (indices.length < 3) {
      return null;
    }

    const points = this.toPoints(indices);

    if (points.length >= 5) {
      const impulse = new WavePattern('impulse', points);
      if (impulse.isValid) {
        return { kind: 'impulse', indices, points, pattern: impulse, target: impulse.getNextTarget() };
      }
    }

    const corrective = new WavePattern('corrective', points);
    if (corrective.isValid) {
      return { kind: 'corrective', indices, points, pattern: corrective, target: corrective.getNextTarget() };
    }

    return null;
  }

  /**
   * Predict the next move from the current wave.
   * An impulse is followed by a correction; a correction by a continuation of the trend.
   */
  predictNextMove(lookBack: number = DEFAULT_LOOK_BACK): Prediction {
    const currentWave = this.findCurrentWave(lookBack);

    if (!currentWave) {
      return { label: 'undetermined', confidence: PREDICTION_CONFIDENCE.undetermined, target: null };
    }

    switch (currentWave.kind) {
      case 'impulse':
        return {
          label: 'correction-expected',
          confidence: PREDICTION_CONFIDENCE['correction-expected'],
          target: currentWave.target
        };
      case 'corrective':
        return {
          label: 'trend-continuation-expected',
          confidence: PREDICTION_CONFIDENCE['trend-continuation-expected'],
          target: currentWave.target
        };
    }
  }

  private toPoints(indices: readonly number[]): PivotPoint[] {
    return indices.map(index => ({ index, price: this.prices[index] }));
  }

  private record(waves: WaveRecords, kind: WaveKind, indices: number[]): void {
    const points = this.toPoints(indices);
    const pattern = new WavePattern(kind, points);

    if (pattern.isValid) {
      waves[kind].push({
        kind,
        indices,
        points,
        pattern,
        waveCount: waves[kind].length + 1
      });
    }
  }
}
