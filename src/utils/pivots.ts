/**
 * PIVOT DETECTION
 *
 * Reduces a price sequence to the indices of its turning points. The primary
 * method is a percentage-reversal (zigzag) filter; local extrema over a fixed
 * window serve as the fallback when the zigzag finds too few pivots.
 */

type TrendDirection = 'up' | 'down';

/**
 * Zigzag state machine fed one price at a time.
 *
 * `zigzag()` below is built on this tracker, so feeding prices incrementally and
 * scanning a whole array produce the same pivots.
 */
export class ZigzagTracker {
  private direction: TrendDirection = 'up';
  private extreme = 0;
  private extremeIndex = -1;
  private readonly turningPoints: number[] = [];
  private count = 0;

  constructor(private readonly threshold: number) {
    if (!Number.isFinite(threshold) || threshold < 0) {
      throw new RangeError(`Zigzag threshold must be a non-negative number, got ${threshold}`);
    }
  }

  /** Number of prices pushed so far */
  get length(): number {
    return this.count;
  }

  push(price: number): void {
    const i = this.count++;

    // First point starts the walk and is always a pivot
    if (i === 0) {
      this.extreme = price;
      this.extremeIndex = 0;
      this.turningPoints.push(0);
      return;
    }

    if (this.direction === 'up') {
      if (price >= this.extreme) {
        this.extreme = price;
        this.extremeIndex = i;
      } else if (price < this.extreme * (1 - this.threshold)) {
        this.reverse('down', price, i);
      }
    } else {
      if (price <= this.extreme) {
        this.extreme = price;
        this.extremeIndex = i;
      } else if (price > this.extreme * (1 + this.threshold)) {
        this.reverse('up', price, i);
      }
    }
  }

  /**
   * Current pivot list, including the running extreme as the final pivot.
   * Does not change the tracker's state.
   */
  pivots(): number[] {
    const result = [...this.turningPoints];
    if (this.extremeIndex >= 0 && result[result.length - 1] !== this.extremeIndex) {
      result.push(this.extremeIndex);
    }
    return result;
  }

  private reverse(next: TrendDirection, price: number, index: number): void {
    // A reversal straight off the first point would repeat index 0
    if (this.turningPoints[this.turningPoints.length - 1] !== this.extremeIndex) {
      this.turningPoints.push(this.extremeIndex);
    }
    this.direction = next;
    this.extreme = price;
    this.extremeIndex = index;
  }
}

/**
 * Find trend reversals of at least `threshold` (0.03 = 3%) from the running extreme.
 *
 * @returns Strictly increasing pivot indices, starting at 0, alternating highs and lows
 */
export const zigzag = (prices: readonly number[], threshold: number = 0.05): number[] => {
  const tracker = new ZigzagTracker(threshold);
  for (const price of prices) {
    tracker.push(price);
  }
  return tracker.pivots();
};

/**
 * Find indices that are strict local maxima or minima against every neighbour
 * within `window` positions on each side. Points without a neighbour on both
 * sides never qualify.
 *
 * @returns Maxima and minima merged in ascending order
 */
export const localExtrema = (prices: readonly number[], window: number = 5): number[] => {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`Extrema window must be a positive integer, got ${window}`);
  }

  const extrema: number[] = [];

  for (let i = 1; i < prices.length - 1; i++) {
    const from = Math.max(0, i - window);
    const to = Math.min(prices.length - 1, i + window);
    let isMax = true;
    let isMin = true;

    for (let j = from; j <= to && (isMax || isMin); j++) {
      if (j === i) continue;
      if (prices[j] >= prices[i]) isMax = false;
      if (prices[j] <= prices[i]) isMin = false;
    }

    if (isMax || isMin) {
      extrema.push(i);
    }
  }

  return extrema;
};
