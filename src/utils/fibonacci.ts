// Fibonacci ratios used to project wave targets
export const FIBONACCI_RATIOS = {
  // A correction after an impulse typically retraces 38.2% to 61.8% of it
  correctionNear: 0.382,
  correctionFar: 0.618,
  // The move after a correction typically extends 100% to 161.8% of it
  continuationNear: 1.0,
  continuationFar: 1.618
} as const;

const RETRACEMENT_LEVELS = [0, 0.236, 0.382, 0.5, 0.618, 0.786, 1] as const;
const EXTENSION_LEVELS = [1.272, 1.618] as const;

export type FibonacciLevels = Record<string, number>;

/**
 * Format a ratio as a level key: 0 -> "0.0", 1 -> "1.0", 0.618 -> "0.618"
 */
const levelKey = (level: number): string => (Number.isInteger(level) ? level.toFixed(1) : String(level));

/**
 * Calculate Fibonacci retracement and extension levels for a price move
 *
 * Retracements sit between the two prices; extensions continue past `endPrice`
 * in the direction of the move.
 *
 * @param startPrice - Starting price of the move
 * @param endPrice - Ending price of the move
 * @returns Prices keyed by level ("0.0" ... "1.0", "1.272", "1.618")
 */
export const calculateFibonacciLevels = (startPrice: number, endPrice: number): FibonacciLevels => {
  const diff = endPrice - startPrice;
  const direction = diff > 0 ? 1 : -1;
  const levels: FibonacciLevels = {};

  for (const level of RETRACEMENT_LEVELS) {
    levels[levelKey(level)] = level === 1 ? endPrice : startPrice + level * diff;
  }

  for (const level of EXTENSION_LEVELS) {
    levels[levelKey(level)] = endPrice + direction * (level - 1) * Math.abs(diff);
  }

  return levels;
};
