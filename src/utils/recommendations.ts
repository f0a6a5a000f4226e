import type {
  CurrentWave,
  Prediction,
  PredictionLabel,
  PriceTarget,
  Recommendation,
  RecommendationAction,
  TargetRange
} from '@/types/shared';

export const DEFAULT_RISK_TOLERANCE = 0.02;

// Predictions below this confidence never produce a trade
export const MIN_CONFIDENCE = 0.5;

export type OpenPosition = 'long' | 'short' | 'none';

export interface RecommendOptions {
  /** Position already held; turns a closing sell into take-profit and a closing buy into close-short */
  openPosition?: OpenPosition;
}

type Side = 'buy' | 'sell';

type TradeLabel = Exclude<PredictionLabel, 'undetermined'>;

const RATIONALES: Record<TradeLabel, Record<Side, (kind: CurrentWave['kind']) => string>> = {
  'trend-continuation-expected': {
    buy: kind => `Uptrend continuation after ${kind} wave`,
    sell: kind => `Downtrend continuation after ${kind} wave`
  },
  'correction-expected': {
    buy: kind => `Upward correction expected after ${kind} wave`,
    sell: kind => `Correction expected after ${kind} wave`
  }
};

const toPriceTarget = (price: number, currentPrice: number): PriceTarget => ({
  price,
  changePercent: ((price - currentPrice) / currentPrice) * 100
});

/**
 * Stop-loss, targets and reward/risk ratios for a position entered at `currentPrice`
 */
const buildTradePlan = (side: Side, target: TargetRange, currentPrice: number, riskTolerance: number) => {
  const stopLoss = side === 'buy'
    ? currentPrice * (1 - riskTolerance)
    : currentPrice * (1 + riskTolerance);
  const risk = side === 'buy' ? currentPrice - stopLoss : stopLoss - currentPrice;

  const riskReward = target.map(price => {
    const reward = side === 'buy' ? price - currentPrice : currentPrice - price;
    return risk > 0 ? reward / risk : 0;
  });

  return {
    stopLoss,
    targets: target.map(price => toPriceTarget(price, currentPrice)),
    riskReward
  };
};

const resolveAction = (side: Side, openPosition: OpenPosition): RecommendationAction => {
  if (side === 'sell' && openPosition === 'long') return 'take-profit';
  if (side === 'buy' && openPosition === 'short') return 'close-short';
  return side;
};

/**
 * Derive a trade recommendation from the current wave and its prediction
 *
 * @param currentWave - Current wave structure and its projected target, or null when none was found
 * @param prediction - Prediction derived from the same wave
 * @param currentPrice - Latest price, used as the entry
 * @param riskTolerance - Stop-loss distance as a fraction of the entry (0.02 = 2%)
 */
export const recommend = (
  currentWave: CurrentWave | null,
  prediction: Prediction,
  currentPrice: number,
  riskTolerance: number = DEFAULT_RISK_TOLERANCE,
  options: RecommendOptions = {}
): Recommendation => {
  const neutral: Recommendation = {
    action: 'neutral',
    rationale: 'Insufficient wave structure or low confidence',
    entry: currentPrice,
    targets: [],
    stopLoss: null,
    riskReward: []
  };

  if (!currentWave || prediction.confidence < MIN_CONFIDENCE || !(currentPrice > 0)) {
    return neutral;
  }

  // Targets come from the wave itself; the prediction only contributes its label and confidence
  const target = currentWave.target;
  if (!target) {
    return { ...neutral, action: 'caution', rationale: 'No clear trade setup' };
  }

  if (prediction.label === 'undetermined') {
    return neutral;
  }

  // Target below the current price means the expected move is down
  const downward = target[0] < currentPrice;
  const side: Side = downward ? 'sell' : 'buy';
  const rationale = RATIONALES[prediction.label][side](currentWave.kind);

  const plan = buildTradePlan(side, target, currentPrice, riskTolerance);

  return {
    action: resolveAction(side, options.openPosition ?? 'none'),
    rationale,
    entry: currentPrice,
    ...plan
  };
};
