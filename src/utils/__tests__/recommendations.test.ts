import type { CurrentWave, Prediction, TargetRange } from '@/types/shared';
import { recommend } from '@/utils/recommendations';
import { WavePattern } from '@/utils/wavePattern';

const makeWave = (kind: CurrentWave['kind'], prices: number[], target: TargetRange | null): CurrentWave => {
  const points = prices.map((price, index) => ({ index, price }));
  return { kind, indices: points.map(point => point.index), points, pattern: new WavePattern(kind, points), target };
};

const corrective = (target: TargetRange | null) => makeWave('corrective', [100, 80, 90, 70], target);
const impulse = (target: TargetRange | null) => makeWave('impulse', [100, 130, 110, 160, 140, 200], target);

const continuation = (target: TargetRange | null): Prediction => ({
  label: 'trend-continuation-expected',
  confidence: 0.6,
  target
});

const correction = (target: TargetRange | null): Prediction => ({
  label: 'correction-expected',
  confidence: 0.7,
  target
});

describe('recommend', () => {
  it('stays neutral without a current wave', () => {
    const undetermined: Prediction = { label: 'undetermined', confidence: 0, target: null };

    expect(recommend(null, undetermined, 100)).toEqual({
      action: 'neutral',
      rationale: 'Insufficient wave structure or low confidence',
      entry: 100,
      targets: [],
      stopLoss: null,
      riskReward: []
    });
  });

  it('stays neutral below the confidence floor', () => {
    const weak: Prediction = { ...continuation([110, 120]), confidence: 0.4 };

    expect(recommend(corrective([110, 120]), weak, 100).action).toBe('neutral');
  });

  it('stays neutral for a non-positive price', () => {
    expect(recommend(corrective([110, 120]), continuation([110, 120]), 0).action).toBe('neutral');
  });

  it('advises caution when no target was projected', () => {
    const result = recommend(corrective(null), continuation(null), 100);

    expect(result.action).toBe('caution');
    expect(result.rationale).toBe('No clear trade setup');
    expect(result.stopLoss).toBeNull();
    expect(result.targets).toEqual([]);
  });

  it('buys an upward continuation with a stop below the entry', () => {
    const result = recommend(corrective([110, 120]), continuation([110, 120]), 100, 0.02);

    expect(result.action).toBe('buy');
    expect(result.rationale).toBe('Uptrend continuation after corrective wave');
    expect(result.entry).toBe(100);
    expect(result.stopLoss).toBeCloseTo(98, 10);
    expect(result.targets.map(target => target.price)).toEqual([110, 120]);
    expect(result.targets[0].changePercent).toBeCloseTo(10, 10);
    expect(result.targets[1].changePercent).toBeCloseTo(20, 10);
    expect(result.riskReward[0]).toBeCloseTo(5, 6);
    expect(result.riskReward[1]).toBeCloseTo(10, 6);
  });

  it('sells a downward continuation', () => {
    const result = recommend(corrective([90, 80]), continuation([90, 80]), 100);

    expect(result.action).toBe('sell');
    expect(result.rationale).toBe('Downtrend continuation after corrective wave');
    expect(result.stopLoss).toBeCloseTo(102, 10);
  });

  it('sells an expected correction with a stop above the entry', () => {
    const result = recommend(impulse([90, 80]), correction([90, 80]), 100, 0.02);

    expect(result.action).toBe('sell');
    expect(result.rationale).toBe('Correction expected after impulse wave');
    expect(result.stopLoss).toBeCloseTo(102, 10);
    expect(result.targets[0].changePercent).toBeCloseTo(-10, 10);
    expect(result.riskReward[0]).toBeCloseTo(5, 6);
    expect(result.riskReward[1]).toBeCloseTo(10, 6);
  });

  it('buys an upward correction', () => {
    const result = recommend(impulse([110, 105]), correction([110, 105]), 100);

    expect(result.action).toBe('buy');
    expect(result.rationale).toBe('Upward correction expected after impulse wave');
  });

  it('reports zero reward/risk when the risk tolerance is zero', () => {
    expect(recommend(corrective([110, 120]), continuation([110, 120]), 100, 0).riskReward).toEqual([0, 0]);
  });

  it('turns a sell against an open long into take-profit', () => {
    const result = recommend(impulse([90, 80]), correction([90, 80]), 100, 0.02, { openPosition: 'long' });

    expect(result.action).toBe('take-profit');
    expect(result.stopLoss).toBeCloseTo(102, 10);
  });

  it('turns a buy against an open short into close-short', () => {
    const result = recommend(corrective([110, 120]), continuation([110, 120]), 100, 0.02, { openPosition: 'short' });

    expect(result.action).toBe('close-short');
  });

  it('leaves a sell unchanged when already short', () => {
    expect(recommend(impulse([90, 80]), correction([90, 80]), 100, 0.02, { openPosition: 'short' }).action).toBe('sell');
  });

  it('takes direction and targets from the current wave', () => {
    const result = recommend(corrective([110, 120]), continuation([90, 80]), 100, 0.02);

    expect(result.action).toBe('buy');
    expect(result.targets.map(target => target.price)).toEqual([110, 120]);
  });

  it('advises caution when the wave has no target even if the prediction has one', () => {
    expect(recommend(corrective(null), continuation([110, 120]), 100).action).toBe('caution');
  });
});
