import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig, TIME_RATE } from './SimulationConfig';
import { InvalidOperationError } from '../lib/errors';

describe('resolveConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.timeRateSeconds).toBe(TIME_RATE.DEFAULT);
  });

  it('applies overrides', () => {
    const config = resolveConfig({ timeRateSeconds: 3600, sinkingGraceTicks: 0, detectionMode: 'PROBABILISTIC' });
    expect(config.timeRateSeconds).toBe(3600);
    expect(config.sinkingGraceTicks).toBe(0);
    expect(config.detectionMode).toBe('PROBABILISTIC');
    expect(config.distanceModel).toBe('PLANAR');
  });

  it.each([
    [{ timeRateSeconds: 0.5 }],
    [{ timeRateSeconds: 7200 }],
    [{ sinkingGraceTicks: -1 }],
    [{ sinkingGraceTicks: 1.5 }],
    [{ arrivalEpsilonNm: -0.1 }],
    [{ maxEventHistory: -1 }],
    [{ endTime: DEFAULT_CONFIG.startTime }]
  ])('rejects %o', (overrides) => {
    expect(() => resolveConfig(overrides)).toThrow(InvalidOperationError);
  });
});
