import { describe, it, expect } from 'vitest';
import { runEngine } from '@engine';
import { SCENARIO_PRESET_NAMES } from '@shared/constants';
import { SCENARIO_PRESETS, getPreset, isPresetName } from '@desk/presets';

describe('SCENARIO_PRESETS', () => {
  it('covers every preset name', () => {
    expect(Object.keys(SCENARIO_PRESETS)).toEqual([...SCENARIO_PRESET_NAMES]);
  });

  it('runs each preset through the engine', () => {
    const results = SCENARIO_PRESET_NAMES.map((name) => {
      const { scores, evaluation } = runEngine(SCENARIO_PRESETS[name].values);
      return [name, scores.leverageScore, evaluation.decision, evaluation.confidence];
    });

    expect(results).toEqual([
      ['baseline', 0.641, 'HOLD', 'MODERATE'],
      ['authority_collapse', 0.549, 'HOLD', 'LOW'],
      ['procedural_win', 0.672, 'HOLD', 'HIGH'],
      ['cost_spike', 0.691, 'HOLD', 'HIGH'],
      ['nuclear', 0.193, 'REJECT', 'MODERATE'],
    ]);
  });
});

describe('getPreset', () => {
  it('returns the named preset', () => {
    expect(getPreset('cost_spike').values).toEqual({
      claimValidity: 0.38,
      proceduralAdvantage: 0.86,
      costAsymmetry: 0.95,
    });
  });

  it('throws RangeError listing the valid names', () => {
    expect(() => getPreset('optimistic')).toThrow(
      'Unknown preset: optimistic. Valid presets: baseline, authority_collapse, procedural_win, cost_spike, nuclear',
    );
    expect(isPresetName('optimistic')).toBe(false);
  });
});
