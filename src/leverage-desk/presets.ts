// src/leverage-desk/presets.ts
// Named evidence profiles for quick what-if runs.

import { SCENARIO_PRESET_NAMES } from '@shared/constants';
import type { EvidenceValues, ScenarioPresetName } from '@shared/types';

export interface ScenarioPreset {
  name: string;
  description: string;
  values: EvidenceValues;
}

export const SCENARIO_PRESETS: Readonly<Record<ScenarioPresetName, ScenarioPreset>> = {
  baseline: {
    name: 'Baseline - Current Case',
    description: 'Current case inputs; the reference point for comparisons.',
    values: { claimValidity: 0.38, proceduralAdvantage: 0.86, costAsymmetry: 0.75 },
  },
  authority_collapse: {
    name: 'Authority Defect Confirmed',
    description: 'An audit is alleged to reveal definitive authority defects.',
    values: { claimValidity: 0.15, proceduralAdvantage: 0.86, costAsymmetry: 0.75 },
  },
  procedural_win: {
    name: 'Procedural Arguments Succeed',
    description: 'The court accepts the procedural leverage arguments.',
    values: { claimValidity: 0.38, proceduralAdvantage: 0.95, costAsymmetry: 0.75 },
  },
  cost_spike: {
    name: 'Cost Asymmetry Spike',
    description: 'Opposing costs escalate and indemnity costs become likely.',
    values: { claimValidity: 0.38, proceduralAdvantage: 0.86, costAsymmetry: 0.95 },
  },
  nuclear: {
    name: 'Everything Goes Wrong',
    description: 'Worst case across authority, procedure and costs.',
    values: { claimValidity: 0.15, proceduralAdvantage: 0.2, costAsymmetry: 0.25 },
  },
};

export function isPresetName(name: string): name is ScenarioPresetName {
  return SCENARIO_PRESET_NAMES.some((preset) => preset === name);
}

/** Throws RangeError listing the valid names for an unknown preset. */
export function getPreset(name: string): ScenarioPreset {
  if (!isPresetName(name)) {
    throw new RangeError(`Unknown preset: ${name}. Valid presets: ${SCENARIO_PRESET_NAMES.join(', ')}`);
  }
  return SCENARIO_PRESETS[name];
}
