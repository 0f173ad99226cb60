// src/leverage-engine/gateway.ts
// The single sanctioned entry point. Stateless: every call builds its own
// inputs and returns a fresh, deep-frozen snapshot.

import type { EvidenceValues } from '@shared/types';
import { evaluate } from './evaluation';
import { createEvidenceInputs } from './inputs';
import { interpret } from './interpretation';
import { ENGINE_RELEASE } from './release';
import { score } from './scoring';
import type { EngineSnapshot } from './types';

export function runEngine(values: EvidenceValues): EngineSnapshot {
  const inputs = createEvidenceInputs(values);
  const scores = score(inputs);
  const evaluation = evaluate(scores);
  const interpretation = interpret(evaluation);

  return Object.freeze({
    release: ENGINE_RELEASE,
    inputs,
    scores,
    evaluation,
    interpretation,
  });
}
