import { EVIDENCE_FIELDS } from '@shared/constants';
import type { EvidenceValues } from '@shared/types';
import { DomainError } from './errors';
import type { EvidenceInputs } from './types';

/**
 * Validate and freeze the three evidence scalars.
 * Throws DomainError for the first field outside [0.0, 1.0].
 */
export function createEvidenceInputs(values: EvidenceValues): EvidenceInputs {
  for (const field of EVIDENCE_FIELDS) {
    const value = values[field];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
      throw new DomainError(field, value);
    }
  }

  return Object.freeze({
    claimValidity: values.claimValidity,
    proceduralAdvantage: values.proceduralAdvantage,
    costAsymmetry: values.costAsymmetry,
  });
}
