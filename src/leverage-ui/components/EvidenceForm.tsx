import { useState } from 'react';
import { EVIDENCE_FIELDS } from '@shared/constants';
import type { EvidenceField, EvidenceValues } from '@shared/types';

const LABELS: Record<EvidenceField, string> = {
  claimValidity: 'Claim Validity',
  proceduralAdvantage: 'Procedural Advantage',
  costAsymmetry: 'Cost Asymmetry',
};

interface Props {
  running: boolean;
  onSubmit: (values: EvidenceValues) => void;
}

export function EvidenceForm({ running, onSubmit }: Props) {
  const [values, setValues] = useState<EvidenceValues>({
    claimValidity: 0.5,
    proceduralAdvantage: 0.5,
    costAsymmetry: 0.5,
  });

  const update = (field: EvidenceField, value: number) =>
    setValues((prev) => ({ ...prev, [field]: value }));

  return (
    <div className="bg-gray-900 border border-gray-700 rounded-lg p-4">
      <h3 className="text-sm font-medium text-gray-300 mb-3">Evidence</h3>
      <div className="space-y-3">
        {EVIDENCE_FIELDS.map((field) => (
          <label key={field} className="block">
            <div className="flex justify-between text-xs text-gray-400 mb-1">
              <span>{LABELS[field]}</span>
              <span className="font-mono text-white">{values[field].toFixed(2)}</span>
            </div>
            <input
              type="range"
              min={0}
              max={1}
              step={0.01}
              value={values[field]}
              onChange={(e) => update(field, Number(e.target.value))}
              className="w-full"
            />
          </label>
        ))}
      </div>
      <button
        onClick={() => onSubmit(values)}
        disabled={running}
        className="mt-4 px-3 py-1.5 bg-blue-700 text-white text-sm rounded hover:bg-blue-600 disabled:opacity-50"
      >
        {running ? 'Scoring...' : 'Run Engine'}
      </button>
    </div>
  );
}
