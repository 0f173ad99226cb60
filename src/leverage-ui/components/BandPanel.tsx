import { useEffect, useState } from 'react';
import type { EvidenceValues, SettlementFlag } from '@shared/types';
import { api, type BandVocabulary, type ResolvedBand } from '@ui/lib/api';
import { runUnlessCancelled } from '@ui/lib/effects';

const label = (flag: string) => flag.replace(/_/g, ' ');

interface Props {
  inputs?: EvidenceValues;
}

export function BandPanel({ inputs }: Props) {
  const [vocabulary, setVocabulary] = useState<BandVocabulary | null>(null);
  const [selected, setSelected] = useState<SettlementFlag[]>([]);
  const [resolved, setResolved] = useState<ResolvedBand | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    void (async () => {
      const res = await api.getVocabulary();
      if (res.success && res.data) setVocabulary(res.data);
    })();
  }, []);

  useEffect(
    () =>
      runUnlessCancelled(
        () => api.resolveBand(selected, inputs),
        (res) => {
          if (res.success && res.data) {
            setResolved(res.data);
            setError(null);
          } else {
            setError(res.error ?? 'Band resolution failed');
          }
        },
      ),
    [selected, inputs],
  );

  const toggle = (flag: SettlementFlag) =>
    setSelected((prev) => (prev.includes(flag) ? prev.filter((f) => f !== flag) : [...prev, flag]));

  const flagGroup = (title: string, flags: SettlementFlag[]) => (
    <div>
      <h4 className="text-xs font-medium text-gray-400 mb-2">{title}</h4>
      {flags.map((flag) => (
        <label key={flag} className="flex items-center gap-2 text-xs text-gray-300 mb-1">
          <input type="checkbox" checked={selected.includes(flag)} onChange={() => toggle(flag)} />
          {label(flag)}
        </label>
      ))}
    </div>
  );

  return (
    <div className="bg-gray-900 border border-gray-700 rounded-lg p-4">
      <h3 className="text-sm font-medium text-gray-300 mb-3">Settlement Band</h3>
      {vocabulary && (
        <div className="grid grid-cols-2 gap-4 mb-3">
          {flagGroup('Validation flags', vocabulary.validationFlags)}
          {flagGroup('Tail flags', vocabulary.tailFlags)}
        </div>
      )}
      {error && <div className="text-xs text-red-400">{error}</div>}
      {resolved && (
        <div className="border-t border-gray-700 pt-3">
          <div className="flex items-baseline gap-3">
            <span className="text-2xl font-bold text-white">{resolved.summary.currentRange}</span>
            <span className="text-sm text-gray-400">{resolved.summary.currentBandName}</span>
          </div>
          <p className="text-xs text-gray-500 mt-1">{resolved.summary.meaning}</p>
          <p className="text-xs text-gray-400 mt-2">{resolved.summary.whatMovesUp.message}</p>
        </div>
      )}
    </div>
  );
}
