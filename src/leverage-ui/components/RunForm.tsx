import { useState } from 'react';
import type { MonteCarloSummary } from '@desk/monte-carlo';
import type { EvidenceValues } from '@shared/types';
import { api } from '@ui/lib/api';

interface Props {
  centre: EvidenceValues;
  onComplete: (summary: MonteCarloSummary) => void;
}

export function RunForm({ centre, onComplete }: Props) {
  const [samples, setSamples] = useState(1000);
  const [spread, setSpread] = useState(0.05);
  const [seed, setSeed] = useState('');
  const [running, setRunning] = useState(false);

  const handleRun = async () => {
    setRunning(true);
    const normal = (mean: number) => ({ kind: 'normal' as const, mean, std: spread });
    const res = await api.startRun(
      samples,
      {
        claimValidity: normal(centre.claimValidity),
        proceduralAdvantage: normal(centre.proceduralAdvantage),
        costAsymmetry: normal(centre.costAsymmetry),
      },
      seed === '' ? undefined : Number(seed),
    );
    setRunning(false);
    if (res.success && res.data) onComplete(res.data.summary);
  };

  const inputClass = 'w-20 px-2 py-1 bg-gray-800 border border-gray-700 rounded text-sm text-white';

  return (
    <div className="flex flex-wrap items-center gap-2">
      <label className="text-sm text-gray-400">Samples:</label>
      <input type="number" value={samples} onChange={(e) => setSamples(Number(e.target.value))}
        min={1} max={100000} className={inputClass} />
      <label className="text-sm text-gray-400">Spread:</label>
      <input type="number" value={spread} onChange={(e) => setSpread(Number(e.target.value))}
        min={0} max={1} step={0.01} className={inputClass} />
      <label className="text-sm text-gray-400">Seed:</label>
      <input value={seed} onChange={(e) => setSeed(e.target.value)} placeholder="random" className={inputClass} />
      <button onClick={handleRun} disabled={running}
        className="px-3 py-1.5 bg-green-700 text-white text-sm rounded hover:bg-green-600 disabled:opacity-50">
        {running ? 'Sampling...' : 'Run Sampling'}
      </button>
    </div>
  );
}
