import type { MonteCarloSummary } from '@desk/monte-carlo';
import { DECISIONS } from '@shared/constants';

const pct = (share: number) => `${(share * 100).toFixed(0)}%`;

interface Props {
  summary: MonteCarloSummary;
}

export function RunSummaryCard({ summary }: Props) {
  const { leverage, decisionProportions, triggerRate } = summary;

  return (
    <div className="bg-gray-900 border border-gray-700 rounded-lg p-4">
      <h3 className="text-sm font-medium text-gray-300 mb-3">
        Sampling Results <span className="text-xs text-gray-600">seed {summary.seed}</span>
      </h3>
      <div className="grid grid-cols-2 md:grid-cols-4 gap-4 mb-3">
        {DECISIONS.map((decision) => (
          <div key={decision}>
            <div className="text-2xl font-bold text-white">{pct(decisionProportions[decision])}</div>
            <div className="text-xs text-gray-500">{decision}</div>
          </div>
        ))}
      </div>
      <div className="grid grid-cols-3 gap-4 text-sm">
        <div>
          <span className="text-gray-500">Leverage mean:</span>{' '}
          <span className="text-white">{leverage.mean.toFixed(3)}</span>
        </div>
        <div>
          <span className="text-gray-500">p5-p95:</span>{' '}
          <span className="text-white">{leverage.p5.toFixed(3)} to {leverage.p95.toFixed(3)}</span>
        </div>
        <div>
          <span className="text-gray-500">Escalation:</span>{' '}
          <span className={triggerRate > 0.2 ? 'text-red-400' : 'text-green-400'}>{pct(triggerRate)}</span>
        </div>
      </div>
    </div>
  );
}
