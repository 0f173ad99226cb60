import type { EngineSnapshot } from '@engine';
import type { Decision, EscalationZone } from '@shared/types';

const DECISION_COLOURS: Record<Decision, string> = {
  ACCEPT: 'text-green-400',
  HOLD: 'text-blue-400',
  COUNTER: 'text-yellow-400',
  REJECT: 'text-red-400',
};

const ZONE_COLOURS: Record<EscalationZone, string> = {
  SAFE: 'text-green-400',
  CAUTION: 'text-yellow-400',
  CRITICAL: 'text-red-400',
};

interface Props {
  snapshot: EngineSnapshot;
}

export function SnapshotCard({ snapshot }: Props) {
  const { scores, evaluation, interpretation } = snapshot;

  return (
    <div className="bg-gray-900 border border-gray-700 rounded-lg p-4">
      <h3 className="text-sm font-medium text-gray-300 mb-3">
        Case Analysis <span className="text-xs text-gray-600">release {snapshot.release}</span>
      </h3>
      <div className="grid grid-cols-2 md:grid-cols-4 gap-4 mb-3">
        <div>
          <div className="text-2xl font-bold text-white">{scores.leverageScore.toFixed(3)}</div>
          <div className="text-xs text-gray-500">Leverage Score</div>
        </div>
        <div>
          <div className={`text-2xl font-bold ${DECISION_COLOURS[evaluation.decision]}`}>{evaluation.decision}</div>
          <div className="text-xs text-gray-500">Decision ({evaluation.confidence})</div>
        </div>
        <div>
          <div className="text-2xl font-bold text-white">{scores.costPressureIndicator.toFixed(2)}</div>
          <div className="text-xs text-gray-500">Cost Pressure</div>
        </div>
        <div>
          <div className={`text-2xl font-bold ${ZONE_COLOURS[evaluation.escalationZone]}`}>
            {evaluation.escalationZone}
          </div>
          <div className="text-xs text-gray-500">{evaluation.triggered ? 'Escalation triggered' : 'Escalation'}</div>
        </div>
      </div>
      <ul className="space-y-1 text-xs text-gray-400 border-t border-gray-700 pt-3">
        <li>{interpretation.leveragePosition}</li>
        <li>{interpretation.decisionExplanation}</li>
        <li>{interpretation.escalationStatus}</li>
        <li>{interpretation.confidenceExplanation}</li>
      </ul>
    </div>
  );
}
