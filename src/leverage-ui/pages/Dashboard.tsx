import { useCallback, useEffect, useState } from 'react';
import type { EngineSnapshot } from '@engine';
import type { MonteCarloSummary } from '@desk/monte-carlo';
import { WS_EVENTS } from '@shared/constants';
import type { EvidenceValues, JournalEntryRecord } from '@shared/types';
import { api } from '@ui/lib/api';
import { connectWebSocket, onEvent } from '@ui/lib/websocket';
import { BandPanel } from '@ui/components/BandPanel';
import { EvidenceForm } from '@ui/components/EvidenceForm';
import { JournalLog } from '@ui/components/JournalLog';
import { RunForm } from '@ui/components/RunForm';
import { RunSummaryCard } from '@ui/components/RunSummaryCard';
import { SnapshotCard } from '@ui/components/SnapshotCard';

export function Dashboard() {
  const [snapshot, setSnapshot] = useState<EngineSnapshot | null>(null);
  const [running, setRunning] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [runSummary, setRunSummary] = useState<MonteCarloSummary | null>(null);
  const [journal, setJournal] = useState<JournalEntryRecord[]>([]);

  const loadJournal = useCallback(async () => {
    const res = await api.getJournal(50);
    if (res.success && res.data) setJournal(res.data);
  }, []);

  useEffect(() => {
    void loadJournal();
  }, [loadJournal]);

  useEffect(() => {
    connectWebSocket();
    return onEvent(WS_EVENTS.JOURNAL_APPENDED, () => {
      void loadJournal();
    });
  }, [loadJournal]);

  const handleRun = async (values: EvidenceValues) => {
    setRunning(true);
    const res = await api.runEngine(values);
    setRunning(false);
    if (res.success && res.data) {
      setSnapshot(res.data.snapshot);
      setError(null);
    } else {
      setError(res.error ?? 'Engine run failed');
    }
  };

  return (
    <div className="max-w-4xl mx-auto px-4 py-8">
      <div className="flex items-center justify-between mb-8">
        <h1 className="text-2xl font-semibold">Procedural Leverage Lab</h1>
      </div>

      <div className="grid md:grid-cols-2 gap-4 mb-6">
        <EvidenceForm running={running} onSubmit={handleRun} />
        <BandPanel inputs={snapshot?.inputs} />
      </div>

      {error && <div className="text-sm text-red-400 mb-4">{error}</div>}
      {snapshot && (
        <div className="space-y-4 mb-6">
          <SnapshotCard snapshot={snapshot} />
          <RunForm centre={snapshot.inputs} onComplete={setRunSummary} />
          {runSummary && <RunSummaryCard summary={runSummary} />}
        </div>
      )}

      <h2 className="text-lg font-medium mb-4 text-gray-400">Context Journal</h2>
      <JournalLog entries={journal} />
    </div>
  );
}
