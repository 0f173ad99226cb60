import { useState } from 'react';
import { FACT_STATUSES, JOURNAL_ENTRY_TYPES } from '@shared/constants';
import type { FactStatus, JournalEntryRecord, JournalEntryType } from '@shared/types';
import { api } from '@ui/lib/api';

function asEntryType(value: string): JournalEntryType {
  return JOURNAL_ENTRY_TYPES.find((type) => type === value) ?? 'text';
}

function asFactStatus(value: string): FactStatus | null {
  return FACT_STATUSES.find((status) => status === value) ?? null;
}

interface Props {
  entries: JournalEntryRecord[];
}

export function JournalLog({ entries }: Props) {
  const [text, setText] = useState('');
  const [entryType, setEntryType] = useState<JournalEntryType>('text');
  const [factStatus, setFactStatus] = useState<FactStatus | null>(null);
  const [error, setError] = useState<string | null>(null);

  // New entries arrive over the websocket; the list is owned by the page.
  const handleAdd = async () => {
    const res = await api.appendJournal({ text, entryType, factStatus });
    if (res.success) {
      setText('');
      setError(null);
    } else {
      setError(res.error ?? 'Could not add entry');
    }
  };

  const selectClass = 'px-2 py-1 bg-gray-800 border border-gray-700 rounded text-sm text-white';

  return (
    <div>
      <div className="flex items-center gap-2 mb-4">
        <input value={text} onChange={(e) => setText(e.target.value)} placeholder="Add context..."
          className="flex-1 px-2 py-1 bg-gray-800 border border-gray-700 rounded text-sm text-white" />
        <select value={entryType} onChange={(e) => setEntryType(asEntryType(e.target.value))} className={selectClass}>
          {JOURNAL_ENTRY_TYPES.map((type) => <option key={type} value={type}>{type}</option>)}
        </select>
        <select value={factStatus ?? ''} onChange={(e) => setFactStatus(asFactStatus(e.target.value))}
          className={selectClass}>
          <option value="">no status</option>
          {FACT_STATUSES.map((status) => <option key={status} value={status}>{status}</option>)}
        </select>
        <button onClick={handleAdd}
          className="px-3 py-1.5 bg-blue-700 text-white text-sm rounded hover:bg-blue-600">
          Add
        </button>
      </div>
      {error && <div className="text-xs text-red-400 mb-2">{error}</div>}

      {entries.length === 0 ? (
        <p className="text-gray-500 text-sm">No journal entries yet.</p>
      ) : (
        <ul className="space-y-2">
          {[...entries].reverse().map((entry) => (
            <li key={entry.id} className="bg-gray-900 border border-gray-800 rounded-md px-4 py-3">
              <div className="flex items-center justify-between mb-1">
                <div className="flex items-center gap-2">
                  <span className="text-sm font-mono font-medium text-blue-400">{entry.entryType}</span>
                  {entry.factStatus && (
                    <span className="text-[10px] px-1.5 py-0.5 bg-purple-900/50 text-purple-400 rounded font-medium">
                      {entry.factStatus}
                    </span>
                  )}
                </div>
                <span className="text-xs text-gray-500">{new Date(entry.timestampUtc).toLocaleString()}</span>
              </div>
              <div className="text-sm text-gray-300 whitespace-pre-wrap">{entry.text}</div>
              <div className="text-xs text-gray-600 mt-1">source: {entry.source}</div>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
