import { API_PREFIX } from '@shared/constants';
import type { BandSummary, EngineSnapshot } from '@engine';
import type { MonteCarloSummary, DistributionSpec } from '@desk/monte-carlo';
import type {
  ApiResponse,
  EvidenceValues,
  FactStatus,
  JournalEntryRecord,
  JournalEntryType,
  TailFlag,
  ValidationFlag,
} from '@shared/types';

const BASE = API_PREFIX;

async function request<T>(path: string, options?: RequestInit): Promise<ApiResponse<T>> {
  const res = await fetch(`${BASE}${path}`, {
    headers: { 'Content-Type': 'application/json' },
    ...options,
  });
  return res.json();
}

const post = (body: unknown): RequestInit => ({ method: 'POST', body: JSON.stringify(body) });

export interface BandVocabulary {
  validationFlags: ValidationFlag[];
  tailFlags: TailFlag[];
  bands: { band: string; name: string; range: string; requirement: string }[];
}

export interface ResolvedBand {
  summary: BandSummary;
  explanation?: string;
}

export type RunDistributions = Record<keyof EvidenceValues, DistributionSpec>;

export const api = {
  runEngine: (values: EvidenceValues) =>
    request<{ id: string; snapshot: EngineSnapshot }>('/engine/run', post(values)),
  getVocabulary: () => request<BandVocabulary>('/bands/vocabulary'),
  resolveBand: (flags: string[], inputs?: EvidenceValues) =>
    request<ResolvedBand>('/bands/resolve', post({ flags, inputs, explain: true })),
  startRun: (samples: number, distributions: RunDistributions, seed?: number) =>
    request<{ run: { id: string; seed: number }; summary: MonteCarloSummary }>(
      '/runs',
      post({ samples, seed, distributions }),
    ),
  getJournal: (limit?: number) =>
    request<JournalEntryRecord[]>(limit ? `/journal?limit=${limit}` : '/journal'),
  appendJournal: (entry: { text: string; entryType: JournalEntryType; factStatus: FactStatus | null }) =>
    request<JournalEntryRecord>('/journal', post(entry)),
};
