// src/leverage-engine/settlement-bands.ts
// Flag-driven settlement band resolution.
// Pure: (flags) -> band. Never reads or alters the engine score.

import { SETTLEMENT_BANDS, TAIL_FLAGS, VALIDATION_FLAGS } from '@shared/constants';
import type {
  Decision,
  SettlementBand,
  SettlementFlag,
  TailFlag,
  ValidationFlag,
} from '@shared/types';
import { UnknownFlagError } from './errors';
import { BAND_RANGES, BAND_TRIGGERS, type BandRange } from './release';
import type { EngineSnapshot } from './types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FlagSet {
  readonly validation: readonly ValidationFlag[];
  readonly tail: readonly TailFlag[];
}

export interface BandDefinition {
  name: string;
  meaning: string;
  requirement: string;
}

export interface BandResolution {
  band: SettlementBand;
  range: BandRange;
  rangeLabel: string;
}

export interface BandEscalation {
  nextBand: SettlementBand | null;
  nextRange: string | null;
  flagsNeeded: number;
  missingFlags: readonly SettlementFlag[];
  message: string;
}

export interface BandSummary {
  currentBand: SettlementBand;
  currentBandName: string;
  currentRange: string;
  minimumGbp: number;
  maximumGbp: number;
  meaning: string;
  activeFlags: readonly SettlementFlag[];
  flagCount: number;
  whatMovesUp: BandEscalation;
  inactiveBands: { band: SettlementBand; name: string; range: string; requirement: string }[];
  /** Engine context for display only; band resolution never reads it. */
  display?: { release: string; decision: Decision; leverageScore: number };
}

// ---------------------------------------------------------------------------
// Band definitions
// ---------------------------------------------------------------------------

export const BAND_DEFINITIONS: Readonly<Record<SettlementBand, BandDefinition>> = {
  BASE: {
    name: 'Base Settlement Band',
    meaning: 'Authorisable today with no external validation event on record.',
    requirement: 'BASE (0 flags): standard dispute resolution',
  },
  VALIDATION: {
    name: 'Validation Settlement Band',
    meaning: 'At least one external validation event is on record (hearing, regulator, insurer or police).',
    requirement: 'VALIDATION (1 flag): any one validation flag',
  },
  TAIL: {
    name: 'Tail Risk Settlement Band',
    meaning: 'Worst-case containment: adverse findings combined with a regulatory or coverage cascade.',
    requirement: 'TAIL (≥2 flags): any two tail flags',
  },
};

// ---------------------------------------------------------------------------
// Flag sets
// ---------------------------------------------------------------------------

function asValidationFlag(id: string): ValidationFlag | undefined {
  return VALIDATION_FLAGS.find((flag) => flag === id);
}

function asTailFlag(id: string): TailFlag | undefined {
  return TAIL_FLAGS.find((flag) => flag === id);
}

/**
 * Build a FlagSet from raw identifiers. Matching is exact and case-sensitive;
 * every unrecognised identifier is reported in a single UnknownFlagError.
 */
export function createFlagSet(ids: Iterable<string>): FlagSet {
  const validation = new Set<ValidationFlag>();
  const tail = new Set<TailFlag>();
  const unknown: string[] = [];

  for (const id of ids) {
    const validationFlag = asValidationFlag(id);
    if (validationFlag) {
      validation.add(validationFlag);
      continue;
    }
    const tailFlag = asTailFlag(id);
    if (tailFlag) {
      tail.add(tailFlag);
      continue;
    }
    unknown.push(id);
  }

  if (unknown.length > 0) {
    throw new UnknownFlagError(unknown);
  }

  // Vocabulary order keeps equal sets structurally equal.
  return Object.freeze({
    validation: Object.freeze(VALIDATION_FLAGS.filter((flag) => validation.has(flag))),
    tail: Object.freeze(TAIL_FLAGS.filter((flag) => tail.has(flag))),
  });
}

/** Typed construction: unknown identifiers fail to compile. */
export function flagSetOf(...flags: SettlementFlag[]): FlagSet {
  return createFlagSet(flags);
}

export function activeFlags(flags: FlagSet): SettlementFlag[] {
  return [...flags.validation, ...flags.tail];
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function formatMillions(gbp: number): string {
  return `£${(gbp / 1_000_000).toFixed(1)}m`;
}

export function formatGbpRange(range: BandRange): string {
  return `${formatMillions(range.minimumGbp)}–${formatMillions(range.maximumGbp)}`;
}

function bandFor(flags: FlagSet): SettlementBand {
  if (flags.tail.length >= BAND_TRIGGERS.TAIL_MIN_FLAGS) return 'TAIL';
  if (flags.validation.length >= BAND_TRIGGERS.VALIDATION_MIN_FLAGS) return 'VALIDATION';
  return 'BASE';
}

export function resolveBand(flags: FlagSet): BandResolution {
  const band = bandFor(flags);
  const range = BAND_RANGES[band];
  return { band, range: { ...range }, rangeLabel: formatGbpRange(range) };
}

/** The flags still needed to reach the band above the current one. */
export function whatMovesUp(flags: FlagSet): BandEscalation {
  const band = bandFor(flags);

  if (band === 'BASE') {
    const missingFlags = VALIDATION_FLAGS.filter((flag) => !flags.validation.includes(flag));
    return {
      nextBand: 'VALIDATION',
      nextRange: formatGbpRange(BAND_RANGES.VALIDATION),
      flagsNeeded: BAND_TRIGGERS.VALIDATION_MIN_FLAGS,
      missingFlags,
      message: `Need ${BAND_TRIGGERS.VALIDATION_MIN_FLAGS} validation flag from: ${missingFlags.join(', ')}`,
    };
  }

  if (band === 'VALIDATION') {
    const missingFlags = TAIL_FLAGS.filter((flag) => !flags.tail.includes(flag));
    const flagsNeeded = BAND_TRIGGERS.TAIL_MIN_FLAGS - flags.tail.length;
    return {
      nextBand: 'TAIL',
      nextRange: formatGbpRange(BAND_RANGES.TAIL),
      flagsNeeded,
      missingFlags,
      message: `Need ${flagsNeeded} more tail flag(s) from: ${missingFlags.join(', ')}`,
    };
  }

  return {
    nextBand: null,
    nextRange: null,
    flagsNeeded: 0,
    missingFlags: [],
    message: 'Maximum band reached: no higher band exists in this framework.',
  };
}

export function summarizeBand(flags: FlagSet, snapshot?: EngineSnapshot): BandSummary {
  const { band, range, rangeLabel } = resolveBand(flags);
  const definition = BAND_DEFINITIONS[band];
  const active = activeFlags(flags);

  const summary: BandSummary = {
    currentBand: band,
    currentBandName: definition.name,
    currentRange: rangeLabel,
    minimumGbp: range.minimumGbp,
    maximumGbp: range.maximumGbp,
    meaning: definition.meaning,
    activeFlags: active,
    flagCount: active.length,
    whatMovesUp: whatMovesUp(flags),
    inactiveBands: SETTLEMENT_BANDS.filter((other) => other !== band).map((other) => ({
      band: other,
      name: BAND_DEFINITIONS[other].name,
      range: formatGbpRange(BAND_RANGES[other]),
      requirement: BAND_DEFINITIONS[other].requirement,
    })),
  };

  if (snapshot) {
    summary.display = {
      release: snapshot.release,
      decision: snapshot.evaluation.decision,
      leverageScore: snapshot.scores.leverageScore,
    };
  }

  return summary;
}
