import { describe, it, expect } from 'vitest';
import { TAIL_FLAGS, VALIDATION_FLAGS } from '@shared/constants';
import {
  BAND_RANGES,
  UnknownFlagError,
  createFlagSet,
  flagSetOf,
  formatGbpRange,
  resolveBand,
  runEngine,
  summarizeBand,
  whatMovesUp,
} from '@engine';

// ---------------------------------------------------------------------------
// Flag sets
// ---------------------------------------------------------------------------

describe('createFlagSet', () => {
  it('splits identifiers by vocabulary in vocabulary order', () => {
    const flags = createFlagSet(['sra_formal_action', 'police_metadata_validated', 'adverse_judicial_language']);
    expect(flags.validation).toEqual(['police_metadata_validated']);
    expect(flags.tail).toEqual(['adverse_judicial_language', 'sra_formal_action']);
  });

  it('collapses duplicates', () => {
    const flags = createFlagSet(['insurer_reserves_rights', 'insurer_reserves_rights']);
    expect(flags.validation).toEqual(['insurer_reserves_rights']);
  });

  it('rejects every unknown identifier in one error', () => {
    let caught: unknown;
    try {
      createFlagSet(['judicial_comment_on_record', 'Judicial_Comment_On_Record', 'made_up']);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UnknownFlagError);
    expect(caught instanceof UnknownFlagError && caught.unknownFlags).toEqual([
      'Judicial_Comment_On_Record',
      'made_up',
    ]);
    expect(caught instanceof Error && caught.message).toBe(
      'Unknown settlement flag(s): Judicial_Comment_On_Record, made_up',
    );
  });

  it('returns frozen sets', () => {
    const flags = flagSetOf('sra_investigation_open');
    expect(Object.isFrozen(flags)).toBe(true);
    expect(Object.isFrozen(flags.validation)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

describe('resolveBand', () => {
  it('resolves an empty set to BASE', () => {
    const result = resolveBand(createFlagSet([]));
    expect(result.band).toBe('BASE');
    expect(result.rangeLabel).toBe('£2.5m–£4.0m');
  });

  it('resolves a single validation flag to VALIDATION', () => {
    const result = resolveBand(flagSetOf('judicial_comment_on_record'));
    expect(result.band).toBe('VALIDATION');
    expect(result.rangeLabel).toBe('£5.0m–£9.0m');
  });

  it('resolves two tail flags to TAIL over any validation flag', () => {
    const result = resolveBand(
      flagSetOf('adverse_judicial_language', 'sra_formal_action', 'judicial_comment_on_record'),
    );
    expect(result.band).toBe('TAIL');
    expect(result.rangeLabel).toBe('£12.0m–£15.0m');
  });

  it('keeps a single tail flag in BASE', () => {
    expect(resolveBand(flagSetOf('insurance_coverage_stress')).band).toBe('BASE');
  });

  it('returns exactly one band for every combination of flags', () => {
    const vocabulary = [...VALIDATION_FLAGS, ...TAIL_FLAGS];
    for (let mask = 0; mask < 1 << vocabulary.length; mask++) {
      const ids = vocabulary.filter((_, i) => (mask & (1 << i)) !== 0);
      const { band, range } = resolveBand(createFlagSet(ids));
      expect(range).toEqual(BAND_RANGES[band]);
      if (band !== 'TAIL') expect(range.maximumGbp).toBeLessThan(15_000_000);
    }
  });
});

describe('band ranges', () => {
  it('are pairwise disjoint and ordered', () => {
    expect(BAND_RANGES.BASE.maximumGbp).toBeLessThan(BAND_RANGES.VALIDATION.minimumGbp);
    expect(BAND_RANGES.VALIDATION.maximumGbp).toBeLessThan(BAND_RANGES.TAIL.minimumGbp);
  });

  it('caps BASE at £4m and VALIDATION at £9m', () => {
    expect(BAND_RANGES.BASE.maximumGbp).toBeLessThanOrEqual(4_000_000);
    expect(BAND_RANGES.VALIDATION.maximumGbp).toBeLessThanOrEqual(9_000_000);
    expect(BAND_RANGES.TAIL.maximumGbp).toBe(15_000_000);
  });

  it('formats with one decimal and an en dash', () => {
    expect(formatGbpRange({ minimumGbp: 2_500_000, maximumGbp: 4_000_000 })).toBe('£2.5m–£4.0m');
  });
});

// ---------------------------------------------------------------------------
// What moves up
// ---------------------------------------------------------------------------

describe('whatMovesUp', () => {
  it('lists the validation flags still missing from BASE', () => {
    const result = whatMovesUp(flagSetOf('adverse_judicial_language'));
    expect(result.nextBand).toBe('VALIDATION');
    expect(result.nextRange).toBe('£5.0m–£9.0m');
    expect(result.flagsNeeded).toBe(1);
    expect(result.missingFlags).toEqual([...VALIDATION_FLAGS]);
  });

  it('counts the tail flags still needed from VALIDATION', () => {
    const result = whatMovesUp(flagSetOf('sra_investigation_open', 'criminal_investigation_escalation'));
    expect(result.nextBand).toBe('TAIL');
    expect(result.flagsNeeded).toBe(1);
    expect(result.missingFlags).toEqual([
      'adverse_judicial_language',
      'sra_formal_action',
      'insurance_coverage_stress',
      'administrative_override_admitted',
    ]);
    expect(result.message).toBe(
      'Need 1 more tail flag(s) from: adverse_judicial_language, sra_formal_action, insurance_coverage_stress, administrative_override_admitted',
    );
  });

  it('reports the maximum band from TAIL', () => {
    const result = whatMovesUp(flagSetOf('sra_formal_action', 'insurance_coverage_stress'));
    expect(result.nextBand).toBeNull();
    expect(result.flagsNeeded).toBe(0);
    expect(result.missingFlags).toEqual([]);
    expect(result.message).toContain('Maximum band reached');
  });
});

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

describe('summarizeBand', () => {
  it('describes the current band and the bands not reached', () => {
    const summary = summarizeBand(flagSetOf('judicial_comment_on_record'));
    expect(summary.currentBand).toBe('VALIDATION');
    expect(summary.currentBandName).toBe('Validation Settlement Band');
    expect(summary.currentRange).toBe('£5.0m–£9.0m');
    expect(summary.minimumGbp).toBe(5_000_000);
    expect(summary.maximumGbp).toBe(9_000_000);
    expect(summary.activeFlags).toEqual(['judicial_comment_on_record']);
    expect(summary.flagCount).toBe(1);
    expect(summary.inactiveBands.map((b) => b.band)).toEqual(['BASE', 'TAIL']);
    expect(summary.display).toBeUndefined();
  });

  it('attaches snapshot context for display without changing the band', () => {
    const snapshot = runEngine({ claimValidity: 1, proceduralAdvantage: 1, costAsymmetry: 1 });
    const summary = summarizeBand(createFlagSet([]), snapshot);
    expect(summary.currentBand).toBe('BASE');
    expect(summary.display).toEqual({ release: '1.3.0', decision: 'ACCEPT', leverageScore: 1 });
  });
});
