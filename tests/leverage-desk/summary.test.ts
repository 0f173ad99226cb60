import { describe, it, expect } from 'vitest';
import { runEngine } from '@engine';
import { formatCaseSummary, formatGbp } from '@desk/summary';

describe('formatGbp', () => {
  it('groups thousands and drops pence', () => {
    expect(formatGbp(5_000_000)).toBe('£5,000,000');
    expect(formatGbp(1234.6)).toBe('£1,235');
  });
});

describe('formatCaseSummary', () => {
  const snapshot = runEngine({ claimValidity: 0.38, proceduralAdvantage: 0.86, costAsymmetry: 0.75 });
  const lines = formatCaseSummary(snapshot).split('\n');

  it('frames the report with rules and the release', () => {
    expect(lines[0]).toBe('='.repeat(60));
    expect(lines[1]).toBe('PROCEDURAL LEVERAGE ENGINE - CASE ANALYSIS (release 1.3.0)');
    expect(lines[lines.length - 1]).toBe('='.repeat(60));
  });

  it('prints the scores and the decision', () => {
    expect(lines).toContain('  Claim Validity:       0.38');
    expect(lines).toContain('  Leverage Score:       0.641');
    expect(lines).toContain('  Cost Pressure:        6.41');
    expect(lines).toContain('  Action:               HOLD');
    expect(lines).toContain('  Confidence:           MODERATE');
    expect(lines).toContain('  Escalation Triggered: No');
  });

  it('includes every interpretation phrase', () => {
    for (const phrase of Object.values(snapshot.interpretation)) {
      expect(lines).toContain(`  ${phrase}`);
    }
  });
});
