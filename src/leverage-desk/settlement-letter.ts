// src/leverage-desk/settlement-letter.ts
// Court-safe prose built from a band summary. Reads the summary only; the
// band itself is always resolved by the engine.

import {
  BAND_DEFINITIONS,
  BAND_RANGES,
  formatGbpRange,
  type BandSummary,
} from '@engine';
import { SETTLEMENT_BANDS } from '@shared/constants';
import { formatGbp } from './summary';

export interface LetterParties {
  caseReference: string;
  claimantName: string;
  respondentName: string;
  /** Principal claim before any procedural premium. */
  principalClaimGbp: number;
  /** Days the proposal stays open. Defaults to 14. */
  openForDays?: number;
}

function titleCase(flag: string): string {
  return flag
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function flagLines(summary: BandSummary): string {
  if (summary.activeFlags.length === 0) return '  • None - base position applies';
  return summary.activeFlags.map((flag) => `  • ${titleCase(flag)}`).join('\n');
}

export function draftSettlementLetter(summary: BandSummary, parties: LetterParties): string {
  const { whatMovesUp: next } = summary;
  const openForDays = parties.openForDays ?? 14;
  const premium = Math.max(summary.minimumGbp - parties.principalClaimGbp, 0);
  const trigger = next.missingFlags[0] ?? 'additional developments';

  return `WITHOUT PREJUDICE SAVE AS TO COSTS

Settlement Proposal - ${parties.caseReference}

Dear Sirs,

Re: ${parties.claimantName} v ${parties.respondentName}

We write to set out our client's position regarding settlement of the above matter.

CURRENT SETTLEMENT BAND: ${summary.currentBandName}

On the procedural posture and the facts disclosed to date, this matter is assessed
as sitting in the ${summary.currentBandName} (${summary.currentRange}).

• Settlement floor: ${formatGbp(summary.minimumGbp)}
• Band ceiling: ${formatGbp(summary.maximumGbp)}
• Basis: ${summary.meaning}

FLAG ANALYSIS

Active flags supported by evidence (${summary.flagCount}):
${flagLines(summary)}

WHAT MOVES THIS UP A BAND?

${next.message}

Any material change in the flag profile (for example ${trigger}) would be
expected to trigger reassessment at the next band.

Our client invites settlement at not less than ${formatGbp(summary.minimumGbp)}, reflecting:

• Principal claim: ${formatGbp(parties.principalClaimGbp)}
• Procedural leverage premium (current band): ${formatGbp(premium)}

This proposal remains open for ${openForDays} days from the date of this letter.

Yours faithfully,

[Claimant's Solicitors]

---

Band Methodology Note:
Bands are graduated on objective procedural and factual flags. Each band requires
specific triggers, and the current band reflects only flags supported by evidence.
${bandLogicLines().join('\n')}
The Tail Risk range (${formatGbpRange(BAND_RANGES.TAIL)}) applies only where two or more tail flags are on record.
`;
}

function bandLogicLines(): string[] {
  return SETTLEMENT_BANDS.map(
    (band) => `• ${BAND_DEFINITIONS[band].requirement} (${formatGbpRange(BAND_RANGES[band])})`,
  );
}

/** Markdown panel describing the route to the next band. */
export function explainWhatMovesUp(summary: BandSummary): string {
  const next = summary.whatMovesUp;
  const heading = next.nextBand
    ? `## What Moves Us From ${summary.currentBand} to ${next.nextBand}?`
    : `## ${summary.currentBand} is the highest band`;

  const lines = [
    heading,
    '',
    `**Current Position:** ${summary.currentBandName}`,
    `• Active Flags: ${summary.flagCount}`,
    `• Settlement Floor: ${formatGbp(summary.minimumGbp)}`,
    '',
  ];

  if (next.nextBand && next.nextRange) {
    lines.push(
      `**Next Band:** ${next.nextBand} (${next.nextRange})`,
      `• Flags needed: ${next.flagsNeeded}`,
      '',
      '**Missing flags:**',
      ...next.missingFlags.slice(0, 3).map((flag) => `☐ ${titleCase(flag)}`),
    );
    if (next.missingFlags.length > 3) {
      lines.push(`… and ${next.missingFlags.length - 3} more`);
    }
  } else {
    lines.push(next.message);
  }

  lines.push(
    '',
    '**Band logic:**',
    ...bandLogicLines(),
    '',
    `Note: the ${formatGbp(BAND_RANGES.TAIL.maximumGbp)} ceiling is reachable only in TAIL.`,
  );

  return lines.join('\n');
}
