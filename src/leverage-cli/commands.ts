// src/leverage-cli/commands.ts
// One command, one output. No prompts, no loops.

import { parseArgs } from 'util';
import { ZodError } from 'zod';
import {
  DomainError,
  UnknownFlagError,
  createFlagSet,
  runEngine,
  summarizeBand,
} from '@engine';
import { FACT_STATUSES, JOURNAL_ENTRY_TYPES, SCENARIO_PRESET_NAMES } from '@shared/constants';
import type { EvidenceValues } from '@shared/types';
import { formatCaseSummary } from '@desk/summary';
import { draftSettlementLetter, explainWhatMovesUp } from '@desk/settlement-letter';
import { runMonteCarlo } from '@desk/monte-carlo';
import { getPreset } from '@desk/presets';
import { compareScenarios, formatScenarioComparison } from '@desk/sweeps';
import { samplingToCsv } from '@desk/export';
import { FileJournalStore, formatJournal, journalEntryInputSchema } from '@desk/journal';

export const EXIT = { OK: 0, FAILURE: 1, USAGE: 2 } as const;

export const USAGE = `Usage: leverage <command> [options]

Commands:
  run      --validity <n> --procedural <n> --asymmetry <n> [--json]
  run      --preset <${SCENARIO_PRESET_NAMES.join('|')}> [--validity <n>] ... [--what-if]
  bands    [--flag <id>]... [--explain] [--letter --case-ref <ref> --claimant <name>
           --respondent <name> --principal <gbp>] [--json]
  sample   --validity <n> --procedural <n> --asymmetry <n> [--spread <n>]
           [--samples <n>] [--seed <n>] [--csv | --json]
  journal  add <text> [--type <${JOURNAL_ENTRY_TYPES.join('|')}>] [--status <${FACT_STATUSES.join('|')}>]
  journal  list [--limit <n>]`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  journalPath: string;
}

// ---------------------------------------------------------------------------
// Argument helpers
// ---------------------------------------------------------------------------

type Values = Record<string, string | boolean | string[] | undefined>;

function stringOption(values: Values, name: string): string | undefined {
  const value = values[name];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(values: Values, name: string, fallback?: number): number {
  const raw = stringOption(values, name);
  if (raw === undefined) {
    if (fallback !== undefined) return fallback;
    throw new UsageError(`--${name} is required`);
  }
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new UsageError(`--${name} must be a number, got "${raw}"`);
  }
  return value;
}

/** Explicit options win over the fallback profile, field by field. */
function evidenceOptions(values: Values, fallback?: EvidenceValues): EvidenceValues {
  return {
    claimValidity: numberOption(values, 'validity', fallback?.claimValidity),
    proceduralAdvantage: numberOption(values, 'procedural', fallback?.proceduralAdvantage),
    costAsymmetry: numberOption(values, 'asymmetry', fallback?.costAsymmetry),
  };
}

const json = (value: unknown): string => JSON.stringify(value, null, 2);

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function cmdRun(args: string[], io: CliIO): number {
  const { values } = parseArgs({
    args,
    options: {
      validity: { type: 'string' },
      procedural: { type: 'string' },
      asymmetry: { type: 'string' },
      preset: { type: 'string' },
      'what-if': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
  });
  const preset = values.preset === undefined ? undefined : getPreset(values.preset);
  const evidence = evidenceOptions(values, preset?.values);

  if (values['what-if']) {
    const rows = compareScenarios(evidence);
    io.out(values.json ? json(rows) : formatScenarioComparison(rows));
    return EXIT.OK;
  }

  const snapshot = runEngine(evidence);
  io.out(values.json ? json(snapshot) : formatCaseSummary(snapshot));
  return EXIT.OK;
}

function cmdBands(args: string[], io: CliIO): number {
  const { values } = parseArgs({
    args,
    options: {
      flag: { type: 'string', multiple: true, default: [] },
      explain: { type: 'boolean', default: false },
      letter: { type: 'boolean', default: false },
      'case-ref': { type: 'string' },
      claimant: { type: 'string' },
      respondent: { type: 'string' },
      principal: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
  });

  const summary = summarizeBand(createFlagSet(values.flag));

  if (values.letter) {
    io.out(
      draftSettlementLetter(summary, {
        caseReference: stringOption(values, 'case-ref') ?? '[Case Reference]',
        claimantName: stringOption(values, 'claimant') ?? '[Claimant]',
        respondentName: stringOption(values, 'respondent') ?? '[Respondent]',
        principalClaimGbp: numberOption(values, 'principal', 0),
      }),
    );
    return EXIT.OK;
  }
  if (values.explain) {
    io.out(explainWhatMovesUp(summary));
    return EXIT.OK;
  }
  if (values.json) {
    io.out(json(summary));
    return EXIT.OK;
  }

  io.out(
    [
      `Band:   ${summary.currentBandName} (${summary.currentBand})`,
      `Range:  ${summary.currentRange}`,
      `Flags:  ${summary.flagCount > 0 ? summary.activeFlags.join(', ') : 'none'}`,
      `Next:   ${summary.whatMovesUp.message}`,
    ].join('\n'),
  );
  return EXIT.OK;
}

function cmdSample(args: string[], io: CliIO): number {
  const { values } = parseArgs({
    args,
    options: {
      validity: { type: 'string' },
      procedural: { type: 'string' },
      asymmetry: { type: 'string' },
      spread: { type: 'string' },
      samples: { type: 'string' },
      seed: { type: 'string' },
      csv: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
  });

  const centre = evidenceOptions(values);
  const std = numberOption(values, 'spread', 0.05);
  const summary = runMonteCarlo({
    samples: numberOption(values, 'samples', 1_000),
    seed: numberOption(values, 'seed', 42),
    distributions: {
      claimValidity: { kind: 'normal', mean: centre.claimValidity, std },
      proceduralAdvantage: { kind: 'normal', mean: centre.proceduralAdvantage, std },
      costAsymmetry: { kind: 'normal', mean: centre.costAsymmetry, std },
    },
  });

  if (values.csv) {
    io.out(samplingToCsv(summary).trimEnd());
  } else if (values.json) {
    io.out(json(summary));
  } else {
    const pct = (share: number) => `${(share * 100).toFixed(1)}%`;
    io.out(
      [
        `Samples: ${summary.samples} (seed ${summary.seed})`,
        `Decisions: ${Object.entries(summary.decisionProportions)
          .map(([decision, share]) => `${decision} ${pct(share)}`)
          .join(', ')}`,
        `Leverage: mean ${summary.leverage.mean.toFixed(3)}, p5 ${summary.leverage.p5.toFixed(3)}, p95 ${summary.leverage.p95.toFixed(3)}`,
        `Escalation triggered: ${pct(summary.triggerRate)}`,
      ].join('\n'),
    );
  }
  return EXIT.OK;
}

async function cmdJournal(args: string[], io: CliIO): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      type: { type: 'string' },
      status: { type: 'string' },
      limit: { type: 'string' },
    },
  });
  const [action, ...rest] = positionals;
  const store = new FileJournalStore(io.journalPath);

  if (action === 'add') {
    const input = journalEntryInputSchema.parse({
      text: rest.join(' '),
      entryType: values.type,
      source: 'cli',
      factStatus: values.status ?? null,
    });
    const entry = await store.append(input);
    io.out(`Added entry ${entry.id} at ${entry.timestampUtc}`);
    return EXIT.OK;
  }

  if (action === 'list') {
    const entries = await store.list(numberOption(values, 'limit', 0));
    io.out(entries.length > 0 ? formatJournal(entries) : 'Journal is empty.');
    return EXIT.OK;
  }

  throw new UsageError('journal requires "add <text>" or "list"');
}

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

function isUsageFailure(err: unknown): boolean {
  if (err instanceof UsageError || err instanceof DomainError || err instanceof UnknownFlagError) return true;
  if (err instanceof ZodError || err instanceof RangeError) return true;
  // parseArgs rejects unknown options and missing values with ERR_PARSE_ARGS_* codes.
  return err instanceof TypeError && 'code' in err && String(err.code).startsWith('ERR_PARSE_ARGS');
}

export async function main(argv: string[], io: CliIO): Promise<number> {
  const command = argv.at(0);
  const args = argv.slice(1);
  try {
    switch (command) {
      case 'run':
        return cmdRun(args, io);
      case 'bands':
        return cmdBands(args, io);
      case 'sample':
        return cmdSample(args, io);
      case 'journal':
        return await cmdJournal(args, io);
      case undefined:
      case 'help':
      case '--help':
        io.out(USAGE);
        return command === undefined ? EXIT.USAGE : EXIT.OK;
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (isUsageFailure(err)) {
      io.err(`Error: ${message}`);
      if (err instanceof UsageError) io.err(USAGE);
      return EXIT.USAGE;
    }
    io.err(`Unexpected error: ${message}`);
    return EXIT.FAILURE;
  }
}
