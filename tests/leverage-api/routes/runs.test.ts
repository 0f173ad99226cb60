import { describe, it, expect } from 'vitest';
import runsRouter, { createRunRequestSchema } from '../../../src/leverage-api/routes/runs';
import { listRoutes } from './helpers';

const fixed = { kind: 'fixed', value: 0.5 } as const;

describe('runs router', () => {
  it('creates, lists and reads runs', () => {
    expect(listRoutes(runsRouter)).toEqual(['POST /', 'GET /', 'GET /:id']);
  });
});

describe('createRunRequestSchema', () => {
  it('defaults to one thousand samples', () => {
    const body = createRunRequestSchema.parse({
      distributions: { claimValidity: fixed, proceduralAdvantage: fixed, costAsymmetry: fixed },
    });
    expect(body.samples).toBe(1_000);
    expect(body.seed).toBeUndefined();
  });

  it('rejects an unknown distribution kind', () => {
    const result = createRunRequestSchema.safeParse({
      distributions: {
        claimValidity: { kind: 'beta', alpha: 2, beta: 5 },
        proceduralAdvantage: fixed,
        costAsymmetry: fixed,
      },
    });
    expect(result.success).toBe(false);
  });
});
