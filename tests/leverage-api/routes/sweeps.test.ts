import { describe, it, expect } from 'vitest';
import sweepsRouter, { sweepRequestSchema, whatIfRequestSchema } from '../../../src/leverage-api/routes/sweeps';
import { dispatch, listRoutes } from './helpers';

const base = { claimValidity: 0.5, proceduralAdvantage: 0.5, costAsymmetry: 0.5 };

describe('sweeps router', () => {
  it('exposes sweeps, presets and what-if comparisons', () => {
    expect(listRoutes(sweepsRouter)).toEqual(['POST /', 'GET /presets', 'POST /what-if']);
  });
});

describe('sweepRequestSchema', () => {
  it('defaults to twenty steps', () => {
    expect(sweepRequestSchema.parse({ base, field: 'claimValidity' }).steps).toBe(20);
  });

  it('rejects an unknown field', () => {
    expect(sweepRequestSchema.safeParse({ base, field: 'luck' }).success).toBe(false);
  });
});

describe('whatIfRequestSchema', () => {
  it('takes a base profile or a preset, not both', () => {
    expect(whatIfRequestSchema.safeParse({ base }).success).toBe(true);
    expect(whatIfRequestSchema.safeParse({ preset: 'nuclear' }).success).toBe(true);
    expect(whatIfRequestSchema.safeParse({ base, preset: 'nuclear' }).success).toBe(false);
    expect(whatIfRequestSchema.safeParse({}).success).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

describe('POST /sweeps', () => {
  it('returns points and the decision boundaries', async () => {
    const { status, body } = await dispatch(sweepsRouter, 'POST', '/', { base, field: 'claimValidity', steps: 3 });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      data: {
        points: [
          { value: 0, leverageScore: 0.3, decision: 'COUNTER' },
          { value: 0.5, leverageScore: 0.5, decision: 'HOLD' },
          { value: 1, leverageScore: 0.7, decision: 'HOLD' },
        ],
        boundaries: [{ from: 'COUNTER', to: 'HOLD', between: [0, 0.5] }],
      },
    });
  });

  it('answers 400 naming the bad field', async () => {
    const { status, body } = await dispatch(sweepsRouter, 'POST', '/', { base, field: 'luck' });

    expect(status).toBe(400);
    expect(body).toMatchObject({ success: false });
  });
});

describe('GET /sweeps/presets', () => {
  it('lists the presets by id', async () => {
    const { body } = await dispatch(sweepsRouter, 'GET', '/presets');

    expect(body).toMatchObject({
      success: true,
      data: [
        { id: 'baseline', values: { claimValidity: 0.38, proceduralAdvantage: 0.86, costAsymmetry: 0.75 } },
        { id: 'authority_collapse' },
        { id: 'procedural_win' },
        { id: 'cost_spike' },
        { id: 'nuclear' },
      ],
    });
  });
});

describe('POST /sweeps/what-if', () => {
  it('compares the scenarios for a preset', async () => {
    const { status, body } = await dispatch(sweepsRouter, 'POST', '/what-if', { preset: 'baseline' });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      data: {
        base: { claimValidity: 0.38, proceduralAdvantage: 0.86, costAsymmetry: 0.75 },
        scenarios: [
          { scenario: 'baseline', leverageScore: 0.641 },
          { scenario: 'judge_hostile', leverageScore: 0.536 },
          { scenario: 'costs_spike', leverageScore: 0.541 },
          { scenario: 'invalidity_collapses', leverageScore: 0.489, decision: 'COUNTER' },
          { scenario: 'evidence_breakthrough', leverageScore: 0.79, escalationZone: 'CRITICAL' },
        ],
      },
    });
  });

  it('answers 400 when both a base and a preset are given', async () => {
    const { status, body } = await dispatch(sweepsRouter, 'POST', '/what-if', { base, preset: 'baseline' });

    expect(status).toBe(400);
    expect(body).toEqual({ success: false, error: 'Provide exactly one of base or preset' });
  });
});
