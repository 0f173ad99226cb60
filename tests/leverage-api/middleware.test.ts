import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import { z } from 'zod';
import { ContractError, createFlagSet, runEngine } from '@engine';
import { asyncRoute, statusFor, toErrorResponse } from '../../src/leverage-api/middleware/index';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// statusFor
// ---------------------------------------------------------------------------

describe('statusFor', () => {
  it('maps caller-input defects to 400', () => {
    const domain = captureError(() => runEngine({ claimValidity: 2, proceduralAdvantage: 0, costAsymmetry: 0 }));
    const unknownFlag = captureError(() => createFlagSet(['nope']));
    const zod = captureError(() => z.number().parse('x'));
    expect(statusFor(domain)).toBe(400);
    expect(statusFor(unknownFlag)).toBe(400);
    expect(statusFor(zod)).toBe(400);
    expect(statusFor(new RangeError('steps'))).toBe(400);
  });

  it('maps contract violations and anything else to 500', () => {
    expect(statusFor(new ContractError('bad score'))).toBe(500);
    expect(statusFor(new Error('boom'))).toBe(500);
  });
});

// ---------------------------------------------------------------------------
// errorHandler
// ---------------------------------------------------------------------------

describe('toErrorResponse', () => {
  it('returns the error envelope with the mapped status', () => {
    const err = captureError(() => createFlagSet(['bogus']));
    expect(toErrorResponse(err)).toEqual({
      status: 400,
      body: { success: false, error: 'Unknown settlement flag(s): bogus' },
    });
  });

  it('formats zod issues with their paths', () => {
    const err = captureError(() => z.object({ steps: z.number() }).parse({ steps: 'x' }));
    expect(toErrorResponse(err)).toEqual({
      status: 400,
      body: { success: false, error: 'steps: Expected number, received string' },
    });
  });

  it('reports non-error throwables as text', () => {
    expect(toErrorResponse('plain failure')).toEqual({
      status: 500,
      body: { success: false, error: 'plain failure' },
    });
  });
});

// ---------------------------------------------------------------------------
// asyncRoute
// ---------------------------------------------------------------------------

describe('asyncRoute', () => {
  it('forwards a rejection to next', async () => {
    const failure = new Error('db down');
    const next = vi.fn<(err?: unknown) => void>();
    const handler = asyncRoute(async () => {
      throw failure;
    });
    handler(express.request, express.response, next);
    await vi.waitFor(() => expect(next).toHaveBeenCalledWith(failure));
  });
});
