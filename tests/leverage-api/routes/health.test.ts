import { describe, it, expect } from 'vitest';
import healthRouter from '../../../src/leverage-api/routes/health';
import { listRoutes } from './helpers';

describe('health router', () => {
  it('exposes GET /health', () => {
    expect(listRoutes(healthRouter)).toEqual(['GET /health']);
  });
});
