import { describe, it, expect } from 'vitest';
import engineRouter from '../../../src/leverage-api/routes/engine';
import { listRoutes } from './helpers';

describe('engine router', () => {
  it('runs the engine and reads stored snapshots', () => {
    expect(listRoutes(engineRouter)).toEqual([
      'POST /run',
      'GET /snapshots',
      'GET /snapshots/:id',
    ]);
  });
});
