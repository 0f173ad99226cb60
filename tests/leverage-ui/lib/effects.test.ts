import { describe, it, expect, vi } from 'vitest';
import { runUnlessCancelled } from '@ui/lib/effects';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

// ---------------------------------------------------------------------------
// runUnlessCancelled
// ---------------------------------------------------------------------------

describe('runUnlessCancelled', () => {
  it('applies the result when not cancelled', async () => {
    const apply = vi.fn<(value: string) => void>();
    runUnlessCancelled(() => Promise.resolve('VALIDATION'), apply);
    await vi.waitFor(() => expect(apply).toHaveBeenCalledWith('VALIDATION'));
  });

  it('keeps the newer result when an older request resolves last', async () => {
    const older = deferred<string>();
    const newer = deferred<string>();
    const applied: string[] = [];

    const cancelOlder = runUnlessCancelled(() => older.promise, (value) => applied.push(value));
    cancelOlder();
    runUnlessCancelled(() => newer.promise, (value) => applied.push(value));

    newer.resolve('TAIL');
    await newer.promise;
    older.resolve('BASE');
    await older.promise;
    await Promise.resolve();

    expect(applied).toEqual(['TAIL']);
  });

  it('reports failures only for live requests', async () => {
    const onError = vi.fn<(err: unknown) => void>();
    const live = deferred<string>();
    const stale = deferred<string>();

    runUnlessCancelled(() => live.promise, () => {}, onError);
    const cancelStale = runUnlessCancelled(() => stale.promise, () => {}, onError);
    cancelStale();

    stale.reject(new Error('stale'));
    live.reject(new Error('offline'));

    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    expect(onError).toHaveBeenCalledWith(new Error('offline'));
  });
});
