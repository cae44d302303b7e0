import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ReplayCache } from '../replay-cache.js';
import type { ResultEnvelope } from '../types.js';

function reply(correlationId: string): Promise<ResultEnvelope> {
  return Promise.resolve({ correlationId, status: 'ok', payload: correlationId });
}

describe('ReplayCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the reply recorded for a correlation id', () => {
    const cache = new ReplayCache(1000);
    const first = reply('c-1');
    cache.begin('c-1', first);

    expect(cache.get('c-1')).toBe(first);
    expect(cache.get('c-2')).toBeUndefined();
  });

  it('expires completed entries in completion order and keeps in-flight ones', () => {
    const cache = new ReplayCache(1000);
    cache.begin('a', reply('a'));
    cache.begin('b', reply('b'));
    cache.begin('c', reply('c'));

    cache.complete('b');
    vi.advanceTimersByTime(500);
    cache.complete('a');
    vi.advanceTimersByTime(700);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBeDefined();
    expect(cache.get('c')).toBeDefined();
    expect(cache.size).toBe(2);

    vi.advanceTimersByTime(10_000);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('c')).toBeDefined();
    expect(cache.size).toBe(1);
  });

  it('keeps an entry for exactly the ttl after completion', () => {
    const cache = new ReplayCache(1000);
    cache.begin('c-1', reply('c-1'));
    cache.complete('c-1');

    vi.advanceTimersByTime(1000);
    expect(cache.get('c-1')).toBeDefined();

    vi.advanceTimersByTime(1);
    expect(cache.get('c-1')).toBeUndefined();
  });

  it('prunes against an explicit clock', () => {
    const cache = new ReplayCache(1000);
    cache.begin('c-1', reply('c-1'));
    cache.complete('c-1', 5_000);
    cache.begin('c-2', reply('c-2'));
    cache.complete('c-2', 5_800);

    cache.prune(6_100);

    expect(cache.size).toBe(1);
  });
});
