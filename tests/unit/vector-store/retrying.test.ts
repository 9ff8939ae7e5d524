/**
 * Tests for retrying vector store writes
 *
 * @module tests/unit/vector-store/retrying
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  DEFAULT_RETRY_POLICY,
  RetryingVectorStore,
  retryDelay,
} from '../../../src/services/vector-store/retrying.js';
import { MemoryVectorStore } from '../../helpers/fakes.js';
import { point } from './helpers.js';

const NO_JITTER = { ...DEFAULT_RETRY_POLICY, jitter: 0 };

describe('retryDelay', () => {
  it('should double the base delay per retry', () => {
    expect([0, 1, 2].map((retry) => retryDelay(retry, NO_JITTER))).toEqual([200, 400, 800]);
  });

  it('should cap at maxDelayMs', () => {
    expect(retryDelay(10, NO_JITTER)).toBe(5_000);
  });

  it('should stay within the jitter band', () => {
    expect(retryDelay(0, DEFAULT_RETRY_POLICY, () => 0)).toBe(150);
    expect(retryDelay(0, DEFAULT_RETRY_POLICY, () => 1)).toBe(250);
    expect(retryDelay(0, DEFAULT_RETRY_POLICY, () => 0.5)).toBe(200);
  });
});

describe('RetryingVectorStore', () => {
  let inner: MemoryVectorStore;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(async () => {
    sleep.mockClear();
    inner = new MemoryVectorStore();
    await inner.ensureCollection('docs', 4);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should keep the inner store kind', () => {
    expect(new RetryingVectorStore(inner).kind).toBe('memory');
  });

  it('should retry retryable failures until one succeeds', async () => {
    const store = new RetryingVectorStore(inner, { jitter: 0 }, sleep);
    inner.failUpserts = 2;

    await store.upsert('docs', [point('/a.pdf', 0, [1, 0, 0, 0])]);

    expect(inner.upsertCalls).toBe(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 400]);
    expect(await store.count('docs')).toBe(1);
  });

  it('should give up and rethrow the last failure after the configured attempts', async () => {
    const store = new RetryingVectorStore(inner, { attempts: 2 }, sleep);
    inner.failUpserts = 5;

    await expect(store.upsert('docs', [point('/a.pdf', 0, [1, 0, 0, 0])])).rejects.toThrow(
      'Store temporarily unavailable'
    );
    expect(inner.upsertCalls).toBe(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('should not retry permanent failures', async () => {
    const store = new RetryingVectorStore(inner, {}, sleep);

    await expect(store.upsert('docs', [point('/a.pdf', 0, [1, 0])])).rejects.toThrow('has 2 dimensions');
    await expect(store.ensureCollection('docs', 8)).rejects.toThrow('has dimension 4');

    expect(inner.upsertCalls).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should not retry errors that are not StoreErrors', async () => {
    const count = vi.spyOn(inner, 'count').mockRejectedValue(new Error('socket hang up'));
    const store = new RetryingVectorStore(inner, {}, sleep);

    await expect(store.count('docs')).rejects.toThrow('socket hang up');
    expect(count).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
