/**
 * Tests for point identity and vector checks
 *
 * @module tests/unit/vector-store/types
 */

import { describe, it, expect } from 'vitest';
import { validate as isUuid } from 'uuid';
import { StoreError, assertVector, pointId } from '../../../src/services/vector-store/types.js';
import { FINGERPRINT } from './helpers.js';

describe('pointId', () => {
  it('should be a stable UUID per fingerprint and chunk index', () => {
    const id = pointId(FINGERPRINT, 0);

    expect(isUuid(id)).toBe(true);
    expect(pointId(FINGERPRINT, 0)).toBe(id);
    expect(pointId(FINGERPRINT, 1)).not.toBe(id);
    expect(pointId('sha256:' + 'cd'.repeat(32), 0)).not.toBe(id);
  });
});

describe('assertVector', () => {
  it('should accept a finite vector of the right length', () => {
    expect(() => assertVector(Float32Array.of(0.1, 0.2), 2, 'query')).not.toThrow();
  });

  it('should reject a length mismatch with INVALID_VECTOR', () => {
    let caught: unknown;
    try {
      assertVector(Float32Array.of(1, 2, 3), 2, 'query');
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof StoreError)) throw new Error('Expected a StoreError');
    expect(caught.code).toBe('INVALID_VECTOR');
    expect(caught.retryable).toBe(false);
    expect(caught.message).toBe('Vector for query has 3 dimensions, collection expects 2');
  });

  it('should reject NaN and infinite components', () => {
    expect(() => assertVector(Float32Array.of(1, Number.NaN), 2, 'point p')).toThrow(
      'Vector for point p contains non-finite values'
    );
    expect(() => assertVector(Float32Array.of(Infinity, 0), 2, 'point p')).toThrow(StoreError);
  });
});
