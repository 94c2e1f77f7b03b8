/**
 * Tests for timeout utilities
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import _ from 'lodash';
import { withTimeout } from '../../src/utils/timeout.js';

describe('withTimeout', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('returns the result when the operation completes first', async () => {
        await expect(withTimeout(Promise.resolve('success'), 5000, 'Timeout')).resolves.toBe('success');
    });

    it('rejects with the given message when the operation is too slow', async () => {
        vi.useFakeTimers();
        const pending = withTimeout(new Promise<never>(_.noop), 100, 'Operation timed out');
        const settled = expect(pending).rejects.toThrow('Operation timed out');

        await vi.advanceTimersByTimeAsync(100);

        await settled;
    });

    it('propagates errors from the operation', async () => {
        await expect(withTimeout(Promise.reject(new Error('Operation failed')), 5000, 'Timeout')).rejects.toThrow('Operation failed');
    });

    it('clears its timer once the operation settles', async () => {
        vi.useFakeTimers();

        await withTimeout(Promise.resolve(1), 1000, 'Timeout');

        expect(vi.getTimerCount()).toBe(0);
    });

    it('handles a batch with mixed outcomes', async () => {
        const results = await Promise.allSettled([
            withTimeout(Promise.resolve('fast'), 100, 'Timeout'),
            withTimeout(new Promise<never>(_.noop), 10, 'Too slow'),
            withTimeout(Promise.resolve('also fast'), 100, 'Timeout'),
        ]);

        expect(_.map(results, 'status')).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    });
});
