import { describe, it, expect } from 'vitest';
import { TokenBucket } from '../../src/backend/rate-limiter.js';

describe('TokenBucket', () => {
    it('rejects a rate that is not positive', () => {
        expect(() => new TokenBucket(0)).toThrow('Rate must be positive, got 0');
        expect(() => new TokenBucket(-3)).toThrow('Rate must be positive, got -3');
    });

    it('starts full and allows a burst of one second', () => {
        const bucket = new TokenBucket(2, undefined, () => 0);

        expect(bucket.capacity).toBe(2);
        expect(bucket.tryAcquire()).toBe(true);
        expect(bucket.tryAcquire()).toBe(true);
        expect(bucket.tryAcquire()).toBe(false);
    });

    it('refills continuously at the configured rate', () => {
        let clock = 0;
        const bucket = new TokenBucket(2, undefined, () => clock);
        bucket.tryAcquire();
        bucket.tryAcquire();

        clock = 250;
        expect(bucket.available).toBe(0.5);
        expect(bucket.tryAcquire()).toBe(false);

        clock = 500;
        expect(bucket.tryAcquire()).toBe(true);
        expect(bucket.available).toBe(0);
    });

    it('never holds more than its capacity', () => {
        let clock = 0;
        const bucket = new TokenBucket(2, undefined, () => clock);
        bucket.tryAcquire();

        clock = 10000;
        expect(bucket.available).toBe(2);
    });

    it('holds at least one token for slow rates', () => {
        expect(new TokenBucket(0.5).capacity).toBe(1);
    });

    it('takes an explicit capacity', () => {
        expect(new TokenBucket(1, 5, () => 0).available).toBe(5);
    });
});
