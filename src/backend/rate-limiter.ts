/**
 * Token bucket for forwarded requests
 *
 * Holds up to `capacity` tokens (one second's worth by default) and refills
 * continuously at `ratePerSecond`. Each forwarded request takes one token.
 */

export class TokenBucket {
    private tokens: number;
    private lastRefill: number;
    readonly capacity: number;

    constructor(
        readonly ratePerSecond: number,
        capacity?: number,
        private readonly now: () => number = Date.now
    ) {
        if(!(ratePerSecond > 0)) {
            throw new Error(`Rate must be positive, got ${ratePerSecond}`);
        }
        this.capacity = capacity ?? Math.max(1, ratePerSecond);
        this.tokens = this.capacity;
        this.lastRefill = this.now();
    }

    private refill(): void {
        const current = this.now();
        const elapsedSeconds = Math.max(0, current - this.lastRefill) / 1000;
        this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.ratePerSecond);
        this.lastRefill = current;
    }

    /** Tokens currently available, after refilling */
    get available(): number {
        this.refill();
        return this.tokens;
    }

    /**
     * Take one token if there is one
     */
    tryAcquire(): boolean {
        this.refill();
        if(this.tokens < 1) {
            return false;
        }
        this.tokens -= 1;
        return true;
    }
}
