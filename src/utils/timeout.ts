/**
 * Timeout Utilities
 */

/**
 * Race a promise against a timeout, clearing the timer whichever side wins.
 *
 * @example
 * const descriptor = await withTimeout(prober.probe(server), 30000, 'Probe timed out after 30s');
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    timeoutMessage: string
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    try {
        const timeoutPromise = new Promise<never>((_resolve, reject) => {
            timeoutHandle = setTimeout(() => {
                reject(new Error(timeoutMessage));
            }, timeoutMs);
        });

        return await Promise.race([promise, timeoutPromise]);
    } finally {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
    }
}
