import Bottleneck from "bottleneck";

const ONE_MINUTE_MS = 60_000;

export function createRateLimiter(concurrency: number, reservoir?: number): Bottleneck {
    const baseOptions = {
        maxConcurrent: Math.max(1, concurrency),
    };

    if (reservoir && Number.isFinite(reservoir)) {
        const amount = Math.max(1, Math.floor(reservoir));
        const options: Bottleneck.ConstructorOptions = {
            ...baseOptions,
            reservoir: amount,
            reservoirRefreshAmount: amount,
            reservoirRefreshInterval: ONE_MINUTE_MS,
        };
        return new Bottleneck(options);
    }

    return new Bottleneck(baseOptions);
}

/**
 * One single-slot limiter per key: jobs scheduled under the same key run strictly
 * one after another, jobs under different keys run independently.
 * Idle limiters are dropped after `idleTimeoutMs`.
 */
export function createKeyedSerialQueue(idleTimeoutMs = 5 * ONE_MINUTE_MS): Bottleneck.Group {
    return new Bottleneck.Group({
        maxConcurrent: 1,
        timeout: idleTimeoutMs,
    });
}
