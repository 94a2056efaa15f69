/**
 * Anything that takes a warning; the winston logger in production
 */
export interface WarnSink {
    warn(message: string, meta?: Record<string, unknown>): unknown;
}

/**
 * Throttles warnings that would otherwise repeat on every refresh cycle or
 * every accessor call. Per key, the first `burstLimit` warnings pass; after
 * that one passes per `minIntervalMs`, carrying the repeat count, and the
 * burst starts over.
 */
export class RateLimitedLogger {
    private lastLogTime: Map<string, number> = new Map();
    private logCounts: Map<string, number> = new Map();

    constructor(
        private readonly sink: WarnSink,
        private readonly minIntervalMs: number = 60000,
        private readonly burstLimit: number = 5
    ) {}

    warn(key: string, message: string, meta?: Record<string, unknown>): void {
        const now = Date.now();
        const count = (this.logCounts.get(key) ?? 0) + 1;
        this.logCounts.set(key, count);

        if (count <= this.burstLimit) {
            this.lastLogTime.set(key, now);
            this.sink.warn(message, meta);
            return;
        }

        if (now - (this.lastLogTime.get(key) ?? 0) < this.minIntervalMs) {
            return;
        }

        this.lastLogTime.set(key, now);
        this.logCounts.set(key, 0);
        this.sink.warn(`${message} (repeated ${count} times)`, meta);
    }
}
