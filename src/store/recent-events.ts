export const DEFAULT_DEDUP_WINDOW_MS = 10_000;

// Remembers event ids for a short window so a redelivered message is handled once.
export class RecentEventFilter {
    private readonly seen = new Map<string, number>();

    constructor(
        private readonly windowMs: number = DEFAULT_DEDUP_WINDOW_MS,
        private readonly now: () => number = Date.now,
    ) {}

    seenBefore(eventId: string): boolean {
        const now = this.now();
        for (const [id, seenAt] of this.seen) {
            if (now - seenAt > this.windowMs) {
                this.seen.delete(id);
            }
        }
        if (this.seen.has(eventId)) {
            return true;
        }
        this.seen.set(eventId, now);
        return false;
    }

    get size(): number {
        return this.seen.size;
    }

    clear(): void {
        this.seen.clear();
    }
}
