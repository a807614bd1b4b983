/**
 * Yield to the event loop between items of a long pass
 */
export function yieldToEventLoop(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

export interface Deadline {
    readonly expiresAt: Date;
    expired(): boolean;
    remainingMs(): number;
}

/**
 * Wall-clock deadline shared by everything in one run
 */
export function createDeadline(
    budgetMs: number,
    clock: () => Date = () => new Date()
): Deadline {
    const expiresAt = new Date(clock().getTime() + budgetMs);
    return {
        expiresAt,
        expired: () => clock().getTime() >= expiresAt.getTime(),
        remainingMs: () => Math.max(0, expiresAt.getTime() - clock().getTime()),
    };
}
