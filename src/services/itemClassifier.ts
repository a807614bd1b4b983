import { differenceInMilliseconds, isAfter } from "date-fns";
import type { QueueItem } from "./queueItem";

export const HEALTH_CATEGORIES = [
    "PermanentFailure",
    "RetriableFailure",
    "Warning",
    "Stalled",
    "Healthy",
] as const;

export type HealthCategory = (typeof HEALTH_CATEGORIES)[number];

export interface ClassifierThresholds {
    stallThresholdMs: number;
    unrecoverablePatterns: readonly string[];
}

// Messages the *arr services attach to downloads that will never import.
export const DEFAULT_UNRECOVERABLE_PATTERNS: readonly string[] = [
    "unsupported codec",
    "Found potentially dangerous file",
    "No files found are eligible for import",
    "Not an upgrade for existing",
    "Not a Custom Format upgrade",
    "Sample",
    "Unable to extract",
    "Failed to extract",
    "Unpacking failed",
    "corrupt archive",
    "invalid archive",
    "CRC failed",
    "bad archive",
];

export function matchesUnrecoverablePattern(
    message: string | undefined,
    patterns: readonly string[]
): boolean {
    if (!message) {
        return false;
    }
    const haystack = message.toLowerCase();
    return patterns.some(
        (pattern) => pattern.length > 0 && haystack.includes(pattern.toLowerCase())
    );
}

// Torrent clients report a download with no peers as a warning, not a failure.
const STALL_MESSAGE = "the download is stalled";

export function reportsStall(item: QueueItem): boolean {
    return (
        item.status === "warning" &&
        (item.errorMessage?.toLowerCase().includes(STALL_MESSAGE) ?? false)
    );
}

/**
 * Some bytes arrived and the client still expects to finish.
 */
export function hasForwardProgress(item: QueueItem, now: Date): boolean {
    return (
        item.sizeLeft < item.size &&
        item.estimatedCompletion !== undefined &&
        isAfter(item.estimatedCompletion, now)
    );
}

/**
 * Rules are checked in order and the first match wins, so a failed item
 * that has also sat in the queue too long is a failure, never Stalled.
 */
export function classify(
    item: QueueItem,
    now: Date,
    thresholds: ClassifierThresholds
): HealthCategory {
    if (item.status === "failed") {
        return matchesUnrecoverablePattern(
            item.errorMessage,
            thresholds.unrecoverablePatterns
        )
            ? "PermanentFailure"
            : "RetriableFailure";
    }

    if (item.status === "warning") {
        return "Warning";
    }

    if (
        (item.status === "queued" || item.status === "downloading") &&
        item.addedAt !== undefined &&
        differenceInMilliseconds(now, item.addedAt) > thresholds.stallThresholdMs &&
        !hasForwardProgress(item, now)
    ) {
        return "Stalled";
    }

    return "Healthy";
}
