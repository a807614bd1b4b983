export type ServiceOrigin = "radarr" | "sonarr";

export const SERVICE_ORIGINS: readonly ServiceOrigin[] = ["radarr", "sonarr"];

export type QueueItemStatus =
    | "queued"
    | "downloading"
    | "importing"
    | "warning"
    | "failed"
    | "completed"
    | "unknown";

/**
 * What a download is for. Replacement searches are issued against this,
 * and it anchors the item identity across recycled queue ids.
 */
export type ContentRef =
    | { kind: "movie"; movieId: number }
    | { kind: "episode"; episodeId: number; seriesId?: number }
    | { kind: "series"; seriesId: number };

/** One download as seen in a single queue fetch. Never persisted. */
export interface QueueItem {
    id: number;
    origin: ServiceOrigin;
    title: string;
    status: QueueItemStatus;
    errorMessage?: string;
    estimatedCompletion?: Date;
    addedAt?: Date;
    size: number;
    sizeLeft: number;
    downloadId?: string;
    contentRef?: ContentRef;
}

/** `origin|contentRef|normalized.title` */
export type ItemIdentity = string;

export function normalizeReleaseTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, ".")
        .replace(/^\.+|\.+$/g, "");
}

export function formatContentRef(ref: ContentRef | undefined): string {
    if (!ref) {
        return "-";
    }
    switch (ref.kind) {
        case "movie":
            return `movie:${ref.movieId}`;
        case "episode":
            return `episode:${ref.episodeId}`;
        case "series":
            return `series:${ref.seriesId}`;
    }
}

/**
 * Services recycle numeric queue ids after removal, so identity is built
 * from what the download is (content + release title) rather than its id.
 * A title with no letters or digits falls back to the download client's id.
 */
export function deriveItemIdentity(item: QueueItem): ItemIdentity {
    const titleKey =
        normalizeReleaseTitle(item.title) ||
        (item.downloadId ? `download:${item.downloadId.trim().toLowerCase()}` : "");

    return [item.origin, formatContentRef(item.contentRef), titleKey].join("|");
}
