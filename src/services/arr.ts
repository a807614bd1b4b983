import axios, { AxiosInstance } from "axios";
import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import {
    ErrorCategory,
    ErrorCode,
    ServiceError,
    isNotFound,
    toServiceError,
    type ServiceOperation,
} from "../utils/errors";
import { logger as rootLogger, type Logger } from "../utils/logger";
import {
    DEFAULT_UNRECOVERABLE_PATTERNS,
    matchesUnrecoverablePattern,
} from "./itemClassifier";
import type {
    ContentRef,
    QueueItem,
    QueueItemStatus,
    ServiceOrigin,
} from "./queueItem";

export interface RemoveOptions {
    /** Also remove the download (and its files) from the download client. */
    deleteFiles: boolean;
    blocklist: boolean;
    /** Let the service search for a replacement release after removal. */
    searchReplacement: boolean;
}

export type RemoteOutcome = "done" | "already-achieved";

/**
 * What the reconciler needs from a media manager. A remote 404 on a
 * mutating call means the goal is already reached and resolves to
 * "already-achieved"; every other failure rejects with a ServiceError.
 */
export interface ServiceClient {
    readonly origin: ServiceOrigin;
    listQueue(): Promise<QueueItem[]>;
    removeItem(item: QueueItem, options: RemoveOptions): Promise<RemoteOutcome>;
    triggerSearchReplacement(item: QueueItem): Promise<RemoteOutcome>;
}

export interface ArrClientSettings {
    origin: ServiceOrigin;
    url: string;
    apiKey: string;
    timeoutMs: number;
    unrecoverablePatterns: readonly string[];
}

const statusMessageSchema = z.object({
    title: z.string().nullish(),
    messages: z.array(z.string()).nullish(),
});

const queueRecordSchema = z.object({
    id: z.number().int(),
    title: z.string().nullish(),
    status: z.string().nullish(),
    trackedDownloadStatus: z.string().nullish(),
    trackedDownloadState: z.string().nullish(),
    statusMessages: z.array(statusMessageSchema).nullish(),
    errorMessage: z.string().nullish(),
    estimatedCompletionTime: z.string().nullish(),
    added: z.string().nullish(),
    size: z.number().nullish(),
    sizeleft: z.number().nullish(),
    downloadId: z.string().nullish(),
    movieId: z.number().int().nullish(),
    seriesId: z.number().int().nullish(),
    episodeId: z.number().int().nullish(),
});

const queuePageSchema = z.object({
    totalRecords: z.number().int().nonnegative(),
    records: z.array(queueRecordSchema).nullish(),
});

const healthSchema = z.array(
    z.object({
        source: z.string().nullish(),
        type: z.string().nullish(),
        message: z.string().nullish(),
    })
);

export type ArrQueueRecord = z.infer<typeof queueRecordSchema>;

interface ServiceProfile {
    label: string;
    unknownItemsParam: string;
    contentRef: (record: ArrQueueRecord) => ContentRef | undefined;
    searchCommand: (ref: ContentRef) => Record<string, unknown> | null;
}

const SERVICE_PROFILES: Record<ServiceOrigin, ServiceProfile> = {
    radarr: {
        label: "Radarr",
        unknownItemsParam: "includeUnknownMovieItems",
        contentRef: (record) =>
            typeof record.movieId === "number"
                ? { kind: "movie", movieId: record.movieId }
                : undefined,
        searchCommand: (ref) =>
            ref.kind === "movie"
                ? { name: "MoviesSearch", movieIds: [ref.movieId] }
                : null,
    },
    sonarr: {
        label: "Sonarr",
        unknownItemsParam: "includeUnknownSeriesItems",
        contentRef: (record) => {
            if (typeof record.episodeId === "number") {
                return {
                    kind: "episode",
                    episodeId: record.episodeId,
                    seriesId: record.seriesId ?? undefined,
                };
            }
            if (typeof record.seriesId === "number") {
                return { kind: "series", seriesId: record.seriesId };
            }
            return undefined;
        },
        searchCommand: (ref) => {
            if (ref.kind === "episode") {
                return { name: "EpisodeSearch", episodeIds: [ref.episodeId] };
            }
            if (ref.kind === "series") {
                return { name: "SeriesSearch", seriesId: ref.seriesId };
            }
            return null;
        },
    },
};

const FAILED_STATES = new Set(["failed", "failedPending", "importFailed"]);
const IMPORTING_STATES = new Set(["importPending", "importing", "importBlocked"]);
const QUEUED_STATUSES = new Set(["queued", "paused", "delay"]);

/**
 * An import that is blocked on a message matching `unrecoverablePatterns`
 * (a dangerous file, no eligible files) will never complete, so it maps to
 * failed rather than warning.
 */
export function mapQueueStatus(
    record: ArrQueueRecord,
    unrecoverablePatterns: readonly string[] = DEFAULT_UNRECOVERABLE_PATTERNS
): QueueItemStatus {
    const status = record.status?.toLowerCase();
    const trackedStatus = record.trackedDownloadStatus?.toLowerCase();
    const trackedState = record.trackedDownloadState ?? undefined;
    const importing = trackedState !== undefined && IMPORTING_STATES.has(trackedState);

    if (
        status === "failed" ||
        trackedStatus === "error" ||
        (trackedState !== undefined && FAILED_STATES.has(trackedState))
    ) {
        return "failed";
    }
    if (status === "warning" || trackedStatus === "warning") {
        return importing &&
            matchesUnrecoverablePattern(collectMessages(record), unrecoverablePatterns)
            ? "failed"
            : "warning";
    }
    if (importing) {
        return "importing";
    }
    if (status === "completed" || trackedState === "imported") {
        return "completed";
    }
    if (status === "downloading") {
        return "downloading";
    }
    if (status !== undefined && QUEUED_STATUSES.has(status)) {
        return "queued";
    }
    return "unknown";
}

function parseDate(value: string | null | undefined): Date | undefined {
    if (!value) {
        return undefined;
    }
    const parsed = parseISO(value);
    return isValid(parsed) ? parsed : undefined;
}

function collectMessages(record: ArrQueueRecord): string | undefined {
    const messages = [
        record.errorMessage ?? "",
        ...(record.statusMessages ?? []).flatMap((sm) => sm.messages ?? []),
    ]
        .map((message) => message.trim())
        .filter((message) => message.length > 0);

    const unique = [...new Set(messages)];
    return unique.length > 0 ? unique.join("; ") : undefined;
}

export function mapQueueRecord(
    record: ArrQueueRecord,
    origin: ServiceOrigin,
    unrecoverablePatterns: readonly string[] = DEFAULT_UNRECOVERABLE_PATTERNS
): QueueItem {
    const size = Math.max(0, record.size ?? 0);
    const downloadId = record.downloadId?.trim() || undefined;
    return {
        id: record.id,
        origin,
        // Never fall back to the numeric id: it feeds the item identity.
        title: record.title?.trim() || downloadId || "untitled",
        status: mapQueueStatus(record, unrecoverablePatterns),
        errorMessage: collectMessages(record),
        estimatedCompletion: parseDate(record.estimatedCompletionTime),
        addedAt: parseDate(record.added),
        size,
        sizeLeft: Math.max(0, record.sizeleft ?? size),
        downloadId,
        contentRef: SERVICE_PROFILES[origin].contentRef(record),
    };
}

/**
 * Queue client for the v3 API shared by Radarr and Sonarr. The origin
 * picks the few endpoints and payloads that differ between them.
 */
export class ArrClient implements ServiceClient {
    readonly origin: ServiceOrigin;
    private readonly client: AxiosInstance;
    private readonly profile: ServiceProfile;
    private readonly logger: Logger;
    private readonly unrecoverablePatterns: readonly string[];

    constructor(settings: ArrClientSettings, logger: Logger = rootLogger) {
        this.origin = settings.origin;
        this.profile = SERVICE_PROFILES[settings.origin];
        this.unrecoverablePatterns = settings.unrecoverablePatterns;
        this.logger = logger.child(this.profile.label);
        this.client = axios.create({
            baseURL: settings.url.replace(/\/+$/, ""),
            timeout: settings.timeoutMs,
            headers: {
                "X-Api-Key": settings.apiKey,
            },
        });
    }

    async listQueue(): Promise<QueueItem[]> {
        return this.call("listQueue", async () => {
            await this.assertDownloadClientHealthy();

            const params = { page: 1, [this.profile.unknownItemsParam]: true };
            const countResponse = await this.client.get("/api/v3/queue", {
                params: { ...params, pageSize: 0 },
            });
            const { totalRecords } = queuePageSchema.parse(countResponse.data);

            if (totalRecords === 0) {
                this.logger.debug("Queue is empty");
                return [];
            }

            const response = await this.client.get("/api/v3/queue", {
                params: { ...params, pageSize: totalRecords },
            });
            const page = queuePageSchema.parse(response.data);
            const records = page.records ?? [];

            this.logger.debug(
                `Fetched ${records.length}/${page.totalRecords} queue item(s)`
            );
            return records.map((record) =>
                mapQueueRecord(record, this.origin, this.unrecoverablePatterns)
            );
        });
    }

    async removeItem(
        item: QueueItem,
        options: RemoveOptions
    ): Promise<RemoteOutcome> {
        return this.call("removeItem", async (): Promise<RemoteOutcome> => {
            try {
                await this.client.delete(`/api/v3/queue/${item.id}`, {
                    params: {
                        removeFromClient: options.deleteFiles,
                        blocklist: options.blocklist,
                        skipRedownload: !options.searchReplacement,
                    },
                });
                return "done";
            } catch (error) {
                if (isNotFound(error)) {
                    this.logger.debug(`Queue item ${item.id} already gone`);
                    return "already-achieved";
                }
                throw error;
            }
        });
    }

    async triggerSearchReplacement(item: QueueItem): Promise<RemoteOutcome> {
        const command = item.contentRef
            ? this.profile.searchCommand(item.contentRef)
            : null;

        if (!command) {
            throw new ServiceError(
                ErrorCode.MISSING_CONTENT_REFERENCE,
                ErrorCategory.PERMANENT,
                `${this.origin} triggerSearchReplacement: "${item.title}" has no searchable content reference`,
                this.origin,
                "triggerSearchReplacement"
            );
        }

        return this.call(
            "triggerSearchReplacement",
            async (): Promise<RemoteOutcome> => {
                try {
                    await this.client.post("/api/v3/command", command);
                    return "done";
                } catch (error) {
                    if (isNotFound(error)) {
                        this.logger.debug(
                            `Content for "${item.title}" no longer exists`
                        );
                        return "already-achieved";
                    }
                    throw error;
                }
            }
        );
    }

    /**
     * A queue read while the service cannot reach its download client
     * reflects stale or missing state, so treat it as a transient outage.
     */
    private async assertDownloadClientHealthy(): Promise<void> {
        const response = await this.client.get("/api/v3/health");
        const checks = healthSchema.parse(response.data);
        const failing = checks.find(
            (check) =>
                check.type?.toLowerCase() === "error" &&
                check.source === "DownloadClientCheck"
        );

        if (failing) {
            throw new ServiceError(
                ErrorCode.DOWNLOAD_CLIENT_UNHEALTHY,
                ErrorCategory.TRANSIENT,
                `${this.origin} listQueue: download client unhealthy (${failing.message ?? "no detail"})`,
                this.origin,
                "listQueue"
            );
        }
    }

    private async call<T>(
        operation: ServiceOperation,
        run: () => Promise<T>
    ): Promise<T> {
        try {
            return await run();
        } catch (error) {
            throw toServiceError(error, this.origin, operation);
        }
    }
}
