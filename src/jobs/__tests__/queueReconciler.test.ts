import fs from "fs/promises";
import os from "os";
import path from "path";
import type { ServiceSettings } from "../../config";
import type { RemoteOutcome, RemoveOptions, ServiceClient } from "../../services/arr";
import { DEFAULT_UNRECOVERABLE_PATTERNS } from "../../services/itemClassifier";
import type { QueueItem, ServiceOrigin } from "../../services/queueItem";
import { buildRemediationPolicy } from "../../services/remediationPolicy";
import {
    RemediationStore,
    stateFilePath,
    type RemediationRecord,
} from "../../services/remediationStore";
import type { Deadline } from "../../utils/async";
import { ErrorCategory, ErrorCode, ServiceError } from "../../utils/errors";
import type { Logger } from "../../utils/logger";
import { QueueReconciler, decideAction } from "../queueReconciler";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const START = new Date("2026-03-01T12:00:00.000Z");

const silentLogger: Logger = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    event: jest.fn(),
    child: () => silentLogger,
};

class FakeClient implements ServiceClient {
    queue: QueueItem[] = [];
    listError: unknown = null;

    removeItem = jest.fn(
        async (_item: QueueItem, _options: RemoveOptions): Promise<RemoteOutcome> => "done"
    );
    triggerSearchReplacement = jest.fn(
        async (_item: QueueItem): Promise<RemoteOutcome> => "done"
    );

    constructor(readonly origin: ServiceOrigin = "radarr") {}

    async listQueue(): Promise<QueueItem[]> {
        if (this.listError) {
            throw this.listError;
        }
        return this.queue.map((item) => ({ ...item }));
    }
}

const baseSettings: ServiceSettings = {
    origin: "radarr",
    url: "http://radarr:7878",
    apiKey: "test-secret",
    stallThresholdMs: HOUR_MS,
    warningThresholdMs: HOUR_MS,
    maxAttempts: 3,
    gracePeriodMs: 24 * HOUR_MS,
    enableBlocklist: true,
    enableSearchRetrigger: true,
    deleteFiles: true,
    unrecoverablePatterns: [...DEFAULT_UNRECOVERABLE_PATTERNS],
    requestTimeoutMs: 15000,
};

function openDeadline(): Deadline {
    return {
        expiresAt: new Date(START.getTime() + HOUR_MS),
        expired: () => false,
        remainingMs: () => HOUR_MS,
    };
}

function failedItem(overrides: Partial<QueueItem> = {}): QueueItem {
    return {
        id: 1,
        origin: "radarr",
        title: "Bad.Movie.2024.1080p",
        status: "failed",
        errorMessage: "Import failed: unsupported codec",
        addedAt: new Date(START.getTime() - 10 * MINUTE_MS),
        size: 1000,
        sizeLeft: 0,
        contentRef: { kind: "movie", movieId: 12 },
        ...overrides,
    };
}

function stalledItem(overrides: Partial<QueueItem> = {}): QueueItem {
    return {
        id: 2,
        origin: "radarr",
        title: "Slow.Movie.2023.2160p",
        status: "downloading",
        addedAt: new Date(START.getTime() - 2 * HOUR_MS),
        size: 1000,
        sizeLeft: 1000,
        contentRef: { kind: "movie", movieId: 34 },
        ...overrides,
    };
}

const BAD_IDENTITY = "radarr|movie:12|bad.movie.2024.1080p";
const SLOW_IDENTITY = "radarr|movie:34|slow.movie.2023.2160p";

describe("QueueReconciler", () => {
    let stateDir: string;
    let now: Date;
    let client: FakeClient;

    function reconciler(
        overrides: {
            settings?: Partial<ServiceSettings>;
            deadline?: Deadline;
            dryRun?: boolean;
            stateDir?: string;
        } = {}
    ): QueueReconciler {
        return new QueueReconciler({
            client,
            settings: { ...baseSettings, ...overrides.settings },
            stateDir: overrides.stateDir ?? stateDir,
            deadline: overrides.deadline ?? openDeadline(),
            dryRun: overrides.dryRun,
            clock: () => now,
            logger: silentLogger,
        });
    }

    async function storedRecord(identity: string): Promise<RemediationRecord | undefined> {
        const store = await RemediationStore.load(
            stateFilePath(stateDir, "radarr"),
            silentLogger
        );
        return store.get(identity);
    }

    beforeEach(async () => {
        jest.clearAllMocks();
        stateDir = await fs.mkdtemp(path.join(os.tmpdir(), "queue-reconciler-"));
        now = START;
        client = new FakeClient("radarr");
    });

    afterEach(async () => {
        await fs.rm(stateDir, { recursive: true, force: true });
    });

    it("removes and blocklists an unrecoverable failure and records one attempt", async () => {
        client.queue = [failedItem()];

        const summary = await reconciler().run();

        expect(summary.status).toBe("completed");
        expect(summary.phase).toBe("Done");
        expect(summary.counts.remediated).toBe(1);
        expect(client.removeItem).toHaveBeenCalledWith(
            expect.objectContaining({ id: 1 }),
            { deleteFiles: true, blocklist: true, searchReplacement: true }
        );
        expect(await storedRecord(BAD_IDENTITY)).toEqual({
            identity: BAD_IDENTITY,
            title: "Bad.Movie.2024.1080p",
            category: "PermanentFailure",
            lastAction: "removed-and-blocklisted",
            attemptCount: 1,
            firstSeenAt: START.toISOString(),
            lastActedAt: START.toISOString(),
            lastSizeLeft: 0,
            categorySince: START.toISOString(),
        });
        expect(silentLogger.event).toHaveBeenCalledWith(
            "remediation.action",
            expect.objectContaining({
                origin: "radarr",
                action: "removed-and-blocklisted",
                outcome: "done",
                attemptCount: 1,
            })
        );
    });

    it("removes retriable failures without blocklisting", async () => {
        client.queue = [failedItem({ errorMessage: "Download client returned an error" })];

        await reconciler().run();

        expect(client.removeItem).toHaveBeenCalledWith(expect.anything(), {
            deleteFiles: true,
            blocklist: false,
            searchReplacement: true,
        });
        expect((await storedRecord(BAD_IDENTITY))?.category).toBe("RetriableFailure");
    });

    it("retriggers search for a stalled item up to the cap, then escalates", async () => {
        client.queue = [stalledItem()];

        for (const expectedCount of [1, 2, 3]) {
            const summary = await reconciler().run();
            expect(summary.counts.remediated).toBe(1);
            expect((await storedRecord(SLOW_IDENTITY))?.attemptCount).toBe(expectedCount);
            now = new Date(now.getTime() + 15 * MINUTE_MS);
        }

        const fourth = await reconciler().run();

        expect(client.triggerSearchReplacement).toHaveBeenCalledTimes(3);
        expect(fourth.counts.escalated).toBe(1);
        expect(fourth.counts.remediated).toBe(0);
        expect(fourth.escalations).toEqual(["Slow.Movie.2023.2160p"]);
        expect((await storedRecord(SLOW_IDENTITY))?.attemptCount).toBe(3);
        expect(silentLogger.event).toHaveBeenCalledWith(
            "remediation.escalated",
            expect.objectContaining({ identity: SLOW_IDENTITY, attemptCount: 3 })
        );
    });

    it("treats a stalled item whose remaining size shrank as progressing", async () => {
        client.queue = [stalledItem()];
        await reconciler().run();

        client.queue = [stalledItem({ sizeLeft: 800 })];
        now = new Date(now.getTime() + 15 * MINUTE_MS);
        const summary = await reconciler().run();

        expect(summary.counts.healthy).toBe(1);
        expect(client.triggerSearchReplacement).toHaveBeenCalledTimes(1);
        expect(await storedRecord(SLOW_IDENTITY)).toMatchObject({
            attemptCount: 1,
            lastSizeLeft: 800,
        });
    });

    it("tracks progress on downloads the client reports as stalled warnings", async () => {
        const stallWarning = (sizeLeft: number): QueueItem =>
            failedItem({
                status: "warning",
                errorMessage: "The download is stalled with no connections",
                size: 1000,
                sizeLeft,
            });

        client.queue = [stallWarning(900)];
        const first = await reconciler().run();
        expect(first.counts.deferred).toBe(1);
        expect((await storedRecord(BAD_IDENTITY))?.lastSizeLeft).toBe(900);

        for (const { offsetMinutes, sizeLeft } of [
            { offsetMinutes: 35, sizeLeft: 800 },
            { offsetMinutes: 70, sizeLeft: 700 },
        ]) {
            client.queue = [stallWarning(sizeLeft)];
            now = new Date(START.getTime() + offsetMinutes * MINUTE_MS);
            const summary = await reconciler().run();
            expect(summary.counts.healthy).toBe(1);
            expect(summary.counts.deferred).toBe(0);
        }

        expect(client.removeItem).not.toHaveBeenCalled();
        expect((await storedRecord(BAD_IDENTITY))?.lastSizeLeft).toBe(700);

        now = new Date(START.getTime() + 80 * MINUTE_MS);
        const stuck = await reconciler().run();

        expect(stuck.counts.remediated).toBe(1);
        expect(client.removeItem).toHaveBeenCalledTimes(1);
    });

    it("restarts the minimum age when an item changes category", async () => {
        client.queue = [stalledItem()];
        await reconciler().run();
        expect(client.triggerSearchReplacement).toHaveBeenCalledTimes(1);

        const later = new Date(START.getTime() + 2 * HOUR_MS);
        now = later;
        client.queue = [stalledItem({ status: "warning", errorMessage: "Not an upgrade" })];
        const summary = await reconciler().run();

        expect(summary.counts.deferred).toBe(1);
        expect(client.removeItem).not.toHaveBeenCalled();
        expect(await storedRecord(SLOW_IDENTITY)).toMatchObject({
            category: "Warning",
            attemptCount: 1,
            firstSeenAt: START.toISOString(),
            categorySince: later.toISOString(),
        });
    });

    it("remediates distinct non-Latin titles without content references separately", async () => {
        client.queue = [
            failedItem({ id: 7, title: "映画の一", contentRef: undefined }),
            failedItem({ id: 8, title: "ドラマ二", contentRef: undefined }),
        ];

        const summary = await reconciler().run();

        expect(client.removeItem).toHaveBeenCalledTimes(2);
        expect(summary.counts.remediated).toBe(2);
        expect(summary.counts.alreadyAchieved).toBe(0);
        expect((await storedRecord("radarr|-|映画の一"))?.attemptCount).toBe(1);
        expect((await storedRecord("radarr|-|ドラマ二"))?.attemptCount).toBe(1);
    });

    it("counts a download listed twice and already removed upstream once", async () => {
        client.queue = [failedItem({ id: 1 }), failedItem({ id: 2 })];
        client.removeItem.mockResolvedValue("already-achieved");

        const summary = await reconciler().run();

        expect(client.removeItem).toHaveBeenCalledTimes(1);
        expect(summary.counts.alreadyAchieved).toBe(2);
        expect(summary.counts.remediated).toBe(0);
        expect((await storedRecord(BAD_IDENTITY))?.attemptCount).toBe(1);
    });

    it("isolates a failed action from the rest of the pass", async () => {
        const other = failedItem({
            id: 3,
            title: "Other.Movie.2022",
            contentRef: { kind: "movie", movieId: 56 },
        });
        client.queue = [failedItem(), other];
        client.removeItem.mockRejectedValueOnce(
            new ServiceError(
                ErrorCode.SERVICE_HTTP_ERROR,
                ErrorCategory.TRANSIENT,
                "radarr removeItem: HTTP 503",
                "radarr",
                "removeItem",
                503
            )
        );

        const summary = await reconciler().run();

        expect(summary.status).toBe("completed");
        expect(summary.counts.failed).toBe(1);
        expect(summary.counts.remediated).toBe(1);
        expect(await storedRecord(BAD_IDENTITY)).toMatchObject({
            attemptCount: 0,
            lastAction: "none",
        });
        expect((await storedRecord("radarr|movie:56|other.movie.2022"))?.attemptCount).toBe(
            1
        );
        expect(silentLogger.warn).toHaveBeenCalledWith(
            'Could not apply removed-and-blocklisted to "Bad.Movie.2024.1080p"',
            expect.objectContaining({ kind: "transient", retryNextRun: true })
        );
    });

    it("labels a failed search with the search operation", async () => {
        client.queue = [stalledItem()];
        client.triggerSearchReplacement.mockRejectedValueOnce(new Error("socket hang up"));

        const summary = await reconciler().run();

        expect(summary.counts.failed).toBe(1);
        expect(silentLogger.warn).toHaveBeenCalledWith(
            'Could not apply search-retriggered to "Slow.Movie.2023.2160p"',
            {
                origin: "radarr",
                itemId: 2,
                kind: "transient",
                code: ErrorCode.SERVICE_UNREACHABLE,
                error: "radarr triggerSearchReplacement: socket hang up",
                retryNextRun: true,
            }
        );
    });

    it("logs the remaining run budget when a pass starts", async () => {
        await reconciler({ dryRun: true }).run();

        expect(silentLogger.debug).toHaveBeenCalledWith("Reconciliation pass started", {
            origin: "radarr",
            dryRun: true,
            deadlineRemainingMs: HOUR_MS,
        });
    });

    it("ends the pass as degraded without touching state when the fetch fails", async () => {
        client.listError = new ServiceError(
            ErrorCode.SERVICE_TIMEOUT,
            ErrorCategory.TRANSIENT,
            "radarr listQueue: timed out (timeout of 15000ms exceeded)",
            "radarr",
            "listQueue"
        );

        const summary = await reconciler().run();

        expect(summary.status).toBe("degraded");
        expect(summary.phase).toBe("Failed");
        expect(summary.fetchFailure).toEqual({
            kind: "transient",
            code: ErrorCode.SERVICE_TIMEOUT,
            message: "radarr listQueue: timed out (timeout of 15000ms exceeded)",
            needsAttention: false,
        });
        await expect(fs.readdir(stateDir)).resolves.toEqual([]);
    });

    it("flags permanent fetch failures for operator attention", async () => {
        client.listError = new ServiceError(
            ErrorCode.SERVICE_HTTP_ERROR,
            ErrorCategory.PERMANENT,
            "radarr listQueue: HTTP 401",
            "radarr",
            "listQueue",
            401
        );

        const summary = await reconciler().run();

        expect(summary.fetchFailure?.kind).toBe("permanent");
        expect(summary.fetchFailure?.needsAttention).toBe(true);
        expect(silentLogger.error).toHaveBeenCalledWith(
            "Queue fetch failed and needs operator attention",
            expect.objectContaining({ code: ErrorCode.SERVICE_HTTP_ERROR })
        );
    });

    it("stops acting at the deadline but still saves what was done", async () => {
        client.queue = [
            failedItem(),
            failedItem({ id: 4, title: "Second.Movie", contentRef: { kind: "movie", movieId: 2 } }),
            failedItem({ id: 5, title: "Third.Movie", contentRef: { kind: "movie", movieId: 3 } }),
        ];
        const expired = jest.fn().mockReturnValueOnce(false).mockReturnValue(true);
        const deadline: Deadline = {
            expiresAt: START,
            expired,
            remainingMs: () => 0,
        };

        const summary = await reconciler({ deadline }).run();

        expect(summary.status).toBe("partial");
        expect(summary.counts.remediated).toBe(1);
        expect(summary.counts.skippedByDeadline).toBe(2);
        expect(client.removeItem).toHaveBeenCalledTimes(1);
        expect((await storedRecord(BAD_IDENTITY))?.attemptCount).toBe(1);
        expect(await storedRecord("radarr|movie:2|second.movie")).toBeUndefined();
    });

    it("acts on nothing and writes nothing in dry run mode", async () => {
        client.queue = [failedItem(), stalledItem()];

        const summary = await reconciler({ dryRun: true }).run();

        expect(summary.counts.dryRun).toBe(2);
        expect(client.removeItem).not.toHaveBeenCalled();
        expect(client.triggerSearchReplacement).not.toHaveBeenCalled();
        await expect(fs.readdir(stateDir)).resolves.toEqual([]);
    });

    it("waits out the warning threshold before removing a warned item", async () => {
        client.queue = [failedItem({ status: "warning", errorMessage: "Not an upgrade" })];

        const first = await reconciler().run();
        expect(first.counts.deferred).toBe(1);
        expect(client.removeItem).not.toHaveBeenCalled();

        now = new Date(START.getTime() + 61 * MINUTE_MS);
        const second = await reconciler().run();

        expect(second.counts.remediated).toBe(1);
        expect(await storedRecord(BAD_IDENTITY)).toMatchObject({
            category: "Warning",
            lastAction: "removed-and-blocklisted",
            attemptCount: 1,
            firstSeenAt: START.toISOString(),
        });
    });

    it("only logs categories whose action is disabled", async () => {
        client.queue = [stalledItem()];

        const summary = await reconciler({
            settings: { enableSearchRetrigger: false },
        }).run();

        expect(summary.counts.loggedOnly).toBe(1);
        expect(client.triggerSearchReplacement).not.toHaveBeenCalled();
    });

    it("leaves healthy items alone", async () => {
        client.queue = [
            stalledItem({
                addedAt: new Date(START.getTime() - 5 * MINUTE_MS),
            }),
        ];

        const summary = await reconciler().run();

        expect(summary.counts.healthy).toBe(1);
        expect(await storedRecord(SLOW_IDENTITY)).toBeUndefined();
    });

    it("prunes records for downloads that left the queue past the grace period", async () => {
        const seeded = RemediationStore.empty(stateFilePath(stateDir, "radarr"), silentLogger);
        const old = new Date(START.getTime() - 48 * HOUR_MS).toISOString();
        const recent = new Date(START.getTime() - HOUR_MS).toISOString();
        seeded.upsert({
            identity: "radarr|movie:1|gone.long.ago",
            title: "Gone.Long.Ago",
            category: "PermanentFailure",
            lastAction: "removed-and-blocklisted",
            attemptCount: 1,
            firstSeenAt: old,
            lastActedAt: old,
        });
        seeded.upsert({
            identity: "radarr|movie:2|gone.recently",
            title: "Gone.Recently",
            category: "PermanentFailure",
            lastAction: "removed-and-blocklisted",
            attemptCount: 1,
            firstSeenAt: recent,
            lastActedAt: recent,
        });
        await seeded.save();

        const summary = await reconciler().run();

        expect(summary.counts.pruned).toBe(1);
        expect(await storedRecord("radarr|movie:1|gone.long.ago")).toBeUndefined();
        expect(await storedRecord("radarr|movie:2|gone.recently")).toBeDefined();
    });

    it("reports a store write failure distinctly", async () => {
        const blocker = path.join(stateDir, "blocker");
        await fs.writeFile(blocker, "", "utf-8");
        client.queue = [failedItem()];

        const summary = await reconciler({ stateDir: blocker }).run();

        expect(summary.status).toBe("store-failed");
        expect(summary.counts.remediated).toBe(1);
        expect(summary.storeError).toMatch(/^Failed to write state file /);
    });
});

describe("decideAction", () => {
    const policy = buildRemediationPolicy(baseSettings);
    const record: RemediationRecord = {
        identity: BAD_IDENTITY,
        title: "Bad.Movie.2024.1080p",
        category: "PermanentFailure",
        lastAction: "none",
        attemptCount: 0,
        firstSeenAt: START.toISOString(),
        lastActedAt: null,
    };

    it("acts while attempts remain", () => {
        expect(decideAction("PermanentFailure", failedItem(), record, policy, START)).toEqual({
            kind: "act",
            action: "removed-and-blocklisted",
        });
    });

    it("escalates once the attempt cap is reached", () => {
        expect(
            decideAction("PermanentFailure", failedItem(), { ...record, attemptCount: 3 }, policy, START)
        ).toEqual({ kind: "escalate" });
    });

    it("defers until the minimum tracking age has passed", () => {
        const later = new Date(START.getTime() + 20 * MINUTE_MS);

        expect(decideAction("Warning", failedItem(), record, policy, later)).toEqual({
            kind: "defer",
            remainingMs: 40 * MINUTE_MS,
        });
    });

    it("only logs categories that have no policy entry", () => {
        expect(decideAction("Stalled", stalledItem(), record, {}, START)).toEqual({
            kind: "log-only",
        });
    });

    it("measures the minimum age from the latest category change", () => {
        const later = new Date(START.getTime() + 3 * HOUR_MS);
        const changed: RemediationRecord = {
            ...record,
            categorySince: new Date(later.getTime() - 30 * MINUTE_MS).toISOString(),
        };

        expect(decideAction("Warning", failedItem(), changed, policy, later)).toEqual({
            kind: "defer",
            remainingMs: 30 * MINUTE_MS,
        });
    });

    it("treats a shrinking stall warning as progressing", () => {
        const item = failedItem({
            status: "warning",
            errorMessage: "The download is stalled with no connections",
            sizeLeft: 400,
        });

        expect(
            decideAction("Warning", item, { ...record, lastSizeLeft: 500 }, policy, START)
        ).toEqual({ kind: "progressing" });
        expect(
            decideAction(
                "Warning",
                failedItem({ status: "warning", errorMessage: "Not an upgrade", sizeLeft: 400 }),
                { ...record, lastSizeLeft: 500 },
                policy,
                START
            )
        ).toEqual({ kind: "defer", remainingMs: HOUR_MS });
    });

    it("returns healthy for healthy items", () => {
        expect(decideAction("Healthy", failedItem(), record, policy, START)).toEqual({
            kind: "healthy",
        });
    });
});
