import { differenceInMilliseconds } from "date-fns";
import type { ServiceSettings } from "../config";
import type { RemoteOutcome, ServiceClient } from "../services/arr";
import {
    classify,
    reportsStall,
    type ClassifierThresholds,
    type HealthCategory,
} from "../services/itemClassifier";
import {
    deriveItemIdentity,
    type ItemIdentity,
    type QueueItem,
    type ServiceOrigin,
} from "../services/queueItem";
import {
    buildRemediationPolicy,
    resolvePolicy,
    type RemediationAction,
    type RemediationPolicy,
} from "../services/remediationPolicy";
import {
    RemediationStore,
    stateFilePath,
    type RemediationRecord,
} from "../services/remediationStore";
import { yieldToEventLoop, type Deadline } from "../utils/async";
import {
    type ServiceError,
    errorMessage,
    isPermanent,
    isTransient,
    toServiceError,
    type ServiceOperation,
} from "../utils/errors";
import { logger as rootLogger, withLogTiming, type Logger } from "../utils/logger";

export type PassPhase =
    | "Fetching"
    | "Classifying"
    | "Deciding"
    | "Acting"
    | "Recording"
    | "Pruning"
    | "Done"
    | "Failed";

export type PassStatus = "completed" | "partial" | "degraded" | "store-failed";

export type ActiveAction = Exclude<RemediationAction, "none">;

export type ItemDecision =
    | { kind: "healthy" }
    | { kind: "progressing" }
    | { kind: "log-only" }
    | { kind: "escalate" }
    | { kind: "defer"; remainingMs: number }
    | { kind: "act"; action: ActiveAction };

export interface PassCounts {
    fetched: number;
    healthy: number;
    remediated: number;
    alreadyAchieved: number;
    escalated: number;
    deferred: number;
    loggedOnly: number;
    dryRun: number;
    failed: number;
    skippedByDeadline: number;
    pruned: number;
}

export interface FetchFailure {
    kind: "transient" | "permanent";
    code: string;
    message: string;
    /** Permanent fetch failures need a human: bad key, wrong URL, API change. */
    needsAttention: boolean;
}

export interface PassSummary {
    origin: ServiceOrigin;
    status: PassStatus;
    phase: PassPhase;
    counts: PassCounts;
    escalations: string[];
    fetchFailure?: FetchFailure;
    storeError?: string;
    durationMs: number;
}

export interface QueueReconcilerOptions {
    client: ServiceClient;
    settings: ServiceSettings;
    stateDir: string;
    deadline: Deadline;
    dryRun?: boolean;
    clock?: () => Date;
    logger?: Logger;
}

function emptyCounts(): PassCounts {
    return {
        fetched: 0,
        healthy: 0,
        remediated: 0,
        alreadyAchieved: 0,
        escalated: 0,
        deferred: 0,
        loggedOnly: 0,
        dryRun: 0,
        failed: 0,
        skippedByDeadline: 0,
        pruned: 0,
    };
}

interface ClassifiedItem {
    item: QueueItem;
    identity: ItemIdentity;
    category: HealthCategory;
}

function tracksProgress(category: HealthCategory, item: QueueItem): boolean {
    return category === "Stalled" || (category === "Warning" && reportsStall(item));
}

function operationFor(action: ActiveAction): ServiceOperation {
    return action === "search-retriggered" ? "triggerSearchReplacement" : "removeItem";
}

/**
 * Pure decision for one classified item given its remediation history.
 */
export function decideAction(
    category: HealthCategory,
    item: QueueItem,
    record: RemediationRecord,
    policy: RemediationPolicy,
    now: Date
): ItemDecision {
    if (category === "Healthy") {
        return { kind: "healthy" };
    }

    // Remaining bytes went down since the last pass: not stalled after all.
    if (
        tracksProgress(category, item) &&
        record.lastSizeLeft !== undefined &&
        item.sizeLeft < record.lastSizeLeft
    ) {
        return { kind: "progressing" };
    }

    const entry = resolvePolicy(policy, category);
    if (entry.action !== "none" && record.attemptCount >= entry.maxAttempts) {
        return { kind: "escalate" };
    }

    const trackedFor = differenceInMilliseconds(
        now,
        new Date(record.categorySince ?? record.firstSeenAt)
    );
    if (trackedFor < entry.minAgeMs) {
        return { kind: "defer", remainingMs: entry.minAgeMs - trackedFor };
    }

    if (entry.action === "none") {
        return { kind: "log-only" };
    }

    return { kind: "act", action: entry.action };
}

/**
 * One inspection-and-remediation pass over a single service queue:
 * fetch, classify, decide, act, record, prune, then persist the store.
 */
export class QueueReconciler {
    private readonly client: ServiceClient;
    private readonly settings: ServiceSettings;
    private readonly stateDir: string;
    private readonly deadline: Deadline;
    private readonly dryRun: boolean;
    private readonly clock: () => Date;
    private readonly logger: Logger;
    private readonly policy: RemediationPolicy;
    private readonly thresholds: ClassifierThresholds;

    private phase: PassPhase = "Fetching";

    constructor(options: QueueReconcilerOptions) {
        this.client = options.client;
        this.settings = options.settings;
        this.stateDir = options.stateDir;
        this.deadline = options.deadline;
        this.dryRun = options.dryRun ?? false;
        this.clock = options.clock ?? (() => new Date());
        this.logger = (options.logger ?? rootLogger).child(
            `QueueReconciler.${options.client.origin}`
        );
        this.policy = buildRemediationPolicy(options.settings);
        this.thresholds = {
            stallThresholdMs: options.settings.stallThresholdMs,
            unrecoverablePatterns: options.settings.unrecoverablePatterns,
        };
    }

    get origin(): ServiceOrigin {
        return this.client.origin;
    }

    async run(): Promise<PassSummary> {
        return withLogTiming(this.logger, "Reconciliation pass", () => this.execute(), {
            origin: this.origin,
            dryRun: this.dryRun,
            deadlineRemainingMs: this.deadline.remainingMs(),
        });
    }

    private enter(phase: PassPhase): void {
        this.phase = phase;
        this.logger.debug(`Phase ${phase}`);
    }

    private async execute(): Promise<PassSummary> {
        const startedAt = this.clock();
        const counts = emptyCounts();
        const escalations: string[] = [];

        this.enter("Fetching");
        let items: QueueItem[];
        try {
            items = await this.client.listQueue();
        } catch (error) {
            const serviceError = toServiceError(error, this.origin, "listQueue");
            this.enter("Failed");
            return this.finish(startedAt, {
                status: "degraded",
                counts,
                escalations,
                fetchFailure: this.describeFetchFailure(serviceError),
            });
        }
        counts.fetched = items.length;

        const store = await RemediationStore.load(
            stateFilePath(this.stateDir, this.origin),
            this.logger
        );

        this.enter("Classifying");
        const now = this.clock();
        const classified: ClassifiedItem[] = items.map((item) => ({
            item,
            identity: deriveItemIdentity(item),
            category: classify(item, now, this.thresholds),
        }));

        const actedThisPass = new Set<ItemIdentity>();
        let interrupted = false;

        for (const entry of classified) {
            if (entry.category === "Healthy") {
                counts.healthy += 1;
                continue;
            }

            if (this.deadline.expired()) {
                if (!interrupted) {
                    interrupted = true;
                    this.logger.warn(
                        "Run deadline reached, leaving remaining items for the next run"
                    );
                }
                counts.skippedByDeadline += 1;
                continue;
            }

            await this.reconcileItem(entry, store, now, counts, escalations, actedThisPass);
            await yieldToEventLoop();
        }

        this.enter("Pruning");
        const currentIdentities = new Set(classified.map((entry) => entry.identity));
        const retired = store.prune(currentIdentities, this.settings.gracePeriodMs, now);
        counts.pruned = retired.length;

        if (this.dryRun) {
            this.logger.info("Dry run: state file left untouched");
        } else {
            try {
                await store.save();
            } catch (error) {
                this.logger.error("Failed to persist remediation state", { error });
                return this.finish(startedAt, {
                    status: "store-failed",
                    counts,
                    escalations,
                    storeError: errorMessage(error),
                });
            }
        }

        this.enter("Done");
        return this.finish(startedAt, {
            status: interrupted ? "partial" : "completed",
            counts,
            escalations,
        });
    }

    private async reconcileItem(
        { item, identity, category }: ClassifiedItem,
        store: RemediationStore,
        now: Date,
        counts: PassCounts,
        escalations: string[],
        actedThisPass: Set<ItemIdentity>
    ): Promise<void> {
        this.enter("Deciding");

        if (actedThisPass.has(identity)) {
            // Same logical download listed twice: the goal was reached this pass.
            counts.alreadyAchieved += 1;
            this.logger.debug(`"${item.title}" already handled this pass`);
            return;
        }

        let record = store.get(identity);
        if (!record) {
            record = {
                identity,
                title: item.title,
                category,
                lastAction: "none",
                attemptCount: 0,
                firstSeenAt: now.toISOString(),
                lastActedAt: null,
                lastSizeLeft: item.sizeLeft,
                categorySince: now.toISOString(),
            };
            store.upsert(record);
        } else if (record.category !== category) {
            record = { ...record, category, categorySince: now.toISOString() };
            store.upsert(record);
        }

        const decision = decideAction(category, item, record, this.policy, now);

        switch (decision.kind) {
            case "healthy":
                counts.healthy += 1;
                return;

            case "progressing":
                counts.healthy += 1;
                store.upsert({ ...record, lastSizeLeft: item.sizeLeft });
                this.logger.debug(
                    `"${item.title}" made progress since the last pass (${record.lastSizeLeft} -> ${item.sizeLeft} bytes left)`
                );
                return;

            case "log-only":
                counts.loggedOnly += 1;
                store.upsert({ ...record, lastSizeLeft: item.sizeLeft });
                this.logger.info(`"${item.title}" is ${category}; no action configured`, {
                    origin: this.origin,
                    itemId: item.id,
                    errorMessage: item.errorMessage,
                });
                return;

            case "escalate":
                counts.escalated += 1;
                escalations.push(item.title);
                this.logger.event("remediation.escalated", {
                    origin: this.origin,
                    itemId: item.id,
                    identity,
                    title: item.title,
                    category,
                    attemptCount: record.attemptCount,
                    lastAction: record.lastAction,
                });
                return;

            case "defer":
                counts.deferred += 1;
                store.upsert({ ...record, lastSizeLeft: item.sizeLeft });
                this.logger.debug(
                    `"${item.title}" is ${category}; acting in ${Math.ceil(decision.remainingMs / 1000)}s`
                );
                return;

            case "act":
                await this.act(item, identity, category, record, decision.action, {
                    store,
                    counts,
                    actedThisPass,
                });
                return;
        }
    }

    private async act(
        item: QueueItem,
        identity: ItemIdentity,
        category: HealthCategory,
        record: RemediationRecord,
        action: ActiveAction,
        pass: {
            store: RemediationStore;
            counts: PassCounts;
            actedThisPass: Set<ItemIdentity>;
        }
    ): Promise<void> {
        if (this.dryRun) {
            pass.counts.dryRun += 1;
            this.logger.info(`[DRY RUN] Would apply ${action} to "${item.title}"`, {
                origin: this.origin,
                category,
                attempt: record.attemptCount + 1,
            });
            return;
        }

        this.enter("Acting");
        let outcome: RemoteOutcome;
        try {
            outcome = await this.perform(item, action);
        } catch (error) {
            pass.counts.failed += 1;
            const serviceError = toServiceError(error, this.origin, operationFor(action));
            this.logger.warn(`Could not apply ${action} to "${item.title}"`, {
                origin: this.origin,
                itemId: item.id,
                kind: serviceError.kind,
                code: serviceError.code,
                error: serviceError.message,
                retryNextRun: isTransient(serviceError),
            });
            return;
        }

        this.enter("Recording");
        const updated: RemediationRecord = {
            ...record,
            title: item.title,
            category,
            lastAction: action,
            attemptCount: record.attemptCount + 1,
            lastActedAt: this.clock().toISOString(),
            lastSizeLeft: item.sizeLeft,
        };
        pass.store.upsert(updated);
        pass.actedThisPass.add(identity);

        if (outcome === "already-achieved") {
            pass.counts.alreadyAchieved += 1;
        } else {
            pass.counts.remediated += 1;
        }

        this.logger.event("remediation.action", {
            origin: this.origin,
            itemId: item.id,
            identity,
            title: item.title,
            category,
            action,
            outcome,
            attemptCount: updated.attemptCount,
            maxAttempts: this.settings.maxAttempts,
        });
    }

    private perform(item: QueueItem, action: ActiveAction): Promise<RemoteOutcome> {
        switch (action) {
            case "removed-and-blocklisted":
                return this.client.removeItem(item, {
                    deleteFiles: this.settings.deleteFiles,
                    blocklist: true,
                    searchReplacement: this.settings.enableSearchRetrigger,
                });
            case "removed-only":
                return this.client.removeItem(item, {
                    deleteFiles: this.settings.deleteFiles,
                    blocklist: false,
                    searchReplacement: this.settings.enableSearchRetrigger,
                });
            case "search-retriggered":
                return this.client.triggerSearchReplacement(item);
        }
    }

    private describeFetchFailure(error: ServiceError): FetchFailure {
        const failure: FetchFailure = {
            kind: error.kind,
            code: error.code,
            message: error.message,
            needsAttention: isPermanent(error),
        };
        if (failure.needsAttention) {
            this.logger.error(`Queue fetch failed and needs operator attention`, failure);
        } else {
            this.logger.warn(`Queue fetch failed, will retry next run`, failure);
        }
        return failure;
    }

    private finish(
        startedAt: Date,
        result: Omit<PassSummary, "origin" | "phase" | "durationMs">
    ): PassSummary {
        const summary: PassSummary = {
            origin: this.origin,
            phase: this.phase,
            durationMs: differenceInMilliseconds(this.clock(), startedAt),
            ...result,
        };
        this.logger.event("reconciliation.summary", {
            origin: summary.origin,
            status: summary.status,
            phase: summary.phase,
            ...summary.counts,
            escalations: summary.escalations,
            fetchFailure: summary.fetchFailure,
            storeError: summary.storeError,
            durationMs: summary.durationMs,
        });
        return summary;
    }
}
