import fs from "fs/promises";
import path from "path";
import { isBefore, subMilliseconds } from "date-fns";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode, errorMessage } from "../utils/errors";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { HEALTH_CATEGORIES } from "./itemClassifier";
import type { ItemIdentity, ServiceOrigin } from "./queueItem";
import { REMEDIATION_ACTIONS } from "./remediationPolicy";

const STORE_VERSION = 1;

const isoDate = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: "Invalid ISO timestamp",
});

const remediationRecordSchema = z.object({
    identity: z.string().min(1),
    title: z.string(),
    category: z.enum(HEALTH_CATEGORIES),
    lastAction: z.enum(REMEDIATION_ACTIONS),
    attemptCount: z.number().int().nonnegative(),
    firstSeenAt: isoDate,
    lastActedAt: isoDate.nullable(),
    lastSizeLeft: z.number().nonnegative().optional(),
    /** When the item entered its current category; minimum ages count from here. */
    categorySince: isoDate.optional(),
});

const storeFileSchema = z.object({
    version: z.literal(STORE_VERSION),
    records: z.array(remediationRecordSchema),
});

export type RemediationRecord = z.infer<typeof remediationRecordSchema>;

export function stateFilePath(stateDir: string, origin: ServiceOrigin): string {
    return path.join(stateDir, `${origin}-remediation.json`);
}

/**
 * Remediation history for one service, held in memory for the length of a
 * pass. Read once with `load`, written once with `save`.
 */
export class RemediationStore {
    private readonly records = new Map<ItemIdentity, RemediationRecord>();

    private constructor(
        private readonly filePath: string,
        records: RemediationRecord[],
        private readonly logger: Logger
    ) {
        for (const record of records) {
            this.records.set(record.identity, record);
        }
    }

    static empty(filePath: string, logger: Logger = rootLogger): RemediationStore {
        return new RemediationStore(filePath, [], logger);
    }

    /**
     * A missing, unreadable or invalid file yields an empty store.
     */
    static async load(
        filePath: string,
        logger: Logger = rootLogger
    ): Promise<RemediationStore> {
        let raw: string;
        try {
            raw = await fs.readFile(filePath, "utf-8");
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                logger.debug(`No state file at ${filePath}, starting empty`);
            } else {
                logger.warn(`Could not read state file ${filePath}, starting empty`, {
                    error,
                });
            }
            return RemediationStore.empty(filePath, logger);
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            logger.warn(`State file ${filePath} is not valid JSON, starting empty`, {
                error,
            });
            return RemediationStore.empty(filePath, logger);
        }

        const parsed = storeFileSchema.safeParse(json);
        if (!parsed.success) {
            logger.warn(`State file ${filePath} failed validation, starting empty`, {
                issues: parsed.error.issues.map(
                    (issue) => `${issue.path.join(".")}: ${issue.message}`
                ),
            });
            return RemediationStore.empty(filePath, logger);
        }

        logger.debug(
            `Loaded ${parsed.data.records.length} remediation record(s) from ${filePath}`
        );
        return new RemediationStore(filePath, parsed.data.records, logger);
    }

    get size(): number {
        return this.records.size;
    }

    get(identity: ItemIdentity): RemediationRecord | undefined {
        const record = this.records.get(identity);
        return record ? { ...record } : undefined;
    }

    all(): RemediationRecord[] {
        return [...this.records.values()].map((record) => ({ ...record }));
    }

    upsert(record: RemediationRecord): void {
        const existing = this.records.get(record.identity);
        if (existing && record.attemptCount < existing.attemptCount) {
            throw new Error(
                `attemptCount for ${record.identity} cannot decrease (${existing.attemptCount} -> ${record.attemptCount})`
            );
        }
        this.records.set(record.identity, { ...record });
    }

    /**
     * Retire records whose identity left the queue and whose last activity
     * is older than the grace period. Records never acted on age from
     * `firstSeenAt`.
     */
    prune(
        currentIdentities: ReadonlySet<ItemIdentity>,
        gracePeriodMs: number,
        now: Date
    ): RemediationRecord[] {
        const cutoff = subMilliseconds(now, gracePeriodMs);
        const retired: RemediationRecord[] = [];

        for (const [identity, record] of this.records) {
            if (currentIdentities.has(identity)) {
                continue;
            }
            const lastActivity = new Date(record.lastActedAt ?? record.firstSeenAt);
            if (isBefore(lastActivity, cutoff)) {
                this.records.delete(identity);
                retired.push(record);
            }
        }

        if (retired.length > 0) {
            this.logger.debug(`Pruned ${retired.length} stale remediation record(s)`);
        }
        return retired;
    }

    /**
     * Write-to-temp-then-rename so a crash never leaves a half-written file.
     */
    async save(): Promise<void> {
        const body = JSON.stringify(
            {
                version: STORE_VERSION,
                records: [...this.records.values()].sort((a, b) =>
                    a.identity.localeCompare(b.identity)
                ),
            },
            null,
            2
        );
        const tempPath = `${this.filePath}.${process.pid}.tmp`;

        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.writeFile(tempPath, `${body}\n`, "utf-8");
            await fs.rename(tempPath, this.filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                this.logger.warn(`Could not remove temp state file ${tempPath}`, {
                    error: cleanupError,
                });
            });
            throw new AppError(
                ErrorCode.STATE_WRITE_FAILED,
                ErrorCategory.FATAL,
                `Failed to write state file ${this.filePath}: ${errorMessage(error)}`,
                { path: this.filePath }
            );
        }

        this.logger.debug(
            `Saved ${this.records.size} remediation record(s) to ${this.filePath}`
        );
    }
}
