import type { AppConfig, ServiceSettings } from "../config";
import { ArrClient, type ServiceClient } from "../services/arr";
import { createDeadline } from "../utils/async";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { QueueReconciler, type PassSummary } from "./queueReconciler";

export const EXIT_OK = 0;
export const EXIT_ALL_SERVICES_FAILED = 1;
export const EXIT_STORE_WRITE_FAILED = 2;
export const EXIT_INVALID_CONFIG = 78;

export interface RunReport {
    passes: PassSummary[];
    verdicts: string[];
    exitCode: number;
}

export interface RunOptions {
    createClient?: (settings: ServiceSettings, logger: Logger) => ServiceClient;
    clock?: () => Date;
    logger?: Logger;
}

function defaultClient(settings: ServiceSettings, logger: Logger): ServiceClient {
    return new ArrClient(
        {
            origin: settings.origin,
            url: settings.url,
            apiKey: settings.apiKey,
            timeoutMs: settings.requestTimeoutMs,
            unrecoverablePatterns: settings.unrecoverablePatterns,
        },
        logger
    );
}

/**
 * Human-readable verdicts for the run, in a fixed order. An empty set of
 * problems and actions reads as "nothing to do".
 */
export function describeRun(passes: readonly PassSummary[]): string[] {
    const verdicts: string[] = [];

    const remediated = passes.reduce((sum, pass) => sum + pass.counts.remediated, 0);
    if (remediated > 0) {
        verdicts.push(`remediated ${remediated} item${remediated === 1 ? "" : "s"}`);
    }

    const degraded = passes.filter((pass) => pass.status === "degraded");
    if (degraded.length > 0) {
        verdicts.push("degraded (service unreachable)");
    }

    const storeFailures = passes.filter((pass) => pass.status === "store-failed");
    if (storeFailures.length > 0) {
        verdicts.push(
            `state not saved (${storeFailures.map((pass) => pass.origin).join(", ")})`
        );
    }

    if (passes.some((pass) => pass.escalations.length > 0)) {
        verdicts.push("escalations pending");
    }

    if (verdicts.length === 0) {
        verdicts.push("nothing to do");
    }
    return verdicts;
}

/**
 * A failed state write outranks a fetch outage: the next run would repeat
 * actions it has no record of.
 */
export function exitCodeFor(passes: readonly PassSummary[]): number {
    if (passes.some((pass) => pass.status === "store-failed")) {
        return EXIT_STORE_WRITE_FAILED;
    }
    if (passes.length > 0 && passes.every((pass) => pass.status === "degraded")) {
        return EXIT_ALL_SERVICES_FAILED;
    }
    return EXIT_OK;
}

/**
 * One invocation: a pass per configured service, run concurrently under a
 * shared deadline.
 */
export async function runOnce(
    config: AppConfig,
    options: RunOptions = {}
): Promise<RunReport> {
    const log = options.logger ?? rootLogger;
    const createClient = options.createClient ?? defaultClient;
    const deadline = createDeadline(config.runDeadlineMs, options.clock);

    if (config.dryRun) {
        log.info("Dry run: no changes will be made to any service");
    }

    const passes = await Promise.all(
        config.services.map((settings) =>
            new QueueReconciler({
                client: createClient(settings, log),
                settings,
                stateDir: config.stateDir,
                deadline,
                dryRun: config.dryRun,
                clock: options.clock,
                logger: log,
            }).run()
        )
    );

    const verdicts = describeRun(passes);
    const exitCode = exitCodeFor(passes);

    log.event("run.summary", {
        verdicts,
        exitCode,
        dryRun: config.dryRun,
        services: passes.map((pass) => ({
            origin: pass.origin,
            status: pass.status,
            remediated: pass.counts.remediated,
            escalated: pass.counts.escalated,
            failed: pass.counts.failed,
        })),
    });
    log.info(`Run finished: ${verdicts.join("; ")}`);

    return { passes, verdicts, exitCode };
}
