import dotenv from "dotenv";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { parseEnvCsv, parseEnvFlag, parseEnvInt } from "./utils/envParsers";
import { DEFAULT_UNRECOVERABLE_PATTERNS } from "./services/itemClassifier";
import { SERVICE_ORIGINS, type ServiceOrigin } from "./services/queueItem";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

const DEFAULTS = {
    stateDir: "./state",
    stallThresholdMinutes: 60,
    warningThresholdMinutes: 60,
    maxAttempts: 3,
    gracePeriodHours: 24,
    requestTimeoutMs: 15000,
    runDeadlineSeconds: 50,
};

function isHttpUrl(value: string): boolean {
    try {
        const parsed = new URL(value);
        return parsed.protocol === "http:" || parsed.protocol === "https:";
    } catch {
        return false;
    }
}

const serviceSettingsSchema = z.object({
    origin: z.enum(["radarr", "sonarr"]),
    url: z.string().refine(isHttpUrl, "must be an http(s) URL"),
    apiKey: z.string().min(1, "is required when the URL is set"),
    stallThresholdMs: z.number().int().positive(),
    warningThresholdMs: z.number().int().nonnegative(),
    maxAttempts: z.number().int().min(1),
    gracePeriodMs: z.number().int().nonnegative(),
    enableBlocklist: z.boolean(),
    enableSearchRetrigger: z.boolean(),
    deleteFiles: z.boolean(),
    unrecoverablePatterns: z.array(z.string().min(1)),
    requestTimeoutMs: z.number().int().positive(),
});

const appConfigSchema = z.object({
    stateDir: z.string().min(1),
    runDeadlineMs: z.number().int().positive(),
    dryRun: z.boolean(),
});

export type ServiceSettings = Readonly<z.infer<typeof serviceSettingsSchema>>;

export interface AppConfig {
    readonly stateDir: string;
    readonly runDeadlineMs: number;
    readonly dryRun: boolean;
    readonly services: readonly ServiceSettings[];
}

type Env = Record<string, string | undefined>;

function formatIssues(scope: string, error: z.ZodError): string[] {
    return error.issues.map(
        (issue) => `${scope}${issue.path.length ? `.${issue.path.join(".")}` : ""}: ${issue.message}`
    );
}

/**
 * Per-service values may be overridden with a RADARR_/SONARR_ prefix;
 * otherwise the unprefixed variable applies to both services.
 */
function readServiceCandidate(env: Env, origin: ServiceOrigin) {
    const prefix = origin.toUpperCase();
    const url = env[`${prefix}_URL`]?.trim();
    const apiKey = env[`${prefix}_API_KEY`]?.trim();

    if (!url && !apiKey) {
        return null;
    }

    const setting = (name: string) => env[`${prefix}_${name}`] ?? env[name];

    return {
        origin,
        url: url ?? "",
        apiKey: apiKey ?? "",
        stallThresholdMs:
            parseEnvInt(
                setting("STALL_THRESHOLD_MINUTES"),
                DEFAULTS.stallThresholdMinutes
            ) * MINUTE_MS,
        warningThresholdMs:
            parseEnvInt(
                setting("WARNING_THRESHOLD_MINUTES"),
                DEFAULTS.warningThresholdMinutes
            ) * MINUTE_MS,
        maxAttempts: parseEnvInt(setting("MAX_ATTEMPTS"), DEFAULTS.maxAttempts),
        gracePeriodMs:
            parseEnvInt(setting("GRACE_PERIOD_HOURS"), DEFAULTS.gracePeriodHours) *
            HOUR_MS,
        enableBlocklist: parseEnvFlag(setting("ENABLE_BLOCKLIST"), true),
        enableSearchRetrigger: parseEnvFlag(setting("ENABLE_SEARCH_RETRIGGER"), true),
        deleteFiles: parseEnvFlag(setting("DELETE_FILES"), true),
        unrecoverablePatterns:
            parseEnvCsv(setting("UNRECOVERABLE_PATTERNS")) ?? [
                ...DEFAULT_UNRECOVERABLE_PATTERNS,
            ],
        requestTimeoutMs: parseEnvInt(
            setting("REQUEST_TIMEOUT_MS"),
            DEFAULTS.requestTimeoutMs
        ),
    };
}

/**
 * Build the immutable run settings from environment variables. Every
 * problem is collected before failing so one run reports them all.
 */
export function loadConfig(env: Env): AppConfig {
    const issues: string[] = [];
    const services: ServiceSettings[] = [];

    for (const origin of SERVICE_ORIGINS) {
        const candidate = readServiceCandidate(env, origin);
        if (!candidate) {
            continue;
        }
        const parsed = serviceSettingsSchema.safeParse(candidate);
        if (parsed.success) {
            services.push(Object.freeze(parsed.data));
        } else {
            issues.push(...formatIssues(origin.toUpperCase(), parsed.error));
        }
    }

    const base = appConfigSchema.safeParse({
        stateDir: env.STATE_DIR?.trim() || DEFAULTS.stateDir,
        runDeadlineMs:
            parseEnvInt(env.RUN_DEADLINE_SECONDS, DEFAULTS.runDeadlineSeconds) * 1000,
        dryRun: parseEnvFlag(env.DRY_RUN, false),
    });
    if (!base.success) {
        issues.push(...formatIssues("RUN", base.error));
    }

    if (services.length === 0 && issues.length === 0) {
        issues.push(
            "No service configured: set RADARR_URL/RADARR_API_KEY and/or SONARR_URL/SONARR_API_KEY"
        );
    }

    if (issues.length > 0 || !base.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Invalid configuration:\n${issues.map((issue) => `   - ${issue}`).join("\n")}`,
            { issues }
        );
    }

    return Object.freeze({
        ...base.data,
        services: Object.freeze(services),
    });
}

/** Reads `.env` (if present) into process.env, then validates it. */
export function loadConfigFromEnvironment(): AppConfig {
    dotenv.config();
    return loadConfig(process.env);
}
