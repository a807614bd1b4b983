import type { HealthCategory } from "./itemClassifier";

export const REMEDIATION_ACTIONS = [
    "none",
    "removed-and-blocklisted",
    "removed-only",
    "search-retriggered",
] as const;

export type RemediationAction = (typeof REMEDIATION_ACTIONS)[number];

export interface PolicyEntry {
    action: RemediationAction;
    maxAttempts: number;
    /** How long an item must have been tracked as unhealthy before acting. */
    minAgeMs: number;
}

export type RemediationPolicy = Partial<Record<HealthCategory, PolicyEntry>>;

export interface PolicySettings {
    maxAttempts: number;
    warningThresholdMs: number;
    enableBlocklist: boolean;
    enableSearchRetrigger: boolean;
}

export const NOOP_POLICY: Readonly<PolicyEntry> = Object.freeze({
    action: "none",
    maxAttempts: 0,
    minAgeMs: 0,
});

function applyToggles(
    action: RemediationAction,
    settings: PolicySettings
): RemediationAction {
    if (action === "removed-and-blocklisted" && !settings.enableBlocklist) {
        return "removed-only";
    }
    if (action === "search-retriggered" && !settings.enableSearchRetrigger) {
        return "none";
    }
    return action;
}

export function buildRemediationPolicy(settings: PolicySettings): RemediationPolicy {
    const entry = (action: RemediationAction, minAgeMs = 0): PolicyEntry => ({
        action: applyToggles(action, settings),
        maxAttempts: settings.maxAttempts,
        minAgeMs,
    });

    return {
        PermanentFailure: entry("removed-and-blocklisted"),
        RetriableFailure: entry("removed-only"),
        Warning: entry("removed-and-blocklisted", settings.warningThresholdMs),
        Stalled: entry("search-retriggered"),
        Healthy: NOOP_POLICY,
    };
}

export function resolvePolicy(
    policy: RemediationPolicy,
    category: HealthCategory
): Readonly<PolicyEntry> {
    return policy[category] ?? NOOP_POLICY;
}
