/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 * Returns NaN for non-numeric input so schema validation can report it.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value.trim()
            : String(fallback);
    return /^-?\d+$/.test(source) ? Number.parseInt(source, 10) : Number.NaN;
}

/**
 * "true"/"1"/"yes" and "false"/"0"/"no" (any case); anything else is the fallback.
 */
export function parseEnvFlag(value: string | undefined, fallback: boolean): boolean {
    const normalized = value?.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes") {
        return true;
    }
    if (normalized === "false" || normalized === "0" || normalized === "no") {
        return false;
    }
    return fallback;
}

export function parseEnvCsv(value: string | undefined): string[] | undefined {
    if (value === undefined || value.trim().length === 0) {
        return undefined;
    }
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}
