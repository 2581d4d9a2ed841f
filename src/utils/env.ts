export type EnvSource = Record<string, string | undefined>;

export function isTestEnvironment(env: EnvSource = process.env): boolean {
    const nodeEnv = (env.NODE_ENV ?? '').toLowerCase();
    if (nodeEnv === 'test') return true;
    if (env.VITEST === 'true') return true;
    if (env.JEST_WORKER_ID !== undefined) return true;
    return false;
}

export function normalizeString(raw: unknown): string | undefined {
    if (typeof raw !== 'string') return undefined;
    const trimmed = raw.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

export function normalizeBoolean(raw: unknown, fallback: boolean): boolean {
    if (raw === undefined || raw === null) return fallback;
    if (typeof raw === 'boolean') return raw;
    if (typeof raw === 'number') return raw !== 0;
    if (typeof raw === 'string') {
        const normalized = raw.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
        if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    }
    return fallback;
}
