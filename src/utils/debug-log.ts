import { normalizeBoolean } from './env';

// Verbose logging gated by CONVERSATION_TIMELINE_VERBOSE_LOGS
export function isDebugEnabled(): boolean {
    if (typeof process === 'undefined' || typeof process.env === 'undefined') return false;
    return normalizeBoolean(process.env.CONVERSATION_TIMELINE_VERBOSE_LOGS, false);
}

export function debugLog(...args: unknown[]): void {
    if (isDebugEnabled()) {
        // eslint-disable-next-line no-console
        console.log(...args);
    }
}
