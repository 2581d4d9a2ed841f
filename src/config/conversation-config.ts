import { normalizeString, type EnvSource } from '@utils/env';

export interface ConversationConfig {
    /** Directory the timing file's track names are resolved against. */
    readonly audioTracksPath: string;
    readonly timingFilePath: string;
    /** Destination for the mixed output; consumed by the external mixer, not by timeline building. */
    readonly outputPath: string;
}

export type ConversationConfigInput = Partial<Record<keyof ConversationConfig, unknown>>;

export type ConfigErrorCode = 'ERR_CONFIG_FIELD';

export class ConfigError extends Error {
    public readonly code: ConfigErrorCode;
    public readonly field: keyof ConversationConfig;

    constructor(field: keyof ConversationConfig, message: string) {
        super(message);
        this.name = 'ConfigError';
        this.code = 'ERR_CONFIG_FIELD';
        this.field = field;
    }
}

export const CONFIG_ENV_KEYS = {
    audioTracksPath: 'CONVERSATION_AUDIOTRACKS_PATH',
    timingFilePath: 'CONVERSATION_TIMING_FILE',
    outputPath: 'CONVERSATION_OUTPUT_PATH',
} as const satisfies Record<keyof ConversationConfig, string>;

function requireField(input: ConversationConfigInput, field: keyof ConversationConfig): string {
    const value = normalizeString(input[field]);
    if (value === undefined) {
        throw new ConfigError(field, `${field} must be a non-empty string`);
    }
    return value;
}

export function createConversationConfig(input: ConversationConfigInput): ConversationConfig {
    return Object.freeze({
        audioTracksPath: requireField(input, 'audioTracksPath'),
        timingFilePath: requireField(input, 'timingFilePath'),
        outputPath: requireField(input, 'outputPath'),
    });
}

export function loadConversationConfigFromEnv(env: EnvSource = process.env): ConversationConfig {
    return createConversationConfig({
        audioTracksPath: env[CONFIG_ENV_KEYS.audioTracksPath],
        timingFilePath: env[CONFIG_ENV_KEYS.timingFilePath],
        outputPath: env[CONFIG_ENV_KEYS.outputPath],
    });
}
