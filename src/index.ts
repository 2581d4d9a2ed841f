/**
 * Conversation Timeline Public API
 * -------------------------------------------------
 * Lays out multi-party speaking turns on a sample axis and decides whether the layout is plausible:
 * nobody talks over themself, at most two turns overlap, and turns never start before their predecessor.
 *
 *  - `ConversationTimeline.build()` resolves one reader per distinct track and places every turn.
 *    Only unreadable tracks (or tracks disagreeing on sample rate) throw; implausible layouts report `valid() === false`.
 *  - `saveTiming()` / `loadTiming()` persist the ordered turn list as plain text.
 *  - `WavReaderFactory` opens WAV tracks from disk; `CannedAudioTrackReaderFactory` stands in for it in tests.
 */

export * from './core/conversation';
export { serializeTiming, parseTiming, saveTiming, loadTiming, TimingFileError } from './persistence/timing-file';
export type { TimingFileErrorCode } from './persistence/timing-file';
export type { AudioTrackParams, AudioTrackReader, AudioTrackReaderFactory } from './audio/reader/audio-track-reader';
export { resolveAudioTrackReaders } from './audio/reader/reader-cache';
export { CannedAudioTrackReaderFactory } from './audio/reader/canned-reader-factory';
export { WavFileReader, WavReaderFactory, WavFormatError } from './audio/wav/wav-reader';
export type { WavFormatErrorCode } from './audio/wav/wav-reader';
export { encodeWav } from './audio/wav/encode-wav';
export type { PcmBuffer, WavSampleFormat } from './audio/wav/encode-wav';
export { createSineBuffer } from './audio/wav/sine';
export {
    ConfigError,
    CONFIG_ENV_KEYS,
    createConversationConfig,
    loadConversationConfigFromEnv,
} from './config/conversation-config';
export type { ConversationConfig, ConversationConfigInput } from './config/conversation-config';
