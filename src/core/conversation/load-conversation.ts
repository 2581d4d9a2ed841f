import type { AudioTrackReaderFactory } from '@audio/reader/audio-track-reader';
import { WavReaderFactory } from '@audio/wav/wav-reader';
import type { ConversationConfig } from '@config/conversation-config';
import { loadTiming } from '@persistence/timing-file';
import { ConversationTimeline } from './conversation-timeline';

// Load the configured timing file and lay its turns out against the configured track directory.
export function loadConversationTimeline(
    config: ConversationConfig,
    readerFactory: AudioTrackReaderFactory = new WavReaderFactory()
): ConversationTimeline {
    const turns = loadTiming(config.timingFilePath);
    return ConversationTimeline.build(turns, config.audioTracksPath, readerFactory);
}
