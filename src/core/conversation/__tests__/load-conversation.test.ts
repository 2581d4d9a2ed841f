import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CannedAudioTrackReaderFactory } from '@audio/reader/canned-reader-factory';
import { encodeWav } from '@audio/wav/encode-wav';
import { createSineBuffer } from '@audio/wav/sine';
import { createConversationConfig } from '@config/conversation-config';
import { saveTiming } from '@persistence/timing-file';
import { loadConversationTimeline } from '../load-conversation';
import { createTurn } from '../turn';

describe('loadConversationTimeline', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'conversation-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function configFor(timingFile: string) {
        return createConversationConfig({
            audioTracksPath: dir,
            timingFilePath: timingFile,
            outputPath: join(dir, 'out'),
        });
    }

    it('lays out WAV tracks named by the timing file', () => {
        const sampleRate = 16000;
        writeFileSync(join(dir, 'hi.wav'), encodeWav(createSineBuffer({ sampleRate, sampleCount: 8000 }), 'pcm16'));
        writeFileSync(
            join(dir, 'yo.wav'),
            encodeWav(createSineBuffer({ sampleRate, sampleCount: 4800, frequency: 220 }), 'float32')
        );
        const timingFile = join(dir, 'timing.txt');
        saveTiming(timingFile, [
            createTurn('A', 'hi.wav', 0),
            createTurn('B', 'yo.wav', -100),
            createTurn('A', 'hi.wav', 50),
        ]);

        const timeline = loadConversationTimeline(configFor(timingFile));

        expect(timeline.valid()).toBe(true);
        expect(timeline.sampleRate()).toBe(sampleRate);
        expect(timeline.audioTrackReaders().size).toBe(2);
        expect(timeline.speakingTurns().map((p) => [p.beginSample, p.endSample])).toEqual([
            [0, 8000],
            [6400, 11200],
            [12000, 20000],
        ]);
        expect(timeline.totalDurationSamples()).toBe(20000);
    });

    it('uses the injected reader factory', () => {
        const timingFile = join(dir, 'timing.txt');
        saveTiming(timingFile, [createTurn('A', 't500', 0), createTurn('B', 't500', -100)]);
        const factory = new CannedAudioTrackReaderFactory({ sampleRate: 48000, channelCount: 1, sampleCount: 24000 });

        const timeline = loadConversationTimeline(configFor(timingFile), factory);

        expect(factory.createdPaths).toEqual([join(dir, 't500')]);
        expect(timeline.totalDurationSamples()).toBe(43200);
    });
});
