import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { encodeWav } from '../encode-wav';
import { createSineBuffer } from '../sine';
import { WavFileReader, WavFormatError, WavReaderFactory } from '../wav-reader';

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected a failure');
}

function writeTag(view: DataView, offset: number, tag: string) {
    for (let i = 0; i < tag.length; i++) view.setUint8(offset + i, tag.charCodeAt(i));
}

// RIFF with a 3-byte LIST chunk (plus pad byte) ahead of fmt and data.
function wavWithOddChunk(): Uint8Array {
    const bytes = new Uint8Array(60);
    const view = new DataView(bytes.buffer);
    writeTag(view, 0, 'RIFF');
    view.setUint32(4, 52, true);
    writeTag(view, 8, 'WAVE');
    writeTag(view, 12, 'LIST');
    view.setUint32(16, 3, true);
    writeTag(view, 24, 'fmt ');
    view.setUint32(28, 16, true);
    view.setUint16(32, 1, true); // PCM
    view.setUint16(34, 1, true); // mono
    view.setUint32(36, 8000, true);
    view.setUint32(40, 16000, true);
    view.setUint16(44, 2, true);
    view.setUint16(46, 16, true);
    writeTag(view, 48, 'data');
    view.setUint32(52, 4, true);
    view.setInt16(56, 16384, true);
    view.setInt16(58, -16384, true);
    return bytes;
}

describe('WavFileReader', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'wav-reader-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('reports the parameters sine files were written with', () => {
        const durationSeconds = 5;
        const factory = new WavReaderFactory();
        for (const sampleRate of [8000, 11025, 16000, 22050, 32000, 44100, 48000]) {
            const path = join(dir, `TempSineWavFile_${sampleRate}.wav`);
            const sampleCount = durationSeconds * sampleRate;
            writeFileSync(path, encodeWav(createSineBuffer({ sampleRate, sampleCount }), 'pcm16'));

            const reader = factory.create(path);
            expect(reader.sampleRate).toBe(sampleRate);
            expect(reader.channelCount).toBe(1);
            expect(reader.sampleCount).toBe(sampleCount);
        }
    });

    it('reads float samples back interleaved', () => {
        const bytes = encodeWav({
            sampleRate: 16000,
            channels: [Float32Array.from([0, 0.25, -0.5, 1]), Float32Array.from([0.125, -1, 0.75, 0])],
        });
        const reader = new WavFileReader(bytes);
        expect(reader.channelCount).toBe(2);
        expect(reader.sampleCount).toBe(4);

        const target = new Float32Array(8);
        expect(reader.readSamples(target)).toBe(8);
        expect(Array.from(target)).toEqual([0, 0.125, 0.25, -1, -0.5, 0.75, 1, 0]);
        expect(reader.readSamples(target)).toBe(0);
    });

    it('scales 16-bit samples to floats and reads in chunks', () => {
        const bytes = encodeWav({ sampleRate: 8000, channels: [Float32Array.from([0.5, -1, 0.25])] }, 'pcm16');
        const reader = new WavFileReader(bytes);
        const target = new Float32Array(2);

        expect(reader.readSamples(target)).toBe(2);
        expect(Array.from(target)).toEqual([0.5, -1]);
        expect(reader.readSamples(target)).toBe(1);
        expect(target[0]).toBe(0.25);
        expect(reader.readSamples(target)).toBe(0);
    });

    it('skips unknown chunks including their pad byte', () => {
        const reader = new WavFileReader(wavWithOddChunk());
        expect(reader.sampleRate).toBe(8000);
        expect(reader.sampleCount).toBe(2);
        const target = new Float32Array(2);
        reader.readSamples(target);
        expect(Array.from(target)).toEqual([0.5, -0.5]);
    });

    it('rejects bytes that are not RIFF/WAVE', () => {
        const error = captureError(() => new WavFileReader(new TextEncoder().encode('definitely not audio')));
        expect(error).toBeInstanceOf(WavFormatError);
        expect(error).toMatchObject({ code: 'ERR_WAV_HEADER' });
    });

    it('rejects unsupported sample formats', () => {
        const bytes = encodeWav({ sampleRate: 8000, channels: [new Float32Array(4)] }, 'pcm16');
        new DataView(bytes.buffer).setUint16(34, 24, true);
        expect(captureError(() => new WavFileReader(bytes))).toMatchObject({
            code: 'ERR_WAV_FORMAT',
            message: 'wav: unsupported sample format 1 with 24 bits per sample',
        });
    });

    it('rejects a zero sample rate', () => {
        const bytes = encodeWav({ sampleRate: 8000, channels: [new Float32Array(4)] }, 'pcm16');
        new DataView(bytes.buffer).setUint32(24, 0, true);
        expect(captureError(() => new WavFileReader(bytes, 'zero.wav'))).toMatchObject({
            code: 'ERR_WAV_FORMAT',
            message: 'zero.wav: sample rate is zero',
        });
    });

    it('rejects a file without a data chunk', () => {
        const bytes = encodeWav({ sampleRate: 8000, channels: [new Float32Array(4)] }).slice(0, 36);
        expect(captureError(() => new WavFileReader(bytes))).toMatchObject({
            code: 'ERR_WAV_CHUNK',
            message: 'wav: missing data chunk',
        });
    });

    it('surfaces file system errors from the factory', () => {
        expect(() => new WavReaderFactory().create(join(dir, 'missing.wav'))).toThrow(/ENOENT/);
    });
});
