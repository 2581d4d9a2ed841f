import { readFileSync } from 'fs';
import type { AudioTrackReader, AudioTrackReaderFactory } from '@audio/reader/audio-track-reader';
import { debugLog } from '@utils/debug-log';
import { WAV_FORMAT_EXTENSIBLE, WAV_FORMAT_IEEE_FLOAT, WAV_FORMAT_PCM } from './encode-wav';

export type WavFormatErrorCode = 'ERR_WAV_HEADER' | 'ERR_WAV_FORMAT' | 'ERR_WAV_CHUNK';

export class WavFormatError extends Error {
    public readonly code: WavFormatErrorCode;

    constructor(code: WavFormatErrorCode, message: string) {
        super(message);
        this.name = 'WavFormatError';
        this.code = code;
    }
}

type SampleDecoder = (view: DataView, byteOffset: number) => number;

interface WavLayout {
    sampleRate: number;
    channelCount: number;
    bytesPerSample: number;
    blockAlign: number;
    dataOffset: number;
    dataSize: number;
    decode: SampleDecoder;
}

interface FmtChunk {
    format: number;
    channelCount: number;
    sampleRate: number;
    blockAlign: number;
    bits: number;
}

const decodePcm16: SampleDecoder = (view, byteOffset) => view.getInt16(byteOffset, true) / 0x8000;
const decodeFloat32: SampleDecoder = (view, byteOffset) => view.getFloat32(byteOffset, true);

function readTag(view: DataView, offset: number): string {
    return String.fromCharCode(
        view.getUint8(offset),
        view.getUint8(offset + 1),
        view.getUint8(offset + 2),
        view.getUint8(offset + 3)
    );
}

function parseLayout(view: DataView, source: string): WavLayout {
    if (view.byteLength < 12 || readTag(view, 0) !== 'RIFF' || readTag(view, 8) !== 'WAVE') {
        throw new WavFormatError('ERR_WAV_HEADER', `${source}: not a RIFF/WAVE file`);
    }

    let fmt: FmtChunk | null = null;
    let data: { offset: number; size: number } | null = null;

    let offset = 12;
    while (offset + 8 <= view.byteLength) {
        const id = readTag(view, offset);
        const size = view.getUint32(offset + 4, true);
        const body = offset + 8;
        if (id === 'fmt ') {
            if (size < 16 || body + 16 > view.byteLength) {
                throw new WavFormatError('ERR_WAV_CHUNK', `${source}: truncated fmt chunk`);
            }
            let format = view.getUint16(body, true);
            if (format === WAV_FORMAT_EXTENSIBLE && size >= 40 && body + 26 <= view.byteLength) {
                // First two bytes of the sub-format GUID carry the actual format tag.
                format = view.getUint16(body + 24, true);
            }
            fmt = {
                format,
                channelCount: view.getUint16(body + 2, true),
                sampleRate: view.getUint32(body + 4, true),
                blockAlign: view.getUint16(body + 12, true),
                bits: view.getUint16(body + 14, true),
            };
        } else if (id === 'data') {
            data = { offset: body, size: Math.min(size, view.byteLength - body) };
        }
        // Chunks are word aligned.
        offset = body + size + (size & 1);
    }

    if (!fmt) throw new WavFormatError('ERR_WAV_CHUNK', `${source}: missing fmt chunk`);
    if (!data) throw new WavFormatError('ERR_WAV_CHUNK', `${source}: missing data chunk`);

    let decode: SampleDecoder;
    if (fmt.format === WAV_FORMAT_PCM && fmt.bits === 16) {
        decode = decodePcm16;
    } else if (fmt.format === WAV_FORMAT_IEEE_FLOAT && fmt.bits === 32) {
        decode = decodeFloat32;
    } else {
        throw new WavFormatError(
            'ERR_WAV_FORMAT',
            `${source}: unsupported sample format ${fmt.format} with ${fmt.bits} bits per sample`
        );
    }
    if (fmt.sampleRate === 0) throw new WavFormatError('ERR_WAV_FORMAT', `${source}: sample rate is zero`);
    if (fmt.channelCount === 0) throw new WavFormatError('ERR_WAV_FORMAT', `${source}: channel count is zero`);
    const bytesPerSample = fmt.bits / 8;
    if (fmt.blockAlign !== fmt.channelCount * bytesPerSample) {
        throw new WavFormatError(
            'ERR_WAV_FORMAT',
            `${source}: block align ${fmt.blockAlign} does not match ${fmt.channelCount} channels of ${fmt.bits} bits`
        );
    }

    return {
        sampleRate: fmt.sampleRate,
        channelCount: fmt.channelCount,
        bytesPerSample,
        blockAlign: fmt.blockAlign,
        dataOffset: data.offset,
        dataSize: data.size,
        decode,
    };
}

export class WavFileReader implements AudioTrackReader {
    readonly sampleRate: number;
    readonly channelCount: number;
    readonly sampleCount: number;
    private readonly view: DataView;
    private readonly layout: WavLayout;
    private cursor = 0; // interleaved sample index

    constructor(bytes: Uint8Array, source = 'wav') {
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        this.layout = parseLayout(this.view, source);
        this.sampleRate = this.layout.sampleRate;
        this.channelCount = this.layout.channelCount;
        this.sampleCount = Math.floor(this.layout.dataSize / this.layout.blockAlign);
    }

    readSamples(target: Float32Array): number {
        const total = this.sampleCount * this.channelCount;
        const count = Math.max(0, Math.min(target.length, total - this.cursor));
        const { dataOffset, bytesPerSample, decode } = this.layout;
        for (let i = 0; i < count; i++) {
            target[i] = decode(this.view, dataOffset + (this.cursor + i) * bytesPerSample);
        }
        this.cursor += count;
        return count;
    }
}

export class WavReaderFactory implements AudioTrackReaderFactory {
    create(path: string): AudioTrackReader {
        const reader = new WavFileReader(readFileSync(path), path);
        debugLog('[wavReader]', path, {
            sampleRate: reader.sampleRate,
            channelCount: reader.channelCount,
            sampleCount: reader.sampleCount,
        });
        return reader;
    }
}
