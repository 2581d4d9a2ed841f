/**
 * Encode planar PCM into a WAV byte stream (44-byte canonical header).
 * Preserves channel count and sample rate; data is interleaved frame-by-frame.
 */

export interface PcmBuffer {
    sampleRate: number;
    /** One array per channel; all channels are read up to the length of the first. */
    channels: Float32Array[];
}

export type WavSampleFormat = 'pcm16' | 'float32';

export const WAV_FORMAT_PCM = 1;
export const WAV_FORMAT_IEEE_FLOAT = 3;
export const WAV_FORMAT_EXTENSIBLE = 0xfffe;

export function encodeWav(buffer: PcmBuffer, format: WavSampleFormat = 'float32'): Uint8Array {
    const numChannels = buffer.channels.length;
    if (numChannels === 0) throw new RangeError('encodeWav requires at least one channel');
    const sampleRate = buffer.sampleRate;
    const numFrames = buffer.channels[0].length;
    const bytesPerSample = format === 'pcm16' ? 2 : 4;
    const blockAlign = numChannels * bytesPerSample;
    const dataSize = numFrames * blockAlign;
    const headerSize = 44;
    const totalSize = headerSize + dataSize;
    const arrayBuffer = new ArrayBuffer(totalSize);
    const view = new DataView(arrayBuffer);

    function writeString(offset: number, str: string) {
        for (let i = 0; i < str.length; i++) {
            view.setUint8(offset + i, str.charCodeAt(i));
        }
    }

    writeString(0, 'RIFF');
    view.setUint32(4, totalSize - 8, true);
    writeString(8, 'WAVE');
    writeString(12, 'fmt ');
    view.setUint32(16, 16, true); // fmt chunk size
    view.setUint16(20, format === 'pcm16' ? WAV_FORMAT_PCM : WAV_FORMAT_IEEE_FLOAT, true);
    view.setUint16(22, numChannels, true);
    view.setUint32(24, sampleRate, true);
    view.setUint32(28, sampleRate * blockAlign, true); // byte rate
    view.setUint16(32, blockAlign, true);
    view.setUint16(34, bytesPerSample * 8, true); // bits per sample
    writeString(36, 'data');
    view.setUint32(40, dataSize, true);

    let offset = headerSize;
    for (let i = 0; i < numFrames; i++) {
        for (let c = 0; c < numChannels; c++) {
            const sample = buffer.channels[c][i] ?? 0;
            if (format === 'pcm16') {
                const clamped = Math.max(-1, Math.min(1, sample));
                view.setInt16(offset, Math.round(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff), true);
            } else {
                view.setFloat32(offset, sample, true);
            }
            offset += bytesPerSample;
        }
    }

    return new Uint8Array(arrayBuffer);
}
