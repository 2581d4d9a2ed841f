import type { PcmBuffer } from './encode-wav';

export interface SineBufferOptions {
    sampleRate: number;
    sampleCount: number;
    frequency?: number;
    channelCount?: number;
    amplitude?: number;
}

// Sine tone for authoring fixture tracks. Every channel carries the same signal.
export function createSineBuffer({
    sampleRate,
    sampleCount,
    frequency = 440,
    channelCount = 1,
    amplitude = 0.5,
}: SineBufferOptions): PcmBuffer {
    const tone = new Float32Array(sampleCount);
    const step = (2 * Math.PI * frequency) / sampleRate;
    for (let i = 0; i < sampleCount; i++) {
        tone[i] = amplitude * Math.sin(step * i);
    }
    const channels: Float32Array[] = [];
    for (let c = 0; c < channelCount; c++) {
        channels.push(c === 0 ? tone : tone.slice());
    }
    return { sampleRate, channels };
}
