/**
 * Timing file – plain-text persistence of an ordered turn sequence.
 *
 * Format: one record per line, `speakerName audioTrackName offset`, separated by a single space.
 * Offsets are signed integer milliseconds. Blank lines are ignored on load, so an empty file
 * (or one holding only a trailing newline) yields an empty sequence.
 */
import { readFileSync, writeFileSync } from 'fs';
import { createTurn, type Turn } from '@core/conversation/turn';
import { debugLog } from '@utils/debug-log';

export type TimingFileErrorCode = 'ERR_TIMING_IO' | 'ERR_TIMING_PARSE' | 'ERR_TIMING_FIELD';

export class TimingFileError extends Error {
    public readonly code: TimingFileErrorCode;
    /** 1-based line number for parse errors. */
    public readonly line?: number;

    constructor(code: TimingFileErrorCode, message: string, options: { line?: number; cause?: unknown } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'TimingFileError';
        this.code = code;
        this.line = options.line;
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

const FIELD_SEPARATOR = ' ';
const FIELD_COUNT = 3;
const INTEGER_PATTERN = /^[+-]?\d+$/;

function assertEncodableName(value: string, field: string, index: number): void {
    if (value.length === 0 || /\s/.test(value)) {
        throw new TimingFileError(
            'ERR_TIMING_FIELD',
            `Turn #${index}: ${field} must be non-empty and contain no whitespace (got ${JSON.stringify(value)})`
        );
    }
}

export function serializeTiming(turns: readonly Turn[]): string {
    let out = '';
    turns.forEach((turn, index) => {
        assertEncodableName(turn.speakerName, 'speakerName', index);
        assertEncodableName(turn.audioTrackName, 'audioTrackName', index);
        out += [turn.speakerName, turn.audioTrackName, String(turn.offset)].join(FIELD_SEPARATOR) + '\n';
    });
    return out;
}

export function parseTiming(text: string): Turn[] {
    const turns: Turn[] = [];
    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const raw = lines[i].trim();
        if (raw.length === 0) continue;
        const lineNumber = i + 1;
        const fields = raw.split(/\s+/);
        if (fields.length !== FIELD_COUNT) {
            throw new TimingFileError(
                'ERR_TIMING_PARSE',
                `Line ${lineNumber}: expected ${FIELD_COUNT} fields, found ${fields.length}`,
                { line: lineNumber }
            );
        }
        const [speakerName, audioTrackName, offsetText] = fields;
        const offset = Number(offsetText);
        if (!INTEGER_PATTERN.test(offsetText) || !Number.isSafeInteger(offset)) {
            throw new TimingFileError(
                'ERR_TIMING_PARSE',
                `Line ${lineNumber}: offset ${JSON.stringify(offsetText)} is not an integer`,
                { line: lineNumber }
            );
        }
        turns.push(createTurn(speakerName, audioTrackName, offset));
    }
    return turns;
}

export function saveTiming(path: string, turns: readonly Turn[]): void {
    const text = serializeTiming(turns);
    try {
        writeFileSync(path, text, 'utf8');
    } catch (error) {
        throw new TimingFileError('ERR_TIMING_IO', `Cannot write timing file ${path}: ${errorMessage(error)}`, {
            cause: error,
        });
    }
    debugLog('[timingFile] saved', turns.length, 'turns to', path);
}

export function loadTiming(path: string): Turn[] {
    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (error) {
        throw new TimingFileError('ERR_TIMING_IO', `Cannot read timing file ${path}: ${errorMessage(error)}`, {
            cause: error,
        });
    }
    const turns = parseTiming(text);
    debugLog('[timingFile] loaded', turns.length, 'turns from', path);
    return turns;
}
