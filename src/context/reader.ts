/**
 * File Reader - loads file contents through an ordered decoding chain:
 *
 * 1. Byte-order mark (UTF-8, UTF-16LE, UTF-16BE)
 * 2. Strict UTF-8
 * 3. Statistical detection (jschardet) over the leading 1 MiB, decoded by iconv-lite
 * 4. latin1, which accepts any byte sequence
 *
 * One content string comes back per input path. Files that cannot be read
 * at all get a placeholder instead of aborting the batch.
 */

import { readFileSync } from 'fs';
import iconv from 'iconv-lite';
import jschardet from 'jschardet';
import { getErrorMessage } from '../errors.js';

/** Bytes handed to the detector; larger files are sampled */
export const DETECTION_SAMPLE_BYTES = 1024 * 1024;

/** Minimum detector confidence before its guess is trusted */
export const DETECTION_MIN_CONFIDENCE = 0.5;

export const FALLBACK_ENCODING = 'latin1';

export interface DecodedFile {
    content: string;
    /** Encoding of the stage that succeeded */
    encoding: string;
}

export interface ReadOptions {
    verbose?: boolean;
}

interface DecodeStage {
    decode(buffer: Buffer): DecodedFile | null;
}

const BOMS: { bytes: number[]; encoding: string }[] = [
    { bytes: [0xef, 0xbb, 0xbf], encoding: 'utf-8' },
    { bytes: [0xff, 0xfe], encoding: 'utf-16le' },
    { bytes: [0xfe, 0xff], encoding: 'utf-16be' },
];

const bomStage: DecodeStage = {
    decode(buffer) {
        for (const bom of BOMS) {
            if (buffer.length < bom.bytes.length) continue;
            if (!bom.bytes.every((b, i) => buffer[i] === b)) continue;
            return {
                content: iconv.decode(buffer.subarray(bom.bytes.length), bom.encoding),
                encoding: bom.encoding,
            };
        }
        return null;
    },
};

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

const utf8Stage: DecodeStage = {
    decode(buffer) {
        try {
            return { content: utf8Decoder.decode(buffer), encoding: 'utf-8' };
        } catch {
            // invalid UTF-8: fall through to detection
            return null;
        }
    },
};

const detectStage: DecodeStage = {
    decode(buffer) {
        const sample = buffer.subarray(0, DETECTION_SAMPLE_BYTES);
        const guess = jschardet.detect(sample);
        if (!guess.encoding || guess.confidence < DETECTION_MIN_CONFIDENCE) return null;
        if (!iconv.encodingExists(guess.encoding)) return null;
        return { content: iconv.decode(buffer, guess.encoding), encoding: guess.encoding.toLowerCase() };
    },
};

const fallbackStage: DecodeStage = {
    decode(buffer) {
        return { content: buffer.toString(FALLBACK_ENCODING), encoding: FALLBACK_ENCODING };
    },
};

const DECODE_CHAIN: readonly DecodeStage[] = [bomStage, utf8Stage, detectStage, fallbackStage];

/**
 * Decode bytes with the first stage that succeeds. A stage that throws is
 * treated as a miss. Only returns null when even latin1 threw, which happens
 * for buffers too large to become a string.
 */
export function decodeBuffer(buffer: Buffer): DecodedFile | null {
    for (const stage of DECODE_CHAIN) {
        try {
            const result = stage.decode(buffer);
            if (result) return result;
        } catch {
            // try the next stage
            continue;
        }
    }
    return null;
}

export function unreadablePlaceholder(path: string): string {
    return `# Error: Unable to read file ${path}`;
}

/**
 * Read and decode one file. Read failures (missing, permission, too large
 * for a Buffer) and undecodable buffers yield the placeholder.
 */
export function readFileContent(path: string): DecodedFile {
    let buffer: Buffer;
    try {
        buffer = readFileSync(path);
    } catch (error) {
        console.error(`Error reading ${path}: ${getErrorMessage(error)}`);
        return { content: unreadablePlaceholder(path), encoding: 'none' };
    }

    const decoded = decodeBuffer(buffer);
    if (!decoded) {
        console.error(`Error decoding ${path}: every encoding failed`);
        return { content: unreadablePlaceholder(path), encoding: 'none' };
    }
    return decoded;
}

/**
 * Read every path, in order. Always returns exactly one string per path.
 */
export function readFileContents(paths: readonly string[], options: ReadOptions = {}): string[] {
    return paths.map(path => {
        const { content, encoding } = readFileContent(path);
        if (options.verbose && encoding !== 'utf-8') {
            console.log(`  Decoded ${path} as ${encoding}`);
        }
        return content;
    });
}
