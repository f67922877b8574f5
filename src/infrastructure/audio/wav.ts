const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const PCM_UNSIGNED_8BIT = 8;

/**
 * Format fields of a RIFF/WAVE file plus where its sample data lives.
 */
export interface WavInfo {
    audioFormat: number;
    channels: number;
    sampleRate: number;
    bitsPerSample: number;
    blockAlign: number;
    dataOffset: number;
    dataSize: number;
    durationSeconds: number;
}

interface Chunk {
    id: string;
    /** Offset of the chunk header */
    offset: number;
    /** Offset of the chunk body */
    bodyOffset: number;
    size: number;
}

function readChunks(buffer: Buffer): Chunk[] {
    const chunks: Chunk[] = [];
    let offset = RIFF_HEADER_SIZE;

    while (offset + CHUNK_HEADER_SIZE <= buffer.length) {
        const id = buffer.toString('ascii', offset, offset + 4);
        const bodyOffset = offset + CHUNK_HEADER_SIZE;
        // Streaming writers leave the size unset; clamp to what is actually there
        const size = Math.min(buffer.readUInt32LE(offset + 4), buffer.length - bodyOffset);
        chunks.push({ id, offset, bodyOffset, size });
        offset = bodyOffset + size + (size % 2);
    }
    return chunks;
}

export function readWavInfo(buffer: Buffer): WavInfo {
    if (
        buffer.length < RIFF_HEADER_SIZE ||
        buffer.toString('ascii', 0, 4) !== 'RIFF' ||
        buffer.toString('ascii', 8, 12) !== 'WAVE'
    ) {
        throw new Error('Not a RIFF/WAVE file');
    }

    const chunks = readChunks(buffer);
    const fmt = chunks.find((chunk) => chunk.id === 'fmt ');
    const data = chunks.find((chunk) => chunk.id === 'data');
    if (!fmt || fmt.size < 16) {
        throw new Error('WAV file has no valid "fmt " chunk');
    }
    if (!data) {
        throw new Error('WAV file has no "data" chunk');
    }

    const audioFormat = buffer.readUInt16LE(fmt.bodyOffset);
    const channels = buffer.readUInt16LE(fmt.bodyOffset + 2);
    const sampleRate = buffer.readUInt32LE(fmt.bodyOffset + 4);
    const blockAlign = buffer.readUInt16LE(fmt.bodyOffset + 12);
    const bitsPerSample = buffer.readUInt16LE(fmt.bodyOffset + 14);
    if (sampleRate === 0 || blockAlign === 0) {
        throw new Error('WAV file has an invalid sample rate or block alignment');
    }

    return {
        audioFormat,
        channels,
        sampleRate,
        bitsPerSample,
        blockAlign,
        dataOffset: data.bodyOffset,
        dataSize: data.size,
        durationSeconds: data.size / blockAlign / sampleRate,
    };
}

/**
 * Appends `durationMs` of digital silence to the sample data and fixes up
 * the RIFF and data chunk sizes. Keeps the speech model from clipping the
 * last syllable when the clip is cut to the shorter stream.
 */
export function appendSilence(buffer: Buffer, durationMs: number): Buffer {
    if (durationMs <= 0) {
        return buffer;
    }

    const info = readWavInfo(buffer);
    const frames = Math.round((durationMs / 1000) * info.sampleRate);
    const silence = Buffer.alloc(
        frames * info.blockAlign,
        info.bitsPerSample === PCM_UNSIGNED_8BIT ? 0x80 : 0x00
    );

    const dataEnd = info.dataOffset + info.dataSize;
    const padded = Buffer.concat([buffer.subarray(0, dataEnd), silence, buffer.subarray(dataEnd)]);

    padded.writeUInt32LE(info.dataSize + silence.length, info.dataOffset - 4);
    padded.writeUInt32LE(padded.length - CHUNK_HEADER_SIZE, 4);
    return padded;
}
