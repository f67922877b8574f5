import path from 'path';
import { clipIdLabel } from '../entities/ContentItem';

export const NARRATION_FILE_PATTERN = /clip_(\d{4})_narration\.wav$/;
/** Save nodes append a frame counter (and sometimes a trailing underscore) to the prefix. */
export const VIDEO_FILE_PATTERN = /narrativegen_clip_(\d{4})__\d+_?\.mp4$/;

export function narrationFileName(id: number): string {
    return `clip_${clipIdLabel(id)}_narration.wav`;
}

export function videoOutputPrefix(id: number): string {
    return `narrativegen_clip_${clipIdLabel(id)}_`;
}

export function extractClipId(filePath: string, pattern: RegExp): string | null {
    const match = pattern.exec(path.basename(filePath));
    return match ? match[1] : null;
}

/**
 * A narration clip and a video clip sharing the same 4-digit identifier.
 */
export interface ClipPairing {
    readonly id: string;
    readonly narrationPath: string;
    readonly videoPath: string;
}

export interface PairingResult {
    pairings: ClipPairing[];
    unmatchedNarrations: string[];
    unmatchedVideos: string[];
}

function indexById(filePaths: readonly string[], pattern: RegExp): Map<string, string> {
    const byId = new Map<string, string>();
    for (const filePath of filePaths) {
        const id = extractClipId(filePath, pattern);
        if (id !== null && !byId.has(id)) {
            byId.set(id, filePath);
        }
    }
    return byId;
}

/**
 * Matches narration and video files by identifier. Pairings follow the
 * order of `videoPaths`; files that do not fit the naming pattern are ignored.
 */
export function pairClips(narrationPaths: readonly string[], videoPaths: readonly string[]): PairingResult {
    const narrations = indexById(narrationPaths, NARRATION_FILE_PATTERN);
    const videos = indexById(videoPaths, VIDEO_FILE_PATTERN);

    const pairings: ClipPairing[] = [];
    const unmatchedVideos: string[] = [];

    for (const [id, videoPath] of videos) {
        const narrationPath = narrations.get(id);
        if (narrationPath) {
            pairings.push({ id, narrationPath, videoPath });
        } else {
            unmatchedVideos.push(videoPath);
        }
    }

    const unmatchedNarrations = [...narrations]
        .filter(([id]) => !videos.has(id))
        .map(([, narrationPath]) => narrationPath);

    return { pairings, unmatchedNarrations, unmatchedVideos };
}
