import { SyncDecision } from '../entities/SyncDecision';

/**
 * Largest audio overhang (seconds) absorbed by slowing the video down.
 * Beyond it uniform slow motion gets distracting, so the last frame is held instead.
 */
export const DEFAULT_STRETCH_THRESHOLD_SECONDS = 4.0;

export interface PlannerOptions {
    stretchThresholdSeconds?: number;
}

function assertDuration(label: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0) {
        throw new RangeError(`${label} duration must be a positive number, got ${value}`);
    }
}

/**
 * Chooses how to align a video clip with its narration.
 *
 * diff = audio - video
 * - diff <= 0: NONE. A shorter narration leaves a silent video tail; the
 *   video is never shortened.
 * - 0 < diff <= threshold: STRETCH by audio / video.
 * - diff > threshold: FREEZE_PAD by diff.
 */
export function planSync(
    audioDuration: number,
    videoDuration: number,
    options: PlannerOptions = {}
): SyncDecision {
    assertDuration('Audio', audioDuration);
    assertDuration('Video', videoDuration);

    const threshold = options.stretchThresholdSeconds ?? DEFAULT_STRETCH_THRESHOLD_SECONDS;
    if (!Number.isFinite(threshold) || threshold < 0) {
        throw new RangeError(`Stretch threshold must be a non-negative number, got ${threshold}`);
    }

    const diff = audioDuration - videoDuration;

    if (diff <= 0) {
        return { kind: 'NONE', audioDuration, videoDuration };
    }
    if (diff <= threshold) {
        return { kind: 'STRETCH', factor: audioDuration / videoDuration, audioDuration, videoDuration };
    }
    return { kind: 'FREEZE_PAD', seconds: diff, audioDuration, videoDuration };
}

/**
 * ffmpeg video filter implementing the decision.
 */
export function videoFilterFor(decision: SyncDecision): string {
    switch (decision.kind) {
        case 'NONE':
            return 'null';
        case 'STRETCH':
            return `setpts=${decision.factor}*PTS`;
        case 'FREEZE_PAD':
            return `tpad=stop_mode=clone:stop_duration=${decision.seconds}`;
    }
}

export function describeDecision(decision: SyncDecision): string {
    const durations = `audio=${decision.audioDuration.toFixed(2)}s video=${decision.videoDuration.toFixed(2)}s`;
    switch (decision.kind) {
        case 'NONE':
            return decision.audioDuration < decision.videoDuration
                ? `${durations} → audio shorter, leaving silent tail`
                : `${durations} → no adjustment`;
        case 'STRETCH':
            return `${durations} → stretching video by ${decision.factor.toFixed(4)}`;
        case 'FREEZE_PAD':
            return `${durations} → freezing last frame for ${decision.seconds.toFixed(2)}s`;
    }
}
