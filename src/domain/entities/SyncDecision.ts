/**
 * Alignment transform for one narration/video pair.
 * - NONE: leave the video alone (audio fits, or is shorter)
 * - STRETCH: slow the whole video down by `factor` (> 1)
 * - FREEZE_PAD: hold the last frame for `seconds` more
 */
export type SyncTransform =
    | { readonly kind: 'NONE' }
    | { readonly kind: 'STRETCH'; readonly factor: number }
    | { readonly kind: 'FREEZE_PAD'; readonly seconds: number };

export type SyncDecision = SyncTransform & {
    readonly audioDuration: number;
    readonly videoDuration: number;
};
