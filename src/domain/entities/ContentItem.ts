import { ConfigurationError } from '../errors';
import { isRecord } from '../guards';

/** Largest id that still fits the 4-digit filename convention. */
export const MAX_CONTENT_ITEM_ID = 9999;

/**
 * One scene of the narrative: what to render and what to say over it.
 * Supplied once at pipeline start and never mutated.
 */
export interface ContentItem {
    /** Stable identifier, also used to correlate narration and video files */
    readonly id: number;
    /** Text prompt sent to the render backend */
    readonly prompt: string;
    /** Narration text spoken over the clip */
    readonly commentary: string;
    /** Per-item frame count override */
    readonly frames?: number;
    /** Per-item width override */
    readonly width?: number;
    /** Per-item height override */
    readonly height?: number;
}

/**
 * Zero-padded 4-digit label used in every file name derived from an item.
 */
export function clipIdLabel(id: number): string {
    return id.toString().padStart(4, '0');
}

function readOptionalDimension(raw: Record<string, unknown>, keys: string[], position: number): number | undefined {
    for (const key of keys) {
        const value = raw[key];
        if (value === undefined || value === null) {
            continue;
        }
        if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
            throw new ConfigurationError(`Content item at index ${position}: "${key}" must be a positive integer`);
        }
        return value;
    }
    return undefined;
}

function readText(raw: Record<string, unknown>, keys: string[]): string {
    for (const key of keys) {
        const value = raw[key];
        if (typeof value === 'string') {
            return value;
        }
    }
    return '';
}

/**
 * Validates the parsed content file. Accepts the legacy `image_prompt`
 * and `duration_frames` keys; an item without `id` takes its 1-based position.
 */
export function parseContentItems(raw: unknown): ContentItem[] {
    if (!Array.isArray(raw)) {
        throw new ConfigurationError('Content file must contain a JSON list of items');
    }

    const seen = new Set<number>();

    return raw.map((entry: unknown, index: number) => {
        if (!isRecord(entry)) {
            throw new ConfigurationError(`Content item at index ${index} is not an object`);
        }

        const rawId = entry.id ?? index + 1;
        if (typeof rawId !== 'number' || !Number.isInteger(rawId) || rawId < 0 || rawId > MAX_CONTENT_ITEM_ID) {
            throw new ConfigurationError(
                `Content item at index ${index}: id must be an integer between 0 and ${MAX_CONTENT_ITEM_ID}`
            );
        }
        if (seen.has(rawId)) {
            throw new ConfigurationError(`Duplicate content item id ${rawId}`);
        }
        seen.add(rawId);

        return {
            id: rawId,
            prompt: readText(entry, ['prompt', 'image_prompt']),
            commentary: readText(entry, ['commentary']),
            frames: readOptionalDimension(entry, ['frames', 'duration_frames'], index),
            width: readOptionalDimension(entry, ['width'], index),
            height: readOptionalDimension(entry, ['height'], index),
        };
    });
}
