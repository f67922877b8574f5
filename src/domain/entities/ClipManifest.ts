import { ClipJob, CompletedClipJob, isCompleted } from './ClipJob';

/**
 * Ordered snapshots of every ClipJob in a run. Append-only during the run,
 * replaced wholesale by the next one.
 */
export type ClipManifest = readonly ClipJob[];

export function appendClipJob(manifest: ClipManifest, job: ClipJob): ClipManifest {
    if (manifest.some((entry) => entry.id === job.id)) {
        throw new Error(`Manifest already has an entry for item ${job.id}`);
    }
    return [...manifest, job];
}

/**
 * Copy of the manifest sorted by original input position.
 */
export function sortByOrder(manifest: ClipManifest): ClipJob[] {
    return [...manifest].sort((a, b) => a.order - b.order);
}

/**
 * Completed jobs in assembly order.
 */
export function completedClips(manifest: ClipManifest): CompletedClipJob[] {
    return sortByOrder(manifest).filter(isCompleted);
}

export function summarizeManifest(manifest: ClipManifest): Record<string, number> {
    const summary: Record<string, number> = {};
    for (const job of manifest) {
        summary[job.status] = (summary[job.status] ?? 0) + 1;
    }
    return summary;
}
