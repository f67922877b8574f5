/**
 * Render step - one backend job per content item, downloaded to disk.
 * Per-item failures become manifest entries; a misconfigured backend aborts.
 */

import path from 'path';
import { PipelineStep, PipelineContext } from '../PipelineInfrastructure';
import { ContentItem, clipIdLabel } from '../../../domain/entities/ContentItem';
import {
    ClipJob,
    completeClipJob,
    createClipJob,
    failClipJob,
    updateClipJobStatus,
} from '../../../domain/entities/ClipJob';
import { ClipManifest, appendClipJob, summarizeManifest } from '../../../domain/entities/ClipManifest';
import { localVideoFileName } from '../../../domain/entities/OutputLocator';
import { ConfigurationError, JobFailure, TransferFailure } from '../../../domain/errors';
import { RenderJobClient } from '../../RenderJobClient';
import { ArtifactFetcher } from '../../ArtifactFetcher';
import { ManifestStore } from '../../ManifestStore';

export class RenderClipsStep implements PipelineStep {
    readonly name = 'RenderClips';

    constructor(
        private readonly jobClient: RenderJobClient,
        private readonly fetcher: ArtifactFetcher,
        private readonly manifestStore: ManifestStore,
        private readonly clipsDir: string
    ) { }

    async execute(context: PipelineContext): Promise<PipelineContext> {
        let manifest: ClipManifest = [];

        for (const [order, item] of context.items.entries()) {
            console.log(`[Render] Clip ${clipIdLabel(item.id)} (${order + 1}/${context.items.length})`);
            const job = await this.renderItem(item, order);
            manifest = appendClipJob(manifest, job);

            if (job.status === 'BACKEND_MISCONFIGURED') {
                await this.manifestStore.save(manifest);
                throw new ConfigurationError(
                    `Render backend rejected the job template for item ${item.id}; aborting before further submissions`
                );
            }
        }

        await this.manifestStore.save(manifest);
        console.log(`[Render] Finished: ${JSON.stringify(summarizeManifest(manifest))}`);

        return { ...context, manifest };
    }

    private async renderItem(item: ContentItem, order: number): Promise<ClipJob> {
        let job: ClipJob = createClipJob(item.id, order);

        try {
            if (!item.prompt.trim()) {
                throw new JobFailure(item.id, 'SKIPPED_NO_PROMPT', 'Item has no prompt');
            }

            const outcome = await this.jobClient.run(item, (status) => {
                job = updateClipJobStatus(job, status);
            });
            if (outcome.status !== 'SUCCESS') {
                throw new JobFailure(item.id, outcome.status, outcome.detail);
            }

            job = { ...job, outputLocator: outcome.locator };
            const destination = path.join(this.clipsDir, localVideoFileName(outcome.locator));
            const result = await this.fetcher.fetch(outcome.locator, destination);
            if (!result.ok) {
                throw new TransferFailure(item.id, result.reason);
            }

            return completeClipJob(job, outcome.locator, result.path);
        } catch (error) {
            if (error instanceof JobFailure) {
                console.error(`[Render] Clip ${clipIdLabel(item.id)}: ${error.status} (${error.message})`);
                return failClipJob(job, error.status);
            }
            if (error instanceof TransferFailure) {
                console.error(`[Render] Clip ${clipIdLabel(item.id)}: DOWNLOAD_FAILED (${error.message})`);
                return failClipJob(job, 'DOWNLOAD_FAILED');
            }
            throw error;
        }
    }
}
