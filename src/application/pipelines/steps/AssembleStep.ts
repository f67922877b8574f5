/**
 * Assembly step - aligns each clip with its narration and joins everything
 * into the final video, in input order.
 */

import fs from 'fs';
import path from 'path';
import { PipelineStep, PipelineContext } from '../PipelineInfrastructure';
import { completedClips } from '../../../domain/entities/ClipManifest';
import { EmptyResultError } from '../../../domain/errors';
import { IMediaTool } from '../../../domain/ports/IMediaTool';
import { pairClips } from '../../../domain/services/ClipPairing';
import { describeDecision, planSync, videoFilterFor } from '../../../domain/services/DurationReconciliationPlanner';
import { ManifestStore } from '../../ManifestStore';
import { ProjectLayout } from '../../../config';

export interface AssembleStepOptions {
    layout: ProjectLayout;
    stretchThresholdSeconds: number;
}

export class AssembleStep implements PipelineStep {
    readonly name = 'Assemble';

    constructor(
        private readonly mediaTool: IMediaTool,
        private readonly manifestStore: ManifestStore,
        private readonly options: AssembleStepOptions
    ) { }

    async execute(context: PipelineContext): Promise<PipelineContext> {
        const videoPaths = await this.collectClips();
        if (videoPaths.length === 0) {
            throw new EmptyResultError('No successfully rendered clips to assemble');
        }

        let finalVideoPath: string;
        if (context.fullNarrationPath) {
            finalVideoPath = await this.assembleWithFullNarration(videoPaths, context.fullNarrationPath);
        } else if (context.narrationPaths.length > 0) {
            finalVideoPath = await this.assembleWithClipNarrations(videoPaths, context.narrationPaths);
        } else {
            console.warn('[Assemble] No narration available; concatenating silent clips');
            finalVideoPath = await this.concatenate(videoPaths);
        }

        console.log(`[Assemble] Final video: ${finalVideoPath}`);
        return { ...context, finalVideoPath };
    }

    /**
     * Downloaded clips from the persisted manifest, in input order.
     */
    private async collectClips(): Promise<string[]> {
        const clips = completedClips(await this.manifestStore.load());
        const present = clips.filter((job) => fs.existsSync(job.localPath));

        for (const job of clips) {
            if (!present.includes(job)) {
                console.warn(`[Assemble] Clip for item ${job.id} is missing on disk: ${job.localPath}`);
            }
        }
        return present.map((job) => job.localPath);
    }

    private async assembleWithClipNarrations(videoPaths: string[], narrationPaths: readonly string[]): Promise<string> {
        const { pairings, unmatchedNarrations, unmatchedVideos } = pairClips(narrationPaths, videoPaths);

        for (const videoPath of unmatchedVideos) {
            console.warn(`[Assemble] Skipping ${path.basename(videoPath)}: no matching narration`);
        }
        for (const narrationPath of unmatchedNarrations) {
            console.warn(`[Assemble] Skipping ${path.basename(narrationPath)}: no matching clip`);
        }
        if (pairings.length === 0) {
            throw new EmptyResultError('No clip has a matching narration');
        }

        const mergedPaths: string[] = [];
        for (const pairing of pairings) {
            const outputPath = path.join(this.options.layout.mergedDir, `merged_${pairing.id}.mp4`);
            mergedPaths.push(await this.alignPair(pairing.videoPath, pairing.narrationPath, outputPath, pairing.id));
        }

        return this.concatenate(mergedPaths);
    }

    private async assembleWithFullNarration(videoPaths: string[], narrationPath: string): Promise<string> {
        const { layout } = this.options;
        const silentVideo = await this.mediaTool.concatenate(videoPaths, layout.silentConcatPath, layout.concatListPath);
        return this.alignPair(silentVideo, narrationPath, layout.finalVideoPath, 'full');
    }

    private async alignPair(videoPath: string, audioPath: string, outputPath: string, label: string): Promise<string> {
        const audioDuration = await this.mediaTool.probeDuration(audioPath);
        const videoDuration = await this.mediaTool.probeDuration(videoPath);

        const decision = planSync(audioDuration, videoDuration, {
            stretchThresholdSeconds: this.options.stretchThresholdSeconds,
        });
        console.log(`[Sync] ${label}: ${describeDecision(decision)}`);

        return this.mediaTool.alignAndMux({
            videoPath,
            audioPath,
            videoFilter: videoFilterFor(decision),
            outputPath,
        });
    }

    private concatenate(inputPaths: string[]): Promise<string> {
        const { layout } = this.options;
        console.log(`[Assemble] Concatenating ${inputPaths.length} clips`);
        return this.mediaTool.concatenate(inputPaths, layout.finalVideoPath, layout.concatListPath);
    }
}
