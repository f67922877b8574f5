/**
 * Narration step - synthesizes the commentary, one WAV per clip or one for the whole run.
 * Failures never stop the run: the video is then assembled without sound.
 */

import fs from 'fs';
import path from 'path';
import { PipelineStep, PipelineContext } from '../PipelineInfrastructure';
import { ContentItem, clipIdLabel } from '../../../domain/entities/ContentItem';
import { SynthesisFailure } from '../../../domain/errors';
import { ISpeechClient, SpeechOptions } from '../../../domain/ports/ISpeechClient';
import { narrationFileName } from '../../../domain/services/ClipPairing';
import { appendSilence } from '../../../infrastructure/audio/wav';
import { NarrationMode } from '../../../config';

export interface NarrationStepOptions {
    mode: NarrationMode;
    narrationDir: string;
    fullNarrationPath: string;
    referenceVoicePath?: string;
    referenceTranscript?: string;
    seed?: number;
    /** Silence appended to each narration */
    tailPaddingMs: number;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class NarrationStep implements PipelineStep {
    readonly name = 'Narration';

    constructor(
        private readonly speechClient: ISpeechClient,
        private readonly options: NarrationStepOptions
    ) { }

    async execute(context: PipelineContext): Promise<PipelineContext> {
        const items = context.items.filter((item) => item.commentary.trim().length > 0);
        if (items.length === 0) {
            return this.proceedSilent(context, new SynthesisFailure('No item has commentary'));
        }

        const unavailable = await this.checkPrerequisites();
        if (unavailable) {
            return this.proceedSilent(context, unavailable);
        }

        return this.options.mode === 'single'
            ? this.narrateWhole(context, items)
            : this.narrateEach(context, items);
    }

    private async checkPrerequisites(): Promise<SynthesisFailure | null> {
        const { referenceVoicePath } = this.options;
        if (referenceVoicePath && !fs.existsSync(referenceVoicePath)) {
            return new SynthesisFailure(`Reference voice ${referenceVoicePath} not found`);
        }
        if (!(await this.speechClient.healthCheck())) {
            return new SynthesisFailure('Speech server is not reachable');
        }
        return null;
    }

    private async narrateEach(context: PipelineContext, items: ContentItem[]): Promise<PipelineContext> {
        await fs.promises.mkdir(this.options.narrationDir, { recursive: true });

        const narrationPaths: string[] = [];
        for (const item of items) {
            const outputPath = path.join(this.options.narrationDir, narrationFileName(item.id));
            try {
                narrationPaths.push(await this.synthesizeTo(item.commentary, outputPath));
                console.log(`[Narration] Clip ${clipIdLabel(item.id)} → ${path.basename(outputPath)}`);
            } catch (error) {
                console.error(`[Narration] Clip ${clipIdLabel(item.id)} failed: ${errorMessage(error)}`);
            }
        }

        if (narrationPaths.length === 0) {
            return this.proceedSilent(context, new SynthesisFailure('Every narration request failed'));
        }

        console.log(`[Narration] ${narrationPaths.length}/${items.length} narrations generated`);
        return { ...context, narrationPaths };
    }

    private async narrateWhole(context: PipelineContext, items: ContentItem[]): Promise<PipelineContext> {
        const script = items.map((item) => item.commentary.trim()).join('\n');
        const outputPath = this.options.fullNarrationPath;

        try {
            await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
            await this.synthesizeTo(script, outputPath);
        } catch (error) {
            return this.proceedSilent(context, new SynthesisFailure(`Full narration failed: ${errorMessage(error)}`));
        }

        console.log(`[Narration] Full narration → ${path.basename(outputPath)}`);
        return { ...context, fullNarrationPath: outputPath };
    }

    private async synthesizeTo(text: string, outputPath: string): Promise<string> {
        const options: SpeechOptions = {
            referenceAudioPath: this.options.referenceVoicePath,
            referenceTranscript: this.options.referenceTranscript,
            seed: this.options.seed,
        };
        const { audio } = await this.speechClient.synthesize(text, options);
        await fs.promises.writeFile(outputPath, appendSilence(audio, this.options.tailPaddingMs));
        return outputPath;
    }

    private proceedSilent(context: PipelineContext, failure: SynthesisFailure): PipelineContext {
        console.warn(`[Narration] ${failure.message}; continuing without narration`);
        return { ...context, narrationPaths: [], fullNarrationPath: undefined, narrationFailure: failure };
    }
}
