export { PipelineStep, PipelineContext, createPipelineContext, executePipeline } from './PipelineInfrastructure';
export { RenderClipsStep } from './steps/RenderClipsStep';
export { CooldownStep } from './steps/CooldownStep';
export { NarrationStep } from './steps/NarrationStep';
export { AssembleStep } from './steps/AssembleStep';

import { PipelineStep } from './PipelineInfrastructure';
import { RenderClipsStep } from './steps/RenderClipsStep';
import { CooldownStep } from './steps/CooldownStep';
import { NarrationStep } from './steps/NarrationStep';
import { AssembleStep } from './steps/AssembleStep';
import { RenderJobClient } from '../RenderJobClient';
import { ArtifactFetcher } from '../ArtifactFetcher';
import { ManifestStore } from '../ManifestStore';
import { Sleep, sleep } from '../timing';
import { Config, ProjectLayout } from '../../config';
import { ConfigurationError } from '../../domain/errors';
import { IRenderBackendClient } from '../../domain/ports/IRenderBackendClient';
import { IMediaTool } from '../../domain/ports/IMediaTool';
import { ISpeechClient } from '../../domain/ports/ISpeechClient';
import { WorkflowTemplate } from '../../domain/services/WorkflowTemplate';

/**
 * `run` executes every stage; the others resume from what an earlier run left on disk.
 */
export type PipelineCommand = 'run' | 'render' | 'narrate' | 'assemble';

export const PIPELINE_COMMANDS: readonly PipelineCommand[] = ['run', 'render', 'narrate', 'assemble'];

export interface PipelineDependencies {
    config: Config;
    layout: ProjectLayout;
    renderBackend: IRenderBackendClient;
    speechClient: ISpeechClient;
    mediaTool: IMediaTool;
    /** Required by `run` and `render` */
    template?: WorkflowTemplate;
    sleep?: Sleep;
}

function createRenderStep(deps: PipelineDependencies): RenderClipsStep {
    if (!deps.template) {
        throw new ConfigurationError('A workflow template is required to render clips');
    }
    const { config } = deps;
    const jobClient = new RenderJobClient(deps.renderBackend, deps.template, {
        nodeIds: config.nodeIds,
        defaultVideo: config.defaultVideo,
        pollIntervalMs: config.pollIntervalMs,
        maxPollAttempts: config.maxPollAttempts,
        sleep: deps.sleep,
    });
    return new RenderClipsStep(
        jobClient,
        new ArtifactFetcher(deps.renderBackend),
        new ManifestStore(deps.layout.manifestPath),
        deps.layout.clipsDir
    );
}

function createNarrationStep(deps: PipelineDependencies): NarrationStep {
    const { config, layout } = deps;
    return new NarrationStep(deps.speechClient, {
        mode: config.narrationMode,
        narrationDir: layout.narrationDir,
        fullNarrationPath: layout.fullNarrationPath,
        referenceVoicePath: config.referenceVoicePath,
        referenceTranscript: config.referenceTranscript,
        seed: config.ttsSeed,
        tailPaddingMs: config.tailPaddingMs,
    });
}

function createAssembleStep(deps: PipelineDependencies): AssembleStep {
    return new AssembleStep(deps.mediaTool, new ManifestStore(deps.layout.manifestPath), {
        layout: deps.layout,
        stretchThresholdSeconds: deps.config.stretchThresholdSeconds,
    });
}

export function createPipeline(command: PipelineCommand, deps: PipelineDependencies): PipelineStep[] {
    const wait = deps.sleep ?? sleep;
    const cooldownMs = deps.config.cooldownMs;

    switch (command) {
        case 'render':
            return [createRenderStep(deps)];
        case 'narrate':
            return [createNarrationStep(deps)];
        case 'assemble':
            return [createAssembleStep(deps)];
        case 'run':
            return [
                // 1. Render + download
                createRenderStep(deps),
                // 2. Let the render model release GPU memory
                new CooldownStep(cooldownMs, 'after render', wait),
                // 3. Narration
                createNarrationStep(deps),
                // 4. Let the speech model release GPU memory
                new CooldownStep(cooldownMs, 'after narration', wait),
                // 5. Sync + mux + concatenate
                createAssembleStep(deps),
            ];
    }
}
