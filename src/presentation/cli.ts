import fs from 'fs';
import { Config, ProjectLayout, resolveProjectLayout } from '../config';
import { discoverNarrationFiles, loadContentItems, loadWorkflowTemplate } from '../application/InputLoader';
import {
    PIPELINE_COMMANDS,
    PipelineCommand,
    PipelineContext,
    createPipeline,
    createPipelineContext,
    executePipeline,
} from '../application/pipelines';
import { completedClips } from '../domain/entities/ClipManifest';
import { ConfigurationError, EmptyResultError, ToolFailure } from '../domain/errors';

// Infrastructure imports
import { ComfyRenderClient } from '../infrastructure/render/ComfyRenderClient';
import { DiaTTSClient } from '../infrastructure/tts/DiaTTSClient';
import { FFmpegMediaTool } from '../infrastructure/video/FFmpegMediaTool';

export const USAGE = `Usage: narrated-clip-pipeline [${PIPELINE_COMMANDS.join('|')}]`;

export function parseCommand(args: readonly string[]): PipelineCommand {
    const [command = 'run', ...rest] = args;
    if (rest.length > 0) {
        throw new ConfigurationError(`Unexpected arguments: ${rest.join(' ')}\n${USAGE}`);
    }
    const match = PIPELINE_COMMANDS.find((candidate) => candidate === command);
    if (!match) {
        throw new ConfigurationError(`Unknown command "${command}"\n${USAGE}`);
    }
    return match;
}

/**
 * Narration left on disk by an earlier `narrate` run.
 */
async function previousNarration(config: Config, layout: ProjectLayout): Promise<Partial<PipelineContext>> {
    if (config.narrationMode === 'single') {
        return fs.existsSync(layout.fullNarrationPath) ? { fullNarrationPath: layout.fullNarrationPath } : {};
    }
    return { narrationPaths: await discoverNarrationFiles(layout.narrationDir) };
}

/**
 * One log line per finished stage with what it left for the next one.
 */
export async function logStageSummary(step: string, context: PipelineContext): Promise<void> {
    const parts: string[] = [];
    if (context.manifest.length > 0) {
        parts.push(`${completedClips(context.manifest).length}/${context.manifest.length} clips rendered`);
    }
    if (context.fullNarrationPath) {
        parts.push('full narration ready');
    } else if (context.narrationPaths.length > 0) {
        parts.push(`${context.narrationPaths.length} narrations`);
    }
    if (context.narrationFailure) {
        parts.push('narration dropped');
    }
    if (context.finalVideoPath) {
        parts.push(`final video ${context.finalVideoPath}`);
    }
    console.log(`[Pipeline] ${step} done${parts.length > 0 ? `: ${parts.join(', ')}` : ''}`);
}

/**
 * Wires the adapters from configuration and runs the stages of one command.
 */
export async function runCommand(command: PipelineCommand, config: Config): Promise<PipelineContext> {
    const layout = resolveProjectLayout(config.projectDir);

    const renderBackend = new ComfyRenderClient(config.comfyServerUrl);
    const speechClient = new DiaTTSClient(config.ttsServerUrl, config.ttsSampleRate, config.ttsTimeoutMs);
    const mediaTool = new FFmpegMediaTool({
        ffmpegPath: config.ffmpegPath,
        ffprobePath: config.ffprobePath,
        videoCodec: config.videoCodec,
        audioCodec: config.audioCodec,
    });

    // Everything is loaded and validated before the first submission
    const items = command === 'assemble' ? [] : await loadContentItems(config.contentFile);
    const template = command === 'run' || command === 'render'
        ? await loadWorkflowTemplate(config.workflowFile, config.nodeIds)
        : undefined;
    const initial = command === 'assemble' ? await previousNarration(config, layout) : {};

    const steps = createPipeline(command, { config, layout, renderBackend, speechClient, mediaTool, template });
    return executePipeline(createPipelineContext(items, initial), steps, logStageSummary);
}

/**
 * Logs a failed run and returns the process exit code.
 * An empty result is reported, not treated as a crash.
 */
export function reportFailure(error: unknown): number {
    if (error instanceof EmptyResultError) {
        console.warn(`⚠️ Nothing to assemble: ${error.message}`);
        return 0;
    }
    if (error instanceof ConfigurationError) {
        console.error(`❌ Configuration error: ${error.message}`);
        return 1;
    }
    if (error instanceof ToolFailure) {
        console.error(`❌ ${error.message}`);
        if (error.diagnostics) {
            console.error(error.diagnostics);
        }
        return 1;
    }
    console.error('💥 Fatal error:', error);
    return 1;
}
