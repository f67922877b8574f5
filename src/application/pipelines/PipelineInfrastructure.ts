/**
 * Pipeline infrastructure for the fixed stage sequence of a run.
 * Each step has a single responsibility.
 */

import { ContentItem } from '../../domain/entities/ContentItem';
import { ClipManifest } from '../../domain/entities/ClipManifest';
import { SynthesisFailure } from '../../domain/errors';

/**
 * PipelineContext carries all state through the pipeline.
 * Immutable pattern: each step returns a new context.
 */
export interface PipelineContext {
    readonly items: readonly ContentItem[];

    // Render
    readonly manifest: ClipManifest;

    // Narration
    readonly narrationPaths: readonly string[];
    readonly fullNarrationPath?: string;
    /** Set when narration was dropped; assembly then runs silent */
    readonly narrationFailure?: SynthesisFailure;

    // Final
    readonly finalVideoPath?: string;
}

/**
 * Pipeline step interface.
 * Each step has exactly one responsibility.
 */
export interface PipelineStep {
    readonly name: string;
    execute(context: PipelineContext): Promise<PipelineContext>;
    shouldSkip?(context: PipelineContext): boolean;
}

export function createPipelineContext(
    items: readonly ContentItem[],
    initial: Partial<Omit<PipelineContext, 'items'>> = {}
): PipelineContext {
    return {
        items,
        manifest: [],
        narrationPaths: [],
        ...initial,
    };
}

/**
 * Executes a pipeline of steps sequentially.
 */
export async function executePipeline(
    context: PipelineContext,
    steps: PipelineStep[],
    onStepComplete?: (step: string, context: PipelineContext) => Promise<void>
): Promise<PipelineContext> {
    let currentContext = context;

    for (const step of steps) {
        if (step.shouldSkip?.(currentContext)) {
            console.log(`[Pipeline] Skipping ${step.name}`);
            continue;
        }

        console.log(`[Pipeline] Executing ${step.name}...`);
        currentContext = await step.execute(currentContext);

        if (onStepComplete) {
            await onStepComplete(step.name, currentContext);
        }
    }

    return currentContext;
}
