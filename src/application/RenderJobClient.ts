import { ContentItem, clipIdLabel } from '../domain/entities/ContentItem';
import { OutputLocator } from '../domain/entities/OutputLocator';
import { ConfigurationError } from '../domain/errors';
import { IRenderBackendClient, PromptHistoryEntry } from '../domain/ports/IRenderBackendClient';
import { resolveOutputLocator } from '../domain/services/OutputLocatorResolver';
import {
    WorkflowNodeIds,
    WorkflowTemplate,
    buildJobSpec,
    outputPrefixFor,
    randomSeed,
} from '../domain/services/WorkflowTemplate';
import { Sleep, sleep } from './timing';

/** Progress is logged on every Nth poll. */
export const PROGRESS_LOG_INTERVAL = 6;

export type RenderJobOutcome =
    | { status: 'SUCCESS'; promptId: string; locator: OutputLocator }
    | { status: 'NO_OUTPUT' | 'TIMEOUT'; promptId: string; detail: string }
    | { status: 'QUEUE_FAILED' | 'BACKEND_MISCONFIGURED'; detail: string };

/** Transient states reported while a job is in flight. */
export type RenderJobProgress = 'QUEUED' | 'POLLING';

export interface RenderJobClientOptions {
    nodeIds: WorkflowNodeIds;
    defaultVideo: {
        width: number;
        height: number;
        frames: number;
    };
    pollIntervalMs?: number;
    maxPollAttempts?: number;
    sleep?: Sleep;
    seed?: () => number;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Drives one content item through submit → poll → locate on the render backend.
 * Every ending is returned as an outcome; nothing is resubmitted.
 */
export class RenderJobClient {
    private readonly pollIntervalMs: number;
    private readonly maxPollAttempts: number;
    private readonly sleep: Sleep;
    private readonly seed: () => number;

    constructor(
        private readonly backend: IRenderBackendClient,
        private readonly template: WorkflowTemplate,
        private readonly options: RenderJobClientOptions
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? 10000;
        this.maxPollAttempts = options.maxPollAttempts ?? 360;
        this.sleep = options.sleep ?? sleep;
        this.seed = options.seed ?? randomSeed;
    }

    async run(item: ContentItem, onProgress?: (status: RenderJobProgress) => void): Promise<RenderJobOutcome> {
        const label = clipIdLabel(item.id);

        let jobSpec: WorkflowTemplate;
        try {
            jobSpec = buildJobSpec(this.template, this.options.nodeIds, {
                prompt: item.prompt,
                seed: this.seed(),
                frames: item.frames ?? this.options.defaultVideo.frames,
                width: item.width ?? this.options.defaultVideo.width,
                height: item.height ?? this.options.defaultVideo.height,
                outputPrefix: outputPrefixFor(item.id),
            });
        } catch (error) {
            if (error instanceof ConfigurationError) {
                return { status: 'BACKEND_MISCONFIGURED', detail: error.message };
            }
            throw error;
        }

        let promptId: string | null;
        try {
            promptId = await this.backend.queuePrompt(jobSpec);
        } catch (error) {
            console.error(`[Render] Clip ${label}: submission failed: ${errorMessage(error)}`);
            return { status: 'QUEUE_FAILED', detail: errorMessage(error) };
        }
        if (!promptId) {
            return { status: 'QUEUE_FAILED', detail: 'Backend reply carried no prompt_id' };
        }

        console.log(`[Render] Clip ${label}: queued as ${promptId}`);
        onProgress?.('QUEUED');
        onProgress?.('POLLING');

        return this.pollForCompletion(promptId, label);
    }

    private async pollForCompletion(promptId: string, label: string): Promise<RenderJobOutcome> {
        for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
            await this.sleep(this.pollIntervalMs);

            let entry: PromptHistoryEntry | null;
            try {
                entry = await this.backend.getHistory(promptId);
            } catch (error) {
                // The backend is often too busy to answer while rendering
                console.warn(`[Render] Clip ${label}: history request failed (${errorMessage(error)}), retrying`);
                continue;
            }

            // The backend only records history once execution has ended, failed runs included
            if (entry?.outputs) {
                return this.outcomeFromOutputs(promptId, label, entry.outputs, entry.status?.status_str);
            }

            if (attempt % PROGRESS_LOG_INTERVAL === 0) {
                const statusStr = entry?.status?.status_str ?? 'pending';
                const queueRemaining = entry?.status?.queue_remaining ?? 0;
                console.log(
                    `[Render] Clip ${label}: ${statusStr}, queue remaining ${queueRemaining} (poll ${attempt}/${this.maxPollAttempts})`
                );
            }
        }

        const waitedSeconds = (this.maxPollAttempts * this.pollIntervalMs) / 1000;
        console.error(`[Render] Clip ${label}: timed out after ${waitedSeconds}s`);
        return { status: 'TIMEOUT', promptId, detail: `No result after ${this.maxPollAttempts} polls (${waitedSeconds}s)` };
    }

    private outcomeFromOutputs(
        promptId: string,
        label: string,
        outputs: Record<string, unknown>,
        statusStr?: string
    ): RenderJobOutcome {
        const saveNodeId = this.options.nodeIds.save;
        if (!(saveNodeId in outputs)) {
            console.error(`[Render] Clip ${label}: save node ${saveNodeId} missing from outputs: ${JSON.stringify(outputs)}`);
            const backendStatus = statusStr === 'error' ? ' (backend reported an execution error)' : '';
            return { status: 'NO_OUTPUT', promptId, detail: `Save node ${saveNodeId} not in outputs${backendStatus}` };
        }

        const locator = resolveOutputLocator(outputs[saveNodeId]);
        if (!locator) {
            console.error(`[Render] Clip ${label}: no usable file in save node output: ${JSON.stringify(outputs[saveNodeId])}`);
            return { status: 'NO_OUTPUT', promptId, detail: `Save node ${saveNodeId} reported no usable file` };
        }

        console.log(`[Render] Clip ${label}: finished → ${locator.filename}`);
        return { status: 'SUCCESS', promptId, locator };
    }
}
