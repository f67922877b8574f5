import { OutputLocator } from '../entities/OutputLocator';
import { WorkflowTemplate } from '../services/WorkflowTemplate';

/**
 * History entry of a finished (or running) job.
 * `outputs` is keyed by node id; each payload's shape depends on the node.
 */
export interface PromptHistoryEntry {
    outputs?: Record<string, unknown>;
    status?: {
        status_str?: string;
        completed?: boolean;
        /** Flattened from the backend's `status.exec_info.queue_remaining` */
        queue_remaining?: number;
    };
}

/**
 * IRenderBackendClient - Port for the asynchronous render job queue.
 * Implementations: ComfyRenderClient
 */
export interface IRenderBackendClient {
    /**
     * Submits a job graph.
     * @returns The backend prompt id, or null when the reply carried none
     */
    queuePrompt(workflow: WorkflowTemplate): Promise<string | null>;

    /**
     * Fetches the history entry of a job. Null while the job is not recorded yet.
     */
    getHistory(promptId: string): Promise<PromptHistoryEntry | null>;

    /**
     * Downloads the bytes of a produced file.
     */
    viewFile(locator: OutputLocator): Promise<Buffer>;
}
