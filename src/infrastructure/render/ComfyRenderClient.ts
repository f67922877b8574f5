import axios from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { OutputLocator } from '../../domain/entities/OutputLocator';
import { isRecord } from '../../domain/guards';
import { IRenderBackendClient, PromptHistoryEntry } from '../../domain/ports/IRenderBackendClient';
import { WorkflowTemplate } from '../../domain/services/WorkflowTemplate';

function toHistoryEntry(raw: unknown): PromptHistoryEntry | null {
    if (!isRecord(raw)) {
        return null;
    }

    const entry: PromptHistoryEntry = {};
    if (isRecord(raw.outputs)) {
        entry.outputs = raw.outputs;
    }
    if (isRecord(raw.status)) {
        const { status_str, completed, exec_info } = raw.status;
        const queueRemaining = isRecord(exec_info) ? exec_info.queue_remaining : undefined;
        entry.status = {
            status_str: typeof status_str === 'string' ? status_str : undefined,
            completed: typeof completed === 'boolean' ? completed : undefined,
            queue_remaining: typeof queueRemaining === 'number' ? queueRemaining : undefined,
        };
    }
    return entry;
}

/**
 * ComfyUI HTTP client.
 *
 * - POST /prompt with `{ prompt, client_id }` queues a job graph
 * - GET /history/{id} returns `{ [id]: entry }` once the job is known
 * - GET /view?filename&subfolder&type streams a produced file
 */
export class ComfyRenderClient implements IRenderBackendClient {
    private readonly serverUrl: string;
    /** Identifies this process to the backend's websocket/progress channel */
    readonly clientId: string;

    constructor(
        serverUrl: string,
        private readonly requestTimeoutMs: number = 30000,
        private readonly downloadTimeoutMs: number = 300000
    ) {
        if (!serverUrl) {
            throw new Error('ComfyUI server URL is required');
        }
        this.serverUrl = serverUrl.replace(/\/$/, '');
        this.clientId = uuidv4();
    }

    async queuePrompt(workflow: WorkflowTemplate): Promise<string | null> {
        try {
            const response = await axios.post(
                `${this.serverUrl}/prompt`,
                { prompt: workflow, client_id: this.clientId },
                {
                    headers: { 'Content-Type': 'application/json' },
                    timeout: this.requestTimeoutMs,
                }
            );

            const data: unknown = response.data;
            if (isRecord(data) && typeof data.prompt_id === 'string' && data.prompt_id) {
                return data.prompt_id;
            }
            console.warn('[ComfyUI] Queue reply carried no prompt_id:', JSON.stringify(data));
            return null;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const detail = error.response?.data ? JSON.stringify(error.response.data) : error.message;
                throw new Error(`ComfyUI queue request failed: ${detail}`);
            }
            throw error;
        }
    }

    async getHistory(promptId: string): Promise<PromptHistoryEntry | null> {
        const response = await axios.get(
            `${this.serverUrl}/history/${encodeURIComponent(promptId)}`,
            { timeout: this.requestTimeoutMs }
        );

        const data: unknown = response.data;
        return isRecord(data) ? toHistoryEntry(data[promptId]) : null;
    }

    async viewFile(locator: OutputLocator): Promise<Buffer> {
        const response = await axios.get<ArrayBuffer>(`${this.serverUrl}/view`, {
            params: {
                filename: locator.filename,
                subfolder: locator.subfolder,
                type: locator.type,
            },
            responseType: 'arraybuffer',
            timeout: this.downloadTimeoutMs,
        });
        return Buffer.from(response.data);
    }
}
