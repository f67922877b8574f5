import { OutputLocator } from './OutputLocator';

/**
 * Lifecycle of one render job.
 * SUBMITTED → QUEUED → POLLING → terminal. Everything except the first
 * three states is terminal.
 */
export type ClipJobStatus =
    | 'SUBMITTED'
    | 'QUEUED'
    | 'POLLING'
    | 'SUCCESS'
    | 'NO_OUTPUT'
    | 'TIMEOUT'
    | 'QUEUE_FAILED'
    | 'BACKEND_MISCONFIGURED'
    | 'DOWNLOAD_FAILED'
    | 'SKIPPED_NO_PROMPT';

export type ClipJobActiveStatus = 'SUBMITTED' | 'QUEUED' | 'POLLING';

export type ClipJobFailureStatus = Exclude<ClipJobStatus, ClipJobActiveStatus | 'SUCCESS'>;

export const CLIP_JOB_STATUSES: readonly ClipJobStatus[] = [
    'SUBMITTED',
    'QUEUED',
    'POLLING',
    'SUCCESS',
    'NO_OUTPUT',
    'TIMEOUT',
    'QUEUE_FAILED',
    'BACKEND_MISCONFIGURED',
    'DOWNLOAD_FAILED',
    'SKIPPED_NO_PROMPT',
];

interface ClipJobBase {
    readonly id: number;
    /** Position in the input list; final assembly is ordered by this */
    readonly order: number;
    readonly outputLocator?: OutputLocator;
}

export interface ActiveClipJob extends ClipJobBase {
    readonly status: ClipJobActiveStatus;
}

export interface CompletedClipJob extends ClipJobBase {
    readonly status: 'SUCCESS';
    readonly outputLocator: OutputLocator;
    /** Where the downloaded artifact lives. Only completed jobs have one. */
    readonly localPath: string;
}

export interface FailedClipJob extends ClipJobBase {
    readonly status: ClipJobFailureStatus;
}

export type ClipJob = ActiveClipJob | CompletedClipJob | FailedClipJob;

export function isClipJobStatus(value: unknown): value is ClipJobStatus {
    return CLIP_JOB_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: ClipJobStatus): boolean {
    return status !== 'SUBMITTED' && status !== 'QUEUED' && status !== 'POLLING';
}

export function isCompleted(job: ClipJob): job is CompletedClipJob {
    return job.status === 'SUCCESS';
}

export function createClipJob(id: number, order: number): ActiveClipJob {
    if (!Number.isInteger(order) || order < 0) {
        throw new Error('ClipJob order must be a non-negative integer');
    }
    return { id, order, status: 'SUBMITTED' };
}

export function updateClipJobStatus(job: ClipJob, status: ClipJobActiveStatus): ActiveClipJob {
    if (isTerminalStatus(job.status)) {
        throw new Error(`ClipJob ${job.id} is already terminal (${job.status})`);
    }
    return { id: job.id, order: job.order, outputLocator: job.outputLocator, status };
}

export function completeClipJob(job: ClipJob, outputLocator: OutputLocator, localPath: string): CompletedClipJob {
    if (!localPath.trim()) {
        throw new Error('Completed ClipJob requires a localPath');
    }
    return { id: job.id, order: job.order, status: 'SUCCESS', outputLocator, localPath };
}

/**
 * Moves a job to a failure state. Any local path is dropped so the
 * "localPath iff SUCCESS" invariant holds.
 */
export function failClipJob(job: ClipJob, status: ClipJobFailureStatus, outputLocator?: OutputLocator): FailedClipJob {
    return {
        id: job.id,
        order: job.order,
        status,
        outputLocator: outputLocator ?? job.outputLocator,
    };
}
