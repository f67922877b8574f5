import { ClipJobFailureStatus } from './entities/ClipJob';

/**
 * Base class for every failure the pipeline reports on purpose.
 */
export class PipelineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PipelineError';
    }
}

/**
 * Missing input file, malformed job template or content, unknown backend node.
 * Aborts the run before (or instead of) any further job submission.
 */
export class ConfigurationError extends PipelineError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * A single render job ended in a terminal failure state.
 */
export class JobFailure extends PipelineError {
    constructor(
        public readonly itemId: number,
        public readonly status: ClipJobFailureStatus,
        message: string
    ) {
        super(message);
        this.name = 'JobFailure';
    }
}

/**
 * Artifact download failed or wrote zero bytes.
 */
export class TransferFailure extends PipelineError {
    constructor(
        public readonly itemId: number,
        message: string
    ) {
        super(message);
        this.name = 'TransferFailure';
    }
}

/**
 * The speech backend could not produce narration for the run.
 */
export class SynthesisFailure extends PipelineError {
    constructor(message: string) {
        super(message);
        this.name = 'SynthesisFailure';
    }
}

/**
 * The media tool exited non-zero. `diagnostics` holds its captured stderr.
 */
export class ToolFailure extends PipelineError {
    constructor(
        public readonly operation: string,
        message: string,
        public readonly diagnostics: string = ''
    ) {
        super(`${operation} failed: ${message}`);
        this.name = 'ToolFailure';
    }
}

/**
 * Nothing left to assemble (no successful clips, or no narration/video pairs).
 */
export class EmptyResultError extends PipelineError {
    constructor(message: string) {
        super(message);
        this.name = 'EmptyResultError';
    }
}
