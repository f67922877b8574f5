import dotenv from 'dotenv';
import path from 'path';
import { DEFAULT_STRETCH_THRESHOLD_SECONDS } from '../domain/services/DurationReconciliationPlanner';
import { WorkflowNodeIds } from '../domain/services/WorkflowTemplate';

// Load environment variables
dotenv.config();

export type NarrationMode = 'per_clip' | 'single';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Render backend
    comfyServerUrl: string;
    workflowFile: string;
    contentFile: string;
    projectDir: string;
    nodeIds: WorkflowNodeIds;
    defaultVideo: {
        width: number;
        height: number;
        frames: number;
    };
    pollIntervalMs: number;
    maxPollAttempts: number;
    cooldownMs: number;

    // Speech synthesis
    ttsServerUrl: string;
    ttsSampleRate: number;
    ttsTimeoutMs: number;
    referenceVoicePath?: string;
    referenceTranscript: string;
    ttsSeed: number;
    tailPaddingMs: number;
    narrationMode: NarrationMode;

    // Sync
    stretchThresholdSeconds: number;

    // Media tool
    ffmpegPath?: string;
    ffprobePath?: string;
    videoCodec: string;
    audioCodec: string;
}

/**
 * Where each stage reads and writes inside the project directory.
 */
export interface ProjectLayout {
    clipsDir: string;
    narrationDir: string;
    mergedDir: string;
    manifestPath: string;
    concatListPath: string;
    fullNarrationPath: string;
    silentConcatPath: string;
    finalVideoPath: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value === '' ? undefined : value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getNarrationMode(): NarrationMode {
    const value = getEnvVar('NARRATION_MODE', 'per_clip').toLowerCase();
    if (value !== 'per_clip' && value !== 'single') {
        throw new Error(`NARRATION_MODE must be "per_clip" or "single", got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const projectDir = path.resolve(getEnvVar('PROJECT_DIR', process.cwd()));

    return {
        // Render backend
        comfyServerUrl: getEnvVar('COMFYUI_SERVER_URL', 'http://127.0.0.1:8188').replace(/\/+$/, ''),
        workflowFile: path.resolve(projectDir, getEnvVar('WORKFLOW_FILE', 'wan2.1_t2v_workflow.json')),
        contentFile: path.resolve(projectDir, getEnvVar('CONTENT_FILE', 'pregenerated_content.json')),
        projectDir,
        nodeIds: {
            prompt: getEnvVar('PROMPT_NODE_ID', '6'),
            sampler: getEnvVar('SAMPLER_NODE_ID', '3'),
            latent: getEnvVar('LATENT_NODE_ID', '40'),
            save: getEnvVar('SAVE_NODE_ID', '52'),
        },
        defaultVideo: {
            width: getEnvVarNumber('DEFAULT_VIDEO_WIDTH', 832),
            height: getEnvVarNumber('DEFAULT_VIDEO_HEIGHT', 480),
            frames: getEnvVarNumber('DEFAULT_VIDEO_FRAMES', 65),
        },
        pollIntervalMs: getEnvVarNumber('POLL_INTERVAL_MS', 10000),
        maxPollAttempts: getEnvVarNumber('MAX_POLL_ATTEMPTS', 360),
        cooldownMs: getEnvVarNumber('COOLDOWN_MS', 30000),

        // Speech synthesis
        ttsServerUrl: getEnvVar('TTS_SERVER_URL', 'http://127.0.0.1:8003').replace(/\/+$/, ''),
        ttsSampleRate: getEnvVarNumber('TTS_SAMPLE_RATE', 24000),
        ttsTimeoutMs: getEnvVarNumber('TTS_TIMEOUT_MS', 600000),
        referenceVoicePath: getOptionalEnvVar('REFERENCE_VOICE_PATH'),
        referenceTranscript: getEnvVar('REFERENCE_TRANSCRIPT', ''),
        ttsSeed: getEnvVarNumber('TTS_SEED', 42),
        tailPaddingMs: getEnvVarNumber('TAIL_PADDING_MS', 300),
        narrationMode: getNarrationMode(),

        // Sync
        stretchThresholdSeconds: getEnvVarNumber('STRETCH_THRESHOLD_SECONDS', DEFAULT_STRETCH_THRESHOLD_SECONDS),

        // Media tool
        ffmpegPath: getOptionalEnvVar('FFMPEG_PATH'),
        ffprobePath: getOptionalEnvVar('FFPROBE_PATH'),
        videoCodec: getEnvVar('VIDEO_CODEC', 'libx264'),
        audioCodec: getEnvVar('AUDIO_CODEC', 'aac'),
    };
}

export function resolveProjectLayout(projectDir: string): ProjectLayout {
    const logsDir = path.join(projectDir, 'logs_and_manifests');
    const videoDir = path.join(projectDir, 'video_outputs');
    const soundDir = path.join(projectDir, 'sound_outputs');

    return {
        clipsDir: path.join(videoDir, 'mp4_clips'),
        narrationDir: path.join(soundDir, 'individual_narrations'),
        mergedDir: path.join(videoDir, 'merged_clips'),
        manifestPath: path.join(logsDir, '_generated_clips_manifest.json'),
        concatListPath: path.join(logsDir, 'ffmpeg_filelist.txt'),
        fullNarrationPath: path.join(soundDir, 'full_narration.wav'),
        silentConcatPath: path.join(videoDir, 'concatenated_video_no_audio.mp4'),
        finalVideoPath: path.join(projectDir, 'final_video_output', 'final_narrative_video.mp4'),
    };
}

function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

/**
 * Checks value ranges that the environment parsers cannot.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    for (const [name, value] of Object.entries(config.defaultVideo)) {
        if (!isPositiveInteger(value)) {
            errors.push(`DEFAULT_VIDEO_${name.toUpperCase()} must be a positive integer`);
        }
    }
    if (!isPositiveInteger(config.maxPollAttempts)) {
        errors.push('MAX_POLL_ATTEMPTS must be a positive integer');
    }
    if (config.pollIntervalMs < 0) {
        errors.push('POLL_INTERVAL_MS must not be negative');
    }
    if (config.cooldownMs < 0) {
        errors.push('COOLDOWN_MS must not be negative');
    }
    if (!isPositiveInteger(config.ttsSampleRate)) {
        errors.push('TTS_SAMPLE_RATE must be a positive integer');
    }
    if (config.tailPaddingMs < 0) {
        errors.push('TAIL_PADDING_MS must not be negative');
    }
    if (config.stretchThresholdSeconds < 0) {
        errors.push('STRETCH_THRESHOLD_SECONDS must not be negative');
    }
    if (config.referenceVoicePath && !config.referenceTranscript) {
        errors.push('REFERENCE_TRANSCRIPT is required when REFERENCE_VOICE_PATH is set');
    }

    const nodeIds = Object.values(config.nodeIds);
    if (new Set(nodeIds).size !== nodeIds.length) {
        errors.push('PROMPT/SAMPLER/LATENT/SAVE node ids must be distinct');
    }

    return errors;
}
