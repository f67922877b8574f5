import axios from 'axios';
import { ISpeechClient, SpeechOptions, SpeechResult } from '../../domain/ports/ISpeechClient';
import { SynthesisFailure } from '../../domain/errors';
import { readWavInfo } from '../audio/wav';

/**
 * Builds the text the model sees. When cloning, the reference transcript
 * goes first so the model continues in that voice; every line ends with a
 * newline so the end of speech is explicit.
 */
export function buildSpeechPrompt(text: string, referenceTranscript?: string): string {
    const line = text.trimEnd();
    return referenceTranscript ? `${referenceTranscript.trim()}\n${line}\n` : `${line}\n`;
}

function describeErrorBody(body: unknown): string | undefined {
    if (body instanceof ArrayBuffer) {
        return Buffer.from(body).toString('utf-8');
    }
    if (Buffer.isBuffer(body)) {
        return body.toString('utf-8');
    }
    return typeof body === 'string' && body ? body : undefined;
}

/**
 * Speech client for a locally running Dia inference server.
 *
 * POST /generate with `{ text, audio_prompt, seed }` and receives WAV bytes.
 * `audio_prompt` is a path on the same machine, so the server must share
 * the filesystem with the pipeline.
 */
export class DiaTTSClient implements ISpeechClient {
    private readonly serverUrl: string;

    /**
     * @param serverUrl URL of the inference server (e.g., http://127.0.0.1:8003)
     * @param fallbackSampleRate Used when the returned WAV header cannot be read
     * @param timeoutMs Synthesis on a cold model can take minutes
     */
    constructor(
        serverUrl: string,
        private readonly fallbackSampleRate: number = 24000,
        private readonly timeoutMs: number = 600000
    ) {
        if (!serverUrl) {
            throw new Error('TTS server URL is required');
        }
        this.serverUrl = serverUrl.replace(/\/$/, '');
    }

    async synthesize(text: string, options: SpeechOptions = {}): Promise<SpeechResult> {
        if (!text || !text.trim()) {
            throw new SynthesisFailure('Text is required for speech synthesis');
        }

        const prompt = buildSpeechPrompt(
            text,
            options.referenceAudioPath ? options.referenceTranscript : undefined
        );

        try {
            console.log(`[TTS] Synthesizing ${text.length} chars${options.referenceAudioPath ? ' (cloned voice)' : ''}`);

            const response = await axios.post<ArrayBuffer>(
                `${this.serverUrl}/generate`,
                {
                    text: prompt,
                    audio_prompt: options.referenceAudioPath ?? null,
                    seed: options.seed ?? null,
                },
                {
                    headers: { 'Content-Type': 'application/json' },
                    responseType: 'arraybuffer',
                    timeout: this.timeoutMs,
                }
            );

            const audio = Buffer.from(response.data);
            if (audio.length === 0) {
                throw new SynthesisFailure('Speech server returned no audio');
            }

            return { audio, sampleRate: this.sampleRateOf(audio) };
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new SynthesisFailure(`Speech synthesis failed: ${describeErrorBody(error.response?.data) ?? error.message}`);
            }
            throw error;
        }
    }

    private sampleRateOf(audio: Buffer): number {
        try {
            return readWavInfo(audio).sampleRate;
        } catch (error) {
            console.warn(`[TTS] Could not read WAV header, assuming ${this.fallbackSampleRate} Hz: ${error instanceof Error ? error.message : String(error)}`);
            return this.fallbackSampleRate;
        }
    }

    /**
     * Checks if the inference server is available.
     */
    async healthCheck(): Promise<boolean> {
        try {
            const response = await axios.get(`${this.serverUrl}/`, { timeout: 5000 });
            return response.status === 200;
        } catch {
            return false;
        }
    }
}
