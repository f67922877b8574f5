/**
 * SpeechOptions for a single synthesis call.
 */
export interface SpeechOptions {
    /** WAV file whose voice should be cloned */
    referenceAudioPath?: string;
    /** What is said in the reference audio; prepended to the prompt when cloning */
    referenceTranscript?: string;
    /** Fixed seed for reproducible voices */
    seed?: number;
}

/**
 * SpeechResult carries the synthesized WAV bytes.
 */
export interface SpeechResult {
    audio: Buffer;
    sampleRate: number;
}

/**
 * ISpeechClient - Port for narration synthesis.
 * Implementations: DiaTTSClient
 */
export interface ISpeechClient {
    synthesize(text: string, options?: SpeechOptions): Promise<SpeechResult>;

    /**
     * True when the inference server answers.
     */
    healthCheck(): Promise<boolean>;
}
