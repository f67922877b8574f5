/**
 * Inputs of a single align-and-mux pass.
 */
export interface MuxRequest {
    videoPath: string;
    audioPath: string;
    /** Filter applied to the first input's video stream ('null' for passthrough) */
    videoFilter: string;
    outputPath: string;
}

/**
 * IMediaTool - Port for probing, aligning and joining media files.
 * Implementations: FFmpegMediaTool
 */
export interface IMediaTool {
    /**
     * Container duration in seconds.
     */
    probeDuration(filePath: string): Promise<number>;

    /**
     * Applies the video filter, maps the narration as the only audio track
     * and cuts to the shorter stream.
     */
    alignAndMux(request: MuxRequest): Promise<string>;

    /**
     * Joins clips in the given order without re-encoding.
     * @param listFilePath Where the concat list is written
     */
    concatenate(inputPaths: readonly string[], outputPath: string, listFilePath: string): Promise<string>;
}
