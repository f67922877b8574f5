import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { ToolFailure } from '../../domain/errors';
import { IMediaTool, MuxRequest } from '../../domain/ports/IMediaTool';

export interface FFmpegMediaToolOptions {
    ffmpegPath?: string;
    ffprobePath?: string;
    videoCodec?: string;
    audioCodec?: string;
}

/**
 * Line for the concat demuxer's list file. Single quotes inside the path
 * are closed, escaped and reopened.
 */
export function concatListEntry(filePath: string): string {
    return `file '${path.resolve(filePath).replace(/'/g, "'\\''")}'`;
}

/**
 * Probes, aligns and joins clips locally using FFmpeg.
 * Requires 'ffmpeg' and 'ffprobe' to be installed in the system.
 */
export class FFmpegMediaTool implements IMediaTool {
    private readonly videoCodec: string;
    private readonly audioCodec: string;

    constructor(private readonly options: FFmpegMediaToolOptions = {}) {
        this.videoCodec = options.videoCodec ?? 'libx264';
        this.audioCodec = options.audioCodec ?? 'aac';
    }

    private command(input?: string): ffmpeg.FfmpegCommand {
        const cmd = input ? ffmpeg(input) : ffmpeg();
        if (this.options.ffmpegPath) {
            cmd.setFfmpegPath(this.options.ffmpegPath);
        }
        if (this.options.ffprobePath) {
            cmd.setFfprobePath(this.options.ffprobePath);
        }
        return cmd;
    }

    probeDuration(filePath: string): Promise<number> {
        return new Promise((resolve, reject) => {
            this.command(filePath).ffprobe((err: unknown, data: ffmpeg.FfprobeData) => {
                if (err) {
                    const message = err instanceof Error ? err.message : String(err);
                    return reject(new ToolFailure('probeDuration', `${filePath}: ${message}`));
                }

                const duration = Number(data.format.duration);
                if (!Number.isFinite(duration) || duration <= 0) {
                    return reject(new ToolFailure('probeDuration', `${filePath}: no usable duration reported`));
                }
                resolve(duration);
            });
        });
    }

    async alignAndMux(request: MuxRequest): Promise<string> {
        await fs.promises.mkdir(path.dirname(request.outputPath), { recursive: true });

        return new Promise((resolve, reject) => {
            this.command()
                .input(request.videoPath)
                .input(request.audioPath)
                .complexFilter([`[0:v]${request.videoFilter}[v]`], 'v')
                .outputOptions([
                    '-map 1:a',
                    `-c:v ${this.videoCodec}`,
                    `-c:a ${this.audioCodec}`,
                    '-shortest',
                ])
                .on('end', () => resolve(request.outputPath))
                .on('error', (err: Error, _stdout: string | null, stderr: string | null) =>
                    reject(new ToolFailure('alignAndMux', err.message, stderr ?? '')))
                .save(request.outputPath);
        });
    }

    async concatenate(inputPaths: readonly string[], outputPath: string, listFilePath: string): Promise<string> {
        if (inputPaths.length === 0) {
            throw new ToolFailure('concatenate', 'no input clips');
        }

        await fs.promises.mkdir(path.dirname(listFilePath), { recursive: true });
        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        await fs.promises.writeFile(listFilePath, inputPaths.map(concatListEntry).join('\n') + '\n', 'utf-8');

        return new Promise((resolve, reject) => {
            this.command(listFilePath)
                .inputOptions(['-f concat', '-safe 0'])
                .outputOptions(['-c copy'])
                .on('end', () => resolve(outputPath))
                .on('error', (err: Error, _stdout: string | null, stderr: string | null) =>
                    reject(new ToolFailure('concatenate', err.message, stderr ?? '')))
                .save(outputPath);
        });
    }
}
