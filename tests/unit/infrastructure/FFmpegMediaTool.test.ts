import fs from 'fs';
import os from 'os';
import path from 'path';

type Handler = (...args: unknown[]) => void;
const handlers: Record<string, Handler> = {};

// Mock fluent-ffmpeg BEFORE importing FFmpegMediaTool
const mockCommand = {
    input: jest.fn().mockReturnThis(),
    inputOptions: jest.fn().mockReturnThis(),
    complexFilter: jest.fn().mockReturnThis(),
    outputOptions: jest.fn().mockReturnThis(),
    setFfmpegPath: jest.fn().mockReturnThis(),
    setFfprobePath: jest.fn().mockReturnThis(),
    on: jest.fn(),
    save: jest.fn(),
    ffprobe: jest.fn(),
};

jest.mock('fluent-ffmpeg', () => jest.fn(() => mockCommand));

import ffmpeg from 'fluent-ffmpeg';
import { FFmpegMediaTool, concatListEntry } from '../../../src/infrastructure/video/FFmpegMediaTool';
import { ToolFailure } from '../../../src/domain/errors';

function finishWith(event: 'end' | 'error', ...args: unknown[]): void {
    mockCommand.save.mockImplementation(() => {
        setImmediate(() => handlers[event](...args));
        return mockCommand;
    });
}

describe('FFmpegMediaTool', () => {
    let workDir: string;

    beforeEach(() => {
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-tool-'));
        mockCommand.on.mockImplementation((event: string, handler: Handler) => {
            handlers[event] = handler;
            return mockCommand;
        });
        finishWith('end');
    });

    afterEach(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
    });

    describe('probeDuration', () => {
        test('should return the container duration', async () => {
            mockCommand.ffprobe.mockImplementation((callback: Handler) => callback(null, { format: { duration: 5.25 } }));

            await expect(new FFmpegMediaTool().probeDuration('/clips/a.mp4')).resolves.toBe(5.25);
            expect(ffmpeg).toHaveBeenCalledWith('/clips/a.mp4');
        });

        test('should fail when ffprobe reports no duration', async () => {
            mockCommand.ffprobe.mockImplementation((callback: Handler) => callback(null, { format: {} }));

            await expect(new FFmpegMediaTool().probeDuration('/clips/a.mp4')).rejects.toThrow(
                'probeDuration failed: /clips/a.mp4: no usable duration reported'
            );
        });

        test('should wrap ffprobe errors', async () => {
            mockCommand.ffprobe.mockImplementation((callback: Handler) => callback(new Error('ffprobe not found'), undefined));

            await expect(new FFmpegMediaTool().probeDuration('/clips/a.mp4')).rejects.toThrow(ToolFailure);
        });

        test('should apply configured binary paths', async () => {
            mockCommand.ffprobe.mockImplementation((callback: Handler) => callback(null, { format: { duration: 1 } }));

            await new FFmpegMediaTool({ ffmpegPath: '/opt/ffmpeg', ffprobePath: '/opt/ffprobe' }).probeDuration('/a.wav');

            expect(mockCommand.setFfmpegPath).toHaveBeenCalledWith('/opt/ffmpeg');
            expect(mockCommand.setFfprobePath).toHaveBeenCalledWith('/opt/ffprobe');
        });
    });

    describe('alignAndMux', () => {
        test('should filter the video stream, map the narration and cut to the shorter stream', async () => {
            const outputPath = path.join(workDir, 'merged', 'merged_0001.mp4');

            const result = await new FFmpegMediaTool().alignAndMux({
                videoPath: '/clips/a.mp4',
                audioPath: '/narration/a.wav',
                videoFilter: 'setpts=1.4*PTS',
                outputPath,
            });

            expect(result).toBe(outputPath);
            expect(fs.existsSync(path.dirname(outputPath))).toBe(true);
            expect(mockCommand.input).toHaveBeenNthCalledWith(1, '/clips/a.mp4');
            expect(mockCommand.input).toHaveBeenNthCalledWith(2, '/narration/a.wav');
            expect(mockCommand.complexFilter).toHaveBeenCalledWith(['[0:v]setpts=1.4*PTS[v]'], 'v');
            expect(mockCommand.outputOptions).toHaveBeenCalledWith(['-map 1:a', '-c:v libx264', '-c:a aac', '-shortest']);
            expect(mockCommand.save).toHaveBeenCalledWith(outputPath);
        });

        test('should use configured codecs', async () => {
            await new FFmpegMediaTool({ videoCodec: 'h264_nvenc', audioCodec: 'libopus' }).alignAndMux({
                videoPath: '/clips/a.mp4',
                audioPath: '/narration/a.wav',
                videoFilter: 'null',
                outputPath: path.join(workDir, 'out.mp4'),
            });

            expect(mockCommand.outputOptions).toHaveBeenCalledWith(['-map 1:a', '-c:v h264_nvenc', '-c:a libopus', '-shortest']);
        });

        test('should reject with the captured stderr when ffmpeg fails', async () => {
            finishWith('error', new Error('ffmpeg exited with code 1'), '', 'Invalid data found when processing input');

            const failure = new FFmpegMediaTool().alignAndMux({
                videoPath: '/clips/a.mp4',
                audioPath: '/narration/a.wav',
                videoFilter: 'null',
                outputPath: path.join(workDir, 'out.mp4'),
            });

            await expect(failure).rejects.toMatchObject({
                name: 'ToolFailure',
                operation: 'alignAndMux',
                message: 'alignAndMux failed: ffmpeg exited with code 1',
                diagnostics: 'Invalid data found when processing input',
            });
        });
    });

    describe('concatenate', () => {
        test('should write an escaped list file and join without re-encoding', async () => {
            const listFile = path.join(workDir, 'logs', 'list.txt');
            const outputPath = path.join(workDir, 'final', 'final.mp4');
            const clips = [path.join(workDir, 'a.mp4'), path.join(workDir, "it's.mp4")];

            await expect(new FFmpegMediaTool().concatenate(clips, outputPath, listFile)).resolves.toBe(outputPath);

            expect(fs.readFileSync(listFile, 'utf-8')).toBe(
                `file '${clips[0]}'\nfile '${path.join(workDir, "it'\\''s.mp4")}'\n`
            );
            expect(ffmpeg).toHaveBeenCalledWith(listFile);
            expect(mockCommand.inputOptions).toHaveBeenCalledWith(['-f concat', '-safe 0']);
            expect(mockCommand.outputOptions).toHaveBeenCalledWith(['-c copy']);
            expect(mockCommand.save).toHaveBeenCalledWith(outputPath);
        });

        test('should refuse an empty clip list', async () => {
            await expect(new FFmpegMediaTool().concatenate([], '/out.mp4', '/list.txt')).rejects.toThrow(
                'concatenate failed: no input clips'
            );
        });
    });

    test('concatListEntry resolves relative paths', () => {
        expect(concatListEntry('clip.mp4')).toBe(`file '${path.resolve('clip.mp4')}'`);
    });
});
