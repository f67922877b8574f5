import fs from 'fs';
import os from 'os';
import path from 'path';
import { AssembleStep } from '../../../src/application/pipelines/steps/AssembleStep';
import { createPipelineContext } from '../../../src/application/pipelines/PipelineInfrastructure';
import { ManifestStore } from '../../../src/application/ManifestStore';
import { ProjectLayout, resolveProjectLayout } from '../../../src/config';
import { ClipJob, completeClipJob, createClipJob, failClipJob } from '../../../src/domain/entities/ClipJob';
import { EmptyResultError } from '../../../src/domain/errors';
import { FakeMediaTool } from '../helpers/fakes';

describe('AssembleStep', () => {
    let workDir: string;
    let layout: ProjectLayout;
    let store: ManifestStore;
    let media: FakeMediaTool;

    function clipPath(id: string): string {
        return path.join(layout.clipsDir, `narrativegen_clip_${id}__00001_.mp4`);
    }

    function narrationPath(id: string): string {
        return path.join(layout.narrationDir, `clip_${id}_narration.wav`);
    }

    function completed(id: number, order: number): ClipJob {
        const label = String(id).padStart(4, '0');
        const localPath = clipPath(label);
        fs.writeFileSync(localPath, 'video');
        return completeClipJob(createClipJob(id, order), { filename: path.basename(localPath), subfolder: '', type: 'output' }, localPath);
    }

    function createStep(): AssembleStep {
        return new AssembleStep(media, store, { layout, stretchThresholdSeconds: 4 });
    }

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'assemble-'));
        layout = resolveProjectLayout(workDir);
        fs.mkdirSync(layout.clipsDir, { recursive: true });
        store = new ManifestStore(layout.manifestPath);
        media = new FakeMediaTool();
    });

    afterEach(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    test('aligns each narrated clip and concatenates them in input order', async () => {
        // Rendered out of order: item 3 finished first but sits last in the input
        await store.save([completed(3, 2), completed(1, 0), completed(2, 1)]);
        for (const [id, audio, video] of [['0001', 7, 5], ['0002', 12, 5], ['0003', 4, 6]] as const) {
            media.durations.set(narrationPath(id), audio);
            media.durations.set(clipPath(id), video);
        }

        const context = await createStep().execute(createPipelineContext([], {
            narrationPaths: [narrationPath('0003'), narrationPath('0001'), narrationPath('0002')],
        }));

        expect(media.muxRequests.map((request) => request.videoFilter)).toEqual([
            `setpts=${7 / 5}*PTS`,
            'tpad=stop_mode=clone:stop_duration=7',
            'null',
        ]);
        expect(media.muxRequests[0]).toEqual({
            videoPath: clipPath('0001'),
            audioPath: narrationPath('0001'),
            videoFilter: `setpts=${7 / 5}*PTS`,
            outputPath: path.join(layout.mergedDir, 'merged_0001.mp4'),
        });
        expect(media.concatCalls).toEqual([{
            inputPaths: ['0001', '0002', '0003'].map((id) => path.join(layout.mergedDir, `merged_${id}.mp4`)),
            outputPath: layout.finalVideoPath,
            listFilePath: layout.concatListPath,
        }]);
        expect(context.finalVideoPath).toBe(layout.finalVideoPath);
    });

    test('only assembles clips that have a narration', async () => {
        await store.save([completed(1, 0), completed(2, 1), completed(3, 2)]);
        for (const id of ['0002', '0003']) {
            media.durations.set(narrationPath(id), 5);
            media.durations.set(clipPath(id), 5);
        }

        await createStep().execute(createPipelineContext([], {
            narrationPaths: [narrationPath('0002'), narrationPath('0003'), narrationPath('0004')],
        }));

        expect(media.muxRequests.map((request) => request.videoPath)).toEqual([clipPath('0002'), clipPath('0003')]);
        expect(media.concatCalls[0].inputPaths).toHaveLength(2);
    });

    test('skips failed entries and clips missing on disk', async () => {
        const missing = completeClipJob(
            createClipJob(4, 3),
            { filename: 'gone.mp4', subfolder: '', type: 'output' },
            path.join(layout.clipsDir, 'narrativegen_clip_0004__00001_.mp4')
        );
        await store.save([completed(1, 0), failClipJob(createClipJob(2, 1), 'TIMEOUT'), missing]);

        await createStep().execute(createPipelineContext([]));

        expect(media.concatCalls[0].inputPaths).toEqual([clipPath('0001')]);
    });

    test('concatenates the silent clips when narration was dropped', async () => {
        await store.save([completed(2, 1), completed(1, 0)]);

        const context = await createStep().execute(createPipelineContext([]));

        expect(media.muxRequests).toEqual([]);
        expect(media.concatCalls).toEqual([{
            inputPaths: [clipPath('0001'), clipPath('0002')],
            outputPath: layout.finalVideoPath,
            listFilePath: layout.concatListPath,
        }]);
        expect(context.finalVideoPath).toBe(layout.finalVideoPath);
    });

    test('muxes one full narration over the concatenated clips', async () => {
        await store.save([completed(1, 0), completed(2, 1)]);
        media.durations.set(layout.fullNarrationPath, 20);
        media.durations.set(layout.silentConcatPath, 10);

        await createStep().execute(createPipelineContext([], { fullNarrationPath: layout.fullNarrationPath }));

        expect(media.concatCalls[0]).toEqual({
            inputPaths: [clipPath('0001'), clipPath('0002')],
            outputPath: layout.silentConcatPath,
            listFilePath: layout.concatListPath,
        });
        expect(media.muxRequests).toEqual([{
            videoPath: layout.silentConcatPath,
            audioPath: layout.fullNarrationPath,
            videoFilter: 'tpad=stop_mode=clone:stop_duration=10',
            outputPath: layout.finalVideoPath,
        }]);
    });

    test('ends with an empty result when no clip succeeded', async () => {
        await store.save([failClipJob(createClipJob(1, 0), 'NO_OUTPUT')]);

        await expect(createStep().execute(createPipelineContext([]))).rejects.toThrow(EmptyResultError);
        expect(media.concatCalls).toEqual([]);
    });

    test('ends with an empty result when no clip has a narration', async () => {
        await store.save([completed(1, 0)]);

        const run = createStep().execute(createPipelineContext([], { narrationPaths: [narrationPath('0009')] }));

        await expect(run).rejects.toThrow('No clip has a matching narration');
    });
});
