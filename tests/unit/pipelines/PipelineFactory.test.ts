import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    CooldownStep,
    PipelineStep,
    createPipeline,
    createPipelineContext,
    executePipeline,
} from '../../../src/application/pipelines';
import { Config, ProjectLayout, resolveProjectLayout } from '../../../src/config';
import { ContentItem } from '../../../src/domain/entities/ContentItem';
import { ConfigurationError } from '../../../src/domain/errors';
import { DEFAULT_NODE_IDS } from '../../../src/domain/services/WorkflowTemplate';
import { FakeMediaTool, FakeRenderBackend, FakeSpeechClient, createTemplate, finishedEntry } from '../helpers/fakes';

function createConfig(projectDir: string): Config {
    return {
        comfyServerUrl: 'http://127.0.0.1:8188',
        workflowFile: path.join(projectDir, 'workflow.json'),
        contentFile: path.join(projectDir, 'content.json'),
        projectDir,
        nodeIds: DEFAULT_NODE_IDS,
        defaultVideo: { width: 832, height: 480, frames: 65 },
        pollIntervalMs: 10000,
        maxPollAttempts: 3,
        cooldownMs: 30000,
        ttsServerUrl: 'http://127.0.0.1:8003',
        ttsSampleRate: 24000,
        ttsTimeoutMs: 600000,
        referenceTranscript: '',
        ttsSeed: 42,
        tailPaddingMs: 0,
        narrationMode: 'per_clip',
        stretchThresholdSeconds: 4,
        videoCodec: 'libx264',
        audioCodec: 'aac',
    };
}

describe('CooldownStep', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('waits for the configured duration and passes the context through', async () => {
        const wait = jest.fn().mockResolvedValue(undefined);
        const step = new CooldownStep(30000, 'after render', wait);
        const context = createPipelineContext([]);

        await expect(step.execute(context)).resolves.toBe(context);
        expect(wait).toHaveBeenCalledWith(30000);
        expect(step.name).toBe('Cooldown(after render)');
    });

    test('is skipped when the duration is zero', () => {
        expect(new CooldownStep(0, 'after render').shouldSkip()).toBe(true);
        expect(new CooldownStep(1, 'after render').shouldSkip()).toBe(false);
    });
});

describe('executePipeline', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('runs steps in order, skipping those that ask to be skipped', async () => {
        const calls: string[] = [];
        const step = (name: string, skip = false): PipelineStep => ({
            name,
            shouldSkip: () => skip,
            execute: async (context) => {
                calls.push(name);
                return { ...context, narrationPaths: [...context.narrationPaths, name] };
            },
        });
        const onStepComplete = jest.fn().mockResolvedValue(undefined);

        const result = await executePipeline(
            createPipelineContext([]),
            [step('first'), step('skipped', true), step('second')],
            onStepComplete
        );

        expect(calls).toEqual(['first', 'second']);
        expect(result.narrationPaths).toEqual(['first', 'second']);
        expect(onStepComplete.mock.calls.map(([name]) => name)).toEqual(['first', 'second']);
    });

    test('stops at the first failing step', async () => {
        const later = jest.fn();
        const steps: PipelineStep[] = [
            { name: 'broken', execute: async () => { throw new Error('boom'); } },
            { name: 'later', execute: later },
        ];

        await expect(executePipeline(createPipelineContext([]), steps)).rejects.toThrow('boom');
        expect(later).not.toHaveBeenCalled();
    });
});

describe('createPipeline', () => {
    let workDir: string;
    let layout: ProjectLayout;
    let config: Config;
    let backend: FakeRenderBackend;
    let speech: FakeSpeechClient;
    let media: FakeMediaTool;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-'));
        layout = resolveProjectLayout(workDir);
        config = createConfig(workDir);
        backend = new FakeRenderBackend();
        speech = new FakeSpeechClient();
        media = new FakeMediaTool();
    });

    afterEach(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    test('orders the stages of a full run', () => {
        const steps = createPipeline('run', {
            config, layout, renderBackend: backend, speechClient: speech, mediaTool: media, template: createTemplate(),
        });

        expect(steps.map((step) => step.name)).toEqual([
            'RenderClips',
            'Cooldown(after render)',
            'Narration',
            'Cooldown(after narration)',
            'Assemble',
        ]);
    });

    test('builds single-stage pipelines for the resume commands', () => {
        const deps = { config, layout, renderBackend: backend, speechClient: speech, mediaTool: media };

        expect(createPipeline('narrate', deps).map((step) => step.name)).toEqual(['Narration']);
        expect(createPipeline('assemble', deps).map((step) => step.name)).toEqual(['Assemble']);
    });

    test('refuses to render without a workflow template', () => {
        const deps = { config, layout, renderBackend: backend, speechClient: speech, mediaTool: media };

        expect(() => createPipeline('render', deps)).toThrow(ConfigurationError);
        expect(() => createPipeline('run', deps)).toThrow(ConfigurationError);
    });

    test('renders, narrates and assembles two clips end to end', async () => {
        const items: ContentItem[] = [
            { id: 1, prompt: 'dawn over rooftops', commentary: 'The city wakes.' },
            { id: 2, prompt: 'a tram in the rain', commentary: 'Trams hum past.' },
        ];
        for (const id of ['0001', '0002']) {
            const filename = `narrativegen_clip_${id}__00001_.mp4`;
            backend.histories.set(`prompt-${Number(id)}`, finishedEntry({ videos: [{ filename, subfolder: '', type: 'output' }] }));
            backend.files.set(filename, Buffer.from(`clip-${id}`));
            media.durations.set(path.join(layout.clipsDir, filename), 5);
            media.durations.set(path.join(layout.narrationDir, `clip_${id}_narration.wav`), 5);
        }
        const wait = jest.fn().mockResolvedValue(undefined);

        const steps = createPipeline('run', {
            config, layout, renderBackend: backend, speechClient: speech, mediaTool: media,
            template: createTemplate(), sleep: wait,
        });
        const result = await executePipeline(createPipelineContext(items), steps);

        expect(result.manifest.map((job) => job.status)).toEqual(['SUCCESS', 'SUCCESS']);
        expect(speech.requests.map((request) => request.text)).toEqual(['The city wakes.', 'Trams hum past.']);
        expect(media.muxRequests.map((request) => request.videoFilter)).toEqual(['null', 'null']);
        expect(media.concatCalls).toEqual([{
            inputPaths: [path.join(layout.mergedDir, 'merged_0001.mp4'), path.join(layout.mergedDir, 'merged_0002.mp4')],
            outputPath: layout.finalVideoPath,
            listFilePath: layout.concatListPath,
        }]);
        expect(wait.mock.calls.filter(([ms]) => ms === 30000)).toHaveLength(2);
        expect(result.finalVideoPath).toBe(layout.finalVideoPath);
    });
});
