import { randomInt } from 'crypto';
import { ConfigurationError } from '../errors';
import { isRecord } from '../guards';
import { videoOutputPrefix } from './ClipPairing';

/**
 * A backend node: its class plus an `inputs` map the pipeline overrides.
 */
export interface WorkflowNode {
    class_type?: string;
    inputs: Record<string, unknown>;
    [key: string]: unknown;
}

/**
 * Backend job graph keyed by node id, exactly as exported from the editor.
 */
export type WorkflowTemplate = Record<string, WorkflowNode>;

/**
 * Node ids the pipeline writes into. They are specific to the exported graph.
 */
export interface WorkflowNodeIds {
    prompt: string;
    sampler: string;
    latent: string;
    save: string;
}

export const DEFAULT_NODE_IDS: WorkflowNodeIds = {
    prompt: '6',
    sampler: '3',
    latent: '40',
    save: '52',
};

export interface JobOverrides {
    prompt: string;
    seed: number;
    frames: number;
    width: number;
    height: number;
    outputPrefix: string;
}

/** Exclusive upper bound of the sampler seed (32-bit unsigned). */
const SEED_LIMIT = 2 ** 32;

export function randomSeed(): number {
    // crypto.randomInt caps its range at 2^48, so 2^32 is fine
    return randomInt(0, SEED_LIMIT);
}

export function outputPrefixFor(id: number): string {
    return videoOutputPrefix(id);
}

/**
 * Checks the shape of a parsed workflow file: an object of nodes, each with an `inputs` object.
 */
export function parseWorkflowTemplate(raw: unknown): WorkflowTemplate {
    if (!isRecord(raw)) {
        throw new ConfigurationError('Workflow template must be a JSON object keyed by node id');
    }

    const template: WorkflowTemplate = {};
    for (const [nodeId, node] of Object.entries(raw)) {
        if (!isRecord(node) || !isRecord(node.inputs)) {
            throw new ConfigurationError(`Workflow node ${nodeId} has no "inputs" object`);
        }
        template[nodeId] = { ...node, inputs: node.inputs };
    }
    return template;
}

export function findMissingNodes(template: WorkflowTemplate, nodeIds: WorkflowNodeIds): string[] {
    return Object.values(nodeIds).filter((nodeId) => !(nodeId in template));
}

export function assertNodesPresent(template: WorkflowTemplate, nodeIds: WorkflowNodeIds): void {
    const missing = findMissingNodes(template, nodeIds);
    if (missing.length > 0) {
        throw new ConfigurationError(`Workflow template is missing node(s): ${missing.join(', ')}`);
    }
}

/**
 * Deep-copies the template and writes the per-item values into it.
 * The template itself is never modified.
 */
export function buildJobSpec(
    template: WorkflowTemplate,
    nodeIds: WorkflowNodeIds,
    overrides: JobOverrides
): WorkflowTemplate {
    assertNodesPresent(template, nodeIds);

    const spec = structuredClone(template);
    spec[nodeIds.prompt].inputs.text = overrides.prompt;
    spec[nodeIds.sampler].inputs.seed = overrides.seed;
    spec[nodeIds.latent].inputs.length = overrides.frames;
    spec[nodeIds.latent].inputs.width = overrides.width;
    spec[nodeIds.latent].inputs.height = overrides.height;
    spec[nodeIds.save].inputs.filename_prefix = overrides.outputPrefix;
    return spec;
}
