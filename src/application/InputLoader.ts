import fs from 'fs';
import path from 'path';
import { ContentItem, parseContentItems } from '../domain/entities/ContentItem';
import { ConfigurationError } from '../domain/errors';
import { NARRATION_FILE_PATTERN } from '../domain/services/ClipPairing';
import {
    WorkflowNodeIds,
    WorkflowTemplate,
    assertNodesPresent,
    parseWorkflowTemplate,
} from '../domain/services/WorkflowTemplate';

async function readJsonFile(filePath: string, label: string): Promise<unknown> {
    let content: string;
    try {
        content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read ${label} ${filePath}: ${reason}`);
    }

    try {
        return JSON.parse(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`${label} ${filePath} is not valid JSON: ${reason}`);
    }
}

/**
 * Reads the exported job graph and checks that every node the pipeline writes into exists.
 */
export async function loadWorkflowTemplate(filePath: string, nodeIds: WorkflowNodeIds): Promise<WorkflowTemplate> {
    const template = parseWorkflowTemplate(await readJsonFile(filePath, 'Workflow template'));
    assertNodesPresent(template, nodeIds);
    console.log(`[Load] Workflow template ${path.basename(filePath)}: ${Object.keys(template).length} nodes`);
    return template;
}

export async function loadContentItems(filePath: string): Promise<ContentItem[]> {
    const items = parseContentItems(await readJsonFile(filePath, 'Content file'));
    console.log(`[Load] ${items.length} content items from ${path.basename(filePath)}`);
    return items;
}

/**
 * Narration files already on disk, for resuming at the assembly stage.
 */
export async function discoverNarrationFiles(narrationDir: string): Promise<string[]> {
    let names: string[];
    try {
        names = await fs.promises.readdir(narrationDir);
    } catch (error) {
        if (isMissingPath(error)) {
            return [];
        }
        throw error;
    }
    return names
        .filter((name) => NARRATION_FILE_PATTERN.test(name))
        .sort()
        .map((name) => path.join(narrationDir, name));
}

function isMissingPath(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
