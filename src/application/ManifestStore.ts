import fs from 'fs';
import path from 'path';
import { ClipJob, isClipJobStatus } from '../domain/entities/ClipJob';
import { ClipManifest } from '../domain/entities/ClipManifest';
import { OutputLocator } from '../domain/entities/OutputLocator';
import { ConfigurationError } from '../domain/errors';
import { isRecord } from '../domain/guards';

/**
 * On-disk shape of one manifest entry. Absent fields are written as null.
 */
interface ManifestRecord {
    id: number;
    order: number;
    status: string;
    outputLocator: OutputLocator | null;
    localPath: string | null;
}

function toRecord(job: ClipJob): ManifestRecord {
    return {
        id: job.id,
        order: job.order,
        status: job.status,
        outputLocator: job.outputLocator ?? null,
        localPath: job.status === 'SUCCESS' ? job.localPath : null,
    };
}

function readLocator(raw: unknown, index: number): OutputLocator | undefined {
    if (raw === null || raw === undefined) {
        return undefined;
    }
    if (
        !isRecord(raw) ||
        typeof raw.filename !== 'string' ||
        typeof raw.subfolder !== 'string' ||
        typeof raw.type !== 'string'
    ) {
        throw new ConfigurationError(`Manifest entry ${index} has a malformed outputLocator`);
    }
    return { filename: raw.filename, subfolder: raw.subfolder, type: raw.type };
}

function fromRecord(raw: unknown, index: number): ClipJob {
    if (!isRecord(raw)) {
        throw new ConfigurationError(`Manifest entry ${index} is not an object`);
    }

    const { id, order, status, localPath } = raw;
    if (typeof id !== 'number' || typeof order !== 'number' || !isClipJobStatus(status)) {
        throw new ConfigurationError(`Manifest entry ${index} needs numeric id/order and a known status`);
    }

    const outputLocator = readLocator(raw.outputLocator, index);

    if (status === 'SUCCESS') {
        if (typeof localPath !== 'string' || !localPath || !outputLocator) {
            throw new ConfigurationError(`Manifest entry ${index} is SUCCESS but has no localPath or outputLocator`);
        }
        return { id, order, status, outputLocator, localPath };
    }
    return { id, order, status, outputLocator };
}

/**
 * Persists the clip manifest as a single JSON file, replaced on every save.
 */
export class ManifestStore {
    constructor(readonly manifestPath: string) { }

    async save(manifest: ClipManifest): Promise<void> {
        await fs.promises.mkdir(path.dirname(this.manifestPath), { recursive: true });
        await fs.promises.writeFile(this.manifestPath, JSON.stringify(manifest.map(toRecord), null, 2), 'utf-8');
        console.log(`[Manifest] Saved ${manifest.length} entries to ${this.manifestPath}`);
    }

    async load(): Promise<ClipManifest> {
        let content: string;
        try {
            content = await fs.promises.readFile(this.manifestPath, 'utf-8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Cannot read manifest ${this.manifestPath}: ${reason}`);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch {
            throw new ConfigurationError(`Manifest ${this.manifestPath} is not valid JSON`);
        }

        if (!Array.isArray(parsed)) {
            throw new ConfigurationError(`Manifest ${this.manifestPath} must contain a list`);
        }
        return parsed.map((entry: unknown, index: number) => fromRecord(entry, index));
    }
}
