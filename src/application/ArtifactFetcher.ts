import fs from 'fs';
import path from 'path';
import { OutputLocator } from '../domain/entities/OutputLocator';
import { IRenderBackendClient } from '../domain/ports/IRenderBackendClient';

export type FetchResult =
    | { ok: true; path: string; bytes: number }
    | { ok: false; reason: string };

/**
 * Copies a produced artifact from the render backend to local disk.
 * A zero-byte file counts as a failed download.
 */
export class ArtifactFetcher {
    constructor(private readonly backend: Pick<IRenderBackendClient, 'viewFile'>) { }

    async fetch(locator: OutputLocator, destinationPath: string): Promise<FetchResult> {
        try {
            await fs.promises.mkdir(path.dirname(destinationPath), { recursive: true });

            const data = await this.backend.viewFile(locator);
            await fs.promises.writeFile(destinationPath, data);

            const { size } = await fs.promises.stat(destinationPath);
            if (size === 0) {
                console.error(`[Fetch] ${locator.filename}: downloaded file is empty`);
                return { ok: false, reason: `Downloaded file ${destinationPath} is empty` };
            }

            console.log(`[Fetch] ${locator.filename} → ${destinationPath} (${size} bytes)`);
            return { ok: true, path: destinationPath, bytes: size };
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            console.error(`[Fetch] ${locator.filename}: ${reason}`);
            return { ok: false, reason };
        }
    }
}
