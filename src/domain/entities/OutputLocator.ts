/**
 * Identifies an artifact produced by the render backend.
 * The triple is exactly what the backend's file-view endpoint takes.
 */
export interface OutputLocator {
    filename: string;
    subfolder: string;
    /** Storage bucket on the backend ('output', 'temp', 'input') */
    type: string;
}

export const DEFAULT_STORAGE_TYPE = 'output';

/**
 * Local file name for a downloaded clip. Some save nodes report the
 * filename without its container extension.
 */
export function localVideoFileName(locator: OutputLocator): string {
    return locator.filename.toLowerCase().endsWith('.mp4')
        ? locator.filename
        : `${locator.filename}.mp4`;
}
