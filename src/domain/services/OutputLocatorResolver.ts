import { DEFAULT_STORAGE_TYPE, OutputLocator } from '../entities/OutputLocator';
import { isNonEmptyString, isRecord } from '../guards';

/**
 * Shapes a single entry of a node output list can take.
 */
type OutputEntry =
    | { kind: 'record'; value: Record<string, unknown> }
    | { kind: 'uri'; value: string };

interface LocatorStrategy {
    /** Key inside the node output payload */
    readonly key: string;
    /** Entry shapes this key is known to carry */
    readonly accepts: readonly OutputEntry['kind'][];
}

/**
 * Candidate keys in priority order. Save nodes report their file under
 * different keys depending on the node pack and backend version.
 */
export const LOCATOR_STRATEGIES: readonly LocatorStrategy[] = [
    { key: 'videos', accepts: ['record'] },
    { key: 'files', accepts: ['record'] },
    { key: 'uris', accepts: ['uri', 'record'] },
    { key: 'gifs', accepts: ['record'] },
    { key: 'images', accepts: ['record'] },
];

function classifyEntry(entry: unknown): OutputEntry | null {
    if (typeof entry === 'string') {
        return { kind: 'uri', value: entry };
    }
    if (isRecord(entry)) {
        return { kind: 'record', value: entry };
    }
    return null;
}

function locatorFromRecord(record: Record<string, unknown>): OutputLocator | null {
    if (!isNonEmptyString(record.filename)) {
        return null;
    }
    return {
        filename: record.filename,
        subfolder: typeof record.subfolder === 'string' ? record.subfolder : '',
        type: isNonEmptyString(record.type) ? record.type : DEFAULT_STORAGE_TYPE,
    };
}

/**
 * Recovers filename/subfolder/type from query parameters such as
 * `/view?filename=clip.mp4&subfolder=&type=output`.
 */
export function locatorFromUri(uri: string): OutputLocator | null {
    let params: URLSearchParams;
    try {
        params = new URL(uri, 'http://backend.local').searchParams;
    } catch {
        return null;
    }

    const filename = params.get('filename');
    if (!isNonEmptyString(filename)) {
        return null;
    }
    const type = params.get('type');
    return {
        filename,
        subfolder: params.get('subfolder') ?? '',
        type: isNonEmptyString(type) ? type : DEFAULT_STORAGE_TYPE,
    };
}

function applyStrategy(strategy: LocatorStrategy, candidate: unknown): OutputLocator | null {
    if (!Array.isArray(candidate) || candidate.length === 0) {
        return null;
    }

    const entry = classifyEntry(candidate[0]);
    if (!entry || !strategy.accepts.includes(entry.kind)) {
        return null;
    }

    switch (entry.kind) {
        case 'record':
            return locatorFromRecord(entry.value);
        case 'uri':
            return locatorFromUri(entry.value);
    }
}

/**
 * Finds the produced artifact in a save node's output payload.
 * Returns null when no candidate key yields a usable filename; that is an
 * expected outcome (the job may have failed upstream), never an exception.
 */
export function resolveOutputLocator(payload: unknown): OutputLocator | null {
    if (!isRecord(payload)) {
        return null;
    }

    for (const strategy of LOCATOR_STRATEGIES) {
        const locator = applyStrategy(strategy, payload[strategy.key]);
        if (locator) {
            return locator;
        }
    }
    return null;
}
