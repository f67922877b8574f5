/**
 * Injected wherever the pipeline waits, so tests can run without real delays.
 */
export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
