export type Sleep = (ms: number) => Promise<void>;

/**
 * Suspend for `ms` milliseconds. Components take this as an option so tests
 * can record delays instead of waiting for them.
 */
export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
