/** Fixed delay between successive remote calls. Injected so tests run without waiting. */
export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const noSleep: Sleep = async () => {};
