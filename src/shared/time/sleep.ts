export type Sleep = (ms: number) => Promise<void>;

export type Clock = () => number;

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

export const systemClock: Clock = () => Date.now();
