export type Sleep = (ms: number) => Promise<void>;
export type Now = () => number;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const now: Now = () => Date.now();
