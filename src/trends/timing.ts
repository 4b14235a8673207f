import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const realSleep: Sleep = async (ms) => {
  if (ms > 0) await delay(ms);
};

export const systemClock: Clock = () => Date.now();
