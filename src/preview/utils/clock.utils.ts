import { setTimeout as delay } from "timers/promises";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

export function toUnixSeconds(epochMillis: number): number {
  return Math.floor(epochMillis / 1000);
}
