import type { Clock } from './interfaces.js';

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};
