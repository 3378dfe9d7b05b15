/**
 * Source of the current time. Injected so cycles can be replayed at a fixed instant.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};
