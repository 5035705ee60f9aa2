export const CLOCK_TOKEN = 'SYSTEM_CLOCK';

/**
 * Source of local wall-clock time in Unix epoch milliseconds.
 */
export interface IClock {
  now(): number;
}

export const systemClock: IClock = {
  now: () => Date.now(),
};
