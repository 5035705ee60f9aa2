/** Node fires timers with a longer delay after 1ms instead */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  return Math.min(ms, MAX_TIMER_DELAY_MS);
}
