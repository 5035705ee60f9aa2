export { withRetry } from './with-retry';
export { MAX_TIMER_DELAY_MS, clampTimerDelay } from './timer-delay';
