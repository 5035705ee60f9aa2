export { BaseEvent } from './base.event';
export { EVENT_NAMES } from './event-catalog';
export {
  TimeSyncCompletedEvent,
  TimeSyncFailedEvent,
  TimeSyncResetEvent,
  TimeWarningEvent,
  TimeCriticalEvent,
} from './time.events';
export { SystemHealthCriticalEvent } from './system.events';
