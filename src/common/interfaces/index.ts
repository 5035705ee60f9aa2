export type { ITimeTransport } from './time-transport.interface';
export { TIME_TRANSPORT_TOKEN } from './time-transport.interface';
export type { IClock } from './clock.interface';
export { CLOCK_TOKEN, systemClock } from './clock.interface';
