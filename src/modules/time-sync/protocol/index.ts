export {
  NtpTimestamp,
  SECONDS_FROM_1900_TO_1970,
  FRACTION_PER_SECOND,
} from './ntp-timestamp';
export {
  NTP_PACKET_SIZE,
  NTP_PORT,
  NTP_VERSION,
  KISS_OF_DEATH_STRATUM,
  NtpMode,
  createNtpPacket,
  createNtpRequest,
  encodeNtpPacket,
  decodeNtpPacket,
  kissCode,
} from './ntp-packet.codec';
export type { NtpPacket } from './ntp-packet.codec';
