import {
  NTP_PROTOCOL_ERROR_CODES,
  NtpProtocolError,
} from '../../../common/errors';
import { NtpTimestamp } from './ntp-timestamp';

/** Standard SNTP packet size in bytes */
export const NTP_PACKET_SIZE = 48;

/** Well-known NTP UDP port */
export const NTP_PORT = 123;

export const NTP_VERSION = 4;

/** Stratum value a server uses to refuse service */
export const KISS_OF_DEATH_STRATUM = 0;

export const NtpMode = {
  CLIENT: 3,
  SERVER: 4,
} as const;

/**
 * Decoded SNTP packet (RFC 4330 §4).
 *
 * - Byte 0: LI (bits 7-6) | VN (bits 5-3) | Mode (bits 2-0)
 * - Bytes 1-3: stratum, poll, precision (poll and precision are signed)
 * - Bytes 4-15: root delay, root dispersion, reference id (u32, big-endian)
 * - Bytes 16-47: reference, originate, receive, transmit timestamps
 */
export interface NtpPacket {
  readonly leapIndicator: number;
  readonly version: number;
  readonly mode: number;
  readonly stratum: number;
  readonly pollInterval: number;
  readonly precision: number;
  readonly rootDelay: number;
  readonly rootDispersion: number;
  readonly referenceIdentifier: number;
  readonly referenceTimestamp: NtpTimestamp;
  readonly originateTimestamp: NtpTimestamp;
  readonly receiveTimestamp: NtpTimestamp;
  readonly transmitTimestamp: NtpTimestamp;
}

const TIMESTAMP_FIELDS = [
  ['referenceTimestamp', 16],
  ['originateTimestamp', 24],
  ['receiveTimestamp', 32],
  ['transmitTimestamp', 40],
] as const;

/**
 * Build a packet from partial fields; everything not given is zero.
 */
export function createNtpPacket(fields: Partial<NtpPacket> = {}): NtpPacket {
  return Object.freeze({
    leapIndicator: 0,
    version: 0,
    mode: 0,
    stratum: 0,
    pollInterval: 0,
    precision: 0,
    rootDelay: 0,
    rootDispersion: 0,
    referenceIdentifier: 0,
    referenceTimestamp: NtpTimestamp.ZERO,
    originateTimestamp: NtpTimestamp.ZERO,
    receiveTimestamp: NtpTimestamp.ZERO,
    transmitTimestamp: NtpTimestamp.ZERO,
    ...fields,
  });
}

/**
 * Client-mode request stamped with the local send time.
 */
export function createNtpRequest(transmitTimeMs: number): NtpPacket {
  return createNtpPacket({
    leapIndicator: 0,
    version: NTP_VERSION,
    mode: NtpMode.CLIENT,
    transmitTimestamp: NtpTimestamp.fromEpochMillis(transmitTimeMs),
  });
}

export function encodeNtpPacket(packet: NtpPacket): Buffer {
  const buffer = Buffer.alloc(NTP_PACKET_SIZE);

  buffer.writeUInt8(
    ((packet.leapIndicator & 0b11) << 6) |
      ((packet.version & 0b111) << 3) |
      (packet.mode & 0b111),
    0,
  );
  buffer.writeUInt8(packet.stratum & 0xff, 1);
  buffer.writeInt8(toSignedByte(packet.pollInterval), 2);
  buffer.writeInt8(toSignedByte(packet.precision), 3);

  buffer.writeUInt32BE(packet.rootDelay >>> 0, 4);
  buffer.writeUInt32BE(packet.rootDispersion >>> 0, 8);
  buffer.writeUInt32BE(packet.referenceIdentifier >>> 0, 12);

  for (const [field, offset] of TIMESTAMP_FIELDS) {
    const timestamp = packet[field];
    buffer.writeUInt32BE(timestamp.seconds, offset);
    buffer.writeUInt32BE(timestamp.fraction, offset + 4);
  }

  return buffer;
}

/**
 * @throws NtpProtocolError MALFORMED_PACKET when fewer than 48 bytes are given.
 * Trailing bytes past 48 are ignored.
 */
export function decodeNtpPacket(bytes: Uint8Array): NtpPacket {
  if (bytes.length < NTP_PACKET_SIZE) {
    throw new NtpProtocolError(
      NTP_PROTOCOL_ERROR_CODES.MALFORMED_PACKET,
      `NTP packet must be at least ${NTP_PACKET_SIZE} bytes, got ${bytes.length}`,
      { length: bytes.length },
    );
  }

  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length);
  const header = buffer.readUInt8(0);

  return createNtpPacket({
    leapIndicator: (header >> 6) & 0b11,
    version: (header >> 3) & 0b111,
    mode: header & 0b111,
    stratum: buffer.readUInt8(1),
    pollInterval: buffer.readInt8(2),
    precision: buffer.readInt8(3),
    rootDelay: buffer.readUInt32BE(4),
    rootDispersion: buffer.readUInt32BE(8),
    referenceIdentifier: buffer.readUInt32BE(12),
    referenceTimestamp: readTimestamp(buffer, 16),
    originateTimestamp: readTimestamp(buffer, 24),
    receiveTimestamp: readTimestamp(buffer, 32),
    transmitTimestamp: readTimestamp(buffer, 40),
  });
}

/**
 * Four-character ASCII code carried in the reference identifier of a
 * kiss-of-death reply (e.g. "RATE", "DENY"). Trailing NULs are dropped.
 */
export function kissCode(packet: NtpPacket): string {
  const bytes = Buffer.alloc(4);
  bytes.writeUInt32BE(packet.referenceIdentifier >>> 0, 0);
  return bytes.toString('ascii').replace(/\0+$/, '');
}

function readTimestamp(buffer: Buffer, offset: number): NtpTimestamp {
  return new NtpTimestamp(
    buffer.readUInt32BE(offset),
    buffer.readUInt32BE(offset + 4),
  );
}

// Wraps into -128..127 the way a byte cast does
function toSignedByte(value: number): number {
  return (value << 24) >> 24;
}
