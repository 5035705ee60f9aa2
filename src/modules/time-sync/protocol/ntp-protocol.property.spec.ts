import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  createNtpPacket,
  decodeNtpPacket,
  encodeNtpPacket,
} from './ntp-packet.codec';
import { NtpTimestamp } from './ntp-timestamp';

// ── Arbitraries ──

const u32Arb = fc.integer({ min: 0, max: 0xffffffff });
const signedByteArb = fc.integer({ min: -128, max: 127 });

const timestampArb = fc
  .tuple(u32Arb, u32Arb)
  .map(([seconds, fraction]) => new NtpTimestamp(seconds, fraction));

const packetArb = fc
  .record({
    leapIndicator: fc.integer({ min: 0, max: 3 }),
    version: fc.integer({ min: 0, max: 7 }),
    mode: fc.integer({ min: 0, max: 7 }),
    stratum: fc.integer({ min: 0, max: 255 }),
    pollInterval: signedByteArb,
    precision: signedByteArb,
    rootDelay: u32Arb,
    rootDispersion: u32Arb,
    referenceIdentifier: u32Arb,
    referenceTimestamp: timestampArb,
    originateTimestamp: timestampArb,
    receiveTimestamp: timestampArb,
    transmitTimestamp: timestampArb,
  })
  .map((fields) => createNtpPacket(fields));

// Largest epoch millis whose NTP seconds still fit in 32 bits (era 0)
const MAX_ERA0_EPOCH_MILLIS = (2 ** 32 - 2_208_988_800) * 1000 - 1;

describe('NTP protocol property tests', () => {
  it('decode(encode(p)) reproduces every field', () => {
    fc.assert(
      fc.property(packetArb, (packet) => {
        expect(decodeNtpPacket(encodeNtpPacket(packet))).toEqual(packet);
      }),
    );
  });

  it('header byte packs LI, VN and mode', () => {
    fc.assert(
      fc.property(packetArb, (packet) => {
        const bytes = encodeNtpPacket(packet);
        expect(bytes).toHaveLength(48);
        expect(bytes[0]).toBe(
          (packet.leapIndicator << 6) | (packet.version << 3) | packet.mode,
        );
      }),
    );
  });

  it('epoch millis survive a timestamp round trip within 1 ms', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: MAX_ERA0_EPOCH_MILLIS }),
        (millis) => {
          const back = NtpTimestamp.fromEpochMillis(millis).toEpochMillis();
          expect(millis - back).toBeGreaterThanOrEqual(0);
          expect(millis - back).toBeLessThanOrEqual(1);
        },
      ),
    );
  });
});
