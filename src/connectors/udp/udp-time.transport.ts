import * as dgram from 'dgram';
import { isIPv6 } from 'net';

import {
  TimeTransportError,
  TIME_TRANSPORT_ERROR_CODES,
} from '../../common/errors';
import { ITimeTransport } from '../../common/interfaces/time-transport.interface';
import { clampTimerDelay } from '../../common/utils/timer-delay';

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);

/**
 * Exchanges one SNTP datagram per call over a fresh socket, udp6 for IPv6
 * literals and udp4 otherwise.
 */
export class UdpTimeTransport implements ITimeTransport {
  readonly kind = 'udp';

  exchange(
    host: string,
    port: number,
    request: Buffer,
    timeoutMs: number,
  ): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const socket = dgram.createSocket(isIPv6(host) ? 'udp6' : 'udp4');
      let settled = false;

      // Closes the socket exactly once, whichever exit path gets here first
      const settle = (outcome: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.close();
        outcome();
      };

      const timer = setTimeout(() => {
        settle(() =>
          reject(
            new TimeTransportError(
              TIME_TRANSPORT_ERROR_CODES.TIMEOUT,
              `No reply from ${host}:${port} within ${timeoutMs}ms`,
              host,
              port,
            ),
          ),
        );
      }, clampTimerDelay(timeoutMs));

      socket.once('message', (message: Buffer) => {
        settle(() => resolve(message));
      });

      // Stays registered so a late socket error cannot go unhandled
      socket.on('error', (error: Error) => {
        settle(() => reject(toTransportError(error, host, port)));
      });

      socket.send(request, port, host, (error) => {
        if (error) {
          settle(() => reject(toTransportError(error, host, port)));
        }
      });
    });
  }
}

function toTransportError(
  error: Error,
  host: string,
  port: number,
): TimeTransportError {
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && DNS_ERROR_CODES.has(code)) {
    return new TimeTransportError(
      TIME_TRANSPORT_ERROR_CODES.HOST_UNRESOLVABLE,
      `Cannot resolve NTP host ${host}: ${error.message}`,
      host,
      port,
      error,
    );
  }
  return new TimeTransportError(
    TIME_TRANSPORT_ERROR_CODES.IO_ERROR,
    `UDP exchange with ${host}:${port} failed: ${error.message}`,
    host,
    port,
    error,
  );
}
