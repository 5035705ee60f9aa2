import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as dgram from 'dgram';
import { UdpTimeTransport } from './udp-time.transport';
import {
  TimeTransportError,
  TIME_TRANSPORT_ERROR_CODES,
} from '../../common/errors';

const { sockets, FakeSocket } = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void;

  class FakeSocket {
    readonly listeners = new Map<string, Listener[]>();
    send =
      vi.fn<
        (
          msg: Buffer,
          port: number,
          host: string,
          cb: (error: Error | null, bytes: number) => void,
        ) => void
      >();
    close = vi.fn();

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
      return this;
    }

    once(event: string, listener: Listener): this {
      const wrapped: Listener = (...args) => {
        this.off(event, wrapped);
        listener(...args);
      };
      return this.on(event, wrapped);
    }

    off(event: string, listener: Listener): this {
      this.listeners.set(
        event,
        (this.listeners.get(event) ?? []).filter((l) => l !== listener),
      );
      return this;
    }

    emit(event: string, ...args: unknown[]): boolean {
      const current = this.listeners.get(event) ?? [];
      for (const listener of current) {
        listener(...args);
      }
      return current.length > 0;
    }
  }

  const created: FakeSocket[] = [];
  return { sockets: created, FakeSocket };
});

vi.mock('dgram', () => {
  const createSocket = vi.fn(() => {
    const socket = new FakeSocket();
    sockets.push(socket);
    return socket;
  });
  return { createSocket, default: { createSocket } };
});

type FakeSocketInstance = (typeof sockets)[number];

function lastSocket(): FakeSocketInstance {
  const socket = sockets[sockets.length - 1];
  if (!socket) {
    throw new Error('no socket created');
  }
  return socket;
}

function errnoError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('UdpTimeTransport', () => {
  const request = Buffer.alloc(48, 0x23);
  let transport: UdpTimeTransport;

  beforeEach(() => {
    sockets.length = 0;
    vi.mocked(dgram.createSocket).mockClear();
    transport = new UdpTimeTransport();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should identify itself as udp', () => {
    expect(transport.kind).toBe('udp');
  });

  it('should send the request to host and port and resolve with the reply', async () => {
    const pending = transport.exchange('ntp.test', 123, request, 1_000);
    const socket = lastSocket();
    const reply = Buffer.alloc(48, 0x24);

    socket.emit('message', reply);

    await expect(pending).resolves.toBe(reply);
    expect(socket.send).toHaveBeenCalledWith(
      request,
      123,
      'ntp.test',
      expect.any(Function),
    );
    expect(socket.close).toHaveBeenCalledTimes(1);
  });

  it('should open a udp4 socket for hostnames and IPv4 literals', async () => {
    const pending = [
      transport.exchange('ntp.test', 123, request, 1_000),
      transport.exchange('192.0.2.10', 123, request, 1_000),
    ];
    sockets.forEach((socket) => socket.emit('message', Buffer.alloc(48)));
    await Promise.all(pending);

    expect(vi.mocked(dgram.createSocket).mock.calls.map(([type]) => type)).toEqual(
      ['udp4', 'udp4'],
    );
  });

  it('should open a udp6 socket for IPv6 literals', async () => {
    const pending = transport.exchange('::1', 1123, request, 1_000);
    const socket = lastSocket();
    const reply = Buffer.alloc(48, 0x24);

    socket.emit('message', reply);

    await expect(pending).resolves.toBe(reply);
    expect(vi.mocked(dgram.createSocket)).toHaveBeenLastCalledWith('udp6');
    expect(socket.send).toHaveBeenCalledWith(
      request,
      1123,
      '::1',
      expect.any(Function),
    );
  });

  it('should not time out early when the timeout exceeds the timer limit', async () => {
    vi.useFakeTimers();
    const pending = transport.exchange('ntp.test', 123, request, 3_000_000_000);
    const socket = lastSocket();

    await vi.advanceTimersByTimeAsync(1_000);
    expect(socket.close).not.toHaveBeenCalled();

    const reply = Buffer.alloc(48, 0x24);
    socket.emit('message', reply);
    await expect(pending).resolves.toBe(reply);
  });

  it('should time out and close the socket', async () => {
    vi.useFakeTimers();
    const pending = transport.exchange('ntp.test', 123, request, 500);
    const settled = pending.catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(500);

    const error = await settled;
    expect(error).toBeInstanceOf(TimeTransportError);
    expect(error).toMatchObject({
      code: TIME_TRANSPORT_ERROR_CODES.TIMEOUT,
      message: 'No reply from ntp.test:123 within 500ms',
      host: 'ntp.test',
      port: 123,
    });
    expect(lastSocket().close).toHaveBeenCalledTimes(1);
  });

  it('should map DNS failures to HOST_UNRESOLVABLE', async () => {
    const pending = transport.exchange('nowhere.test', 123, request, 1_000);
    const socket = lastSocket();
    const [, , , callback] = socket.send.mock.calls[0] ?? [];

    callback?.(errnoError('getaddrinfo ENOTFOUND nowhere.test', 'ENOTFOUND'), 0);

    await expect(pending).rejects.toMatchObject({
      code: TIME_TRANSPORT_ERROR_CODES.HOST_UNRESOLVABLE,
      host: 'nowhere.test',
    });
    expect(socket.close).toHaveBeenCalledTimes(1);
  });

  it('should map other socket errors to IO_ERROR and keep the cause', async () => {
    const pending = transport.exchange('ntp.test', 123, request, 1_000);
    const socket = lastSocket();
    const failure = errnoError('connect ECONNREFUSED', 'ECONNREFUSED');

    socket.emit('error', failure);

    await expect(pending).rejects.toMatchObject({
      code: TIME_TRANSPORT_ERROR_CODES.IO_ERROR,
      cause: failure,
    });
  });

  it('should close once when a reply and an error both arrive', async () => {
    vi.useFakeTimers();
    const pending = transport.exchange('ntp.test', 123, request, 1_000);
    const socket = lastSocket();
    const reply = Buffer.alloc(48);

    socket.emit('message', reply);
    socket.emit('error', new Error('late failure'));
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(pending).resolves.toBe(reply);
    expect(socket.close).toHaveBeenCalledTimes(1);
  });

  it('should use a fresh socket per exchange', async () => {
    const first = transport.exchange('ntp.test', 123, request, 1_000);
    lastSocket().emit('message', Buffer.alloc(48));
    await first;

    const second = transport.exchange('ntp.test', 123, request, 1_000);
    lastSocket().emit('message', Buffer.alloc(48));
    await second;

    expect(sockets).toHaveLength(2);
  });
});
