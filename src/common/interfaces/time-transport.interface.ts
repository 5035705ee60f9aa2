export const TIME_TRANSPORT_TOKEN = 'TIME_TRANSPORT';

/**
 * Send-and-receive capability the sync engine exchanges packets through.
 * Implementations must release any socket or connection they open on every
 * exit path, including timeout.
 */
export interface ITimeTransport {
  /**
   * Send `request` to `host:port` and resolve with the first response.
   * @throws TimeTransportError TIMEOUT, HOST_UNRESOLVABLE or IO_ERROR
   */
  exchange(
    host: string,
    port: number,
    request: Buffer,
    timeoutMs: number,
  ): Promise<Buffer>;

  /** Short label used in logs (e.g. 'udp', 'http') */
  readonly kind: string;
}
