/**
 * UDP line-protocol listener.
 *
 * Every datagram is one payload at nanosecond precision. A datagram that
 * fails to decode is counted and dropped as a whole; points that decoded
 * before the bad line are not forwarded either. Socket errors are logged and
 * the socket keeps receiving.
 */

import { createSocket } from 'node:dgram';
import type { Socket } from 'node:dgram';
import { isIPv6 } from 'node:net';
import type { ExporterContext } from '../core/ExporterContext.ts';
import type { Pipeline, PipelineResult } from '../core/Pipeline.ts';
import { parseHostPort } from '../util/address.ts';

export const MAX_DATAGRAM_SIZE = 64 * 1024;

export class UdpListener {
  private socket: Socket | undefined;

  constructor(
    private readonly ctx: ExporterContext,
    private readonly pipeline: Pipeline,
    private readonly bindAddress: string
  ) {}

  /** Bind the socket. Rejects on an unparseable address or a bind failure. */
  async start(): Promise<void> {
    if (this.socket) return;
    const { host, port } = parseHostPort(this.bindAddress);
    const socket = createSocket({ type: host && isIPv6(host) ? 'udp6' : 'udp4' });

    await new Promise<void>((resolve, reject) => {
      const onBindError = (err: Error): void => {
        socket.close();
        reject(err);
      };
      socket.once('error', onBindError);
      socket.bind(port, host, () => {
        socket.off('error', onBindError);
        resolve();
      });
    });

    socket.on('message', (msg) => this.handleDatagram(msg));
    socket.on('error', (err) => this.handleError(err));
    this.socket = socket;
    this.ctx.logger.info('udp listener bound', { address: this.bindAddress });
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = undefined;
    await new Promise<void>((resolve) => socket.close(() => resolve()));
  }

  /** Port actually bound, useful when binding to port 0. */
  get port(): number | undefined {
    return this.socket?.address().port;
  }

  handleDatagram(msg: Uint8Array): PipelineResult {
    // Copy so the payload never aliases a buffer the socket may reuse.
    const payload = Buffer.from(msg.subarray(0, MAX_DATAGRAM_SIZE));
    this.ctx.markPush();

    const result = this.pipeline.process(payload, 'ns');
    if (result.status === 400) {
      this.ctx.udpParseErrors.inc();
      this.ctx.logger.debug('dropped udp datagram', { message: result.message });
    }
    return result;
  }

  handleError(err: Error): void {
    this.ctx.logger.error('udp receive error', { error: err.message });
  }
}
