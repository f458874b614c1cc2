import dgram, { RemoteInfo } from 'dgram';
import { Datagram } from '@/types';
import { TransportError } from '@/types/errors';
import { MAX_DATAGRAM_SIZE, UDP_RECV_PORT, UDP_SEND_PORT } from '@/protocol/PacketCodec';
import { logger } from '@/utils/logger';

/**
 * The slice of `dgram.Socket` the transport relies on. Tests hand in an
 * in-process fake through `socketFactory`.
 */
export interface UdpSocket {
  bind(port: number, address: string, callback: () => void): void;
  setBroadcast(flag: boolean): void;
  send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null, bytes: number) => void): void;
  close(callback?: () => void): void;
  on(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  removeListener(event: 'error', listener: (err: Error) => void): this;
}

export type SocketFactory = () => UdpSocket;

export interface UdpTransportOptions {
  /** Local address the broadcast listener binds to (default: all interfaces) */
  bindAddress?: string;
  /** Datagrams held for a slow consumer before the oldest is dropped (default: 256) */
  maxBufferedDatagrams?: number;
  socketFactory?: SocketFactory;
}

const defaultSocketFactory: SocketFactory = () => dgram.createSocket({ type: 'udp4', reuseAddr: true });

const errorCode = (error: Error): string | undefined =>
  'code' in error && typeof error.code === 'string' ? error.code : undefined;

/**
 * Lazy, infinite sequence of inbound datagrams. Ends only when closed, after
 * which it cannot be restarted.
 */
export class DatagramStream implements AsyncIterable<Datagram> {
  private readonly buffer: Datagram[] = [];
  private readonly waiters: Array<(result: IteratorResult<Datagram>) => void> = [];
  private readonly maxBuffered: number;
  private readonly onClose: () => void;
  private closed = false;
  private dropped = 0;

  constructor(maxBuffered: number, onClose: () => void) {
    this.maxBuffered = maxBuffered;
    this.onClose = onClose;
  }

  push(datagram: Datagram): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: datagram, done: false });
      return;
    }

    this.buffer.push(datagram);
    if (this.buffer.length > this.maxBuffered) {
      this.buffer.shift();
      this.dropped++;
      logger.warn({ component: 'UdpTransport', dropped: this.dropped }, 'Datagram buffer full, dropped oldest datagram');
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.onClose();
  }

  isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<Datagram>> {
    const datagram = this.buffer.shift();
    if (datagram) {
      return Promise.resolve({ value: datagram, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<Datagram> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}

/**
 * Owns the two UDP sockets of the bridge: an unbound sender for unicast
 * commands and the broadcast listener on port 20911.
 */
export class UdpTransport {
  private readonly log = logger.child({ component: 'UdpTransport' });
  private readonly bindAddress: string;
  private readonly maxBufferedDatagrams: number;
  private readonly socketFactory: SocketFactory;
  private sendSocket: UdpSocket | null = null;
  private recvSocket: UdpSocket | null = null;
  private stream: DatagramStream | null = null;
  private closed = false;

  constructor(options: UdpTransportOptions = {}) {
    this.bindAddress = options.bindAddress ?? '0.0.0.0';
    this.maxBufferedDatagrams = options.maxBufferedDatagrams ?? 256;
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
  }

  /**
   * Sends one datagram. There is no acknowledgement: a resolved promise only
   * means the kernel accepted it.
   *
   * @throws TransportError when the socket reports a failure for this send, or
   *   once the transport has been closed
   */
  async send(payload: Buffer, host: string, port: number = UDP_SEND_PORT): Promise<void> {
    if (this.closed) {
      throw new TransportError('Transport closed');
    }
    const socket = this.getSendSocket();

    await new Promise<void>((resolve, reject) => {
      socket.send(payload, port, host, (error) => {
        if (error) {
          reject(new TransportError(`Failed to send ${payload.length} bytes to ${host}:${port}: ${error.message}`, errorCode(error)));
          return;
        }
        resolve();
      });
    });

    this.log.debug({ host, port, bytes: payload.length }, 'Datagram sent');
  }

  /**
   * Binds the broadcast listener and returns the inbound datagram stream.
   *
   * @throws TransportError when the port cannot be bound
   */
  async listen(port: number = UDP_RECV_PORT): Promise<DatagramStream> {
    if (this.stream && !this.stream.isClosed()) {
      throw new TransportError(`Already listening on port ${port}`);
    }

    const socket = this.socketFactory();
    this.closed = false;

    await new Promise<void>((resolve, reject) => {
      const onBindError = (error: Error) => {
        socket.close();
        reject(new TransportError(`Cannot bind to port ${port}: ${error.message}`, errorCode(error)));
      };
      socket.once('error', onBindError);
      socket.bind(port, this.bindAddress, () => {
        socket.removeListener('error', onBindError);
        resolve();
      });
    });

    socket.setBroadcast(true);

    const stream = new DatagramStream(this.maxBufferedDatagrams, () => this.closeRecvSocket(socket));

    socket.on('message', (msg, rinfo) => {
      if (msg.length > MAX_DATAGRAM_SIZE) {
        this.log.warn({ from: rinfo.address, bytes: msg.length }, 'Rejected oversized datagram');
        return;
      }
      stream.push({ address: rinfo.address, port: rinfo.port, payload: msg, receivedAt: Date.now() });
    });

    socket.on('error', (error) => {
      this.log.error({ err: error }, 'Broadcast socket error');
    });

    this.recvSocket = socket;
    this.stream = stream;
    this.log.info({ port, address: this.bindAddress }, 'Listening for broadcasts');
    return stream;
  }

  isListening(): boolean {
    return this.stream !== null && !this.stream.isClosed();
  }

  /**
   * Closes both sockets. A consumer waiting on the stream is released and
   * sends are refused until the next `listen`.
   */
  async close(): Promise<void> {
    this.closed = true;
    this.stream?.close();
    this.stream = null;

    if (this.sendSocket) {
      const socket = this.sendSocket;
      this.sendSocket = null;
      await new Promise<void>(resolve => socket.close(() => resolve()));
      this.log.debug('Send socket closed');
    }
  }

  private getSendSocket(): UdpSocket {
    if (!this.sendSocket) {
      const socket = this.socketFactory();
      socket.on('error', (error) => {
        this.log.error({ err: error }, 'Send socket error');
      });
      this.sendSocket = socket;
    }
    return this.sendSocket;
  }

  private closeRecvSocket(socket: UdpSocket): void {
    if (this.recvSocket !== socket) return;
    this.recvSocket = null;
    socket.close();
    this.log.debug('Receive socket closed');
  }
}
