import { EventEmitter } from 'events';
import { UdpSocket } from '@/transport/UdpTransport';

export interface SentDatagram {
  payload: Buffer;
  port: number;
  address: string;
}

/**
 * In-process stand-in for a dgram socket. Sends are recorded, inbound
 * datagrams are injected with `deliver`.
 */
export class FakeSocket extends EventEmitter implements UdpSocket {
  readonly sent: SentDatagram[] = [];
  readonly sendErrors: Error[] = [];
  bindError: Error | null = null;
  boundTo: { port: number; address: string } | null = null;
  broadcast = false;
  closed = false;

  bind(port: number, address: string, callback: () => void): void {
    if (this.bindError) {
      this.emit('error', this.bindError);
      return;
    }
    this.boundTo = { port, address };
    callback();
  }

  setBroadcast(flag: boolean): void {
    this.broadcast = flag;
  }

  send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null, bytes: number) => void): void {
    const error = this.sendErrors.shift();
    if (error) {
      callback(error, 0);
      return;
    }
    this.sent.push({ payload: Buffer.from(msg), port, address });
    callback(null, msg.length);
  }

  close(callback?: () => void): void {
    this.closed = true;
    callback?.();
  }

  deliver(payload: Buffer, address: string, port: number = 20910): void {
    this.emit('message', payload, { address, family: 'IPv4', port, size: payload.length });
  }
}

export const socketError = (message: string, code: string): Error =>
  Object.assign(new Error(message), { code });

/**
 * Socket factory that keeps every socket it hands out. The transport creates
 * the listener socket on `listen` and the sender on first `send`.
 */
export function createFakeSocketFactory() {
  const sockets: FakeSocket[] = [];
  const factory = (): FakeSocket => {
    const socket = new FakeSocket();
    sockets.push(socket);
    return socket;
  };

  return {
    factory,
    sockets,
    listener: (): FakeSocket | undefined => sockets.find(socket => socket.boundTo !== null),
    sender: (): FakeSocket | undefined => sockets.find(socket => socket.boundTo === null),
  };
}
