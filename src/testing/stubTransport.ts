import { DatagramTransport } from '@/coordinator/Coordinator';
import { DatagramStream } from '@/transport/UdpTransport';

/**
 * Transport double for coordinator-level tests: sends are recorded and
 * inbound datagrams are pushed straight onto the stream.
 */
export class StubTransport implements DatagramTransport {
  readonly sent: Array<{ payload: Buffer; host: string; port?: number }> = [];
  readonly stream = new DatagramStream(256, () => undefined);

  send = jest.fn(async (payload: Buffer, host: string, port?: number) => {
    this.sent.push({ payload, host, port });
  });

  listen = jest.fn(async (port?: number) => {
    void port;
    return this.stream;
  });

  close = jest.fn(async () => {
    this.stream.close();
  });

  isListening = jest.fn(() => !this.stream.isClosed());

  sentHex(): string[] {
    return this.sent.map(datagram => datagram.payload.toString('hex'));
  }

  lastSentHex(): string | undefined {
    return this.sentHex().at(-1);
  }
}

export const flush = () => new Promise<void>(resolve => setImmediate(resolve));
