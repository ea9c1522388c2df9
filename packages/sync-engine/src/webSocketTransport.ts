import WebSocket from 'ws';
import { TransportError } from './errors';
import { MessageQueue } from './messageQueue';
import type { TransportChannelPort, TransportStream } from './types';

/**
 * The subset of a `ws` socket the transport relies on. Tests substitute an
 * in-process emitter.
 */
export interface SocketLike {
  readonly readyState: number;
  send(data: string, callback: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
  pause(): void;
  resume(): void;
  on(event: 'open', listener: () => void): unknown;
  on(
    event: 'message',
    listener: (data: WebSocket.RawData, isBinary: boolean) => void
  ): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SocketFactory = (
  url: string,
  headers: Readonly<Record<string, string>>
) => SocketLike;

export type WebSocketTransportOptions = Readonly<{
  createSocket?: SocketFactory;
  highWaterMark?: number;
  lowWaterMark?: number;
}>;

const DEFAULT_HIGH_WATER_MARK = 256;
const DEFAULT_LOW_WATER_MARK = 64;
const OPEN_STATE = 1;
const NORMAL_CLOSURE = 1000;

const defaultSocketFactory: SocketFactory = (url, headers) =>
  new WebSocket(url, { headers: { ...headers } });

export const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
};

class WebSocketStream implements TransportStream {
  private readonly queue: MessageQueue<string>;
  private closedLocally = false;
  private consumed = false;
  readonly opened: Promise<void>;

  constructor(
    private readonly socket: SocketLike,
    options: Readonly<{ highWaterMark: number; lowWaterMark: number }>
  ) {
    this.queue = new MessageQueue<string>({
      highWaterMark: options.highWaterMark,
      lowWaterMark: options.lowWaterMark,
      onPause: () => socket.pause(),
      onResume: () => socket.resume(),
    });
    this.opened = new Promise<void>((resolve, reject) => {
      let settled = false;
      socket.on('open', () => {
        settled = true;
        resolve();
      });
      socket.on('error', (error) => {
        const failure = new TransportError('WebSocket error', { cause: error });
        if (!settled) {
          settled = true;
          reject(failure);
        }
        this.queue.fail(failure);
      });
      socket.on('close', (code, reason) => {
        const failure = new TransportError(
          `WebSocket closed with code ${code}${
            reason.length > 0 ? `: ${reason.toString('utf8')}` : ''
          }`
        );
        if (!settled) {
          settled = true;
          reject(failure);
        }
        if (this.closedLocally) {
          this.queue.end();
        } else {
          this.queue.fail(failure);
        }
      });
    });
    socket.on('message', (data) => {
      this.queue.push(rawDataToString(data));
    });
  }

  send(message: string): Promise<void> {
    if (this.closedLocally || this.socket.readyState !== OPEN_STATE) {
      return Promise.reject(new TransportError('WebSocket is not open'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(message, (error) => {
        if (error) {
          reject(
            new TransportError('Failed to write to WebSocket', { cause: error })
          );
          return;
        }
        resolve();
      });
    });
  }

  messages(): AsyncIterable<string> {
    if (this.consumed) {
      throw new TransportError('Message stream can only be consumed once');
    }
    this.consumed = true;
    return this.queue;
  }

  close(): void {
    if (this.closedLocally) return;
    this.closedLocally = true;
    this.queue.end();
    this.socket.close(NORMAL_CLOSURE, 'client closed');
  }
}

export class WebSocketTransport implements TransportChannelPort {
  private readonly createSocket: SocketFactory;
  private readonly highWaterMark: number;
  private readonly lowWaterMark: number;

  constructor(options: WebSocketTransportOptions = {}) {
    this.createSocket = options.createSocket ?? defaultSocketFactory;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    this.lowWaterMark = options.lowWaterMark ?? DEFAULT_LOW_WATER_MARK;
  }

  async open(
    endpoint: string,
    credentials: string | null
  ): Promise<TransportStream> {
    const headers: Record<string, string> = credentials
      ? { authorization: `Bearer ${credentials}` }
      : {};
    let socket: SocketLike;
    try {
      socket = this.createSocket(endpoint, headers);
    } catch (error) {
      throw new TransportError(`Cannot connect to ${endpoint}`, {
        cause: error,
      });
    }
    const stream = new WebSocketStream(socket, {
      highWaterMark: this.highWaterMark,
      lowWaterMark: this.lowWaterMark,
    });
    await stream.opened;
    return stream;
  }
}
