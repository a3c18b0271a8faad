import WebSocket from 'ws';

import { RECEIVE_TIMEOUT_MS } from '../config.js';
import { ChannelClosedError, ChannelTimeoutError, ConnectionError } from '../errors.js';
import { toText } from '../utils/payload.js';

/**
 * Text-frame transport underneath a channel session. Frames are delivered in
 * arrival order; `receive` hands out one frame per call.
 */
export interface ChannelTransport {
  send(frame: string): Promise<void>;
  receive(): Promise<string>;
  close(): Promise<void>;
}

export type TransportFactory = () => Promise<ChannelTransport>;

export type WebSocketTransportOptions = {
  readonly receiveTimeoutMs?: number;
  readonly handshakeTimeoutMs?: number;
  readonly headers?: Readonly<Record<string, string>>;
};

type Waiter = {
  readonly resolve: (frame: string) => void;
  readonly reject: (error: Error) => void;
  readonly timer: NodeJS.Timeout;
};

export class WebSocketTransport implements ChannelTransport {
  private readonly inbox: string[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: Error | null = null;

  private constructor(
    private readonly socket: WebSocket,
    private readonly receiveTimeoutMs: number,
  ) {
    socket.on('message', (data: WebSocket.RawData) => this.push(toText(data)));
    socket.on('close', (code: number) => {
      this.fail(new ChannelClosedError(`El servidor cerró el canal (código ${code}).`));
    });
    socket.on('error', (error: Error) => {
      this.fail(new ConnectionError(`Error en el canal: ${error.message}`, { cause: error }));
    });
  }

  static open(url: string, options: WebSocketTransportOptions = {}): Promise<WebSocketTransport> {
    const { receiveTimeoutMs = RECEIVE_TIMEOUT_MS, handshakeTimeoutMs = receiveTimeoutMs, headers } = options;

    return new Promise<WebSocketTransport>((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: handshakeTimeoutMs, headers: { ...headers } });

      const onError = (error: Error) => {
        reject(new ConnectionError(`No se pudo abrir el canal ${url}: ${error.message}`, { cause: error }));
      };
      const onOpen = () => {
        socket.off('error', onError);
        resolve(new WebSocketTransport(socket, receiveTimeoutMs));
      };

      socket.once('open', onOpen);
      socket.on('error', onError);
    });
  }

  send(frame: string): Promise<void> {
    if (this.failure || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(this.failure ?? new ChannelClosedError());
    }

    return new Promise<void>((resolve, reject) => {
      this.socket.send(frame, (error?: Error) => {
        if (error) {
          reject(new ConnectionError(`No se pudo enviar la trama: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  receive(): Promise<string> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new ChannelTimeoutError(this.receiveTimeoutMs));
      }, this.receiveTimeoutMs);
      const waiter: Waiter = { resolve, reject, timer };
      this.waiters.push(waiter);
    });
  }

  async close(): Promise<void> {
    this.fail(new ChannelClosedError());
    if (this.socket.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.close(1000);
    });
  }

  private push(frame: string): void {
    const waiter = this.waiters.shift();
    if (!waiter) {
      this.inbox.push(frame);
      return;
    }
    clearTimeout(waiter.timer);
    waiter.resolve(frame);
  }

  private fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
  }
}

export const webSocketTransportFactory =
  (url: string, options: WebSocketTransportOptions = {}): TransportFactory =>
  () =>
    WebSocketTransport.open(url, options);
