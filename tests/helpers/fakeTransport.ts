import { ChannelClosedError, ChannelTimeoutError } from '../../src/errors.js';
import { isRecord } from '../../src/utils/payload.js';
import type { ChannelTransport, TransportFactory } from '../../src/stream/transport.js';

/** Replies queued for one outgoing frame; an empty list makes the next receive time out. */
export type Responder = (frame: string) => readonly string[];

/**
 * In-process stand-in for the streaming socket. Every sent frame is recorded
 * and answered synchronously by the responder; a receive with nothing queued
 * fails like a real timeout would.
 */
export class FakeTransport implements ChannelTransport {
  public readonly sent: string[] = [];
  public closed = false;
  private readonly inbox: string[] = [];

  constructor(private readonly responder: Responder) {}

  async send(frame: string): Promise<void> {
    if (this.closed) {
      throw new ChannelClosedError();
    }
    this.sent.push(frame);
    this.inbox.push(...this.responder(frame));
  }

  async receive(): Promise<string> {
    const next = this.inbox.shift();
    if (next === undefined) {
      throw new ChannelTimeoutError(5);
    }
    return next;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export type FakeTransportFactory = TransportFactory & { readonly transports: FakeTransport[] };

export function fakeTransportFactory(responder: Responder): FakeTransportFactory {
  const transports: FakeTransport[] = [];
  const factory = async (): Promise<FakeTransport> => {
    const transport = new FakeTransport(responder);
    transports.push(transport);
    return transport;
  };
  return Object.assign(factory, { transports });
}

const SUB_FRAME = /^sub (\d+) (.*)$/s;
const UNSUB_FRAME = /^unsub (\d+)$/;

export type SubscriptionHandler = (payload: Record<string, unknown>, requestId: number) => string | readonly string[];

/**
 * Speaks the server side of the protocol: acknowledges `connect`, answers
 * each `sub` through `onSubscribe` and acknowledges each `unsub` with `C`.
 */
export function protocolResponder(onSubscribe: SubscriptionHandler): Responder {
  return (frame) => {
    if (frame.startsWith('connect ')) {
      return ['connected'];
    }
    const unsub = UNSUB_FRAME.exec(frame);
    if (unsub) {
      return [`${unsub[1]} C`];
    }
    const sub = SUB_FRAME.exec(frame);
    if (sub) {
      const requestId = Number(sub[1]);
      const payload: unknown = JSON.parse(sub[2] ?? '{}');
      const reply = onSubscribe(isRecord(payload) ? payload : {}, requestId);
      return typeof reply === 'string' ? [reply] : reply;
    }
    return [];
  };
}

export const noSleep = async (): Promise<void> => {};
