import type { Logger } from '../bootstrap/logger.js';
import { noopLogger } from '../bootstrap/logger.js';
import { registerCloser } from '../bootstrap/signals.js';
import {
  CONNECT_ATTEMPTS,
  DEFAULT_CONNECT_METADATA,
  PROTOCOL_VERSION,
  REQUEST_ATTEMPTS,
  type ConnectMetadata,
} from '../config.js';
import { ChannelClosedError, ChannelTimeoutError, ConnectionError, describeError } from '../errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import {
  connectFrame,
  describeFrame,
  parseFrameHeader,
  subscribeFrame,
  unsubscribeFrame,
  type SubscriptionPayload,
} from './protocol.js';
import type { ChannelTransport, TransportFactory } from './transport.js';

export type ChannelOptions = {
  readonly transportFactory: TransportFactory;
  readonly metadata?: ConnectMetadata;
  readonly protocolVersion?: number;
  readonly connectAttempts?: number;
  readonly requestAttempts?: number;
  readonly retry?: Partial<Omit<RetryOptions, 'attempts' | 'shouldRetry' | 'logger'>>;
  readonly logger?: Logger;
};

const isTimeout = (error: unknown): boolean => error instanceof ChannelTimeoutError;

const isConnectFailure = (error: unknown): boolean =>
  error instanceof ConnectionError || error instanceof ChannelTimeoutError;

/**
 * One live connection to the streaming endpoint. Requests are strictly
 * sequential: a subscription is answered and unsubscribed before the next one
 * is sent, so response frames are attributed by arrival order and the id the
 * server echoes back.
 */
export class ChannelSession {
  private lastRequestId = 0;
  private isClosed = false;
  private readonly logger: Logger;

  private constructor(
    private readonly transport: ChannelTransport,
    private readonly options: ChannelOptions,
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  static async connect(options: ChannelOptions): Promise<ChannelSession> {
    const logger = options.logger ?? noopLogger;
    const metadata = options.metadata ?? DEFAULT_CONNECT_METADATA;
    const version = options.protocolVersion ?? PROTOCOL_VERSION;

    const attempt = async (): Promise<ChannelSession> => {
      const transport = await options.transportFactory();
      try {
        await transport.send(connectFrame(version, metadata));
        const reply = await transport.receive();
        logger.debug('[channel] handshake completado', describeFrame(reply));
      } catch (error) {
        await transport.close();
        if (isConnectFailure(error)) {
          throw error;
        }
        throw new ConnectionError(`Falló el handshake del canal: ${describeError(error)}`, { cause: error });
      }
      return new ChannelSession(transport, options);
    };

    try {
      return await withRetry('connect', attempt, {
        ...options.retry,
        attempts: options.connectAttempts ?? CONNECT_ATTEMPTS,
        shouldRetry: isConnectFailure,
        logger,
      });
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(`No se pudo conectar al canal: ${describeError(error)}`, { cause: error });
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  nextRequestId(): number {
    this.lastRequestId += 1;
    return this.lastRequestId;
  }

  async subscribe(requestId: number, payload: SubscriptionPayload): Promise<string> {
    await this.send(subscribeFrame(requestId, payload));
    const response = await this.receiveFor(requestId);
    const header = parseFrameHeader(response);
    if (header?.status === 'E') {
      this.logger.warn(`[channel] la suscripción ${requestId} (${payload.type}) devolvió un error`, describeFrame(response));
    }
    return response;
  }

  async unsubscribe(requestId: number): Promise<void> {
    await this.send(unsubscribeFrame(requestId));
    await this.receiveFor(requestId);
  }

  /**
   * Subscribe, read the single response and unsubscribe. A timed-out attempt
   * retires its id without waiting for the acknowledgement and retries with
   * a fresh id; late frames for the retired id are discarded by `receiveFor`.
   */
  async request(payload: SubscriptionPayload): Promise<string> {
    return withRetry(
      payload.type,
      async () => {
        const requestId = this.nextRequestId();
        let response: string;
        try {
          response = await this.subscribe(requestId, payload);
        } catch (error) {
          if (isTimeout(error) && !this.isClosed) {
            await this.send(unsubscribeFrame(requestId));
          }
          throw error;
        }
        await this.unsubscribe(requestId);
        return response;
      },
      {
        ...this.options.retry,
        attempts: this.options.requestAttempts ?? REQUEST_ATTEMPTS,
        shouldRetry: isTimeout,
        logger: this.logger,
      },
    );
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    await this.transport.close();
    this.logger.debug('[channel] canal cerrado', { requests: this.lastRequestId });
  }

  private async send(frame: string): Promise<void> {
    if (this.isClosed) {
      throw new ChannelClosedError();
    }
    this.logger.debug('[channel] >>', describeFrame(frame));
    await this.transport.send(frame);
  }

  private async receiveFor(requestId: number): Promise<string> {
    for (;;) {
      const frame = await this.transport.receive();
      const header = parseFrameHeader(frame);
      if (header && header.requestId !== requestId) {
        this.logger.debug(`[channel] trama descartada de la suscripción ${header.requestId}`, describeFrame(frame));
        continue;
      }
      this.logger.debug('[channel] <<', describeFrame(frame));
      return frame;
    }
  }
}

/**
 * Opens a channel for the duration of `task` and always closes it, also when
 * the process receives SIGINT/SIGTERM while the task runs.
 */
export async function withChannel<T>(
  options: ChannelOptions,
  task: (session: ChannelSession) => Promise<T>,
): Promise<T> {
  const session = await ChannelSession.connect(options);
  const unregister = registerCloser(() => session.close());
  try {
    return await task(session);
  } finally {
    unregister();
    await session.close();
  }
}
