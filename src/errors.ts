export type ExportErrorCode =
  | 'CONNECTION_FAILED'
  | 'CHANNEL_TIMEOUT'
  | 'CHANNEL_CLOSED'
  | 'INVALID_CONFIG'
  | 'LOGIN_FAILED';

export class ExportError extends Error {
  public readonly code: ExportErrorCode;

  constructor(code: ExportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConnectionError extends ExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_FAILED', message, options);
  }
}

export class ChannelTimeoutError extends ExportError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('CHANNEL_TIMEOUT', `No se recibió respuesta del canal en ${timeoutMs} ms.`);
    this.timeoutMs = timeoutMs;
  }
}

export class ChannelClosedError extends ExportError {
  constructor(message = 'El canal ya está cerrado.') {
    super('CHANNEL_CLOSED', message);
  }
}

export class ConfigError extends ExportError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export class LoginError extends ExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOGIN_FAILED', message, options);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
