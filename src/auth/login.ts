import { z } from 'zod';

import type { Logger } from '../bootstrap/logger.js';
import { noopLogger } from '../bootstrap/logger.js';
import { API_BASE_URL, HTTP_USER_AGENT, LOGIN_PATH, SESSION_COOKIE } from '../config.js';
import { describeError, LoginError } from '../errors.js';
import { parseSetCookie, readSetCookieHeaders } from './cookies.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type Credentials = {
  readonly phoneNumber: string;
  readonly pin: string;
};

const LoginStartResponse = z
  .object({
    processId: z.string().trim().min(1).optional(),
    countdownInSeconds: z.number().finite().optional(),
  })
  .passthrough();

export type LoginStart = {
  readonly processId: string;
  readonly countdownInSeconds?: number;
};

export type LoginClientOptions = {
  readonly fetch?: FetchLike;
  readonly baseUrl?: string;
  readonly userAgent?: string;
};

/** The three HTTP calls of the web login: start, optional SMS resend, device verification. */
export class LoginClient {
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;
  private readonly userAgent: string;

  constructor(options: LoginClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.baseUrl = options.baseUrl ?? API_BASE_URL;
    this.userAgent = options.userAgent ?? HTTP_USER_AGENT;
  }

  async start(credentials: Credentials): Promise<LoginStart> {
    const response = await this.post(LOGIN_PATH, {
      phoneNumber: credentials.phoneNumber,
      pin: credentials.pin,
    });

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new LoginError('La respuesta del inicio de sesión no es JSON válido.', { cause: error });
    }

    const parsed = LoginStartResponse.safeParse(body);
    const processId = parsed.success ? parsed.data.processId : undefined;
    if (!processId) {
      throw new LoginError('Falló el inicio de la conexión. Verifica tu número de teléfono y tu PIN.');
    }
    return { processId, countdownInSeconds: parsed.success ? parsed.data.countdownInSeconds : undefined };
  }

  async resend(processId: string): Promise<void> {
    const response = await this.post(`${LOGIN_PATH}/${encodeURIComponent(processId)}/resend`);
    if (!response.ok) {
      throw new LoginError(`No se pudo reenviar el código por SMS (HTTP ${response.status}).`);
    }
  }

  /** Confirms the device with the 2FA code and returns the session token. */
  async verify(processId: string, code: string): Promise<string> {
    const response = await this.post(
      `${LOGIN_PATH}/${encodeURIComponent(processId)}/${encodeURIComponent(code.trim())}`,
    );
    if (response.status !== 200) {
      throw new LoginError('Falló la verificación del dispositivo. Revisa el código e inténtalo de nuevo.');
    }

    const cookies = parseSetCookie(readSetCookieHeaders(response.headers));
    const token = cookies[SESSION_COOKIE];
    if (!token) {
      throw new LoginError('No se encontró el token de sesión en la respuesta.');
    }
    return token;
  }

  private async post(pathname: string, body?: Record<string, unknown>): Promise<Response> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    if (body) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      return await this.fetchImpl(`${this.baseUrl}${pathname}`, {
        method: 'POST',
        headers,
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (error) {
      throw new LoginError(`Error de red durante el inicio de sesión: ${describeError(error)}`, { cause: error });
    }
  }
}

export type Prompt = (question: string) => Promise<string>;

export const SMS_KEYWORD = 'SMS';

/**
 * Full interactive login: start, ask for the 2FA code (`SMS` asks the server
 * to resend it by text message and prompts again), verify, return the token.
 */
export async function interactiveLogin(
  client: LoginClient,
  credentials: Credentials,
  prompt: Prompt,
  logger: Logger = noopLogger,
): Promise<string> {
  const { processId, countdownInSeconds } = await client.start(credentials);

  const remaining = countdownInSeconds === undefined ? '' : ` (${countdownInSeconds} segundos restantes)`;
  let code = (await prompt(`❓ Introduce el código 2FA recibido${remaining} o escribe '${SMS_KEYWORD}': `)).trim();

  if (code.toUpperCase() === SMS_KEYWORD) {
    await client.resend(processId);
    code = (await prompt('❓ Introduce el código 2FA recibido por SMS: ')).trim();
  }

  const token = await client.verify(processId, code);
  logger.info('✅ Dispositivo verificado y token de sesión obtenido.');
  return token;
}
