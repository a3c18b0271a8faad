import type { ConnectMetadata } from '../config.js';

export type SubscriptionPayload = Readonly<Record<string, unknown>> & { readonly type: string };

/** Status token the server places after the echoed request id. */
export type FrameStatus = 'A' | 'D' | 'C' | 'E';

export type FrameHeader = {
  readonly requestId: number;
  readonly status: FrameStatus;
};

const FRAME_HEADER = /^\s*(\d+)\s+([ADCE])(?=\s|$)/;

export const connectFrame = (version: number, metadata: ConnectMetadata): string =>
  `connect ${version} ${JSON.stringify(metadata)}`;

export const subscribeFrame = (requestId: number, payload: SubscriptionPayload): string =>
  `sub ${requestId} ${JSON.stringify(payload)}`;

export const unsubscribeFrame = (requestId: number): string => `unsub ${requestId}`;

export function parseFrameHeader(raw: string): FrameHeader | null {
  const match = FRAME_HEADER.exec(raw);
  if (!match) {
    return null;
  }
  const [, id, status] = match;
  const requestId = Number.parseInt(id ?? '', 10);
  if (!Number.isSafeInteger(requestId)) {
    return null;
  }
  switch (status) {
    case 'A':
    case 'D':
    case 'C':
    case 'E':
      return { requestId, status };
    default:
      return null;
  }
}

/** Short, log-safe preview of a frame; session tokens never reach the log. */
export function describeFrame(raw: string, maxLength = 120): string {
  const redacted = raw.replace(/("token"\s*:\s*")[^"]*(")/g, '$1***$2');
  return redacted.length > maxLength ? `${redacted.slice(0, maxLength)}…` : redacted;
}
