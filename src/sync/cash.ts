import { SUBSCRIPTION_TYPES } from '../config.js';
import type { ChannelSession } from '../stream/channel.js';
import { parseFrameHeader } from '../stream/protocol.js';
import { extractFrame, isRecord } from '../utils/payload.js';

export type CashPosition = Record<string, unknown>;

export function readCashPositions(raw: string): CashPosition[] {
  // Error frames carry an `errors` array that would otherwise pass for positions.
  if (parseFrameHeader(raw)?.status === 'E') {
    return [];
  }
  const frame = extractFrame(raw, 'array');
  if (frame.kind === 'empty') {
    return [];
  }
  return frame.value.filter(isRecord);
}

export async function fetchAvailableCash(session: ChannelSession, token: string): Promise<CashPosition[]> {
  const raw = await session.request({ type: SUBSCRIPTION_TYPES.availableCash, token });
  return readCashPositions(raw);
}
