import { DETAIL_SECTION_TITLE, SUBSCRIPTION_TYPES } from '../config.js';
import type { ChannelSession } from '../stream/channel.js';
import { extractFrame, framePayload } from '../utils/payload.js';
import { DetailEntry, DetailSection, TransactionDetail, type TransactionItem } from './schemas.js';

export type TransactionDetails = Record<string, string>;

/** `title -> detail.text` of the "Transaction" section of a detail frame. */
export function collectTransactionSection(payload: unknown): TransactionDetails {
  const details: TransactionDetails = {};
  const parsed = TransactionDetail.safeParse(payload);
  if (!parsed.success) {
    return details;
  }

  for (const rawSection of parsed.data.sections ?? []) {
    const section = DetailSection.safeParse(rawSection);
    if (!section.success || section.data.title !== DETAIL_SECTION_TITLE) {
      continue;
    }
    for (const rawEntry of section.data.data ?? []) {
      const entry = DetailEntry.safeParse(rawEntry);
      if (!entry.success) {
        continue;
      }
      const { title } = entry.data;
      const text = entry.data.detail?.text;
      if (title && text) {
        details[title] = text;
      }
    }
  }

  return details;
}

export async function fetchTransactionDetails(
  session: ChannelSession,
  transactionId: string,
  token: string,
): Promise<TransactionDetails> {
  const raw = await session.request({ type: SUBSCRIPTION_TYPES.transactionDetail, id: transactionId, token });
  return collectTransactionSection(framePayload(extractFrame(raw, 'object'), 'object'));
}

export const transactionIdOf = (item: TransactionItem): string | undefined => {
  const { id } = item;
  if (typeof id === 'number') {
    return Number.isFinite(id) && id !== 0 ? String(id) : undefined;
  }
  if (typeof id !== 'string') {
    return undefined;
  }
  return id.trim() ? id : undefined;
};

/**
 * Merges the detail mapping over the item's top-level keys. Items without an
 * id are returned untouched and cost no subscription.
 */
export async function enrichTransaction(
  session: ChannelSession,
  item: TransactionItem,
  token: string,
): Promise<TransactionItem> {
  const transactionId = transactionIdOf(item);
  if (!transactionId) {
    return item;
  }
  const details = await fetchTransactionDetails(session, transactionId, token);
  return Object.assign(item, details);
}
