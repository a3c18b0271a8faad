import type { Logger } from '../bootstrap/logger.js';
import { noopLogger } from '../bootstrap/logger.js';
import { SUBSCRIPTION_TYPES } from '../config.js';
import type { ChannelSession } from '../stream/channel.js';
import type { SubscriptionPayload } from '../stream/protocol.js';
import { extractFrame, isRecord } from '../utils/payload.js';
import { enrichTransaction } from './details.js';
import { TimelinePage, type TransactionItem } from './schemas.js';

export type PaginationState = 'START' | 'FETCHING' | 'DONE';

export type PageOutcome =
  | { readonly kind: 'items'; readonly items: TransactionItem[]; readonly after?: string }
  | { readonly kind: 'end'; readonly reason: 'malformed-frame' | 'shape-mismatch' | 'no-items' };

export type TimelineOptions = {
  readonly token: string;
  readonly extractDetails?: boolean;
  readonly logger?: Logger;
};

export type TimelineResult = {
  readonly items: TransactionItem[];
  readonly pages: number;
};

export const buildTimelinePayload = (token: string, after?: string): SubscriptionPayload =>
  after
    ? { type: SUBSCRIPTION_TYPES.transactions, token, after }
    : { type: SUBSCRIPTION_TYPES.transactions, token };

export function readTimelinePage(raw: string): PageOutcome {
  const frame = extractFrame(raw, 'object');
  if (frame.kind === 'empty') {
    return { kind: 'end', reason: 'malformed-frame' };
  }

  const page = TimelinePage.safeParse(frame.value);
  if (!page.success) {
    return { kind: 'end', reason: 'shape-mismatch' };
  }

  // Stray non-object entries are skipped; the rest of the page still counts.
  const items = (page.data.items ?? []).filter(isRecord);
  if (items.length === 0) {
    return { kind: 'end', reason: 'no-items' };
  }

  return { kind: 'items', items, after: page.data.cursors?.after };
}

/**
 * Walks the cursor chain of the transaction timeline until a page comes back
 * without items or without a continuation cursor. Pages and the items inside
 * them keep server order.
 */
export async function fetchTimeline(session: ChannelSession, options: TimelineOptions): Promise<TimelineResult> {
  const { token, extractDetails = false, logger = noopLogger } = options;
  const items: TransactionItem[] = [];
  let state: PaginationState = 'START';
  let cursor: string | undefined;
  let pages = 0;

  while (state !== 'DONE') {
    state = 'FETCHING';
    const raw = await session.request(buildTimelinePayload(token, cursor));
    const outcome = readTimelinePage(raw);

    if (outcome.kind === 'end') {
      if (outcome.reason !== 'no-items') {
        logger.warn(`[timeline] página descartada (${outcome.reason}); se detiene la paginación`);
      }
      state = 'DONE';
      continue;
    }

    pages += 1;
    for (const item of outcome.items) {
      items.push(extractDetails ? await enrichTransaction(session, item, token) : item);
    }
    logger.debug(`[timeline] página ${pages}`, { items: outcome.items.length, total: items.length });

    if (!outcome.after) {
      state = 'DONE';
      continue;
    }
    cursor = outcome.after;
  }

  return { items, pages };
}
