import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ChannelSession } from '../src/stream/channel.js';
import { buildTimelinePayload, fetchTimeline, readTimelinePage } from '../src/sync/timeline.js';
import { fakeTransportFactory, protocolResponder, type SubscriptionHandler } from './helpers/fakeTransport.js';
import { createRecordingLogger } from './helpers/recordingLogger.js';

const page = (requestId: number, body: unknown): string => `${requestId} A ${JSON.stringify(body)}`;

async function sessionFor(handler: SubscriptionHandler) {
  const factory = fakeTransportFactory(protocolResponder(handler));
  const session = await ChannelSession.connect({ transportFactory: factory });
  return { session, factory };
}

test('buildTimelinePayload only sends a cursor when there is one', () => {
  assert.deepEqual(buildTimelinePayload('test-token'), { type: 'timelineTransactions', token: 'test-token' });
  assert.deepEqual(buildTimelinePayload('test-token', 'c1'), {
    type: 'timelineTransactions',
    token: 'test-token',
    after: 'c1',
  });
});

test('readTimelinePage classifies frames', () => {
  assert.deepEqual(readTimelinePage('1 A {"items":[{"id":"t1"}],"cursors":{"after":"c1"}}'), {
    kind: 'items',
    items: [{ id: 't1' }],
    after: 'c1',
  });
  assert.deepEqual(readTimelinePage('1 A {"items":[]}'), { kind: 'end', reason: 'no-items' });
  assert.deepEqual(readTimelinePage('1 A {"cursors":{}}'), { kind: 'end', reason: 'no-items' });
  assert.deepEqual(readTimelinePage('1 C'), { kind: 'end', reason: 'malformed-frame' });
  assert.deepEqual(readTimelinePage('1 A {"items":"nope"}'), { kind: 'end', reason: 'shape-mismatch' });
});

test('a blank or non-string cursor ends pagination after the page', () => {
  const outcome = readTimelinePage('1 A {"items":[{"id":"t1"}],"cursors":{"after":"  ","before":7}}');
  assert.deepEqual(outcome, { kind: 'items', items: [{ id: 't1' }], after: undefined });
});

test('non-object entries are skipped without losing the rest of the page', () => {
  assert.deepEqual(readTimelinePage('1 A {"items":[{"id":"t1"},null,{"id":"t2"}],"cursors":{"after":"c1"}}'), {
    kind: 'items',
    items: [{ id: 't1' }, { id: 't2' }],
    after: 'c1',
  });
  assert.deepEqual(readTimelinePage('1 A {"items":[null,3,"x"]}'), { kind: 'end', reason: 'no-items' });
});

test('cursors go back to the server exactly as received', () => {
  const outcome = readTimelinePage('1 A {"items":[{"id":"t1"}],"cursors":{"after":" c 1 "}}');
  assert.deepEqual(outcome, { kind: 'items', items: [{ id: 't1' }], after: ' c 1 ' });
});

test('fetchTimeline keeps walking past a page with stray entries', async () => {
  const seenCursors: Array<unknown> = [];
  const { session } = await sessionFor((payload, requestId) => {
    seenCursors.push(payload.after);
    if (payload.after === undefined) {
      return page(requestId, { items: [{ id: 't1' }, null, { id: 't2' }], cursors: { after: ' c 1 ' } });
    }
    return page(requestId, { items: [{ id: 't3' }] });
  });

  const result = await fetchTimeline(session, { token: 'test-token' });
  await session.close();

  assert.deepEqual(
    result.items.map((item) => item.id),
    ['t1', 't2', 't3'],
  );
  assert.equal(result.pages, 2);
  assert.deepEqual(seenCursors, [undefined, ' c 1 ']);
});

test('fetchTimeline follows the cursor chain and keeps server order', async () => {
  const seenCursors: Array<unknown> = [];
  const { session, factory } = await sessionFor((payload, requestId) => {
    seenCursors.push(payload.after);
    if (payload.after === undefined) {
      return page(requestId, { items: [{ id: 't1' }, { id: 't2' }], cursors: { after: 'c1' } });
    }
    if (payload.after === 'c1') {
      return page(requestId, { items: [{ id: 't3' }], cursors: { after: 'c2' } });
    }
    return page(requestId, { items: [], cursors: {} });
  });

  const result = await fetchTimeline(session, { token: 'test-token' });
  await session.close();

  assert.deepEqual(
    result.items.map((item) => item.id),
    ['t1', 't2', 't3'],
  );
  assert.equal(result.pages, 2);
  assert.deepEqual(seenCursors, [undefined, 'c1', 'c2']);
  assert.equal(factory.transports[0]?.sent.filter((frame) => frame.startsWith('sub ')).length, 3);
});

test('a page without cursor is the last one', async () => {
  let subscriptions = 0;
  const { session } = await sessionFor((_payload, requestId) => {
    subscriptions += 1;
    return page(requestId, { items: [{ id: 't1' }] });
  });

  const result = await fetchTimeline(session, { token: 'test-token' });
  await session.close();

  assert.equal(result.pages, 1);
  assert.equal(result.items.length, 1);
  assert.equal(subscriptions, 1);
});

test('a malformed page stops pagination with the items collected so far', async () => {
  const logger = createRecordingLogger();
  const { session } = await sessionFor((payload, requestId) =>
    payload.after === undefined
      ? page(requestId, { items: [{ id: 't1' }], cursors: { after: 'c1' } })
      : `${requestId} A {"items": [`,
  );

  const result = await fetchTimeline(session, { token: 'test-token', logger });
  await session.close();

  assert.deepEqual(result, { items: [{ id: 't1' }], pages: 1 });
  assert.deepEqual(
    logger.entries.filter((entry) => entry.level === 'warn').map((entry) => entry.message),
    ['[timeline] página descartada (malformed-frame); se detiene la paginación'],
  );
});

test('details are requested per item only when enabled', async () => {
  const types: string[] = [];
  const { session } = await sessionFor((payload, requestId) => {
    types.push(String(payload.type));
    if (payload.type === 'timelineDetailV2') {
      return page(requestId, {
        sections: [{ title: 'Transaction', data: [{ title: 'Fee', detail: { text: `fee-${String(payload.id)}` } }] }],
      });
    }
    return page(requestId, { items: [{ id: 't1' }, { title: 'sin id' }] });
  });

  const result = await fetchTimeline(session, { token: 'test-token', extractDetails: true });
  await session.close();

  assert.deepEqual(result.items, [{ id: 't1', Fee: 'fee-t1' }, { title: 'sin id' }]);
  assert.deepEqual(types, ['timelineTransactions', 'timelineDetailV2']);
});
