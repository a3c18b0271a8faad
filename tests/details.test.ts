import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ChannelSession } from '../src/stream/channel.js';
import { collectTransactionSection, enrichTransaction, transactionIdOf } from '../src/sync/details.js';
import { fakeTransportFactory, protocolResponder } from './helpers/fakeTransport.js';

const detailPayload = {
  sections: [
    { title: 'Overview', data: [{ title: 'Status', detail: { text: 'Executed' } }] },
    {
      title: 'Transaction',
      data: [
        { title: 'Shares', detail: { text: '3' } },
        { title: 'Fee', detail: { text: '1,00 €' } },
        { title: '', detail: { text: 'ignored' } },
        { title: 'Empty', detail: { text: '' } },
        { title: 'No detail' },
        'not an entry',
      ],
    },
  ],
};

test('collectTransactionSection keeps only titled, non-empty entries of the Transaction section', () => {
  assert.deepEqual(collectTransactionSection(detailPayload), { Shares: '3', Fee: '1,00 €' });
});

test('collectTransactionSection tolerates payloads without sections', () => {
  assert.deepEqual(collectTransactionSection({}), {});
  assert.deepEqual(collectTransactionSection({ sections: 'nope' }), {});
  assert.deepEqual(collectTransactionSection(null), {});
});

test('transactionIdOf takes a non-blank string or a non-zero number', () => {
  assert.equal(transactionIdOf({ id: 'abc' }), 'abc');
  assert.equal(transactionIdOf({ id: '  ' }), undefined);
  assert.equal(transactionIdOf({ id: 42 }), '42');
  assert.equal(transactionIdOf({ id: 0 }), undefined);
  assert.equal(transactionIdOf({ id: Number.NaN }), undefined);
  assert.equal(transactionIdOf({ id: true }), undefined);
  assert.equal(transactionIdOf({}), undefined);
});

test('enrichTransaction overwrites top-level keys with detail values', async () => {
  const sentTypes: unknown[] = [];
  const factory = fakeTransportFactory(
    protocolResponder((payload, requestId) => {
      sentTypes.push(payload);
      return `${requestId} A ${JSON.stringify({
        sections: [{ title: 'Transaction', data: [{ title: 'status', detail: { text: 'Completed' } }] }],
      })}`;
    }),
  );
  const session = await ChannelSession.connect({ transportFactory: factory });

  const item = await enrichTransaction(session, { id: 'tx-1', status: 'PENDING', amount: { value: 5 } }, 'test-token');
  await session.close();

  assert.deepEqual(item, { id: 'tx-1', status: 'Completed', amount: { value: 5 } });
  assert.deepEqual(sentTypes, [{ type: 'timelineDetailV2', id: 'tx-1', token: 'test-token' }]);
});

test('a detail frame without payload leaves the item as it was', async () => {
  const factory = fakeTransportFactory(protocolResponder((_payload, requestId) => `${requestId} C`));
  const session = await ChannelSession.connect({ transportFactory: factory });

  const item = await enrichTransaction(session, { id: 'tx-2', status: 'OK' }, 'test-token');
  await session.close();

  assert.deepEqual(item, { id: 'tx-2', status: 'OK' });
});

test('numeric ids are requested as text', async () => {
  const sent: unknown[] = [];
  const factory = fakeTransportFactory(
    protocolResponder((payload, requestId) => {
      sent.push(payload);
      return `${requestId} A ${JSON.stringify({
        sections: [{ title: 'Transaction', data: [{ title: 'Shares', detail: { text: '2' } }] }],
      })}`;
    }),
  );
  const session = await ChannelSession.connect({ transportFactory: factory });

  const item = await enrichTransaction(session, { id: 42 }, 'test-token');
  await session.close();

  assert.deepEqual(item, { id: 42, Shares: '2' });
  assert.deepEqual(sent, [{ type: 'timelineDetailV2', id: '42', token: 'test-token' }]);
});
