import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ChannelSession } from '../src/stream/channel.js';
import { fetchAvailableCash, readCashPositions } from '../src/sync/cash.js';
import { fakeTransportFactory, protocolResponder } from './helpers/fakeTransport.js';

test('readCashPositions returns the records of the array payload', () => {
  assert.deepEqual(readCashPositions('3 A [{"accountNumber":"A1","currencyId":"EUR","amount":12.5},7]'), [
    { accountNumber: 'A1', currencyId: 'EUR', amount: 12.5 },
  ]);
});

test('readCashPositions yields nothing for error or empty frames', () => {
  assert.deepEqual(readCashPositions('3 E {"errors":[{"errorCode":"AUTHENTICATION_ERROR"}]}'), []);
  assert.deepEqual(readCashPositions('3 C'), []);
  assert.deepEqual(readCashPositions('3 A [oops'), []);
});

test('fetchAvailableCash subscribes once with the session token', async () => {
  const payloads: unknown[] = [];
  const factory = fakeTransportFactory(
    protocolResponder((payload, requestId) => {
      payloads.push(payload);
      return `${requestId} A [{"currencyId":"EUR","amount":100}]`;
    }),
  );
  const session = await ChannelSession.connect({ transportFactory: factory });

  const cash = await fetchAvailableCash(session, 'test-token');
  await session.close();

  assert.deepEqual(cash, [{ currencyId: 'EUR', amount: 100 }]);
  assert.deepEqual(payloads, [{ type: 'availableCash', token: 'test-token' }]);
});
