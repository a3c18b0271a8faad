import assert from 'node:assert/strict';
import { test } from 'node:test';

import { extractFrame, framePayload, toText } from '../src/utils/payload.js';

test('extractFrame slices from the first opening to the last closing brace', () => {
  const result = extractFrame('7 A {"items":[{"id":"t1"}],"cursors":{}}', 'object');
  assert.deepEqual(result, { kind: 'parsed', value: { items: [{ id: 't1' }], cursors: {} } });
});

test('extractFrame reads array payloads', () => {
  const result = extractFrame('3 A [{"amount":1},{"amount":2}]', 'array');
  assert.deepEqual(result, { kind: 'parsed', value: [{ amount: 1 }, { amount: 2 }] });
});

test('frames without delimiters are empty, never an error', () => {
  assert.deepEqual(extractFrame('5 C', 'object'), { kind: 'empty', reason: 'no-delimiter' });
  assert.deepEqual(extractFrame('connected', 'array'), { kind: 'empty', reason: 'no-delimiter' });
  assert.deepEqual(extractFrame('} {', 'object'), { kind: 'empty', reason: 'no-delimiter' });
});

test('invalid json between the delimiters is empty', () => {
  assert.deepEqual(extractFrame('1 A {"items": [}', 'object'), { kind: 'empty', reason: 'invalid-json' });
});

test('an array frame has no object payload', () => {
  assert.deepEqual(extractFrame('1 A [1,2]', 'object'), { kind: 'empty', reason: 'no-delimiter' });
});

test('array extraction takes the outermost brackets, even inside an object', () => {
  assert.deepEqual(extractFrame('4 E {"errors":[{"errorCode":"AUTH"}]}', 'array'), {
    kind: 'parsed',
    value: [{ errorCode: 'AUTH' }],
  });
});

test('re-extracting the serialized payload yields the same value', () => {
  const first = extractFrame('2 A {"a":{"b":[1,2,{"c":"}"}]}}', 'object');
  assert.equal(first.kind, 'parsed');
  const again = extractFrame(JSON.stringify(framePayload(first, 'object')), 'object');
  assert.deepEqual(again, first);
});

test('surrounding protocol noise does not change the extracted payload', () => {
  const json = '{"items":[{"id":"t1","note":"a [b] c"}]}';
  assert.deepEqual(extractFrame(`12 A ${json}\n`, 'object'), extractFrame(json, 'object'));
});

test('framePayload falls back to an empty container of the requested shape', () => {
  assert.deepEqual(framePayload(extractFrame('5 C', 'object'), 'object'), {});
  assert.deepEqual(framePayload(extractFrame('5 C', 'array'), 'array'), []);
});

test('toText decodes buffers and fragmented messages', () => {
  assert.equal(toText(Buffer.from('1 A {}')), '1 A {}');
  assert.equal(toText([Buffer.from('1 A '), Buffer.from('[]')]), '1 A []');
  assert.equal(toText(null), '');
});
