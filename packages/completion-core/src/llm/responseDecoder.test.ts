import assert from 'node:assert/strict';
import test from 'node:test';

import { decodeCompletionBody, decodeCompletionResponse } from './responseDecoder.js';

test('decodeCompletionResponse reads only the first choice', () => {
  const result = decodeCompletionResponse({
    id: 'cmpl-1',
    choices: [{ text: '\n\nfirst\n', index: 0 }, { text: 'second' }],
  });

  assert.deepEqual(result, { ok: true, text: 'first' });
});

test('decodeCompletionResponse accepts an empty completion string', () => {
  assert.deepEqual(decodeCompletionResponse({ choices: [{ text: '   ' }] }), { ok: true, text: '' });
});

test('decodeCompletionResponse rejects a non-string text field', () => {
  const result = decodeCompletionResponse({ choices: [{ text: null }] });

  assert.equal(result.ok, false);
  assert.equal(result.ok ? undefined : result.error.kind, 'ParsingError');
});

test('decodeCompletionBody falls back to the validation message without a server error', () => {
  const result = decodeCompletionBody(JSON.stringify({ choices: [] }), 503);

  assert.equal(result.ok, false);
  assert.equal(
    result.ok ? undefined : result.error.message,
    'Completion request failed with status 503: Unexpected completion payload: choices: choices list is empty',
  );
});

test('decodeCompletionBody keeps a completion delivered with an error status', () => {
  const result = decodeCompletionBody(JSON.stringify({ choices: [{ text: 'partial' }] }), 500);

  assert.deepEqual(result, { ok: true, text: 'partial' });
});
