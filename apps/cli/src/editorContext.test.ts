import assert from 'node:assert/strict';
import test from 'node:test';

import { inferCommentMarker, resolveSpan } from './editorContext.js';
import { CliUsageError } from './errors.js';

test('inferCommentMarker follows the file extension', () => {
  assert.equal(inferCommentMarker('src/app.PY'), '#');
  assert.equal(inferCommentMarker('init.el'), ';;');
  assert.equal(inferCommentMarker('query.sql'), '--');
  assert.equal(inferCommentMarker('notes.unknown'), '//');
  assert.equal(inferCommentMarker(undefined), '//');
});

test('inferCommentMarker prefers an explicit marker', () => {
  assert.equal(inferCommentMarker('main.py', '##'), '##');
});

test('resolveSpan defaults to the whole text', () => {
  assert.deepEqual(resolveSpan('foo bar baz'), { start: 0, end: 11 });
  assert.deepEqual(resolveSpan('foo bar baz', '4', '7'), { start: 4, end: 7 });
});

test('resolveSpan rejects malformed or out-of-range offsets', () => {
  assert.throws(() => resolveSpan('foo', '-1'), CliUsageError);
  assert.throws(() => resolveSpan('foo', '1', '9'), /Region 1-9 is outside the text \(length 3\)/);
  assert.throws(() => resolveSpan('foo', '2', '1'), CliUsageError);
  assert.throws(() => resolveSpan('foo', '2', '2'), /The selected region is empty/);
});

test('resolveSpan rejects offsets that split a two-unit character', () => {
  const text = 'a\u{1F600}b';

  assert.deepEqual(resolveSpan(text, '1', '3'), { start: 1, end: 3 });
  assert.throws(
    () => resolveSpan(text, '2', '4'),
    /--start 2 falls inside a character that takes two UTF-16 code units/,
  );
  assert.throws(() => resolveSpan(text, '0', '2'), /--end 2 falls inside/);
});
