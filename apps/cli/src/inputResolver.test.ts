import { writeFileSync } from 'node:fs';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { Readable } from 'node:stream';
import test from 'node:test';

import assert from 'node:assert/strict';

import { InputResolveError, InputResolver, type TextSource } from './inputResolver.js';

function createTempFile(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'region-complete-cli-'));
  const file = join(dir, 'input.py');
  writeFileSync(file, content, 'utf-8');
  return file;
}

test('InputResolver resolves inline text source', async () => {
  const resolver = new InputResolver();
  const source: TextSource = { kind: 'inline', value: 'Hello' };

  const result = await resolver.resolve(source);

  assert.equal(result.text, 'Hello');
  assert.deepEqual(result.metadata, { source: 'inline', bytes: 5 });
});

test('InputResolver resolves file source without altering whitespace', async () => {
  const filePath = createTempFile('  x = 1\n');
  const resolver = new InputResolver();
  const source: TextSource = { kind: 'file', path: filePath };

  try {
    const result = await resolver.resolve(source);
    assert.equal(result.text, '  x = 1\n');
    assert.equal(result.metadata.source, 'file');
    assert.equal(result.metadata.filePath, filePath);
  } finally {
    rmSync(dirname(filePath), { recursive: true, force: true });
  }
});

test('InputResolver reports unreadable files as resolve errors', async () => {
  const resolver = new InputResolver({
    readFileImpl: async () => {
      throw new Error('ENOENT: no such file or directory');
    },
  });

  await assert.rejects(resolver.resolve({ kind: 'file', path: 'missing.py' }), (error: unknown) => {
    assert.ok(error instanceof InputResolveError);
    assert.equal(error.message, "Cannot read 'missing.py': ENOENT: no such file or directory");
    return true;
  });
});

test('InputResolver reads from stdin stream', async () => {
  const resolver = new InputResolver({
    stdinFactory: () =>
      Readable.from(['stream ', 'chunk\n']),
  });

  const source: TextSource = { kind: 'stdin' };

  const result = await resolver.resolve(source);

  assert.equal(result.text, 'stream chunk\n');
  assert.equal(result.metadata.source, 'stdin');
});

test('InputResolver throws when stdin not available', async () => {
  const resolver = new InputResolver({
    stdinFactory: () => {
      const s = new Readable({ read() {} });
      s.push(null);
      return s;
    },
  });

  const source: TextSource = { kind: 'stdin' };

  await assert.rejects(
    resolver.resolve(source),
    /stdin provided no data/,
  );
});
