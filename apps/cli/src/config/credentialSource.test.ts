import test from 'node:test';

import assert from 'node:assert/strict';

import { EnvCredentialSource, InMemoryCredentialSource } from './credentialSource.js';

test('EnvCredentialSource reads the named variable', async () => {
  const source = new EnvCredentialSource({ OPENAI_API_KEY: 'test-secret' });

  assert.equal(await source.get('OPENAI_API_KEY'), 'test-secret');
  assert.equal(await source.get('OTHER_KEY'), undefined);
});

test('EnvCredentialSource treats a blank variable as absent', async () => {
  const source = new EnvCredentialSource({ OPENAI_API_KEY: '   ' });

  assert.equal(await source.get('OPENAI_API_KEY'), undefined);
});

test('InMemoryCredentialSource stores and retrieves values', async () => {
  const source = new InMemoryCredentialSource();
  source.set('LOCAL_KEY', 'placeholder');

  assert.equal(await source.get('LOCAL_KEY'), 'placeholder');
});
