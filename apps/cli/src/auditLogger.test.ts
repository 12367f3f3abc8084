import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { rm } from 'node:fs/promises';
import test from 'node:test';

import assert from 'node:assert/strict';

import { AuditLogger } from './auditLogger.js';
import type { ExecutionTelemetry } from './types.js';

function createTempFile(): string {
  const dir = mkdtempSync(join(tmpdir(), 'region-complete-audit-'));
  return join(dir, 'audit.log');
}

function createEntry(command: string): ExecutionTelemetry {
  return {
    command,
    profile: 'default',
    startedAt: '2024-01-01T00:00:00.000Z',
    finishedAt: '2024-01-01T00:00:01.000Z',
    status: 'success',
    inputBytes: 10,
    outputBytes: 8,
  };
}

test('AuditLogger appends telemetry entries to a JSONL file', async () => {
  const filePath = createTempFile();
  const logger = new AuditLogger();

  try {
    await logger.record(createEntry('fix'), filePath);
    await logger.record(createEntry('explain'), filePath);

    const lines = readFileSync(filePath, 'utf-8').trim().split('\n');
    assert.deepEqual(lines, [
      JSON.stringify(createEntry('fix')),
      JSON.stringify(createEntry('explain')),
    ]);
  } finally {
    await rm(dirname(filePath), { recursive: true, force: true });
  }
});

test('AuditLogger falls back to the configured file and can overwrite it', async () => {
  const filePath = createTempFile();
  const logger = new AuditLogger({ defaultLogFile: filePath, append: false });

  try {
    await logger.record(createEntry('fix'));
    await logger.record(createEntry('tests'));

    assert.equal(readFileSync(filePath, 'utf-8'), `${JSON.stringify(createEntry('tests'))}\n`);
  } finally {
    await rm(dirname(filePath), { recursive: true, force: true });
  }
});

test('AuditLogger writes nothing without a target file', async () => {
  const logger = new AuditLogger();
  await logger.record(createEntry('ask'));
});
