import assert from 'node:assert/strict';
import test from 'node:test';

import { OutputFormatter } from './outputFormatter.js';
import type { CommandOutput, ProcessIO } from './types.js';

function createIO() {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const io: ProcessIO = {
    isInteractive: false,
    writeStdout: (message: string) => stdout.push(message),
    writeStderr: (message: string) => stderr.push(message),
    setExitCode: () => {},
  };

  return { io, stdout, stderr };
}

function emit(output: CommandOutput, options = { quiet: false, dryRun: false }) {
  const { io, stdout, stderr } = createIO();
  const formatter = new OutputFormatter(io, options);
  formatter.emit(output);
  return { stdout, stderr };
}

test('suppresses informational text when quiet mode is enabled', () => {
  const { stdout } = emit(
    { kind: 'text', text: 'info message', scope: 'info' },
    { quiet: true, dryRun: false },
  );
  assert.equal(stdout.length, 0);
});

test('keeps completion text in quiet mode and terminates it with a newline', () => {
  const { stdout } = emit({ kind: 'text', text: 'return a + b' }, { quiet: true, dryRun: false });
  assert.deepEqual(stdout, ['return a + b\n']);
});

test('routes error-scoped text to stderr', () => {
  const { stdout, stderr } = emit({ kind: 'text', text: 'warning\n', scope: 'error' });
  assert.deepEqual(stdout, []);
  assert.deepEqual(stderr, ['warning\n']);
});

test('prints JSON payload with newline', () => {
  const { stdout } = emit({ kind: 'json', data: { completion: 'abc' } });
  assert.equal(stdout[0], '{\n  "completion": "abc"\n}\n');
});

test('prints dry-run summary followed by details', () => {
  const { stdout } = emit({ kind: 'dry-run', summary: 'Prepared request', details: { model: 'm' } });
  assert.equal(stdout[0], '[dry-run] Prepared request\n{\n  "model": "m"\n}\n');
});

test('prints structured error output with suggestions', () => {
  const { stderr } = emit({
    kind: 'error',
    code: 'E_NETWORK',
    message: 'Completion endpoint is unreachable',
    suggestions: ['Check the network connection'],
  });
  assert.deepEqual(stderr, [
    'Error [E_NETWORK]: Completion endpoint is unreachable\n',
    '  - Check the network connection\n',
  ]);
});

test('writes raw text exactly as given', () => {
  const { stdout } = emit({ kind: 'text', text: 'foo REPLACED baz', raw: true });
  assert.deepEqual(stdout, ['foo REPLACED baz']);
});
