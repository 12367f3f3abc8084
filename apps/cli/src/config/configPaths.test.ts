import { join } from 'node:path';
import test from 'node:test';

import assert from 'node:assert/strict';

import { resolveConfigFilePath } from './configPaths.js';

test('explicit config path wins', () => {
  assert.equal(
    resolveConfigFilePath({ REGION_COMPLETE_CONFIG_PATH: '/etc/rc.json' }, 'linux'),
    '/etc/rc.json',
  );
});

test('XDG config home is used on unix platforms', () => {
  assert.equal(
    resolveConfigFilePath({ XDG_CONFIG_HOME: '/home/dev/.cfg' }, 'linux'),
    join('/home/dev/.cfg', 'region-complete', 'config.json'),
  );
});

test('APPDATA is used on windows', () => {
  assert.equal(
    resolveConfigFilePath({ APPDATA: 'C:\\Users\\dev\\AppData\\Roaming' }, 'win32'),
    join('C:\\Users\\dev\\AppData\\Roaming', 'RegionComplete', 'config.json'),
  );
});
