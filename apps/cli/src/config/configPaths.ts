import { homedir } from 'node:os';
import { join } from 'node:path';

export function resolveConfigFilePath(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  if (env.REGION_COMPLETE_CONFIG_PATH) {
    return env.REGION_COMPLETE_CONFIG_PATH;
  }

  if (platform === 'win32') {
    const base = env.APPDATA ?? join(homedir(), 'AppData', 'Roaming');
    return join(base, 'RegionComplete', 'config.json');
  }

  const base = env.XDG_CONFIG_HOME ?? join(homedir(), '.config');
  return join(base, 'region-complete', 'config.json');
}
