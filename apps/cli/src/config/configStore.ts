import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { ConfigError } from '../errors.js';

import { cliConfigSchema, createDefaultConfig, type CliConfig } from './types.js';

export class ConfigStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  getPath(): string {
    return this.filePath;
  }

  async ensureInitialized(): Promise<boolean> {
    try {
      await access(this.filePath);
      return false;
    } catch {
      await this.save(createDefaultConfig());
      return true;
    }
  }

  async load(): Promise<CliConfig> {
    const content = await readFile(this.filePath, 'utf-8');
    let raw: unknown;

    try {
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`config file ${this.filePath} is not valid JSON: ${reason}`);
    }

    const parsed = cliConfigSchema.safeParse(raw);

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`config file ${this.filePath} is invalid: ${issues}`);
    }

    return parsed.data;
  }

  async save(config: CliConfig): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}
