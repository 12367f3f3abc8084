import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { AuditLogSettings, ExecutionTelemetry } from './types.js';

/** Writes one JSON line of telemetry per command run. */
export class AuditLogger {
  private readonly settings: AuditLogSettings;

  constructor(settings: AuditLogSettings = { append: true }) {
    this.settings = settings;
  }

  async record(entry: ExecutionTelemetry, filePath?: string): Promise<void> {
    const target = filePath ?? this.settings.defaultLogFile;

    if (!target) {
      return;
    }

    await mkdir(dirname(target), { recursive: true });
    const line = `${JSON.stringify(entry)}\n`;

    if (this.settings.append) {
      await appendFile(target, line, 'utf-8');
    } else {
      await writeFile(target, line, 'utf-8');
    }
  }
}
