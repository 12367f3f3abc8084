import type { CliGlobals, CommandOutput, ProcessIO, TextOutput } from './types.js';

function ensureTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

function assertNever(value: never): never {
  throw new Error(`Unsupported output type: ${JSON.stringify(value)}`);
}

export class OutputFormatter {
  private readonly io: ProcessIO;

  private readonly globals: CliGlobals;

  constructor(io: ProcessIO, globals: CliGlobals) {
    this.io = io;
    this.globals = globals;
  }

  emit(output?: CommandOutput): void {
    if (!output) {
      return;
    }

    if (this.globals.quiet && output.kind !== 'error') {
      if ('scope' in output && output.scope === 'info') {
        return;
      }
    }

    switch (output.kind) {
      case 'text':
        this.writeText(output);
        break;
      case 'json':
        this.io.writeStdout(`${JSON.stringify(output.data, null, 2)}\n`);
        break;
      case 'dry-run':
        this.writeDryRun(output.summary, output.details);
        break;
      case 'error':
        this.writeError(output.code, output.message, output.suggestions);
        break;
      default:
        assertNever(output);
    }
  }

  private writeText(output: TextOutput): void {
    const text = output.raw ? output.text : ensureTrailingNewline(output.text);

    if (output.scope === 'error') {
      this.io.writeStderr(text);
    } else {
      this.io.writeStdout(text);
    }
  }

  private writeDryRun(summary: string, details?: Record<string, unknown>): void {
    const lines = [`[dry-run] ${summary}`];
    if (details) {
      lines.push(JSON.stringify(details, null, 2));
    }
    this.io.writeStdout(`${lines.join('\n')}\n`);
  }

  private writeError(code: string, message: string, suggestions?: string[]): void {
    this.io.writeStderr(`Error [${code}]: ${message}\n`);
    if (suggestions?.length) {
      for (const tip of suggestions) {
        this.io.writeStderr(`  - ${tip}\n`);
      }
    }
  }
}
