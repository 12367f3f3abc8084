import { writeFile } from 'node:fs/promises';

import {
  CompletionCommands,
  DisplaySurfaceRegistry,
  TASK_INSTRUCTIONS,
  TextDocument,
  buildPrompt,
  type CompletionError,
  type CompletionQueryClient,
  type CompletionResult,
  type CompletionSettings,
  type DisplayCommandOptions,
  type RegionTask,
  type Span,
} from '@region-complete/completion-core';

import type { ProfileResolver } from '../config/types.js';
import { inferCommentMarker, resolveSpan } from '../editorContext.js';
import { CliUsageError, OutputWriteError } from '../errors.js';
import type { TextInputResolver, TextSource } from '../inputResolver.js';
import type {
  CliCommandContext,
  CommandDescriptor,
  CommandOutput,
  CommandResult,
} from '../types.js';

export type TaskCommandName = 'ask' | 'fix' | 'explain' | 'tests' | 'refactor' | 'region' | 'replace';

type DisplayInvoker = (
  commands: CompletionCommands,
  document: TextDocument,
  span: Span,
  options: DisplayCommandOptions,
) => void;

type TaskMode =
  | { kind: 'text' }
  | { kind: 'display'; invoke: DisplayInvoker }
  | { kind: 'replace' };

interface TaskDefinition {
  name: TaskCommandName;
  aliases?: string[];
  summary: string;
  instruction?: RegionTask;
  mode: TaskMode;
}

const TASKS: TaskDefinition[] = [
  {
    name: 'ask',
    aliases: ['prompt'],
    summary: 'Send a free-form prompt and show the completion',
    mode: { kind: 'text' },
  },
  {
    name: 'fix',
    summary: 'Ask the model to fix the region',
    instruction: 'fix',
    mode: { kind: 'display', invoke: (commands, doc, span, options) => commands.fixRegion(doc, span, options) },
  },
  {
    name: 'explain',
    summary: 'Ask the model to explain the region',
    instruction: 'explain',
    mode: { kind: 'display', invoke: (commands, doc, span, options) => commands.explainRegion(doc, span, options) },
  },
  {
    name: 'tests',
    summary: 'Ask the model to write unit tests for the region',
    instruction: 'tests',
    mode: {
      kind: 'display',
      invoke: (commands, doc, span, options) => commands.generateTestsForRegion(doc, span, options),
    },
  },
  {
    name: 'refactor',
    summary: 'Ask the model to refactor the region',
    instruction: 'refactor',
    mode: { kind: 'display', invoke: (commands, doc, span, options) => commands.refactorRegion(doc, span, options) },
  },
  {
    name: 'region',
    summary: 'Send the region as the prompt and show the completion',
    mode: { kind: 'display', invoke: (commands, doc, span, options) => commands.promptWithRegion(doc, span, options) },
  },
  {
    name: 'replace',
    summary: 'Send the region as the prompt and replace it with the completion',
    mode: { kind: 'replace' },
  },
];

export interface TaskCommandOptions {
  text?: string;
  file?: string;
  start?: string;
  end?: string;
  comment?: string;
  profile?: string;
  model?: string;
  maxTokens?: number;
  format: 'text' | 'json';
  help?: boolean;
}

export interface TaskCommandDependencies {
  inputResolver: TextInputResolver;
  profiles: ProfileResolver;
  clientFactory: (endpoint: string) => CompletionQueryClient;
  writeFileImpl?: (path: string, content: string) => Promise<void>;
}

function buildHelpMessage(task: TaskDefinition): string {
  const regionOptions =
    task.mode.kind === 'text'
      ? ''
      : `
  --start <offset>        Region start offset in UTF-16 code units (default: 0)
  --end <offset>          Region end offset in UTF-16 code units (default: end of text)
  --comment <marker>      Line comment marker (default: inferred from --file, or //)`;

  return `region-complete ${task.name} - ${task.summary}

Usage:
  region-complete [global-options] ${task.name} [options] --text "..."
  region-complete [global-options] ${task.name} [options] --file ./source.py
  cat ./source.py | region-complete ${task.name} [options]

Options:
  --text <text>           Text to send
  --file <path>           Read the text from a file${task.mode.kind === 'replace' ? ' (rewritten in place)' : ''}${regionOptions}
  --profile <name>        Connection profile (default: defaultProfile in config.json)
  --model <name>          Override the profile model
  --max-tokens <n>        Override the profile token limit
  --format <text|json>    Output format (default: text)
  --help                  Show this help`;
}

function parseMaxTokens(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw) || Number.parseInt(raw, 10) === 0) {
    throw new CliUsageError(`--max-tokens must be a positive integer (received '${raw ?? ''}')`);
  }
  return Number.parseInt(raw, 10);
}

export function parseTaskCommandArgs(args: string[]): TaskCommandOptions {
  const parsed: TaskCommandOptions = {
    format: 'text',
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    switch (arg) {
      case '--text':
        parsed.text = args[++i];
        break;
      case '--file':
        parsed.file = args[++i];
        break;
      case '--start':
        parsed.start = args[++i];
        break;
      case '--end':
        parsed.end = args[++i];
        break;
      case '--comment':
        parsed.comment = args[++i];
        break;
      case '--profile':
        parsed.profile = args[++i] ?? parsed.profile;
        break;
      case '--model':
        parsed.model = args[++i] ?? parsed.model;
        break;
      case '--max-tokens':
        parsed.maxTokens = parseMaxTokens(args[++i]);
        break;
      case '--format': {
        const format = (args[++i] ?? '').toLowerCase();
        if (format !== 'json' && format !== 'text') {
          throw new CliUsageError(`Unknown format '${format}'. Use text or json`);
        }
        parsed.format = format;
        break;
      }
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        parsed.text = parsed.text ? `${parsed.text} ${arg}` : arg;
        break;
    }
  }

  return parsed;
}

function normalize(value?: string | null): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function inferTextSource(parsed: TaskCommandOptions): TextSource {
  if (parsed.text !== undefined) {
    return { kind: 'inline', value: parsed.text };
  }

  if (parsed.file) {
    return { kind: 'file', path: parsed.file };
  }

  return { kind: 'stdin' };
}

function previewPrompt(task: TaskDefinition, document: TextDocument, span: Span): string {
  const instruction = task.instruction ? TASK_INSTRUCTIONS[task.instruction] : undefined;
  return buildPrompt(document.getText(span), instruction, document.commentMarker);
}

async function executeTask(
  task: TaskDefinition,
  context: CliCommandContext,
  parsed: TaskCommandOptions,
  deps: TaskCommandDependencies,
): Promise<CommandResult> {
  if (parsed.help) {
    return {
      exitCode: 0,
      output: { kind: 'text', text: `${buildHelpMessage(task)}\n`, scope: 'info' },
    };
  }

  const resolved = await deps.inputResolver.resolve(inferTextSource(parsed));

  if (resolved.text.trim().length === 0) {
    throw new CliUsageError('The text to send is empty');
  }

  const profile = await deps.profiles.getProfile(parsed.profile);
  const settings: CompletionSettings = {
    model: normalize(parsed.model) ?? profile.model,
    maxTokens: parsed.maxTokens ?? profile.maxTokens,
    temperature: profile.temperature,
    credential: profile.apiKey,
  };

  const filePath = resolved.metadata.filePath;
  const document = new TextDocument(resolved.text, inferCommentMarker(filePath, parsed.comment));
  const span =
    task.mode.kind === 'text'
      ? { start: 0, end: resolved.text.length }
      : resolveSpan(resolved.text, parsed.start, parsed.end);

  const telemetryBase = {
    inputBytes: Buffer.byteLength(document.getText(span), 'utf-8'),
    profile: profile.name,
  };

  if (context.globals.dryRun) {
    return {
      exitCode: 0,
      output: {
        kind: 'dry-run',
        summary: `Prepared '${task.name}' request without sending it`,
        details: {
          profile: profile.name,
          endpoint: profile.endpoint,
          model: settings.model,
          maxTokens: settings.maxTokens,
          temperature: settings.temperature,
          span,
          prompt: previewPrompt(task, document, span),
        },
      },
      telemetry: telemetryBase,
    };
  }

  let revealed: string | undefined;
  let received: string | undefined;
  const errors: CompletionError[] = [];
  const displays = new DisplaySurfaceRegistry({
    onReveal: (buffer) => {
      revealed = buffer.getContents();
    },
  });
  const commands = new CompletionCommands({
    client: deps.clientFactory(profile.endpoint),
    settings,
    displays,
    reportError: (error) => errors.push(error),
  });
  const displayOptions = (onSettled: (result: CompletionResult) => void): DisplayCommandOptions => ({
    interactive: context.io.isInteractive,
    onResult: (text) => {
      received = text;
    },
    onSettled,
  });

  const startedAt = Date.now();
  const result = await new Promise<CompletionResult>((resolve) => {
    switch (task.mode.kind) {
      case 'text':
        commands.promptWithText(resolved.text, displayOptions(resolve));
        break;
      case 'display':
        task.mode.invoke(commands, document, span, displayOptions(resolve));
        break;
      case 'replace':
        commands.promptWithRegionAndReplace(document, span, { onSettled: resolve });
        break;
    }
  });
  const durationMs = Date.now() - startedAt;

  if (!result.ok) {
    throw errors.shift() ?? result.error;
  }

  const completion = task.mode.kind === 'replace' ? result.text : revealed ?? received ?? result.text;
  const outputBytes = Buffer.byteLength(completion, 'utf-8');
  let output: CommandOutput;

  if (task.mode.kind === 'replace' && filePath) {
    await writeDocument(deps, filePath, document.getText());
    output = {
      kind: 'text',
      text: `Replaced region ${span.start}-${span.end} in ${filePath} (${completion.length} characters inserted).\n`,
      scope: 'info',
    };
  } else {
    output =
      task.mode.kind === 'replace'
        ? { kind: 'text', text: document.getText(), raw: true }
        : { kind: 'text', text: `${completion}\n` };
  }

  if (parsed.format === 'json') {
    output = {
      kind: 'json',
      data: {
        command: task.name,
        profile: profile.name,
        model: settings.model,
        completion,
        ...(task.mode.kind === 'replace' ? { document: document.getText() } : {}),
        metrics: {
          durationMs,
          inputBytes: telemetryBase.inputBytes,
          outputBytes,
        },
      },
    };
  }

  return {
    exitCode: 0,
    output,
    logFile: profile.logFile,
    telemetry: {
      ...telemetryBase,
      outputBytes,
    },
  };
}

async function writeDocument(
  deps: TaskCommandDependencies,
  filePath: string,
  content: string,
): Promise<void> {
  const write = deps.writeFileImpl ?? ((path: string, data: string) => writeFile(path, data, 'utf-8'));

  try {
    await write(filePath, content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new OutputWriteError(`Cannot write '${filePath}': ${reason}`, error);
  }
}

function createTaskCommandDescriptor(
  task: TaskDefinition,
  deps: TaskCommandDependencies,
): CommandDescriptor {
  return {
    name: task.name,
    aliases: task.aliases,
    summary: task.summary,
    usage: `${task.name} [options]`,
    handler: async (context) => executeTask(task, context, parseTaskCommandArgs(context.argv), deps),
  };
}

export function createTaskCommandDescriptors(deps: TaskCommandDependencies): CommandDescriptor[] {
  return TASKS.map((task) => createTaskCommandDescriptor(task, deps));
}
