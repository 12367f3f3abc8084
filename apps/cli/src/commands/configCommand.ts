import type { ProfileManager, ProfileSummary, UpsertProfileInput } from '../config/types.js';
import { CliUsageError, ConfigError } from '../errors.js';
import type { CommandDescriptor, CommandResult } from '../types.js';

export interface ConfigCommandDependencies {
  configService: ProfileManager;
}

function buildListOutput(profiles: ProfileSummary[]): string {
  if (profiles.length === 0) {
    return 'No profiles configured yet. Use `region-complete config set <name>` to add one.';
  }

  const nameWidth = Math.max(...profiles.map((profile) => profile.name.length)) + 2;
  const lines: string[] = [];
  lines.push('Configured profiles:');

  for (const profile of profiles) {
    const indicator = profile.isDefault ? '*' : ' ';
    const endpoint = profile.endpoint || '(endpoint not set)';
    const nameColumn = profile.name.padEnd(nameWidth, ' ');
    lines.push(
      `${indicator} ${nameColumn} ${endpoint}  model=${profile.model}  updated=${profile.updatedAt}`,
    );
  }

  lines.push('');
  lines.push("'*' indicates the default profile.");
  return lines.join('\n');
}

async function handleList(deps: ConfigCommandDependencies): Promise<CommandResult> {
  const profiles = await deps.configService.listProfiles();
  return {
    exitCode: 0,
    output: { kind: 'text', text: `${buildListOutput(profiles)}\n` },
  };
}

async function handleUse(deps: ConfigCommandDependencies, argv: string[]): Promise<CommandResult> {
  const target = argv[1];

  if (!target) {
    throw new CliUsageError('Profile name is required for `region-complete config use <name>`');
  }

  try {
    await deps.configService.setDefaultProfile(target);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    return {
      exitCode: 1,
      output: {
        kind: 'error',
        code: 'CONFIG_ERROR',
        message: error.message,
      },
    };
  }

  return {
    exitCode: 0,
    output: { kind: 'text', text: `Default profile set to '${target}'.\n`, scope: 'info' },
  };
}

async function handleInit(deps: ConfigCommandDependencies): Promise<CommandResult> {
  const { created, path } = await deps.configService.ensureConfigFile();
  const text = created
    ? `Config file initialized at ${path}.\n`
    : `Config file already exists at ${path}.\n`;
  return {
    exitCode: 0,
    output: { kind: 'text', text, scope: 'info' },
  };
}

function parseNumber(flag: string, raw: string | undefined): number {
  const value = raw === undefined ? Number.NaN : Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`${flag} requires a number`);
  }
  return value;
}

export function parseUpsertArgs(args: string[]): UpsertProfileInput {
  const input: UpsertProfileInput = {};

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    switch (arg) {
      case '--endpoint':
        input.endpoint = args[++i];
        break;
      case '--model':
        input.model = args[++i];
        break;
      case '--max-tokens':
        input.maxTokens = parseNumber(arg, args[++i]);
        break;
      case '--temperature':
        input.temperature = parseNumber(arg, args[++i]);
        break;
      case '--credential-env':
        input.credentialEnv = args[++i];
        break;
      case '--log-file':
        input.logFile = args[++i];
        break;
      default:
        throw new CliUsageError(`Unknown option for config set: ${arg}`);
    }
  }

  return input;
}

async function handleSet(deps: ConfigCommandDependencies, argv: string[]): Promise<CommandResult> {
  const name = argv[1];

  if (!name || name.startsWith('-')) {
    throw new CliUsageError('Profile name is required for `region-complete config set <name>`');
  }

  await deps.configService.upsertProfile(name, parseUpsertArgs(argv.slice(2)));

  return {
    exitCode: 0,
    output: { kind: 'text', text: `Profile '${name}' saved.\n`, scope: 'info' },
  };
}

function buildUsage(): string {
  return `region-complete config

Usage:
  region-complete config list             # Show configured profiles
  region-complete config use <name>       # Switch default profile
  region-complete config init             # Create default config.json if missing
  region-complete config set <name> [--endpoint <url>] [--model <id>] [--max-tokens <n>]
                                 [--temperature <t>] [--credential-env <VAR>] [--log-file <path>]

Sub-commands:
  list    Show configured profiles with metadata
  use     Set the default profile to the provided name
  init    Generate a seed config.json when it does not exist
  set     Create or update a profile
`;
}

export function createConfigCommandDescriptor(deps: ConfigCommandDependencies): CommandDescriptor {
  return {
    name: 'config',
    summary: 'Manage connection profiles',
    usage: 'config <sub-command>',
    handler: async (context) => {
      const [subcommand] = context.argv;

      if (!subcommand || subcommand === '--help' || subcommand === '-h') {
        return {
          exitCode: 0,
          output: { kind: 'text', text: `${buildUsage()}\n`, scope: 'info' },
        };
      }

      switch (subcommand) {
        case 'list':
          return handleList(deps);
        case 'use':
          return handleUse(deps, context.argv);
        case 'init':
          return handleInit(deps);
        case 'set':
          return handleSet(deps, context.argv);
        default:
          throw new CliUsageError(
            `Unknown config sub-command '${subcommand}'. Available: list, use, init, set`,
          );
      }
    },
  };
}
