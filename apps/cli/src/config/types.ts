import {
  DEFAULT_ENDPOINT_URL,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
} from '@region-complete/completion-core';
import { z } from 'zod';

export const DEFAULT_CREDENTIAL_ENV = 'OPENAI_API_KEY';

export const profileConfigSchema = z.object({
  endpoint: z.string(),
  model: z.string().min(1),
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  temperature: z.number().default(DEFAULT_TEMPERATURE),
  credentialEnv: z.string().min(1).default(DEFAULT_CREDENTIAL_ENV),
  logFile: z.string().optional(),
  updatedAt: z.string(),
});

export const logSettingsSchema = z.object({
  defaultLogFile: z.string().optional(),
  append: z.boolean().default(true),
});

export const cliConfigSchema = z.object({
  schemaVersion: z.literal(1),
  defaultProfile: z.string(),
  profiles: z.record(profileConfigSchema),
  log: logSettingsSchema.default({ append: true }),
});

export type ProfileConfig = z.infer<typeof profileConfigSchema>;

export type LogSettings = z.infer<typeof logSettingsSchema>;

export type CliConfig = z.infer<typeof cliConfigSchema>;

export function createDefaultConfig(): CliConfig {
  return {
    schemaVersion: 1,
    defaultProfile: 'default',
    profiles: {
      default: {
        endpoint: DEFAULT_ENDPOINT_URL,
        model: DEFAULT_MODEL,
        maxTokens: DEFAULT_MAX_TOKENS,
        temperature: DEFAULT_TEMPERATURE,
        credentialEnv: DEFAULT_CREDENTIAL_ENV,
        updatedAt: new Date(0).toISOString(),
      },
    },
    log: {
      append: true,
    },
  };
}

export interface ProfileSummary {
  name: string;
  endpoint: string;
  model: string;
  updatedAt: string;
  isDefault: boolean;
}

export interface UpsertProfileInput {
  endpoint?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  credentialEnv?: string;
  logFile?: string;
}

export interface ResolvedProfile {
  name: string;
  endpoint: string;
  model: string;
  maxTokens: number;
  temperature: number;
  credentialEnv: string;
  logFile?: string;
  /** Empty when the credential variable is unset. */
  apiKey: string;
}

export interface ProfileResolver {
  getProfile(name?: string): Promise<ResolvedProfile>;
}

export interface ProfileManager {
  ensureConfigFile(): Promise<{ created: boolean; path: string }>;
  listProfiles(): Promise<ProfileSummary[]>;
  setDefaultProfile(name: string): Promise<void>;
  upsertProfile(name: string, input: UpsertProfileInput): Promise<void>;
}
