import { ConfigError } from '../errors.js';

import type { ConfigStore } from './configStore.js';
import type { CredentialSource } from './credentialSource.js';
import {
  createDefaultConfig,
  profileConfigSchema,
  type CliConfig,
  type LogSettings,
  type ProfileManager,
  type ProfileResolver,
  type ProfileSummary,
  type ResolvedProfile,
  type UpsertProfileInput,
} from './types.js';

export class ConfigService implements ProfileResolver, ProfileManager {
  private readonly store: ConfigStore;

  private readonly credentials: CredentialSource;

  private cache?: CliConfig;

  constructor(store: ConfigStore, credentials: CredentialSource) {
    this.store = store;
    this.credentials = credentials;
  }

  async initialize(): Promise<void> {
    await this.store.ensureInitialized();
  }

  async ensureConfigFile(): Promise<{ created: boolean; path: string }> {
    const created = await this.store.ensureInitialized();
    return { created, path: this.store.getPath() };
  }

  async getProfile(name?: string): Promise<ResolvedProfile> {
    const config = await this.loadConfig();
    const profileName = name ?? config.defaultProfile;
    const profile = config.profiles[profileName];

    if (!profile) {
      throw new ConfigError(`profile '${profileName}' does not exist`);
    }

    const apiKey = (await this.credentials.get(profile.credentialEnv)) ?? '';

    return {
      name: profileName,
      endpoint: profile.endpoint,
      model: profile.model,
      maxTokens: profile.maxTokens,
      temperature: profile.temperature,
      credentialEnv: profile.credentialEnv,
      logFile: profile.logFile,
      apiKey,
    };
  }

  async getLogSettings(): Promise<LogSettings> {
    const config = await this.loadConfig();
    return config.log;
  }

  /** Merges the given fields into the profile, creating it from defaults when new. */
  async upsertProfile(name: string, input: UpsertProfileInput): Promise<void> {
    const config = await this.loadConfig();
    const base = config.profiles[name] ?? createDefaultConfig().profiles.default;

    const candidate = profileConfigSchema.safeParse({
      endpoint: input.endpoint ?? base.endpoint,
      model: input.model ?? base.model,
      maxTokens: input.maxTokens ?? base.maxTokens,
      temperature: input.temperature ?? base.temperature,
      credentialEnv: input.credentialEnv ?? base.credentialEnv,
      logFile: input.logFile ?? base.logFile,
      updatedAt: new Date().toISOString(),
    });

    if (!candidate.success) {
      const issues = candidate.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`profile '${name}' is invalid: ${issues}`);
    }

    config.profiles[name] = candidate.data;

    if (!config.defaultProfile) {
      config.defaultProfile = name;
    }

    await this.persist(config);
  }

  async setDefaultProfile(name: string): Promise<void> {
    const config = await this.loadConfig();
    if (!config.profiles[name]) {
      throw new ConfigError(`profile '${name}' does not exist`);
    }

    config.defaultProfile = name;
    await this.persist(config);
  }

  async listProfiles(): Promise<ProfileSummary[]> {
    const config = await this.loadConfig();
    return Object.entries(config.profiles).map(([name, profile]) => ({
      name,
      endpoint: profile.endpoint,
      model: profile.model,
      updatedAt: profile.updatedAt,
      isDefault: name === config.defaultProfile,
    }));
  }

  private async loadConfig(): Promise<CliConfig> {
    if (!this.cache) {
      this.cache = await this.store.load();
    }
    return this.cache;
  }

  private async persist(config: CliConfig): Promise<void> {
    this.cache = config;
    await this.store.save(config);
  }
}
