import process from 'node:process';

export interface CredentialSource {
  get(name: string): Promise<string | undefined>;
}

/** Reads credentials from environment variables. */
export class EnvCredentialSource implements CredentialSource {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  async get(name: string): Promise<string | undefined> {
    const value = this.env[name];
    return value && value.trim().length > 0 ? value : undefined;
  }
}

export class InMemoryCredentialSource implements CredentialSource {
  private readonly data = new Map<string, string>();

  constructor(entries: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(entries)) {
      this.data.set(name, value);
    }
  }

  set(name: string, value: string): void {
    this.data.set(name, value);
  }

  async get(name: string): Promise<string | undefined> {
    return this.data.get(name);
  }
}
