// src/services/secretResolver.ts

/**
 * Lookup-by-name access to stored secrets.
 */
export interface SecretResolver {
  resolve(name: string): Promise<Buffer | null>;
}

/**
 * Resolves vault names from environment variables:
 * `partner-a` -> VAULT_SECRET_PARTNER_A.
 */
export class EnvSecretResolver implements SecretResolver {
  private env: Record<string, string | undefined>;
  private prefix: string;

  constructor(env: Record<string, string | undefined> = process.env, prefix = 'VAULT_SECRET_') {
    this.env = env;
    this.prefix = prefix;
  }

  static variableName(name: string, prefix = 'VAULT_SECRET_'): string {
    return prefix + name.trim().toUpperCase().replace(/[^A-Z0-9]+/g, '_');
  }

  async resolve(name: string): Promise<Buffer | null> {
    const value = this.env[EnvSecretResolver.variableName(name, this.prefix)];
    return value ? Buffer.from(value, 'utf8') : null;
  }
}

export class StaticSecretResolver implements SecretResolver {
  private secrets: Map<string, Buffer>;

  constructor(secrets: Record<string, string> = {}) {
    this.secrets = new Map(
      Object.entries(secrets).map(([name, value]) => [name, Buffer.from(value, 'utf8')])
    );
  }

  async resolve(name: string): Promise<Buffer | null> {
    return this.secrets.get(name) ?? null;
  }
}
