/**
 * Secret stores for share credentials
 */

import type { SecretStore, ShareCredentials } from '@mac-enroll/transport';

export const SHARE_SECRET_SERVICE = 'share';

/** MAC_ENROLL_<SERVICE>_USERNAME / _PASSWORD */
export function secretEnvNames(service: string): { username: string; password: string } {
  const key = service.toUpperCase().replace(/[^A-Z0-9]/g, '_');
  return {
    username: `MAC_ENROLL_${key}_USERNAME`,
    password: `MAC_ENROLL_${key}_PASSWORD`,
  };
}

export class MemorySecretStore implements SecretStore {
  private readonly entries = new Map<string, ShareCredentials>();

  async get(service: string): Promise<ShareCredentials | undefined> {
    const entry = this.entries.get(service);
    return entry ? { ...entry } : undefined;
  }

  async set(service: string, credentials: ShareCredentials): Promise<void> {
    this.entries.set(service, { ...credentials });
  }

  async clear(service: string): Promise<void> {
    this.entries.delete(service);
  }
}

/**
 * Credentials from environment variables. `set` and `clear` only affect
 * the given environment object, not the parent shell.
 */
export class EnvSecretStore implements SecretStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(service: string): Promise<ShareCredentials | undefined> {
    const names = secretEnvNames(service);
    const username = this.env[names.username];
    const password = this.env[names.password];
    if (!username || !password) return undefined;
    return { username, password };
  }

  async set(service: string, credentials: ShareCredentials): Promise<void> {
    const names = secretEnvNames(service);
    this.env[names.username] = credentials.username;
    this.env[names.password] = credentials.password;
  }

  async clear(service: string): Promise<void> {
    const names = secretEnvNames(service);
    delete this.env[names.username];
    delete this.env[names.password];
  }
}
