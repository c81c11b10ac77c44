/**
 * @mac-enroll/cli
 *
 * Command line and its stores, for embedding or testing
 */

export { runCli, USAGE } from './run.js';
export type { CliIO } from './run.js';

export {
  configFileSchema,
  parseConfig,
  loadConfig,
  expandEnvVars,
  expandHome,
  DEFAULT_CONFIG_FILE,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions } from './config.js';

export {
  FileConfigStore,
  MemoryConfigStore,
  enrollmentSnapshot,
  storedSettingsSchema,
} from './config-store.js';
export type { ConfigStore, StoredSettings } from './config-store.js';

export {
  MemorySecretStore,
  EnvSecretStore,
  secretEnvNames,
  SHARE_SECRET_SERVICE,
} from './secret-store.js';

export { StaticAuthGate, PromptAuthGate } from './auth-gate.js';
export { PendingDirectory, pendingFileName } from './pending-store.js';
export type { LoadedPending } from './pending-store.js';
