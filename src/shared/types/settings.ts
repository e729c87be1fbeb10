export type EnvBlock = Record<string, string>;

export interface SettingsConfig {
  env: EnvBlock;
}

export interface BackupMetadata {
  provider: string;
  createdAt?: Date;
  version: string;
}

export interface BackupConfig {
  metadata: BackupMetadata;
  env: EnvBlock;
}

export interface BackupLookup {
  isDefaultProvider: boolean;
  backup?: BackupConfig;
}

export const BACKUP_FORMAT_VERSION = "2.2.0";

// Null prototype so a "__proto__" key stays an ordinary entry.
export function createEnvBlock(): EnvBlock {
  return Object.create(null) as EnvBlock;
}

export function emptySettings(): SettingsConfig {
  return { env: createEnvBlock() };
}
