import * as fs from "fs";
import { promises as fsp } from "fs";
import * as path from "path";
import {
  DEFAULT_PROVIDER_CATALOG,
  ProviderCatalog,
  ProviderKind,
  providerIdFor,
} from "../../domain/provider/entities/provider";
import { ConfigStorePort } from "../../ports/outbound/config-store.port";
import { IoError, ParseError } from "../../shared/errors";
import {
  BACKUP_FORMAT_VERSION,
  BackupConfig,
  BackupLookup,
  BackupMetadata,
  createEnvBlock,
  emptySettings,
  EnvBlock,
  SettingsConfig,
} from "../../shared/types/settings";
import { logger } from "../../utils/logger";
import { SwitchPaths } from "./switch-paths";

const TOKEN_FILE_MODE = 0o600;

interface StoredBackupMetadata {
  provider: string;
  created_at: number | null;
  version: string;
}

export interface FileConfigStoreOptions {
  catalog?: ProviderCatalog;
  now?: () => Date;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === "ENOENT";
}

function toEnvBlock(value: unknown): EnvBlock | undefined {
  if (value === undefined) {
    return createEnvBlock();
  }
  if (!isPlainObject(value)) {
    return undefined;
  }

  const env = createEnvBlock();
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== "string") {
      return undefined;
    }
    env[key] = item;
  }
  return env;
}

function toSettings(parsed: unknown): SettingsConfig | undefined {
  if (!isPlainObject(parsed)) {
    return undefined;
  }
  const env = toEnvBlock(parsed.env);
  return env ? { env } : undefined;
}

function toBackupMetadata(value: unknown): BackupMetadata | undefined {
  if (!isPlainObject(value)) {
    return undefined;
  }

  const { provider, version } = value;
  const createdAt = value.created_at;
  if (typeof provider !== "string" || typeof version !== "string") {
    return undefined;
  }
  if (createdAt === undefined || createdAt === null) {
    return { provider, version };
  }
  if (typeof createdAt !== "number" || !Number.isFinite(createdAt)) {
    return undefined;
  }
  return { provider, version, createdAt: new Date(createdAt * 1000) };
}

function toBackupConfig(parsed: unknown): BackupConfig | undefined {
  if (!isPlainObject(parsed)) {
    return undefined;
  }
  const metadata = toBackupMetadata(parsed._metadata);
  const env = toEnvBlock(parsed.env);
  if (!metadata || !env) {
    return undefined;
  }
  return { metadata, env };
}

function toStoredMetadata(metadata: BackupMetadata): StoredBackupMetadata {
  return {
    provider: metadata.provider,
    created_at: metadata.createdAt
      ? Math.floor(metadata.createdAt.getTime() / 1000)
      : null,
    version: metadata.version,
  };
}

function toStoredSettings(config: SettingsConfig): Partial<SettingsConfig> {
  return Object.keys(config.env).length > 0 ? { env: config.env } : {};
}

export class FileConfigStoreAdapter implements ConfigStorePort {
  private readonly catalog: ProviderCatalog;
  private readonly now: () => Date;

  constructor(
    private readonly paths: SwitchPaths,
    options: FileConfigStoreOptions = {},
  ) {
    this.catalog = options.catalog ?? DEFAULT_PROVIDER_CATALOG;
    this.now = options.now ?? (() => new Date());
  }

  async load(filePath: string): Promise<SettingsConfig> {
    const label = this.labelFor(filePath);
    let raw: string;
    try {
      raw = await fsp.readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return emptySettings();
      }
      throw new IoError(`Failed to read ${label} at ${filePath}`, error);
    }

    if (raw.trim().length === 0) {
      return emptySettings();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ParseError(`Failed to parse ${label} at ${filePath}`, error);
    }

    const settings = toSettings(parsed);
    if (!settings) {
      throw new ParseError(
        `Failed to parse ${label} at ${filePath}: expected an object whose "env" maps strings to strings`,
      );
    }
    return settings;
  }

  async saveAtomic(filePath: string, config: SettingsConfig): Promise<void> {
    await this.writeJsonAtomic(filePath, toStoredSettings(config));
  }

  async loadSettings(): Promise<SettingsConfig> {
    return this.load(this.paths.settingsFile);
  }

  async saveSettings(config: SettingsConfig): Promise<void> {
    await this.saveAtomic(this.paths.settingsFile, config);
    await logger.debug(
      `Settings written to ${this.paths.settingsFile} (${Object.keys(config.env).length} keys)`,
    );
  }

  async loadBackup(): Promise<BackupLookup> {
    const backupFile = this.paths.backupFile;
    let raw: string;
    try {
      raw = await fsp.readFile(backupFile, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return { isDefaultProvider: false };
      }
      throw new IoError(`Failed to read backup file at ${backupFile}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      await logger.warn(`Ignoring unreadable backup file at ${backupFile}`);
      return { isDefaultProvider: false };
    }

    const backup = toBackupConfig(parsed);
    if (backup) {
      return {
        isDefaultProvider: backup.metadata.provider === this.catalog.default.id,
        backup,
      };
    }

    // Backups written before metadata existed hold a bare settings object.
    const legacy = toSettings(parsed);
    if (legacy) {
      return {
        isDefaultProvider: true,
        backup: {
          metadata: {
            provider: this.catalog.default.id,
            createdAt: this.now(),
            version: BACKUP_FORMAT_VERSION,
          },
          env: legacy.env,
        },
      };
    }

    await logger.warn(`Ignoring backup file with unknown format at ${backupFile}`);
    return { isDefaultProvider: false };
  }

  async backupExists(): Promise<boolean> {
    return fs.existsSync(this.paths.backupFile);
  }

  async saveBackup(
    config: SettingsConfig,
    provider: ProviderKind,
  ): Promise<void> {
    const metadata = toStoredMetadata({
      provider: providerIdFor(provider, this.catalog),
      createdAt: this.now(),
      version: BACKUP_FORMAT_VERSION,
    });

    await this.writeJsonAtomic(this.paths.backupFile, {
      _metadata: metadata,
      env: config.env,
    });
    await this.writeJsonAtomic(this.paths.backupMetadataFile, metadata);
    await logger.info(
      `Backed up ${metadata.provider} settings to ${this.paths.backupFile}`,
    );
  }

  async saveToken(token: string): Promise<void> {
    const tokenFile = this.paths.tokenFile;
    await this.ensureDirectory(path.dirname(tokenFile));

    try {
      await fsp.writeFile(tokenFile, token, {
        encoding: "utf-8",
        mode: TOKEN_FILE_MODE,
      });
    } catch (error) {
      throw new IoError(`Failed to save token to ${tokenFile}`, error);
    }

    if (process.platform !== "win32") {
      try {
        await fsp.chmod(tokenFile, TOKEN_FILE_MODE);
      } catch (error) {
        throw new IoError(
          `Failed to restrict permissions on ${tokenFile}`,
          error,
        );
      }
    }
    await logger.info(`Saved token to ${tokenFile}`);
  }

  async loadToken(): Promise<string | undefined> {
    const tokenFile = this.paths.tokenFile;
    let raw: string;
    try {
      raw = await fsp.readFile(tokenFile, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new IoError(`Failed to read saved token at ${tokenFile}`, error);
    }

    const token = raw.trim();
    return token.length > 0 ? token : undefined;
  }

  async removeToken(): Promise<void> {
    const tokenFile = this.paths.tokenFile;
    try {
      await fsp.unlink(tokenFile);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new IoError(`Failed to remove saved token at ${tokenFile}`, error);
    }
    await logger.info(`Removed saved token at ${tokenFile}`);
  }

  private labelFor(filePath: string): string {
    switch (filePath) {
      case this.paths.settingsFile:
        return "settings file";
      case this.paths.backupFile:
        return "backup file";
      case this.paths.backupMetadataFile:
        return "backup metadata file";
      default:
        return "config file";
    }
  }

  private async ensureDirectory(dir: string): Promise<void> {
    try {
      await fsp.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new IoError(`Failed to create directory ${dir}`, error);
    }
  }

  private async writeJsonAtomic(
    filePath: string,
    payload: object,
  ): Promise<void> {
    const label = this.labelFor(filePath);
    const tempFile = `${filePath}.tmp`;
    await this.ensureDirectory(path.dirname(filePath));

    try {
      await fsp.writeFile(
        tempFile,
        `${JSON.stringify(payload, null, 2)}\n`,
        "utf-8",
      );
    } catch (error) {
      throw new IoError(`Failed to write temp file for ${label} at ${tempFile}`, error);
    }

    try {
      await fsp.rename(tempFile, filePath);
    } catch (error) {
      throw new IoError(`Failed to write ${label} at ${filePath}`, error);
    }
  }
}
