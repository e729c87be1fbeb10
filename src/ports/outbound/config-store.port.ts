import { ProviderKind } from "../../domain/provider/entities/provider";
import { BackupLookup, SettingsConfig } from "../../shared/types/settings";

export interface ConfigStorePort {
  load(filePath: string): Promise<SettingsConfig>;
  saveAtomic(filePath: string, config: SettingsConfig): Promise<void>;
  loadSettings(): Promise<SettingsConfig>;
  saveSettings(config: SettingsConfig): Promise<void>;
  loadBackup(): Promise<BackupLookup>;
  backupExists(): Promise<boolean>;
  saveBackup(config: SettingsConfig, provider: ProviderKind): Promise<void>;
  saveToken(token: string): Promise<void>;
  loadToken(): Promise<string | undefined>;
  removeToken(): Promise<void>;
}
