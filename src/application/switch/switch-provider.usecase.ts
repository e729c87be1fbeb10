import {
  DEFAULT_PROVIDER_CATALOG,
  ProviderCatalog,
  ProviderKind,
  SETTINGS_KEYS,
  TokenKind,
} from "../../domain/provider/entities/provider";
import {
  buildAlternateSettings,
  countNonAlternateKeys,
  detectProvider,
  detectTokenKind,
  maskToken,
  stripAlternateProviderKeys,
  validateTokenForProvider,
} from "../../domain/provider/services/provider-detector";
import { ConfigStorePort } from "../../ports/outbound/config-store.port";
import {
  TokenSource,
  TokenSupplierPort,
} from "../../ports/outbound/token-supplier.port";
import {
  BackupLookup,
  emptySettings,
  SettingsConfig,
} from "../../shared/types/settings";
import { logger } from "../../utils/logger";

export type SwitchToDefaultOutcome =
  | { status: "already_active" }
  | { status: "fallback_empty_config"; previousProvider: ProviderKind }
  | {
      status: "restored";
      previousProvider: ProviderKind;
      backupCreatedAt?: Date;
      removedKeys: string[];
    };

export type BackupAction =
  | { kind: "preserved"; createdAt?: Date }
  | { kind: "created" }
  | { kind: "nothing_to_backup"; existingBackup: boolean }
  | { kind: "custom_not_backed_up" };

export type SwitchToAlternateOutcome =
  | { status: "already_active" }
  | {
      status: "switched";
      previousProvider: ProviderKind;
      backup: BackupAction;
      tokenSource: TokenSource;
      tokenEnvVar?: string;
      warnings: string[];
    };

export type ClearTokenOutcome =
  | { status: "cleared" }
  | { status: "nothing_to_clear" };

export interface StatusEntry {
  label: string;
  value: string;
}

export type BackupStatus =
  | { state: "default"; createdAt?: Date; tokenKind?: TokenKind }
  | { state: "unrecognized" }
  | { state: "absent" };

export interface StatusReport {
  provider: ProviderKind;
  providerName: string;
  configured: boolean;
  baseUrl?: string;
  entries: StatusEntry[];
  authToken?: { masked: string; kind: TokenKind };
  otherKeyCount: number;
  backup: BackupStatus;
  savedToken: boolean;
}

function hasDefaultBackup(
  lookup: BackupLookup,
): lookup is BackupLookup & { backup: NonNullable<BackupLookup["backup"]> } {
  return lookup.isDefaultProvider && lookup.backup !== undefined;
}

export class SwitchProviderUseCase {
  constructor(
    private readonly store: ConfigStorePort,
    private readonly tokenSupplier: TokenSupplierPort,
    private readonly catalog: ProviderCatalog = DEFAULT_PROVIDER_CATALOG,
  ) {}

  async switchToDefault(): Promise<SwitchToDefaultOutcome> {
    const current = await this.store.loadSettings();
    const provider = this.detect(current);
    if (provider === "default") {
      return { status: "already_active" };
    }

    const lookup = await this.store.loadBackup();
    if (!hasDefaultBackup(lookup)) {
      await this.store.saveSettings(emptySettings());
      await logger.warn(
        `No valid ${this.catalog.default.id} backup; wrote empty settings (was ${provider})`,
      );
      return { status: "fallback_empty_config", previousProvider: provider };
    }

    const { env, removedKeys } = stripAlternateProviderKeys(lookup.backup.env);
    await this.store.saveSettings({ env });
    await logger.info(
      `Restored ${this.catalog.default.id} settings from backup (was ${provider})`,
    );

    return {
      status: "restored",
      previousProvider: provider,
      backupCreatedAt: lookup.backup.metadata.createdAt,
      removedKeys,
    };
  }

  async switchToAlternate(): Promise<SwitchToAlternateOutcome> {
    const current = await this.store.loadSettings();
    const provider = this.detect(current);
    if (provider === "alternate") {
      return { status: "already_active" };
    }

    const backup = await this.prepareBackup(provider, current);

    const supplied = await this.tokenSupplier.supplyToken();
    const warnings: string[] = [];
    validateTokenForProvider(
      supplied.token,
      "alternate",
      (message) => warnings.push(message),
      this.catalog.alternate,
    );
    for (const warning of warnings) {
      await logger.warn(warning.trim());
    }

    await this.store.saveSettings(
      buildAlternateSettings(supplied.token, this.catalog.alternate),
    );
    await logger.info(
      `Switched to ${this.catalog.alternate.id} (was ${provider}, token ${maskToken(supplied.token)} from ${supplied.source})`,
    );

    return {
      status: "switched",
      previousProvider: provider,
      backup,
      tokenSource: supplied.source,
      tokenEnvVar: supplied.envVar,
      warnings,
    };
  }

  async showStatus(): Promise<StatusReport> {
    const config = await this.store.loadSettings();
    const provider = this.detect(config);
    const env = config.env;
    const baseUrl = env[SETTINGS_KEYS.baseUrl];

    const report: StatusReport = {
      provider,
      providerName: this.providerName(provider),
      configured: Object.keys(env).length > 0,
      baseUrl,
      entries: [],
      otherKeyCount: countNonAlternateKeys(env),
      backup: await this.describeBackup(),
      savedToken: (await this.store.loadToken()) !== undefined,
    };

    switch (provider) {
      case "alternate":
        report.entries = this.alternateEntries(config);
        if (env[SETTINGS_KEYS.authToken] !== undefined) {
          const token = env[SETTINGS_KEYS.authToken];
          report.authToken = {
            masked: maskToken(token),
            kind: detectTokenKind(token, this.catalog.alternate),
          };
        }
        break;
      case "default":
        report.entries = [
          {
            label: "Base URL",
            value: `${this.catalog.default.defaultHost} (default)`,
          },
        ];
        break;
      case "custom":
        report.entries = [{ label: "Base URL", value: baseUrl ?? "" }];
        break;
      case "unknown":
        break;
    }

    return report;
  }

  async clearToken(): Promise<ClearTokenOutcome> {
    const saved = await this.store.loadToken();
    if (saved === undefined) {
      return { status: "nothing_to_clear" };
    }
    await this.store.removeToken();
    return { status: "cleared" };
  }

  private detect(config: SettingsConfig): ProviderKind {
    return detectProvider(config, this.catalog.alternate);
  }

  private providerName(provider: ProviderKind): string {
    switch (provider) {
      case "default":
        return `${this.catalog.default.displayName} (Default)`;
      case "alternate":
        return this.catalog.alternate.displayName;
      case "custom":
        return "Custom";
      case "unknown":
        return "Unknown";
    }
  }

  private async prepareBackup(
    provider: Exclude<ProviderKind, "alternate">,
    current: SettingsConfig,
  ): Promise<BackupAction> {
    switch (provider) {
      case "default": {
        const lookup = await this.store.loadBackup();
        if (hasDefaultBackup(lookup)) {
          return {
            kind: "preserved",
            createdAt: lookup.backup.metadata.createdAt,
          };
        }
        await this.store.saveBackup(current, "default");
        return { kind: "created" };
      }
      case "unknown": {
        const lookup = await this.store.loadBackup();
        return {
          kind: "nothing_to_backup",
          existingBackup: hasDefaultBackup(lookup),
        };
      }
      case "custom":
        return { kind: "custom_not_backed_up" };
    }
  }

  private alternateEntries(config: SettingsConfig): StatusEntry[] {
    const env = config.env;
    const entries: StatusEntry[] = [
      { label: "Base URL", value: env[SETTINGS_KEYS.baseUrl] ?? "" },
    ];
    const optional: Array<[string, string]> = [
      ["Sonnet Model", SETTINGS_KEYS.sonnetModel],
      ["Opus Model", SETTINGS_KEYS.opusModel],
      ["Haiku Model", SETTINGS_KEYS.haikuModel],
    ];
    for (const [label, key] of optional) {
      const value = env[key];
      if (value !== undefined) {
        entries.push({ label, value });
      }
    }
    const timeout = env[SETTINGS_KEYS.timeout];
    if (timeout !== undefined) {
      entries.push({ label: "Timeout", value: `${timeout} ms` });
    }
    return entries;
  }

  private async describeBackup(): Promise<BackupStatus> {
    const lookup = await this.store.loadBackup();
    if (hasDefaultBackup(lookup)) {
      const token = lookup.backup.env[SETTINGS_KEYS.authToken];
      return {
        state: "default",
        createdAt: lookup.backup.metadata.createdAt,
        tokenKind:
          token === undefined
            ? undefined
            : detectTokenKind(token, this.catalog.alternate),
      };
    }
    return (await this.store.backupExists())
      ? { state: "unrecognized" }
      : { state: "absent" };
  }
}
