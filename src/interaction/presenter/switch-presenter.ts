import chalk from "chalk";
import {
  DEFAULT_PROVIDER_CATALOG,
  ProviderCatalog,
  TokenKind,
} from "../../domain/provider/entities/provider";
import {
  BackupAction,
  BackupStatus,
  ClearTokenOutcome,
  StatusReport,
  SwitchToAlternateOutcome,
  SwitchToDefaultOutcome,
} from "../../application/switch/switch-provider.usecase";
import { AliasInstallResult } from "../../ports/outbound/alias-installer.port";

export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

/** Turns workflow outcomes into terminal lines. */
export class SwitchPresenter {
  constructor(
    private readonly catalog: ProviderCatalog = DEFAULT_PROVIDER_CATALOG,
    private readonly command: string = "claude-switch",
  ) {}

  switchingToDefault(): string {
    return chalk.green(`Switching to ${this.defaultName} API...`);
  }

  switchingToAlternate(): string {
    return chalk.green(`Switching to ${this.alternateName} API...`);
  }

  switchToDefault(outcome: SwitchToDefaultOutcome): string[] {
    switch (outcome.status) {
      case "already_active":
        return [
          chalk.yellow(`Already using ${this.defaultName} configuration`),
          chalk.cyan(`   Use \`${this.command} status\` to check current settings`),
        ];
      case "fallback_empty_config":
        return [
          chalk.red(`No valid ${this.defaultName} backup found!`),
          chalk.yellow(
            `Cannot restore ${this.defaultName} configuration without backup.`,
          ),
          chalk.yellow("   You may need to reconfigure the assistant."),
          "",
          chalk.yellow("Created empty configuration (re-login required)"),
        ];
      case "restored": {
        const lines: string[] = [];
        if (outcome.backupCreatedAt) {
          lines.push(
            `${chalk.cyan("Restoring from backup created at:")} ${formatUtc(outcome.backupCreatedAt)}`,
          );
        }
        lines.push(
          chalk.green(`${this.defaultName} configuration restored from backup`),
        );
        return lines;
      }
    }
  }

  switchToAlternate(outcome: SwitchToAlternateOutcome): string[] {
    if (outcome.status === "already_active") {
      return [
        chalk.yellow(`Already using ${this.alternateName} configuration`),
        chalk.cyan(`   Use \`${this.command} status\` to check current settings`),
      ];
    }

    const lines = this.backupAction(outcome.backup);
    if (outcome.tokenSource === "env") {
      lines.push(
        chalk.cyan(
          `Using token from ${outcome.tokenEnvVar ?? "an"} environment variable`,
        ),
      );
    } else if (outcome.tokenSource === "saved") {
      lines.push(chalk.cyan("Using token from saved token file"));
    }
    for (const warning of outcome.warnings) {
      lines.push(chalk.yellow(warning));
    }
    lines.push(
      chalk.green(`${this.alternateName} configuration applied successfully`),
      "",
      chalk.cyan(
        `To switch back to ${this.defaultName}: ${this.command} anthropic`,
      ),
    );
    return lines;
  }

  status(report: StatusReport): string[] {
    const lines = [chalk.cyan("Current Configuration Status"), ""];

    if (!report.configured) {
      lines.push(chalk.yellow("No configuration found (empty or missing)"));
    } else {
      lines.push(chalk.green(`Provider: ${report.providerName}`), "");
      for (const entry of report.entries) {
        lines.push(`  ${chalk.cyan(`${entry.label}:`)} ${entry.value}`);
      }
      if (report.authToken) {
        lines.push(
          `  ${chalk.cyan("Auth Token:")} ${report.authToken.masked}${this.tokenKindSuffix(report.authToken.kind)}`,
        );
      }
      if (report.otherKeyCount > 0) {
        lines.push(`  ${chalk.cyan("Other env vars:")} ${report.otherKeyCount}`);
      }
    }

    lines.push("", ...this.backupStatus(report.backup));
    if (report.savedToken) {
      lines.push(chalk.cyan("  Saved Token: Available"));
    }
    return lines;
  }

  clearToken(outcome: ClearTokenOutcome): string[] {
    return outcome.status === "cleared"
      ? [chalk.green("Saved token removed successfully")]
      : [chalk.yellow("No saved token found")];
  }

  install(result: AliasInstallResult): string[] {
    if (result.status === "already_present") {
      return [chalk.yellow(`Aliases already exist in ${result.rcFile}`)];
    }
    return [
      chalk.green(`Aliases added to ${result.rcFile}`),
      "",
      chalk.cyan("Available commands after reload:"),
      `  claude-anthropic   # Quick switch to ${this.defaultName}`,
      `  claude-glm         # Quick switch to ${this.alternateName}`,
      "  claude-status      # Quick status check",
      "",
      chalk.cyan("Reload your shell:"),
      `  source ${result.rcFile}`,
    ];
  }

  error(message: string): string {
    return `${chalk.red("Error:")} ${message}`;
  }

  private get defaultName(): string {
    return this.catalog.default.displayName;
  }

  private get alternateName(): string {
    return this.catalog.alternate.displayName;
  }

  private backupAction(action: BackupAction): string[] {
    switch (action.kind) {
      case "preserved": {
        const lines = [
          chalk.cyan(
            `Existing ${this.defaultName} backup found (preserving configuration)`,
          ),
        ];
        if (action.createdAt) {
          lines.push(
            `${chalk.cyan("   Backed up at:")} ${formatUtc(action.createdAt)}`,
          );
        }
        return lines;
      }
      case "created":
        return [chalk.green(`${this.defaultName} configuration backed up`)];
      case "nothing_to_backup":
        return action.existingBackup
          ? [chalk.cyan(`Using existing ${this.defaultName} backup`)]
          : [
              chalk.yellow(`No ${this.defaultName} configuration to backup`),
              chalk.yellow("   You may need to re-login when switching back"),
            ];
      case "custom_not_backed_up":
        return [
          chalk.yellow("Current config is custom provider - not backing up"),
          chalk.yellow(
            `   ${this.defaultName} backup will be preserved if it exists`,
          ),
        ];
    }
  }

  private backupStatus(backup: BackupStatus): string[] {
    switch (backup.state) {
      case "default": {
        const lines = [chalk.cyan(`  Backup: Available (${this.defaultName})`)];
        if (backup.createdAt) {
          lines.push(
            `     ${chalk.cyan("Created:")} ${formatUtc(backup.createdAt)}`,
          );
        }
        if (backup.tokenKind === "default_web_token") {
          lines.push(chalk.cyan("     Token: Web login token"));
        } else if (backup.tokenKind === "alternate_key") {
          lines.push(chalk.yellow("     Token: API key (unexpected)"));
        }
        return lines;
      }
      case "unrecognized":
        return [chalk.yellow("  Backup: Available (unknown format)")];
      case "absent":
        return [chalk.yellow("  Backup: Not found")];
    }
  }

  private tokenKindSuffix(kind: TokenKind): string {
    switch (kind) {
      case "alternate_key":
        return " (API key)";
      case "default_web_token":
        return ` (web token - unexpected for ${this.alternateName})`;
      case "unknown":
        return "";
    }
  }
}
