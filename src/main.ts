import { Command } from "commander";
import { FileConfigStoreAdapter } from "./adapters/config/file-config-store.adapter";
import { resolveSwitchPaths } from "./adapters/config/switch-paths";
import { ShellAliasInstallerAdapter } from "./adapters/shell/shell-alias-installer.adapter";
import { InteractiveTokenSupplierAdapter } from "./adapters/token/interactive-token-supplier.adapter";
import { SwitchProviderUseCase } from "./application/switch/switch-provider.usecase";
import {
  runClearTokenCommand,
  runInstallCommand,
  runStatusCommand,
  runSwitchToAlternateCommand,
  runSwitchToDefaultCommand,
} from "./interaction/cli/commands/switch.command";
import { SwitchPresenter } from "./interaction/presenter/switch-presenter";
import { AliasInstallerPort } from "./ports/outbound/alias-installer.port";
import { describeError } from "./shared/errors";
import { logger } from "./utils/logger";

export const VERSION = "2.3.0";

const HELP_FOOTER = `
Authentication:
  anthropic  Uses the default configuration (automatically backed up)
  glm        Uses an API key (prompted, saved, or from GLM_AUTH_TOKEN)

Environment Variables:
  GLM_AUTH_TOKEN     GLM API key (optional)
  CLAUDE_CONFIG_DIR  Settings directory (default: ~/.claude)

Examples:
  claude-switch glm        # Back up Anthropic settings, switch to GLM
  claude-switch anthropic  # Restore Anthropic settings from backup
  claude-switch status     # Check current provider

Note: Switching to GLM backs up your Anthropic configuration.
      Use \`claude-switch anthropic\` to restore it later.`;

function createDefaultUseCase(): SwitchProviderUseCase {
  const store = new FileConfigStoreAdapter(resolveSwitchPaths());
  return new SwitchProviderUseCase(
    store,
    new InteractiveTokenSupplierAdapter({ store }),
  );
}

export function createProgram(deps?: {
  useCase?: SwitchProviderUseCase;
  installer?: AliasInstallerPort;
  presenter?: SwitchPresenter;
  print?: (line: string) => void;
}): Command {
  const presenter = deps?.presenter ?? new SwitchPresenter();
  const print = deps?.print;
  let useCase = deps?.useCase;
  const getUseCase = (): SwitchProviderUseCase => {
    if (!useCase) {
      useCase = createDefaultUseCase();
    }
    return useCase;
  };

  const runAction = async (
    name: string,
    action: () => Promise<void>,
  ): Promise<void> => {
    try {
      await action();
    } catch (error) {
      const message = describeError(error);
      await logger.error(`${name} failed: ${message}`);
      console.error(presenter.error(message));
      process.exitCode = 1;
    }
  };

  const program = new Command();

  program
    .name("claude-switch")
    .description(
      "Switch the AI coding assistant between Anthropic and GLM API settings",
    )
    .version(VERSION, "-v, --version")
    .addHelpText("after", HELP_FOOTER)
    .action(() => {
      program.outputHelp();
    });

  program
    .command("anthropic")
    .alias("a")
    .description("Switch to Anthropic API (restore configuration)")
    .action(async () => {
      await runAction("anthropic", () =>
        runSwitchToDefaultCommand({ useCase: getUseCase(), presenter, print }),
      );
    });

  program
    .command("glm")
    .alias("g")
    .description("Switch to GLM API (use API key)")
    .action(async () => {
      await runAction("glm", () =>
        runSwitchToAlternateCommand({ useCase: getUseCase(), presenter, print }),
      );
    });

  program
    .command("status")
    .alias("s")
    .description("Show current configuration")
    .action(async () => {
      await runAction("status", () =>
        runStatusCommand({ useCase: getUseCase(), presenter, print }),
      );
    });

  program
    .command("clear-token")
    .description("Remove saved GLM API token")
    .action(async () => {
      await runAction("clear-token", () =>
        runClearTokenCommand({ useCase: getUseCase(), presenter, print }),
      );
    });

  program
    .command("install")
    .description("Install aliases to shell")
    .action(async () => {
      await runAction("install", () =>
        runInstallCommand({
          installer: deps?.installer ?? new ShellAliasInstallerAdapter(),
          presenter,
          print,
        }),
      );
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
