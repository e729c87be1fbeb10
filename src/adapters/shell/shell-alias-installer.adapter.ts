import * as fs from "fs";
import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import {
  AliasInstallerPort,
  AliasInstallResult,
} from "../../ports/outbound/alias-installer.port";
import { IoError } from "../../shared/errors";
import { logger } from "../../utils/logger";

export const ALIAS_BLOCK_MARKER = "# claude-switch aliases";

type ShellName = "zsh" | "bash" | "fish";

interface ShellCandidate {
  file: string;
  shell: ShellName;
}

export interface ShellAliasInstallerOptions {
  homeDir?: string;
  shell?: string;
  command?: string;
}

const ALIASES: ReadonlyArray<{ name: string; subcommand: string }> = [
  { name: "claude-anthropic", subcommand: "anthropic" },
  { name: "claude-glm", subcommand: "glm" },
  { name: "claude-status", subcommand: "status" },
];

export function buildAliasBlock(shell: ShellName, command: string): string {
  const lines = ALIASES.map(({ name, subcommand }) =>
    shell === "fish"
      ? `alias ${name} '${command} ${subcommand}'`
      : `alias ${name}='${command} ${subcommand}'`,
  );
  return [ALIAS_BLOCK_MARKER, ...lines].join("\n") + "\n";
}

export class ShellAliasInstallerAdapter implements AliasInstallerPort {
  private readonly homeDir: string;
  private readonly shell: string;
  private readonly command: string;

  constructor(options: ShellAliasInstallerOptions = {}) {
    this.homeDir = options.homeDir ?? os.homedir();
    this.shell = options.shell ?? process.env.SHELL ?? "";
    this.command = options.command ?? "claude-switch";
  }

  detectShellConfig(): ShellCandidate | undefined {
    const existing = this.candidates().filter((candidate) =>
      fs.existsSync(candidate.file),
    );
    return (
      existing.find((candidate) => this.shell.includes(candidate.shell)) ??
      existing[0]
    );
  }

  async install(): Promise<AliasInstallResult> {
    const target = this.detectShellConfig();
    if (!target) {
      throw new Error("No supported shell configuration found");
    }

    let content: string;
    try {
      content = await fsp.readFile(target.file, "utf-8");
    } catch (error) {
      throw new IoError(`Failed to read ${target.file}`, error);
    }

    if (content.includes(ALIAS_BLOCK_MARKER)) {
      return { status: "already_present", rcFile: target.file };
    }

    const separator =
      content.length === 0 || content.endsWith("\n") ? "\n" : "\n\n";
    try {
      await fsp.appendFile(
        target.file,
        separator + buildAliasBlock(target.shell, this.command),
        "utf-8",
      );
    } catch (error) {
      throw new IoError(`Failed to write to ${target.file}`, error);
    }

    await logger.info(`Installed shell aliases into ${target.file}`);
    return { status: "installed", rcFile: target.file };
  }

  private candidates(): ShellCandidate[] {
    return [
      { file: path.join(this.homeDir, ".zshrc"), shell: "zsh" },
      { file: path.join(this.homeDir, ".bashrc"), shell: "bash" },
      { file: path.join(this.homeDir, ".bash_profile"), shell: "bash" },
      {
        file: path.join(this.homeDir, ".config", "fish", "config.fish"),
        shell: "fish",
      },
    ];
  }
}
