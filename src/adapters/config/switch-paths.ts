import * as os from "os";
import * as path from "path";
import { HomeDirectoryUnavailableError } from "../../shared/errors";

export interface SwitchPaths {
  configDir: string;
  settingsFile: string;
  backupFile: string;
  backupMetadataFile: string;
  tokenFile: string;
}

export function buildSwitchPaths(configDir: string): SwitchPaths {
  return {
    configDir,
    settingsFile: path.join(configDir, "settings.json"),
    backupFile: path.join(configDir, "settings.json.backup"),
    backupMetadataFile: path.join(configDir, "settings.json.meta"),
    tokenFile: path.join(configDir, ".z_ai_token"),
  };
}

export function resolveSwitchPaths(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): SwitchPaths {
  const configured = env.CLAUDE_CONFIG_DIR?.trim();
  if (configured) {
    return buildSwitchPaths(configured);
  }

  let home: string;
  try {
    home = homedir();
  } catch {
    throw new HomeDirectoryUnavailableError();
  }
  if (!home) {
    throw new HomeDirectoryUnavailableError();
  }
  return buildSwitchPaths(path.join(home, ".claude"));
}
