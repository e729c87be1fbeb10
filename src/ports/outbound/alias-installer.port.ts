export type AliasInstallResult =
  | { status: "installed"; rcFile: string }
  | { status: "already_present"; rcFile: string };

export interface AliasInstallerPort {
  install(): Promise<AliasInstallResult>;
}
