import { SwitchProviderUseCase } from "../../../application/switch/switch-provider.usecase";
import { AliasInstallerPort } from "../../../ports/outbound/alias-installer.port";
import { SwitchPresenter } from "../../presenter/switch-presenter";

export interface SwitchCommandDeps {
  useCase: SwitchProviderUseCase;
  presenter: SwitchPresenter;
  print?: (line: string) => void;
}

export interface InstallCommandDeps {
  installer: AliasInstallerPort;
  presenter: SwitchPresenter;
  print?: (line: string) => void;
}

function printerFor(deps: { print?: (line: string) => void }) {
  return deps.print ?? ((line: string) => console.log(line));
}

export async function runSwitchToDefaultCommand(
  deps: SwitchCommandDeps,
): Promise<void> {
  const print = printerFor(deps);
  print(deps.presenter.switchingToDefault());
  const outcome = await deps.useCase.switchToDefault();
  deps.presenter.switchToDefault(outcome).forEach(print);
}

export async function runSwitchToAlternateCommand(
  deps: SwitchCommandDeps,
): Promise<void> {
  const print = printerFor(deps);
  print(deps.presenter.switchingToAlternate());
  const outcome = await deps.useCase.switchToAlternate();
  deps.presenter.switchToAlternate(outcome).forEach(print);
}

export async function runStatusCommand(deps: SwitchCommandDeps): Promise<void> {
  const print = printerFor(deps);
  const report = await deps.useCase.showStatus();
  deps.presenter.status(report).forEach(print);
}

export async function runClearTokenCommand(
  deps: SwitchCommandDeps,
): Promise<void> {
  const print = printerFor(deps);
  const outcome = await deps.useCase.clearToken();
  deps.presenter.clearToken(outcome).forEach(print);
}

export async function runInstallCommand(
  deps: InstallCommandDeps,
): Promise<void> {
  const print = printerFor(deps);
  const result = await deps.installer.install();
  deps.presenter.install(result).forEach(print);
}
