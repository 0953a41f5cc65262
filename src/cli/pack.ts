import type { Command } from "commander";
import chalk from "chalk";
import {
  SELF_NAME,
  installPackage,
  listInstalled,
  uninstallPackage,
  updateSelf,
  viewPackage,
  viewSelf,
} from "../packages/lifecycle.ts";
import { DEFAULT_COLOR } from "../packages/manifest.ts";
import type { FileFailure, InstallResult, PackageView, SelfView } from "../packages/types.ts";
import type { SessionHandle } from "./session.ts";

const SELF_COLOR = `#${DEFAULT_COLOR}`;

export function formatFileFailure(failure: FileFailure): string {
  return [
    chalk.red(`Failed to install the \`${failure.path}\` file.`),
    `Report this issue to \`${failure.reportTo}\`.`,
    chalk.dim(`ERROR CODE: ${failure.status}`),
  ].join("\n");
}

export function formatInstallResult(result: InstallResult): string {
  const lines = [chalk.hex(`#${result.display.color}`).bold(`${result.name} Installed`)];
  lines.push(`${result.name} has been installed to your host`);
  if (result.description) lines.push(chalk.dim(result.description));
  if (result.failures.length > 0) {
    lines.push(chalk.yellow(`${result.failures.length} of ${result.failures.length + result.written.length} file(s) failed to install`));
  }
  const reloaded = result.activation === "reloaded" ? " (reloaded)" : "";
  lines.push(chalk.dim(`${result.name} took ${result.durationMs}ms to install${reloaded}`));
  return lines.join("\n");
}

export function formatPackageView(view: PackageView): string {
  const lines = [chalk.hex(`#${view.display.color}`).bold(view.name)];
  if (view.description) lines.push(view.description);
  lines.push(chalk.dim(`Author: ${view.author}`));
  if (view.display.logo) lines.push(chalk.dim(`Logo: ${view.display.logo}`));
  const state = view.loaded ? chalk.green("loaded") : view.installed ? chalk.yellow("not loaded") : chalk.red("files missing");
  lines.push(`${chalk.dim(`${view.name} ${view.version}`)} ${state}`);
  return lines.join("\n");
}

export function formatSelfView(view: SelfView): string {
  const status = view.outdated ? "OUTDATED" : "LATEST";
  const lines = [
    chalk.hex(SELF_COLOR).bold(view.name),
    `${view.name} installs packages from remote repositories into this host and hot-loads them.`,
    chalk.dim(`${view.name} ${view.version} (${status})`),
  ];
  if (view.outdated && view.latestVersion) {
    lines.push(chalk.yellow(
      `${view.name} v${view.version} is outdated. Please update to v${view.latestVersion} using \`update-self\`.`,
    ));
  }
  return lines.join("\n");
}

export function registerPackCommands(program: Command, session: SessionHandle): void {
  // ── view [package] ──
  program
    .command("view")
    .description("Display information about a package")
    .argument("[package]", "Package name", SELF_NAME)
    .action(async (name: string) => {
      if (name === SELF_NAME) {
        console.log(formatSelfView(await viewSelf(session.context)));
        return;
      }
      console.log(formatPackageView(viewPackage(session.context, name)));
    });

  // ── list ──
  program
    .command("list")
    .description("List installed packages")
    .action(() => {
      const installed = listInstalled(session.context);
      if (installed.length === 0) {
        console.log(chalk.dim("No packages installed."));
        return;
      }
      console.log(chalk.bold("Installed Packages"));
      console.log("");
      for (const pkg of installed) {
        const status = pkg.loaded ? chalk.green("●") : chalk.yellow("○");
        console.log(`  ${status} ${chalk.bold(pkg.name)} ${chalk.cyan("v" + pkg.version)}`);
      }
    });

  // ── install <reference> ──
  program
    .command("install")
    .description("Install a package by verified name or by repository (owner/repo)")
    .argument("<reference>", "Verified package name, owner/repo or https://github.com/owner/repo")
    .action(async (reference: string) => {
      const result = await installPackage(session.context, reference, {
        onManifest: (manifest) => {
          const color = manifest.color ?? DEFAULT_COLOR;
          console.log(chalk.hex(`#${color}`)(`Installing ${manifest.name} v${manifest.version}`));
          console.log(chalk.dim("Please do not stop the host until the install finishes."));
        },
        onFileFailed: (failure) => console.error(formatFileFailure(failure)),
      });
      console.log(formatInstallResult(result));
    });

  // ── uninstall <package> ──
  program
    .command("uninstall")
    .description("Remove an installed package and unload it")
    .argument("<package>", "Package name")
    .action(async (name: string) => {
      const result = await uninstallPackage(session.context, name);
      console.log(chalk.red.bold(`Removed ${result.name}`));
      console.log(`The ${result.name} package has been removed from your host.`);
    });

  // ── verify ──
  program
    .command("verify")
    .description("Confirm that the next install may use an unverified repository")
    .action(() => {
      session.context.verification.confirm();
      console.log(chalk.green("✔ Confirmed. The next install will proceed without verification."));
    });

  // ── update-self ──
  program
    .command("update-self")
    .description(`Update ${SELF_NAME} to the latest version`)
    .action(async () => {
      await updateSelf(session.context);
      console.log(chalk.green(`Ran the ${SELF_NAME} update script.`));
    });

  // ── reload-self ──
  program
    .command("reload-self")
    .description(`Reload ${SELF_NAME}'s configuration and verified package list`)
    .action(async () => {
      await session.reload();
      console.log(chalk.green(`Reloaded ${SELF_NAME}`));
    });
}
