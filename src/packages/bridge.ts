import type { ExtensionHost } from "../host/types.ts";
import { CliError, EXIT_FAILURE, ErrorCode, errorMessage } from "../utils/errors.ts";
import { getLogger } from "../utils/logger.ts";
import type { ActivationOutcome } from "./types.ts";

const log = getLogger("bridge");

/**
 * Activates an installed package in the host. An already active module is
 * reloaded, which is the normal path for reinstalls and updates.
 */
export async function activatePackage(
  host: ExtensionHost,
  name: string,
  reportTo?: string,
): Promise<ActivationOutcome> {
  try {
    const outcome = await host.load(name);
    if (outcome.status === "loaded") return "loaded";

    await host.reload(name);
    return "reloaded";
  } catch (err) {
    log.error(`Activation of ${name} failed`, err);
    throw new CliError(`Failed to activate module "${name}": ${errorMessage(err)}`, {
      code: EXIT_FAILURE,
      errorCode: ErrorCode.ACTIVATION_FAILED,
      reportTo,
      suggestion: "The package files are still on disk. Reinstall or uninstall it once the problem is fixed.",
    });
  }
}

/** Unloads a module if the host has it; a module that is not loaded is skipped. */
export async function deactivatePackage(host: ExtensionHost, name: string): Promise<boolean> {
  if (!host.isLoaded(name)) return false;
  await host.unload(name);
  return true;
}
