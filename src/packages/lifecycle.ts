import { performance } from "perf_hooks";
import type { ContentSource } from "../api/types.ts";
import type { Config } from "../config/index.ts";
import { splitSource } from "../config/index.ts";
import type { ExtensionHost } from "../host/types.ts";
import {
  CliError,
  EXIT_FAILURE,
  EXIT_NOT_FOUND,
  EXIT_UNTRUSTED,
  ErrorCode,
  didYouMean,
  errorMessage,
} from "../utils/errors.ts";
import type { KeyedLock } from "../utils/keyed-lock.ts";
import { getLogger } from "../utils/logger.ts";
import { activatePackage, deactivatePackage } from "./bridge.ts";
import { installFiles } from "./installer.ts";
import { fetchManifest, resolveDisplay } from "./manifest.ts";
import { assertPackageName, formatReference, resolveReference } from "./reference.ts";
import type { PackageStore } from "./store.ts";
import type {
  FileFailure,
  InstallResult,
  InstalledPackageSummary,
  PackageManifest,
  PackageView,
  SelfView,
  UninstallResult,
} from "./types.ts";
import type { VerificationService } from "./verification.ts";

const log = getLogger("lifecycle");

export const SELF_NAME = "hotpack";

/** Everything the lifecycle operations share within one host session. */
export interface InstallerContext {
  config: Config;
  source: ContentSource;
  store: PackageStore;
  host: ExtensionHost;
  verification: VerificationService;
  locks: KeyedLock;
  version: string;
}

export interface InstallHooks {
  /** The manifest is fetched and persisted; file downloads are about to start. */
  onManifest?: (manifest: PackageManifest) => void;
  onFileFailed?: (failure: FileFailure) => void;
}

export function untrustedReferenceError(repo: string): CliError {
  return new CliError(
    `CAUTION: ${repo} has not been verified. All packages you install can modify your host process.`,
    {
      code: EXIT_UNTRUSTED,
      errorCode: ErrorCode.UNTRUSTED_REFERENCE,
      suggestion: "Run `verify` to confirm you want to install this package, then install it again.",
    },
  );
}

// ── Install ──

export async function installPackage(
  ctx: InstallerContext,
  input: string,
  hooks: InstallHooks = {},
): Promise<InstallResult> {
  const startedAt = performance.now();

  const ref = resolveReference(input, ctx.verification.trustRegistry);
  const decision = ctx.verification.evaluate(ref);
  if (decision.state === "blocked") {
    throw untrustedReferenceError(formatReference(ref));
  }

  const { manifest, raw } = await fetchManifest(ctx.source, ref);

  return ctx.locks.run(manifest.name, async () => {
    // Saved under the lock so a concurrent uninstall cannot delete it mid-install.
    await ctx.store.saveManifest(manifest.name, raw);
    hooks.onManifest?.(manifest);

    const files = await installFiles(ctx.source, ctx.store, ref, manifest, {
      platform: ctx.config.platform,
      onFileFailed: hooks.onFileFailed,
    });
    const activation = await activatePackage(ctx.host, manifest.name, manifest.author);
    const durationMs = Math.round(performance.now() - startedAt);

    log.info(
      `Installed ${manifest.name}@${manifest.version} from ${formatReference(ref)} in ${durationMs}ms ` +
      `(${activation}, ${files.failures.length} failed file(s))`,
    );

    return {
      name: manifest.name,
      version: manifest.version,
      author: manifest.author,
      description: manifest.description,
      display: resolveDisplay(manifest),
      verified: decision.verified,
      activation,
      written: files.written,
      failures: files.failures,
      durationMs,
    };
  });
}

// ── Uninstall ──

export function packageNotFound(name: string, candidates: string[]): CliError {
  const guess = didYouMean(name, candidates);
  return new CliError(`The package "${name}" does not exist.`, {
    code: EXIT_NOT_FOUND,
    errorCode: ErrorCode.NOT_FOUND,
    suggestion: guess ? `Did you mean "${guess}"?` : undefined,
  });
}

export async function uninstallPackage(ctx: InstallerContext, name: string): Promise<UninstallResult> {
  assertPackageName(name);

  return ctx.locks.run(name, async () => {
    if (!ctx.store.hasPackageDir(name)) {
      throw packageNotFound(name, ctx.store.listManifestNames());
    }

    await ctx.store.removePackage(name);

    let unloaded: boolean;
    try {
      unloaded = await deactivatePackage(ctx.host, name);
    } catch (err) {
      throw new CliError(`Removed the files of "${name}" but could not unload it: ${errorMessage(err)}`, {
        code: EXIT_FAILURE,
        errorCode: ErrorCode.ACTIVATION_FAILED,
      });
    }

    log.info(`Uninstalled ${name}${unloaded ? "" : " (module was not loaded)"}`);
    return { name, unloaded };
  });
}

// ── View ──

export function viewPackage(ctx: InstallerContext, name: string): PackageView {
  assertPackageName(name);
  const manifest = ctx.store.readManifest(name);
  if (!manifest) {
    throw packageNotFound(name, ctx.store.listManifestNames());
  }
  return {
    name: manifest.name,
    version: manifest.version,
    description: manifest.description,
    author: manifest.author,
    display: resolveDisplay(manifest),
    installed: ctx.store.hasPackageDir(name),
    loaded: ctx.host.isLoaded(name),
  };
}

export function listInstalled(ctx: InstallerContext): InstalledPackageSummary[] {
  return ctx.store.listManifestNames().map((name) => {
    let version = "unknown";
    try {
      version = ctx.store.readManifest(name)?.version ?? "unknown";
    } catch (err) {
      log.warn(`Unreadable manifest for ${name}: ${errorMessage(err)}`);
    }
    return { name, version, loaded: ctx.host.isLoaded(name) };
  });
}

/**
 * Reads the published version from the self package's version file. Any
 * failure means "unknown", never an error: the notice is informational.
 */
export async function fetchLatestVersion(ctx: InstallerContext): Promise<string | null> {
  const { self } = ctx.config;
  try {
    const result = await ctx.source.getFile(splitSource(self.source), self.version_file);
    if (!result.ok) return null;
    const parsed: unknown = JSON.parse(result.content.toString("utf-8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return null;
  } catch (err) {
    log.warn(`Version check failed: ${errorMessage(err)}`);
    return null;
  }
}

export async function viewSelf(ctx: InstallerContext): Promise<SelfView> {
  const latestVersion = ctx.config.outdated_warnings ? await fetchLatestVersion(ctx) : null;
  return {
    name: SELF_NAME,
    version: ctx.version,
    latestVersion,
    outdated: latestVersion !== null && latestVersion !== ctx.version,
  };
}

// ── Self update ──

/**
 * Fetches the installer script of the self package and runs it in the host.
 * This path does not go through the trust gate.
 */
export async function updateSelf(ctx: InstallerContext): Promise<void> {
  const { self } = ctx.config;
  const repo = splitSource(self.source);
  const result = await ctx.source.getFile(repo, self.script);

  if (!result.ok) {
    throw new CliError(`Failed to update ${SELF_NAME}.`, {
      code: EXIT_FAILURE,
      errorCode: ErrorCode.FETCH_FAILED,
      status: result.status,
      reportTo: repo.owner,
    });
  }

  log.info(`Running self-update script ${self.source}/${self.script}`);
  await ctx.host.execute(result.content.toString("utf-8"), "self-update");
}

// ── Startup ──

/** Loads every installed package into the host; one broken package does not stop the rest. */
export async function activateInstalled(
  ctx: InstallerContext,
): Promise<{ loaded: string[]; failed: Array<{ name: string; error: string }> }> {
  const loaded: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  for (const name of ctx.store.listManifestNames()) {
    if (!ctx.store.hasPackageDir(name)) continue;
    try {
      await activatePackage(ctx.host, name);
      loaded.push(name);
    } catch (err) {
      failed.push({ name, error: errorMessage(err) });
    }
  }

  return { loaded, failed };
}
