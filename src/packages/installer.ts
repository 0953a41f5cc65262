import { mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { ContentResult, ContentSource } from "../api/types.ts";
import { CliError, EXIT_FAILURE, ErrorCode, errorMessage } from "../utils/errors.ts";
import { getLogger } from "../utils/logger.ts";
import type { PackageStore } from "./store.ts";
import type { FileFailure, FileInstallResult, PackageManifest, PackageReference } from "./types.ts";

const log = getLogger("installer");

export interface InstallFilesOptions {
  platform: string;
  /** Called as soon as a single file fails, before the other downloads settle. */
  onFileFailed?: (failure: FileFailure) => void;
}

export function assertSupported(manifest: PackageManifest, platform: string): void {
  if (!manifest.supported.includes(platform)) {
    throw new CliError(`This package does not support ${platform}.`, {
      code: EXIT_FAILURE,
      errorCode: ErrorCode.UNSUPPORTED_PLATFORM,
      reportTo: manifest.author,
      suggestion: manifest.supported.length > 0
        ? `Supported platforms: ${manifest.supported.join(", ")}.`
        : undefined,
    });
  }
}

/**
 * Downloads every file a manifest lists into the package directory. Files are
 * independent: they download concurrently and a failed one is reported while
 * the rest carry on. Nothing is written when the platform is unsupported.
 */
export async function installFiles(
  source: ContentSource,
  store: PackageStore,
  ref: PackageReference,
  manifest: PackageManifest,
  opts: InstallFilesOptions,
): Promise<FileInstallResult> {
  assertSupported(manifest, opts.platform);

  const directory = await store.ensurePackageDir(manifest.name);
  const written: string[] = [];
  const failures: FileFailure[] = [];

  const fail = (path: string, status: number): void => {
    const failure: FileFailure = { path, status, reportTo: manifest.author };
    failures.push(failure);
    log.warn(`Failed to install ${manifest.name}/${path} (${status})`);
    opts.onFileFailed?.(failure);
  };

  const settled = await Promise.allSettled(
    manifest.files.map(async (file) => {
      let result: ContentResult;
      try {
        result = await source.getFile(ref, `${manifest.name}/${file}`);
      } catch (err) {
        log.error(`Download of ${manifest.name}/${file} threw`, err);
        fail(file, 0);
        return;
      }

      if (!result.ok) {
        fail(file, result.status);
        return;
      }

      const target = join(directory, file);
      try {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, result.content);
      } catch (err) {
        throw new CliError(`Could not write ${target}: ${errorMessage(err)}`, {
          code: EXIT_FAILURE,
          errorCode: ErrorCode.UNKNOWN,
        });
      }
      written.push(file);
    }),
  );

  // A local write failure is terminal, but only once every download has settled.
  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason;
  }

  // Completion order is arbitrary; report in manifest order.
  const order = new Map(manifest.files.map((file, index) => [file, index]));
  const byManifestOrder = (a: string, b: string) => (order.get(a) ?? 0) - (order.get(b) ?? 0);
  written.sort(byManifestOrder);
  failures.sort((a, b) => byManifestOrder(a.path, b.path));

  log.info(`Installed ${written.length}/${manifest.files.length} file(s) of ${manifest.name}`);
  return { directory, written, failures };
}
