import { existsSync, readFileSync, readdirSync } from "fs";
import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import type { PathsConfig } from "../config/index.ts";
import { getLogger } from "../utils/logger.ts";
import { parseManifest } from "./manifest.ts";
import type { PackageManifest } from "./types.ts";

const log = getLogger("store");

const MANIFEST_EXTENSION = ".toml";

/**
 * Local state of installed packages: one persisted manifest per package in
 * the data directory and one directory of files per package.
 */
export class PackageStore {
  constructor(private readonly paths: PathsConfig) {}

  get packagesDir(): string {
    return this.paths.packages;
  }

  manifestPath(name: string): string {
    return join(this.paths.data, `${name}${MANIFEST_EXTENSION}`);
  }

  packageDir(name: string): string {
    return join(this.paths.packages, name);
  }

  hasPackageDir(name: string): boolean {
    return existsSync(this.packageDir(name));
  }

  async saveManifest(name: string, raw: Buffer): Promise<void> {
    await mkdir(this.paths.data, { recursive: true });
    await writeFile(this.manifestPath(name), raw);
  }

  readManifest(name: string): PackageManifest | null {
    const path = this.manifestPath(name);
    if (!existsSync(path)) return null;
    return parseManifest(readFileSync(path, "utf-8"));
  }

  listManifestNames(): string[] {
    if (!existsSync(this.paths.data)) return [];
    return readdirSync(this.paths.data)
      .filter((file) => file.endsWith(MANIFEST_EXTENSION))
      .map((file) => file.slice(0, -MANIFEST_EXTENSION.length))
      .sort();
  }

  /** Creates the package directory; an existing one from a prior install is kept. */
  async ensurePackageDir(name: string): Promise<string> {
    const dir = this.packageDir(name);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  async removePackage(name: string): Promise<void> {
    await rm(this.packageDir(name), { recursive: true, force: true });
    await rm(this.manifestPath(name), { force: true });
    log.info(`Removed files and manifest of ${name}`);
  }
}
