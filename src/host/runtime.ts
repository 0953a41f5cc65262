import { existsSync } from "fs";
import { cp, mkdir, rm, writeFile } from "fs/promises";
import { join, relative } from "path";
import { pathToFileURL } from "url";
import { errorMessage } from "../utils/errors.ts";
import { getLogger } from "../utils/logger.ts";
import type {
  ExtensionContext,
  ExtensionHost,
  ExtensionLogger,
  HostLayout,
  HotpackExtension,
  LoadOutcome,
  ModuleImporter,
} from "./types.ts";

const log = getLogger("host");

const DEFAULT_ENTRIES = ["index.mjs", "index.js"];
const RUNTIME_DIR = ".runtime";

export interface ModuleHostOptions extends HostLayout {
  importModule?: ModuleImporter;
}

interface ActiveModule {
  extension: HotpackExtension;
  ctx: ExtensionContext;
  /** The copy of the package this module was imported from. */
  stagedDir: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

/** Picks the extension out of an imported module namespace, or null if it is not one. */
export function toExtension(mod: unknown): HotpackExtension | null {
  if (!isRecord(mod)) return null;
  const candidate = isRecord(mod.default) ? mod.default : mod;
  const { setup, teardown } = candidate;
  if (setup !== undefined && typeof setup !== "function") return null;
  if (teardown !== undefined && typeof teardown !== "function") return null;
  return {
    setup: typeof setup === "function" ? (ctx) => setup.call(candidate, ctx) : undefined,
    teardown: typeof teardown === "function" ? (ctx) => teardown.call(candidate, ctx) : undefined,
  };
}

function createExtensionLogger(name: string): ExtensionLogger {
  const fileLog = getLogger(`package:${name}`);
  return {
    info: (msg: string) => {
      fileLog.info(msg);
      console.log(`[package:${name}] ${msg}`);
    },
    warn: (msg: string) => {
      fileLog.warn(msg);
      console.warn(`[package:${name}] ${msg}`);
    },
    error: (msg: string) => {
      fileLog.error(msg);
      console.error(`[package:${name}] ${msg}`);
    },
  };
}

/**
 * Hot-loads package modules into the current Node process. Each activation
 * imports from its own copy of the package directory, so a reload evaluates
 * the entry and every file it imports from disk again instead of reusing
 * cached modules.
 */
export class ModuleHost implements ExtensionHost {
  private readonly active = new Map<string, ActiveModule>();
  private readonly importModule: ModuleImporter;
  private layout: HostLayout;
  private generation = 0;

  constructor(opts: ModuleHostOptions) {
    const { importModule, ...layout } = opts;
    this.layout = layout;
    this.importModule = importModule ?? ((specifier) => import(specifier));
  }

  isLoaded(name: string): boolean {
    return this.active.has(name);
  }

  loadedNames(): string[] {
    return [...this.active.keys()].sort();
  }

  retarget(layout: HostLayout): void {
    this.layout = layout;
    log.info(`Host now loads from ${layout.packagesDir}`);
  }

  resolveEntryPath(name: string): string {
    const directory = join(this.layout.packagesDir, name);
    const declared = this.layout.resolveEntry?.(name);
    if (declared) return join(directory, declared);
    const found = DEFAULT_ENTRIES.map((entry) => join(directory, entry)).find((path) => existsSync(path));
    if (!found) {
      throw new Error(`Module "${name}" has no entry point (looked for ${DEFAULT_ENTRIES.join(", ")} in ${directory})`);
    }
    return found;
  }

  private nextGeneration(): number {
    this.generation += 1;
    return this.generation;
  }

  /** Copies the package to `<stateDir>/.runtime/<name>-<generation>/`. */
  private async stage(name: string): Promise<{ stagedDir: string; entry: string }> {
    const directory = join(this.layout.packagesDir, name);
    const entry = relative(directory, this.resolveEntryPath(name));
    const stagedDir = join(this.layout.stateDir, RUNTIME_DIR, `${name}-${this.nextGeneration()}`);
    await rm(stagedDir, { recursive: true, force: true });
    await cp(directory, stagedDir, { recursive: true });
    return { stagedDir, entry: join(stagedDir, entry) };
  }

  private async discard(stagedDir: string): Promise<void> {
    try {
      await rm(stagedDir, { recursive: true, force: true });
    } catch (err) {
      log.warn(`Could not remove ${stagedDir}: ${errorMessage(err)}`);
    }
  }

  private async activate(name: string): Promise<ActiveModule> {
    const { stagedDir, entry } = await this.stage(name);
    try {
      const extension = toExtension(await this.importModule(pathToFileURL(entry).href));
      if (!extension) {
        throw new Error(`Module "${name}" is not a valid extension (setup and teardown must be functions)`);
      }
      const ctx: ExtensionContext = {
        name,
        directory: join(this.layout.packagesDir, name),
        log: createExtensionLogger(name),
      };
      if (extension.setup) await extension.setup(ctx);
      return { extension, ctx, stagedDir };
    } catch (err) {
      await this.discard(stagedDir);
      throw err;
    }
  }

  async load(name: string): Promise<LoadOutcome> {
    if (this.active.has(name)) {
      return { status: "already-loaded" };
    }
    const current = await this.activate(name);
    this.active.set(name, current);
    log.info(`Loaded ${name}`);
    return { status: "loaded" };
  }

  async unload(name: string): Promise<void> {
    const current = this.active.get(name);
    if (!current) {
      throw new Error(`Module "${name}" is not loaded`);
    }
    this.active.delete(name);
    try {
      if (current.extension.teardown) await current.extension.teardown(current.ctx);
    } finally {
      await this.discard(current.stagedDir);
    }
    log.info(`Unloaded ${name}`);
  }

  async reload(name: string): Promise<void> {
    if (this.active.has(name)) {
      await this.unload(name);
    }
    const current = await this.activate(name);
    this.active.set(name, current);
    log.info(`Reloaded ${name}`);
  }

  async execute(source: string, label: string): Promise<void> {
    await mkdir(this.layout.stateDir, { recursive: true });
    const path = join(this.layout.stateDir, label.endsWith(".mjs") ? label : `${label}.mjs`);
    await writeFile(path, source, "utf-8");

    // A single file, so a query string is enough to skip the module cache.
    const url = pathToFileURL(path);
    url.searchParams.set("v", String(this.nextGeneration()));
    const mod = await this.importModule(url.href);
    const run = isRecord(mod) ? mod.default : undefined;
    if (typeof run === "function") {
      await run({ host: this, log: createExtensionLogger(label) });
    }
    log.info(`Executed ${label}`);
  }
}
