// ── Extension module contract ──

export interface ExtensionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ExtensionContext {
  name: string;
  directory: string;
  log: ExtensionLogger;
}

/**
 * Shape of a package's entry module: the default export, or the module
 * namespace itself when there is none.
 */
export interface HotpackExtension {
  setup?(ctx: ExtensionContext): void | Promise<void>;
  teardown?(ctx: ExtensionContext): void | Promise<void>;
}

// ── Host runtime ──

export type LoadOutcome = { status: "loaded" } | { status: "already-loaded" };

/** Where the host finds package files and stages what it runs. */
export interface HostLayout {
  packagesDir: string;
  stateDir: string;
  /** Entry file relative to the package directory, when the package names one. */
  resolveEntry?: (name: string) => string | undefined;
}

/** The running process that owns package modules. */
export interface ExtensionHost {
  /** Activates a module; reports instead of failing when it is already active. */
  load(name: string): Promise<LoadOutcome>;
  reload(name: string): Promise<void>;
  unload(name: string): Promise<void>;
  isLoaded(name: string): boolean;
  loadedNames(): string[];
  /** Points later loads at a new layout; modules already loaded stay active. */
  retarget(layout: HostLayout): void;
  /** Runs privileged code (the self-update script) inside the host. */
  execute(source: string, label: string): Promise<void>;
}

export type ModuleImporter = (specifier: string) => Promise<unknown>;
