import { ContentsClient } from "../api/client.ts";
import type { ContentSource } from "../api/types.ts";
import { getConfig, resolveConfigDir } from "../config/index.ts";
import type { Config } from "../config/index.ts";
import { ModuleHost } from "../host/runtime.ts";
import type { ExtensionHost, HostLayout } from "../host/types.ts";
import type { InstallerContext } from "../packages/lifecycle.ts";
import { PackageStore } from "../packages/store.ts";
import { VerificationService, fetchTrustRegistry } from "../packages/verification.ts";
import { KeyedLock } from "../utils/keyed-lock.ts";
import { getLogger } from "../utils/logger.ts";
import { VERSION } from "../version.ts";

const log = getLogger("session");

/** What the commands need from the process hosting them. */
export interface SessionHandle {
  readonly context: InstallerContext;
  /** Re-reads the configuration and rebuilds the trust registry. */
  reload(): Promise<void>;
}

export interface SessionOptions {
  configDir?: string;
  /** Overrides the HTTP client, mainly for tests. */
  source?: (config: Config) => ContentSource;
  host?: (config: Config, store: PackageStore) => ExtensionHost;
}

function hostLayout(config: Config, store: PackageStore): HostLayout {
  return {
    packagesDir: config.paths.packages,
    stateDir: config.paths.data,
    resolveEntry: (name) => store.readManifest(name)?.main,
  };
}

/**
 * Process-wide state of one running host: configuration, the trust registry
 * with its confirmation flag, and the loaded modules. The registry is built
 * once here and only rebuilt by an explicit reload.
 */
export class Session implements SessionHandle {
  private ctx: InstallerContext;

  private constructor(
    ctx: InstallerContext,
    private readonly opts: SessionOptions,
  ) {
    this.ctx = ctx;
  }

  get context(): InstallerContext {
    return this.ctx;
  }

  private static async build(opts: SessionOptions, previous?: InstallerContext): Promise<InstallerContext> {
    const config = getConfig(opts.configDir ?? resolveConfigDir());
    const source = opts.source ? opts.source(config) : new ContentsClient(config.github);
    const store = new PackageStore(config.paths);
    const registry = await fetchTrustRegistry(source, config.registry);

    let host: ExtensionHost;
    if (previous) {
      host = previous.host;
      host.retarget(hostLayout(config, store));
    } else {
      host = opts.host ? opts.host(config, store) : new ModuleHost(hostLayout(config, store));
    }

    return {
      config,
      source,
      store,
      host,
      verification: new VerificationService(registry, config.safe_mode),
      locks: previous?.locks ?? new KeyedLock(),
      version: VERSION,
    };
  }

  static async create(opts: SessionOptions = {}): Promise<Session> {
    const ctx = await Session.build(opts);
    log.info(`Session started (safe mode ${ctx.config.safe_mode ? "on" : "off"}, platform ${ctx.config.platform})`);
    return new Session(ctx, opts);
  }

  /**
   * Loaded modules and package locks survive a reload; everything else is
   * rebuilt, and the host is pointed at the reloaded paths.
   */
  async reload(): Promise<void> {
    this.ctx = await Session.build(this.opts, this.ctx);
    log.info("Session reloaded");
  }
}
