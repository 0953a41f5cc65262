import type { ContentSource, RepoRef } from "../api/types.ts";
import type { RegistryConfig } from "../config/index.ts";
import { splitSource } from "../config/index.ts";
import { errorMessage } from "../utils/errors.ts";
import { getLogger } from "../utils/logger.ts";
import { parseRawReference } from "./reference.ts";
import type { GateDecision, PackageReference } from "./types.ts";

const log = getLogger("verification");

/**
 * Parses the verified package list: one `name : owner/repo` entry per line.
 * Blank lines and `#` comments are skipped, malformed lines are logged and
 * skipped. A later duplicate name replaces an earlier one.
 */
export function parseTrustList(text: string): Map<string, RepoRef> {
  const entries = new Map<string, RepoRef>();

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) return;

    const separator = line.indexOf(":");
    const name = separator > 0 ? line.slice(0, separator).trim() : "";
    const ref = separator > 0 ? parseRawReference(line.slice(separator + 1).trim()) : null;

    if (!name || !ref) {
      log.warn(`Skipping malformed trust list line ${index + 1}: ${rawLine}`);
      return;
    }
    entries.set(name, ref);
  });

  return entries;
}

/**
 * Fetches and parses the verified list. Best-effort: any failure yields an
 * empty registry and a warning, and nothing retries it.
 */
export async function fetchTrustRegistry(
  source: ContentSource,
  config: RegistryConfig,
): Promise<Map<string, RepoRef>> {
  const repo = splitSource(config.source);
  try {
    const result = await source.getFile(repo, config.path);
    if (!result.ok) {
      log.warn(`Failed to verify packages: ${config.source}/${config.path} returned ${result.status}`);
      return new Map();
    }
    const registry = parseTrustList(result.content.toString("utf-8"));
    log.info(`Loaded ${registry.size} verified package(s) from ${config.source}`);
    return registry;
  } catch (err) {
    log.warn(`Failed to verify packages: ${errorMessage(err)}`);
    return new Map();
  }
}

/**
 * Owns the trust registry and the one-shot confirmation flag. The registry
 * is fixed at construction; the flag is the only mutable state.
 */
export class VerificationService {
  private readonly registry: ReadonlyMap<string, RepoRef>;
  private confirmed = false;

  constructor(
    registry: ReadonlyMap<string, RepoRef>,
    private readonly safeMode: boolean,
  ) {
    this.registry = new Map(registry);
  }

  get trustRegistry(): ReadonlyMap<string, RepoRef> {
    return this.registry;
  }

  get isSafeMode(): boolean {
    return this.safeMode;
  }

  get hasPendingConfirmation(): boolean {
    return this.confirmed;
  }

  /** Grants one confirmation. Granting again while one is pending changes nothing. */
  confirm(): void {
    this.confirmed = true;
    log.info("Confirmation granted for the next install");
  }

  isVerified(ref: PackageReference): boolean {
    if (ref.kind !== "registry") return false;
    const entry = this.registry.get(ref.name);
    return entry !== undefined && entry.owner === ref.owner && entry.repo === ref.repo;
  }

  /**
   * Decides whether an install may proceed. Synchronous on purpose: the flag
   * is read and cleared with no await in between, so of two racing installs
   * at most one sees a given confirmation.
   */
  evaluate(ref: PackageReference): GateDecision {
    const verified = this.isVerified(ref);

    if (this.safeMode && !verified && !this.confirmed) {
      log.info(`Blocked unverified reference ${ref.owner}/${ref.repo}`);
      return { state: "blocked" };
    }

    const consumedConfirmation = this.confirmed;
    this.confirmed = false;
    return { state: "proceed", verified, consumedConfirmation };
  }
}
