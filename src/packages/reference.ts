import type { PackageReference } from "./types.ts";
import { CliError, EXIT_USAGE, ErrorCode, didYouMean } from "../utils/errors.ts";
import type { RepoRef } from "../api/types.ts";

const SEGMENT = /^[A-Za-z0-9_.-]+$/;
const PACKAGE_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/;

export function isValidPackageName(name: string): boolean {
  return PACKAGE_NAME.test(name);
}

export function assertPackageName(name: string): void {
  if (!isValidPackageName(name)) {
    throw new CliError(
      `Invalid package name "${name}". Names must start with an alphanumeric character and contain only alphanumeric characters, hyphens, and underscores.`,
      { code: EXIT_USAGE, errorCode: ErrorCode.INVALID_REFERENCE },
    );
  }
}

function toRepoRef(owner: string | undefined, repo: string | undefined): RepoRef | null {
  if (!owner || !repo) return null;
  const trimmedRepo = repo.replace(/\.git$/, "");
  if (!SEGMENT.test(owner) || !SEGMENT.test(trimmedRepo)) return null;
  return { owner, repo: trimmedRepo };
}

/**
 * Parses an explicit repository reference: `owner/repo`, `github:owner/repo`
 * or `https://github.com/owner/repo`. Returns null for a bare name.
 */
export function parseRawReference(input: string): RepoRef | null {
  const value = input.trim().replace(/\/+$/, "");

  if (value.startsWith("https://") || value.startsWith("http://")) {
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      return null;
    }
    if (url.hostname !== "github.com" && url.hostname !== "www.github.com") return null;
    const [owner, repo] = url.pathname.split("/").filter(Boolean);
    return toRepoRef(owner, repo);
  }

  const path = value.startsWith("github:") ? value.slice("github:".length) : value;
  if (!path.includes("/")) return null;
  const parts = path.split("/");
  if (parts.length !== 2) return null;
  return toRepoRef(parts[0], parts[1]);
}

function looksLikeRepository(input: string): boolean {
  return input.includes("/") || input.startsWith("github:") || input.includes("://");
}

/**
 * Resolves what the user typed into a reference. Anything shaped like a
 * repository is raw, even when its repository name matches a registry entry;
 * only a bare name is looked up in the registry.
 */
export function resolveReference(
  input: string,
  registry: ReadonlyMap<string, RepoRef>,
): PackageReference {
  if (looksLikeRepository(input)) {
    const raw = parseRawReference(input);
    if (!raw) {
      throw new CliError(`"${input}" is not a valid repository reference.`, {
        code: EXIT_USAGE,
        errorCode: ErrorCode.INVALID_REFERENCE,
        suggestion: "Use owner/repo or https://github.com/owner/repo.",
      });
    }
    return { kind: "raw", ...raw };
  }

  const name = input.trim();
  const entry = registry.get(name);
  if (!entry) {
    const guess = didYouMean(name, registry.keys());
    throw new CliError(`"${name}" is not a verified package.`, {
      code: EXIT_USAGE,
      errorCode: ErrorCode.INVALID_REFERENCE,
      suggestion: guess
        ? `Did you mean "${guess}"?`
        : "Install unverified packages by repository: owner/repo or https://github.com/owner/repo.",
    });
  }
  return { kind: "registry", name, owner: entry.owner, repo: entry.repo };
}

export function formatReference(ref: RepoRef): string {
  return `${ref.owner}/${ref.repo}`;
}
