/**
 * In-process stand-ins for the contents API and the extension host, used by
 * the test suites.
 */

import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { ContentResult, ContentSource, RepoRef } from "../api/types.ts";
import { defaultConfig } from "../config/index.ts";
import type { Config } from "../config/index.ts";
import type { ExtensionHost, HostLayout, LoadOutcome } from "../host/types.ts";
import { KeyedLock } from "../utils/keyed-lock.ts";
import type { InstallerContext } from "./lifecycle.ts";
import { PackageStore } from "./store.ts";
import { VerificationService } from "./verification.ts";

// ── Content source ──

type StoredFile = string | Buffer | { status: number };

export interface RecordedRequest {
  owner: string;
  repo: string;
  path: string;
}

export class MemoryContentSource implements ContentSource {
  readonly requests: RecordedRequest[] = [];
  private readonly files = new Map<string, StoredFile>();

  private static key(repo: RepoRef, path: string): string {
    return `${repo.owner}/${repo.repo}/${path}`;
  }

  /** Serves `content` for the path, or the given status when `content` is `{ status }`. */
  set(repo: RepoRef, path: string, content: StoredFile): this {
    this.files.set(MemoryContentSource.key(repo, path), content);
    return this;
  }

  requestedPaths(): string[] {
    return this.requests.map((r) => r.path);
  }

  async getFile(repo: RepoRef, path: string): Promise<ContentResult> {
    this.requests.push({ owner: repo.owner, repo: repo.repo, path });
    const stored = this.files.get(MemoryContentSource.key(repo, path));
    if (stored === undefined) return { ok: false, status: 404, message: "Not Found" };
    if (typeof stored === "string") return { ok: true, status: 200, content: Buffer.from(stored, "utf-8") };
    if (Buffer.isBuffer(stored)) return { ok: true, status: 200, content: stored };
    return { ok: false, status: stored.status };
  }
}

// ── Host ──

export class FakeHost implements ExtensionHost {
  readonly calls: string[] = [];
  readonly executed: Array<{ label: string; source: string }> = [];
  private readonly loaded = new Set<string>();
  /** Names whose load throws, to exercise activation failures. */
  readonly failing = new Set<string>();

  isLoaded(name: string): boolean {
    return this.loaded.has(name);
  }

  loadedNames(): string[] {
    return [...this.loaded].sort();
  }

  async load(name: string): Promise<LoadOutcome> {
    this.calls.push(`load:${name}`);
    if (this.failing.has(name)) throw new Error(`SyntaxError in ${name}`);
    if (this.loaded.has(name)) return { status: "already-loaded" };
    this.loaded.add(name);
    return { status: "loaded" };
  }

  async reload(name: string): Promise<void> {
    this.calls.push(`reload:${name}`);
    this.loaded.add(name);
  }

  async unload(name: string): Promise<void> {
    this.calls.push(`unload:${name}`);
    if (!this.loaded.delete(name)) throw new Error(`Module "${name}" is not loaded`);
  }

  retarget(layout: HostLayout): void {
    this.calls.push(`retarget:${layout.packagesDir}`);
  }

  async execute(source: string, label: string): Promise<void> {
    this.calls.push(`execute:${label}`);
    this.executed.push({ label, source });
  }
}

// ── Context ──

export interface TestContextOptions {
  registry?: Map<string, RepoRef>;
  config?: Partial<Pick<Config, "safe_mode" | "outdated_warnings" | "platform">>;
  source?: MemoryContentSource;
  host?: FakeHost;
}

export interface TestContext extends InstallerContext {
  source: MemoryContentSource;
  host: FakeHost;
  root: string;
}

export function createTestContext(opts: TestContextOptions = {}): TestContext {
  const root = mkdtempSync(join(tmpdir(), "hotpack-test-"));
  const config: Config = { ...defaultConfig(root), ...opts.config };
  const store = new PackageStore(config.paths);

  return {
    root,
    config,
    source: opts.source ?? new MemoryContentSource(),
    store,
    host: opts.host ?? new FakeHost(),
    verification: new VerificationService(opts.registry ?? new Map(), config.safe_mode),
    locks: new KeyedLock(),
    version: "1.0.0",
  };
}

export function manifestToml(fields: {
  name: string;
  author?: string;
  version?: string;
  description?: string;
  files: string[];
  supported?: string[];
  color?: string;
  logo?: string;
  main?: string;
}): string {
  const lines = [
    `name = ${JSON.stringify(fields.name)}`,
    `author = ${JSON.stringify(fields.author ?? "jane")}`,
    `version = ${JSON.stringify(fields.version ?? "1.0.0")}`,
    `description = ${JSON.stringify(fields.description ?? "A test package")}`,
    `files = ${JSON.stringify(fields.files)}`,
    `supported = ${JSON.stringify(fields.supported ?? ["node"])}`,
  ];
  if (fields.color !== undefined) lines.push(`color = ${JSON.stringify(fields.color)}`);
  if (fields.logo !== undefined) lines.push(`logo = ${JSON.stringify(fields.logo)}`);
  if (fields.main !== undefined) lines.push(`main = ${JSON.stringify(fields.main)}`);
  return lines.join("\n") + "\n";
}
