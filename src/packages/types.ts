import type { RepoRef } from "../api/types.ts";

// ── References ──

/** A bare name resolved through the trust registry. */
export interface RegistryReference extends RepoRef {
  kind: "registry";
  name: string;
}

/** An explicit `owner/repo` pair, trusted only after confirmation. */
export interface RawReference extends RepoRef {
  kind: "raw";
}

export type PackageReference = RegistryReference | RawReference;

// ── Manifest ──

export interface PackageManifest {
  name: string;
  author: string;
  description: string;
  version: string;
  files: string[];
  supported: string[];
  /** Module entry inside the package directory. */
  main?: string;
  /** Hex display color without the leading `#`. */
  color?: string;
  logo?: string;
}

export interface PackageDisplay {
  color: string;
  logo: string | null;
}

export interface FetchedManifest {
  manifest: PackageManifest;
  raw: Buffer;
}

// ── Trust gate ──

export type GateDecision =
  | { state: "proceed"; verified: boolean; consumedConfirmation: boolean }
  | { state: "blocked" };

// ── Results ──

export interface FileFailure {
  path: string;
  status: number;
  /** Author of the manifest, who the failure should be reported to. */
  reportTo: string;
}

export interface FileInstallResult {
  directory: string;
  written: string[];
  failures: FileFailure[];
}

export type ActivationOutcome = "loaded" | "reloaded";

export interface InstallResult {
  name: string;
  version: string;
  author: string;
  description: string;
  display: PackageDisplay;
  verified: boolean;
  activation: ActivationOutcome;
  written: string[];
  failures: FileFailure[];
  durationMs: number;
}

export interface UninstallResult {
  name: string;
  unloaded: boolean;
}

export interface PackageView {
  name: string;
  version: string;
  description: string;
  author: string;
  display: PackageDisplay;
  installed: boolean;
  loaded: boolean;
}

export interface SelfView {
  name: string;
  version: string;
  latestVersion: string | null;
  outdated: boolean;
}

export interface InstalledPackageSummary {
  name: string;
  version: string;
  loaded: boolean;
}
