import { homedir } from "os";
import { join, resolve } from "path";
import { readFileSync, existsSync } from "fs";
import TOML from "@iarna/toml";
import { CliError, EXIT_USAGE, ErrorCode } from "../utils/errors.ts";

export function resolveConfigDir(): string {
  return process.env.HOTPACK_CONFIG_DIR || join(homedir(), ".config", "hotpack");
}

export interface PathsConfig {
  packages: string;
  data: string;
}

export interface GitHubConfig {
  api_url: string;
  token?: string;
  timeout: number; // request timeout in seconds
}

export interface RegistryConfig {
  source: string; // "owner/repo" holding the verified list
  path: string;
}

export interface SelfConfig {
  source: string; // "owner/repo" of the installer itself
  script: string;
  version_file: string;
}

export interface Config {
  safe_mode: boolean;
  outdated_warnings: boolean;
  platform: string;
  paths: PathsConfig;
  github: GitHubConfig;
  registry: RegistryConfig;
  self: SelfConfig;
}

const KNOWN_TOP_LEVEL_KEYS = new Set([
  "safe_mode", "outdated_warnings", "platform", "paths", "github", "registry", "self",
]);

const SOURCE_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export function defaultConfig(configDir: string = resolveConfigDir()): Config {
  return {
    safe_mode: true,
    outdated_warnings: true,
    platform: "node",
    paths: {
      packages: join(configDir, "packages"),
      data: join(configDir, "data"),
    },
    github: {
      api_url: "https://api.github.com",
      timeout: 30,
    },
    registry: {
      source: "hotpack-dev/registry",
      path: "verified.txt",
    },
    self: {
      source: "hotpack-dev/hotpack",
      script: "installer.mjs",
      version_file: "package.json",
    },
  };
}

/**
 * Deep-merges two objects. User values override defaults.
 * Arrays are replaced, not merged. null/undefined user values don't override defaults.
 */
export function deepMerge<T>(defaults: T, userConfig: unknown): T {
  if (
    typeof defaults !== "object" || defaults === null ||
    typeof userConfig !== "object" || userConfig === null ||
    Array.isArray(defaults) || Array.isArray(userConfig)
  ) {
    return defaults;
  }

  const result: Record<string, unknown> = Object.fromEntries(Object.entries(defaults));
  const user: Record<string, unknown> = Object.fromEntries(Object.entries(userConfig));

  for (const key of Object.keys(user)) {
    const userVal = user[key];
    const defaultVal = result[key];

    if (userVal === null || userVal === undefined) {
      continue;
    }

    if (
      typeof userVal === "object" &&
      !Array.isArray(userVal) &&
      typeof defaultVal === "object" &&
      defaultVal !== null &&
      !Array.isArray(defaultVal)
    ) {
      result[key] = deepMerge(defaultVal, userVal);
      continue;
    }

    result[key] = userVal;
  }

  // The merged record carries every key of `defaults`, validated beforehand.
  return result as T;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateSection(
  obj: Record<string, unknown>,
  section: string,
  errors: string[],
  checks: Record<string, (value: unknown) => string | null>,
): void {
  const raw = obj[section];
  if (raw === undefined) return;
  if (!isRecord(raw)) {
    errors.push(`Config error: ${section} must be a table`);
    return;
  }
  for (const [key, check] of Object.entries(checks)) {
    if (raw[key] === undefined) continue;
    const problem = check(raw[key]);
    if (problem) {
      errors.push(`Config error: ${section}.${key} ${problem}, got ${JSON.stringify(raw[key])}`);
    }
  }
}

const nonEmptyString = (value: unknown): string | null =>
  typeof value === "string" && value.length > 0 ? null : "must be a non-empty string";

const repoSource = (value: unknown): string | null =>
  typeof value === "string" && SOURCE_PATTERN.test(value) ? null : 'must look like "owner/repo"';

/**
 * Validates a raw parsed config object and returns a typed Config.
 * Collects all validation errors and throws a single CliError with all problems.
 * Warns on stderr for unknown top-level keys but does not fail.
 */
export function validateConfig(raw: unknown, configDir: string = resolveConfigDir()): Config {
  const defaults = defaultConfig(configDir);
  const errors: string[] = [];

  if (raw === null || raw === undefined) {
    return defaults;
  }

  if (!isRecord(raw)) {
    throw new CliError("Config error: configuration must be a table", {
      code: EXIT_USAGE,
      errorCode: ErrorCode.USAGE,
    });
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_TOP_LEVEL_KEYS.has(key)) {
      console.error(`Config warning: unknown top-level key "${key}" will be ignored`);
    }
  }

  for (const key of ["safe_mode", "outdated_warnings"]) {
    if (raw[key] !== undefined && typeof raw[key] !== "boolean") {
      errors.push(`Config error: ${key} must be a boolean, got ${JSON.stringify(raw[key])}`);
    }
  }
  if (raw.platform !== undefined && nonEmptyString(raw.platform)) {
    errors.push(`Config error: platform must be a non-empty string, got ${JSON.stringify(raw.platform)}`);
  }

  validateSection(raw, "paths", errors, {
    packages: nonEmptyString,
    data: nonEmptyString,
  });

  validateSection(raw, "github", errors, {
    api_url: (value) =>
      typeof value === "string" && value.startsWith("https://") ? null : "must be an https URL",
    token: (value) => (typeof value === "string" ? null : "must be a string"),
    timeout: (value) =>
      typeof value === "number" && Number.isInteger(value) && value > 0 ? null : "must be a positive integer",
  });

  validateSection(raw, "registry", errors, {
    source: repoSource,
    path: nonEmptyString,
  });

  validateSection(raw, "self", errors, {
    source: repoSource,
    script: nonEmptyString,
    version_file: nonEmptyString,
  });

  if (errors.length > 0) {
    throw new CliError(errors.join("\n"), { code: EXIT_USAGE, errorCode: ErrorCode.USAGE });
  }

  const config = deepMerge(defaults, raw);
  // Relative directories are taken from the config directory, not the cwd.
  config.paths = {
    packages: resolve(configDir, config.paths.packages),
    data: resolve(configDir, config.paths.data),
  };
  return config;
}

export function getConfig(configDir: string = resolveConfigDir()): Config {
  const configPath = join(configDir, "config.toml");
  if (!existsSync(configPath)) return defaultConfig(configDir);
  const raw = readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = TOML.parse(raw);
  } catch (err) {
    throw new CliError(
      `Config error: ${configPath} is not valid TOML (${err instanceof Error ? err.message : String(err)})`,
      { code: EXIT_USAGE, errorCode: ErrorCode.USAGE },
    );
  }
  return validateConfig(parsed, configDir);
}

export function splitSource(source: string): { owner: string; repo: string } {
  const [owner = "", repo = ""] = source.split("/");
  return { owner, repo };
}
