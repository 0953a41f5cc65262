import TOML from "@iarna/toml";
import type { ContentSource } from "../api/types.ts";
import { CliError, EXIT_FAILURE, ErrorCode, errorMessage } from "../utils/errors.ts";
import { getLogger } from "../utils/logger.ts";
import { formatReference, isValidPackageName } from "./reference.ts";
import type { FetchedManifest, PackageDisplay, PackageManifest, PackageReference } from "./types.ts";

const log = getLogger("manifest");

export const MANIFEST_FILENAME = "package.toml";
export const DEFAULT_COLOR = "03BAFC";

const HEX_COLOR = /^[0-9a-fA-F]{6}$/;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function isSafeRelativePath(path: string): boolean {
  if (path === "" || path.startsWith("/") || path.startsWith("\\") || /^[a-zA-Z]:/.test(path)) {
    return false;
  }
  return path.split(/[\\/]/).every((segment) => segment !== ".." && segment !== "");
}

/**
 * Checks a parsed document against the manifest shape. Every problem is
 * collected so the author can fix them in one pass.
 */
export function validateManifest(raw: unknown): PackageManifest {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new CliError("Manifest error: document must be a table", {
      code: EXIT_FAILURE,
      errorCode: ErrorCode.INVALID_MANIFEST,
    });
  }

  const doc: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const errors: string[] = [];

  const text = (key: string): string => {
    const value = doc[key];
    if (typeof value !== "string" || value.length === 0) {
      errors.push(`Manifest error: ${key} must be a non-empty string, got ${JSON.stringify(value)}`);
      return "";
    }
    return value;
  };

  const name = text("name");
  const author = text("author");
  const version = text("version");
  const description = typeof doc.description === "string" ? doc.description : "";
  if (doc.description !== undefined && typeof doc.description !== "string") {
    errors.push(`Manifest error: description must be a string, got ${JSON.stringify(doc.description)}`);
  }

  if (name && !isValidPackageName(name)) {
    errors.push(`Manifest error: name "${name}" must start with an alphanumeric character and contain only alphanumerics, hyphens, and underscores`);
  }

  let files: string[] = [];
  if (!isStringArray(doc.files)) {
    errors.push(`Manifest error: files must be an array of strings, got ${JSON.stringify(doc.files)}`);
  } else {
    files = doc.files;
    for (const file of files) {
      if (!isSafeRelativePath(file)) {
        errors.push(`Manifest error: file "${file}" must be a relative path inside the package`);
      }
    }
  }

  let supported: string[] = [];
  if (!isStringArray(doc.supported)) {
    errors.push(`Manifest error: supported must be an array of strings, got ${JSON.stringify(doc.supported)}`);
  } else {
    supported = doc.supported;
  }

  const manifest: PackageManifest = { name, author, description, version, files, supported };

  if (doc.main !== undefined) {
    if (typeof doc.main !== "string" || !isSafeRelativePath(doc.main)) {
      errors.push(`Manifest error: main must be a relative path inside the package, got ${JSON.stringify(doc.main)}`);
    } else {
      manifest.main = doc.main;
    }
  }

  if (doc.color !== undefined) {
    const color = typeof doc.color === "string" ? doc.color.replace(/^#/, "") : "";
    if (!HEX_COLOR.test(color)) {
      errors.push(`Manifest error: color must be a 6-digit hex color, got ${JSON.stringify(doc.color)}`);
    } else {
      manifest.color = color.toUpperCase();
    }
  }

  if (doc.logo !== undefined) {
    if (typeof doc.logo !== "string" || !/^https?:\/\//.test(doc.logo)) {
      errors.push(`Manifest error: logo must be an http(s) URL, got ${JSON.stringify(doc.logo)}`);
    } else {
      manifest.logo = doc.logo;
    }
  }

  if (errors.length > 0) {
    throw new CliError(errors.join("\n"), {
      code: EXIT_FAILURE,
      errorCode: ErrorCode.INVALID_MANIFEST,
      reportTo: author || undefined,
    });
  }

  return manifest;
}

export function parseManifest(source: string): PackageManifest {
  let parsed: unknown;
  try {
    parsed = TOML.parse(source);
  } catch (err) {
    throw new CliError(`Manifest error: ${MANIFEST_FILENAME} is not valid TOML (${errorMessage(err)})`, {
      code: EXIT_FAILURE,
      errorCode: ErrorCode.INVALID_MANIFEST,
    });
  }
  return validateManifest(parsed);
}

export function resolveDisplay(manifest: PackageManifest): PackageDisplay {
  return {
    color: manifest.color ?? DEFAULT_COLOR,
    logo: manifest.logo ?? null,
  };
}

/**
 * Retrieves, decodes and parses a package manifest. Persisting the raw
 * document is left to the caller, which holds the package lock.
 */
export async function fetchManifest(source: ContentSource, ref: PackageReference): Promise<FetchedManifest> {
  const result = await source.getFile(ref, MANIFEST_FILENAME);

  if (!result.ok) {
    log.warn(`Manifest fetch for ${formatReference(ref)} failed with ${result.status}`);
    throw new CliError(`Failed to install ${ref.repo}.`, {
      code: EXIT_FAILURE,
      errorCode: ErrorCode.FETCH_FAILED,
      status: result.status,
      reportTo: ref.owner,
    });
  }

  let manifest: PackageManifest;
  try {
    manifest = parseManifest(result.content.toString("utf-8"));
  } catch (err) {
    if (err instanceof CliError && !err.reportTo) err.reportTo = ref.owner;
    throw err;
  }

  log.info(`Fetched manifest ${manifest.name}@${manifest.version} from ${formatReference(ref)}`);
  return { manifest, raw: result.content };
}
