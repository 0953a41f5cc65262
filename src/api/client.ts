import type { GitHubConfig } from "../config/index.ts";
import { getLogger } from "../utils/logger.ts";
import type { ContentResult, ContentSource, ContentsFileResponse, RepoRef } from "./types.ts";

const log = getLogger("api");

/** Check if an error is a timeout abort. */
function isTimeoutError(err: unknown): boolean {
  if (err instanceof DOMException && err.name === "AbortError") return true;
  if (err instanceof Error && err.name === "AbortError") return true;
  return false;
}

export class ApiError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(opts: { status: number; message: string; url: string }) {
    super(opts.message);
    this.name = "ApiError";
    this.status = opts.status;
    this.url = opts.url;
  }
}

function isContentsFileResponse(value: unknown): value is ContentsFileResponse {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeContent(body: ContentsFileResponse, url: string): Buffer {
  if (typeof body.content !== "string") {
    throw new ApiError({ status: 200, message: `No file content at ${url} (is it a directory?)`, url });
  }
  if (body.encoding && body.encoding !== "base64") {
    throw new ApiError({ status: 200, message: `Unsupported content encoding "${body.encoding}" at ${url}`, url });
  }
  // The API wraps base64 at 60 columns.
  return Buffer.from(body.content.replace(/\s/g, ""), "base64");
}

function encodePath(path: string): string {
  return path.split("/").filter(Boolean).map(encodeURIComponent).join("/");
}

/**
 * Client for the repository contents endpoint. Non-success statuses are
 * returned as results, never retried: a missing file, a private repository
 * or a rate limit does not go away on a second attempt.
 */
export class ContentsClient implements ContentSource {
  constructor(private readonly config: GitHubConfig) {}

  private get headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "User-Agent": "hotpack",
    };
    if (this.config.token) headers.Authorization = `Bearer ${this.config.token}`;
    return headers;
  }

  buildUrl(repo: RepoRef, path: string): string {
    const base = this.config.api_url.replace(/\/+$/, "");
    return `${base}/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.repo)}/contents/${encodePath(path)}`;
  }

  async getFile(repo: RepoRef, path: string): Promise<ContentResult> {
    const url = this.buildUrl(repo, path);
    const timeoutMs = this.config.timeout * 1000;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let res: Response;
    try {
      res = await fetch(url, { headers: this.headers, signal: controller.signal });
    } catch (err) {
      if (isTimeoutError(err)) {
        throw new Error(`Request to ${url} timed out after ${timeoutMs / 1000}s`);
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }

    if (!res.ok) {
      log.warn(`GET ${url} -> ${res.status}`);
      return { ok: false, status: res.status, message: res.statusText };
    }

    const body: unknown = await res.json();
    if (!isContentsFileResponse(body)) {
      throw new ApiError({ status: res.status, message: `Unexpected response body from ${url}`, url });
    }
    log.debug(`GET ${url} -> ${res.status}`);
    return { ok: true, status: res.status, content: decodeContent(body, url) };
  }
}
