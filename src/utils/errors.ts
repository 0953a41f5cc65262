import chalk from "chalk";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_UNTRUSTED = 3;
export const EXIT_NETWORK = 4;
export const EXIT_NOT_FOUND = 5;

export enum ErrorCode {
  UNTRUSTED_REFERENCE = "UNTRUSTED_REFERENCE",
  INVALID_REFERENCE = "INVALID_REFERENCE",
  FETCH_FAILED = "FETCH_FAILED",
  INVALID_MANIFEST = "INVALID_MANIFEST",
  UNSUPPORTED_PLATFORM = "UNSUPPORTED_PLATFORM",
  ACTIVATION_FAILED = "ACTIVATION_FAILED",
  NOT_FOUND = "NOT_FOUND",
  NETWORK = "NETWORK",
  USAGE = "USAGE",
  UNKNOWN = "UNKNOWN",
}

let DEBUG = false;

export function setDebug(value: boolean): void {
  DEBUG = value;
}

export function debug(...args: unknown[]): void {
  if (DEBUG) console.error("[debug]", ...args);
}

export interface CliErrorOptions {
  code: number;
  errorCode?: ErrorCode;
  suggestion?: string;
  /** HTTP status returned by the contents API, when the failure came from it. */
  status?: number;
  /** Who the user should report the failure to (package author or maintainer). */
  reportTo?: string;
}

export class CliError extends Error {
  code: number;
  errorCode: ErrorCode;
  suggestion?: string;
  status?: number;
  reportTo?: string;

  constructor(message: string, opts: CliErrorOptions) {
    super(message);
    this.name = "CliError";
    this.code = opts.code;
    this.errorCode = opts.errorCode ?? ErrorCode.UNKNOWN;
    this.suggestion = opts.suggestion;
    this.status = opts.status;
    this.reportTo = opts.reportTo;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function wrapError(err: unknown): CliError {
  if (err instanceof CliError) return err;
  const message = errorMessage(err);

  debug("wrapError called with:", message);

  if (
    message.includes("fetch failed") ||
    message.includes("ECONNREFUSED") ||
    message.includes("ENOTFOUND") ||
    message.includes("ETIMEDOUT")
  ) {
    return new CliError("Network error: could not reach the contents API.", {
      code: EXIT_NETWORK,
      errorCode: ErrorCode.NETWORK,
      suggestion: "Check your internet connection and try again.",
    });
  }

  return new CliError(message, { code: EXIT_FAILURE, errorCode: ErrorCode.UNKNOWN });
}

export function formatCliError(err: CliError): string {
  let out = chalk.red(`Error: ${err.message}`);
  if (err.reportTo) {
    out += `\n${chalk.yellow("Report this issue to")} \`${err.reportTo}\`.`;
  }
  if (err.status !== undefined) {
    out += `\n${chalk.dim(`ERROR CODE: ${err.status}`)}`;
  }
  if (DEBUG) {
    out += `\n${chalk.dim(`[${err.errorCode}] exit code: ${err.code}`)}`;
    if (err.stack) {
      out += `\n${chalk.dim(err.stack)}`;
    }
  }
  if (err.suggestion) {
    out += `\n${chalk.yellow("Hint:")} ${err.suggestion}`;
  }
  return out;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  let prev = Array.from({ length: n + 1 }, (_, j) => j);

  for (let i = 1; i <= m; i++) {
    const row = [i];
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(
        (prev[j] ?? 0) + 1,
        (row[j - 1] ?? 0) + 1,
        (prev[j - 1] ?? 0) + cost,
      );
    }
    prev = row;
  }

  return prev[n] ?? 0;
}

export function didYouMean(input: string, candidates: Iterable<string>): string | null {
  let bestMatch: string | null = null;
  let bestDist = Infinity;

  for (const c of candidates) {
    const dist = levenshtein(input.toLowerCase(), c.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      bestMatch = c;
    }
  }

  return bestMatch;
}

export function handleError(err: unknown, exit: (code?: number) => never): never {
  const cliErr = wrapError(err);
  debug("handleError:", cliErr.errorCode, cliErr.message);
  console.error(formatCliError(cliErr));
  return exit(cliErr.code);
}
