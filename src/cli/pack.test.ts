import { describe, it, expect } from "vitest";
import { formatFileFailure, formatInstallResult, formatSelfView } from "./pack.ts";
import type { InstallResult } from "../packages/types.ts";

const result: InstallResult = {
  name: "widgets",
  version: "1.0.0",
  author: "jane",
  description: "",
  display: { color: "03BAFC", logo: null },
  verified: true,
  activation: "reloaded",
  written: ["index.mjs"],
  failures: [{ path: "lib/util.mjs", status: 500, reportTo: "jane" }],
  durationMs: 12,
};

describe("formatInstallResult", () => {
  it("should summarize failures and a reload", () => {
    expect(formatInstallResult(result).split("\n")).toEqual([
      "widgets Installed",
      "widgets has been installed to your host",
      "1 of 2 file(s) failed to install",
      "widgets took 12ms to install (reloaded)",
    ]);
  });
});

describe("formatFileFailure", () => {
  it("should name the file, the author and the status", () => {
    expect(formatFileFailure({ path: "lib/util.mjs", status: 500, reportTo: "jane" }).split("\n")).toEqual([
      "Failed to install the `lib/util.mjs` file.",
      "Report this issue to `jane`.",
      "ERROR CODE: 500",
    ]);
  });
});

describe("formatSelfView", () => {
  it("should tell an outdated installation how to update", () => {
    const lines = formatSelfView({ name: "hotpack", version: "1.0.0", latestVersion: "1.2.0", outdated: true }).split("\n");
    expect(lines.slice(2)).toEqual([
      "hotpack 1.0.0 (OUTDATED)",
      "hotpack v1.0.0 is outdated. Please update to v1.2.0 using `update-self`.",
    ]);
  });

  it("should mark a current installation as latest", () => {
    const lines = formatSelfView({ name: "hotpack", version: "1.0.0", latestVersion: null, outdated: false }).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("hotpack 1.0.0 (LATEST)");
  });
});
