import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { describe, it, expect } from "vitest";
import {
  activateInstalled,
  installPackage,
  listInstalled,
  uninstallPackage,
  updateSelf,
  viewPackage,
  viewSelf,
} from "./lifecycle.ts";
import { createTestContext, manifestToml } from "./testing.ts";
import type { TestContext, TestContextOptions } from "./testing.ts";
import { CliError, EXIT_NOT_FOUND, EXIT_UNTRUSTED, ErrorCode } from "../utils/errors.ts";

const acme = { owner: "acme", repo: "widgets" };
const trusted = { owner: "trusted", repo: "widgets-pkg" };
const selfRepo = { owner: "hotpack-dev", repo: "hotpack" };

function publishWidgets(ctx: TestContext, repo = acme, version = "1.0.0"): void {
  ctx.source
    .set(repo, "package.toml", manifestToml({
      name: "widgets",
      version,
      description: "Widgets for the host",
      files: ["index.mjs", "lib/util.mjs"],
    }))
    .set(repo, "widgets/index.mjs", `export const version = "${version}";\n`)
    .set(repo, "widgets/lib/util.mjs", "export const util = true;\n");
}

async function captureError(promise: Promise<unknown>): Promise<CliError> {
  const err = await promise.catch((e: unknown) => e);
  if (!(err instanceof CliError)) throw new Error(`expected a CliError, got ${String(err)}`);
  return err;
}

function context(opts: TestContextOptions = {}): TestContext {
  return createTestContext({ registry: new Map([["widgets", trusted]]), ...opts });
}

describe("installPackage", () => {
  it("should block an unverified repository without touching the network", async () => {
    const ctx = context();
    publishWidgets(ctx);

    const err = await captureError(installPackage(ctx, "acme/widgets"));

    expect(err.code).toBe(EXIT_UNTRUSTED);
    expect(err.errorCode).toBe(ErrorCode.UNTRUSTED_REFERENCE);
    expect(err.message).toBe(
      "CAUTION: acme/widgets has not been verified. All packages you install can modify your host process.",
    );
    expect(ctx.source.requests).toHaveLength(0);
    expect(ctx.store.hasPackageDir("widgets")).toBe(false);
  });

  it("should install an unverified repository once after confirmation", async () => {
    const ctx = context();
    publishWidgets(ctx);
    ctx.verification.confirm();

    const result = await installPackage(ctx, "acme/widgets");

    expect(result.verified).toBe(false);
    expect(ctx.verification.hasPendingConfirmation).toBe(false);
    await expect(installPackage(ctx, "acme/widgets")).rejects.toMatchObject({
      errorCode: ErrorCode.UNTRUSTED_REFERENCE,
    });
  });

  it("should install and load a package end to end", async () => {
    const ctx = context({ config: { safe_mode: false } });
    publishWidgets(ctx);
    const seen: string[] = [];

    const result = await installPackage(ctx, "https://github.com/acme/widgets", {
      onManifest: (manifest) => seen.push(manifest.name),
    });

    expect(result).toMatchObject({
      name: "widgets",
      version: "1.0.0",
      author: "jane",
      description: "Widgets for the host",
      display: { color: "03BAFC", logo: null },
      verified: false,
      activation: "loaded",
      written: ["index.mjs", "lib/util.mjs"],
      failures: [],
    });
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
    expect(seen).toEqual(["widgets"]);
    expect(ctx.host.calls).toEqual(["load:widgets"]);
    expect(readFileSync(join(ctx.store.packageDir("widgets"), "index.mjs"), "utf-8"))
      .toBe('export const version = "1.0.0";\n');
    expect(ctx.store.readManifest("widgets")?.version).toBe("1.0.0");
  });

  it("should fetch a registry name from its registered repository", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);

    const result = await installPackage(ctx, "widgets");

    expect(result.verified).toBe(true);
    expect(new Set(ctx.source.requests.map((r) => `${r.owner}/${r.repo}`))).toEqual(new Set(["trusted/widgets-pkg"]));
  });

  it("should reload a package that is already loaded", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);
    await installPackage(ctx, "widgets");

    publishWidgets(ctx, trusted, "1.1.0");
    const result = await installPackage(ctx, "widgets");

    expect(result.activation).toBe("reloaded");
    expect(result.version).toBe("1.1.0");
    expect(ctx.store.readManifest("widgets")?.version).toBe("1.1.0");
    expect(ctx.host.calls).toEqual(["load:widgets", "load:widgets", "reload:widgets"]);
  });

  it("should leave files the new version no longer lists", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);
    await installPackage(ctx, "widgets");

    ctx.source.set(trusted, "package.toml", manifestToml({ name: "widgets", version: "2.0.0", files: ["index.mjs"] }));
    const result = await installPackage(ctx, "widgets");

    expect(result.written).toEqual(["index.mjs"]);
    expect(existsSync(join(ctx.store.packageDir("widgets"), "lib", "util.mjs"))).toBe(true);
  });

  it("should report failed files and still activate", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);
    ctx.source.set(trusted, "widgets/lib/util.mjs", { status: 404 });

    const result = await installPackage(ctx, "widgets");

    expect(result.written).toEqual(["index.mjs"]);
    expect(result.failures).toEqual([{ path: "lib/util.mjs", status: 404, reportTo: "jane" }]);
    expect(ctx.host.isLoaded("widgets")).toBe(true);
  });

  it("should leave the files on disk when activation fails", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);
    ctx.host.failing.add("widgets");

    const err = await captureError(installPackage(ctx, "widgets"));

    expect(err.errorCode).toBe(ErrorCode.ACTIVATION_FAILED);
    expect(err.message).toBe('Failed to activate module "widgets": SyntaxError in widgets');
    expect(existsSync(join(ctx.store.packageDir("widgets"), "index.mjs"))).toBe(true);
  });

  it("should reject an unknown name without consuming a confirmation", async () => {
    const ctx = context();
    ctx.verification.confirm();

    const err = await captureError(installPackage(ctx, "gadgets"));

    expect(err.errorCode).toBe(ErrorCode.INVALID_REFERENCE);
    expect(ctx.verification.hasPendingConfirmation).toBe(true);
  });

  it("should surface a missing manifest with the remote status", async () => {
    const ctx = context({ config: { safe_mode: false } });

    const err = await captureError(installPackage(ctx, "acme/widgets"));

    expect(err.errorCode).toBe(ErrorCode.FETCH_FAILED);
    expect(err.status).toBe(404);
    expect(err.reportTo).toBe("acme");
  });

  it("should refuse an unsupported platform before writing or loading anything", async () => {
    const ctx = context({ config: { safe_mode: false } });
    ctx.source
      .set(acme, "package.toml", manifestToml({ name: "widgets", files: ["index.mjs"], supported: ["other-platform"] }))
      .set(acme, "widgets/index.mjs", "export default {};\n");

    const err = await captureError(installPackage(ctx, "acme/widgets"));

    expect(err.errorCode).toBe(ErrorCode.UNSUPPORTED_PLATFORM);
    expect(err.message).toBe("This package does not support node.");
    expect(err.reportTo).toBe("jane");
    expect(ctx.source.requestedPaths()).toEqual(["package.toml"]);
    expect(ctx.store.hasPackageDir("widgets")).toBe(false);
    expect(ctx.host.calls).toEqual([]);
    // The fetched manifest is kept even though no files were installed.
    expect(ctx.store.readManifest("widgets")?.supported).toEqual(["other-platform"]);
  });
});

describe("uninstallPackage", () => {
  it("should remove files, the manifest and the loaded module", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);
    await installPackage(ctx, "widgets");

    const result = await uninstallPackage(ctx, "widgets");

    expect(result).toEqual({ name: "widgets", unloaded: true });
    expect(ctx.store.hasPackageDir("widgets")).toBe(false);
    expect(ctx.store.readManifest("widgets")).toBeNull();
    expect(ctx.host.calls).toEqual(["load:widgets", "unload:widgets"]);
  });

  it("should report an unknown package and change nothing", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);
    await installPackage(ctx, "widgets");

    const err = await captureError(uninstallPackage(ctx, "widget"));

    expect(err.code).toBe(EXIT_NOT_FOUND);
    expect(err.message).toBe('The package "widget" does not exist.');
    expect(err.suggestion).toBe('Did you mean "widgets"?');
    expect(ctx.store.hasPackageDir("widgets")).toBe(true);
    expect(ctx.host.calls).toEqual(["load:widgets"]);
  });

  it("should keep a reinstall that starts while the package is being removed", async () => {
    const ctx = context({ config: { safe_mode: false } });
    publishWidgets(ctx);
    await installPackage(ctx, "acme/widgets");

    const removePackage = ctx.store.removePackage.bind(ctx.store);
    ctx.store.removePackage = async (name: string) => {
      await new Promise((resolve) => setTimeout(resolve, 50));
      await removePackage(name);
    };

    const [removed, reinstalled] = await Promise.all([
      uninstallPackage(ctx, "widgets"),
      installPackage(ctx, "acme/widgets"),
    ]);

    expect(removed).toEqual({ name: "widgets", unloaded: true });
    expect(reinstalled.activation).toBe("loaded");
    expect(ctx.host.calls).toEqual(["load:widgets", "unload:widgets", "load:widgets"]);
    expect(ctx.store.hasPackageDir("widgets")).toBe(true);
    expect(ctx.store.readManifest("widgets")?.version).toBe("1.0.0");
    expect(viewPackage(ctx, "widgets")).toMatchObject({ installed: true, loaded: true });
  });

  it("should reject a path-like name before touching the disk", async () => {
    const ctx = context();
    const err = await captureError(uninstallPackage(ctx, "../data"));
    expect(err.errorCode).toBe(ErrorCode.INVALID_REFERENCE);
  });
});

describe("viewPackage", () => {
  it("should describe an installed package from local state", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);
    await installPackage(ctx, "widgets");
    const requestsBefore = ctx.source.requests.length;

    expect(viewPackage(ctx, "widgets")).toEqual({
      name: "widgets",
      version: "1.0.0",
      description: "Widgets for the host",
      author: "jane",
      display: { color: "03BAFC", logo: null },
      installed: true,
      loaded: true,
    });
    expect(ctx.source.requests).toHaveLength(requestsBefore);
  });

  it("should report a package that was never installed", () => {
    const ctx = context();
    expect(() => viewPackage(ctx, "widgets")).toThrow('The package "widgets" does not exist.');
  });
});

describe("listInstalled", () => {
  it("should list persisted manifests with their state", async () => {
    const ctx = context();
    publishWidgets(ctx, trusted);
    await installPackage(ctx, "widgets");

    expect(listInstalled(ctx)).toEqual([{ name: "widgets", version: "1.0.0", loaded: true }]);
  });
});

describe("viewSelf", () => {
  it("should flag an outdated installation", async () => {
    const ctx = context();
    ctx.source.set(selfRepo, "package.json", JSON.stringify({ version: "1.2.0" }));

    expect(await viewSelf(ctx)).toEqual({
      name: "hotpack",
      version: "1.0.0",
      latestVersion: "1.2.0",
      outdated: true,
    });
  });

  it("should treat an unreachable version file as unknown", async () => {
    const ctx = context();
    expect(await viewSelf(ctx)).toMatchObject({ latestVersion: null, outdated: false });
  });

  it("should skip the check when outdated warnings are off", async () => {
    const ctx = context({ config: { outdated_warnings: false } });
    await viewSelf(ctx);
    expect(ctx.source.requests).toHaveLength(0);
  });
});

describe("updateSelf", () => {
  it("should run the published installer script in the host", async () => {
    const ctx = context();
    ctx.source.set(selfRepo, "installer.mjs", "export default async () => {};\n");

    await updateSelf(ctx);

    expect(ctx.host.executed).toEqual([{ label: "self-update", source: "export default async () => {};\n" }]);
  });

  it("should fail without running anything when the script is missing", async () => {
    const ctx = context();

    const err = await captureError(updateSelf(ctx));

    expect(err.message).toBe("Failed to update hotpack.");
    expect(err.status).toBe(404);
    expect(err.reportTo).toBe("hotpack-dev");
    expect(ctx.host.executed).toEqual([]);
  });
});

describe("activateInstalled", () => {
  it("should load every installed package and collect failures", async () => {
    const ctx = context({ config: { safe_mode: false } });
    publishWidgets(ctx);
    ctx.source.set({ owner: "acme", repo: "gadgets" }, "package.toml", manifestToml({ name: "gadgets", files: [] }));
    await installPackage(ctx, "acme/widgets");
    await installPackage(ctx, "acme/gadgets");

    // A new session over the same disk state.
    const restarted = createTestContext();
    restarted.host.failing.add("gadgets");
    const outcome = await activateInstalled({ ...restarted, config: ctx.config, store: ctx.store });

    expect(outcome.loaded).toEqual(["widgets"]);
    expect(outcome.failed).toEqual([
      { name: "gadgets", error: 'Failed to activate module "gadgets": SyntaxError in gadgets' },
    ]);
    expect(restarted.host.loadedNames()).toEqual(["widgets"]);
  });
});
