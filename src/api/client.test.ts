import { afterEach, describe, it, expect, vi } from "vitest";
import { ApiError, ContentsClient, decodeContent } from "./client.ts";

const config = { api_url: "https://api.example.test/", timeout: 5 };
const repo = { owner: "acme", repo: "widgets" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("ContentsClient", () => {
  it("should build the contents URL and decode the file", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ type: "file", encoding: "base64", content: "aGVs\nbG8=\n" }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await new ContentsClient({ ...config, token: "test-token" }).getFile(repo, "widgets/lib/a b.mjs");

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.content.toString("utf-8")).toBe("hello");
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "https://api.example.test/repos/acme/widgets/contents/widgets/lib/a%20b.mjs",
    );
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ Authorization: "Bearer test-token" });
  });

  it("should return a failed status without retrying", async () => {
    const fetchMock = vi.fn(async () => new Response("", { status: 404, statusText: "Not Found" }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await new ContentsClient(config).getFile(repo, "package.toml");

    expect(result).toEqual({ ok: false, status: 404, message: "Not Found" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should reject a directory listing", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse([{ name: "index.mjs" }])));

    await expect(new ContentsClient(config).getFile(repo, "widgets")).rejects.toBeInstanceOf(ApiError);
  });

  it("should report a timeout", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new DOMException("aborted", "AbortError");
    }));

    await expect(new ContentsClient(config).getFile(repo, "package.toml")).rejects.toThrow(
      "Request to https://api.example.test/repos/acme/widgets/contents/package.toml timed out after 5s",
    );
  });
});

describe("decodeContent", () => {
  it("should refuse an encoding other than base64", () => {
    expect(() => decodeContent({ content: "x", encoding: "utf-8" }, "u")).toThrow('Unsupported content encoding "utf-8" at u');
  });
});
