import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../services/git.service.js", () => ({
  hasBranch: vi.fn(),
  readBlob: vi.fn(),
  toRevisionSpec: (ref: string, repoPath: string) => `${ref}:${repoPath}`,
  getHead: vi.fn(),
  listBranches: vi.fn(),
  listTree: vi.fn(),
  getLog: vi.fn(),
  getDiff: vi.fn(),
  listWorkflows: vi.fn(),
  loadRepoContext: vi.fn(),
}));

import { createApp } from "../app.js";
import { createAppConfig } from "../config.js";
import { getDiff, hasBranch, listBranches } from "../services/git.service.js";

function buildApp() {
  return createApp(createAppConfig({ repoRoot: "/repo", repoName: "site-builder" }));
}

describe("GET /diff", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(listBranches).mockResolvedValue(["main"]);
    vi.mocked(hasBranch).mockResolvedValue(false);
  });

  it("requires both revisions", async () => {
    const response = await request(buildApp()).get("/diff").query({ from: "main" });

    expect(response.status).toBe(400);
    expect(response.text).toBe("from and to query parameters are required");
  });

  it("renders the stat and patch", async () => {
    vi.mocked(getDiff).mockResolvedValue({
      stat: " a.txt | 2 +-",
      patch: "diff --git a/a.txt b/a.txt\n-old\n+new\n",
    });

    const response = await request(buildApp()).get("/diff").query({ from: "a1b2c3d^", to: "a1b2c3d" });

    expect(response.status).toBe(200);
    expect(getDiff).toHaveBeenCalledWith("/repo", "a1b2c3d^", "a1b2c3d", {
      signal: expect.any(AbortSignal),
    });
    expect(response.text).toContain("<pre> a.txt | 2 +-</pre>");
    expect(response.text).toContain('<span class="patch-add">+new\n</span>');
    expect(response.text).toContain('<span class="patch-del">-old\n</span>');
  });

  it("rejects option-like revisions", async () => {
    const response = await request(buildApp()).get("/diff").query({ from: "--output=x", to: "main" });

    expect(response.status).toBe(400);
    expect(getDiff).not.toHaveBeenCalled();
  });
});
