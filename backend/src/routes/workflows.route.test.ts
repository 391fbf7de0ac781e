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
import { hasBranch, listBranches, listWorkflows } from "../services/git.service.js";

describe("GET /workflows", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(listBranches).mockResolvedValue(["main"]);
    vi.mocked(hasBranch).mockResolvedValue(false);
  });

  it("links each workflow file to the blob view", async () => {
    vi.mocked(listWorkflows).mockResolvedValue([".github/workflows/ci.yml"]);
    const app = createApp(createAppConfig({ repoRoot: "/repo", repoName: "site-builder" }));

    const response = await request(app).get("/workflows").query({ ref: "main" });

    expect(response.status).toBe(200);
    expect(listWorkflows).toHaveBeenCalledWith("/repo", "main", { signal: expect.any(AbortSignal) });
    expect(response.text).toContain(
      '<a href="/blob?ref=main&amp;path=.github%2Fworkflows%2Fci.yml">.github/workflows/ci.yml</a>',
    );
  });
});
