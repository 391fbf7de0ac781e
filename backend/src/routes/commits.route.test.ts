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
import { HttpRouteError } from "../domain/http-route-error.js";
import { getHead, getLog, hasBranch, listBranches } from "../services/git.service.js";

describe("GET /commits", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(getHead).mockResolvedValue({ ref: "HEAD", hash: "a1b2c3d" });
    vi.mocked(listBranches).mockResolvedValue(["main"]);
    vi.mocked(hasBranch).mockResolvedValue(false);
    vi.mocked(getLog).mockResolvedValue([
      { hash: "a1b2c3d", date: "2026-03-02", subject: "Add pages resolver" },
    ]);
  });

  it("uses HEAD when detached and the configured commit limit", async () => {
    const app = createApp(
      createAppConfig({ repoRoot: "/repo", repoName: "site-builder" }, { commitLimit: 20 }),
    );

    const response = await request(app).get("/commits");

    expect(response.status).toBe(200);
    expect(getLog).toHaveBeenCalledWith("/repo", "HEAD", 20, { signal: expect.any(AbortSignal) });
    expect(response.text).toContain("Add pages resolver");
  });

  it("reports a HEAD lookup failure", async () => {
    vi.mocked(getHead).mockRejectedValue(
      new HttpRouteError(500, "GIT_COMMAND_FAILED", "Failed to read HEAD"),
    );
    const app = createApp(createAppConfig({ repoRoot: "/repo", repoName: "site-builder" }));

    const response = await request(app).get("/commits");

    expect(response.status).toBe(500);
    expect(response.text).toBe("Failed to read HEAD");
  });
});
