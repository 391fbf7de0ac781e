import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("./git-client.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("./git-client.js")>()),
  execGit: vi.fn(),
}));

import { readBlob, toRevisionSpec } from "./content.service.js";
import { GitCommandError, execGit } from "./git-client.js";

const execGitMock = vi.mocked(execGit);

describe("toRevisionSpec", () => {
  it("joins ref and path with a colon", () => {
    expect(toRevisionSpec("feature/new-ui", "docs/index.html")).toBe(
      "feature/new-ui:docs/index.html",
    );
  });
});

describe("readBlob", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("returns the blob bytes on exit 0", async () => {
    const bytes = Buffer.from([0x3c, 0x68, 0x31, 0x3e, 0x00, 0xff]);
    execGitMock.mockResolvedValue({
      stdout: bytes.toString("utf8"),
      stderr: "",
      stdoutBuffer: bytes,
      exitCode: 0,
    });

    const content = await readBlob("/repo", "gh-pages:index.html");

    expect(content).toEqual(bytes);
    expect(execGitMock).toHaveBeenCalledWith(
      ["-C", "/repo", "cat-file", "blob", "gh-pages:index.html"],
      { allowExitCodes: [0, 128], signal: undefined },
    );
  });

  it("returns null when git cannot resolve the blob", async () => {
    execGitMock.mockResolvedValue({
      stdout: "",
      stderr: "fatal: path 'missing.html' does not exist in 'gh-pages'\n",
      stdoutBuffer: Buffer.alloc(0),
      exitCode: 128,
    });

    await expect(readBlob("/repo", "gh-pages:missing.html")).resolves.toBeNull();
  });

  it("reports other git failures as server errors", async () => {
    execGitMock.mockRejectedValue(
      new GitCommandError(["cat-file", "blob", "gh-pages:index.html"], "/repo", -1, "", "spawn git ENOENT"),
    );

    await expect(readBlob("/repo", "gh-pages:index.html")).rejects.toMatchObject({
      status: 500,
      code: "GIT_COMMAND_FAILED",
      message: "Failed to read file",
    });
  });
});
