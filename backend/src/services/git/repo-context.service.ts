import path from "node:path";
import { HttpRouteError } from "../../domain/http-route-error.js";
import { GitCommandError, execGit, toGitRouteError } from "./git-client.js";

export type RepoContext = {
  repoRoot: string;
  repoName: string;
};

function toRepoName(repoRoot: string): string {
  const normalized = repoRoot.replace(/[\\/]+$/, "");
  const name = path.basename(normalized);
  return name.length > 0 ? name : "repository";
}

function isNotGitRepositoryError(error: GitCommandError): boolean {
  const text = `${error.stderr}\n${error.stdout}`.toLowerCase();
  return text.includes("not a git repository");
}

export async function loadRepoContext(candidateRoot: string): Promise<RepoContext> {
  try {
    const result = await execGit(["-C", candidateRoot, "rev-parse", "--show-toplevel"]);
    const repoRoot = result.stdout.trim();

    return {
      repoRoot,
      repoName: toRepoName(repoRoot),
    };
  } catch (error) {
    if (error instanceof GitCommandError && isNotGitRepositoryError(error)) {
      throw new HttpRouteError(409, "NOT_GIT_REPO", `Not a Git repository: ${candidateRoot}`, {
        cause: error,
      });
    }

    throw toGitRouteError(error, "Unable to inspect repository root.");
  }
}
