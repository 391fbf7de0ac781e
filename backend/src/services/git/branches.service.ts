import { execGit, toGitRouteError, type GitReadOptions } from "./git-client.js";

export function parseBranchList(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

export async function listBranches(repoRoot: string, options: GitReadOptions = {}): Promise<string[]> {
  try {
    const result = await execGit(["-C", repoRoot, "branch", "--format=%(refname:short)"], {
      signal: options.signal,
    });

    return parseBranchList(result.stdout);
  } catch (error) {
    throw toGitRouteError(error, "Unable to list repository branches.");
  }
}

export async function hasBranch(
  repoRoot: string,
  name: string,
  options: GitReadOptions = {},
): Promise<boolean> {
  try {
    const result = await execGit(
      ["-C", repoRoot, "show-ref", "--verify", "--quiet", `refs/heads/${name}`],
      { allowExitCodes: [0, 1], signal: options.signal },
    );

    return result.exitCode === 0;
  } catch (error) {
    throw toGitRouteError(error, "Failed to check branch");
  }
}
