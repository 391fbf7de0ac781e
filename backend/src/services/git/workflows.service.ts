import { execGit, toGitRouteError, type GitReadOptions } from "./git-client.js";

export const WORKFLOWS_DIRECTORY = ".github/workflows";

export function parseNameOnlyTree(stdout: string): string[] {
  return stdout
    .split("\0")
    .map((record) => record.trim())
    .filter(Boolean);
}

export async function listWorkflows(
  repoRoot: string,
  ref: string,
  options: GitReadOptions = {},
): Promise<string[]> {
  try {
    const result = await execGit(
      ["-C", repoRoot, "ls-tree", "--name-only", "-z", ref, "--", `${WORKFLOWS_DIRECTORY}/`],
      { signal: options.signal },
    );

    return parseNameOnlyTree(result.stdout);
  } catch (error) {
    throw toGitRouteError(error, "Failed to list workflows");
  }
}
