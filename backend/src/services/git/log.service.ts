import type { CommitSummary } from "@gitview/contracts";
import { execGit, toGitRouteError, type GitReadOptions } from "./git-client.js";

export const DEFAULT_COMMIT_LIMIT = 50;
const LOG_FORMAT = "%h%x09%ad%x09%s";

export function parseLogOutput(stdout: string): CommitSummary[] {
  const commits: CommitSummary[] = [];

  for (const line of stdout.split("\n")) {
    if (!line) {
      continue;
    }

    const tabIndex = line.indexOf("\t");
    const secondTabIndex = tabIndex < 0 ? -1 : line.indexOf("\t", tabIndex + 1);
    if (secondTabIndex < 0) {
      continue;
    }

    commits.push({
      hash: line.slice(0, tabIndex),
      date: line.slice(tabIndex + 1, secondTabIndex),
      subject: line.slice(secondTabIndex + 1),
    });
  }

  return commits;
}

export async function getLog(
  repoRoot: string,
  ref: string,
  limit = DEFAULT_COMMIT_LIMIT,
  options: GitReadOptions = {},
): Promise<CommitSummary[]> {
  try {
    const result = await execGit(
      ["-C", repoRoot, "log", "--date=short", `-n${limit}`, `--pretty=format:${LOG_FORMAT}`, ref],
      { signal: options.signal },
    );

    return parseLogOutput(result.stdout);
  } catch (error) {
    throw toGitRouteError(error, "Failed to read commits");
  }
}
