import { execGit, toGitRouteError, type GitReadOptions } from "./git-client.js";

export function toRevisionSpec(ref: string, repoPath: string): string {
  return `${ref}:${repoPath}`;
}

// Returns null when the spec does not name a blob (missing path, unknown ref or a directory).
export async function readBlob(
  repoRoot: string,
  revisionSpec: string,
  options: GitReadOptions = {},
): Promise<Buffer | null> {
  try {
    const result = await execGit(["-C", repoRoot, "cat-file", "blob", revisionSpec], {
      allowExitCodes: [0, 128],
      signal: options.signal,
    });

    if (result.exitCode !== 0) {
      return null;
    }

    return result.stdoutBuffer;
  } catch (error) {
    throw toGitRouteError(error, "Failed to read file");
  }
}
