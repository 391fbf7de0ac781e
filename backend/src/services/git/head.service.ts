import type { HeadInfo } from "@gitview/contracts";
import { execGit, toGitRouteError, type GitReadOptions } from "./git-client.js";

export async function getHead(repoRoot: string, options: GitReadOptions = {}): Promise<HeadInfo> {
  try {
    const refResult = await execGit(["-C", repoRoot, "symbolic-ref", "--quiet", "--short", "HEAD"], {
      allowExitCodes: [0, 1],
      signal: options.signal,
    });
    // Exit code 1 means a detached HEAD.
    const ref = refResult.exitCode === 0 ? refResult.stdout.trim() || "HEAD" : "HEAD";

    const hashResult = await execGit(["-C", repoRoot, "rev-parse", "--short", "HEAD"], {
      signal: options.signal,
    });

    return { ref, hash: hashResult.stdout.trim() };
  } catch (error) {
    throw toGitRouteError(error, "Failed to read HEAD");
  }
}
