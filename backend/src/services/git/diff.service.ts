import { execGit, toGitRouteError, type GitReadOptions } from "./git-client.js";

export const NO_DIFFERENCES = "No differences.\n";

export type DiffOutput = {
  stat: string;
  patch: string;
};

// `--stat --patch` prints the diffstat block first, then the patch starting at the first "diff --git".
export function splitDiffOutput(output: string): DiffOutput {
  if (output.length === 0) {
    return { stat: "", patch: NO_DIFFERENCES };
  }

  const patchStart = output.startsWith("diff --git ") ? 0 : output.indexOf("\ndiff --git ");
  if (patchStart < 0) {
    return { stat: output.trimEnd(), patch: "" };
  }

  const stat = output.slice(0, patchStart).trimEnd();
  const patch = patchStart === 0 ? output : output.slice(patchStart + 1);
  return { stat, patch };
}

export async function getDiff(
  repoRoot: string,
  from: string,
  to: string,
  options: GitReadOptions = {},
): Promise<DiffOutput> {
  try {
    const result = await execGit(["-C", repoRoot, "diff", "--stat", "--patch", from, to, "--"], {
      signal: options.signal,
    });

    return splitDiffOutput(result.stdout);
  } catch (error) {
    throw toGitRouteError(error, "Failed to compute diff");
  }
}
