import type { TreeEntry, TreeEntryType } from "@gitview/contracts";
import { execGit, toGitRouteError, type GitReadOptions } from "./git-client.js";

function toTreeEntryType(raw: string): TreeEntryType | null {
  if (raw === "blob" || raw === "tree" || raw === "commit") return raw;
  return null;
}

// Record format: "<mode> <type> <object> <size>\t<name>", NUL-terminated.
export function parseLsTreeOutput(raw: string): TreeEntry[] {
  const entries: TreeEntry[] = [];

  for (const record of raw.split("\0")) {
    if (!record) {
      continue;
    }

    const tabIndex = record.indexOf("\t");
    if (tabIndex < 0) {
      continue;
    }

    const [mode, rawType, , sizeText] = record.slice(0, tabIndex).trim().split(/\s+/);
    const type = rawType ? toTreeEntryType(rawType) : null;
    if (!mode || !type || sizeText === undefined) {
      continue;
    }

    const parsedSize = Number.parseInt(sizeText, 10);

    entries.push({
      name: record.slice(tabIndex + 1).trim(),
      mode,
      type,
      size: sizeText === "-" || Number.isNaN(parsedSize) ? 0 : parsedSize,
    });
  }

  const directories = entries.filter((entry) => entry.type === "tree");
  const files = entries.filter((entry) => entry.type !== "tree");
  return [...directories, ...files];
}

function toDirectoryPath(repoPath: string): string {
  if (!repoPath) return "";
  return repoPath.endsWith("/") ? repoPath : `${repoPath}/`;
}

export async function listTree(
  repoRoot: string,
  ref: string,
  repoPath: string,
  options: GitReadOptions = {},
): Promise<TreeEntry[]> {
  const directoryPath = toDirectoryPath(repoPath);
  const args = ["-C", repoRoot, "ls-tree", "-z", "-l", ref];
  if (directoryPath) {
    args.push("--", directoryPath);
  }

  try {
    const result = await execGit(args, { signal: options.signal });

    // ls-tree prints repository-relative names; the listing shows them relative to the directory.
    return parseLsTreeOutput(result.stdout).map((entry) => ({
      ...entry,
      name: entry.name.startsWith(directoryPath) ? entry.name.slice(directoryPath.length) : entry.name,
    }));
  } catch (error) {
    throw toGitRouteError(error, "Failed to read tree");
  }
}
