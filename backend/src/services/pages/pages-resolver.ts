import type { PagesResolution } from "@gitview/contracts";
import { logEvent } from "../../logging/logger.js";
import { normalizeRepoPath } from "../git/path.service.js";

export const DEFAULT_PAGES_BRANCH = "gh-pages";
export const INDEX_DOCUMENT = "index.html";

export type BranchExists = (name: string) => Promise<boolean>;

export type PagesResolverOptions = {
  branchExists: BranchExists;
  defaultBranch: string;
};

export function toPagesFilePath(subPath: string): string {
  const normalized = normalizeRepoPath(subPath);
  return normalized === "" || normalized.endsWith("/") ? `${normalized}${INDEX_DOCUMENT}` : normalized;
}

/**
 * Splits a `/pages/` path tail into a branch name and a path inside that branch's tree.
 *
 * Branch names may contain slashes, so every prefix of the path segments is a candidate.
 * Candidates are tried longest first and the first one `branchExists` confirms wins, which
 * makes `release/v2/docs` resolve to `release/v2` when both `release` and `release/v2` exist.
 * When nothing matches, the whole input is looked up on `defaultBranch`.
 *
 * Errors thrown by `branchExists` propagate unchanged.
 */
export async function resolvePagesPath(
  rawPath: string,
  options: PagesResolverOptions,
): Promise<PagesResolution> {
  const { branchExists, defaultBranch } = options;
  const input = rawPath === "" ? `${defaultBranch}/` : rawPath;
  const endsWithSlash = input.endsWith("/");
  const trimmed = endsWithSlash ? input.slice(0, -1) : input;
  const segments = trimmed.split("/").filter((segment) => segment.length > 0);

  for (let length = segments.length; length > 0; length -= 1) {
    const candidate = segments.slice(0, length).join("/");

    if (!(await branchExists(candidate))) {
      continue;
    }

    let subPath = segments.slice(length).join("/");
    if (endsWithSlash && subPath !== "") {
      subPath = `${subPath}/`;
    }

    logEvent("pages", "debug", "pages:resolved", { branch: candidate, subPath });

    return {
      kind: "resolved",
      branch: candidate,
      subPath,
      filePath: toPagesFilePath(subPath),
      matched: true,
    };
  }

  if (!(await branchExists(defaultBranch))) {
    logEvent("pages", "debug", "pages:default-missing", { branch: defaultBranch });
    return { kind: "not-found", branch: defaultBranch };
  }

  logEvent("pages", "debug", "pages:fallback", { branch: defaultBranch, subPath: input });

  return {
    kind: "resolved",
    branch: defaultBranch,
    subPath: input,
    filePath: toPagesFilePath(input),
    matched: false,
  };
}
