import { DEFAULT_COMMIT_LIMIT } from "./services/git/log.service.js";
import { DEFAULT_PAGES_BRANCH } from "./services/pages/pages-resolver.js";

export const DEFAULT_PREVIEW_LIMIT_BYTES = 200 * 1024;

export type GitviewAppConfig = {
  repoRoot: string;
  repoName: string;
  pagesBranch: string;
  commitLimit: number;
  previewLimitBytes: number;
};

export function createAppConfig(
  repo: { repoRoot: string; repoName: string },
  overrides: Partial<Omit<GitviewAppConfig, "repoRoot" | "repoName">> = {},
): GitviewAppConfig {
  return {
    repoRoot: repo.repoRoot,
    repoName: repo.repoName,
    pagesBranch: overrides.pagesBranch ?? DEFAULT_PAGES_BRANCH,
    commitLimit: overrides.commitLimit ?? DEFAULT_COMMIT_LIMIT,
    previewLimitBytes: overrides.previewLimitBytes ?? DEFAULT_PREVIEW_LIMIT_BYTES,
  };
}
