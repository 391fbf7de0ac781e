// Defines shared view contracts; data flows git services -> route handlers -> server-rendered views using the same types.
export type TreeEntryType = "blob" | "tree" | "commit";

export type TreeEntry = {
  name: string;
  mode: string;
  type: TreeEntryType;
  size: number;
};

export type CommitSummary = {
  hash: string;
  date: string;
  subject: string;
};

export type HeadInfo = {
  ref: string;
  hash: string;
};

export type ThemePreference = "light" | "dark";

export type BaseViewData = {
  repoName: string;
  ref: string;
  branches: string[];
  pagesBranch: string;
  hasPagesBranch: boolean;
  pagesBranches: string[];
  theme: ThemePreference | null;
};

export type OverviewViewData = BaseViewData & {
  headHash: string;
};

export type TreeViewData = BaseViewData & {
  path: string;
  parentPath: string;
  entries: TreeEntry[];
};

export type BlobViewData = BaseViewData & {
  path: string;
  content: string;
  truncated: boolean;
  isBinary: boolean;
  sizeBytes: number;
};

export type CommitsViewData = BaseViewData & {
  commits: CommitSummary[];
};

export type DiffViewData = BaseViewData & {
  from: string;
  to: string;
  stat: string;
  patch: string;
};

export type WorkflowsViewData = BaseViewData & {
  workflows: string[];
};

export type PagesResolution =
  | {
      kind: "resolved";
      branch: string;
      subPath: string;
      filePath: string;
      matched: boolean;
    }
  | {
      kind: "not-found";
      branch: string;
    };

export type HttpErrorCode =
  | "MISSING_PARAMS"
  | "INVALID_REF"
  | "INVALID_PATH"
  | "INVALID_THEME"
  | "NOT_FOUND"
  | "BRANCH_NOT_FOUND"
  | "NOT_GIT_REPO"
  | "GIT_COMMAND_FAILED"
  | "INTERNAL_ERROR";

export type HttpErrorDetails = Record<string, string | number | boolean | null>;
