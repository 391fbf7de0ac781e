import type { BaseViewData, ThemePreference } from "@gitview/contracts";
import { HttpRouteError, isHttpRouteError } from "../domain/http-route-error.js";
import type { GitReadOptions } from "./git/git-client.js";
import { hasBranch, listBranches } from "./git.service.js";

export type ViewDataContext = {
  repoRoot: string;
  repoName: string;
  pagesBranch: string;
  theme: ThemePreference | null;
};

export async function getBaseViewData(
  context: ViewDataContext,
  ref: string,
  options: GitReadOptions = {},
): Promise<BaseViewData> {
  try {
    const [branches, hasPagesBranch] = await Promise.all([
      listBranches(context.repoRoot, options),
      hasBranch(context.repoRoot, context.pagesBranch, options),
    ]);

    return {
      repoName: context.repoName,
      ref,
      branches,
      pagesBranch: context.pagesBranch,
      hasPagesBranch,
      pagesBranches: branches,
      theme: context.theme,
    };
  } catch (error) {
    throw new HttpRouteError(
      500,
      isHttpRouteError(error) ? error.code : "INTERNAL_ERROR",
      "Failed to load repo metadata",
      { details: isHttpRouteError(error) ? error.details : undefined, cause: error },
    );
  }
}
