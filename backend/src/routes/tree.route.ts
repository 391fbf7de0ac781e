// Serves directory listings; flow is GET /tree(query) -> ls-tree entries -> rendered HTML.
import { Router } from "express";
import type { GitviewAppConfig } from "../config.js";
import { listTree } from "../services/git.service.js";
import { assertSafeRepoPath, normalizeRepoPath, parentPath } from "../services/git/path.service.js";
import { getBaseViewData } from "../services/view-data.service.js";
import { renderTreePage } from "../views/render.js";
import { createRequestAbortSignal, readQueryString, sendHtml, sendRouteError } from "./http.js";
import { readThemePreference } from "./theme.route.js";
import { resolveRefParam } from "./ref-params.js";

export function createTreeRoute(config: GitviewAppConfig): Router {
  const router = Router();

  router.get("/tree", async (req, res) => {
    const signal = createRequestAbortSignal(res);

    try {
      const repoPath = assertSafeRepoPath(
        normalizeRepoPath(readQueryString(req.query.path)).replace(/\/+$/, ""),
      );
      const ref = await resolveRefParam(config, req.query.ref, signal);
      const theme = readThemePreference(req);
      const base = await getBaseViewData({ ...config, theme }, ref, { signal });
      const entries = await listTree(config.repoRoot, ref, repoPath, { signal });

      sendHtml(
        res,
        renderTreePage({
          ...base,
          path: repoPath,
          parentPath: parentPath(repoPath),
          entries,
        }),
      );
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  return router;
}
