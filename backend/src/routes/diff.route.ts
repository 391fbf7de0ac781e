// Serves diffs between two revisions; flow is GET /diff(query) -> git diff --stat --patch -> rendered HTML.
import { Router } from "express";
import type { GitviewAppConfig } from "../config.js";
import { HttpRouteError } from "../domain/http-route-error.js";
import { getDiff } from "../services/git.service.js";
import { assertSafeRef } from "../services/git/path.service.js";
import { getBaseViewData } from "../services/view-data.service.js";
import { renderDiffPage } from "../views/render.js";
import { createRequestAbortSignal, readQueryString, sendHtml, sendRouteError } from "./http.js";
import { readThemePreference } from "./theme.route.js";

export function createDiffRoute(config: GitviewAppConfig): Router {
  const router = Router();

  router.get("/diff", async (req, res) => {
    const signal = createRequestAbortSignal(res);

    try {
      const rawFrom = readQueryString(req.query.from);
      const rawTo = readQueryString(req.query.to);

      if (!rawFrom || !rawTo) {
        throw new HttpRouteError(400, "MISSING_PARAMS", "from and to query parameters are required");
      }

      const from = assertSafeRef(rawFrom);
      const to = assertSafeRef(rawTo);
      // The target revision doubles as the navigation ref.
      const theme = readThemePreference(req);
      const base = await getBaseViewData({ ...config, theme }, to, { signal });
      const diff = await getDiff(config.repoRoot, from, to, { signal });

      sendHtml(res, renderDiffPage({ ...base, from, to, stat: diff.stat, patch: diff.patch }));
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  return router;
}
