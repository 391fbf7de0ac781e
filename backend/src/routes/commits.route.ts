// Serves the commit log; flow is GET /commits(query) -> git log summaries -> rendered HTML.
import { Router } from "express";
import type { GitviewAppConfig } from "../config.js";
import { getLog } from "../services/git.service.js";
import { getBaseViewData } from "../services/view-data.service.js";
import { renderCommitsPage } from "../views/render.js";
import { createRequestAbortSignal, sendHtml, sendRouteError } from "./http.js";
import { readThemePreference } from "./theme.route.js";
import { resolveRefParam } from "./ref-params.js";

export function createCommitsRoute(config: GitviewAppConfig): Router {
  const router = Router();

  router.get("/commits", async (req, res) => {
    const signal = createRequestAbortSignal(res);

    try {
      const ref = await resolveRefParam(config, req.query.ref, signal);
      const theme = readThemePreference(req);
      const base = await getBaseViewData({ ...config, theme }, ref, { signal });
      const commits = await getLog(config.repoRoot, ref, config.commitLimit, { signal });

      sendHtml(res, renderCommitsPage({ ...base, commits }));
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  return router;
}
