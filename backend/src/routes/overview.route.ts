// Serves the repository overview; flow is GET / -> HEAD + branch metadata -> rendered HTML.
import { Router } from "express";
import type { GitviewAppConfig } from "../config.js";
import { getHead } from "../services/git.service.js";
import { getBaseViewData } from "../services/view-data.service.js";
import { renderOverviewPage } from "../views/render.js";
import { createRequestAbortSignal, sendHtml, sendRouteError } from "./http.js";
import { readThemePreference } from "./theme.route.js";

export function createOverviewRoute(config: GitviewAppConfig): Router {
  const router = Router();

  router.get("/", async (req, res) => {
    const signal = createRequestAbortSignal(res);

    try {
      const head = await getHead(config.repoRoot, { signal });
      const theme = readThemePreference(req);
      const base = await getBaseViewData({ ...config, theme }, head.ref, { signal });
      sendHtml(res, renderOverviewPage({ ...base, headHash: head.hash }));
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  return router;
}
