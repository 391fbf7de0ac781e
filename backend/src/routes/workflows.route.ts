// Serves the CI workflow listing; flow is GET /workflows(query) -> ls-tree .github/workflows -> rendered HTML.
import { Router } from "express";
import type { GitviewAppConfig } from "../config.js";
import { listWorkflows } from "../services/git.service.js";
import { getBaseViewData } from "../services/view-data.service.js";
import { renderWorkflowsPage } from "../views/render.js";
import { createRequestAbortSignal, sendHtml, sendRouteError } from "./http.js";
import { readThemePreference } from "./theme.route.js";
import { resolveRefParam } from "./ref-params.js";

export function createWorkflowsRoute(config: GitviewAppConfig): Router {
  const router = Router();

  router.get("/workflows", async (req, res) => {
    const signal = createRequestAbortSignal(res);

    try {
      const ref = await resolveRefParam(config, req.query.ref, signal);
      const theme = readThemePreference(req);
      const base = await getBaseViewData({ ...config, theme }, ref, { signal });
      const workflows = await listWorkflows(config.repoRoot, ref, { signal });

      sendHtml(res, renderWorkflowsPage({ ...base, workflows }));
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  return router;
}
