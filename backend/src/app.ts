// Wires route modules into the Express app; request flow is browser -> page routes -> git services -> HTML or bytes.
import { fileURLToPath } from "node:url";
import cookieParser from "cookie-parser";
import express from "express";
import type { GitviewAppConfig } from "./config.js";
import { createHttpRequestLoggingMiddleware } from "./logging/http-logging.middleware.js";
import { createBlobRoute } from "./routes/blob.route.js";
import { createCommitsRoute } from "./routes/commits.route.js";
import { createDiffRoute } from "./routes/diff.route.js";
import { sendHttpError } from "./routes/http.js";
import { createOverviewRoute } from "./routes/overview.route.js";
import { createPagesRoute } from "./routes/pages.route.js";
import { createThemeRoute } from "./routes/theme.route.js";
import { createTreeRoute } from "./routes/tree.route.js";
import { createWorkflowsRoute } from "./routes/workflows.route.js";

export function resolveStaticDir(): string {
  return fileURLToPath(new URL("../static", import.meta.url));
}

export function createApp(config: GitviewAppConfig) {
  const app = express();

  app.disable("x-powered-by");
  app.use(createHttpRequestLoggingMiddleware());
  app.use(cookieParser());
  app.use("/static", express.static(resolveStaticDir(), { index: false }));

  app.use(createOverviewRoute(config));
  app.use(createTreeRoute(config));
  app.use(createBlobRoute(config));
  app.use(createCommitsRoute(config));
  app.use(createDiffRoute(config));
  app.use(createWorkflowsRoute(config));
  app.use(createPagesRoute(config));
  app.use(createThemeRoute());

  app.use((_req, res) => {
    sendHttpError(res, 404, "Not found");
  });

  return app;
}
