// Serves branches as static sites; flow is GET /pages/{branch}/{path} -> branch-aware resolution -> blob bytes.
import { Router } from "express";
import type { GitviewAppConfig } from "../config.js";
import { HttpRouteError } from "../domain/http-route-error.js";
import { hasBranch, readBlob, toRevisionSpec } from "../services/git.service.js";
import { assertSafeRepoPath } from "../services/git/path.service.js";
import { resolvePagesPath } from "../services/pages/pages-resolver.js";
import { createRequestAbortSignal, sendFileBytes, sendRouteError } from "./http.js";

export const PAGES_MOUNT_PREFIX = "/pages/";

export function decodePagesPath(requestPath: string): string {
  const tail = requestPath.startsWith(PAGES_MOUNT_PREFIX)
    ? requestPath.slice(PAGES_MOUNT_PREFIX.length)
    : "";

  let decoded: string;
  try {
    decoded = decodeURIComponent(tail);
  } catch {
    throw new HttpRouteError(400, "INVALID_PATH", "Malformed percent-encoding in path");
  }

  return assertSafeRepoPath(decoded);
}

export function createPagesRoute(config: GitviewAppConfig): Router {
  const router = Router();

  router.get(/^\/pages\/.*/, async (req, res) => {
    const signal = createRequestAbortSignal(res);

    try {
      const resolution = await resolvePagesPath(decodePagesPath(req.path), {
        defaultBranch: config.pagesBranch,
        branchExists: async (name) => await hasBranch(config.repoRoot, name, { signal }),
      });

      if (resolution.kind === "not-found") {
        throw new HttpRouteError(
          404,
          "BRANCH_NOT_FOUND",
          `No valid branch found in path and ${resolution.branch} branch does not exist`,
        );
      }

      const content = await readBlob(
        config.repoRoot,
        toRevisionSpec(resolution.branch, resolution.filePath),
        { signal },
      );

      if (!content) {
        throw new HttpRouteError(404, "NOT_FOUND", `File not found in ${resolution.branch}`, {
          details: { branch: resolution.branch, path: resolution.filePath },
        });
      }

      sendFileBytes(res, resolution.filePath, content);
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  // Registered after the catch-all above: without strict routing "/pages" would also match "/pages/".
  router.get("/pages", (req, res) => {
    const queryIndex = req.originalUrl.indexOf("?");
    const query = queryIndex >= 0 ? req.originalUrl.slice(queryIndex) : "";
    res.redirect(301, `${PAGES_MOUNT_PREFIX}${query}`);
  });

  return router;
}
