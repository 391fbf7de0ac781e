// Serves file views and raw bytes; flow is GET /blob|/raw(query) -> cat-file blob -> HTML preview or bytes.
import { Router, type Request } from "express";
import type { GitviewAppConfig } from "../config.js";
import { HttpRouteError } from "../domain/http-route-error.js";
import { readBlob, toRevisionSpec } from "../services/git.service.js";
import { assertSafeRef, assertSafeRepoPath, normalizeRepoPath } from "../services/git/path.service.js";
import { getBaseViewData } from "../services/view-data.service.js";
import { renderBlobPage } from "../views/render.js";
import {
  createRequestAbortSignal,
  readQueryString,
  sendFileBytes,
  sendHtml,
  sendRouteError,
} from "./http.js";
import { readThemePreference } from "./theme.route.js";

const BINARY_SNIFF_BYTES = 8000;

type BlobParams = {
  ref: string;
  path: string;
};

function readBlobParams(req: Request): BlobParams {
  const ref = readQueryString(req.query.ref);
  const repoPath = normalizeRepoPath(readQueryString(req.query.path));

  if (!ref || !repoPath) {
    throw new HttpRouteError(400, "MISSING_PARAMS", "ref and path are required");
  }

  return { ref: assertSafeRef(ref), path: assertSafeRepoPath(repoPath) };
}

async function readRequiredBlob(
  config: GitviewAppConfig,
  params: BlobParams,
  signal: AbortSignal,
): Promise<Buffer> {
  const content = await readBlob(config.repoRoot, toRevisionSpec(params.ref, params.path), { signal });

  if (!content) {
    throw new HttpRouteError(404, "NOT_FOUND", "File not found");
  }

  return content;
}

export function looksBinary(content: Buffer): boolean {
  return content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

export function createBlobRoute(config: GitviewAppConfig): Router {
  const router = Router();

  router.get("/blob", async (req, res) => {
    const signal = createRequestAbortSignal(res);

    try {
      const params = readBlobParams(req);
      const theme = readThemePreference(req);
      const base = await getBaseViewData({ ...config, theme }, params.ref, { signal });
      const content = await readRequiredBlob(config, params, signal);
      const isBinary = looksBinary(content);
      const truncated = content.length > config.previewLimitBytes;
      const preview = truncated ? content.subarray(0, config.previewLimitBytes) : content;

      sendHtml(
        res,
        renderBlobPage({
          ...base,
          path: params.path,
          content: isBinary ? "" : preview.toString("utf8"),
          truncated,
          isBinary,
          sizeBytes: content.length,
        }),
      );
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  router.get("/raw", async (req, res) => {
    const signal = createRequestAbortSignal(res);

    try {
      const params = readBlobParams(req);
      const content = await readRequiredBlob(config, params, signal);
      sendFileBytes(res, params.path, content);
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  return router;
}
