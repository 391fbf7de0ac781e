import { HttpRouteError } from "../../domain/http-route-error.js";

export function normalizeRepoPath(rawPath: string): string {
  const forwardSlashed = rawPath.replace(/\\/g, "/");
  return forwardSlashed.startsWith("/") ? forwardSlashed.slice(1) : forwardSlashed;
}

export function parentPath(repoPath: string): string {
  if (!repoPath) {
    return "";
  }

  const parts = repoPath.split("/");
  if (parts.length <= 1) {
    return "";
  }

  return parts.slice(0, -1).join("/");
}

// Refs end up as positional git arguments, so anything that git could read as an option is refused.
export function assertSafeRef(ref: string): string {
  const trimmed = ref.trim();

  if (!trimmed || trimmed.startsWith("-") || trimmed.includes("\0")) {
    throw new HttpRouteError(400, "INVALID_REF", `Invalid ref: ${JSON.stringify(ref)}`);
  }

  return trimmed;
}

export function assertSafeRepoPath(repoPath: string): string {
  if (repoPath.includes("\0")) {
    throw new HttpRouteError(400, "INVALID_PATH", "Path cannot contain NUL bytes.");
  }

  return repoPath;
}
