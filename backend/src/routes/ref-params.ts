import type { GitviewAppConfig } from "../config.js";
import { getHead } from "../services/git.service.js";
import { assertSafeRef } from "../services/git/path.service.js";
import { readQueryString } from "./http.js";

// An omitted ref means whatever HEAD points at.
export async function resolveRefParam(
  config: GitviewAppConfig,
  rawRef: unknown,
  signal: AbortSignal,
): Promise<string> {
  const ref = readQueryString(rawRef);
  if (ref === "") {
    const head = await getHead(config.repoRoot, { signal });
    return head.ref;
  }

  return assertSafeRef(ref);
}
