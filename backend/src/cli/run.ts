import { stat } from "node:fs/promises";
import { createApp } from "../app.js";
import { createAppConfig } from "../config.js";
import { getLoggingConfigSnapshot, logEvent } from "../logging/logger.js";
import { loadRepoContext } from "../services/git.service.js";
import { GitviewCliArgsError, parseGitviewCliArgs } from "./args.js";
import { openBrowser } from "./open-browser.js";

export function toLaunchUrl(host: string, port: number): string {
  const launchHost = host === "0.0.0.0" || host === "::" ? "localhost" : host;
  const urlHost = launchHost.includes(":") ? `[${launchHost}]` : launchHost;
  return `http://${urlHost}:${port}`;
}

async function assertDirectoryExists(targetPath: string, label: string): Promise<void> {
  let isDirectory = false;

  try {
    isDirectory = (await stat(targetPath)).isDirectory();
  } catch {
    isDirectory = false;
  }

  if (!isDirectory) {
    throw new GitviewCliArgsError(`${label} does not exist or is not a directory: ${targetPath}`);
  }
}

async function listen(app: ReturnType<typeof createApp>, host: string, port: number): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("error", reject);
    server.once("listening", resolve);
  });
}

export async function runGitviewCli(argv: string[]): Promise<void> {
  try {
    const parsed = parseGitviewCliArgs(argv);

    if (parsed.kind === "help") {
      console.log(parsed.message);
      return;
    }

    const { host, openBrowser: shouldOpenBrowser, pagesBranch, port, repoRoot } = parsed.options;
    const launchUrl = toLaunchUrl(host, port);

    await assertDirectoryExists(repoRoot, "Repository path");
    const repo = await loadRepoContext(repoRoot);
    const app = createApp(createAppConfig(repo, { pagesBranch }));

    logEvent("app", "info", "server:boot", {
      repoRoot: repo.repoRoot,
      pagesBranch,
      logging: getLoggingConfigSnapshot(),
    });

    await listen(app, host, port);

    console.log(`[gitview] serving repo: ${repo.repoRoot}`);
    console.log(`[gitview] ready at ${launchUrl}`);

    if (shouldOpenBrowser && !openBrowser(launchUrl)) {
      console.warn(`[gitview] unable to auto-open browser. Open ${launchUrl} manually.`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unable to start gitview.";
    console.error(`[gitview] ${message}`);
    process.exitCode = 1;
  }
}
