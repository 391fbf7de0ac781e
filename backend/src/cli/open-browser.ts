import { spawn } from "node:child_process";
import { logEvent } from "../logging/logger.js";

export type BrowserCommand = {
  command: string;
  args: string[];
};

export function resolveBrowserCommand(platform: NodeJS.Platform, url: string): BrowserCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      return { command: "cmd", args: ["/c", "start", "", url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

// Missing launchers surface as an async "error" event, not a throw.
export function openBrowser(url: string, platform: NodeJS.Platform = process.platform): boolean {
  const { command, args } = resolveBrowserCommand(platform, url);

  try {
    const child = spawn(command, args, {
      detached: true,
      stdio: "ignore",
    });
    child.once("error", (error) => {
      logEvent("app", "warn", "browser:open-failed", { command, error: error.message });
    });
    child.unref();
    return true;
  } catch (error) {
    logEvent("app", "warn", "browser:open-failed", {
      command,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
