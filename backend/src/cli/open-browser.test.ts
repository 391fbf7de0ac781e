import { describe, expect, it } from "vitest";
import { resolveBrowserCommand } from "./open-browser.js";

describe("resolveBrowserCommand", () => {
  const url = "http://localhost:8080";

  it("uses open on macOS", () => {
    expect(resolveBrowserCommand("darwin", url)).toEqual({ command: "open", args: [url] });
  });

  it("uses cmd start on Windows with an empty window title", () => {
    expect(resolveBrowserCommand("win32", url)).toEqual({
      command: "cmd",
      args: ["/c", "start", "", url],
    });
  });

  it("falls back to xdg-open elsewhere", () => {
    expect(resolveBrowserCommand("linux", url)).toEqual({ command: "xdg-open", args: [url] });
    expect(resolveBrowserCommand("freebsd", url)).toEqual({ command: "xdg-open", args: [url] });
  });
});
