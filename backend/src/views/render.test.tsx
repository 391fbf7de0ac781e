import type { BaseViewData } from "@gitview/contracts";
import { describe, expect, it } from "vitest";
import { patchLineClass } from "./DiffPage.js";
import {
  renderBlobPage,
  renderCommitsPage,
  renderOverviewPage,
  renderTreePage,
  renderWorkflowsPage,
} from "./render.js";
import { pagesUrl, treeUrl } from "./urls.js";

const base: BaseViewData = {
  repoName: "site-builder",
  ref: "main",
  branches: ["main", "gh-pages"],
  pagesBranch: "gh-pages",
  hasPagesBranch: true,
  pagesBranches: ["main", "gh-pages"],
  theme: null,
};

describe("renderOverviewPage", () => {
  it("renders a full document with the head ref and hash", () => {
    const html = renderOverviewPage({ ...base, headHash: "a1b2c3d" });

    expect(html.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);
    expect(html).toContain("<title>Overview · site-builder</title>");
    expect(html).toContain("<code>main</code> at <code>a1b2c3d</code>");
    expect(html).toContain('<a href="/pages/gh-pages/">Pages</a>');
  });

  it("omits the pages link when the pages branch is missing", () => {
    const html = renderOverviewPage({ ...base, hasPagesBranch: false, headHash: "a1b2c3d" });

    expect(html).not.toContain('<a href="/pages/gh-pages/">Pages</a>');
  });
});

describe("renderTreePage", () => {
  it("links directories to the tree view and files to the blob view", () => {
    const html = renderTreePage({
      ...base,
      path: "",
      parentPath: "",
      entries: [
        { name: "docs", mode: "040000", type: "tree", size: 0 },
        { name: "README.md", mode: "100644", type: "blob", size: 2048 },
      ],
    });

    expect(html).toContain('<a href="/tree?ref=main&amp;path=docs">docs/</a>');
    expect(html).toContain('<a href="/blob?ref=main&amp;path=README.md">README.md</a>');
    expect(html).toContain('<td class="numeric">2.0 KiB</td>');
    expect(html).not.toContain("..</a>");
  });

  it("links to the parent directory inside subdirectories", () => {
    const html = renderTreePage({
      ...base,
      path: "docs/img",
      parentPath: "docs",
      entries: [],
    });

    expect(html).toContain('<a href="/tree?ref=main&amp;path=docs">..</a>');
    expect(html).toContain("This directory is empty.");
  });
});

describe("renderBlobPage", () => {
  it("escapes file contents", () => {
    const html = renderBlobPage({
      ...base,
      path: "index.html",
      content: "<script>alert(1)</script>",
      truncated: false,
      isBinary: false,
      sizeBytes: 25,
    });

    expect(html).toContain("<code>&lt;script&gt;alert(1)&lt;/script&gt;</code>");
    expect(html).toContain('<a href="/raw?ref=main&amp;path=index.html">Raw</a>');
  });

  it("shows notices for truncated and binary files", () => {
    const truncated = renderBlobPage({
      ...base,
      path: "big.log",
      content: "x",
      truncated: true,
      isBinary: false,
      sizeBytes: 300_000,
    });
    const binary = renderBlobPage({
      ...base,
      path: "logo.png",
      content: "",
      truncated: false,
      isBinary: true,
      sizeBytes: 512,
    });

    expect(truncated).toContain("File truncated for preview.");
    expect(binary).toContain("Binary file not shown.");
    expect(binary).not.toContain('class="file-content"');
  });
});

describe("renderCommitsPage", () => {
  it("links each commit to its diff against the parent", () => {
    const html = renderCommitsPage({
      ...base,
      commits: [{ hash: "a1b2c3d", date: "2026-03-02", subject: "Fix <nav> links" }],
    });

    expect(html).toContain('<a href="/diff?from=a1b2c3d%5E&amp;to=a1b2c3d">diff</a>');
    expect(html).toContain("Fix &lt;nav&gt; links");
  });
});

describe("renderWorkflowsPage", () => {
  it("shows an empty state without workflows", () => {
    const html = renderWorkflowsPage({ ...base, workflows: [] });

    expect(html).toContain("No workflows found in .github/workflows.");
  });
});

describe("patchLineClass", () => {
  it("classifies unified diff lines", () => {
    expect(patchLineClass("diff --git a/x b/x")).toBe("patch-header");
    expect(patchLineClass("--- a/x")).toBe("patch-file");
    expect(patchLineClass("+++ b/x")).toBe("patch-file");
    expect(patchLineClass("@@ -1 +1 @@")).toBe("patch-hunk");
    expect(patchLineClass("+added")).toBe("patch-add");
    expect(patchLineClass("-removed")).toBe("patch-del");
    expect(patchLineClass(" context")).toBe("patch-context");
  });

  it("treats only real file headers as headers", () => {
    expect(patchLineClass("--- /dev/null")).toBe("patch-file");
    expect(patchLineClass("+++ /dev/null")).toBe("patch-file");
    expect(patchLineClass("--- removed flag")).toBe("patch-del");
    expect(patchLineClass("+++ counter")).toBe("patch-add");
  });
});

describe("urls", () => {
  it("keeps slashes of branch names in pages links", () => {
    expect(pagesUrl("feature/new ui")).toBe("/pages/feature/new%20ui/");
  });

  it("drops empty query values", () => {
    expect(treeUrl("main")).toBe("/tree?ref=main");
    expect(treeUrl("main", "docs/img")).toBe("/tree?ref=main&path=docs%2Fimg");
  });
});
