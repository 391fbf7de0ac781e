import type { ReactNode } from "react";
import type { BaseViewData, ThemePreference } from "@gitview/contracts";
import { commitsUrl, pagesUrl, treeUrl, workflowsUrl } from "./urls.js";

const THEME_CHOICES: { value: ThemePreference | "system"; label: string }[] = [
  { value: "system", label: "System" },
  { value: "light", label: "Light" },
  { value: "dark", label: "Dark" },
];

type LayoutProps = {
  base: BaseViewData;
  title: string;
  children: ReactNode;
};

export function Layout({ base, title, children }: LayoutProps) {
  const { repoName, ref, branches, pagesBranch, hasPagesBranch, pagesBranches, theme } = base;
  const activeTheme = theme ?? "system";

  return (
    <html lang="en" data-theme={theme ?? undefined}>
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${title} · ${repoName}`}</title>
        <link rel="stylesheet" href="/static/app.css" />
      </head>
      <body>
        <header className="topbar">
          <a className="repo-name" href="/">
            {repoName}
          </a>
          <span className="ref-badge" title="Current ref">
            {ref}
          </span>
          <nav className="topbar-nav">
            <a href="/">Overview</a>
            <a href={treeUrl(ref)}>Tree</a>
            <a href={commitsUrl(ref)}>Commits</a>
            <a href={workflowsUrl(ref)}>Workflows</a>
            {hasPagesBranch ? <a href={pagesUrl(pagesBranch)}>Pages</a> : null}
          </nav>
          <form className="theme-switch" method="post" action="/theme">
            {THEME_CHOICES.map((choice) => (
              <button
                key={choice.value}
                type="submit"
                name="theme"
                value={choice.value}
                aria-pressed={choice.value === activeTheme}
              >
                {choice.label}
              </button>
            ))}
          </form>
        </header>

        <div className="layout">
          <aside className="sidebar">
            <details open>
              <summary>Branches ({branches.length})</summary>
              <ul className="branch-list">
                {branches.map((branch) => (
                  <li key={branch} className={branch === ref ? "branch branch-current" : "branch"}>
                    <a href={treeUrl(branch)}>{branch}</a>
                  </li>
                ))}
              </ul>
            </details>

            {pagesBranches.length > 0 ? (
              <details>
                <summary>View as pages</summary>
                <ul className="branch-list">
                  {pagesBranches.map((branch) => (
                    <li key={branch} className="branch">
                      <a href={pagesUrl(branch)}>{branch}</a>
                    </li>
                  ))}
                </ul>
              </details>
            ) : null}
          </aside>

          <main className="content">{children}</main>
        </div>
      </body>
    </html>
  );
}
