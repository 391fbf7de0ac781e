import type { TreeEntry, TreeViewData } from "@gitview/contracts";
import { Layout } from "./Layout.js";
import { blobUrl, joinRepoPath, treeUrl } from "./urls.js";

function formatSize(entry: TreeEntry): string {
  if (entry.type !== "blob") return "";
  if (entry.size < 1024) return `${entry.size} B`;
  if (entry.size < 1024 * 1024) return `${(entry.size / 1024).toFixed(1)} KiB`;
  return `${(entry.size / (1024 * 1024)).toFixed(1)} MiB`;
}

function entryHref(data: TreeViewData, entry: TreeEntry): string | null {
  const entryPath = joinRepoPath(data.path, entry.name);
  if (entry.type === "tree") return treeUrl(data.ref, entryPath);
  if (entry.type === "blob") return blobUrl(data.ref, entryPath);
  // Submodule commits are not part of this repository's object store.
  return null;
}

export function TreePage({ data }: { data: TreeViewData }) {
  return (
    <Layout base={data} title={data.path || "Tree"}>
      <h1 className="path-heading">
        <a href={treeUrl(data.ref)}>{data.repoName}</a>
        {data.path ? ` / ${data.path}` : null}
      </h1>

      <table className="tree-table">
        <thead>
          <tr>
            <th>Name</th>
            <th>Mode</th>
            <th className="numeric">Size</th>
          </tr>
        </thead>
        <tbody>
          {data.path ? (
            <tr className="tree-parent">
              <td colSpan={3}>
                <a href={treeUrl(data.ref, data.parentPath)}>..</a>
              </td>
            </tr>
          ) : null}
          {data.entries.map((entry) => {
            const href = entryHref(data, entry);

            return (
              <tr key={entry.name} className={`tree-entry tree-entry-${entry.type}`}>
                <td>
                  {href ? <a href={href}>{entry.type === "tree" ? `${entry.name}/` : entry.name}</a> : entry.name}
                </td>
                <td>
                  <code>{entry.mode}</code>
                </td>
                <td className="numeric">{formatSize(entry)}</td>
              </tr>
            );
          })}
        </tbody>
      </table>

      {data.entries.length === 0 ? <p className="empty">This directory is empty.</p> : null}
    </Layout>
  );
}
