import type { BlobViewData } from "@gitview/contracts";
import { Layout } from "./Layout.js";
import { rawUrl, treeUrl } from "./urls.js";
import { parentPath } from "../services/git/path.service.js";

export function BlobPage({ data }: { data: BlobViewData }) {
  return (
    <Layout base={data} title={data.path}>
      <h1 className="path-heading">
        <a href={treeUrl(data.ref, parentPath(data.path))}>{parentPath(data.path) || data.repoName}</a>
        {` / ${data.path.split("/").pop() ?? data.path}`}
      </h1>

      <p className="file-actions">
        <span>{data.sizeBytes} bytes</span>
        <a href={rawUrl(data.ref, data.path)}>Raw</a>
      </p>

      {data.isBinary ? (
        <p className="notice">Binary file not shown.</p>
      ) : (
        <>
          {data.truncated ? (
            <p className="notice">File truncated for preview. Use the raw view for the full content.</p>
          ) : null}
          <pre className="file-content">
            <code>{data.content}</code>
          </pre>
        </>
      )}
    </Layout>
  );
}
