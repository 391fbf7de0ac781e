import type { OverviewViewData } from "@gitview/contracts";
import { Layout } from "./Layout.js";
import { commitsUrl, pagesUrl, treeUrl, workflowsUrl } from "./urls.js";

export function OverviewPage({ data }: { data: OverviewViewData }) {
  return (
    <Layout base={data} title="Overview">
      <h1>{data.repoName}</h1>
      <dl className="summary">
        <dt>HEAD</dt>
        <dd>
          <code>{data.ref}</code> at <code>{data.headHash}</code>
        </dd>
        <dt>Branches</dt>
        <dd>{data.branches.length}</dd>
      </dl>

      <ul className="quick-links">
        <li>
          <a href={treeUrl(data.ref)}>Browse files</a>
        </li>
        <li>
          <a href={commitsUrl(data.ref)}>Recent commits</a>
        </li>
        <li>
          <a href={workflowsUrl(data.ref)}>Workflows</a>
        </li>
        {data.hasPagesBranch ? (
          <li>
            <a href={pagesUrl(data.pagesBranch)}>Pages ({data.pagesBranch})</a>
          </li>
        ) : null}
      </ul>
    </Layout>
  );
}
