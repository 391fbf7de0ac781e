import type { WorkflowsViewData } from "@gitview/contracts";
import { Layout } from "./Layout.js";
import { blobUrl } from "./urls.js";

export function WorkflowsPage({ data }: { data: WorkflowsViewData }) {
  return (
    <Layout base={data} title="Workflows">
      <h1>
        Workflows on <code>{data.ref}</code>
      </h1>

      {data.workflows.length === 0 ? (
        <p className="empty">No workflows found in .github/workflows.</p>
      ) : (
        <ul className="workflow-list">
          {data.workflows.map((workflowPath) => (
            <li key={workflowPath}>
              <a href={blobUrl(data.ref, workflowPath)}>{workflowPath}</a>
            </li>
          ))}
        </ul>
      )}
    </Layout>
  );
}
