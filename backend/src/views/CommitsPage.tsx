import type { CommitsViewData } from "@gitview/contracts";
import { Layout } from "./Layout.js";
import { diffUrl, treeUrl } from "./urls.js";

export function CommitsPage({ data }: { data: CommitsViewData }) {
  return (
    <Layout base={data} title={`Commits on ${data.ref}`}>
      <h1>
        Commits on <code>{data.ref}</code>
      </h1>

      {data.commits.length === 0 ? (
        <p className="empty">No commits.</p>
      ) : (
        <table className="commit-table">
          <tbody>
            {data.commits.map((commit) => (
              <tr key={commit.hash}>
                <td>
                  <a href={treeUrl(commit.hash)}>
                    <code>{commit.hash}</code>
                  </a>
                </td>
                <td className="commit-date">{commit.date}</td>
                <td className="commit-subject">{commit.subject}</td>
                <td>
                  <a href={diffUrl(`${commit.hash}^`, commit.hash)}>diff</a>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </Layout>
  );
}
