import type { DiffViewData } from "@gitview/contracts";
import { Layout } from "./Layout.js";

const FILE_HEADER_PATTERN = /^(--- (a\/|\/dev\/null)|\+\+\+ (b\/|\/dev\/null))/;

export function patchLineClass(line: string): string {
  if (FILE_HEADER_PATTERN.test(line)) return "patch-file";
  if (line.startsWith("@@")) return "patch-hunk";
  if (line.startsWith("+")) return "patch-add";
  if (line.startsWith("-")) return "patch-del";
  if (line.startsWith("diff --git")) return "patch-header";
  return "patch-context";
}

export function DiffPage({ data }: { data: DiffViewData }) {
  const lines = data.patch.endsWith("\n") ? data.patch.slice(0, -1).split("\n") : data.patch.split("\n");

  return (
    <Layout base={data} title={`Diff ${data.from}..${data.to}`}>
      <h1>
        Diff <code>{data.from}</code> .. <code>{data.to}</code>
      </h1>

      {data.stat ? (
        <details className="diff-stat">
          <summary>Changed files</summary>
          <pre>{data.stat}</pre>
        </details>
      ) : null}

      <pre className="patch">
        {lines.map((line, index) => (
          <span key={index} className={patchLineClass(line)}>
            {`${line}\n`}
          </span>
        ))}
      </pre>
    </Layout>
  );
}
