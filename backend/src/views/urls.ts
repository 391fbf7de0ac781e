function withQuery(pathname: string, params: Record<string, string>): string {
  const query = new URLSearchParams(
    Object.entries(params).filter(([, value]) => value.length > 0),
  ).toString();
  return query ? `${pathname}?${query}` : pathname;
}

export function treeUrl(ref: string, repoPath = ""): string {
  return withQuery("/tree", { ref, path: repoPath });
}

export function blobUrl(ref: string, repoPath: string): string {
  return withQuery("/blob", { ref, path: repoPath });
}

export function rawUrl(ref: string, repoPath: string): string {
  return withQuery("/raw", { ref, path: repoPath });
}

export function commitsUrl(ref: string): string {
  return withQuery("/commits", { ref });
}

export function diffUrl(from: string, to: string): string {
  return withQuery("/diff", { from, to });
}

export function workflowsUrl(ref: string): string {
  return withQuery("/workflows", { ref });
}

export function pagesUrl(branch: string): string {
  return `/pages/${branch.split("/").map(encodeURIComponent).join("/")}/`;
}

export function joinRepoPath(directory: string, name: string): string {
  if (!directory) return name;
  return directory.endsWith("/") ? `${directory}${name}` : `${directory}/${name}`;
}
